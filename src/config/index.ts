/**
 * Config Module
 *
 * Service configuration schema and loading.
 */

export {
  SandboxConfigSchema,
  CONFIG_FILE_NAMES,
  ConfigError,
  type SandboxConfig,
  type SandboxConfigInput,
  type LoadConfigOptions,
  configFromEnv,
  resolveConfig,
  readConfigFile,
  findConfigFile,
  loadConfig,
} from "./sandbox-config.js";
