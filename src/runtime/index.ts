/**
 * Runtime Module
 *
 * Docker-backed isolated execution and package installs.
 */

export {
  DockerClient,
  DAEMON_UNREACHABLE_PATTERN,
  DOCKER_COMMAND_TIMEOUT_MS,
  type DockerClientOptions,
  type EnsureImageOptions,
  type HealthStatus,
} from './docker.js';

export {
  ExecutionEngine,
  TIMEOUT_EXIT_CODE,
  TIMEOUT_MESSAGE,
  WORKSPACE_MOUNT,
  buildRunArgs,
  confinementArgs,
  containerWorkdir,
  envArgs,
  randomContainerName,
  type EngineConfig,
  type ExecutionEngineOptions,
  type ExecutionRequest,
  type ExecutionResult,
  type ResourceLimits,
  type RunArgsOptions,
} from './engine.js';

export {
  InstallJobRunner,
  SITE_PACKAGES_PATH,
  throttleInstallStatus,
  validatePackage,
  type InstallEvent,
  type InstallInvocation,
  type InstallJobRunnerOptions,
  type InstallStatus,
  type ThrottleOptions,
} from './install.js';

export { CappedOutput } from './output.js';

export {
  defaultSpawn,
  runCommand,
  waitForExit,
  type CommandOutput,
  type ProcessExit,
  type RunCommandOptions,
  type SpawnedProcess,
  type SpawnProcess,
} from './process.js';
