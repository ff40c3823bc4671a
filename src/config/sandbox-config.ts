/**
 * Sandbox Configuration
 *
 * Schema and loader for the service configuration. Values come from the
 * schema defaults, then an optional sandbox.config.yaml, then environment
 * variables. The loaded object is frozen and handed to each component.
 */

import { z } from "zod";
import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";

const sizeString = z.coerce.string().regex(/^\d+(\.\d+)?[bkmg]?$/i, "expected a size such as 256m");

/**
 * Complete configuration schema.
 */
export const SandboxConfigSchema = z
  .object({
    /** Container image used for executions and installs */
    image: z.string().min(1).default("python:3.11-alpine"),
    /** Ensure the image once at startup instead of before each use */
    pullOnStartup: z.boolean().default(true),
    /** Container runtime CLI */
    dockerBinary: z.string().min(1).default("docker"),
    /** Directory holding one subdirectory per session */
    baseDir: z.string().min(1).default("./sandboxes"),
    /** Wall-clock limit for one execution */
    execTimeoutSeconds: z.number().positive().default(30),
    /** Wall-clock limit for an install job; unset means no deadline */
    installTimeoutSeconds: z.number().positive().optional(),
    imagePullTimeoutSeconds: z.number().positive().default(300),
    memory: sizeString.default("256m"),
    cpus: z.coerce.string().regex(/^\d+(\.\d+)?$/, "expected a CPU count such as 1.0").default("1.0"),
    pidsLimit: z.number().int().positive().default(64),
    /** Size of the private /tmp inside execution containers */
    tmpfsSize: sizeString.default("64m"),
    /** uid[:gid] the container process runs as; never root */
    runAsUser: z
      .string()
      .regex(/^\d+(:\d+)?$/, "expected uid or uid:gid")
      .refine((value) => !/^0(:|$)/.test(value), "must not run as root")
      .default("1000:1000"),
    /** Cap applied to stdout and stderr independently */
    maxOutputBytes: z.number().int().positive().default(100_000),
    /** Idle time after which a session expires on next access */
    retentionSeconds: z.number().positive().default(7 * 24 * 3600),
    /** Print the value of a trailing bare expression */
    echoLastExpression: z.boolean().default(true),
    /** Minimum spacing between install status updates */
    statusIntervalSeconds: z.number().positive().default(3),
    /** Characters of log tail shown in install status updates */
    statusTailChars: z.number().int().positive().default(1800),
    logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  })
  .strict();

export type SandboxConfigInput = z.input<typeof SandboxConfigSchema>;
export type SandboxConfig = Readonly<z.output<typeof SandboxConfigSchema>>;

/**
 * Configuration file names to look for.
 */
export const CONFIG_FILE_NAMES = ["sandbox.config.yaml", "sandbox.config.yml"];

/**
 * Raised when configuration values fail validation.
 */
export class ConfigError extends Error {
  constructor(
    public readonly source: string,
    public readonly issues: string[]
  ) {
    super(`Invalid configuration in ${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

type EnvParser = (raw: string) => unknown;

const asNumber: EnvParser = (raw) => Number(raw);
const asString: EnvParser = (raw) => raw;
const asFlag: EnvParser = (raw) => !["0", "false", "no", "off"].includes(raw.trim().toLowerCase());

/**
 * Environment variables and the config keys they override.
 */
const ENV_OVERRIDES: ReadonlyArray<[string, keyof SandboxConfigInput, EnvParser]> = [
  ["SANDBOX_IMAGE", "image", asString],
  ["SANDBOX_PULL_ON_STARTUP", "pullOnStartup", asFlag],
  ["SANDBOX_BASE_DIR", "baseDir", asString],
  ["SANDBOX_EXEC_TIMEOUT", "execTimeoutSeconds", asNumber],
  ["SANDBOX_INSTALL_TIMEOUT", "installTimeoutSeconds", asNumber],
  ["SANDBOX_MEMORY", "memory", asString],
  ["SANDBOX_CPUS", "cpus", asString],
  ["SANDBOX_PIDS_LIMIT", "pidsLimit", asNumber],
  ["SANDBOX_MAX_OUTPUT_BYTES", "maxOutputBytes", asNumber],
  ["SANDBOX_RETENTION_SECONDS", "retentionSeconds", asNumber],
  ["SANDBOX_ECHO_LAST_EXPR", "echoLastExpression", asFlag],
  ["DOCKER_BINARY", "dockerBinary", asString],
  ["LOG_LEVEL", "logLevel", asString],
];

/**
 * Read config overrides from environment variables.
 * Empty values are ignored.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [name, key, parse] of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== "") {
      overrides[key] = parse(raw.trim());
    }
  }
  return overrides;
}

/**
 * Validate raw values and produce a frozen config.
 *
 * @param raw - Unvalidated values (file contents merged with env overrides)
 * @param relativeTo - Directory that a relative baseDir is resolved against
 * @param source - Description used in error messages
 */
export function resolveConfig(raw: unknown, relativeTo: string = process.cwd(), source = "configuration"): SandboxConfig {
  const result = SandboxConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(source, issues);
  }

  return Object.freeze({
    ...result.data,
    baseDir: path.resolve(relativeTo, result.data.baseDir),
  });
}

/**
 * Load a YAML configuration file without validating it.
 */
export async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const content = await fs.readFile(configPath, "utf-8");
  const parsed: unknown = yaml.load(content);
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(configPath, ["(root): expected a mapping"]);
  }
  return { ...parsed };
}

/**
 * Find a configuration file in the given directory or its parents.
 *
 * @returns Absolute path of the first match, null otherwise
 */
export async function findConfigFile(startDir: string): Promise<string | null> {
  let currentDir = path.resolve(startDir);

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      try {
        await fs.access(configPath);
        return configPath;
      } catch {
        // Not here, keep looking
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; skips the search */
  configPath?: string;
  /** Where to start searching for a config file (default: cwd) */
  startDir?: string;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load the effective configuration.
 *
 * A relative baseDir from the file is resolved against the file's
 * directory; one from the environment against the current directory.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SandboxConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : await findConfigFile(options.startDir ?? process.cwd());

  const fileValues = configPath ? await readConfigFile(configPath) : {};
  const envValues = configFromEnv(env);

  const relativeTo =
    configPath && envValues.baseDir === undefined ? path.dirname(configPath) : process.cwd();
  const source = configPath ? `${configPath} and environment` : "environment";

  return resolveConfig({ ...fileValues, ...envValues }, relativeTo, source);
}
