/**
 * sandbox-sessions - Per-user persistent workspaces with isolated Python execution
 */

// Configuration
export * from "./config/index.js";

// Logging
export { Logger, createLogger, getLogger, isLogLevel, type LogLevel, type LoggerOptions, type LogContext } from "./logging/logger.js";

// Sessions and workspaces
export * from "./sandbox/index.js";

// Container runtime
export * from "./runtime/index.js";

// Trailing expression echo
export * from "./echo/index.js";

// Caller-facing verbs
export { SandboxCommands, renderInstallStatus, type SandboxCommandsOptions, type LookOptions } from "./commands/service.js";
export {
  PAGE_SIZE,
  extractCodeBlock,
  formatExecutionResult,
  listingLines,
  pageCount,
  renderPage,
} from "./commands/format.js";

// CLI
export { createProgram, runCLI, type CLIOutput, type ProgramDeps } from "./cli/program.js";
