/**
 * Sandbox Errors
 *
 * Error types for session and container operations, each with a short
 * user-facing message. Run outcomes (non-zero exit, timeout, truncation)
 * are never errors; they live in ExecutionResult.
 */

/**
 * Base class for all sandbox errors.
 */
export class SandboxError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'SandboxError';
  }

  /**
   * Get a message suitable for showing to the end user.
   */
  toUserMessage(): string {
    return this.message;
  }
}

/**
 * Thrown when the container runtime cannot be found or reached.
 */
export class RuntimeUnavailableError extends SandboxError {
  constructor(message: string) {
    super('RUNTIME_UNAVAILABLE', message);
    this.name = 'RuntimeUnavailableError';
  }

  toUserMessage(): string {
    return `Sandbox error: ${this.message}`;
  }
}

/**
 * Thrown when the execution image is missing and cannot be pulled.
 */
export class ImageUnavailableError extends SandboxError {
  constructor(
    public readonly image: string,
    message: string
  ) {
    super('IMAGE_UNAVAILABLE', message);
    this.name = 'ImageUnavailableError';
  }

  toUserMessage(): string {
    return `Sandbox error: ${this.message}`;
  }
}

/**
 * Thrown when a container could not be started for a reason other than
 * the runtime being unreachable.
 */
export class ExecutionSetupError extends SandboxError {
  constructor(message: string) {
    super('EXECUTION_SETUP', message);
    this.name = 'ExecutionSetupError';
  }

  toUserMessage(): string {
    return `Sandbox error: ${this.message}`;
  }
}

/**
 * Thrown when no usable session exists (never created, corrupt, or expired).
 */
export class SessionNotFoundError extends SandboxError {
  constructor(public readonly ownerId: string) {
    super('SESSION_NOT_FOUND', `No live sandbox for ${ownerId}`);
    this.name = 'SessionNotFoundError';
  }

  toUserMessage(): string {
    return 'No sandbox found or it expired. Use create first.';
  }
}

/**
 * Thrown when a session is created while a live one exists.
 */
export class AlreadyExistsError extends SandboxError {
  constructor(public readonly ownerId: string) {
    super('ALREADY_EXISTS', `Sandbox already exists for ${ownerId}`);
    this.name = 'AlreadyExistsError';
  }

  toUserMessage(): string {
    return 'You already have a sandbox.';
  }
}

/**
 * Thrown when an owner id cannot name a session directory.
 */
export class InvalidOwnerError extends SandboxError {
  constructor(public readonly ownerId: string) {
    super('INVALID_OWNER', `Invalid owner id: ${JSON.stringify(ownerId)}`);
    this.name = 'InvalidOwnerError';
  }
}

/**
 * Thrown when a path resolves outside the session root.
 */
export class PathEscapeError extends SandboxError {
  constructor(path: string) {
    super('PATH_ESCAPE', `Path resolves outside the sandbox: ${path}`, path);
    this.name = 'PathEscapeError';
  }

  toUserMessage(): string {
    return 'Invalid path.';
  }
}

/**
 * Thrown when a path does not exist.
 */
export class PathNotFoundError extends SandboxError {
  constructor(path: string) {
    super('NOT_FOUND', `File or directory not found: ${path}`, path);
    this.name = 'PathNotFoundError';
  }

  toUserMessage(): string {
    return 'Path not found.';
  }
}

/**
 * Thrown when a file operation targets a name held by a directory.
 */
export class DirectoryConflictError extends SandboxError {
  constructor(path: string, message = `A directory exists with that name: ${path}`) {
    super('DIRECTORY_CONFLICT', message, path);
    this.name = 'DirectoryConflictError';
  }
}

/**
 * Thrown when a filesystem operation fails.
 */
export class IOFailureError extends SandboxError {
  constructor(message: string, path?: string) {
    super('IO_FAILURE', message, path);
    this.name = 'IOFailureError';
  }

  toUserMessage(): string {
    return `Failed: ${this.message}`;
  }
}

/**
 * Thrown when a package specifier is not acceptable for the installer.
 */
export class InvalidPackageError extends SandboxError {
  constructor(public readonly spec: string) {
    super('INVALID_PACKAGE', `Invalid package name: ${JSON.stringify(spec)}`);
    this.name = 'InvalidPackageError';
  }
}

/**
 * Type guard for SandboxError.
 */
export function isSandboxError(error: unknown): error is SandboxError {
  return error instanceof SandboxError;
}

/**
 * Error code of a Node.js system error, if any.
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
