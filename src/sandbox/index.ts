/**
 * Sandbox Module
 *
 * Per-owner session directories, contained path resolution, and the file
 * operations performed inside a session.
 */

// Shared Types
export {
  META_FILE_NAME,
  SITE_PACKAGES_DIR,
  OwnerIdSchema,
  SessionMetadataSchema,
} from './types.js';
export type {
  SessionMetadata,
  SandboxSession,
  CreateOutcome,
  SetCwdResult,
  WorkspaceEntry,
  DirectoryListing,
} from './types.js';

// Errors
export {
  SandboxError,
  RuntimeUnavailableError,
  ImageUnavailableError,
  ExecutionSetupError,
  SessionNotFoundError,
  AlreadyExistsError,
  InvalidOwnerError,
  PathEscapeError,
  PathNotFoundError,
  DirectoryConflictError,
  IOFailureError,
  InvalidPackageError,
  isSandboxError,
  errnoCode,
} from './errors.js';

// Paths
export { normalizeUserPath, isWithin, resolveContained, relativeToRoot } from './paths.js';

// Sessions
export { SessionStore, type SessionStoreOptions } from './session-store.js';
export { removeTree } from './remove-tree.js';

// Workspace files
export { WorkspaceFiles, type WriteResult } from './workspace.js';
