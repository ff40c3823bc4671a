/**
 * Sandbox Types
 *
 * Core type definitions for sessions and their workspaces.
 */

import { z } from 'zod';

/**
 * Name of the per-session metadata file inside the session root.
 */
export const META_FILE_NAME = '.meta.json';

/**
 * Workspace subdirectory that package installs write to.
 */
export const SITE_PACKAGES_DIR = '.site-packages';

/**
 * Owner ids name a directory under the base dir, so they are restricted
 * to a conservative character set.
 */
export const OwnerIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]{1,128}$/)
  .refine((id) => id !== '.' && id !== '..');

function isRelativeCwd(cwd: string): boolean {
  if (cwd === '' || cwd.startsWith('/') || cwd.includes('\\') || cwd.includes('\u0000')) {
    return false;
  }
  return !cwd.split('/').includes('..');
}

/**
 * Persisted session metadata.
 */
export const SessionMetadataSchema = z.object({
  /** Epoch milliseconds */
  createdAt: z.number().finite(),
  /** Epoch milliseconds */
  lastUsedAt: z.number().finite(),
  /** Working directory relative to the session root; absolute or `..` values read as the root */
  cwd: z.string().refine(isRelativeCwd).default('.').catch('.'),
});

export type SessionMetadata = z.infer<typeof SessionMetadataSchema>;

/**
 * A live session as seen by callers.
 */
export interface SandboxSession extends SessionMetadata {
  ownerId: string;
  /** Absolute path of the session root */
  rootPath: string;
}

/**
 * Outcome of SessionStore.create.
 */
export type CreateOutcome = 'created' | 'already-exists' | 'failed';

/**
 * Outcome of SessionStore.setCwd. The session cwd is unchanged on failure.
 */
export type SetCwdResult =
  | { ok: true; cwd: string }
  | { ok: false; reason: 'no-session' | 'outside-root' | 'not-a-directory' | 'io-failure' };

/**
 * One entry of a directory listing.
 */
export interface WorkspaceEntry {
  name: string;
  isDirectory: boolean;
  /** Size in bytes; undefined for directories and links leaving the session */
  size?: number;
}

/**
 * Result of listing the session's current directory.
 */
export interface DirectoryListing {
  cwd: string;
  entries: WorkspaceEntry[];
}
