/**
 * Session Store
 *
 * One directory per owner under the configured base directory, holding the
 * user's files plus a small metadata record. Expiry is lazy: an idle session
 * is detected and deleted by the next `ensure` call, there is no sweeper.
 *
 * Concurrent calls for the same owner are not serialized; the metadata
 * record is last-write-wins.
 */

import { randomBytes } from 'crypto';
import * as fs from 'fs/promises';
import * as nodePath from 'path';
import type { SandboxConfig } from '../config/index.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { InvalidOwnerError, errnoCode } from './errors.js';
import { relativeToRoot, resolveContained } from './paths.js';
import { removeTree } from './remove-tree.js';
import {
  META_FILE_NAME,
  OwnerIdSchema,
  SessionMetadataSchema,
  type CreateOutcome,
  type SandboxSession,
  type SessionMetadata,
  type SetCwdResult,
} from './types.js';

export interface SessionStoreOptions {
  /** Clock in epoch milliseconds (default: Date.now) */
  now?: () => number;
  logger?: Logger;
}

export class SessionStore {
  readonly baseDir: string;
  private readonly retentionMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(config: Pick<SandboxConfig, 'baseDir' | 'retentionSeconds'>, options: SessionStoreOptions = {}) {
    this.baseDir = nodePath.resolve(config.baseDir);
    this.retentionMs = config.retentionSeconds * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger('session-store');
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Absolute root directory of an owner's session.
   *
   * @throws InvalidOwnerError if the id cannot name a directory
   */
  rootOf(ownerId: string): string {
    if (!OwnerIdSchema.safeParse(ownerId).success) {
      throw new InvalidOwnerError(ownerId);
    }
    return nodePath.join(this.baseDir, ownerId);
  }

  /**
   * Check that a usable session exists, deleting it first if it expired.
   */
  async ensure(ownerId: string): Promise<boolean> {
    const root = this.rootOf(ownerId);
    if (!(await isDirectory(root))) {
      return false;
    }

    const meta = await this.loadMeta(ownerId);
    if (!meta) {
      return false;
    }

    const idleMs = this.now() - meta.lastUsedAt;
    if (idleMs > this.retentionMs) {
      this.logger.info('Session expired, deleting', { ownerId, idleMs });
      await removeTree(root, this.logger);
      return false;
    }
    return true;
  }

  async create(ownerId: string): Promise<CreateOutcome> {
    if (await this.ensure(ownerId)) {
      return 'already-exists';
    }

    const root = this.rootOf(ownerId);
    try {
      await fs.mkdir(root, { recursive: true });
      const now = this.now();
      await this.saveMeta(ownerId, { createdAt: now, lastUsedAt: now, cwd: '.' });
    } catch (error) {
      this.logger.error('Failed to create session', error);
      return 'failed';
    }

    this.logger.info('Session created', { ownerId, root });
    return 'created';
  }

  /**
   * Delete the whole session subtree.
   *
   * @returns false if nothing existed or removal failed
   */
  async delete(ownerId: string): Promise<boolean> {
    const root = this.rootOf(ownerId);
    if (!(await exists(root))) {
      return false;
    }
    const removed = await removeTree(root, this.logger);
    if (removed) {
      this.logger.info('Session deleted', { ownerId });
    }
    return removed;
  }

  /**
   * Refresh lastUsedAt. No-op when the session has no metadata; a failed
   * write is logged rather than failing the operation that just succeeded.
   */
  async touch(ownerId: string): Promise<void> {
    const meta = await this.loadMeta(ownerId);
    if (!meta) {
      return;
    }
    try {
      await this.saveMeta(ownerId, { ...meta, lastUsedAt: this.now() });
    } catch (error) {
      this.logger.warn('Failed to refresh lastUsedAt', { ownerId, error: String(error) });
    }
  }

  /**
   * Snapshot of a session, or null if there is no readable metadata.
   */
  async get(ownerId: string): Promise<SandboxSession | null> {
    const meta = await this.loadMeta(ownerId);
    if (!meta) {
      return null;
    }
    return { ownerId, rootPath: this.rootOf(ownerId), ...meta };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  async currentCwd(ownerId: string): Promise<string> {
    const meta = await this.loadMeta(ownerId);
    return meta?.cwd ?? '.';
  }

  /**
   * Change the working directory. Never throws for path problems; on any
   * failure the stored cwd is left as it was.
   */
  async setCwd(ownerId: string, relative: string): Promise<SetCwdResult> {
    const meta = await this.loadMeta(ownerId);
    if (!meta) {
      return { ok: false, reason: 'no-session' };
    }

    const root = this.rootOf(ownerId);
    const target = await resolveContained(root, meta.cwd, relative);
    if (target === null) {
      return { ok: false, reason: 'outside-root' };
    }
    if (!(await isDirectory(target))) {
      return { ok: false, reason: 'not-a-directory' };
    }

    try {
      const cwd = await relativeToRoot(root, target);
      await this.saveMeta(ownerId, { ...meta, cwd });
      return { ok: true, cwd };
    } catch (error) {
      this.logger.warn('Failed to store cwd', { ownerId, error: String(error) });
      return { ok: false, reason: 'io-failure' };
    }
  }

  /**
   * Move back to the session root. No-op without metadata.
   */
  async resetCwd(ownerId: string): Promise<void> {
    const meta = await this.loadMeta(ownerId);
    if (!meta || meta.cwd === '.') {
      return;
    }
    await this.saveMeta(ownerId, { ...meta, cwd: '.' });
  }

  /**
   * Resolve a user path against the session root and cwd.
   *
   * @returns Absolute contained path, or null if it would escape
   */
  async resolve(ownerId: string, relative: string): Promise<string | null> {
    const cwd = await this.currentCwd(ownerId);
    return resolveContained(this.rootOf(ownerId), cwd, relative);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Metadata
  // ─────────────────────────────────────────────────────────────────────────

  private metaPath(ownerId: string): string {
    return nodePath.join(this.rootOf(ownerId), META_FILE_NAME);
  }

  private async loadMeta(ownerId: string): Promise<SessionMetadata | null> {
    let content: string;
    try {
      content = await fs.readFile(this.metaPath(ownerId), 'utf-8');
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        this.logger.warn('Unreadable session metadata', { ownerId, error: String(error) });
      }
      return null;
    }

    try {
      const parsed = SessionMetadataSchema.safeParse(JSON.parse(content));
      return parsed.success ? parsed.data : null;
    } catch {
      this.logger.warn('Corrupt session metadata', { ownerId });
      return null;
    }
  }

  /**
   * Write via an exclusive temp file and rename, so a symlink that
   * executed code planted at the metadata path is replaced, not followed.
   */
  private async saveMeta(ownerId: string, meta: SessionMetadata): Promise<void> {
    const target = this.metaPath(ownerId);
    const temp = `${target}.${randomBytes(6).toString('hex')}.tmp`;
    await fs.writeFile(temp, JSON.stringify(meta), { encoding: 'utf-8', flag: 'wx' });
    try {
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true });
      throw error;
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await fs.lstat(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch {
    return false;
  }
}
