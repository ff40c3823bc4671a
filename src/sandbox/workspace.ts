/**
 * Workspace file operations on behalf of a session owner.
 *
 * All paths go through SessionStore.resolve, so they are relative to the
 * session cwd and contained in the session root.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as nodePath from 'path';
import {
  DirectoryConflictError,
  IOFailureError,
  PathEscapeError,
  PathNotFoundError,
  errnoCode,
} from './errors.js';
import { normalizeUserPath, relativeToRoot, resolveContained } from './paths.js';
import { removeTree } from './remove-tree.js';
import type { SessionStore } from './session-store.js';
import { META_FILE_NAME, type DirectoryListing, type WorkspaceEntry } from './types.js';

export interface WriteResult {
  /** Path relative to the session root */
  path: string;
  /** UTF-8 byte length of the written content */
  bytes: number;
}

export class WorkspaceFiles {
  constructor(private readonly sessions: SessionStore) {}

  /**
   * Create or overwrite a text file, creating parent directories.
   *
   * @throws PathEscapeError if the path leaves the session or names reserved state
   * @throws DirectoryConflictError if a directory holds that name
   * @throws IOFailureError if the write fails
   */
  async writeFile(ownerId: string, name: string, content: string): Promise<WriteResult> {
    const target = await this.resolveUserPath(ownerId, name);

    if (await isDirectory(target)) {
      throw new DirectoryConflictError(name);
    }

    try {
      await fs.mkdir(nodePath.dirname(target), { recursive: true });
      await fs.writeFile(target, content, 'utf-8');
    } catch (error) {
      throw new IOFailureError(`could not write ${name} (${errnoCode(error) ?? 'error'})`, name);
    }

    return {
      path: await relativeToRoot(this.sessions.rootOf(ownerId), target),
      bytes: Buffer.byteLength(content, 'utf-8'),
    };
  }

  /**
   * Remove a file, or a directory tree when `recursive` is set. A symlink
   * is removed itself, never its target.
   */
  async removePath(ownerId: string, name: string, options: { recursive?: boolean } = {}): Promise<void> {
    const target = await this.resolveEntry(ownerId, name);

    let stats: Stats;
    try {
      stats = await fs.lstat(target);
    } catch {
      throw new PathNotFoundError(name);
    }

    if (stats.isDirectory()) {
      if (!options.recursive) {
        throw new DirectoryConflictError(name, 'Use recursive to remove directories.');
      }
      if (!(await removeTree(target))) {
        throw new IOFailureError(`could not remove ${name}`, name);
      }
      return;
    }

    try {
      await fs.unlink(target);
    } catch (error) {
      throw new IOFailureError(`could not remove ${name} (${errnoCode(error) ?? 'error'})`, name);
    }
  }

  /**
   * List the session's current directory, directories first.
   * A cwd that no longer exists is reset to the root.
   */
  async listDirectory(ownerId: string): Promise<DirectoryListing> {
    const root = this.sessions.rootOf(ownerId);
    let cwd = await this.sessions.currentCwd(ownerId);
    let dir = await resolveContained(root, '.', cwd);

    if (dir === null || !(await isDirectory(dir))) {
      await this.sessions.resetCwd(ownerId);
      cwd = '.';
      dir = await resolveContained(root, '.', '.');
      if (dir === null) {
        throw new PathNotFoundError('.');
      }
    }

    const atRoot = cwd === '.';
    const dirents = await fs.readdir(dir, { withFileTypes: true });
    const entries: WorkspaceEntry[] = [];

    for (const dirent of dirents) {
      if (atRoot && dirent.name === META_FILE_NAME) continue;
      const stats = await this.entryStats(root, cwd, nodePath.join(dir, dirent.name), dirent.name);
      if (stats === null) {
        entries.push({ name: dirent.name, isDirectory: false });
      } else if (stats.isDirectory()) {
        entries.push({ name: dirent.name, isDirectory: true });
      } else {
        entries.push({ name: dirent.name, isDirectory: false, size: stats.size });
      }
    }

    entries.sort((a, b) => {
      if (a.isDirectory !== b.isDirectory) return a.isDirectory ? -1 : 1;
      const byLower = a.name.toLowerCase().localeCompare(b.name.toLowerCase());
      return byLower !== 0 ? byLower : a.name.localeCompare(b.name);
    });

    return { cwd, entries };
  }

  /**
   * Stats of a listed entry. A symlink is followed only while its target
   * stays inside the session root; otherwise (or when dangling) null.
   */
  private async entryStats(root: string, cwd: string, full: string, name: string): Promise<Stats | null> {
    const own = await fs.lstat(full).catch(() => null);
    if (own === null || !own.isSymbolicLink()) {
      return own;
    }
    const target = await resolveContained(root, cwd, name);
    if (target === null) {
      return null;
    }
    return fs.stat(target).catch(() => null);
  }

  /**
   * Resolve the parent directory but not the final component, so that a
   * symlink names the link itself.
   */
  private async resolveEntry(ownerId: string, name: string): Promise<string> {
    const normalized = normalizeUserPath(name);
    const base = nodePath.posix.basename(normalized);
    if (base === '.' || base === '..') {
      return this.resolveUserPath(ownerId, name);
    }

    const parent = await this.sessions.resolve(ownerId, nodePath.posix.dirname(normalized));
    if (parent === null) {
      throw new PathEscapeError(name);
    }
    const target = nodePath.join(parent, base);
    if ((await relativeToRoot(this.sessions.rootOf(ownerId), target)) === META_FILE_NAME) {
      throw new PathEscapeError(name);
    }
    return target;
  }

  /**
   * Resolve a path for modification. The session root itself and the
   * metadata file are off limits.
   */
  private async resolveUserPath(ownerId: string, name: string): Promise<string> {
    const target = await this.sessions.resolve(ownerId, name);
    if (target === null) {
      throw new PathEscapeError(name);
    }

    const relative = await relativeToRoot(this.sessions.rootOf(ownerId), target);
    if (relative === '.' || relative === META_FILE_NAME) {
      throw new PathEscapeError(name);
    }
    return target;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await fs.stat(path)).isDirectory();
  } catch {
    return false;
  }
}
