/**
 * Path containment for session workspaces.
 *
 * Every user-supplied path is resolved relative to the session root and its
 * current directory, with symlinks followed, and rejected unless the
 * canonical result stays under the canonical root.
 */

import type { Stats } from 'fs';
import * as fs from 'fs/promises';
import * as nodePath from 'path';
import { errnoCode } from './errors.js';

/**
 * Normalize a user-supplied relative path: trim, convert backslashes,
 * and drop leading slashes so "/etc" means "<root>/etc".
 */
export function normalizeUserPath(supplied: string): string {
  const cleaned = supplied.trim().replace(/\\/g, '/').replace(/^\/+/, '');
  return cleaned === '' ? '.' : cleaned;
}

/**
 * True if `candidate` is `root` or lies below it.
 */
export function isWithin(root: string, candidate: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(nodePath.sep) ? root : root + nodePath.sep);
}

/**
 * Canonicalize `segments` starting from an already-canonical directory.
 *
 * Existing symlinks are replaced by their real path as they are met, so a
 * later ".." climbs out of the link target the way the OS would. Components
 * that do not exist yet are appended literally.
 *
 * @returns Canonical absolute path, or null if a symlink is dangling or loops
 */
async function canonicalize(start: string, segments: string[]): Promise<string | null> {
  let current = start;

  for (const segment of segments) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      current = nodePath.dirname(current);
      continue;
    }

    const candidate = nodePath.join(current, segment);
    let stats: Stats;
    try {
      stats = await fs.lstat(candidate);
    } catch (error) {
      if (errnoCode(error) === 'ENOENT' || errnoCode(error) === 'ENOTDIR') {
        current = candidate;
        continue;
      }
      return null;
    }

    if (stats.isSymbolicLink()) {
      try {
        current = await fs.realpath(candidate);
      } catch {
        return null;
      }
    } else {
      current = candidate;
    }
  }

  return current;
}

/**
 * Resolve `supplied` against `root/cwd` and contain it within `root`.
 *
 * @param root - Session root directory (must exist)
 * @param cwd - Session working directory relative to root
 * @param supplied - Untrusted path from the user
 * @returns Canonical absolute path inside root, or null
 */
export async function resolveContained(root: string, cwd: string, supplied: string): Promise<string | null> {
  let canonicalRoot: string;
  try {
    canonicalRoot = await fs.realpath(root);
  } catch {
    return null;
  }

  const segments = [...normalizeUserPath(cwd).split('/'), ...normalizeUserPath(supplied).split('/')];
  const resolved = await canonicalize(canonicalRoot, segments);
  if (resolved === null || !isWithin(canonicalRoot, resolved)) {
    return null;
  }
  return resolved;
}

/**
 * Express a contained absolute path relative to the canonical root,
 * using "." for the root itself.
 */
export async function relativeToRoot(root: string, target: string): Promise<string> {
  const canonicalRoot = await fs.realpath(root);
  const relative = nodePath.relative(canonicalRoot, target);
  return relative === '' ? '.' : relative.split(nodePath.sep).join('/');
}
