/**
 * Recursive deletion that removes files and symlinks before directories,
 * deepest first, and never follows symlinks.
 */

import * as fs from 'fs/promises';
import * as nodePath from 'path';
import type { Logger } from '../logging/logger.js';

interface TreeEntries {
  leaves: string[];
  directories: string[];
}

async function collect(dir: string, into: TreeEntries): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = nodePath.join(dir, entry.name);
    if (entry.isDirectory()) {
      await collect(full, into);
      into.directories.push(full);
    } else {
      into.leaves.push(full);
    }
  }
}

/**
 * Remove `target` and everything under it.
 *
 * @returns true on success, false if anything could not be removed
 */
export async function removeTree(target: string, logger?: Logger): Promise<boolean> {
  try {
    const stats = await fs.lstat(target);
    if (!stats.isDirectory()) {
      await fs.unlink(target);
      return true;
    }

    const tree: TreeEntries = { leaves: [], directories: [] };
    await collect(target, tree);

    for (const leaf of tree.leaves) {
      await fs.rm(leaf, { force: true });
    }
    // collect() pushes children before their parent
    for (const dir of tree.directories) {
      await fs.rmdir(dir);
    }
    await fs.rmdir(target);
    return true;
  } catch (error) {
    logger?.warn('Recursive removal failed', { target, error: String(error) });
    return false;
  }
}
