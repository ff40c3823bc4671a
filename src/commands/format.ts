/**
 * Plain-text rendering of command replies.
 */

import type { ExecutionResult } from '../runtime/engine.js';
import type { DirectoryListing } from '../sandbox/types.js';

export const PAGE_SIZE = 20;

const FENCE = '```';

/**
 * Strip chat-style code markers: inline `x`, or a fenced block with an
 * optional python/py language tag.
 */
export function extractCodeBlock(raw: string): string {
  const content = raw.trim();

  if (content.length >= 6 && content.startsWith(FENCE) && content.endsWith(FENCE)) {
    let inner = content.slice(3, -3);
    if (inner.startsWith('python\n') || inner.startsWith('py\n')) {
      inner = inner.slice(inner.indexOf('\n') + 1);
    }
    return inner.trim();
  }

  if (content.length >= 2 && content.startsWith('`') && content.endsWith('`')) {
    return content.slice(1, -1).trim();
  }

  return content;
}

export function formatExecutionResult(result: Pick<ExecutionResult, 'stdout' | 'stderr' | 'exitCode' | 'truncated'>): string {
  const parts: string[] = [];

  if (result.stdout) {
    parts.push(result.stdout);
  }
  if (result.stderr) {
    parts.push(result.stdout ? `\n--- stderr ---\n${result.stderr}` : result.stderr);
  }
  if (!result.stdout && !result.stderr) {
    parts.push(`(no output, exit code ${result.exitCode})`);
  }
  if (result.truncated) {
    parts.push('\n[output truncated]');
  }

  return parts.join('');
}

/**
 * Listing lines: a `cwd:` header followed by one line per entry.
 */
export function listingLines(listing: DirectoryListing): string[] {
  const header = `cwd: /${listing.cwd === '.' ? '' : listing.cwd}`;
  const entries = listing.entries.map((entry) =>
    entry.isDirectory ? `${entry.name}/` : entry.size === undefined ? entry.name : `${entry.name} (${entry.size} B)`
  );
  return [header, ...entries];
}

export function pageCount(lines: readonly string[], pageSize = PAGE_SIZE): number {
  return Math.max(1, Math.ceil(lines.length / pageSize));
}

/**
 * Render one page (zero-based, clamped) with a `Page i/n` header.
 */
export function renderPage(lines: readonly string[], page = 0, pageSize = PAGE_SIZE): string {
  const total = pageCount(lines, pageSize);
  const current = Math.min(Math.max(page, 0), total - 1);
  const body = lines.slice(current * pageSize, (current + 1) * pageSize).join('\n') || '(empty)';
  return `Page ${current + 1}/${total}\n\n${body}`;
}
