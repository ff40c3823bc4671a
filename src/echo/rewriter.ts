/**
 * Echo Rewriter
 *
 * Makes a trailing bare expression visible, the way an interactive
 * interpreter would: `6*7` becomes `6*7\nprint(repr((6*7)))`. Anything the
 * rewriter is unsure about is returned unchanged.
 */

import type { SyntaxNode, Tree } from '@lezer/common';
import { parser } from '@lezer/python';
import { createLogger, type Logger } from '../logging/logger.js';
import { recoverExpressionText } from './span.js';

function hasSyntaxErrors(tree: Tree): boolean {
  const cursor = tree.cursor();
  do {
    if (cursor.type.isError) return true;
  } while (cursor.next());
  return false;
}

/** Grammar nodes, as opposed to punctuation and skipped tokens */
function isSyntaxNode(node: SyntaxNode): boolean {
  return /^[A-Z]/.test(node.name) && !node.type.isSkipped && node.name !== 'Comment';
}

function lastSyntaxChild(parent: SyntaxNode): SyntaxNode | null {
  let node = parent.lastChild;
  while (node && !isSyntaxNode(node)) {
    node = node.prevSibling;
  }
  return node;
}

/** Last statement of the script; `;`-joined statements share a StatementGroup */
function lastStatement(tree: Tree): SyntaxNode | null {
  let node = lastSyntaxChild(tree.topNode);
  while (node && node.name === 'StatementGroup') {
    node = lastSyntaxChild(node);
  }
  return node;
}

function syntaxChildren(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (isSyntaxNode(child)) children.push(child);
  }
  return children;
}

function isPrintCall(node: SyntaxNode, source: string): boolean {
  if (node.name !== 'CallExpression') return false;
  const callee = node.firstChild;
  return callee?.name === 'VariableName' && source.slice(callee.from, callee.to) === 'print';
}

/**
 * Text of the trailing expression statement, or null if the source should
 * run as written.
 */
function trailingExpression(source: string): string | null {
  const tree = parser.parse(source);
  if (hasSyntaxErrors(tree)) return null;

  const statement = lastStatement(tree);
  if (!statement || statement.name !== 'ExpressionStatement') return null;

  const parts = syntaxChildren(statement);
  const only = parts.length === 1 ? parts[0] : undefined;
  if (only && isPrintCall(only, source)) return null;

  return recoverExpressionText(source, { from: statement.from, to: statement.to });
}

export interface EchoRewriterOptions {
  enabled?: boolean;
  logger?: Logger;
}

export class EchoRewriter {
  readonly enabled: boolean;
  private readonly logger: Logger;

  constructor(options: EchoRewriterOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.logger = options.logger ?? createLogger('echo');
  }

  /**
   * Append `print(repr((<expr>)))` when the last statement is a bare
   * expression other than a print call. Never throws.
   */
  rewrite(source: string): string {
    if (!this.enabled) return source;

    let expression: string | null;
    try {
      expression = trailingExpression(source);
    } catch (error) {
      this.logger.debug('Echo rewrite skipped', { error: String(error) });
      return source;
    }
    return expression === null ? source : `${source}\nprint(repr((${expression})))`;
  }
}

let defaultRewriter: EchoRewriter | null = null;

/**
 * Rewrite with echo enabled.
 */
export function rewrite(source: string): string {
  if (!defaultRewriter) {
    defaultRewriter = new EchoRewriter();
  }
  return defaultRewriter.rewrite(source);
}
