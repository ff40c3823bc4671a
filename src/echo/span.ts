/**
 * Recovering the source text of a syntax node.
 */

export interface SourceSpan {
  from: number;
  to: number;
}

/**
 * Text between two offsets, trimmed. Null when the offsets do not describe
 * a non-empty range of `source`.
 */
export function sliceSpan(source: string, span: SourceSpan): string | null {
  if (span.from < 0 || span.to > source.length || span.from >= span.to) {
    return null;
  }
  const text = source.slice(span.from, span.to).trim();
  return text === '' ? null : text;
}

interface LineColumn {
  line: number;
  column: number;
}

function toLineColumn(lines: string[], offset: number): LineColumn {
  let remaining = Math.max(0, offset);
  for (let line = 0; line < lines.length; line++) {
    const length = lines[line]?.length ?? 0;
    if (remaining <= length) {
      return { line, column: remaining };
    }
    remaining -= length + 1;
  }
  const last = Math.max(0, lines.length - 1);
  return { line: last, column: lines[last]?.length ?? 0 };
}

/**
 * Rebuild the text of a span from its start and end line/column, clamping
 * positions that run past the source.
 */
export function spanFromLines(source: string, span: SourceSpan): string | null {
  const lines = source.split(/\r?\n/);
  const start = toLineColumn(lines, span.from);
  const end = toLineColumn(lines, span.to);
  if (end.line < start.line || (end.line === start.line && end.column <= start.column)) {
    return null;
  }

  let text: string;
  if (start.line === end.line) {
    text = (lines[start.line] ?? '').slice(start.column, end.column);
  } else {
    const parts = [(lines[start.line] ?? '').slice(start.column)];
    for (let line = start.line + 1; line < end.line; line++) {
      parts.push(lines[line] ?? '');
    }
    parts.push((lines[end.line] ?? '').slice(0, end.column));
    text = parts.join('\n');
  }

  text = text.trim();
  return text === '' ? null : text;
}

export function lastNonBlankLine(source: string): string | null {
  const lines = source.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = (lines[i] ?? '').trim();
    if (line !== '') return line;
  }
  return null;
}

/**
 * Source text of an expression: offset slice, then line/column
 * reconstruction, then the last non-blank line.
 */
export function recoverExpressionText(source: string, span: SourceSpan): string | null {
  return sliceSpan(source, span) ?? spanFromLines(source, span) ?? lastNonBlankLine(source);
}
