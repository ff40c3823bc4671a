export { EchoRewriter, rewrite, type EchoRewriterOptions } from './rewriter.js';
export { lastNonBlankLine, recoverExpressionText, sliceSpan, spanFromLines, type SourceSpan } from './span.js';
