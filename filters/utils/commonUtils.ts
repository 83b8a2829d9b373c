/**
 * Common utility functions for the filter
 *
 * Logging helpers and small text helpers shared by the handler, the reporting
 * service and the CLI entry point.
 *
 * stdout belongs to pandoc: it reads the filtered AST from it. Every log line
 * therefore goes to stderr.
 */

import type { Inline } from '../types/pandocAst';

/**
 * Log an informational line, only when verbose logging is on.
 */
export function logInfo(verbose: boolean, tag: string, message: string): void {
  if (verbose) {
    console.error(`[${tag}] ${message}`);
  }
}

export function logWarning(tag: string, message: string): void {
  console.warn(`[${tag}] ⚠️ ${message}`);
}

export function logError(tag: string, message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`[${tag}] ❌ ${message}`);
  } else {
    console.error(`[${tag}] ❌ ${message}`, error);
  }
}

/**
 * Format a date as YYYY-MM-DD in local time
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Render inlines as plain text, for log lines and reports.
 * Raw content and nested footnotes are left out.
 */
export function inlinesToPlainText(inlines: Inline[]): string {
  return inlines.map(inlineToPlainText).join('');
}

function inlineToPlainText(inline: Inline): string {
  switch (inline.t) {
    case 'Str':
      return inline.c;
    case 'Space':
    case 'SoftBreak':
    case 'LineBreak':
      return ' ';
    case 'Code':
    case 'Math':
      return inline.c[1];
    case 'Emph':
    case 'Underline':
    case 'Strong':
    case 'Strikeout':
    case 'Superscript':
    case 'Subscript':
    case 'SmallCaps':
      return inlinesToPlainText(inline.c);
    case 'Quoted': {
      const [quoteType, content] = inline.c;
      const text = inlinesToPlainText(content);
      return quoteType.t === 'DoubleQuote' ? `“${text}”` : `‘${text}’`;
    }
    case 'Cite':
    case 'Span':
      return inlinesToPlainText(inline.c[1]);
    case 'Link':
    case 'Image':
      return inlinesToPlainText(inline.c[1]);
    case 'RawInline':
    case 'Note':
      return '';
  }
}

/**
 * Shorten text to at most `maxLength` code points, ending in an ellipsis when cut.
 * Never splits a surrogate pair.
 */
export function truncate(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  return `${chars.slice(0, Math.max(0, maxLength - 1)).join('').trimEnd()}…`;
}
