/**
 * styleFootnote - Rewrites a footnote as a classed inline span.
 *
 * CSS-driven renderers (WeasyPrint, Prince, browsers) lay out footnotes from
 * styled inline content, so for PDF and HTML targets the pandoc Note becomes
 * `<span class="footnote">…</span>` carrying the flattened footnote body.
 */

import type { NoteInline, SpanInline } from '../types/pandocAst';
import { blocksToInlines } from '../utils/blocksToInlines';
import { USER_OPTIONS } from '../userOptionsConfig';
import type { FootnoteStylerOptions } from '../userOptionsConfig';

export type StyleFootnoteOptions = Pick<FootnoteStylerOptions, 'formatPatterns' | 'spanClass'>;

/**
 * evaluateFormat - Decides whether footnotes are rewritten for an output format.
 *
 * Plain case-sensitive substring containment: 'html5' and 'pdf-6x9' match,
 * 'HTML' does not.
 */
export function evaluateFormat(format: string, formatPatterns: string[] = USER_OPTIONS.formatPatterns): boolean {
  return formatPatterns.some(pattern => format.includes(pattern));
}

/**
 * @param note - The footnote as pandoc parsed it
 * @param format - The output format pandoc passed to the filter
 * @returns The replacement span, or null to leave the note unchanged
 */
export function styleFootnote(
  note: NoteInline,
  format: string,
  options: StyleFootnoteOptions = USER_OPTIONS
): SpanInline | null {
  if (!evaluateFormat(format, options.formatPatterns)) {
    return null;
  }
  const content = blocksToInlines(note.c);
  return { t: 'Span', c: [['', [options.spanClass], []], content] };
}
