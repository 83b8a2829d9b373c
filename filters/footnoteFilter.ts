/**
 * Footnote filter
 *
 * Runs styleFootnote over every Note of a pandoc document. This is what the
 * CLI entry point calls with the JSON pandoc writes to stdin.
 */

import { styleFootnote } from './handlers/styleFootnote';
import type { StyleFootnoteOptions } from './handlers/styleFootnote';
import { ReportingService } from './services/reportingService';
import type { Inline, PandocDocument } from './types/pandocAst';
import { blocksToInlines } from './utils/blocksToInlines';
import { inlinesToPlainText } from './utils/commonUtils';
import { decodePandocDocument } from './utils/pandocSchema';
import { walkDocument } from './utils/walkDocument';

export interface FootnoteFilterResult {
  document: PandocDocument;
  styled: number;
  passedThrough: number;
}

/**
 * @param input - Parsed JSON from pandoc (validated here)
 * @param format - Output format pandoc passed as the filter's first argument
 * @param reporting - Optional sink for per-footnote events
 */
export function runFootnoteFilter(
  input: unknown,
  format: string,
  options: StyleFootnoteOptions,
  reporting?: ReportingService
): FootnoteFilterResult {
  const doc = decodePandocDocument(input);
  let styled = 0;
  let passedThrough = 0;

  const document = walkDocument(doc, (inline: Inline) => {
    if (inline.t !== 'Note') {
      return null;
    }
    const span = styleFootnote(inline, format, options);
    if (span) {
      styled++;
      reporting?.logFootnote(format, 'styled', inlinesToPlainText(span.c[1]));
    } else {
      passedThrough++;
      reporting?.logFootnote(format, 'passedThrough', inlinesToPlainText(blocksToInlines(inline.c)));
    }
    return span;
  });

  return { document, styled, passedThrough };
}
