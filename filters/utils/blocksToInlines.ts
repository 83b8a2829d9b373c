/**
 * Block-to-inline flattening
 *
 * Squashes a list of blocks into a list of inlines, following the rules of
 * pandoc's `blocks_to_inlines` utility. Pieces are joined the way pandoc's
 * inline builder joins them, so neighbouring words and spaces merge at the seams.
 */

import type { Block, Inline, Row } from '../types/pandocAst';

type BreakInline = Extract<Inline, { t: 'Space' | 'SoftBreak' | 'LineBreak' }>;
type StyledInline = Extract<
  Inline,
  { t: 'Emph' | 'Underline' | 'Strong' | 'Strikeout' | 'Superscript' | 'Subscript' | 'SmallCaps' }
>;

const BREAK_RANK: Record<BreakInline['t'], number> = { Space: 0, SoftBreak: 1, LineBreak: 2 };
const STYLED_TAGS = new Set<Inline['t']>([
  'Emph',
  'Underline',
  'Strong',
  'Strikeout',
  'Superscript',
  'Subscript',
  'SmallCaps',
]);

function isBreak(inline: Inline): inline is BreakInline {
  return inline.t === 'Space' || inline.t === 'SoftBreak' || inline.t === 'LineBreak';
}

function isStyled(inline: Inline): inline is StyledInline {
  return STYLED_TAGS.has(inline.t);
}

/**
 * Merge two neighbouring inlines, or return null when they stay apart.
 * Str+Str concatenates; whitespace collapses to the stronger break (two line
 * breaks stay two); like-styled runs merge their contents.
 */
function mergeAdjacent(left: Inline, right: Inline): Inline | null {
  if (left.t === 'Str' && right.t === 'Str') {
    return { t: 'Str', c: left.c + right.c };
  }
  if (isBreak(left) && isBreak(right)) {
    if (left.t === 'LineBreak' && right.t === 'LineBreak') return null;
    return BREAK_RANK[left.t] >= BREAK_RANK[right.t] ? left : right;
  }
  if (isStyled(left) && isStyled(right) && left.t === right.t) {
    return { t: left.t, c: concatInlines(left.c, right.c) };
  }
  return null;
}

/**
 * Concatenate inline lists, merging only where one list meets the next.
 */
export function concatInlines(...parts: Inline[][]): Inline[] {
  const result: Inline[] = [];
  for (const part of parts) {
    part.forEach((inline, index) => {
      const last = result[result.length - 1];
      const merged = index === 0 && last !== undefined ? mergeAdjacent(last, inline) : null;
      if (merged) {
        result[result.length - 1] = merged;
      } else {
        result.push(inline);
      }
    });
  }
  return result;
}

/** Separator placed between two consecutive blocks: ` ¶ ` */
export function defaultBlocksSeparator(): Inline[] {
  return [{ t: 'Space' }, { t: 'Str', c: '¶' }, { t: 'Space' }];
}

/**
 * Flatten blocks into inlines, inserting `separator` between consecutive blocks.
 * Nested block containers (quotes, lists, divs) always use the default separator.
 */
export function blocksToInlines(blocks: Block[], separator: Inline[] = defaultBlocksSeparator()): Inline[] {
  const parts: Inline[][] = [];
  blocks.forEach((block, index) => {
    if (index > 0) {
      parts.push(separator);
    }
    parts.push(blockToInlines(block));
  });
  return concatInlines(...parts);
}

function nested(blocks: Block[]): Inline[] {
  return blocksToInlines(blocks, defaultBlocksSeparator());
}

function joinWithLineBreaks(lines: Inline[][]): Inline[] {
  const parts: Inline[][] = [];
  lines.forEach((line, index) => {
    if (index > 0) parts.push([{ t: 'LineBreak' }]);
    parts.push(line);
  });
  return concatInlines(...parts);
}

function rowToInlines(row: Row): Inline[] {
  const [, cells] = row;
  return concatInlines(...cells.map(([, , , , body]) => nested(body)));
}

/**
 * Flatten a single block
 */
export function blockToInlines(block: Block): Inline[] {
  switch (block.t) {
    case 'Plain':
    case 'Para':
      return [...block.c];
    case 'Header':
      return [...block.c[2]];
    case 'LineBlock':
      return joinWithLineBreaks(block.c);
    case 'CodeBlock':
      return [{ t: 'Code', c: [block.c[0], block.c[1]] }];
    case 'RawBlock':
      return [{ t: 'RawInline', c: [block.c[0], block.c[1]] }];
    case 'BlockQuote':
      return nested(block.c);
    case 'BulletList':
      return concatInlines(...block.c.map(item => nested(item)));
    case 'OrderedList':
      return concatInlines(...block.c[1].map(item => nested(item)));
    case 'DefinitionList':
      return concatInlines(
        ...block.c.map(([term, definitions]) =>
          concatInlines(
            term,
            [{ t: 'Str', c: ':' }, { t: 'Space' }],
            ...definitions.map(definition => nested(definition))
          )
        )
      );
    case 'HorizontalRule':
      return [];
    case 'Table': {
      const [, , , head, bodies, foot] = block.c;
      const rows: Row[] = [
        ...head[1],
        ...bodies.flatMap(([, , headRows, bodyRows]) => [...headRows, ...bodyRows]),
        ...foot[1],
      ];
      return joinWithLineBreaks(rows.map(rowToInlines));
    }
    case 'Figure':
      return nested(block.c[2]);
    case 'Div':
      return nested(block.c[1]);
  }
}
