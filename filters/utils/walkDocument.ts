/**
 * Document walker
 *
 * Applies an InlineAction to every inline of a pandoc document, children first,
 * the same order pandoc uses when it runs a filter function on an element type.
 * The input document is never mutated; a new tree is returned.
 */

import type {
  Block,
  Caption,
  Citation,
  Inline,
  InlineAction,
  MetaValue,
  PandocDocument,
  Row,
} from '../types/pandocAst';

export function walkDocument(doc: PandocDocument, action: InlineAction): PandocDocument {
  const meta: Record<string, MetaValue> = {};
  for (const [key, value] of Object.entries(doc.meta)) {
    meta[key] = walkMetaValue(value, action);
  }
  return {
    'pandoc-api-version': [...doc['pandoc-api-version']],
    meta,
    blocks: walkBlocks(doc.blocks, action),
  };
}

export function walkInlines(inlines: Inline[], action: InlineAction): Inline[] {
  return inlines.map(inline => {
    const walked = walkInlineChildren(inline, action);
    return action(walked) ?? walked;
  });
}

export function walkBlocks(blocks: Block[], action: InlineAction): Block[] {
  return blocks.map(block => walkBlock(block, action));
}

function walkInlineChildren(inline: Inline, action: InlineAction): Inline {
  switch (inline.t) {
    case 'Emph':
    case 'Underline':
    case 'Strong':
    case 'Strikeout':
    case 'Superscript':
    case 'Subscript':
    case 'SmallCaps':
      return { t: inline.t, c: walkInlines(inline.c, action) };
    case 'Quoted':
      return { t: 'Quoted', c: [inline.c[0], walkInlines(inline.c[1], action)] };
    case 'Cite':
      return {
        t: 'Cite',
        c: [inline.c[0].map(citation => walkCitation(citation, action)), walkInlines(inline.c[1], action)],
      };
    case 'Link':
    case 'Image':
      return { t: inline.t, c: [inline.c[0], walkInlines(inline.c[1], action), inline.c[2]] };
    case 'Note':
      return { t: 'Note', c: walkBlocks(inline.c, action) };
    case 'Span':
      return { t: 'Span', c: [inline.c[0], walkInlines(inline.c[1], action)] };
    case 'Str':
    case 'Code':
    case 'Space':
    case 'SoftBreak':
    case 'LineBreak':
    case 'Math':
    case 'RawInline':
      return inline;
  }
}

function walkCitation(citation: Citation, action: InlineAction): Citation {
  return {
    ...citation,
    citationPrefix: walkInlines(citation.citationPrefix, action),
    citationSuffix: walkInlines(citation.citationSuffix, action),
  };
}

function walkCaption(caption: Caption, action: InlineAction): Caption {
  const [short, body] = caption;
  return [short === null ? null : walkInlines(short, action), walkBlocks(body, action)];
}

function walkRows(rows: Row[], action: InlineAction): Row[] {
  return rows.map(([attr, cells]) => [
    attr,
    cells.map(([cellAttr, align, rowSpan, colSpan, body]) => [
      cellAttr,
      align,
      rowSpan,
      colSpan,
      walkBlocks(body, action),
    ]),
  ]);
}

function walkBlock(block: Block, action: InlineAction): Block {
  switch (block.t) {
    case 'Plain':
    case 'Para':
      return { t: block.t, c: walkInlines(block.c, action) };
    case 'LineBlock':
      return { t: 'LineBlock', c: block.c.map(line => walkInlines(line, action)) };
    case 'BlockQuote':
      return { t: 'BlockQuote', c: walkBlocks(block.c, action) };
    case 'OrderedList':
      return { t: 'OrderedList', c: [block.c[0], block.c[1].map(item => walkBlocks(item, action))] };
    case 'BulletList':
      return { t: 'BulletList', c: block.c.map(item => walkBlocks(item, action)) };
    case 'DefinitionList':
      return {
        t: 'DefinitionList',
        c: block.c.map(([term, definitions]) => [
          walkInlines(term, action),
          definitions.map(definition => walkBlocks(definition, action)),
        ]),
      };
    case 'Header':
      return { t: 'Header', c: [block.c[0], block.c[1], walkInlines(block.c[2], action)] };
    case 'Table': {
      const [attr, caption, colSpecs, head, bodies, foot] = block.c;
      return {
        t: 'Table',
        c: [
          attr,
          walkCaption(caption, action),
          colSpecs,
          [head[0], walkRows(head[1], action)],
          bodies.map(([bodyAttr, rowHeadColumns, headRows, bodyRows]) => [
            bodyAttr,
            rowHeadColumns,
            walkRows(headRows, action),
            walkRows(bodyRows, action),
          ]),
          [foot[0], walkRows(foot[1], action)],
        ],
      };
    }
    case 'Figure':
      return { t: 'Figure', c: [block.c[0], walkCaption(block.c[1], action), walkBlocks(block.c[2], action)] };
    case 'Div':
      return { t: 'Div', c: [block.c[0], walkBlocks(block.c[1], action)] };
    case 'CodeBlock':
    case 'RawBlock':
    case 'HorizontalRule':
      return block;
  }
}

function walkMetaValue(value: MetaValue, action: InlineAction): MetaValue {
  switch (value.t) {
    case 'MetaMap': {
      const entries: Record<string, MetaValue> = {};
      for (const [key, entry] of Object.entries(value.c)) {
        entries[key] = walkMetaValue(entry, action);
      }
      return { t: 'MetaMap', c: entries };
    }
    case 'MetaList':
      return { t: 'MetaList', c: value.c.map(entry => walkMetaValue(entry, action)) };
    case 'MetaInlines':
      return { t: 'MetaInlines', c: walkInlines(value.c, action) };
    case 'MetaBlocks':
      return { t: 'MetaBlocks', c: walkBlocks(value.c, action) };
    case 'MetaBool':
    case 'MetaString':
      return value;
  }
}
