/**
 * Zod schemas for the pandoc JSON AST
 *
 * Pandoc hands the filter raw JSON on stdin. Everything downstream works on the
 * typed AST from ../types/pandocAst, so the document is decoded here once.
 */

import { z } from 'zod';
import type {
  Alignment,
  Attr,
  Block,
  Caption,
  Cell,
  Citation,
  Inline,
  MetaValue,
  PandocDocument,
  Row,
} from '../types/pandocAst';

export class PandocAstError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Input is not a pandoc JSON document:\n  ${issues.join('\n  ')}`);
    this.name = 'PandocAstError';
    this.issues = issues;
  }
}

const tag = <T extends string>(t: T) => z.object({ t: z.literal(t) });

const AttrSchema: z.ZodType<Attr> = z.tuple([
  z.string(),
  z.array(z.string()),
  z.array(z.tuple([z.string(), z.string()])),
]);

const TargetSchema = z.tuple([z.string(), z.string()]);

const QuoteTypeSchema = z.union([tag('SingleQuote'), tag('DoubleQuote')]);
const MathTypeSchema = z.union([tag('DisplayMath'), tag('InlineMath')]);

const AlignmentSchema: z.ZodType<Alignment> = z.union([
  tag('AlignLeft'),
  tag('AlignRight'),
  tag('AlignCenter'),
  tag('AlignDefault'),
]);

const ColWidthSchema = z.union([
  z.object({ t: z.literal('ColWidth'), c: z.number() }),
  tag('ColWidthDefault'),
]);

const ListAttributesSchema = z.tuple([
  z.number(),
  z.union([
    tag('DefaultStyle'),
    tag('Example'),
    tag('Decimal'),
    tag('LowerRoman'),
    tag('UpperRoman'),
    tag('LowerAlpha'),
    tag('UpperAlpha'),
  ]),
  z.union([tag('DefaultDelim'), tag('Period'), tag('OneParen'), tag('TwoParens')]),
]);

export const InlineSchema: z.ZodType<Inline> = z.lazy(() =>
  z.discriminatedUnion('t', [
    z.object({ t: z.literal('Str'), c: z.string() }),
    z.object({ t: z.literal('Emph'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Underline'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Strong'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Strikeout'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Superscript'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Subscript'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('SmallCaps'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Quoted'), c: z.tuple([QuoteTypeSchema, z.array(InlineSchema)]) }),
    z.object({ t: z.literal('Cite'), c: z.tuple([z.array(CitationSchema), z.array(InlineSchema)]) }),
    z.object({ t: z.literal('Code'), c: z.tuple([AttrSchema, z.string()]) }),
    tag('Space'),
    tag('SoftBreak'),
    tag('LineBreak'),
    z.object({ t: z.literal('Math'), c: z.tuple([MathTypeSchema, z.string()]) }),
    z.object({ t: z.literal('RawInline'), c: z.tuple([z.string(), z.string()]) }),
    z.object({ t: z.literal('Link'), c: z.tuple([AttrSchema, z.array(InlineSchema), TargetSchema]) }),
    z.object({ t: z.literal('Image'), c: z.tuple([AttrSchema, z.array(InlineSchema), TargetSchema]) }),
    z.object({ t: z.literal('Note'), c: z.array(BlockSchema) }),
    z.object({ t: z.literal('Span'), c: z.tuple([AttrSchema, z.array(InlineSchema)]) }),
  ])
);

const CitationSchema: z.ZodType<Citation> = z.lazy(() =>
  z.object({
    citationId: z.string(),
    citationPrefix: z.array(InlineSchema),
    citationSuffix: z.array(InlineSchema),
    citationMode: z.union([tag('AuthorInText'), tag('SuppressAuthor'), tag('NormalCitation')]),
    citationNoteNum: z.number(),
    citationHash: z.number(),
  })
);

const CaptionSchema: z.ZodType<Caption> = z.lazy(() =>
  z.tuple([z.array(InlineSchema).nullable(), z.array(BlockSchema)])
);

const CellSchema: z.ZodType<Cell> = z.lazy(() =>
  z.tuple([AttrSchema, AlignmentSchema, z.number(), z.number(), z.array(BlockSchema)])
);

const RowSchema: z.ZodType<Row> = z.tuple([AttrSchema, z.array(CellSchema)]);

export const BlockSchema: z.ZodType<Block> = z.lazy(() =>
  z.discriminatedUnion('t', [
    z.object({ t: z.literal('Plain'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('Para'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('LineBlock'), c: z.array(z.array(InlineSchema)) }),
    z.object({ t: z.literal('CodeBlock'), c: z.tuple([AttrSchema, z.string()]) }),
    z.object({ t: z.literal('RawBlock'), c: z.tuple([z.string(), z.string()]) }),
    z.object({ t: z.literal('BlockQuote'), c: z.array(BlockSchema) }),
    z.object({
      t: z.literal('OrderedList'),
      c: z.tuple([ListAttributesSchema, z.array(z.array(BlockSchema))]),
    }),
    z.object({ t: z.literal('BulletList'), c: z.array(z.array(BlockSchema)) }),
    z.object({
      t: z.literal('DefinitionList'),
      c: z.array(z.tuple([z.array(InlineSchema), z.array(z.array(BlockSchema))])),
    }),
    z.object({ t: z.literal('Header'), c: z.tuple([z.number(), AttrSchema, z.array(InlineSchema)]) }),
    tag('HorizontalRule'),
    z.object({
      t: z.literal('Table'),
      c: z.tuple([
        AttrSchema,
        CaptionSchema,
        z.array(z.tuple([AlignmentSchema, ColWidthSchema])),
        z.tuple([AttrSchema, z.array(RowSchema)]),
        z.array(z.tuple([AttrSchema, z.number(), z.array(RowSchema), z.array(RowSchema)])),
        z.tuple([AttrSchema, z.array(RowSchema)]),
      ]),
    }),
    z.object({ t: z.literal('Figure'), c: z.tuple([AttrSchema, CaptionSchema, z.array(BlockSchema)]) }),
    z.object({ t: z.literal('Div'), c: z.tuple([AttrSchema, z.array(BlockSchema)]) }),
  ])
);

export const MetaValueSchema: z.ZodType<MetaValue> = z.lazy(() =>
  z.discriminatedUnion('t', [
    z.object({ t: z.literal('MetaMap'), c: z.record(z.string(), MetaValueSchema) }),
    z.object({ t: z.literal('MetaList'), c: z.array(MetaValueSchema) }),
    z.object({ t: z.literal('MetaBool'), c: z.boolean() }),
    z.object({ t: z.literal('MetaString'), c: z.string() }),
    z.object({ t: z.literal('MetaInlines'), c: z.array(InlineSchema) }),
    z.object({ t: z.literal('MetaBlocks'), c: z.array(BlockSchema) }),
  ])
);

export const PandocDocumentSchema: z.ZodType<PandocDocument> = z.object({
  'pandoc-api-version': z.array(z.number()),
  meta: z.record(z.string(), MetaValueSchema),
  blocks: z.array(BlockSchema),
});

/**
 * Decode a parsed JSON value into a pandoc document.
 * Throws PandocAstError listing every offending path.
 */
export function decodePandocDocument(value: unknown): PandocDocument {
  const result = PandocDocumentSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    });
    throw new PandocAstError(issues);
  }
  return result.data;
}
