/**
 * Type definitions for the pandoc JSON AST
 *
 * Mirrors pandoc-types 1.23 as serialised by `pandoc -t json`: every element is
 * an object with a `t` tag and, unless it carries no data, a `c` payload.
 */

/** [identifier, classes, key/value pairs] */
export type Attr = [string, string[], [string, string][]];

/** [url, title] */
export type Target = [string, string];

export type QuoteType = { t: 'SingleQuote' } | { t: 'DoubleQuote' };
export type MathType = { t: 'DisplayMath' } | { t: 'InlineMath' };
export type CitationMode = { t: 'AuthorInText' } | { t: 'SuppressAuthor' } | { t: 'NormalCitation' };

export interface Citation {
  citationId: string;
  citationPrefix: Inline[];
  citationSuffix: Inline[];
  citationMode: CitationMode;
  citationNoteNum: number;
  citationHash: number;
}

export type Inline =
  | { t: 'Str'; c: string }
  | { t: 'Emph'; c: Inline[] }
  | { t: 'Underline'; c: Inline[] }
  | { t: 'Strong'; c: Inline[] }
  | { t: 'Strikeout'; c: Inline[] }
  | { t: 'Superscript'; c: Inline[] }
  | { t: 'Subscript'; c: Inline[] }
  | { t: 'SmallCaps'; c: Inline[] }
  | { t: 'Quoted'; c: [QuoteType, Inline[]] }
  | { t: 'Cite'; c: [Citation[], Inline[]] }
  | { t: 'Code'; c: [Attr, string] }
  | { t: 'Space' }
  | { t: 'SoftBreak' }
  | { t: 'LineBreak' }
  | { t: 'Math'; c: [MathType, string] }
  | { t: 'RawInline'; c: [string, string] }
  | { t: 'Link'; c: [Attr, Inline[], Target] }
  | { t: 'Image'; c: [Attr, Inline[], Target] }
  | NoteInline
  | SpanInline;

// The two inlines the footnote styler converts between
export type NoteInline = { t: 'Note'; c: Block[] };
export type SpanInline = { t: 'Span'; c: [Attr, Inline[]] };

export type ListNumberStyle =
  | { t: 'DefaultStyle' }
  | { t: 'Example' }
  | { t: 'Decimal' }
  | { t: 'LowerRoman' }
  | { t: 'UpperRoman' }
  | { t: 'LowerAlpha' }
  | { t: 'UpperAlpha' };

export type ListNumberDelim =
  | { t: 'DefaultDelim' }
  | { t: 'Period' }
  | { t: 'OneParen' }
  | { t: 'TwoParens' };

export type ListAttributes = [number, ListNumberStyle, ListNumberDelim];

export type Alignment =
  | { t: 'AlignLeft' }
  | { t: 'AlignRight' }
  | { t: 'AlignCenter' }
  | { t: 'AlignDefault' };

export type ColWidth = { t: 'ColWidth'; c: number } | { t: 'ColWidthDefault' };
export type ColSpec = [Alignment, ColWidth];

/** [short caption, body] */
export type Caption = [Inline[] | null, Block[]];

/** [attr, alignment, row span, column span, body] */
export type Cell = [Attr, Alignment, number, number, Block[]];
export type Row = [Attr, Cell[]];
export type TableHead = [Attr, Row[]];
/** [attr, row head columns, head rows, body rows] */
export type TableBody = [Attr, number, Row[], Row[]];
export type TableFoot = [Attr, Row[]];

export type Block =
  | { t: 'Plain'; c: Inline[] }
  | { t: 'Para'; c: Inline[] }
  | { t: 'LineBlock'; c: Inline[][] }
  | { t: 'CodeBlock'; c: [Attr, string] }
  | { t: 'RawBlock'; c: [string, string] }
  | { t: 'BlockQuote'; c: Block[] }
  | { t: 'OrderedList'; c: [ListAttributes, Block[][]] }
  | { t: 'BulletList'; c: Block[][] }
  | { t: 'DefinitionList'; c: [Inline[], Block[][]][] }
  | { t: 'Header'; c: [number, Attr, Inline[]] }
  | { t: 'HorizontalRule' }
  | { t: 'Table'; c: [Attr, Caption, ColSpec[], TableHead, TableBody[], TableFoot] }
  | { t: 'Figure'; c: [Attr, Caption, Block[]] }
  | { t: 'Div'; c: [Attr, Block[]] };

export type MetaValue =
  | { t: 'MetaMap'; c: Record<string, MetaValue> }
  | { t: 'MetaList'; c: MetaValue[] }
  | { t: 'MetaBool'; c: boolean }
  | { t: 'MetaString'; c: string }
  | { t: 'MetaInlines'; c: Inline[] }
  | { t: 'MetaBlocks'; c: Block[] };

export interface PandocDocument {
  'pandoc-api-version': number[];
  meta: Record<string, MetaValue>;
  blocks: Block[];
}

/**
 * Callback applied to every inline of a document.
 * Returning null keeps the inline as it is.
 */
export type InlineAction = (inline: Inline) => Inline | null;
