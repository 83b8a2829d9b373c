import { describe, it, expect } from 'vitest';
import { runFootnoteFilter } from './footnoteFilter';
import { ReportingService } from './services/reportingService';
import { USER_OPTIONS } from './userOptionsConfig';
import { PandocAstError } from './utils/pandocSchema';

const footnote = (text: string) => ({ t: 'Note', c: [{ t: 'Para', c: [{ t: 'Str', c: text }] }] });

const input = {
  'pandoc-api-version': [1, 23, 1],
  meta: {},
  blocks: [
    { t: 'Para', c: [{ t: 'Str', c: 'First.' }, footnote('One')] },
    { t: 'BlockQuote', c: [{ t: 'Para', c: [{ t: 'Str', c: 'Quoted.' }, footnote('Two')] }] },
  ],
};

const span = (text: string) => ({ t: 'Span', c: [['', ['footnote'], []], [{ t: 'Str', c: text }]] });

describe('runFootnoteFilter', () => {
  it('replaces every footnote with a span for pdf output', () => {
    const result = runFootnoteFilter(input, 'pdf', USER_OPTIONS);
    expect(result.styled).toBe(2);
    expect(result.passedThrough).toBe(0);
    expect(result.document.blocks).toEqual([
      { t: 'Para', c: [{ t: 'Str', c: 'First.' }, span('One')] },
      { t: 'BlockQuote', c: [{ t: 'Para', c: [{ t: 'Str', c: 'Quoted.' }, span('Two')] }] },
    ]);
  });

  it('leaves the document unchanged for docx output', () => {
    const result = runFootnoteFilter(input, 'docx', USER_OPTIONS);
    expect(result.styled).toBe(0);
    expect(result.passedThrough).toBe(2);
    expect(result.document).toEqual(input);
  });

  it('styles a footnote nested inside another footnote, inner one first', () => {
    const nested = {
      'pandoc-api-version': [1, 23, 1],
      meta: {},
      blocks: [
        {
          t: 'Para',
          c: [{ t: 'Note', c: [{ t: 'Para', c: [{ t: 'Str', c: 'Outer' }, footnote('Inner')] }] }],
        },
      ],
    };
    const result = runFootnoteFilter(nested, 'html5', USER_OPTIONS);
    expect(result.styled).toBe(2);
    expect(result.document.blocks).toEqual([
      {
        t: 'Para',
        c: [{ t: 'Span', c: [['', ['footnote'], []], [{ t: 'Str', c: 'Outer' }, span('Inner')]] }],
      },
    ]);
  });

  it('records each decision with the reporting service', () => {
    const reporting = new ReportingService('unused-reports');
    runFootnoteFilter(input, 'latex', USER_OPTIONS, reporting);
    expect(reporting.getEvents()).toEqual([
      { index: 1, format: 'latex', outcome: 'passedThrough', preview: 'One' },
      { index: 2, format: 'latex', outcome: 'passedThrough', preview: 'Two' },
    ]);
  });

  it('throws PandocAstError for malformed input', () => {
    expect(() => runFootnoteFilter({ blocks: 'nope' }, 'pdf', USER_OPTIONS)).toThrow(PandocAstError);
  });
});
