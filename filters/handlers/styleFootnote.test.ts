import { describe, it, expect } from 'vitest';
import { evaluateFormat, styleFootnote } from './styleFootnote';
import type { NoteInline } from '../types/pandocAst';

const helloNote: NoteInline = {
  t: 'Note',
  c: [{ t: 'Para', c: [{ t: 'Str', c: 'Hello' }, { t: 'Space' }, { t: 'Str', c: 'world.' }] }],
};

describe('evaluateFormat', () => {
  it.each(['pdf', 'html', 'html5', 'html4', 'xhtml-strict', 'pdf-6x9', 'weasyprint-pdf'])(
    'matches %s',
    format => {
      expect(evaluateFormat(format)).toBe(true);
    }
  );

  it.each(['docx', 'latex', 'epub', '', 'HTML', 'PDF'])('does not match %j', format => {
    expect(evaluateFormat(format)).toBe(false);
  });

  it('uses the patterns it is given', () => {
    expect(evaluateFormat('epub3', ['epub'])).toBe(true);
    expect(evaluateFormat('html', ['epub'])).toBe(false);
  });
});

describe('styleFootnote', () => {
  it('turns a one-paragraph footnote into a footnote span for pdf', () => {
    expect(styleFootnote(helloNote, 'pdf')).toEqual({
      t: 'Span',
      c: [
        ['', ['footnote'], []],
        [{ t: 'Str', c: 'Hello' }, { t: 'Space' }, { t: 'Str', c: 'world.' }],
      ],
    });
  });

  it('styles for html and html5', () => {
    const expected = styleFootnote(helloNote, 'pdf');
    expect(styleFootnote(helloNote, 'html')).toEqual(expected);
    expect(styleFootnote(helloNote, 'html5')).toEqual(expected);
  });

  it('returns null for formats without pdf or html', () => {
    expect(styleFootnote(helloNote, 'docx')).toBeNull();
    expect(styleFootnote(helloNote, 'latex')).toBeNull();
    expect(styleFootnote(helloNote, '')).toBeNull();
  });

  it('flattens several paragraphs with the pilcrow separator', () => {
    const note: NoteInline = {
      t: 'Note',
      c: [
        { t: 'Para', c: [{ t: 'Str', c: 'One.' }] },
        { t: 'Para', c: [{ t: 'Emph', c: [{ t: 'Str', c: 'Two.' }] }] },
      ],
    };
    const span = styleFootnote(note, 'html');
    expect(span?.c[1]).toEqual([
      { t: 'Str', c: 'One.' },
      { t: 'Space' },
      { t: 'Str', c: '¶' },
      { t: 'Space' },
      { t: 'Emph', c: [{ t: 'Str', c: 'Two.' }] },
    ]);
  });

  it('applies a custom class and format list', () => {
    const span = styleFootnote(helloNote, 'epub3', { formatPatterns: ['epub'], spanClass: 'fn' });
    expect(span?.c[0]).toEqual(['', ['fn'], []]);
    expect(styleFootnote(helloNote, 'pdf', { formatPatterns: ['epub'], spanClass: 'fn' })).toBeNull();
  });

  it('does not modify the note it was given', () => {
    const before = JSON.stringify(helloNote);
    styleFootnote(helloNote, 'pdf');
    expect(JSON.stringify(helloNote)).toBe(before);
  });
});
