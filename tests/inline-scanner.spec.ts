/**
 * Tests for inline element scanning
 */
import { describe, it, expect } from 'vitest';
import { scanInline } from '../src/extraction/index.js';

function scan(text: string) {
  return scanInline(text, { start: 0, end: text.length, lineContentStart: 0 });
}

function spans(text: string): Array<[string, number, number]> {
  return scan(text).elements.map(element => [element.category, element.span.start, element.span.end]);
}

describe('InlineScanner', () => {
  describe('code spans and escapes', () => {
    it('should not read delimiters inside code spans', () => {
      expect(spans('`a*b*`')).toEqual([['inlineCode', 0, 6]]);
    });

    it('should pair backtick runs of the same length only', () => {
      expect(spans('``a`b``')).toEqual([['inlineCode', 0, 7]]);
    });

    it('should ignore escaped delimiters', () => {
      expect(spans('\\*not\\*')).toEqual([]);
    });
  });

  describe('emphasis', () => {
    it('should split a triple run into bold inside emphasis', () => {
      expect(spans('***both***')).toEqual([
        ['bold', 1, 9],
        ['emphasis', 0, 10],
      ]);
    });

    it('should find strikethrough only for double tildes', () => {
      expect(spans('~~gone~~ and ~single~')).toEqual([['strikethrough', 0, 8]]);
    });

    it('should not treat intraword underscores as emphasis', () => {
      expect(spans('snake_case_name')).toEqual([]);
    });

    it('should leave unmatched delimiters alone', () => {
      expect(spans('a * b and **open')).toEqual([]);
    });
  });

  describe('links and images', () => {
    it('should parse an inline link with a title', () => {
      const { elements } = scan('[docs](https://example.com "Title")');

      expect(elements).toEqual([
        {
          category: 'link',
          span: { start: 0, end: 35 },
          metadata: { kind: 'link', text: 'docs', url: 'https://example.com', title: 'Title' },
        },
      ]);
    });

    it('should find an image inside link text', () => {
      const { elements } = scan('[![badge](b.svg)](https://ci.test)');

      expect(elements.map(element => element.metadata)).toEqual([
        { kind: 'link', text: '![badge](b.svg)', url: 'https://ci.test', title: undefined },
        { kind: 'image', alt: 'badge', url: 'b.svg', title: undefined },
      ]);
      expect(elements[1].span).toEqual({ start: 1, end: 16 });
    });

    it('should find emphasis inside link text', () => {
      expect(spans('[*a*](u)')).toEqual([
        ['link', 0, 8],
        ['emphasis', 1, 4],
      ]);
    });

    it('should recognize autolinks', () => {
      const { elements } = scan('<https://a.io> and <me@b.io>');

      expect(elements.map(element => [element.span.start, element.span.end, element.metadata])).toEqual([
        [0, 14, { kind: 'link', text: 'https://a.io', url: 'https://a.io' }],
        [19, 28, { kind: 'link', text: 'me@b.io', url: 'mailto:me@b.io' }],
      ]);
    });

    it('should record reference-style candidates', () => {
      expect(scan('[guide][g] and [faq][]').references).toEqual([
        { span: { start: 0, end: 10 }, text: 'guide', label: 'g' },
        { span: { start: 15, end: 22 }, text: 'faq', label: 'faq' },
      ]);
    });
  });

  describe('footnotes and math', () => {
    it('should tell footnote references from definitions', () => {
      expect(scan('Note[^1] here').elements[0].metadata).toEqual({ kind: 'footnote', label: '1', definition: false });
      expect(scan('[^1]: text').elements[0].metadata).toEqual({ kind: 'footnote', label: '1', definition: true });
    });

    it('should find inline math but not currency', () => {
      const { elements } = scan('cost $x+1$ vs $5 and $6');

      expect(elements).toEqual([
        { category: 'math', span: { start: 5, end: 10 }, metadata: { kind: 'math', display: false } },
      ]);
    });

    it('should mark double-dollar math as display', () => {
      expect(scan('see $$a+b$$').elements[0].metadata).toEqual({ kind: 'math', display: true });
    });
  });
});
