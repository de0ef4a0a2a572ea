/**
 * Tests for the structural index
 */
import { describe, it, expect } from 'vitest';
import { ELEMENT_CATEGORIES } from '../src/base/index.js';
import { extractElements } from '../src/extraction/index.js';
import { StructuralIndex } from '../src/structural-index/index.js';

function indexOf(text: string): StructuralIndex {
  return StructuralIndex.build(extractElements(text), 1);
}

const HEADINGS = '# A\n\n## B\n\ntext\n\n# C\n';

describe('StructuralIndex', () => {
  describe('query', () => {
    it('should skip a heading the cursor sits on', () => {
      const index = indexOf(HEADINGS);

      expect(index.query('heading', 5, 'next')?.id).toBe('heading:17');
      expect(index.query('heading', 5, 'previous')?.id).toBe('heading:0');
    });

    it('should filter headings by level', () => {
      const index = indexOf(HEADINGS);

      expect(index.query('heading', 0, 'next', 1)?.id).toBe('heading:17');
      expect(index.query('heading', 17, 'previous', 2)?.id).toBe('heading:5');
      expect(index.query('heading', 0, 'next', 3)).toBeUndefined();
    });

    it('should not wrap around past the last element', () => {
      const index = indexOf(HEADINGS);

      expect(index.query('heading', 17, 'next')).toBeUndefined();
      expect(index.query('heading', 20, 'next')).toBeUndefined();
      expect(index.query('heading', 0, 'previous')).toBeUndefined();
    });

    it('should match a linear scan from every offset', () => {
      const index = indexOf(HEADINGS);
      const starts = index.elements('heading').map(heading => heading.span.start);

      for (let offset = 0; offset <= HEADINGS.length; offset++) {
        const next = starts.find(start => start > offset);
        const previous = [...starts].reverse().find(start => start < offset);

        expect(index.query('heading', offset, 'next')?.span.start).toBe(next);
        expect(index.query('heading', offset, 'previous')?.span.start).toBe(previous);
      }
    });

    it('should return to the same element after next then previous', () => {
      const index = indexOf(HEADINGS);

      for (const heading of index.elements('heading').slice(0, -1)) {
        const next = index.query('heading', heading.span.start, 'next');
        expect(next).toBeDefined();
        if (!next) continue;
        expect(index.query('heading', next.span.start, 'previous')).toBe(heading);
      }
    });

    it('should pick the nearest element across categories', () => {
      const index = indexOf('Use `x` here\n\n```\ncode\n```\n');
      const code = ['codeBlock', 'inlineCode'] as const;

      expect(index.queryAny(code, 0, 'next')?.id).toBe('inlineCode:4');
      expect(index.queryAny(code, 4, 'next')?.id).toBe('codeBlock:14');
      expect(index.queryAny(code, 26, 'previous')?.id).toBe('codeBlock:14');
    });
  });

  describe('blocks', () => {
    const LIST = '- a\n- b\n\npara';

    it('should find the innermost enclosing block', () => {
      const index = indexOf(LIST);

      expect(index.enclosingBlock(6)?.id).toBe('listItem:4');
      expect(index.enclosingBlock(3)?.id).toBe('listItem:0');
      expect(index.enclosingBlock(6, ['list'])?.id).toBe('list:0');
      expect(index.enclosingBlock(10)).toBeUndefined();
    });

    it('should report block boundaries', () => {
      const index = indexOf(LIST);

      expect(index.blockBoundary(6, 'end')?.offset).toBe(7);
      expect(index.blockBoundary(6, 'start')?.offset).toBe(4);
      expect(index.blockBoundary(10, 'end')).toBeUndefined();
    });

    it('should stay on a block when the cursor is already at its end', () => {
      const index = indexOf(LIST);

      expect(index.blockBoundary(7, 'end')).toMatchObject({ element: { id: 'listItem:4' }, offset: 7 });
    });

    it('should prefer the inner block of equal spans whatever the input order', () => {
      const elements = extractElements('- a');
      const forward = StructuralIndex.build(elements, 1);
      const reversed = StructuralIndex.build([...elements].reverse(), 1);

      expect(forward.enclosingBlock(1)?.id).toBe('listItem:0');
      expect(reversed.enclosingBlock(1)?.id).toBe('listItem:0');
      expect([...reversed].map(element => element.id)).toEqual(['list:0', 'listItem:0']);
    });

    it('should resolve parents through the index', () => {
      const index = indexOf(LIST);
      const item = index.get('listItem:4');

      expect(item).toBeDefined();
      if (!item) return;
      expect(index.parentOf(item)?.id).toBe('list:0');
      expect(index.size).toBe(3);
      expect(index.revision).toBe(1);
    });
  });

  it('should keep every category sorted and non-overlapping', () => {
    const text = [
      '# Doc',
      '',
      '> - [x] **done** and *it* `ok`',
      '> - [ ] [link](u) ~~x~~',
      '',
      '| a | b |',
      '|---|---|',
      '| *1* | $2$ |',
      '',
      '```',
      '# nope',
      '```',
      '***',
    ].join('\n');
    const index = indexOf(text);

    for (const category of ELEMENT_CATEGORIES) {
      const elements = index.elements(category);
      for (let i = 1; i < elements.length; i++) {
        expect(elements[i].span.start).toBeGreaterThanOrEqual(elements[i - 1].span.end);
      }
    }
    expect(index.elements('heading')).toHaveLength(1);
    expect(index.elements('checkbox')).toHaveLength(2);
    expect(index.elements('separator')).toHaveLength(1);
  });
});
