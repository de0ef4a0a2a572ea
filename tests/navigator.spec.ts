/**
 * Tests for the navigation facade
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  InvalidOffsetError,
  InvalidRequestError,
  NavigationError,
  UnresolvableGridError,
} from '../src/base/index.js';
import { MarkdownNavigator, computeRevision, describeTarget } from '../src/navigation/index.js';
import type { DocumentSnapshot } from '../src/navigation/index.js';

const DOC: DocumentSnapshot = {
  text: '# A\n\n## B\n\n- one\n- two\n\n| x | y |\n|---|---|\n| 1 | 2 |\n',
  revision: 1,
};

describe('MarkdownNavigator', () => {
  let navigator: MarkdownNavigator;

  beforeEach(() => {
    navigator = new MarkdownNavigator();
  });

  describe('category jumps', () => {
    it('should jump to the next heading', () => {
      const result = navigator.navigate(DOC, 0, { kind: 'categoryJump', category: 'heading', direction: 'next' });

      expect(result).toMatchObject({ found: true, offset: 5 });
      expect(describeTarget(result)).toBe('B, heading level 2');
    });

    it('should jump by heading level', () => {
      const request = { kind: 'categoryJump', category: 'heading', direction: 'previous', level: 1 } as const;

      expect(navigator.navigate(DOC, 20, request)).toMatchObject({ found: true, offset: 0 });
    });

    it('should report no match past the last element', () => {
      expect(navigator.navigate(DOC, 5, { kind: 'categoryJump', category: 'heading', direction: 'next' }))
        .toEqual({ found: false });
    });

    it('should search several categories at once', () => {
      const result = navigator.navigate(DOC, 0, {
        kind: 'categoryJump',
        categories: ['table', 'listItem'],
        direction: 'next',
      });

      expect(result).toMatchObject({ found: true, offset: 11 });
    });

    it('should reject invalid heading levels', () => {
      expect(() => navigator.navigate(DOC, 0, {
        kind: 'categoryJump',
        category: 'heading',
        direction: 'next',
        level: 7,
      })).toThrow(InvalidRequestError);
    });

    it('should reject an empty category list', () => {
      expect(() => navigator.navigate(DOC, 0, { kind: 'categoryJump', categories: [], direction: 'next' }))
        .toThrow(InvalidRequestError);
    });
  });

  describe('block boundaries', () => {
    it('should move to the end and start of the enclosing block', () => {
      expect(navigator.navigate(DOC, 13, { kind: 'blockBoundary', edge: 'end' })).toMatchObject({ found: true, offset: 16 });
      expect(navigator.navigate(DOC, 13, { kind: 'blockBoundary', edge: 'start' })).toMatchObject({ found: true, offset: 11 });
    });

    it('should report no match outside blocks', () => {
      expect(navigator.navigate(DOC, 4, { kind: 'blockBoundary', edge: 'end' })).toEqual({ found: false });
    });
  });

  describe('table cells', () => {
    it('should move between cells', () => {
      const right = navigator.navigate(DOC, 46, { kind: 'cellMove', direction: 'right' });

      expect(right).toMatchObject({ found: true, offset: 50 });
      expect(describeTarget(right)).toBe('2');
      expect(navigator.navigate(DOC, 46, { kind: 'cellMove', direction: 'up' })).toMatchObject({ found: true, offset: 26 });
      expect(navigator.navigate(DOC, 46, { kind: 'cellMove', direction: 'down' })).toEqual({ found: false });
    });

    it('should move inside a quoted table', () => {
      const snapshot = { text: '> | A | B |\n> |---|---|\n> | 1 | 2 |', revision: 'quoted' };

      expect(navigator.navigate(snapshot, 28, { kind: 'cellMove', direction: 'right' }))
        .toMatchObject({ found: true, offset: 32 });
    });

    it('should throw when the cursor is not in a table', () => {
      expect(() => navigator.navigate(DOC, 0, { kind: 'cellMove', direction: 'right' })).toThrow(UnresolvableGridError);
    });
  });

  describe('offsets', () => {
    it('should reject offsets outside the document', () => {
      const request = { kind: 'blockBoundary', edge: 'end' } as const;

      expect(() => navigator.navigate(DOC, -1, request)).toThrow(InvalidOffsetError);
      expect(() => navigator.navigate(DOC, DOC.text.length + 1, request)).toThrow(InvalidOffsetError);
      expect(() => navigator.navigate(DOC, 1.5, request)).toThrow(InvalidOffsetError);
      expect(navigator.navigate(DOC, DOC.text.length, request)).toEqual({ found: false });
    });

    it('should expose an error code', () => {
      try {
        navigator.navigate(DOC, -1, { kind: 'blockBoundary', edge: 'end' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(NavigationError);
        if (error instanceof NavigationError) {
          expect(error.code).toBe('INVALID_OFFSET');
          expect(error.message).toBe(`Cursor offset -1 is outside the document (length ${DOC.text.length})`);
        }
      }
    });
  });

  describe('index cache', () => {
    it('should reuse the index for the same revision', () => {
      expect(navigator.getIndex(DOC)).toBe(navigator.getIndex({ ...DOC }));
    });

    it('should rebuild when the revision changes', () => {
      const first = navigator.getIndex(DOC);
      const second = navigator.getIndex({ text: '# Changed', revision: 2 });

      expect(second).not.toBe(first);
      expect(second.revision).toBe(2);
      expect(second.elements('heading')).toHaveLength(1);
    });

    it('should rebuild after invalidate', () => {
      const first = navigator.getIndex(DOC);
      navigator.invalidate();

      expect(navigator.getIndex(DOC)).not.toBe(first);
    });

    it('should rebuild a large document within input latency', () => {
      const chunk = (n: number) => [
        `## Section ${n}`,
        'Some *text* with a [link](u) and `code`.',
        '- [ ] item **one**',
        '- item two',
        '',
        '| a | b |',
        '|---|---|',
        '| 1 | 2 |',
        '> quoted line',
        '',
      ].join('\n');
      const text = Array.from({ length: 2000 }, (_, n) => chunk(n)).join('\n');
      const request = { kind: 'categoryJump', category: 'heading', direction: 'next' } as const;

      navigator.navigate({ text, revision: 'warm' }, 0, request);
      const started = performance.now();
      const result = navigator.navigate({ text, revision: 'edited' }, 0, request);
      const elapsed = performance.now() - started;

      expect(result).toMatchObject({ found: true, offset: 130 });
      expect(navigator.getIndex({ text, revision: 'edited' }).elements('heading')).toHaveLength(2000);
      expect(elapsed).toBeLessThan(150);
    });

    it('should cache grids with the index', () => {
      const index = navigator.getIndex(DOC);
      const table = index.elements('table')[0];

      expect(navigator.getGrid(DOC, table)).toBe(navigator.getGrid(DOC, table));
    });
  });

  describe('logging', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should stay silent by default', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      new MarkdownNavigator().getIndex(DOC);

      expect(log).not.toHaveBeenCalled();
    });

    it('should log creation and index builds when verbose', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const verbose = new MarkdownNavigator({ verbose: true });
      verbose.getIndex(DOC);

      expect(log).toHaveBeenCalledTimes(2);
      expect(log).toHaveBeenNthCalledWith(1, `✅ MarkdownNavigator created (session ${verbose.sessionId.slice(0, 8)})`);
      expect(log).toHaveBeenNthCalledWith(2, expect.stringContaining('📊'));
    });

    it('should give each navigator its own session id', () => {
      const other = new MarkdownNavigator();

      expect(navigator.sessionId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(other.sessionId).not.toBe(navigator.sessionId);
    });
  });
});

describe('computeRevision', () => {
  it('should hash text into a short hex token', () => {
    expect(computeRevision('abc')).toMatch(/^[0-9a-f]{16}$/);
    expect(computeRevision('abc')).toBe(computeRevision('abc'));
    expect(computeRevision('abc')).not.toBe(computeRevision('abd'));
  });
});
