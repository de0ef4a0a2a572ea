/**
 * Tests for the single-key navigation table
 */
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { KeyBindingsError } from '../src/base/index.js';
import {
  describeNoMatch,
  describeTarget,
  findBinding,
  loadKeyBindings,
  normalizeGesture,
} from '../src/navigation/index.js';
import type { KeyBinding } from '../src/navigation/index.js';

describe('loadKeyBindings', () => {
  let bindings: KeyBinding[];

  beforeAll(() => {
    bindings = loadKeyBindings();
  });

  it('should load the bundled table', () => {
    expect(bindings).toHaveLength(48);
  });

  it('should find gestures regardless of case and modifier order', () => {
    expect(findBinding(bindings, 'Shift+H')).toMatchObject({
      gesture: 'shift+h',
      name: 'heading',
      request: { kind: 'categoryJump', category: 'heading', direction: 'previous' },
    });
    expect(findBinding(bindings, 'alt+control+rightArrow')?.request).toEqual({ kind: 'cellMove', direction: 'right' });
    expect(findBinding(bindings, 'z')).toBeUndefined();
  });

  it('should map the code key to both code categories', () => {
    expect(findBinding(bindings, 'c')?.request).toEqual({
      kind: 'categoryJump',
      categories: ['codeBlock', 'inlineCode'],
      direction: 'next',
    });
  });

  it('should map number keys to heading levels', () => {
    expect(findBinding(bindings, '3')?.request).toEqual({
      kind: 'categoryJump',
      category: 'heading',
      direction: 'next',
      level: 3,
    });
  });

  describe('invalid files', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'key-bindings-'));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function write(name: string, content: unknown): string {
      const path = join(dir, name);
      writeFileSync(path, JSON.stringify(content));
      return path;
    }

    it('should reject unknown categories', () => {
      const path = write('unknown.json', {
        version: 1,
        bindings: [{
          gesture: 'h',
          name: 'heading',
          request: { kind: 'categoryJump', category: 'chapter', direction: 'next' },
          notFound: 'no next chapter',
        }],
      });

      expect(() => loadKeyBindings(path)).toThrow(KeyBindingsError);
    });

    it('should reject duplicate gestures', () => {
      const binding = {
        gesture: 'h',
        name: 'heading',
        request: { kind: 'categoryJump', category: 'heading', direction: 'next' },
        notFound: 'no next heading',
      };
      const path = write('duplicate.json', { version: 1, bindings: [binding, { ...binding, gesture: 'H' }] });

      expect(() => loadKeyBindings(path)).toThrow('Duplicate gesture "H"');
    });

    it('should wrap read errors', () => {
      try {
        loadKeyBindings(join(dir, 'missing.json'));
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(KeyBindingsError);
        if (error instanceof KeyBindingsError) {
          expect(error.code).toBe('INVALID_KEY_BINDINGS');
          expect(error.cause).toBeInstanceOf(Error);
        }
      }
    });
  });
});

describe('normalizeGesture', () => {
  it('should lowercase and sort modifiers', () => {
    expect(normalizeGesture('Control+Alt+LeftArrow')).toBe('alt+control+leftarrow');
  });
});

describe('describeNoMatch', () => {
  const bindings = loadKeyBindings();

  it('should use the message of the matching binding', () => {
    expect(describeNoMatch({ kind: 'categoryJump', category: 'image', direction: 'next' }, bindings))
      .toBe('no next graphic');
    expect(describeNoMatch({ kind: 'categoryJump', category: 'heading', direction: 'previous', level: 2 }, bindings))
      .toBe('No previous heading at level 2');
    expect(describeNoMatch({ kind: 'categoryJump', categories: ['inlineCode', 'codeBlock'], direction: 'next' }, bindings))
      .toBe('no next code');
  });

  it('should build a message without bindings', () => {
    expect(describeNoMatch({ kind: 'categoryJump', category: 'emphasis', direction: 'previous' })).toBe('no previous italic');
    expect(describeNoMatch({ kind: 'cellMove', direction: 'left' })).toBe('Edge of table');
    expect(describeNoMatch({ kind: 'blockBoundary', edge: 'start' })).toBe('Not inside a block');
  });
});

describe('describeTarget', () => {
  it('should describe no match as empty', () => {
    expect(describeTarget({ found: false })).toBe('');
  });

  it('should describe checkboxes', () => {
    expect(describeTarget({
      found: true,
      offset: 2,
      element: {
        id: 'checkbox:2',
        category: 'checkbox',
        span: { start: 2, end: 5 },
        metadata: { kind: 'checkbox', checked: true },
      },
    })).toBe('check box, checked');
  });
});
