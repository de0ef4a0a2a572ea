/**
 * Pipe-table row splitting
 *
 * Shared by the extractor (inline scanning per cell, column counts) and the
 * grid resolver (cell coordinates).
 *
 * @since 2026-10-13
 */

import type { TableAlignment } from '../base/index.js';
import { isUnescapedAt } from './LineClassifier.js';

export interface CellRange {
  /** Just past the opening pipe (or the row start) */
  start: number;

  /** The closing pipe (or the row end) */
  end: number;

  /** Cell text with surrounding whitespace trimmed; both equal `start` for an empty cell */
  contentStart: number;
  contentEnd: number;
}

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

/**
 * Split `text[from, to)` into cells on unescaped pipes.
 * Leading and trailing pipes are optional.
 */
export function splitTableRow(text: string, from: number, to: number): CellRange[] {
  let first = from;
  while (first < to && isSpace(text[first])) first++;
  let last = to;
  while (last > first && isSpace(text[last - 1])) last--;
  if (first >= last) return [];

  const pipes: number[] = [];
  for (let i = first; i < last; i++) {
    if (text[i] === '|' && isUnescapedAt(text, i, from)) pipes.push(i);
  }

  const leading = pipes.length > 0 && pipes[0] === first;
  const trailing = pipes.length > 0 && pipes[pipes.length - 1] === last - 1 && !(pipes.length === 1 && leading);

  const edges = [...pipes];
  if (!leading) edges.unshift(first - 1);
  if (!trailing) edges.push(last);

  const cells: CellRange[] = [];
  for (let k = 0; k + 1 < edges.length; k++) {
    const start = edges[k] + 1;
    const end = edges[k + 1];

    let contentStart = start;
    while (contentStart < end && isSpace(text[contentStart])) contentStart++;
    let contentEnd = end;
    while (contentEnd > contentStart && isSpace(text[contentEnd - 1])) contentEnd--;

    if (contentStart === contentEnd) {
      contentStart = start;
      contentEnd = start;
    }
    cells.push({ start, end, contentStart, contentEnd });
  }
  return cells;
}

/**
 * Column alignments of a delimiter row (`:--`, `:-:`, `--:`)
 */
export function parseAlignments(text: string, from: number, to: number): TableAlignment[] {
  return splitTableRow(text, from, to).map(cell => {
    const trimmed = text.slice(cell.contentStart, cell.contentEnd);
    const left = trimmed.startsWith(':');
    const right = trimmed.endsWith(':');
    if (left && right) return 'center';
    if (right) return 'right';
    if (left) return 'left';
    return null;
  });
}
