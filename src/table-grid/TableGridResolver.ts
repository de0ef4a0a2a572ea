/**
 * Table Grid Resolver
 *
 * Re-splits the lines of a table element into a rectangular grid of
 * cells and moves between them.
 *
 * @since 2026-10-15
 */

import { InvalidRequestError } from '../base/index.js';
import type { MarkdownElement, Span, TableAlignment } from '../base/index.js';
import {
  parseAlignments,
  splitLines,
  splitTableRow,
  stripQuoteMarkers,
} from '../tokenizer/index.js';
import type { CellRange } from '../tokenizer/index.js';
import type {
  CellPosition,
  CellSection,
  DelimiterRow,
  GridDirection,
  GridRow,
  TableCell,
  TableGrid,
} from './types.js';

function isSpace(ch: string): boolean {
  return ch === ' ' || ch === '\t';
}

function lineStartBefore(text: string, offset: number): number {
  let i = offset;
  while (i > 0 && text[i - 1] !== '\n' && text[i - 1] !== '\r') i--;
  return i;
}

/**
 * Fold the cells of one row into exactly `columnCount` ranges: missing
 * cells are padded at the row end, extra cells merge into the last column
 */
function normalizeRow(
  text: string,
  ranges: CellRange[],
  columnCount: number,
  rowEnd: number
): Array<CellRange & { padded: boolean }> {
  const cells = ranges.slice(0, columnCount).map(range => ({ ...range, padded: false }));

  if (ranges.length > columnCount) {
    const first = ranges[columnCount - 1];
    const last = ranges[ranges.length - 1];
    let contentStart = first.start;
    while (contentStart < last.end && isSpace(text[contentStart])) contentStart++;
    let contentEnd = last.end;
    while (contentEnd > contentStart && isSpace(text[contentEnd - 1])) contentEnd--;
    if (contentStart === contentEnd) {
      contentStart = first.start;
      contentEnd = first.start;
    }
    cells[columnCount - 1] = { start: first.start, end: last.end, contentStart, contentEnd, padded: false };
  }

  while (cells.length < columnCount) {
    cells.push({ start: rowEnd, end: rowEnd, contentStart: rowEnd, contentEnd: rowEnd, padded: true });
  }
  return cells;
}

/**
 * Build the grid of a table element
 */
export function resolveGrid(table: MarkdownElement, text: string): TableGrid {
  if (table.category !== 'table') {
    throw new InvalidRequestError(`Cannot resolve a grid for ${table.id}: not a table`);
  }

  const firstLineStart = lineStartBefore(text, table.span.start);
  const quoteDepth = stripQuoteMarkers(text, firstLineStart, table.span.start).depth;
  const lines = splitLines(text.slice(firstLineStart, table.span.end));

  const rowSpans: Span[] = lines.map(line => {
    const start = firstLineStart + line.start;
    const end = firstLineStart + line.end;
    return { start: stripQuoteMarkers(text, start, end, quoteDepth).contentStart, end };
  });

  const headerSpan = rowSpans[0];
  const headerRanges = splitTableRow(text, headerSpan.start, headerSpan.end);
  const metadata = table.metadata;
  const columnCount = Math.max(
    1,
    metadata?.kind === 'table' ? metadata.columnCount : headerRanges.length
  );

  const delimiterSpan: Span | undefined = rowSpans[1];
  let alignments: readonly TableAlignment[] = metadata?.kind === 'table' ? metadata.alignments : [];
  if (alignments.length === 0 && delimiterSpan) {
    alignments = parseAlignments(text, delimiterSpan.start, delimiterSpan.end);
  }
  const delimiter: DelimiterRow | undefined = delimiterSpan && {
    span: delimiterSpan,
    cells: splitTableRow(text, delimiterSpan.start, delimiterSpan.end)
      .map(range => ({ start: range.start, end: range.end })),
  };

  const buildRow = (section: CellSection, index: number, span: Span): GridRow => {
    let rowEnd = span.end;
    while (rowEnd > span.start && /\s/.test(text[rowEnd - 1])) rowEnd--;

    const cells = normalizeRow(text, splitTableRow(text, span.start, span.end), columnCount, rowEnd)
      .map((range, column): TableCell => ({
        id: `${table.id}/${section}/${index}/${column}`,
        parentId: table.id,
        section,
        row: index,
        column,
        start: range.start,
        end: range.end,
        contentStart: range.contentStart,
        contentEnd: range.contentEnd,
        text: text.slice(range.contentStart, range.contentEnd).replace(/\\\|/g, '|'),
        padded: range.padded,
      }));

    return { section, index, span, cells };
  };

  const header = buildRow('header', 0, headerSpan);
  const rows = rowSpans.slice(2).map((span, index) => buildRow('body', index, span));

  return {
    tableId: table.id,
    header,
    delimiter,
    rows,
    rowCount: rows.length,
    columnCount,
    alignments,
    cellAt(row: number, column: number): TableCell | undefined {
      if (column < 0 || column >= columnCount) return undefined;
      return rows[row]?.cells[column];
    },
  };
}

/**
 * Cell under `offset`. The delimiter row maps to the header, a pipe
 * belongs to the cell on its left.
 */
export function locateCell(grid: TableGrid, offset: number): CellPosition | undefined {
  const header = { section: grid.header.section, row: 0 };

  if (offset <= grid.header.span.end) {
    return { ...header, column: columnAt(grid.header.cells.filter(cell => !cell.padded), offset) };
  }
  if (grid.delimiter && offset <= grid.delimiter.span.end) {
    const cells = grid.delimiter.cells.slice(0, grid.columnCount);
    return { ...header, column: columnAt(cells, offset) };
  }

  const row = grid.rows.find(candidate => offset <= candidate.span.end);
  if (!row) return undefined;
  return { section: row.section, row: row.index, column: columnAt(row.cells.filter(cell => !cell.padded), offset) };
}

/**
 * Index of the first cell ending at or after `offset`, else the last cell
 */
function columnAt(cells: readonly Span[], offset: number): number {
  if (cells.length === 0) return 0;
  const hit = cells.findIndex(cell => offset <= cell.end);
  return hit === -1 ? cells.length - 1 : hit;
}

export function cellAtPosition(grid: TableGrid, position: CellPosition): TableCell | undefined {
  if (position.section === 'header') {
    return grid.header.cells[position.column];
  }
  return grid.cellAt(position.row, position.column);
}

/**
 * Neighbouring cell in `direction`, or undefined at the edge of the grid.
 * Left and right never wrap to another row; down from the header enters
 * body row 0 and up from body row 0 returns to the header.
 */
export function moveCell(
  grid: TableGrid,
  position: CellPosition,
  direction: GridDirection
): TableCell | undefined {
  const { section, row, column } = position;

  switch (direction) {
    case 'left':
      return column > 0 ? cellAtPosition(grid, { section, row, column: column - 1 }) : undefined;

    case 'right':
      return column + 1 < grid.columnCount
        ? cellAtPosition(grid, { section, row, column: column + 1 })
        : undefined;

    case 'up':
      if (section === 'header') return undefined;
      return row === 0
        ? cellAtPosition(grid, { section: 'header', row: 0, column })
        : grid.cellAt(row - 1, column);

    case 'down':
      if (section === 'header') return grid.cellAt(0, column);
      return grid.cellAt(row + 1, column);
  }
}
