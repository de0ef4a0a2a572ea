/**
 * Types for table grids
 */

import type { ElementId, Span, TableAlignment } from '../base/index.js';

export type CellSection = 'header' | 'body';

export type GridDirection = 'left' | 'right' | 'up' | 'down';

export interface TableCell {
  /** `<table id>/<section>/<row>/<column>` */
  id: string;

  /** Id of the table element */
  parentId: ElementId;

  section: CellSection;

  /** Body row number (0 for the header) */
  row: number;
  column: number;

  /** Raw cell range between pipes */
  start: number;
  end: number;

  /** Trimmed content; both equal `start` when the cell is empty */
  contentStart: number;
  contentEnd: number;

  /** Content with `\|` unescaped */
  text: string;

  /** Synthesized for a row with fewer cells than the header */
  padded: boolean;
}

export interface GridRow {
  section: CellSection;
  index: number;

  /** Line range of the row, quote markers excluded */
  span: Span;

  /** Always `columnCount` cells */
  cells: readonly TableCell[];
}

export interface DelimiterRow {
  span: Span;
  cells: readonly Span[];
}

export interface CellPosition {
  section: CellSection;
  row: number;
  column: number;
}

export interface TableGrid {
  tableId: ElementId;
  header: GridRow;

  /** Delimiter row (`|---|:-:|`) and its cell ranges */
  delimiter?: DelimiterRow;

  /** Body rows, numbered from 0 */
  rows: readonly GridRow[];

  rowCount: number;
  columnCount: number;
  alignments: readonly TableAlignment[];

  /** Body cell at (row, column); undefined only outside the grid */
  cellAt(row: number, column: number): TableCell | undefined;
}
