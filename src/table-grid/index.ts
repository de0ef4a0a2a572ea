/**
 * Table grid resolution and cell movement
 */

export { resolveGrid, locateCell, moveCell, cellAtPosition } from './TableGridResolver.js';
export type {
  CellSection,
  DelimiterRow,
  GridDirection,
  TableCell,
  GridRow,
  CellPosition,
  TableGrid,
} from './types.js';
