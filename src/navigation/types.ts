/**
 * Types for the navigation facade
 */

import type { ElementCategory, MarkdownElement } from '../base/index.js';
import type { BlockEdge, Direction, Revision } from '../structural-index/index.js';
import type { GridDirection, TableCell } from '../table-grid/index.js';

export interface DocumentSnapshot {
  text: string;

  /** Must change whenever `text` changes */
  revision: Revision;
}

export type CategoryJumpRequest =
  | {
      kind: 'categoryJump';
      category: ElementCategory;
      direction: Direction;

      /** Heading level 1-6; ignored for other categories */
      level?: number;
    }
  | {
      kind: 'categoryJump';
      categories: readonly ElementCategory[];
      direction: Direction;
    };

export interface BlockBoundaryRequest {
  kind: 'blockBoundary';
  edge: BlockEdge;
}

export interface CellMoveRequest {
  kind: 'cellMove';
  direction: GridDirection;
}

export type NavigationRequest = CategoryJumpRequest | BlockBoundaryRequest | CellMoveRequest;

export type NavigationResult =
  | {
      found: true;

      /** Where the cursor should go */
      offset: number;

      element?: MarkdownElement;
      cell?: TableCell;
    }
  | { found: false };

export interface NavigatorOptions {
  /** Log index builds to the console (default: false) */
  verbose?: boolean;

  /** Treat a leading `---`/`+++` block as front matter (default: true) */
  parseFrontMatter?: boolean;

  /** Column width of a tab (default: 4) */
  tabWidth?: number;
}
