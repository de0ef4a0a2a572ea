/**
 * Types for the structural index
 */

import type { MarkdownElement } from '../base/index.js';

export type Direction = 'next' | 'previous';

export type BlockEdge = 'start' | 'end';

/** Opaque cache key supplied by the host */
export type Revision = string | number;

export interface BoundaryMatch {
  element: MarkdownElement;
  offset: number;
}
