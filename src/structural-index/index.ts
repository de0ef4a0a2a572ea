/**
 * Structural index
 */

export { StructuralIndex } from './StructuralIndex.js';
export type { Direction, BlockEdge, BoundaryMatch, Revision } from './types.js';
