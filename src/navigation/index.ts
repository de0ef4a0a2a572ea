/**
 * Navigation facade
 */

export { MarkdownNavigator } from './MarkdownNavigator.js';
export {
  loadKeyBindings,
  findBinding,
  normalizeGesture,
  describeNoMatch,
  describeTarget,
} from './KeyBindings.js';
export type { KeyBinding } from './KeyBindings.js';
export { computeRevision } from './revision.js';
export type {
  DocumentSnapshot,
  CategoryJumpRequest,
  BlockBoundaryRequest,
  CellMoveRequest,
  NavigationRequest,
  NavigationResult,
  NavigatorOptions,
} from './types.js';
