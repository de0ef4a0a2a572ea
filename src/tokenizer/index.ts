/**
 * Tokenizer / line classifier
 */

export {
  LineClassifier,
  classifyLines,
  splitLines,
  stripQuoteMarkers,
  isUnescapedAt,
  hasUnescapedPipe,
} from './LineClassifier.js';
export { splitTableRow, parseAlignments } from './TableRow.js';
export type { CellRange } from './TableRow.js';
export type {
  LineKind,
  SourceLine,
  ClassifiedLine,
  ListMarkerInfo,
  FenceInfo,
  MathRole,
  ClassifyOptions,
  QuotePrefix,
} from './types.js';
