/**
 * Element extraction
 */

export { ElementExtractor, extractElements, normalizeLabel } from './ElementExtractor.js';
export { InlineScanner, scanInline } from './InlineScanner.js';
export type {
  InlineSegment,
  ReferenceCandidate,
  InlineScanResult,
  LinkDefinition,
  ExtractOptions,
  ExtractionResult,
} from './types.js';
