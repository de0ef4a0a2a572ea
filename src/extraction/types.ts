/**
 * Types for element extraction
 */

import type { ElementDraft, MarkdownElement, Span } from '../base/index.js';
import type { ClassifyOptions } from '../tokenizer/index.js';

/**
 * Range of one line (or one table cell) handed to the inline scanner
 */
export interface InlineSegment {
  start: number;
  end: number;

  /** First non-space character of the line content; footnote definitions start here */
  lineContentStart: number;
}

/**
 * `[text][label]` seen in the text, a link only if `[label]: url` is defined
 */
export interface ReferenceCandidate {
  span: Span;
  text: string;
  label: string;
}

export interface InlineScanResult {
  elements: ElementDraft[];
  references: ReferenceCandidate[];
}

export interface LinkDefinition {
  url: string;
  title?: string;
}

export type ExtractOptions = ClassifyOptions;

export interface ExtractionResult {
  /** Sorted by start, then by decreasing end (outer before inner) */
  elements: MarkdownElement[];

  /** Link reference definitions keyed by normalized label */
  definitions: Map<string, LinkDefinition>;

  lineCount: number;
}
