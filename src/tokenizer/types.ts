/**
 * Types for the line classifier
 */

import type { HeadingLevel } from '../base/index.js';

export type LineKind =
  | 'blank'
  | 'paragraph'
  | 'heading'
  | 'listItem'
  | 'fence'
  | 'code'
  | 'mathFence'
  | 'math'
  | 'tableRow'
  | 'tableDelimiter'
  | 'separator'
  | 'frontMatter';

/**
 * One physical line of the document
 */
export interface SourceLine {
  /** 0-indexed line number */
  index: number;

  /** Offset of the first character */
  start: number;

  /** Offset just past the last character, line terminator excluded */
  end: number;

  text: string;
}

export interface ListMarkerInfo {
  /** Offset of the bullet or number */
  markerStart: number;

  /** Offset just past the marker (`-`, `1.`, `2)`...) */
  markerEnd: number;

  ordered: boolean;

  /** Task list box directly after the marker */
  checkbox?: {
    start: number;
    checked: boolean;
  };
}

export interface FenceInfo {
  char: '`' | '~';
  length: number;
  opening: boolean;

  /** First word of the info string */
  language?: string;
}

export type MathRole = 'open' | 'close' | 'body' | 'single';

export interface ClassifiedLine extends SourceLine {
  kind: LineKind;

  /** Number of `>` markers in front of the content */
  quoteDepth: number;

  /** Offset of the first `>` marker, when quoted */
  quoteStart?: number;

  /** Offset where the content after the quote markers begins */
  contentStart: number;

  /** First non-whitespace character of the content (`end` for blank lines) */
  firstNonSpace: number;

  /** `end` with trailing whitespace removed */
  trimmedEnd: number;

  /** Indentation of the content, in columns */
  indent: number;

  heading?: { level: HeadingLevel };
  listMarker?: ListMarkerInfo;
  fence?: FenceInfo;
  math?: MathRole;
}

export interface ClassifyOptions {
  /** Treat a leading `---`/`+++` block as front matter (default: true) */
  parseFrontMatter?: boolean;

  /** Column width of a tab when measuring indentation (default: 4) */
  tabWidth?: number;
}

export interface QuotePrefix {
  depth: number;

  /** Offset of the first `>` (only meaningful when depth > 0) */
  firstMarker: number;

  /** Offset where the content after the markers begins */
  contentStart: number;
}
