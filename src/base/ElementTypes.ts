/**
 * Element model shared by every stage of the engine
 *
 * An element is a categorized, span-located unit of Markdown structure
 * (headings, lists, tables...) or inline formatting (links, bold, math...).
 *
 * @since 2026-10-12
 */

export type ElementCategory =
  | 'heading' | 'table' | 'list' | 'listItem'
  | 'blockquote' | 'codeBlock' | 'separator' | 'checkbox'
  | 'inlineCode' | 'link' | 'image'
  | 'bold' | 'emphasis' | 'strikethrough'
  | 'footnote' | 'math';

export const ELEMENT_CATEGORIES: readonly ElementCategory[] = [
  'heading', 'table', 'list', 'listItem',
  'blockquote', 'codeBlock', 'separator', 'checkbox',
  'inlineCode', 'link', 'image',
  'bold', 'emphasis', 'strikethrough',
  'footnote', 'math',
];

export type BlockCategory =
  | 'heading' | 'table' | 'list' | 'listItem'
  | 'blockquote' | 'codeBlock' | 'separator' | 'checkbox';

export const BLOCK_CATEGORIES: readonly BlockCategory[] = [
  'heading', 'table', 'list', 'listItem',
  'blockquote', 'codeBlock', 'separator', 'checkbox',
];

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type TableAlignment = 'left' | 'center' | 'right' | null;

/**
 * Half-open range of UTF-16 offsets into the document text
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

/** `<category>:<span.start>`; unique within one index */
export type ElementId = string;

/**
 * Category-specific extras, tagged by `kind` (always equal to the element's category)
 */
export type ElementMetadata =
  | { readonly kind: 'heading'; readonly text: string }
  | {
      readonly kind: 'table';
      readonly columnCount: number;
      /** Body rows, header excluded */
      readonly rowCount: number;
      readonly alignments: readonly TableAlignment[];
    }
  | { readonly kind: 'list'; readonly ordered: boolean; readonly itemCount: number }
  | { readonly kind: 'listItem'; readonly ordered: boolean; readonly depth: number }
  | { readonly kind: 'blockquote'; readonly depth: number }
  | { readonly kind: 'codeBlock'; readonly language?: string; readonly fenced: true; readonly closed: boolean }
  | { readonly kind: 'checkbox'; readonly checked: boolean }
  | {
      readonly kind: 'link';
      readonly text: string;
      readonly url: string;
      readonly title?: string;
      /** Label of the `[label]: url` definition for reference-style links */
      readonly reference?: string;
    }
  | { readonly kind: 'image'; readonly alt: string; readonly url: string; readonly title?: string }
  | { readonly kind: 'footnote'; readonly label: string; readonly definition: boolean }
  | { readonly kind: 'math'; readonly display: boolean };

export interface MarkdownElement {
  readonly id: ElementId;
  readonly category: ElementCategory;
  readonly span: Span;

  /** Present only for headings */
  readonly level?: HeadingLevel;

  /** Innermost enclosing block element (weak link, resolve through the index) */
  readonly parentId?: ElementId;

  readonly metadata?: ElementMetadata;
}

/**
 * Element as produced by the extractor, before ids and parents are assigned
 */
export interface ElementDraft {
  category: ElementCategory;
  span: Span;
  level?: HeadingLevel;
  metadata?: ElementMetadata;
}

const CATEGORY_SET = new Set<string>(ELEMENT_CATEGORIES);
const BLOCK_CATEGORY_SET = new Set<ElementCategory>(BLOCK_CATEGORIES);

export function isElementCategory(value: string): value is ElementCategory {
  return CATEGORY_SET.has(value);
}

export function isBlockCategory(category: ElementCategory): category is BlockCategory {
  return BLOCK_CATEGORY_SET.has(category);
}

export function isHeadingLevel(value: number): value is HeadingLevel {
  return Number.isInteger(value) && value >= 1 && value <= 6;
}

export function makeElementId(category: ElementCategory, start: number): ElementId {
  return `${category}:${start}`;
}

export function spanContains(outer: Span, inner: Span): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

/**
 * Offset containment with an inclusive end, so a cursor parked at the end
 * of a line still counts as inside the block on that line
 */
export function spanContainsOffset(span: Span, offset: number): boolean {
  return span.start <= offset && offset <= span.end;
}

/**
 * Nesting rank used to order elements sharing a span;
 * lower ranks are structurally outer
 */
export const NESTING_RANK: Readonly<Record<ElementCategory, number>> = {
  blockquote: 0,
  list: 1,
  table: 1,
  codeBlock: 1,
  listItem: 2,
  heading: 2,
  separator: 2,
  checkbox: 3,
  inlineCode: 4,
  link: 4,
  image: 4,
  bold: 4,
  emphasis: 4,
  strikethrough: 4,
  footnote: 4,
  math: 4,
};

/**
 * Document order: by start, longer first, then outer category first
 */
export function compareDocumentOrder(
  a: { category: ElementCategory; span: Span },
  b: { category: ElementCategory; span: Span }
): number {
  return a.span.start - b.span.start ||
    b.span.end - a.span.end ||
    NESTING_RANK[a.category] - NESTING_RANK[b.category];
}
