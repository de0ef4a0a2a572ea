/**
 * Structural Index
 *
 * Per-category arrays of elements sorted by start offset, answering
 * "nearest element of this category before/after the cursor" and
 * "innermost block around the cursor" in O(log n).
 *
 * @since 2026-10-14
 */

import {
  ELEMENT_CATEGORIES,
  compareDocumentOrder,
  isBlockCategory,
  spanContainsOffset,
} from '../base/index.js';
import type {
  ElementCategory,
  ElementId,
  HeadingLevel,
  MarkdownElement,
} from '../base/index.js';
import type { BlockEdge, BoundaryMatch, Direction, Revision } from './types.js';

/**
 * Index of the first element whose start is greater than `offset`
 */
function upperBound(elements: readonly MarkdownElement[], offset: number): number {
  let low = 0;
  let high = elements.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (elements[mid].span.start <= offset) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Index of the first element whose start is greater than or equal to `offset`
 */
function lowerBound(elements: readonly MarkdownElement[], offset: number): number {
  let low = 0;
  let high = elements.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (elements[mid].span.start < offset) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

function nearest(
  elements: readonly MarkdownElement[],
  fromOffset: number,
  direction: Direction
): MarkdownElement | undefined {
  if (direction === 'next') {
    return elements[upperBound(elements, fromOffset)];
  }
  const index = lowerBound(elements, fromOffset) - 1;
  return index >= 0 ? elements[index] : undefined;
}

export class StructuralIndex {
  private readonly byId = new Map<ElementId, MarkdownElement>();
  private readonly byCategory = new Map<ElementCategory, MarkdownElement[]>();
  private readonly headingsByLevel = new Map<HeadingLevel, MarkdownElement[]>();

  /** Block elements in document order, outer before inner on equal starts */
  private readonly blocks: MarkdownElement[] = [];

  private constructor(
    readonly revision: Revision,
    elements: readonly MarkdownElement[]
  ) {
    for (const category of ELEMENT_CATEGORIES) {
      this.byCategory.set(category, []);
    }

    for (const element of elements) {
      this.byId.set(element.id, element);
      this.byCategory.get(element.category)?.push(element);

      if (element.category === 'heading' && element.level !== undefined) {
        const level = this.headingsByLevel.get(element.level) ?? [];
        level.push(element);
        this.headingsByLevel.set(element.level, level);
      }
      if (isBlockCategory(element.category)) {
        this.blocks.push(element);
      }
    }
  }

  /**
   * Build an index over extracted elements.
   * Input order does not matter; elements are re-sorted into document
   * order, with equal spans ordered outer category first.
   */
  static build(elements: readonly MarkdownElement[], revision: Revision): StructuralIndex {
    const sorted = [...elements].sort(compareDocumentOrder);
    return new StructuralIndex(revision, sorted);
  }

  get size(): number {
    return this.byId.size;
  }

  get(id: ElementId): MarkdownElement | undefined {
    return this.byId.get(id);
  }

  parentOf(element: MarkdownElement): MarkdownElement | undefined {
    return element.parentId !== undefined ? this.byId.get(element.parentId) : undefined;
  }

  /**
   * All elements of one category (or of a heading level), sorted by start
   */
  elements(category: ElementCategory, level?: HeadingLevel): readonly MarkdownElement[] {
    if (category === 'heading' && level !== undefined) {
      return this.headingsByLevel.get(level) ?? [];
    }
    return this.byCategory.get(category) ?? [];
  }

  /**
   * Nearest element of `category` strictly after (`next`) or strictly
   * before (`previous`) `fromOffset`, by start offset
   */
  query(
    category: ElementCategory,
    fromOffset: number,
    direction: Direction,
    level?: HeadingLevel
  ): MarkdownElement | undefined {
    return nearest(this.elements(category, level), fromOffset, direction);
  }

  /**
   * Nearest element across several categories; on equal starts the
   * category listed first wins
   */
  queryAny(
    categories: readonly ElementCategory[],
    fromOffset: number,
    direction: Direction
  ): MarkdownElement | undefined {
    let best: MarkdownElement | undefined;
    for (const category of categories) {
      const candidate = this.query(category, fromOffset, direction);
      if (!candidate) continue;
      if (
        !best ||
        (direction === 'next' && candidate.span.start < best.span.start) ||
        (direction === 'previous' && candidate.span.start > best.span.start)
      ) {
        best = candidate;
      }
    }
    return best;
  }

  /**
   * Innermost block element containing `offset` (end inclusive),
   * optionally restricted to some block categories
   */
  enclosingBlock(
    offset: number,
    categories?: readonly ElementCategory[]
  ): MarkdownElement | undefined {
    const index = upperBound(this.blocks, offset) - 1;
    let candidate: MarkdownElement | undefined = index >= 0 ? this.blocks[index] : undefined;

    while (candidate) {
      if (
        spanContainsOffset(candidate.span, offset) &&
        (!categories || categories.includes(candidate.category))
      ) {
        return candidate;
      }
      candidate = this.parentOf(candidate);
    }
    return undefined;
  }

  /**
   * Start or end offset of the innermost block around `offset`.
   *
   * Containment includes `span.end`, so a cursor already at a block's end
   * matches the same block again and the `end` edge returns that offset
   * unchanged. Leaving the block is the host's move.
   */
  blockBoundary(offset: number, edge: BlockEdge): BoundaryMatch | undefined {
    const element = this.enclosingBlock(offset);
    if (!element) return undefined;
    return { element, offset: edge === 'start' ? element.span.start : element.span.end };
  }

  /**
   * Every element, in document order
   */
  *[Symbol.iterator](): IterableIterator<MarkdownElement> {
    yield* this.byId.values();
  }
}
