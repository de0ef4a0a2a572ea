/**
 * Markdown Navigator
 *
 * Public query surface: resolves a navigation request against the index
 * of one document snapshot. One instance per open document; the index is
 * cached for the latest revision only.
 *
 * @since 2026-10-15
 */

import { v4 as uuidv4 } from 'uuid';
import {
  InvalidOffsetError,
  InvalidRequestError,
  UnresolvableGridError,
  isHeadingLevel,
} from '../base/index.js';
import type { MarkdownElement } from '../base/index.js';
import { ElementExtractor } from '../extraction/index.js';
import { StructuralIndex } from '../structural-index/index.js';
import type { Revision } from '../structural-index/index.js';
import { locateCell, moveCell, resolveGrid } from '../table-grid/index.js';
import type { TableGrid } from '../table-grid/index.js';
import type {
  BlockBoundaryRequest,
  CategoryJumpRequest,
  CellMoveRequest,
  DocumentSnapshot,
  NavigationRequest,
  NavigationResult,
  NavigatorOptions,
} from './types.js';

interface CacheEntry {
  readonly revision: Revision;
  readonly text: string;
  readonly index: StructuralIndex;
  readonly grids: Map<string, TableGrid>;
}

const NO_MATCH: NavigationResult = { found: false };

export class MarkdownNavigator {
  readonly sessionId = uuidv4();

  private readonly options: Required<NavigatorOptions>;
  private readonly extractor: ElementExtractor;
  private cache?: CacheEntry;

  constructor(options: NavigatorOptions = {}) {
    this.options = {
      verbose: options.verbose ?? false,
      parseFrontMatter: options.parseFrontMatter ?? true,
      tabWidth: options.tabWidth ?? 4,
    };
    this.extractor = new ElementExtractor({
      parseFrontMatter: this.options.parseFrontMatter,
      tabWidth: this.options.tabWidth,
    });

    if (this.options.verbose) {
      console.log(`✅ MarkdownNavigator created (session ${this.shortSession})`);
    }
  }

  private get shortSession(): string {
    return this.sessionId.slice(0, 8);
  }

  /**
   * Index for the snapshot, rebuilt when the revision differs from the cached one
   */
  getIndex(snapshot: DocumentSnapshot): StructuralIndex {
    return this.entryFor(snapshot).index;
  }

  /**
   * Grid of a table element of the snapshot, cached with its index
   */
  getGrid(snapshot: DocumentSnapshot, table: MarkdownElement): TableGrid {
    const entry = this.entryFor(snapshot);
    let grid = entry.grids.get(table.id);
    if (!grid) {
      grid = resolveGrid(table, entry.text);
      entry.grids.set(table.id, grid);
    }
    return grid;
  }

  /**
   * Drop the cached index
   */
  invalidate(): void {
    this.cache = undefined;
  }

  /**
   * Resolve `request` from `cursorOffset` in the snapshot
   */
  navigate(
    snapshot: DocumentSnapshot,
    cursorOffset: number,
    request: NavigationRequest
  ): NavigationResult {
    if (!Number.isInteger(cursorOffset) || cursorOffset < 0 || cursorOffset > snapshot.text.length) {
      throw new InvalidOffsetError(cursorOffset, snapshot.text.length);
    }

    switch (request.kind) {
      case 'categoryJump':
        return this.jump(snapshot, cursorOffset, request);
      case 'blockBoundary':
        return this.boundary(snapshot, cursorOffset, request);
      case 'cellMove':
        return this.moveInTable(snapshot, cursorOffset, request);
    }
  }

  private jump(
    snapshot: DocumentSnapshot,
    cursorOffset: number,
    request: CategoryJumpRequest
  ): NavigationResult {
    const index = this.getIndex(snapshot);
    let element: MarkdownElement | undefined;

    if ('categories' in request) {
      if (request.categories.length === 0) {
        throw new InvalidRequestError('categoryJump needs at least one category');
      }
      element = index.queryAny(request.categories, cursorOffset, request.direction);
    } else {
      const { level } = request;
      if (level !== undefined && request.category === 'heading') {
        if (!isHeadingLevel(level)) {
          throw new InvalidRequestError(`Heading level must be between 1 and 6, got ${level}`);
        }
        element = index.query('heading', cursorOffset, request.direction, level);
      } else {
        element = index.query(request.category, cursorOffset, request.direction);
      }
    }

    return element ? { found: true, offset: element.span.start, element } : NO_MATCH;
  }

  private boundary(
    snapshot: DocumentSnapshot,
    cursorOffset: number,
    request: BlockBoundaryRequest
  ): NavigationResult {
    const match = this.getIndex(snapshot).blockBoundary(cursorOffset, request.edge);
    return match ? { found: true, offset: match.offset, element: match.element } : NO_MATCH;
  }

  private moveInTable(
    snapshot: DocumentSnapshot,
    cursorOffset: number,
    request: CellMoveRequest
  ): NavigationResult {
    const table = this.getIndex(snapshot).enclosingBlock(cursorOffset, ['table']);
    if (!table) {
      throw new UnresolvableGridError(cursorOffset);
    }

    const grid = this.getGrid(snapshot, table);
    const position = locateCell(grid, cursorOffset);
    if (!position) {
      throw new UnresolvableGridError(cursorOffset);
    }

    const cell = moveCell(grid, position, request.direction);
    return cell ? { found: true, offset: cell.contentStart, element: table, cell } : NO_MATCH;
  }

  private entryFor(snapshot: DocumentSnapshot): CacheEntry {
    const cached = this.cache;
    if (cached && cached.revision === snapshot.revision) {
      return cached;
    }

    const startTime = Date.now();
    const { elements } = this.extractor.extract(snapshot.text);
    const entry: CacheEntry = {
      revision: snapshot.revision,
      text: snapshot.text,
      index: StructuralIndex.build(elements, snapshot.revision),
      grids: new Map(),
    };
    this.cache = entry;

    if (this.options.verbose) {
      console.log(
        `📊 [${this.shortSession}] Indexed revision ${snapshot.revision}: ` +
        `${entry.index.size} elements in ${Date.now() - startTime}ms`
      );
    }
    return entry;
  }
}
