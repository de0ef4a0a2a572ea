/**
 * Element Extractor
 *
 * Groups classified lines into block elements (headings, lists, tables,
 * code blocks...), runs the inline scanner over every non-code line and
 * returns one flat, sorted list of elements with parent links.
 *
 * @since 2026-10-13
 */

import {
  compareDocumentOrder,
  isBlockCategory,
  makeElementId,
  spanContains,
} from '../base/index.js';
import type {
  ElementCategory,
  ElementDraft,
  HeadingLevel,
  MarkdownElement,
  TableAlignment,
} from '../base/index.js';
import {
  LineClassifier,
  parseAlignments,
  splitTableRow,
} from '../tokenizer/index.js';
import type { ClassifiedLine } from '../tokenizer/index.js';
import { scanInline } from './InlineScanner.js';
import type {
  ExtractOptions,
  ExtractionResult,
  InlineSegment,
  LinkDefinition,
  ReferenceCandidate,
} from './types.js';

const LINK_DEFINITION = /^ {0,3}\[([^\]^][^\]]*)\]:[ \t]*(<[^>]*>|\S+)(?:[ \t]+(?:"([^"]*)"|'([^']*)'|\(([^)]*)\)))?[ \t]*$/;

interface OpenFencedBlock {
  category: 'codeBlock' | 'math';
  start: number;
  end: number;
  language?: string;
}

interface OpenTable {
  start: number;
  end: number;
  quoteDepth: number;
  columnCount: number;
  alignments: TableAlignment[];
  rowCount: number;
  delimiterSeen: boolean;
}

interface OpenListItem {
  start: number;
  end: number;
  ordered: boolean;
  depth: number;
}

interface OpenList {
  start: number;
  end: number;
  quoteDepth: number;
  baseIndent: number;
  ordered: boolean;
  itemCount: number;
  indents: number[];
  item?: OpenListItem;
}

interface OpenQuote {
  start: number;
  end: number;
  depth: number;
}

/**
 * Normalize a reference label for matching (`[Foo  Bar]` matches `[foo bar]`)
 */
export function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase();
}

export class ElementExtractor {
  private readonly options: Required<ExtractOptions>;

  private text = '';
  private drafts: ElementDraft[] = [];
  private references: ReferenceCandidate[] = [];
  private definitions = new Map<string, LinkDefinition>();

  private fenced?: OpenFencedBlock;
  private table?: OpenTable;
  private list?: OpenList;
  private quote?: OpenQuote;

  constructor(options: ExtractOptions = {}) {
    this.options = {
      parseFrontMatter: options.parseFrontMatter ?? true,
      tabWidth: options.tabWidth ?? 4,
    };
  }

  /**
   * Extract every element of `text`
   */
  extract(text: string): ExtractionResult {
    this.reset(text);

    let lineCount = 0;
    let current: ClassifiedLine | undefined;
    for (const next of new LineClassifier(text, this.options).lines()) {
      if (current) this.processLine(current, next);
      current = next;
      lineCount++;
    }
    if (current) this.processLine(current, undefined);

    this.closeFenced(text.length, false);
    this.closeTable();
    this.closeList();
    this.closeQuote();

    return {
      elements: this.finalize(),
      definitions: this.definitions,
      lineCount,
    };
  }

  private reset(text: string): void {
    this.text = text;
    this.drafts = [];
    this.references = [];
    this.definitions = new Map();
    this.fenced = undefined;
    this.table = undefined;
    this.list = undefined;
    this.quote = undefined;
  }

  // ===========================================================================
  // Line dispatch
  // ===========================================================================

  private processLine(line: ClassifiedLine, next: ClassifiedLine | undefined): void {
    this.trackQuote(line);

    if (this.fenced && this.continueFenced(line)) return;
    if (this.table && this.continueTable(line)) return;

    switch (line.kind) {
      case 'frontMatter':
      case 'blank':
        this.closeList();
        return;

      case 'fence':
        this.closeList();
        this.fenced = {
          category: 'codeBlock',
          start: line.firstNonSpace,
          end: line.trimmedEnd,
          language: line.fence?.language,
        };
        return;

      case 'mathFence':
        this.closeList();
        this.fenced = { category: 'math', start: line.firstNonSpace, end: line.trimmedEnd };
        return;

      case 'math':
        this.closeList();
        this.push({
          category: 'math',
          span: { start: line.firstNonSpace, end: line.trimmedEnd },
          metadata: { kind: 'math', display: true },
        });
        return;

      case 'heading':
        this.closeList();
        this.addHeading(line);
        return;

      case 'separator':
        this.closeList();
        this.push({ category: 'separator', span: { start: line.firstNonSpace, end: line.trimmedEnd } });
        return;

      case 'listItem':
        this.addListItem(line);
        return;

      case 'tableRow':
        if (next?.kind === 'tableDelimiter' && next.quoteDepth === line.quoteDepth) {
          this.closeList();
          this.openTable(line, next);
          return;
        }
        this.addParagraph(line);
        return;

      case 'tableDelimiter':
      case 'paragraph':
        this.addParagraph(line);
        return;

      case 'code':
        // Only reachable after an implicitly closed fence; nothing to scan
        return;
    }
  }

  // ===========================================================================
  // Blockquotes
  // ===========================================================================

  private trackQuote(line: ClassifiedLine): void {
    if (line.quoteDepth === 0 || line.kind === 'frontMatter') {
      this.closeQuote();
      return;
    }

    const end = this.visibleEnd(line);
    if (this.quote) {
      this.quote.end = Math.max(this.quote.end, end);
      this.quote.depth = Math.max(this.quote.depth, line.quoteDepth);
    } else {
      this.quote = { start: line.quoteStart ?? line.start, end, depth: line.quoteDepth };
    }
  }

  private closeQuote(): void {
    const quote = this.quote;
    if (!quote) return;
    this.quote = undefined;
    this.push({
      category: 'blockquote',
      span: { start: quote.start, end: quote.end },
      metadata: { kind: 'blockquote', depth: quote.depth },
    });
  }

  // ===========================================================================
  // Code blocks and display math
  // ===========================================================================

  /**
   * Feed a line to the open fence; false when the fence ended implicitly
   * and the line still needs regular processing
   */
  private continueFenced(line: ClassifiedLine): boolean {
    const fenced = this.fenced;
    if (!fenced) return false;

    if (fenced.category === 'codeBlock') {
      if (line.kind === 'code') {
        fenced.end = Math.max(fenced.end, line.end);
        return true;
      }
      if (line.kind === 'fence' && line.fence && !line.fence.opening) {
        this.closeFenced(line.trimmedEnd, true);
        return true;
      }
    } else {
      if (line.kind === 'math' && line.math === 'body') {
        fenced.end = Math.max(fenced.end, line.end);
        return true;
      }
      if (line.kind === 'mathFence' && line.math === 'close') {
        this.closeFenced(line.trimmedEnd, true);
        return true;
      }
    }

    this.closeFenced(fenced.end, false);
    return false;
  }

  private closeFenced(end: number, closed: boolean): void {
    const fenced = this.fenced;
    if (!fenced) return;
    this.fenced = undefined;

    const span = { start: fenced.start, end: Math.max(end, fenced.start + 1) };
    if (fenced.category === 'codeBlock') {
      this.push({
        category: 'codeBlock',
        span,
        metadata: { kind: 'codeBlock', language: fenced.language, fenced: true, closed },
      });
    } else {
      this.push({ category: 'math', span, metadata: { kind: 'math', display: true } });
    }
  }

  // ===========================================================================
  // Headings and paragraphs
  // ===========================================================================

  private addHeading(line: ClassifiedLine): void {
    const level: HeadingLevel = line.heading?.level ?? 1;
    const innerStart = line.firstNonSpace + level;
    const inner = this.text.slice(innerStart, line.trimmedEnd).trim();

    this.push({
      category: 'heading',
      span: { start: line.firstNonSpace, end: line.trimmedEnd },
      level,
      metadata: { kind: 'heading', text: inner.replace(/(^|[ \t]+)#+$/, '').trim() },
    });
    this.scan({ start: innerStart, end: line.trimmedEnd, lineContentStart: line.firstNonSpace });
  }

  private addParagraph(line: ClassifiedLine): void {
    const list = this.list;
    if (list?.item && list.quoteDepth === line.quoteDepth && line.indent > list.baseIndent) {
      list.item.end = line.trimmedEnd;
      list.end = line.trimmedEnd;
    } else {
      this.closeList();
    }

    const content = this.text.slice(line.contentStart, line.end);
    const definition = LINK_DEFINITION.exec(content);
    if (definition) {
      const key = normalizeLabel(definition[1]);
      if (!this.definitions.has(key)) {
        const url = definition[2].replace(/^<|>$/g, '');
        this.definitions.set(key, { url, title: definition[3] ?? definition[4] ?? definition[5] });
      }
      return;
    }

    if (line.kind === 'tableDelimiter') return;
    this.scan({ start: line.firstNonSpace, end: line.trimmedEnd, lineContentStart: line.firstNonSpace });
  }

  // ===========================================================================
  // Lists
  // ===========================================================================

  private addListItem(line: ClassifiedLine): void {
    const marker = line.listMarker;
    if (!marker) return;

    const current = this.list;
    if (current && (
      current.quoteDepth !== line.quoteDepth ||
      line.indent < current.baseIndent ||
      (line.indent === current.baseIndent && marker.ordered !== current.ordered)
    )) {
      this.closeList();
    }

    const list = this.list ?? this.openList(line, marker.markerStart, marker.ordered);
    this.closeListItem(list);

    while (list.indents.length > 0 && list.indents[list.indents.length - 1] >= line.indent) {
      list.indents.pop();
    }
    list.indents.push(line.indent);

    list.item = {
      start: marker.markerStart,
      end: line.trimmedEnd,
      ordered: marker.ordered,
      depth: list.indents.length,
    };
    list.itemCount++;
    list.end = line.trimmedEnd;

    let contentStart = marker.markerEnd;
    if (marker.checkbox) {
      const boxEnd = marker.checkbox.start + 3;
      this.push({
        category: 'checkbox',
        span: { start: marker.checkbox.start, end: boxEnd },
        metadata: { kind: 'checkbox', checked: marker.checkbox.checked },
      });
      contentStart = boxEnd;
    }

    this.scan({ start: contentStart, end: line.trimmedEnd, lineContentStart: line.firstNonSpace });
  }

  private openList(line: ClassifiedLine, start: number, ordered: boolean): OpenList {
    const list: OpenList = {
      start,
      end: line.trimmedEnd,
      quoteDepth: line.quoteDepth,
      baseIndent: line.indent,
      ordered,
      itemCount: 0,
      indents: [],
    };
    this.list = list;
    return list;
  }

  private closeListItem(list: OpenList): void {
    const item = list.item;
    if (!item) return;
    list.item = undefined;
    this.push({
      category: 'listItem',
      span: { start: item.start, end: item.end },
      metadata: { kind: 'listItem', ordered: item.ordered, depth: item.depth },
    });
  }

  private closeList(): void {
    const list = this.list;
    if (!list) return;
    this.closeListItem(list);
    this.list = undefined;
    this.push({
      category: 'list',
      span: { start: list.start, end: list.end },
      metadata: { kind: 'list', ordered: list.ordered, itemCount: list.itemCount },
    });
  }

  // ===========================================================================
  // Tables
  // ===========================================================================

  private openTable(header: ClassifiedLine, delimiter: ClassifiedLine): void {
    const cells = splitTableRow(this.text, header.contentStart, header.end);
    this.table = {
      start: header.firstNonSpace,
      end: header.trimmedEnd,
      quoteDepth: header.quoteDepth,
      columnCount: cells.length,
      alignments: parseAlignments(this.text, delimiter.contentStart, delimiter.end),
      rowCount: 0,
      delimiterSeen: false,
    };
    this.scanCells(header);
  }

  /**
   * Feed a line to the open table; false when the table has ended
   */
  private continueTable(line: ClassifiedLine): boolean {
    const table = this.table;
    if (!table) return false;

    const isRow = line.kind === 'tableRow' || line.kind === 'tableDelimiter';
    if (!isRow || line.quoteDepth !== table.quoteDepth) {
      this.closeTable();
      return false;
    }

    table.end = line.trimmedEnd;
    if (line.kind === 'tableDelimiter' && !table.delimiterSeen) {
      table.delimiterSeen = true;
      return true;
    }

    table.rowCount++;
    this.scanCells(line);
    return true;
  }

  private closeTable(): void {
    const table = this.table;
    if (!table) return;
    this.table = undefined;
    this.push({
      category: 'table',
      span: { start: table.start, end: table.end },
      metadata: {
        kind: 'table',
        columnCount: table.columnCount,
        rowCount: table.rowCount,
        alignments: table.alignments,
      },
    });
  }

  private scanCells(line: ClassifiedLine): void {
    for (const cell of splitTableRow(this.text, line.contentStart, line.end)) {
      this.scan({ start: cell.contentStart, end: cell.contentEnd, lineContentStart: line.firstNonSpace });
    }
  }

  // ===========================================================================
  // Inline scanning and finalization
  // ===========================================================================

  private scan(segment: InlineSegment): void {
    if (segment.end <= segment.start) return;
    const result = scanInline(this.text, segment);
    this.drafts.push(...result.elements);
    this.references.push(...result.references);
  }

  private push(draft: ElementDraft): void {
    this.drafts.push(draft);
  }

  /**
   * Last non-whitespace offset + 1 on the line, quote markers included
   */
  private visibleEnd(line: ClassifiedLine): number {
    let end = line.end;
    while (end > line.start && /\s/.test(this.text[end - 1])) end--;
    return end;
  }

  private resolveReferences(): void {
    for (const candidate of this.references) {
      const definition = this.definitions.get(normalizeLabel(candidate.label));
      if (!definition) continue;
      this.drafts.push({
        category: 'link',
        span: candidate.span,
        metadata: {
          kind: 'link',
          text: candidate.text,
          url: definition.url,
          title: definition.title,
          reference: candidate.label,
        },
      });
    }
  }

  /**
   * Sort, drop same-category overlaps (the outer element wins), assign ids
   * and parent links in one stack sweep
   */
  private finalize(): MarkdownElement[] {
    this.resolveReferences();

    const sorted = this.drafts
      .filter(draft => draft.span.start < draft.span.end)
      .sort(compareDocumentOrder);

    const lastEnd = new Map<ElementCategory, number>();
    const stack: MarkdownElement[] = [];
    const elements: MarkdownElement[] = [];

    for (const draft of sorted) {
      const previousEnd = lastEnd.get(draft.category);
      if (previousEnd !== undefined && draft.span.start < previousEnd) continue;
      lastEnd.set(draft.category, draft.span.end);

      while (stack.length > 0 && !spanContains(stack[stack.length - 1].span, draft.span)) {
        stack.pop();
      }
      const parent = stack.length > 0 ? stack[stack.length - 1] : undefined;

      const element: MarkdownElement = Object.freeze({
        id: makeElementId(draft.category, draft.span.start),
        category: draft.category,
        span: Object.freeze({ start: draft.span.start, end: draft.span.end }),
        level: draft.level,
        parentId: parent?.id,
        metadata: draft.metadata && Object.freeze(draft.metadata),
      });

      elements.push(element);
      if (isBlockCategory(element.category)) {
        stack.push(element);
      }
    }

    return elements;
  }
}

/**
 * Extract every element of `text`
 */
export function extractElements(text: string, options: ExtractOptions = {}): MarkdownElement[] {
  return new ElementExtractor(options).extract(text).elements;
}
