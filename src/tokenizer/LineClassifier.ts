/**
 * Line Classifier
 *
 * Regex-based, line-local classification of Markdown text. Each line is
 * classified from its own content plus the open-block state left by the
 * lines before it (open fence, open display math, previous line kind),
 * which keeps the pass linear in document size.
 *
 * @since 2026-10-12
 */

import { isHeadingLevel } from '../base/index.js';
import type {
  ClassifiedLine,
  ClassifyOptions,
  LineKind,
  QuotePrefix,
  SourceLine,
} from './types.js';

const HEADING = /^ {0,3}(#{1,6})(?:[ \t]|$)/;
const SEPARATOR = /^ {0,3}([-*_])(?:[ \t]*\1){2,}[ \t]*$/;
const LIST_ITEM = /^([ \t]*)([-*+]|\d{1,9}[.)])(?:[ \t]+|$)/;
const CHECKBOX = /^\[([ xX])\](?=[ \t]|$)/;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/;
const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;
const TABLE_DELIMITER = /^[ \t]*\|?[ \t]*:?-+:?[ \t]*(?:\|[ \t]*:?-+:?[ \t]*)*\|?[ \t]*$/;

type OpenBlock =
  | { type: 'fence'; char: '`' | '~'; length: number; quoteDepth: number }
  | { type: 'math'; quoteDepth: number };


/**
 * Split text into lines on `\r\n`, `\n` or `\r`.
 * A trailing terminator yields a final empty line.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code !== 10 && code !== 13) continue;

    lines.push({ index: lines.length, start, end: i, text: text.slice(start, i) });
    if (code === 13 && text.charCodeAt(i + 1) === 10) i++;
    start = i + 1;
  }

  lines.push({ index: lines.length, start, end: text.length, text: text.slice(start) });
  return lines;
}

/**
 * Strip up to `maxDepth` blockquote markers (`>` with up to three spaces
 * in front and one optional space after) from `text[from, to)`
 */
export function stripQuoteMarkers(
  text: string,
  from: number,
  to: number,
  maxDepth = Number.POSITIVE_INFINITY
): QuotePrefix {
  let pos = from;
  let depth = 0;
  let firstMarker = from;

  while (depth < maxDepth) {
    let p = pos;
    let spaces = 0;
    while (p < to && text[p] === ' ' && spaces < 3) {
      p++;
      spaces++;
    }
    if (p >= to || text[p] !== '>') break;

    if (depth === 0) firstMarker = p;
    depth++;
    p++;
    if (p < to && (text[p] === ' ' || text[p] === '\t')) p++;
    pos = p;
  }

  return { depth, firstMarker, contentStart: pos };
}

function isWhitespaceCode(code: number): boolean {
  return code === 32 || code === 9 || code === 10 || code === 13 || code === 12 || code === 11;
}

/**
 * True when the character at `pos` is not escaped by an odd run of backslashes
 */
export function isUnescapedAt(text: string, pos: number, from = 0): boolean {
  let backslashes = 0;
  for (let i = pos - 1; i >= from && text[i] === '\\'; i--) {
    backslashes++;
  }
  return backslashes % 2 === 0;
}

export function hasUnescapedPipe(text: string): boolean {
  for (let i = text.indexOf('|'); i !== -1; i = text.indexOf('|', i + 1)) {
    if (isUnescapedAt(text, i)) return true;
  }
  return false;
}

/**
 * Line classifier over one document text
 */
export class LineClassifier {
  private readonly options: Required<ClassifyOptions>;
  private openBlock?: OpenBlock;
  private previous?: ClassifiedLine;

  constructor(
    private readonly text: string,
    options: ClassifyOptions = {}
  ) {
    this.options = {
      parseFrontMatter: options.parseFrontMatter ?? true,
      tabWidth: options.tabWidth ?? 4,
    };
  }

  /**
   * Lazily classify every line, in document order
   */
  *lines(): Generator<ClassifiedLine> {
    const lines = splitLines(this.text);
    const frontMatterEnd = this.options.parseFrontMatter ? findFrontMatterEnd(lines) : -1;
    this.openBlock = undefined;
    this.previous = undefined;

    for (const line of lines) {
      const classified = line.index <= frontMatterEnd
        ? this.layout(line, { depth: 0, firstMarker: line.start, contentStart: line.start }, 'frontMatter')
        : this.classify(line);
      this.previous = classified;
      yield classified;
    }
  }

  private classify(line: SourceLine): ClassifiedLine {
    const open = this.openBlock;
    if (open) {
      const quote = stripQuoteMarkers(this.text, line.start, line.end, open.quoteDepth);
      // A quoted fence ends with its blockquote
      if (quote.depth >= open.quoteDepth) {
        return this.classifyInside(line, quote, open);
      }
      this.openBlock = undefined;
    }

    return this.classifyFresh(line, stripQuoteMarkers(this.text, line.start, line.end));
  }

  private classifyInside(line: SourceLine, quote: QuotePrefix, open: OpenBlock): ClassifiedLine {
    const content = this.text.slice(quote.contentStart, line.end);

    if (open.type === 'fence') {
      const close = FENCE_CLOSE.exec(content);
      if (close && close[1][0] === open.char && close[1].length >= open.length) {
        this.openBlock = undefined;
        const classified = this.layout(line, quote, 'fence');
        classified.fence = { char: open.char, length: close[1].length, opening: false };
        return classified;
      }
      return this.layout(line, quote, 'code');
    }

    const closing = content.trim().endsWith('$$');
    if (closing) this.openBlock = undefined;
    const classified = this.layout(line, quote, closing ? 'mathFence' : 'math');
    classified.math = closing ? 'close' : 'body';
    return classified;
  }

  private classifyFresh(line: SourceLine, quote: QuotePrefix): ClassifiedLine {
    const content = this.text.slice(quote.contentStart, line.end);
    const trimmed = content.trim();

    if (trimmed === '') {
      return this.layout(line, quote, 'blank');
    }

    const fence = FENCE_OPEN.exec(content);
    if (fence && !(fence[1][0] === '`' && fence[2].includes('`'))) {
      const char = fence[1][0] === '`' ? '`' : '~';
      const length = fence[1].length;
      const language = fence[2].trim().split(/\s+/)[0] || undefined;
      this.openBlock = { type: 'fence', char, length, quoteDepth: quote.depth };
      const classified = this.layout(line, quote, 'fence');
      classified.fence = { char, length, opening: true, language };
      return classified;
    }

    if (trimmed === '$$') {
      this.openBlock = { type: 'math', quoteDepth: quote.depth };
      const classified = this.layout(line, quote, 'mathFence');
      classified.math = 'open';
      return classified;
    }
    if (trimmed.length > 4 && trimmed.startsWith('$$') && trimmed.endsWith('$$')) {
      const classified = this.layout(line, quote, 'math');
      classified.math = 'single';
      return classified;
    }

    const heading = HEADING.exec(content);
    if (heading) {
      const level = heading[1].length;
      if (isHeadingLevel(level)) {
        const classified = this.layout(line, quote, 'heading');
        classified.heading = { level };
        return classified;
      }
    }

    if (SEPARATOR.test(content)) {
      return this.layout(line, quote, 'separator');
    }

    if (this.followsTableRow(quote.depth) && content.includes('|') && TABLE_DELIMITER.test(content)) {
      return this.layout(line, quote, 'tableDelimiter');
    }

    const item = LIST_ITEM.exec(content);
    if (item) {
      const markerStart = quote.contentStart + item[1].length;
      const afterMarker = quote.contentStart + item[0].length;
      const box = CHECKBOX.exec(content.slice(item[0].length));
      const classified = this.layout(line, quote, 'listItem');
      classified.listMarker = {
        markerStart,
        markerEnd: markerStart + item[2].length,
        ordered: /\d/.test(item[2]),
        checkbox: box ? { start: afterMarker, checked: box[1] !== ' ' } : undefined,
      };
      return classified;
    }

    return this.layout(line, quote, hasUnescapedPipe(content) ? 'tableRow' : 'paragraph');
  }

  private followsTableRow(quoteDepth: number): boolean {
    return this.previous?.kind === 'tableRow' && this.previous.quoteDepth === quoteDepth;
  }

  /**
   * Classified line with its layout measured; optional fields start undefined
   */
  private layout(line: SourceLine, quote: QuotePrefix, kind: LineKind): ClassifiedLine {
    let indent = 0;
    let firstNonSpace = line.end;
    for (let i = quote.contentStart; i < line.end; i++) {
      const ch = this.text[i];
      if (ch === ' ') {
        indent++;
      } else if (ch === '\t') {
        indent += this.options.tabWidth - (indent % this.options.tabWidth);
      } else {
        firstNonSpace = i;
        break;
      }
    }

    let trimmedEnd = line.end;
    while (trimmedEnd > firstNonSpace && isWhitespaceCode(this.text.charCodeAt(trimmedEnd - 1))) {
      trimmedEnd--;
    }

    return {
      index: line.index,
      start: line.start,
      end: line.end,
      text: line.text,
      kind,
      quoteDepth: quote.depth,
      quoteStart: quote.depth > 0 ? quote.firstMarker : undefined,
      contentStart: quote.contentStart,
      firstNonSpace,
      trimmedEnd,
      indent,
      heading: undefined,
      listMarker: undefined,
      fence: undefined,
      math: undefined,
    };
  }
}

/**
 * Index of the closing line of a leading YAML (`---`) or TOML (`+++`)
 * front matter block, or -1
 */
function findFrontMatterEnd(lines: SourceLine[]): number {
  if (lines.length < 2) return -1;

  const first = lines[0].text.trimEnd();
  if (first !== '---' && first !== '+++') return -1;

  for (let i = 1; i < lines.length; i++) {
    const candidate = lines[i].text.trimEnd();
    if (candidate === first || (first === '---' && candidate === '...')) {
      return i;
    }
  }
  return -1;
}

/**
 * Classify every line of `text`
 */
export function classifyLines(text: string, options: ClassifyOptions = {}): Generator<ClassifiedLine> {
  return new LineClassifier(text, options).lines();
}
