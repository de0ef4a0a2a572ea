/**
 * Inline Scanner
 *
 * Finds inline constructs inside one line segment, in three passes:
 * 1. atomic spans (escapes, code spans, math, autolinks); their interiors
 *    are masked from the later passes
 * 2. brackets (footnotes, images, inline and reference-style links); link
 *    destinations are masked, link text and image alt become zones
 * 3. emphasis, bold and strikethrough via delimiter runs, paired per zone
 *    following the CommonMark delimiter algorithm
 *
 * @since 2026-10-13
 */

import type { ElementDraft } from '../base/index.js';
import type { InlineScanResult, InlineSegment, ReferenceCandidate } from './types.js';

const ASCII_PUNCTUATION = /[!-/:-@[-`{-~]/;
const WHITESPACE = /\s/;
const PUNCTUATION = /[\p{P}\p{S}]/u;
const AUTOLINK_URI = /^<([A-Za-z][A-Za-z0-9+.-]{1,31}:[^\s<>]*)>/;
const AUTOLINK_EMAIL = /^<([^\s<>@\\]+@[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?)>/;
const FOOTNOTE = /^\[\^([^\]\s]+)\]/;

interface DelimiterRun {
  char: '*' | '_' | '~';
  start: number;
  length: number;
  originalLength: number;
  canOpen: boolean;
  canClose: boolean;
}

interface InlineLinkMatch {
  textStart: number;
  textEnd: number;
  end: number;
  url: string;
  title?: string;
}

export class InlineScanner {
  private readonly mask: Uint8Array;
  private readonly zones: Int32Array;
  private nextZone = 1;
  private readonly elements: ElementDraft[] = [];
  private readonly references: ReferenceCandidate[] = [];

  constructor(
    private readonly text: string,
    private readonly segment: InlineSegment
  ) {
    const length = Math.max(0, segment.end - segment.start);
    this.mask = new Uint8Array(length);
    this.zones = new Int32Array(length);
  }

  scan(): InlineScanResult {
    if (this.segment.end <= this.segment.start) {
      return { elements: [], references: [] };
    }
    this.scanAtomic();
    this.scanBrackets(this.segment.start, this.segment.end, true);
    this.scanEmphasis();
    return { elements: this.elements, references: this.references };
  }

  // ===========================================================================
  // Pass 1: escapes, code spans, math, autolinks
  // ===========================================================================

  private scanAtomic(): void {
    const { text } = this;
    const end = this.segment.end;
    let i = this.segment.start;

    while (i < end) {
      const ch = text[i];

      if (ch === '\\' && i + 1 < end && ASCII_PUNCTUATION.test(text[i + 1])) {
        this.setMask(i, i + 2);
        i += 2;
        continue;
      }

      if (ch === '`') {
        const runEnd = this.runEnd(i, '`');
        const close = this.findBacktickRun(runEnd, runEnd - i);
        if (close === -1) {
          i = runEnd;
          continue;
        }
        const spanEnd = close + (runEnd - i);
        this.elements.push({ category: 'inlineCode', span: { start: i, end: spanEnd } });
        this.setMask(i, spanEnd);
        i = spanEnd;
        continue;
      }

      if (ch === '$') {
        const mathEnd = this.matchMath(i);
        if (mathEnd === -1) {
          i = this.runEnd(i, '$');
          continue;
        }
        const display = text.startsWith('$$', i);
        this.elements.push({
          category: 'math',
          span: { start: i, end: mathEnd },
          metadata: { kind: 'math', display },
        });
        this.setMask(i, mathEnd);
        i = mathEnd;
        continue;
      }

      if (ch === '<') {
        const rest = text.slice(i, end);
        const uri = AUTOLINK_URI.exec(rest);
        const auto = uri ?? AUTOLINK_EMAIL.exec(rest);
        if (auto) {
          const linkEnd = i + auto[0].length;
          this.elements.push({
            category: 'link',
            span: { start: i, end: linkEnd },
            metadata: { kind: 'link', text: auto[1], url: uri ? auto[1] : `mailto:${auto[1]}` },
          });
          this.setMask(i, linkEnd);
          i = linkEnd;
          continue;
        }
      }

      i++;
    }
  }

  /**
   * Start of the next backtick run of exactly `length` characters, or -1
   */
  private findBacktickRun(from: number, length: number): number {
    let j = from;
    while (j < this.segment.end) {
      if (this.text[j] !== '`') {
        j++;
        continue;
      }
      const runEnd = this.runEnd(j, '`');
      if (runEnd - j === length) return j;
      j = runEnd;
    }
    return -1;
  }

  /**
   * End offset of `$$…$$` or `$…$` starting at `start`, or -1
   */
  private matchMath(start: number): number {
    const { text } = this;
    const end = this.segment.end;

    if (text.startsWith('$$', start)) {
      const close = text.indexOf('$$', start + 2);
      if (close === -1 || close + 2 > end || text.slice(start + 2, close).trim() === '') return -1;
      return close + 2;
    }

    const first = text[start + 1];
    if (start + 1 >= end || first === '$' || WHITESPACE.test(first)) return -1;

    for (let j = start + 2; j < end; j++) {
      if (text[j] !== '$') continue;
      const before = text[j - 1];
      const after = j + 1 < end ? text[j + 1] : '';
      if (!WHITESPACE.test(before) && before !== '\\' && !/[0-9]/.test(after)) {
        return j + 1;
      }
    }
    return -1;
  }

  // ===========================================================================
  // Pass 2: footnotes, images, links
  // ===========================================================================

  private scanBrackets(from: number, to: number, allowLinks: boolean): void {
    const { text } = this;
    let i = from;

    while (i < to) {
      if (this.isMasked(i)) {
        i++;
        continue;
      }
      const ch = text[i];

      if (ch === '[' && text[i + 1] === '^') {
        const footnote = FOOTNOTE.exec(text.slice(i, to));
        if (footnote) {
          const noteEnd = i + footnote[0].length;
          const definition = i === this.segment.lineContentStart && text[noteEnd] === ':';
          this.elements.push({
            category: 'footnote',
            span: { start: i, end: noteEnd },
            metadata: { kind: 'footnote', label: footnote[1], definition },
          });
          this.setMask(i, noteEnd);
          i = noteEnd;
          continue;
        }
      }

      if (ch === '!' && text[i + 1] === '[') {
        const image = this.matchInlineLink(i + 1, to);
        if (image) {
          this.elements.push({
            category: 'image',
            span: { start: i, end: image.end },
            metadata: {
              kind: 'image',
              alt: text.slice(image.textStart, image.textEnd),
              url: image.url,
              title: image.title,
            },
          });
          this.claimLink(i, image);
          i = image.end;
          continue;
        }
      }

      if (ch === '[' && allowLinks) {
        const link = this.matchInlineLink(i, to);
        if (link) {
          this.elements.push({
            category: 'link',
            span: { start: i, end: link.end },
            metadata: {
              kind: 'link',
              text: text.slice(link.textStart, link.textEnd),
              url: link.url,
              title: link.title,
            },
          });
          this.claimLink(i, link);
          // Link text may hold images and footnotes, never another link
          this.scanBrackets(link.textStart, link.textEnd, false);
          i = link.end;
          continue;
        }

        const reference = this.matchReference(i, to);
        if (reference) {
          this.references.push(reference);
          i = reference.span.end;
          continue;
        }
      }

      i++;
    }
  }

  /**
   * Closing `]` of the bracket opened at `open`, honouring nesting and masks
   */
  private findCloseBracket(open: number, to: number): number {
    let depth = 0;
    for (let j = open; j < to; j++) {
      if (this.isMasked(j)) continue;
      const ch = this.text[j];
      if (ch === '[') {
        depth++;
      } else if (ch === ']') {
        depth--;
        if (depth === 0) return j;
      }
    }
    return -1;
  }

  private matchInlineLink(open: number, to: number): InlineLinkMatch | null {
    const { text } = this;
    const close = this.findCloseBracket(open, to);
    if (close === -1 || text[close + 1] !== '(') return null;

    let parens = 0;
    let destEnd = -1;
    for (let k = close + 2; k < to; k++) {
      if (this.isMasked(k)) continue;
      const ch = text[k];
      if (ch === '(') {
        parens++;
      } else if (ch === ')') {
        if (parens === 0) {
          destEnd = k;
          break;
        }
        parens--;
      }
    }
    if (destEnd === -1) return null;

    const destination = parseDestination(text.slice(close + 2, destEnd));
    if (!destination) return null;

    return {
      textStart: open + 1,
      textEnd: close,
      end: destEnd + 1,
      url: destination.url,
      title: destination.title,
    };
  }

  /**
   * `[text][label]` or collapsed `[label][]`; resolved later against definitions
   */
  private matchReference(open: number, to: number): ReferenceCandidate | null {
    const { text } = this;
    const close = this.findCloseBracket(open, to);
    if (close === -1 || text[close + 1] !== '[') return null;

    const labelEnd = text.indexOf(']', close + 2);
    if (labelEnd === -1 || labelEnd >= to) return null;

    const label = text.slice(close + 2, labelEnd);
    if (label.includes('[')) return null;

    const linkText = text.slice(open + 1, close);
    return {
      span: { start: open, end: labelEnd + 1 },
      text: linkText,
      label: label.trim() === '' ? linkText : label,
    };
  }

  /**
   * Mask everything of a link but its text, which becomes a new zone
   */
  private claimLink(start: number, link: InlineLinkMatch): void {
    this.setMask(start, link.textStart);
    this.setMask(link.textEnd, link.end);
    const zone = this.nextZone++;
    for (let k = link.textStart; k < link.textEnd; k++) {
      this.zones[k - this.segment.start] = zone;
    }
  }

  // ===========================================================================
  // Pass 3: emphasis, bold, strikethrough
  // ===========================================================================

  private scanEmphasis(): void {
    const runsByZone = new Map<number, DelimiterRun[]>();

    let i = this.segment.start;
    while (i < this.segment.end) {
      const ch = this.text[i];
      if (this.isMasked(i) || (ch !== '*' && ch !== '_' && ch !== '~')) {
        i++;
        continue;
      }

      const zone = this.zoneAt(i);
      let j = i + 1;
      while (j < this.segment.end && this.text[j] === ch && !this.isMasked(j) && this.zoneAt(j) === zone) {
        j++;
      }

      if (ch !== '~' || j - i === 2) {
        const run = this.makeRun(ch, i, j);
        const runs = runsByZone.get(zone);
        if (runs) {
          runs.push(run);
        } else {
          runsByZone.set(zone, [run]);
        }
      }
      i = j;
    }

    for (const runs of runsByZone.values()) {
      this.pairRuns(runs);
    }
  }

  private makeRun(char: '*' | '_' | '~', start: number, end: number): DelimiterRun {
    const before = start > this.segment.start ? this.text[start - 1] : ' ';
    const after = end < this.segment.end ? this.text[end] : ' ';

    const spaceBefore = WHITESPACE.test(before);
    const spaceAfter = WHITESPACE.test(after);
    const punctBefore = PUNCTUATION.test(before);
    const punctAfter = PUNCTUATION.test(after);

    const leftFlanking = !spaceAfter && (!punctAfter || spaceBefore || punctBefore);
    const rightFlanking = !spaceBefore && (!punctBefore || spaceAfter || punctAfter);

    const length = end - start;
    if (char === '_') {
      return {
        char,
        start,
        length,
        originalLength: length,
        canOpen: leftFlanking && (!rightFlanking || punctBefore),
        canClose: rightFlanking && (!leftFlanking || punctAfter),
      };
    }
    return { char, start, length, originalLength: length, canOpen: leftFlanking, canClose: rightFlanking };
  }

  private pairRuns(runs: DelimiterRun[]): void {
    for (let c = 0; c < runs.length; c++) {
      const closer = runs[c];
      if (!closer.canClose) continue;

      while (closer.length > 0) {
        const o = this.findOpener(runs, c);
        if (o === -1) break;
        const opener = runs[o];

        const use = closer.char === '~' ? 2 : opener.length >= 2 && closer.length >= 2 ? 2 : 1;
        const category = closer.char === '~' ? 'strikethrough' : use === 2 ? 'bold' : 'emphasis';
        this.elements.push({
          category,
          span: { start: opener.start + opener.length - use, end: closer.start + use },
        });

        opener.length -= use;
        closer.start += use;
        closer.length -= use;
        for (let k = o + 1; k < c; k++) {
          runs[k].length = 0;
        }
      }
    }
  }

  private findOpener(runs: DelimiterRun[], closerIndex: number): number {
    const closer = runs[closerIndex];
    for (let o = closerIndex - 1; o >= 0; o--) {
      const opener = runs[o];
      if (opener.length === 0 || opener.char !== closer.char || !opener.canOpen) continue;

      if (closer.char === '~') {
        if (opener.length === 2 && closer.length === 2) return o;
        continue;
      }

      // Rule of three
      if ((opener.canClose || closer.canOpen) &&
          (opener.originalLength + closer.originalLength) % 3 === 0 &&
          !(opener.originalLength % 3 === 0 && closer.originalLength % 3 === 0)) {
        continue;
      }
      return o;
    }
    return -1;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private runEnd(start: number, ch: string): number {
    let j = start;
    while (j < this.segment.end && this.text[j] === ch) j++;
    return j;
  }

  private setMask(from: number, to: number): void {
    const base = this.segment.start;
    this.mask.fill(1, Math.max(0, from - base), Math.max(0, to - base));
  }

  private isMasked(offset: number): boolean {
    return this.mask[offset - this.segment.start] === 1;
  }

  private zoneAt(offset: number): number {
    return this.zones[offset - this.segment.start];
  }
}

/**
 * Split the inside of `( … )` into a URL and an optional quoted title
 */
function parseDestination(raw: string): { url: string; title?: string } | null {
  const trimmed = raw.trim();
  if (trimmed === '') return { url: '' };

  let url: string;
  let rest: string;
  if (trimmed.startsWith('<')) {
    const close = trimmed.indexOf('>');
    if (close === -1) return null;
    url = trimmed.slice(1, close);
    rest = trimmed.slice(close + 1).trim();
  } else {
    const space = trimmed.search(/\s/);
    url = space === -1 ? trimmed : trimmed.slice(0, space);
    rest = space === -1 ? '' : trimmed.slice(space).trim();
  }

  if (rest === '') return { url };

  const quoted = /^(?:"([^"]*)"|'([^']*)'|\(([^)]*)\))$/.exec(rest);
  if (!quoted) return null;
  return { url, title: quoted[1] ?? quoted[2] ?? quoted[3] };
}

/**
 * Scan one segment of a line for inline elements
 */
export function scanInline(text: string, segment: InlineSegment): InlineScanResult {
  return new InlineScanner(text, segment).scan();
}
