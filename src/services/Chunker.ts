/**
 * Chunker: splits extracted document text into overlapping spans.
 *
 * Cuts prefer a paragraph break, then a sentence break, within `slack`
 * characters before the window end, and never split a control identifier
 * when they can avoid it. Output is a plain array, so callers can iterate it
 * as often as they like; the same text and options always give the same spans.
 */

import { ValidationError } from '../errors.js';

export type ChunkUnit = 'chars' | 'tokens';

export interface ChunkerOptions {
  unit?: ChunkUnit;
  /** Window size in `unit`s. Default 1000 chars or 512 tokens. */
  window?: number;
  /** Overlap between consecutive spans in `unit`s. Default 200 chars or 50 tokens. */
  overlap?: number;
  /** Boundary search distance in `unit`s. Default 10% of the window. */
  slack?: number;
  /** Patterns recognising control identifiers. Default: CMMC and NIST 800-53 forms. */
  controlIdPatterns?: RegExp[];
}

export interface ChunkSpan {
  index: number;
  /** Inclusive character offset. */
  start: number;
  /** Exclusive character offset. */
  end: number;
  text: string;
  /** Control identifiers wholly inside the span, in order of first appearance. */
  controlIds: string[];
}

export const CHARS_PER_TOKEN = 4;

export const DEFAULT_CONTROL_ID_PATTERNS: readonly RegExp[] = [
  // CMMC practice, e.g. AC.L2-3.1.1
  /\b[A-Z]{2}\.L[1-3]-\d+\.\d+\.\d+\b/g,
  // NIST SP 800-53 control or enhancement, e.g. AC-2 or AC-2(1)
  /\b[A-Z]{2}-\d+(?:\(\d+\))?/g,
];

const PARAGRAPH_BREAK = /\n[ \t]*\n\s*/g;
const SENTENCE_BREAK = /[.!?]["')\]]?\s+/g;

interface ControlToken {
  id: string;
  start: number;
  end: number;
}

export class Chunker {
  /** Resolved sizes, always in characters. */
  readonly window: number;
  readonly overlap: number;
  readonly slack: number;
  private readonly patterns: RegExp[];

  constructor(options: ChunkerOptions = {}) {
    const unit = options.unit ?? 'chars';
    const scale = unit === 'tokens' ? CHARS_PER_TOKEN : 1;
    const window = options.window ?? (unit === 'tokens' ? 512 : 1000);
    const overlap = options.overlap ?? (unit === 'tokens' ? 50 : 200);

    if (!Number.isInteger(window) || window <= 0) {
      throw new ValidationError('Chunk window must be a positive integer', { window });
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= window) {
      throw new ValidationError('Chunk overlap must be a non-negative integer below the window', {
        window,
        overlap,
      });
    }

    this.window = window * scale;
    this.overlap = overlap * scale;
    this.slack =
      options.slack === undefined
        ? Math.floor(this.window / 10)
        : options.slack * scale;

    if (!Number.isInteger(this.slack) || this.slack < 0 || this.slack >= this.window - this.overlap) {
      throw new ValidationError('Chunk slack must be below window minus overlap', {
        window,
        overlap,
        slack: options.slack ?? this.slack / scale,
      });
    }

    this.patterns = (options.controlIdPatterns ?? DEFAULT_CONTROL_ID_PATTERNS).map(
      (p) => new RegExp(p.source, p.flags.includes('g') ? p.flags : `${p.flags}g`)
    );
  }

  chunk(text: string): ChunkSpan[] {
    if (text.length === 0) return [];

    const tokens = this.findControlTokens(text);
    const stride = this.window - this.overlap;
    const spans: ChunkSpan[] = [];
    let start = 0;

    for (;;) {
      const end = this.findEnd(text, start, tokens);
      spans.push({
        index: spans.length,
        start,
        end,
        text: text.slice(start, end),
        controlIds: uniqueIdsWithin(tokens, start, end),
      });

      if (end < text.length) {
        start = end - this.overlap;
        continue;
      }
      // At the end of the text: one more span restates the trailing overlap
      // unless this span is already no longer than a stride.
      if (end - start <= stride || end - this.overlap <= start) break;
      start = end - this.overlap;
    }

    return spans;
  }

  private findEnd(text: string, start: number, tokens: ControlToken[]): number {
    const target = start + this.window;
    if (target >= text.length) return text.length;

    const floor = start + this.overlap;
    const searchFrom = Math.max(target - this.slack, floor + 1);

    let end =
      lastBreak(text, PARAGRAPH_BREAK, searchFrom, target, floor) ??
      lastBreak(text, SENTENCE_BREAK, searchFrom, target, floor) ??
      target;

    const split = tokens.find((t) => t.start < end && end < t.end);
    if (split && split.start > floor) {
      end = split.start;
    }
    return end;
  }

  private findControlTokens(text: string): ControlToken[] {
    const found: ControlToken[] = [];
    for (const pattern of this.patterns) {
      pattern.lastIndex = 0;
      for (const match of text.matchAll(pattern)) {
        const at = match.index ?? 0;
        found.push({ id: match[0], start: at, end: at + match[0].length });
      }
    }
    return found.sort((a, b) => a.start - b.start || b.end - a.end);
  }
}

/** End offset just past the last `pattern` match ending in (floor, to]. */
function lastBreak(
  text: string,
  pattern: RegExp,
  from: number,
  to: number,
  floor: number
): number | null {
  if (from > to) return null;
  const region = text.slice(from, to);
  let best: number | null = null;
  for (const match of region.matchAll(pattern)) {
    const end = from + (match.index ?? 0) + match[0].length;
    if (end > floor) best = end;
  }
  return best;
}

function uniqueIdsWithin(tokens: ControlToken[], start: number, end: number): string[] {
  const ids: string[] = [];
  for (const token of tokens) {
    if (token.start >= start && token.end <= end && !ids.includes(token.id)) {
      ids.push(token.id);
    }
  }
  return ids;
}
