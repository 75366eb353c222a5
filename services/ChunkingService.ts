import { ChunkDraft, ChunkingOptions } from '../types';
import { InvalidChunkConfigError } from '../utils/errors';

const SENTENCE_TERMINATORS = new Set(['.', '!', '?']);

// True when `index` falls between the two halves of a surrogate pair
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) {
    return false;
  }
  const high = text.charCodeAt(index - 1);
  const low = text.charCodeAt(index);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

interface PageSpan {
  page: number;
  start: number;
  end: number; // exclusive
}

export class ChunkingService {
  private readonly options: Required<ChunkingOptions>;

  constructor(options: ChunkingOptions) {
    this.options = ChunkingService.validate(options);
  }

  static validate(options: ChunkingOptions): Required<ChunkingOptions> {
    const { maxChars, overlapChars, respectSentenceBoundaries } = options;
    const boundarySearchChars = options.boundarySearchChars ?? overlapChars;

    if (!Number.isInteger(maxChars) || maxChars < 1) {
      throw new InvalidChunkConfigError(`maxChars must be a positive integer, got ${maxChars}`);
    }
    if (!Number.isInteger(overlapChars) || overlapChars < 0) {
      throw new InvalidChunkConfigError(`overlapChars must be a non-negative integer, got ${overlapChars}`);
    }
    if (overlapChars >= maxChars) {
      throw new InvalidChunkConfigError(
        `overlapChars (${overlapChars}) must be smaller than maxChars (${maxChars})`
      );
    }
    // A boundary search reaching further back than the overlap would leave a
    // gap between the adjusted cut and the start of the next window.
    if (!Number.isInteger(boundarySearchChars) || boundarySearchChars < 0 || boundarySearchChars > overlapChars) {
      throw new InvalidChunkConfigError(
        `boundarySearchChars must be an integer between 0 and overlapChars (${overlapChars}), got ${boundarySearchChars}`
      );
    }

    return { maxChars, overlapChars, respectSentenceBoundaries, boundarySearchChars };
  }

  /**
   * Splits the concatenated page texts into overlapping windows.
   *
   * Each window after the first starts `overlapChars` before the previous
   * window's hard `maxChars` cut, even when sentence alignment moved the
   * actual cut earlier. Cuts and window starts never split a surrogate pair;
   * they move one code unit back instead.
   */
  chunkPages(pages: string[]): ChunkDraft[] {
    const { maxChars, overlapChars } = this.options;
    const text = pages.join('');
    const spans = ChunkingService.pageSpans(pages);

    if (text.length === 0) {
      return [];
    }

    const chunks: ChunkDraft[] = [];
    let start = 0;

    for (;;) {
      const intendedEnd = Math.min(start + maxChars, text.length);
      const isLast = intendedEnd === text.length;
      let end = isLast ? intendedEnd : this.findCut(text, start, intendedEnd);
      if (splitsSurrogatePair(text, end) && end - 1 > start) {
        end -= 1;
      }

      chunks.push({
        text: text.slice(start, end),
        pageStart: ChunkingService.pageAt(spans, start),
        pageEnd: ChunkingService.pageAt(spans, end - 1),
        sequenceIndex: chunks.length,
        charStart: start,
        charEnd: end
      });

      if (isLast) {
        break;
      }
      let next = intendedEnd - overlapChars;
      if (splitsSurrogatePair(text, next) && next - 1 > start) {
        next -= 1;
      }
      start = next;
    }

    console.log(
      `[ChunkingService] Created ${chunks.length} chunks from ${pages.length} pages (${text.length} chars)`
    );
    return chunks;
  }

  private findCut(text: string, start: number, intendedEnd: number): number {
    const { respectSentenceBoundaries, boundarySearchChars } = this.options;
    if (!respectSentenceBoundaries || boundarySearchChars === 0) {
      return intendedEnd;
    }

    const floor = Math.max(start + 1, intendedEnd - boundarySearchChars);
    for (let i = intendedEnd - 1; i >= floor; i--) {
      if (SENTENCE_TERMINATORS.has(text[i])) {
        return i + 1;
      }
    }
    return intendedEnd;
  }

  private static pageSpans(pages: string[]): PageSpan[] {
    const spans: PageSpan[] = [];
    let offset = 0;
    pages.forEach((page, index) => {
      if (page.length > 0) {
        spans.push({ page: index, start: offset, end: offset + page.length });
        offset += page.length;
      }
    });
    return spans;
  }

  private static pageAt(spans: PageSpan[], offset: number): number {
    let low = 0;
    let high = spans.length - 1;
    while (low <= high) {
      const mid = (low + high) >> 1;
      const span = spans[mid];
      if (offset < span.start) {
        high = mid - 1;
      } else if (offset >= span.end) {
        low = mid + 1;
      } else {
        return span.page;
      }
    }
    throw new RangeError(`Offset ${offset} is outside the page text`);
  }
}
