/**
 * packages/core/src/text/styleRanges.ts — Style attributes by buffer offset.
 *
 * Ranges are recorded as text is appended, so their starts never decrease and
 * a lookup is a binary search over starts.
 */

import { throwCode } from "../errors.js";
import { EMPTY_TEXT_STYLE, type TextStyle } from "../style.js";

/** Half-open `[start, end)` span of buffer offsets sharing one style. */
export type StyleRange = Readonly<{
  start: number;
  end: number;
  style: TextStyle;
}>;

export class StyleRangeIndex {
  private readonly ranges: StyleRange[] = [];

  get size(): number {
    return this.ranges.length;
  }

  /**
   * Append a range. A range starting where the last one starts replaces it.
   */
  record(range: StyleRange): void {
    if (!Number.isInteger(range.start) || !Number.isInteger(range.end) || range.start < 0) {
      throwCode(
        "GT_INVALID_ARGUMENT",
        `StyleRangeIndex.record: offsets must be non-negative integers (got ${range.start}..${range.end})`,
      );
    }
    if (range.start >= range.end) {
      throwCode(
        "GT_INVALID_ARGUMENT",
        `StyleRangeIndex.record: empty range ${range.start}..${range.end}`,
      );
    }

    const last = this.ranges[this.ranges.length - 1];
    if (last !== undefined) {
      if (range.start < last.start) {
        throwCode(
          "GT_INVALID_ARGUMENT",
          `StyleRangeIndex.record: range start ${range.start} precedes last start ${last.start}`,
        );
      }
      if (range.start === last.start) {
        this.ranges[this.ranges.length - 1] = Object.freeze({ ...range });
        return;
      }
    }
    this.ranges.push(Object.freeze({ ...range }));
  }

  /**
   * The most recently recorded range starting at or before `offset`, or null
   * when `offset` precedes every range.
   */
  rangeAt(offset: number): StyleRange | null {
    let lo = 0;
    let hi = this.ranges.length - 1;
    let found: StyleRange | null = null;
    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const range = this.ranges[mid];
      if (range === undefined) break;
      if (range.start <= offset) {
        found = range;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found;
  }

  lookup(offset: number): TextStyle {
    return this.rangeAt(offset)?.style ?? EMPTY_TEXT_STYLE;
  }

  reset(): void {
    this.ranges.length = 0;
  }
}
