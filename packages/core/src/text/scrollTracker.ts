/**
 * packages/core/src/text/scrollTracker.ts — First visible line of the widget.
 *
 * Navigation happens between draws, against the line count and height of the
 * last draw. Every draw re-evaluates the position for the current geometry, so
 * resizes and appended text are absorbed without a dedicated event.
 */

export type ScrollTrackerOptions = Readonly<{
  /** Rows per page step. Defaults to the canvas height. */
  pageSize?: number | undefined;
  /** Keep the newest lines visible while the view sits at the bottom. */
  rollContent: boolean;
  /** Make every navigation call a no-op. */
  disabled: boolean;
}>;

function maxFirstLine(lineCount: number, height: number): number {
  return Math.max(0, lineCount - height);
}

function clamp(value: number, min: number, max: number): number {
  if (value <= min) return min;
  if (value >= max) return max;
  return value;
}

export class ScrollTracker {
  private first = 0;
  private lineCount = 0;
  private height = 0;
  /** Whether the view shows the last line; only consulted when rolling. */
  private atTail = true;
  private readonly opts: ScrollTrackerOptions;

  constructor(opts: ScrollTrackerOptions) {
    this.opts = opts;
  }

  /** First visible line as of the last evaluation or navigation. */
  get current(): number {
    return this.first;
  }

  upOneLine(): void {
    this.scrollBy(-1);
  }

  downOneLine(): void {
    this.scrollBy(1);
  }

  upOnePage(): void {
    this.scrollBy(-this.pageStep());
  }

  downOnePage(): void {
    this.scrollBy(this.pageStep());
  }

  /**
   * Re-evaluate the position for the given geometry and return the first line
   * to draw. Everything fits when `lineCount <= height`, so the result is 0.
   */
  firstLine(lineCount: number, height: number): number {
    const max = maxFirstLine(lineCount, height);
    if (this.opts.rollContent && this.atTail) {
      this.first = max;
    } else {
      this.first = clamp(this.first, 0, max);
    }
    this.lineCount = lineCount;
    this.height = height;
    this.atTail = this.first === max;
    return this.first;
  }

  reset(): void {
    this.first = 0;
    this.lineCount = 0;
    this.height = 0;
    this.atTail = true;
  }

  private pageStep(): number {
    return this.opts.pageSize ?? this.height;
  }

  private scrollBy(delta: number): void {
    if (this.opts.disabled) return;
    const max = maxFirstLine(this.lineCount, this.height);
    this.first = clamp(this.first + delta, 0, max);
    this.atTail = this.first === max;
  }
}
