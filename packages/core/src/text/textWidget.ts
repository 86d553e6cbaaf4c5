/**
 * packages/core/src/text/textWidget.ts — Scrollable text display widget.
 *
 * Why: Hosts append text as it arrives and redraw on every frame. The widget
 * keeps the buffer, style ranges, cached line index and scroll position
 * together and turns each draw into cell writes on the host canvas.
 *
 * Responsibilities:
 *   - Validate and append text with per-write styles
 *   - Recompute line starts only when text was appended or the width changed
 *   - Map configured keys and mouse buttons to scroll commands
 *   - Report capabilities to the host layout
 *
 * Invariants:
 *   - Public operations never interleave; a re-entrant call throws
 *     GT_REENTRANT_CALL
 *   - Invalid text leaves the widget unchanged
 *   - A failed draw keeps the layout dirty so the next draw retries
 */

import type { CanvasWriteError, CellCanvas } from "../canvas.js";
import { throwCode } from "../errors.js";
import { EMPTY_TEXT_STYLE } from "../style.js";
import { type TextWarningContext, describeCanvasSize, warnTextIssue } from "./devWarnings.js";
import { computeLines } from "./lineIndex.js";
import {
  type MouseButton,
  type ResolvedTextWidgetOptions,
  type ScrollAction,
  type TextWidgetOptions,
  type WriteOptions,
  resolveTextWidgetOptions,
} from "./options.js";
import { MIN_ROWS_FOR_MARKERS, renderText } from "./renderText.js";
import { ScrollTracker } from "./scrollTracker.js";
import { StyleRangeIndex } from "./styleRanges.js";
import { TextBuffer } from "./textBuffer.js";
import { type TextValidationResult, validateText } from "./validate.js";

/** A key press reduced to its key code. */
export type TextKeyInput = Readonly<{ key: number }>;

/** A pointer event reduced to its button. */
export type TextMouseInput = Readonly<{ button: MouseButton }>;

/** What the widget asks of the host layout and input dispatch. */
export type WidgetCapabilities = Readonly<{
  minimumSize: Readonly<{ cols: number; rows: number }>;
  wantKeyboard: boolean;
  wantMouse: boolean;
}>;

export type TextDrawStats = Readonly<{
  lineCount: number;
  firstLine: number;
  cells: number;
  scrollUp: boolean;
  scrollDown: boolean;
}>;

export type DrawResult =
  | Readonly<{ ok: true; value: TextDrawStats }>
  | Readonly<{ ok: false; error: CanvasWriteError }>;

export type WriteResult = TextValidationResult;

const NOTHING_DRAWN: DrawResult = Object.freeze({
  ok: true,
  value: Object.freeze({ lineCount: 0, firstLine: 0, cells: 0, scrollUp: false, scrollDown: false }),
});

const EMPTY_LINES: readonly number[] = Object.freeze([]);

export class TextWidget {
  private readonly opts: ResolvedTextWidgetOptions;
  private readonly buffer = new TextBuffer();
  private readonly styles = new StyleRangeIndex();
  private readonly scroll: ScrollTracker;
  private readonly warned = new Set<string>();

  /** Line starts as of the last layout. */
  private lines: readonly number[] = EMPTY_LINES;
  /** Canvas width the line starts were computed for. */
  private lastWidth = 0;
  /** Text was appended since the last successful draw. */
  private dirty = true;
  private drawId = 0;
  /** Operation currently holding the widget, or null. */
  private busy: string | null = null;

  constructor(opts: TextWidgetOptions = {}) {
    this.opts = resolveTextWidgetOptions(opts);
    this.scroll = new ScrollTracker({
      pageSize: this.opts.pageSize,
      rollContent: this.opts.rollContent,
      disabled: this.opts.disableScrolling,
    });
  }

  /** Visual lines as of the last draw. */
  get lineCount(): number {
    return this.lines.length;
  }

  /** First visible line as of the last draw or navigation. */
  get firstLine(): number {
    return this.scroll.current;
  }

  /**
   * Append text. Newlines start new lines; spaces are kept; every other
   * control or whitespace rune is rejected.
   */
  write(text: string, opts: WriteOptions = {}): WriteResult {
    return this.exclusive("write", () => {
      const valid = validateText(text);
      if (!valid.ok) return valid;

      if (opts.replace === true) this.clear();
      const start = this.buffer.length;
      this.buffer.append(text);
      this.styles.record({
        start,
        end: start + text.length,
        style: opts.style ?? EMPTY_TEXT_STYLE,
      });
      this.dirty = true;
      return valid;
    });
  }

  /** Drop all content and return to the initial scroll position. */
  reset(): void {
    this.exclusive("reset", () => this.clear());
  }

  draw(canvas: CellCanvas): DrawResult {
    return this.exclusive("draw", () => this.drawLocked(canvas));
  }

  /** Apply a key press. Returns true when the key is bound to a scroll command. */
  keyboard(input: TextKeyInput): boolean {
    return this.exclusive("keyboard", () => this.apply(this.opts.keyActions.get(input.key)));
  }

  /** Apply a pointer event. Returns true when the button is bound to a scroll command. */
  mouse(input: TextMouseInput): boolean {
    return this.exclusive("mouse", () => this.apply(this.opts.mouseActions.get(input.button)));
  }

  capabilities(): WidgetCapabilities {
    const wantInput = !this.opts.disableScrolling;
    return Object.freeze({
      // At least one row with one cell.
      minimumSize: Object.freeze({ cols: 1, rows: 1 }),
      wantKeyboard: wantInput,
      wantMouse: wantInput,
    });
  }

  private exclusive<T>(method: string, run: () => T): T {
    if (this.busy !== null) {
      throwCode("GT_REENTRANT_CALL", `${method}: re-entrant call during ${this.busy}`);
    }
    this.busy = method;
    try {
      return run();
    } finally {
      this.busy = null;
    }
  }

  private clear(): void {
    this.buffer.reset();
    this.styles.reset();
    this.scroll.reset();
    this.lines = EMPTY_LINES;
    this.lastWidth = 0;
    this.dirty = true;
  }

  private apply(action: ScrollAction | undefined): boolean {
    if (action === undefined || this.opts.disableScrolling) return false;
    switch (action) {
      case "lineUp":
        this.scroll.upOneLine();
        break;
      case "lineDown":
        this.scroll.downOneLine();
        break;
      case "pageUp":
        this.scroll.upOnePage();
        break;
      case "pageDown":
        this.scroll.downOnePage();
        break;
    }
    return true;
  }

  private drawLocked(canvas: CellCanvas): DrawResult {
    const cols = canvas.width;
    const rows = canvas.height;
    if (!Number.isInteger(cols) || !Number.isInteger(rows) || cols < 1 || rows < 1) {
      const size = describeCanvasSize(cols, rows);
      warnTextIssue(
        this.warnCtx(),
        `zero-area:${size}`,
        `draw: canvas ${size} has no drawable area, nothing drawn`,
      );
      return NOTHING_DRAWN;
    }

    const layoutStartedAt = Date.now();
    const text = this.buffer.toString();
    const relayout = this.dirty || this.lastWidth !== cols;
    if (relayout) {
      this.lines = computeLines(text, cols, this.opts.wrap, this.opts.measureRune);
    }
    this.lastWidth = cols;
    const layoutMs = Date.now() - layoutStartedAt;

    const lineCount = this.lines.length;
    if (lineCount === 0) return NOTHING_DRAWN;

    const firstLine = this.scroll.firstLine(lineCount, rows);
    if (rows < MIN_ROWS_FOR_MARKERS && lineCount > rows) {
      warnTextIssue(
        this.warnCtx(),
        `markers-hidden:${String(rows)}`,
        `draw: ${String(lineCount)} lines overflow ${String(rows)} rows; scroll indicators need at least ${String(MIN_ROWS_FOR_MARKERS)} rows`,
      );
    }

    const drawStartedAt = Date.now();
    const rendered = renderText({
      text,
      lines: this.lines,
      styles: this.styles,
      fromLine: firstLine,
      canvas,
      wrap: this.opts.wrap,
      measureRune: this.opts.measureRune,
      ellipsis: this.opts.ellipsis,
    });
    if (!rendered.ok) return rendered;
    this.dirty = false;
    this.drawId += 1;

    const { cells, scrollUp, scrollDown } = rendered.value;
    const trace = this.opts.trace;
    if (trace) {
      trace(
        Object.freeze({
          drawId: this.drawId,
          cols,
          rows,
          lineCount,
          firstLine,
          relayout,
          cells,
          scrollUp,
          scrollDown,
          timings: Object.freeze({ layoutMs, drawMs: Date.now() - drawStartedAt }),
        }),
      );
    }

    return Object.freeze({
      ok: true,
      value: Object.freeze({ lineCount, firstLine, cells, scrollUp, scrollDown }),
    });
  }

  private warnCtx(): TextWarningContext {
    return { devMode: this.opts.devMode, warned: this.warned, warn: this.opts.warn };
  }
}

export function createTextWidget(opts: TextWidgetOptions = {}): TextWidget {
  return new TextWidget(opts);
}
