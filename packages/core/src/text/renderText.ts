/**
 * packages/core/src/text/renderText.ts — Draw the visible window of text.
 *
 * Walks the buffer from the first visible line, writing one cell run per rune
 * and breaking rows at newlines and wrap points. Scroll indicators replace the
 * first and last rows when content is hidden above or below.
 *
 * Invariants:
 *   - Newlines are never drawn
 *   - The cursor advances by the cells the canvas reports, not by measurement
 *   - Indicator and ellipsis glyphs must occupy exactly one cell
 */

import type { CanvasWriteError, CellCanvas } from "../canvas.js";
import { throwCode } from "../errors.js";
import { type RuneWidthFn, runeAt, runeLength } from "../layout/textMeasure.js";
import { EMPTY_TEXT_STYLE } from "../style.js";
import { type WrapMode, runeCells, wrapNeeded } from "./lineIndex.js";
import type { StyleRange, StyleRangeIndex } from "./styleRanges.js";

/** Minimum canvas rows before scroll indicators are drawn. */
export const MIN_ROWS_FOR_MARKERS = 3;

export const SCROLL_UP_MARKER = "⇧";
export const SCROLL_DOWN_MARKER = "⇩";
export const TRIM_MARKER = "…";

export type RenderTextParams = Readonly<{
  text: string;
  lines: readonly number[];
  styles: StyleRangeIndex;
  fromLine: number;
  canvas: CellCanvas;
  wrap: WrapMode;
  measureRune: RuneWidthFn;
  /** Mark trimmed rows by replacing their last cell with an ellipsis. */
  ellipsis: boolean;
}>;

export type RenderTextStats = Readonly<{
  /** Runes written, excluding indicators and ellipses. */
  cells: number;
  scrollUp: boolean;
  scrollDown: boolean;
}>;

export type RenderTextResult =
  | Readonly<{ ok: true; value: RenderTextStats }>
  | Readonly<{ ok: false; error: CanvasWriteError }>;

type MarkerResult = Readonly<{ ok: true }> | Readonly<{ ok: false; error: CanvasWriteError }>;

const MARKER_OK: MarkerResult = Object.freeze({ ok: true });

function drawMarker(canvas: CellCanvas, x: number, y: number, glyph: string): MarkerResult {
  const res = canvas.setCell(x, y, glyph);
  if (!res.ok) return res;
  if (res.cells !== 1) {
    throwCode(
      "GT_INVARIANT_VIOLATION",
      `marker ${JSON.stringify(glyph)} at (${x}, ${y}) occupies ${res.cells} cells, only markers that occupy exactly one cell are supported`,
    );
  }
  return MARKER_OK;
}

export function renderText(params: RenderTextParams): RenderTextResult {
  const { text, lines, styles, fromLine, canvas, wrap, measureRune, ellipsis } = params;
  const width = canvas.width;
  const height = canvas.height;
  if (!Number.isInteger(fromLine) || fromLine < 0 || fromLine >= lines.length) {
    throwCode(
      "GT_INVALID_ARGUMENT",
      `renderText: fromLine must be an integer in [0, ${lines.length}) (got ${fromLine})`,
    );
  }

  let offset = lines[fromLine] ?? text.length;
  let x = 0;
  let y = 0;
  let cells = 0;
  let scrollUp = false;
  let scrollDown = false;

  if (height >= MIN_ROWS_FOR_MARKERS && fromLine > 0) {
    const drawn = drawMarker(canvas, 0, 0, SCROLL_UP_MARKER);
    if (!drawn.ok) return drawn;
    scrollUp = true;
    // The marker replaces the first visible line.
    offset = lines[fromLine + 1] ?? text.length;
    y = 1;
  }

  const hiddenBelow = height >= MIN_ROWS_FOR_MARKERS && height < lines.length - fromLine;
  let range: StyleRange | null = styles.rangeAt(offset);

  while (offset < text.length) {
    const rune = runeAt(text, offset);
    const next = offset + runeLength(text, offset);

    if (rune === "\n" || wrapNeeded(rune, x, width, wrap, measureRune)) {
      x = 0;
      y += 1;
    }

    if (hiddenBelow && y === height - 1) {
      const drawn = drawMarker(canvas, 0, y, SCROLL_DOWN_MARKER);
      if (!drawn.ok) return drawn;
      scrollDown = true;
      break;
    }
    if (y >= height) break;

    if (rune === "\n") {
      offset = next;
      continue;
    }

    if (wrap === "none") {
      const rw = runeCells(rune, measureRune);
      if (x > width - rw) {
        if (ellipsis && x >= 1 && x <= width) {
          const drawn = drawMarker(canvas, x - 1, y, TRIM_MARKER);
          if (!drawn.ok) return drawn;
        }
        // Keep advancing so the rest of the row stays trimmed.
        x += rw;
        offset = next;
        continue;
      }
    }

    if (range === null || offset >= range.end) range = styles.rangeAt(offset);
    const res = canvas.setCell(x, y, rune, range?.style ?? EMPTY_TEXT_STYLE);
    if (!res.ok) return res;
    cells += 1;
    x += res.cells;
    offset = next;
  }

  return Object.freeze({
    ok: true,
    value: Object.freeze({ cells, scrollUp, scrollDown }),
  });
}
