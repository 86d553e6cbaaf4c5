/**
 * packages/core/src/text/lineIndex.ts — Visual line starts.
 *
 * Why: Scrolling works in visual lines, which depend on the canvas width once
 * wrapping is enabled. The index is a pure function of its inputs so the
 * widget can cache it until text is appended or the width changes.
 */

import { throwCode } from "../errors.js";
import { type RuneWidthFn, measureRuneCells, runeAt, runeLength } from "../layout/textMeasure.js";

/**
 * How lines longer than the canvas width are handled.
 *
 * - "none": lines are only broken at newlines and trimmed at draw time.
 * - "runes": lines also break before the rune that would overflow the width.
 */
export type WrapMode = "none" | "runes";

/**
 * Cells a rune other than a newline takes on a row. A canvas stores one rune
 * per cell, so runes the width hook measures as zero still take one.
 */
export function runeCells(rune: string, measureRune: RuneWidthFn): number {
  return Math.max(1, measureRune(rune));
}

/**
 * True when `rune` cannot be placed at column `x` on a row `width` cells wide
 * and must start a new visual line. The first rune of a line never wraps.
 */
export function wrapNeeded(
  rune: string,
  x: number,
  width: number,
  wrap: WrapMode,
  measureRune: RuneWidthFn,
): boolean {
  if (wrap !== "runes" || x === 0) return false;
  return x + runeCells(rune, measureRune) > width;
}

/**
 * Offsets (UTF-16 code units) at which each visual line of `text` begins.
 *
 * A newline ends its line and is not part of the next one; a trailing newline
 * does not open an empty final line.
 */
export function computeLines(
  text: string,
  width: number,
  wrap: WrapMode,
  measureRune: RuneWidthFn = measureRuneCells,
): readonly number[] {
  if (!Number.isInteger(width) || width < 1) {
    throwCode("GT_INVALID_ARGUMENT", `computeLines: width must be an integer >= 1 (got ${width})`);
  }
  if (text.length === 0) return Object.freeze([]);

  const lines: number[] = [0];
  let x = 0;
  for (let i = 0; i < text.length; ) {
    const rune = runeAt(text, i);
    const next = i + runeLength(text, i);

    if (rune === "\n") {
      if (next < text.length) lines.push(next);
      x = 0;
      i = next;
      continue;
    }

    if (wrapNeeded(rune, x, width, wrap, measureRune)) {
      lines.push(i);
      x = 0;
    }
    x += runeCells(rune, measureRune);
    i = next;
  }
  return Object.freeze(lines);
}
