/**
 * packages/core/src/layout/textMeasure.ts — Rune width in terminal cells.
 *
 * Width rules (string-width):
 *   - ASCII printable: 1 cell
 *   - East Asian wide and full-width: 2 cells
 *   - Combining marks and zero-width format characters: 0 cells
 *
 * Layout never assumes this table matches the host canvas: the widget takes
 * the width hook as an option and the renderer advances by what the canvas
 * reports.
 */

import stringWidth from "string-width";

/** Width of one rune in cells. */
export type RuneWidthFn = (rune: string) => number;

const REPLACEMENT_CHARACTER = "\ufffd";

/** Cache for measured runes outside ASCII. */
const runeWidthCache = new Map<string, number>();

/** Maximum number of cached runes before the cache is cleared. */
const RUNE_CACHE_MAX_SIZE = 4096;

/**
 * Default rune width hook.
 */
export function measureRuneCells(rune: string): number {
  const code = rune.charCodeAt(0);
  if (rune.length === 1 && code >= 0x20 && code < 0x7f) return 1;

  const cached = runeWidthCache.get(rune);
  if (cached !== undefined) return cached;

  const width = stringWidth(rune);
  if (runeWidthCache.size >= RUNE_CACHE_MAX_SIZE) runeWidthCache.clear();
  runeWidthCache.set(rune, width);
  return width;
}

/**
 * The rune starting at `offset`, as a one or two code unit string.
 * Unpaired surrogates decode to U+FFFD but still span one code unit, so the
 * caller always advances by `runeLength(text, offset)`.
 */
export function runeAt(text: string, offset: number): string {
  const cp = text.codePointAt(offset);
  if (cp === undefined) return "";
  if (cp >= 0xd800 && cp <= 0xdfff) return REPLACEMENT_CHARACTER;
  return String.fromCodePoint(cp);
}

/** Number of code units of the rune starting at `offset`. */
export function runeLength(text: string, offset: number): number {
  const cp = text.codePointAt(offset);
  if (cp === undefined) return 0;
  return cp > 0xffff ? 2 : 1;
}

/** Total width of a string, one rune at a time. */
export function measureTextCells(text: string, measureRune: RuneWidthFn = measureRuneCells): number {
  let width = 0;
  for (let i = 0; i < text.length; i += runeLength(text, i)) {
    width += measureRune(runeAt(text, i));
  }
  return width;
}
