/**
 * Cell styling types and helpers.
 */

/** Packed RGB color (0x00RRGGBB). Value 0 is reserved as default/unset sentinel. */
export type Rgb24 = number;

/** Underline style variants. */
export type UnderlineStyle = "none" | "straight" | "double" | "curly" | "dotted" | "dashed";

/** Attributes a host canvas applies to a written cell. */
export type TextStyle = Readonly<{
  fg?: Rgb24;
  bg?: Rgb24;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  inverse?: boolean;
  strikethrough?: boolean;
  blink?: boolean;
  underlineStyle?: UnderlineStyle | undefined;
}>;

/** Style of text written without attributes. */
export const EMPTY_TEXT_STYLE: TextStyle = Object.freeze({});

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

/** Create a packed RGB color value. Note: `rgb(0, 0, 0)` encodes sentinel `0`. */
export function rgb(r: number, g: number, b: number): Rgb24 {
  const rr = clampChannel(r);
  const gg = clampChannel(g);
  const bb = clampChannel(b);
  return ((rr & 0xff) << 16) | ((gg & 0xff) << 8) | (bb & 0xff);
}
