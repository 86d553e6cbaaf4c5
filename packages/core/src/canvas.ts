/**
 * Cell canvas contract consumed by widgets.
 *
 * All coordinates are in cell units (column, row) relative to the widget's
 * own area; `(0, 0)` is its top-left cell.
 */

import type { TextStyle } from "./style.js";

/**
 * Error codes for canvas write failures.
 *
 *   - OUT_OF_BOUNDS: position lies outside the canvas
 *   - DOES_NOT_FIT: the rune is wider than the cells left on the row
 *   - BAD_PARAMS: non-integer position or a rune that is not one scalar
 *   - HOST_ERROR: the host's own drawing layer failed
 */
export type CanvasWriteErrorCode = "OUT_OF_BOUNDS" | "DOES_NOT_FIT" | "BAD_PARAMS" | "HOST_ERROR";

export type CanvasWriteError = Readonly<{ code: CanvasWriteErrorCode; detail: string }>;

/** Cells occupied by a successful write, or the reason it failed. */
export type CanvasWriteResult =
  | Readonly<{ ok: true; cells: number }>
  | Readonly<{ ok: false; error: CanvasWriteError }>;

/**
 * Rectangular grid of cells a widget draws into.
 */
export interface CellCanvas {
  /** Columns available to the widget. */
  readonly width: number;
  /** Rows available to the widget. */
  readonly height: number;
  /**
   * Write one rune at `(x, y)` and report how many cells it occupied.
   * Wide runes occupy more than one cell; widgets never assume one.
   */
  setCell(x: number, y: number, rune: string, style?: TextStyle): CanvasWriteResult;
}
