/**
 * @gridtext/core
 *
 * Scrollable text display for character-cell canvases.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { GridTextError, type GridTextErrorCode } from "./errors.js";

// =============================================================================
// Canvas contract and styles
// =============================================================================

export type {
  CanvasWriteError,
  CanvasWriteErrorCode,
  CanvasWriteResult,
  CellCanvas,
} from "./canvas.js";
export { EMPTY_TEXT_STYLE, rgb, type Rgb24, type TextStyle, type UnderlineStyle } from "./style.js";

// =============================================================================
// Keys and measurement
// =============================================================================

export {
  KEY_BACKSPACE,
  KEY_DELETE,
  KEY_DOWN,
  KEY_END,
  KEY_ENTER,
  KEY_ESCAPE,
  KEY_HOME,
  KEY_INSERT,
  KEY_LEFT,
  KEY_NAME_TO_CODE,
  KEY_PAGE_DOWN,
  KEY_PAGE_UP,
  KEY_RIGHT,
  KEY_SPACE,
  KEY_TAB,
  KEY_UP,
  charToKeyCode,
  resolveKeyCode,
} from "./keybindings/keyCodes.js";
export {
  measureRuneCells,
  measureTextCells,
  runeAt,
  runeLength,
  type RuneWidthFn,
} from "./layout/textMeasure.js";

// =============================================================================
// Text widget
// =============================================================================

export {
  TextWidget,
  createTextWidget,
  type DrawResult,
  type TextDrawStats,
  type TextKeyInput,
  type TextMouseInput,
  type WidgetCapabilities,
  type WriteResult,
} from "./text/textWidget.js";
export {
  DEFAULT_SCROLL_KEYS,
  DEFAULT_SCROLL_MOUSE_BUTTONS,
  MOUSE_BUTTONS,
  resolveTextWidgetOptions,
  type MouseButton,
  type ResolvedTextWidgetOptions,
  type ScrollAction,
  type ScrollKeys,
  type ScrollMouseButtons,
  type TextDrawTraceEvent,
  type TextWidgetOptions,
  type WriteOptions,
} from "./text/options.js";
export { computeLines, runeCells, wrapNeeded, type WrapMode } from "./text/lineIndex.js";
export { StyleRangeIndex, type StyleRange } from "./text/styleRanges.js";
export { ScrollTracker, type ScrollTrackerOptions } from "./text/scrollTracker.js";
export { TextBuffer } from "./text/textBuffer.js";
export {
  MIN_ROWS_FOR_MARKERS,
  SCROLL_DOWN_MARKER,
  SCROLL_UP_MARKER,
  TRIM_MARKER,
  renderText,
  type RenderTextParams,
  type RenderTextResult,
  type RenderTextStats,
} from "./text/renderText.js";
export {
  validateText,
  type TextValidationError,
  type TextValidationErrorCode,
  type TextValidationResult,
} from "./text/validate.js";
