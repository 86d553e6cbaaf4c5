/**
 * packages/core/src/text/options.ts — Text widget configuration.
 *
 * Why: Options are validated and frozen once at construction; the widget's
 * policy never changes afterwards, so layout caches stay valid.
 */

import { throwCode } from "../errors.js";
import { KEY_DOWN, KEY_PAGE_DOWN, KEY_PAGE_UP, KEY_UP, resolveKeyCode } from "../keybindings/keyCodes.js";
import { type RuneWidthFn, measureRuneCells } from "../layout/textMeasure.js";
import type { TextStyle } from "../style.js";
import type { WrapMode } from "./lineIndex.js";

/** Mouse buttons a host reports, wheel directions included. */
export type MouseButton = "left" | "middle" | "right" | "release" | "wheelUp" | "wheelDown";

export const MOUSE_BUTTONS: readonly MouseButton[] = Object.freeze([
  "left",
  "middle",
  "right",
  "release",
  "wheelUp",
  "wheelDown",
]);

/** Navigation commands the widget responds to. */
export type ScrollAction = "lineUp" | "lineDown" | "pageUp" | "pageDown";

/** Key bindings, as key codes or key names ("up", "pgdn", "k"). */
export type ScrollKeys = Readonly<{
  up: number | string;
  down: number | string;
  pageUp: number | string;
  pageDown: number | string;
}>;

export type ScrollMouseButtons = Readonly<{
  up: MouseButton;
  down: MouseButton;
}>;

/** Emitted after every successful draw that reached the renderer. */
export type TextDrawTraceEvent = Readonly<{
  drawId: number;
  cols: number;
  rows: number;
  lineCount: number;
  firstLine: number;
  /** Whether the line index was recomputed for this draw. */
  relayout: boolean;
  cells: number;
  scrollUp: boolean;
  scrollDown: boolean;
  timings: Readonly<{ layoutMs: number; drawMs: number }>;
}>;

export type TextWidgetOptions = Readonly<{
  /** How lines wider than the canvas are handled. Default "none" (trim). */
  wrap?: WrapMode;
  /** Keep the newest lines visible as content grows. Default false. */
  rollContent?: boolean;
  /** Ignore navigation and declare no interest in keyboard or mouse input. */
  disableScrolling?: boolean;
  scrollKeys?: ScrollKeys;
  scrollMouseButtons?: ScrollMouseButtons;
  /** Lines moved by a page step. Defaults to the canvas height. */
  pageSize?: number;
  /** Replace the last visible cell of a trimmed row with an ellipsis. */
  ellipsis?: boolean;
  /** Width of one rune in cells. */
  measureRune?: RuneWidthFn;
  trace?: (event: TextDrawTraceEvent) => void;
  /** Emit deduplicated warnings about suspicious geometry through `warn`. */
  devMode?: boolean;
  warn?: (message: string) => void;
}>;

/** Per-write options; they apply to exactly the text of that call. */
export type WriteOptions = Readonly<{
  style?: TextStyle;
  /** Drop the current content before writing. */
  replace?: boolean;
}>;

export type ResolvedTextWidgetOptions = Readonly<{
  wrap: WrapMode;
  rollContent: boolean;
  disableScrolling: boolean;
  keyActions: ReadonlyMap<number, ScrollAction>;
  mouseActions: ReadonlyMap<MouseButton, ScrollAction>;
  pageSize: number | undefined;
  ellipsis: boolean;
  measureRune: RuneWidthFn;
  trace: ((event: TextDrawTraceEvent) => void) | undefined;
  devMode: boolean;
  warn: (message: string) => void;
}>;

export const DEFAULT_SCROLL_KEYS: ScrollKeys = Object.freeze({
  up: KEY_UP,
  down: KEY_DOWN,
  pageUp: KEY_PAGE_UP,
  pageDown: KEY_PAGE_DOWN,
});

export const DEFAULT_SCROLL_MOUSE_BUTTONS: ScrollMouseButtons = Object.freeze({
  up: "wheelUp",
  down: "wheelDown",
});

function invalid(detail: string): never {
  throwCode("GT_INVALID_OPTIONS", `createTextWidget: ${detail}`);
}

function resolveKeyActions(keys: ScrollKeys): ReadonlyMap<number, ScrollAction> {
  const entries: ReadonlyArray<readonly [number | string, ScrollAction]> = [
    [keys.up, "lineUp"],
    [keys.down, "lineDown"],
    [keys.pageUp, "pageUp"],
    [keys.pageDown, "pageDown"],
  ];
  const table = new Map<number, ScrollAction>();
  for (const [key, action] of entries) {
    const code = resolveKeyCode(key);
    if (code === null) invalid(`unknown key ${JSON.stringify(key)} for ${action}`);
    if (table.has(code)) {
      invalid(
        `scroll keys must be distinct (up: ${String(keys.up)}, down: ${String(keys.down)}, pageUp: ${String(keys.pageUp)}, pageDown: ${String(keys.pageDown)})`,
      );
    }
    table.set(code, action);
  }
  return table;
}

function resolveMouseActions(buttons: ScrollMouseButtons): ReadonlyMap<MouseButton, ScrollAction> {
  for (const button of [buttons.up, buttons.down]) {
    if (!MOUSE_BUTTONS.includes(button)) invalid(`unknown mouse button ${JSON.stringify(button)}`);
  }
  if (buttons.up === buttons.down) {
    invalid(`scroll mouse buttons must be distinct (up: ${buttons.up}, down: ${buttons.down})`);
  }
  return new Map<MouseButton, ScrollAction>([
    [buttons.up, "lineUp"],
    [buttons.down, "lineDown"],
  ]);
}

function defaultWarn(message: string): void {
  console.warn(message);
}

export function resolveTextWidgetOptions(opts: TextWidgetOptions = {}): ResolvedTextWidgetOptions {
  const wrap = opts.wrap ?? "none";
  if (wrap !== "none" && wrap !== "runes") {
    invalid(`wrap must be "none" or "runes" (got ${JSON.stringify(wrap)})`);
  }
  const pageSize = opts.pageSize;
  if (pageSize !== undefined && (!Number.isInteger(pageSize) || pageSize < 1)) {
    invalid(`pageSize must be an integer >= 1 (got ${pageSize})`);
  }

  return Object.freeze({
    wrap,
    rollContent: opts.rollContent === true,
    disableScrolling: opts.disableScrolling === true,
    keyActions: resolveKeyActions(opts.scrollKeys ?? DEFAULT_SCROLL_KEYS),
    mouseActions: resolveMouseActions(opts.scrollMouseButtons ?? DEFAULT_SCROLL_MOUSE_BUTTONS),
    pageSize,
    ellipsis: opts.ellipsis === true,
    measureRune: opts.measureRune ?? measureRuneCells,
    trace: opts.trace,
    devMode: opts.devMode === true,
    warn: opts.warn ?? defaultWarn,
  });
}
