/**
 * packages/core/src/keybindings/keyCodes.ts — Numeric key codes.
 *
 * Special keys use small reserved codes; printable keys use their ASCII
 * codepoint, with letters folded to upper case so "k" and "K" bind the same key.
 */

export const KEY_ESCAPE = 1;
export const KEY_ENTER = 2;
export const KEY_TAB = 3;
export const KEY_BACKSPACE = 4;
export const KEY_INSERT = 10;
export const KEY_DELETE = 11;
export const KEY_HOME = 12;
export const KEY_END = 13;
export const KEY_PAGE_UP = 14;
export const KEY_PAGE_DOWN = 15;
export const KEY_UP = 20;
export const KEY_DOWN = 21;
export const KEY_LEFT = 22;
export const KEY_RIGHT = 23;
export const KEY_SPACE = 32;

/** Lowercase key names accepted in configuration. */
export const KEY_NAME_TO_CODE: ReadonlyMap<string, number> = new Map<string, number>([
  ["escape", KEY_ESCAPE],
  ["esc", KEY_ESCAPE],
  ["enter", KEY_ENTER],
  ["return", KEY_ENTER],
  ["tab", KEY_TAB],
  ["backspace", KEY_BACKSPACE],
  ["insert", KEY_INSERT],
  ["delete", KEY_DELETE],
  ["home", KEY_HOME],
  ["end", KEY_END],
  ["pageup", KEY_PAGE_UP],
  ["pgup", KEY_PAGE_UP],
  ["pagedown", KEY_PAGE_DOWN],
  ["pgdn", KEY_PAGE_DOWN],
  ["up", KEY_UP],
  ["down", KEY_DOWN],
  ["left", KEY_LEFT],
  ["right", KEY_RIGHT],
  ["space", KEY_SPACE],
]);

/**
 * Key code of a single printable ASCII character, or null.
 */
export function charToKeyCode(ch: string): number | null {
  if (ch.length !== 1) return null;
  const code = ch.toUpperCase().charCodeAt(0);
  if (code < 0x21 || code > 0x7e) return null;
  return code;
}

/**
 * Resolve a configured key (numeric code or name) to its code.
 * Returns null for unknown names and non-integer codes.
 */
export function resolveKeyCode(key: number | string): number | null {
  if (typeof key === "number") {
    return Number.isInteger(key) && key > 0 ? key : null;
  }
  if (key.length === 1) return charToKeyCode(key);
  return KEY_NAME_TO_CODE.get(key.toLowerCase()) ?? null;
}
