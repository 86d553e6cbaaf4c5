/**
 * packages/core/src/text/validate.ts — Validation of written text.
 *
 * Only plain spaces and newlines may carry structure: tabs, carriage returns
 * and other control or whitespace runes are rejected so layout never has to
 * interpret them.
 */

import { runeAt, runeLength } from "../layout/textMeasure.js";

export type TextValidationErrorCode = "EMPTY_TEXT" | "CONTROL_CHARACTER" | "SPACE_CHARACTER";

/** Structured validation failure. `offset` locates the offending rune. */
export type TextValidationError = Readonly<{
  code: TextValidationErrorCode;
  offset: number;
  detail: string;
}>;

export type TextValidationResult =
  | Readonly<{ ok: true }>
  | Readonly<{ ok: false; error: TextValidationError }>;

const CONTROL_RE = /^\p{Cc}$/u;
const SPACE_RE = /^\p{White_Space}$/u;

const OK: TextValidationResult = Object.freeze({ ok: true });

function fail(code: TextValidationErrorCode, offset: number, detail: string): TextValidationResult {
  return Object.freeze({ ok: false, error: Object.freeze({ code, offset, detail }) });
}

export function validateText(text: string): TextValidationResult {
  if (text.length === 0) {
    return fail("EMPTY_TEXT", 0, "the text cannot be empty");
  }

  for (let i = 0; i < text.length; i += runeLength(text, i)) {
    const rune = runeAt(text, i);
    if (rune === " " || rune === "\n") continue;
    if (CONTROL_RE.test(rune)) {
      return fail(
        "CONTROL_CHARACTER",
        i,
        `the provided text ${JSON.stringify(text)} cannot contain control characters, found: ${JSON.stringify(rune)}`,
      );
    }
    if (SPACE_RE.test(rune)) {
      return fail(
        "SPACE_CHARACTER",
        i,
        `the provided text ${JSON.stringify(text)} cannot contain space character ${JSON.stringify(rune)}`,
      );
    }
  }
  return OK;
}
