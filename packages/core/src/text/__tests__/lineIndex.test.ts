import { assert, describe, test } from "@gridtext/testkit";
import { GridTextError } from "../../errors.js";
import { computeLines, runeCells, wrapNeeded } from "../lineIndex.js";

function isInvalidArgument(err: unknown): boolean {
  return err instanceof GridTextError && err.code === "GT_INVALID_ARGUMENT";
}

describe("computeLines", () => {
  test("empty text has no lines", () => {
    assert.deepEqual(computeLines("", 5, "runes"), []);
  });

  test("each newline starts a line at the following character", () => {
    assert.deepEqual(computeLines("ab\ncd", 5, "runes"), [0, 3]);
  });

  test("text without a trailing newline ends with its own line", () => {
    assert.deepEqual(computeLines("ab\ncd\nef", 10, "none"), [0, 3, 6]);
  });

  test("a trailing newline does not open an empty line", () => {
    assert.deepEqual(computeLines("ab\n", 5, "none"), [0]);
  });

  test("consecutive newlines produce empty lines", () => {
    assert.deepEqual(computeLines("\n\nx", 5, "none"), [0, 1, 2]);
  });

  test("wrapping splits long lines at the canvas width", () => {
    assert.deepEqual(computeLines("abcdef", 3, "runes"), [0, 3]);
    assert.deepEqual(computeLines("abcdefg", 3, "runes"), [0, 3, 6]);
  });

  test("without wrapping long lines stay whole", () => {
    assert.deepEqual(computeLines("abcdef", 3, "none"), [0]);
  });

  test("newlines reset the wrap column", () => {
    assert.deepEqual(computeLines("abc\nabcd", 3, "runes"), [0, 4, 7]);
  });

  test("wide runes wrap when they would overflow", () => {
    assert.deepEqual(computeLines("a中b", 2, "runes"), [0, 1, 2]);
  });

  test("a rune wider than the canvas does not produce empty lines", () => {
    assert.deepEqual(computeLines("中中", 1, "runes"), [0, 1]);
  });

  test("offsets count UTF-16 code units", () => {
    assert.deepEqual(computeLines("😀😀", 3, "runes"), [0, 2]);
  });

  test("uses the injected width hook", () => {
    assert.deepEqual(computeLines("abcd", 4, "runes", () => 2), [0, 2]);
  });

  test("is deterministic", () => {
    const text = "lorem ipsum\ndolor sit amet 中文 😀\n\nconsectetur";
    assert.deepEqual(computeLines(text, 7, "runes"), computeLines(text, 7, "runes"));
  });

  test("zero-width runes take one cell", () => {
    assert.deepEqual(computeLines("abc\u0301", 3, "runes"), [0, 3]);
    assert.deepEqual(computeLines("ab\u0301c\nd\ne", 3, "runes"), [0, 3, 5, 7]);
    assert.deepEqual(computeLines("a\u200bb", 2, "runes"), [0, 2]);
  });

  test("rejects widths below one", () => {
    assert.throws(() => computeLines("abc", 0, "runes"), isInvalidArgument);
    assert.throws(() => computeLines("abc", -3, "none"), isInvalidArgument);
    assert.throws(() => computeLines("abc", 1.5, "none"), isInvalidArgument);
  });
});

describe("wrapNeeded", () => {
  const one = (): number => 1;

  test("never wraps without rune wrapping", () => {
    assert.equal(wrapNeeded("a", 10, 3, "none", one), false);
  });

  test("never wraps the first rune of a line", () => {
    assert.equal(wrapNeeded("a", 0, 1, "runes", () => 5), false);
  });

  test("wraps when the rune would pass the width", () => {
    assert.equal(wrapNeeded("a", 3, 3, "runes", one), true);
    assert.equal(wrapNeeded("a", 2, 3, "runes", one), false);
  });

  test("wraps a zero-width rune at the end of a full row", () => {
    assert.equal(wrapNeeded("\u0301", 3, 3, "runes", () => 0), true);
  });
});

describe("runeCells", () => {
  test("keeps the measured width of visible runes", () => {
    assert.equal(runeCells("a", () => 1), 1);
    assert.equal(runeCells("中", () => 2), 2);
  });

  test("gives zero-width runes one cell", () => {
    assert.equal(runeCells("\u0301", () => 0), 1);
  });
});
