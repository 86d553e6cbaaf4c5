import { assert, describe, test } from "@gridtext/testkit";
import { EMPTY_TEXT_STYLE } from "../../style.js";
import { createCellGrid } from "../cellGrid.js";

describe("createCellGrid", () => {
  test("unwritten cells read as spaces", () => {
    const grid = createCellGrid(3, 2);
    assert.equal(grid.toText(), "   \n   ");
    assert.equal(grid.cellAt(0, 0), null);
  });

  test("records writes with their style", () => {
    const grid = createCellGrid(3, 1);
    assert.deepEqual(grid.setCell(1, 0, "x"), { ok: true, cells: 1 });
    assert.deepEqual(grid.cellAt(1, 0), { rune: "x", style: EMPTY_TEXT_STYLE });
    assert.deepEqual(grid.writes, [{ x: 1, y: 0, rune: "x", style: EMPTY_TEXT_STYLE }]);
    assert.equal(grid.rowText(0), " x ");
  });

  test("wide runes occupy two cells", () => {
    const grid = createCellGrid(3, 1);
    assert.deepEqual(grid.setCell(0, 0, "中"), { ok: true, cells: 2 });
    assert.deepEqual(grid.cellAt(1, 0), { rune: "", style: EMPTY_TEXT_STYLE });
    assert.equal(grid.rowText(0), "中 ");
  });

  test("rejects writes outside the canvas", () => {
    const grid = createCellGrid(3, 2);
    assert.deepEqual(grid.setCell(3, 0, "x"), {
      ok: false,
      error: { code: "OUT_OF_BOUNDS", detail: "setCell: position (3, 0) is outside the 3x2 canvas" },
    });
    assert.equal(grid.setCell(0, -1, "x").ok, false);
  });

  test("rejects wide runes that do not fit the row", () => {
    const grid = createCellGrid(3, 1);
    const res = grid.setCell(2, 0, "中");
    assert.equal(res.ok ? null : res.error.code, "DOES_NOT_FIT");
    assert.equal(grid.writes.length, 0);
  });

  test("rejects bad parameters", () => {
    const grid = createCellGrid(3, 1);
    const frac = grid.setCell(0.5, 0, "x");
    assert.equal(frac.ok ? null : frac.error.code, "BAD_PARAMS");
    const multi = grid.setCell(0, 0, "ab");
    assert.equal(multi.ok ? null : multi.error.code, "BAD_PARAMS");
    const empty = grid.setCell(0, 0, "");
    assert.equal(empty.ok ? null : empty.error.code, "BAD_PARAMS");
    assert.equal(grid.setCell(0, 0, "😀").ok, true);
  });

  test("clear forgets cells and writes", () => {
    const grid = createCellGrid(2, 1);
    grid.setCell(0, 0, "a");
    grid.clear();
    assert.equal(grid.rowText(0), "  ");
    assert.equal(grid.writes.length, 0);
  });

  test("uses the provided width function", () => {
    const grid = createCellGrid(4, 1, { measureRune: () => 2 });
    assert.deepEqual(grid.setCell(0, 0, "a"), { ok: true, cells: 2 });
  });
});
