import { assert, describe, test } from "@gridtext/testkit";
import { GridTextError } from "../../errors.js";
import { KEY_DOWN, KEY_PAGE_DOWN, KEY_PAGE_UP, KEY_UP } from "../../keybindings/keyCodes.js";
import { measureRuneCells } from "../../layout/textMeasure.js";
import {
  type ScrollMouseButtons,
  type TextWidgetOptions,
  resolveTextWidgetOptions,
} from "../options.js";
import { createTextWidget } from "../textWidget.js";

function invalidOptions(message: string) {
  return (err: unknown): boolean =>
    err instanceof GridTextError && err.code === "GT_INVALID_OPTIONS" && err.message === message;
}

describe("resolveTextWidgetOptions", () => {
  test("fills in defaults", () => {
    const opts = resolveTextWidgetOptions();
    assert.equal(opts.wrap, "none");
    assert.equal(opts.rollContent, false);
    assert.equal(opts.disableScrolling, false);
    assert.equal(opts.ellipsis, false);
    assert.equal(opts.devMode, false);
    assert.equal(opts.pageSize, undefined);
    assert.equal(opts.trace, undefined);
    assert.equal(opts.measureRune, measureRuneCells);
    assert.deepEqual(
      [...opts.keyActions],
      [
        [KEY_UP, "lineUp"],
        [KEY_DOWN, "lineDown"],
        [KEY_PAGE_UP, "pageUp"],
        [KEY_PAGE_DOWN, "pageDown"],
      ],
    );
    assert.deepEqual(
      [...opts.mouseActions],
      [
        ["wheelUp", "lineUp"],
        ["wheelDown", "lineDown"],
      ],
    );
    assert.ok(Object.isFrozen(opts));
  });

  test("resolves key names and characters", () => {
    const opts = resolveTextWidgetOptions({
      scrollKeys: { up: "k", down: "J", pageUp: "PageUp", pageDown: KEY_PAGE_DOWN },
    });
    assert.equal(opts.keyActions.get(75), "lineUp");
    assert.equal(opts.keyActions.get(74), "lineDown");
    assert.equal(opts.keyActions.get(KEY_PAGE_UP), "pageUp");
    assert.equal(opts.keyActions.get(KEY_PAGE_DOWN), "pageDown");
    assert.equal(opts.keyActions.get(KEY_UP), undefined);
  });

  test("rejects unknown keys", () => {
    assert.throws(
      () =>
        resolveTextWidgetOptions({
          scrollKeys: { up: "hyper", down: KEY_DOWN, pageUp: KEY_PAGE_UP, pageDown: KEY_PAGE_DOWN },
        }),
      invalidOptions('createTextWidget: unknown key "hyper" for lineUp'),
    );
    assert.throws(
      () =>
        resolveTextWidgetOptions({
          scrollKeys: { up: KEY_UP, down: 1.5, pageUp: KEY_PAGE_UP, pageDown: KEY_PAGE_DOWN },
        }),
      invalidOptions("createTextWidget: unknown key 1.5 for lineDown"),
    );
  });

  test("rejects keys bound to more than one command", () => {
    assert.throws(
      () =>
        createTextWidget({
          scrollKeys: { up: KEY_UP, down: "up", pageUp: KEY_PAGE_UP, pageDown: KEY_PAGE_DOWN },
        }),
      invalidOptions(
        "createTextWidget: scroll keys must be distinct (up: 20, down: up, pageUp: 14, pageDown: 15)",
      ),
    );
  });

  test("rejects identical mouse buttons", () => {
    assert.throws(
      () => createTextWidget({ scrollMouseButtons: { up: "left", down: "left" } }),
      invalidOptions("createTextWidget: scroll mouse buttons must be distinct (up: left, down: left)"),
    );
  });

  test("rejects options decoded from untyped configuration", () => {
    const buttons: ScrollMouseButtons = JSON.parse('{"up":"wheelUp","down":"scroll"}');
    assert.throws(
      () => resolveTextWidgetOptions({ scrollMouseButtons: buttons }),
      invalidOptions('createTextWidget: unknown mouse button "scroll"'),
    );

    const wrapped: TextWidgetOptions = JSON.parse('{"wrap":"words"}');
    assert.throws(
      () => resolveTextWidgetOptions(wrapped),
      invalidOptions('createTextWidget: wrap must be "none" or "runes" (got "words")'),
    );
  });

  test("rejects page sizes that are not positive integers", () => {
    assert.throws(
      () => resolveTextWidgetOptions({ pageSize: 0 }),
      invalidOptions("createTextWidget: pageSize must be an integer >= 1 (got 0)"),
    );
    assert.throws(
      () => resolveTextWidgetOptions({ pageSize: 2.5 }),
      invalidOptions("createTextWidget: pageSize must be an integer >= 1 (got 2.5)"),
    );
    assert.equal(resolveTextWidgetOptions({ pageSize: 3 }).pageSize, 3);
  });

  test("defaults warnings to the console", () => {
    const opts = resolveTextWidgetOptions({ devMode: true });
    assert.equal(opts.devMode, true);
    assert.equal(typeof opts.warn, "function");
  });
});
