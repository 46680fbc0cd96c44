import { assert, describe, test } from "@cellsketch/testkit";
import {
  center,
  charCount,
  indent,
  maxCharCount,
  padEnd,
  padStart,
  splitPad,
  truncate,
} from "../textMeasure.js";

describe("textMeasure", () => {
  test("counts code points, not UTF-16 units", () => {
    assert.equal(charCount("abc"), 3);
    assert.equal(charCount("█▉▊"), 3);
    assert.equal(charCount("𝔸b"), 2);
    assert.equal(maxCharCount(["a", "𝔸𝔸𝔸", ""]), 3);
    assert.equal(maxCharCount([]), 0);
  });

  test("truncate keeps whole code points", () => {
    assert.equal(truncate("𝔸𝔸𝔸", 2), "𝔸𝔸");
    assert.equal(truncate("abc", 5), "abc");
    assert.equal(truncate("abc", 0), "");
  });

  test("padding is measured in cells", () => {
    assert.equal(padEnd("𝔸", 3), "𝔸  ");
    assert.equal(padStart("7", 3), "  7");
    assert.equal(padEnd("toolong", 3), "toolong");
  });

  test("center puts the odd cell on the right", () => {
    assert.deepEqual(splitPad(5), { left: 2, right: 3 });
    assert.deepEqual(splitPad(-2), { left: 0, right: 0 });
    assert.equal(center("ab", 5), " ab  ");
    assert.equal(center("x", 4, "═"), "═x══");
    assert.equal(center("wide", 2), "wide");
  });

  test("indent ignores non-positive offsets", () => {
    assert.equal(indent("a", 2), "  a");
    assert.equal(indent("a", 0), "a");
    assert.equal(indent("a", -3), "a");
  });
});
