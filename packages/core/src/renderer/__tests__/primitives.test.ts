import { assert, assertLines, assertRectangular, createRng, describe, test } from "@cellsketch/testkit";
import { BOX_STYLES } from "../boxGlyphs.js";
import {
  renderArrow,
  renderBox,
  renderComment,
  renderFrame,
  renderTitle,
} from "../primitives.js";

describe("renderBox", () => {
  test("explicit width centers content", () => {
    const box = renderBox(["Hi"], { width: 8 });
    assertLines(box.lines, ["┌──────┐", "│  Hi  │", "└──────┘"]);
    assert.equal(box.width, 8);
  });

  test("fits the longest line when no width is given", () => {
    assertLines(renderBox(["abc"]).lines, ["┌─────┐", "│ abc │", "└─────┘"]);
  });

  test("odd remainders put the extra cell on the right", () => {
    assertLines(renderBox(["ab", "abcde"]).lines, [
      "┌───────┐",
      "│  ab   │",
      "│ abcde │",
      "└───────┘",
    ]);
  });

  test("connectors split the border run left-light", () => {
    assertLines(renderBox(["abcd"], { topConnector: true, bottomConnector: true }).lines, [
      "┌──┬───┐",
      "│ abcd │",
      "└──┴───┘",
    ]);
  });

  test("content wider than an explicit width is truncated", () => {
    assertLines(renderBox(["abcdef"], { width: 6 }).lines, ["┌────┐", "│ ab │", "└────┘"]);
  });

  test("padding 0 hugs the content", () => {
    assertLines(renderBox(["ab"], { padding: 0 }).lines, ["┌──┐", "│ab│", "└──┘"]);
  });

  test("uses the glyphs of the given style", () => {
    assertLines(renderBox(["x"], { style: BOX_STYLES.double }).lines, [
      "╔═══╗",
      "║ x ║",
      "╚═══╝",
    ]);
  });

  test("empty content renders one blank row", () => {
    assertLines(renderBox([]).lines, ["┌──┐", "│  │", "└──┘"]);
  });

  test("every rendered box is rectangular", () => {
    const rng = createRng(0xb0c5);
    const alphabet = "abcXYZ 012é→";
    for (let i = 0; i < 200; i++) {
      const lines = Array.from({ length: rng.int(1, 4) }, () =>
        Array.from({ length: rng.int(0, 12) }, () => alphabet[rng.int(0, alphabet.length - 1)]).join(
          "",
        ),
      );
      const box = renderBox(lines, {
        width: rng.int(0, 1) === 1 ? rng.int(4, 20) : undefined,
        padding: rng.int(0, 2),
        topConnector: rng.int(0, 1) === 1,
        bottomConnector: rng.int(0, 1) === 1,
      });
      assertRectangular(box.lines);
      assert.equal(Array.from(box.lines[0] ?? "").length, box.width);
    }
  });
});

describe("renderTitle", () => {
  test("centers the label on a rule", () => {
    assert.equal(renderTitle("T", 10), "═══ T ════");
  });

  test("returns the bare text when it does not fit", () => {
    assert.equal(renderTitle("long title", 5), "long title");
  });
});

describe("renderFrame", () => {
  test("pads content and adds blank rows", () => {
    assertLines(renderFrame(["ab"], 4), [
      "┌╌╌╌╌╌╌┐",
      "╎      ╎",
      "╎ ab   ╎",
      "╎      ╎",
      "└╌╌╌╌╌╌┘",
    ]);
  });

  test("truncates lines wider than the inner width", () => {
    assert.equal(renderFrame(["abcdef"], 3)[2], "╎ abc ╎");
  });
});

describe("renderComment", () => {
  test("prefixes the marker", () => {
    assert.equal(renderComment("note"), "  ← note");
  });
});

describe("renderArrow", () => {
  test("down puts the head last", () => {
    assertLines(renderArrow("down", 2, 3), ["   │", "   │", "   ▼"]);
  });

  test("up puts the head first", () => {
    assertLines(renderArrow("up", 1), ["▲", "│"]);
  });

  test("horizontal arrows are a single line", () => {
    assertLines(renderArrow("right", 3), ["───▶"]);
    assertLines(renderArrow("left", 2, 1), [" ◀──"]);
  });
});
