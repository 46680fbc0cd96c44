import { assert, assertLines, describe, test } from "@cellsketch/testkit";
import { boxCenters, mergeLines, renderBoxRow } from "../boxRow.js";

describe("renderBoxRow", () => {
  test("stretches shorter boxes above their bottom border", () => {
    const row = renderBoxRow([["A"], ["B", "C"]], { spacing: 2 });
    assertLines(row.lines, [
      "┌───┐  ┌───┐",
      "│ A │  │ B │",
      "│   │  │ C │",
      "└───┘  └───┘",
    ]);
    assert.equal(row.width, 12);
  });

  test("merge joins every box into one trunk at the span midpoint", () => {
    const row = renderBoxRow([["a"], ["b"], ["c"]], { merge: true });
    assertLines(row.lines, [
      "┌───┐  ┌───┐  ┌───┐",
      "│ a │  │ b │  │ c │",
      "└───┘  └───┘  └───┘",
      "  │      │      │",
      "  └──────┬──────┘",
      "         │",
    ]);
  });

  test("merge junction follows the span, not the box centers", () => {
    const row = renderBoxRow([["ab"], ["c"]], { spacing: 1, merge: true });
    assertLines(row.lines, [
      "┌────┐ ┌───┐",
      "│ ab │ │ c │",
      "└────┘ └───┘",
      "   │     │",
      "   └──┬──┘",
      "      │",
    ]);
  });

  test("a single box never gets merge lines", () => {
    assert.equal(renderBoxRow([["solo"]], { merge: true }).lines.length, 3);
  });

  test("an empty row renders nothing", () => {
    const row = renderBoxRow([]);
    assert.equal(row.lines.length, 0);
    assert.equal(row.width, 0);
  });
});

describe("merge geometry", () => {
  test("boxCenters accumulates widths and spacing", () => {
    assert.deepEqual(boxCenters([5, 6, 7], 2), [2, 10, 18]);
  });

  test("mergeLines needs at least two centers", () => {
    assert.deepEqual(mergeLines([4]), []);
  });
});
