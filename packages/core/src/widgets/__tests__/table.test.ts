import { assert, assertLines, describe, test } from "@cellsketch/testkit";
import { renderTable, tableColumnWidths } from "../table.js";

describe("renderTable", () => {
  test("columns fit the widest header or cell", () => {
    assert.deepEqual(tableColumnWidths(["A", "BB"], [["x", "yyy"]]), [1, 3]);
  });

  test("draws header, separator and rows", () => {
    assertLines(renderTable(["A", "BB"], [["x", "yyy"]]), [
      "┌───┬─────┐",
      "│ A │ BB  │",
      "├───┼─────┤",
      "│ x │ yyy │",
      "└───┴─────┘",
    ]);
  });

  test("short rows pad and extra cells are dropped", () => {
    assertLines(renderTable(["a", "b"], [["1"], ["1", "2", "3"]]), [
      "┌───┬───┐",
      "│ a │ b │",
      "├───┼───┤",
      "│ 1 │   │",
      "│ 1 │ 2 │",
      "└───┴───┘",
    ]);
  });

  test("honors the box style", () => {
    assertLines(renderTable(["A"], [["x"]], { boxStyle: "heavy" }), [
      "┏━━━┓",
      "┃ A ┃",
      "┣━━━┫",
      "┃ x ┃",
      "┗━━━┛",
    ]);
  });
});
