import { assert, assertLines, describe, test } from "@cellsketch/testkit";
import { CellsketchError, type Fatal } from "../../errors.js";
import {
  type ParseElementsOptions,
  parseElementSlots,
  parseElements,
  renderDiagramFromInput,
} from "../parse.js";
import type { DiagramElement, DiagramElementType } from "../types.js";

function parsed(input: unknown, opts?: ParseElementsOptions): readonly DiagramElement[] {
  const res = parseElements(input, opts);
  if (!res.ok) throw new Error(`unexpected failure: ${res.fatal.detail}`);
  return res.value;
}

function failed(input: unknown, opts?: ParseElementsOptions): Fatal {
  const res = parseElements(input, opts);
  if (res.ok) throw new Error("expected parseElements to fail");
  return res.fatal;
}

function isType<K extends DiagramElementType>(
  element: DiagramElement | undefined,
  type: K,
): element is Extract<DiagramElement, { type: K }> {
  return element?.type === type;
}

function only<K extends DiagramElementType>(
  type: K,
  raw: Readonly<Record<string, unknown>>,
): Extract<DiagramElement, { type: K }> {
  const element = parsed([{ type, ...raw }])[0];
  if (!isType(element, type)) throw new Error(`expected a ${type} element`);
  return element;
}

describe("parseElements - fields", () => {
  test("snake_case wire fields map onto element props", () => {
    const box = only("box", { text: "a\nb", top_connector: true, box_style: "heavy", x: 2.7 });
    assert.deepEqual(box.lines, ["a", "b"]);
    assert.equal(box.topConnector, true);
    assert.equal(box.boxStyle, "heavy");
    assert.equal(box.x, 2);
  });

  test("camelCase spellings are accepted", () => {
    const chart = only("bar_chart", { data: [["a", 1]], barWidth: 5, showValues: false });
    assert.equal(chart.barWidth, 5);
    assert.equal(chart.showValues, false);
  });

  test("bar data accepts tuples and objects", () => {
    const chart = only("bar_chart_vertical", {
      data: [
        ["mon", 3],
        { label: "tue", value: "4.5" },
      ],
    });
    assert.deepEqual(chart.data, [
      { label: "mon", value: 3 },
      { label: "tue", value: 4.5 },
    ]);
  });

  test("row boxes accept strings, line arrays and objects", () => {
    const row = only("row", {
      boxes: ["web", ["p", "q"], { lines: ["a", "b"] }, { text: "x\ny" }],
      merge: true,
    });
    assert.deepEqual(row.boxes, [["web"], ["p", "q"], ["a", "b"], ["x", "y"]]);
    assert.equal(row.merge, true);
  });

  test("numbers and booleans become cell text", () => {
    const table = only("table", { headers: ["n", "ok"], rows: [[1, true]] });
    assert.deepEqual(table.rows, [["1", "true"]]);
    assert.equal(only("title", { text: 7 }).text, "7");
  });

  test("numeric strings are coerced and null reads as absent", () => {
    const progress = only("progress", { value: "40", max: "80", x: null });
    assert.equal(progress.value, 40);
    assert.equal(progress.max, 80);
    assert.equal(progress.x, undefined);
  });
});

describe("parseElements - failures", () => {
  test("non-array input", () => {
    assert.deepEqual(failed({}), {
      code: "CSK_INPUT_ERROR",
      detail: "Invalid elements: expected an array, got object",
    });
    assert.equal(failed("x").detail, "Invalid elements: expected an array, got string (x)");
  });

  test("elements must be objects with a string type", () => {
    assert.equal(failed([42]).detail, "Invalid element #0: expected an object, got number (42)");
    assert.equal(
      failed([{ text: "a" }]).detail,
      'Invalid field "type" on element #0: expected a string, got undefined (undefined)',
    );
  });

  test("missing required fields name the element and field", () => {
    assert.deepEqual(failed([{ type: "spacer" }, { type: "table", rows: [] }]), {
      code: "CSK_INVALID_ELEMENT",
      detail:
        'Invalid field "headers" on element #1 <table>: expected an array of strings, got undefined (undefined)',
    });
    assert.equal(
      failed([{ type: "box" }]).detail,
      'Invalid field "text" on element #0 <box>: expected a string or lines array, got undefined (undefined)',
    );
  });

  test("wrongly typed optional fields are rejected", () => {
    assert.equal(
      failed([{ type: "arrow", direction: "sideways" }]).detail,
      'Invalid field "direction" on element #0 <arrow>: expected "down" | "up" | "left" | "right", got string (sideways)',
    );
    assert.equal(
      failed([{ type: "text", text: "a", x: -1 }]).detail,
      'Invalid field "x" on element #0 <text>: expected an integer >= 0, got number (-1)',
    );
    assert.equal(
      failed([{ type: "bar_chart", data: [["a", "lots"]] }]).detail,
      'Invalid field "data" on element #0 <bar_chart>: expected an array of [label, value] pairs, got array',
    );
  });

  test("the first failing field is reported", () => {
    assert.equal(
      failed([{ type: "progress", width: "wide" }]).detail,
      'Invalid field "value" on element #0 <progress>: expected a finite number, got undefined (undefined)',
    );
  });
});

describe("parseElements - unknown types", () => {
  const input = [{ type: "title", text: "T" }, { type: "circle" }, { type: "spacer" }];

  test("are skipped with a warning by default", () => {
    const warnings: string[] = [];
    const elements = parsed(input, { warn: (message) => warnings.push(message) });
    assert.deepEqual(
      elements.map((element) => element.type),
      ["title", "spacer"],
    );
    assert.deepEqual(warnings, [
      '[cellsketch][elements] Unknown element type "circle" at element #1; skipped',
    ]);
  });

  test("leave an empty slot at their position", () => {
    const res = parseElementSlots(input, { warn: () => {} });
    if (!res.ok) throw new Error(res.fatal.detail);
    assert.deepEqual(
      res.value.map((slot) => slot?.type),
      ["title", undefined, "spacer"],
    );
  });

  test("sit between a box and a following arrow", () => {
    const lines = renderDiagramFromInput(
      [{ type: "box", text: "X" }, { type: "circle" }, { type: "arrow" }],
      { width: 10, warn: () => {} },
    );
    assertLines(lines, ["   ┌───┐", "   │ X │", "   └───┘", "     │", "     ▼"]);
  });

  test("fail in strict mode", () => {
    assert.deepEqual(failed(input, { strict: true }), {
      code: "CSK_UNKNOWN_ELEMENT",
      detail: 'Unknown element type "circle" at element #1',
    });
  });
});

describe("renderDiagramFromInput", () => {
  test("renders validated JSON", () => {
    const lines = renderDiagramFromInput(
      [
        { type: "title", text: "T" },
        { type: "box", text: "X" },
      ],
      { width: 10 },
    );
    assertLines(lines, ["═══ T ════", "   ┌───┐", "   │ X │", "   └───┘"]);
  });

  test("throws CellsketchError with the fatal code", () => {
    assert.throws(
      () => renderDiagramFromInput([{ type: "circle" }], { strict: true }),
      (err: unknown) =>
        err instanceof CellsketchError &&
        err.code === "CSK_UNKNOWN_ELEMENT" &&
        err.message === 'Unknown element type "circle" at element #0',
    );
  });
});
