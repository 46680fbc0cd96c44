import { assert, assertLines, assertRectangular, createRng, describe, test } from "@cellsketch/testkit";
import { PALETTES } from "../../theme/palettes.js";
import { SHADE_FIELDS, applyContrast, paletteIndex, renderShadedBox } from "../shadedBox.js";

describe("shade fields", () => {
  test("linear fields ramp from 0 to 1", () => {
    assert.equal(SHADE_FIELDS.horizontal(0, 0, 5, 1), 0);
    assert.equal(SHADE_FIELDS.horizontal(2, 0, 5, 1), 0.5);
    assert.equal(SHADE_FIELDS.horizontal(4, 0, 5, 1), 1);
    assert.equal(SHADE_FIELDS.vertical(3, 0, 5, 1), 0);
  });

  test("radial is 0 at the center and clamped at the corners", () => {
    assert.equal(SHADE_FIELDS.radial(1, 1, 3, 3), 0);
    assert.equal(SHADE_FIELDS.radial(0, 0, 4, 4), 1);
  });

  test("every field stays within [0, 1]", () => {
    const rng = createRng(99);
    for (const field of Object.values(SHADE_FIELDS)) {
      for (let i = 0; i < 100; i++) {
        const w = rng.int(1, 30);
        const h = rng.int(1, 10);
        const v = field(rng.int(0, w - 1), rng.int(0, h - 1), w, h);
        assert.ok(v >= 0 && v <= 1);
      }
    }
  });
});

describe("contrast and palette lookup", () => {
  test("0.5 is the identity; the ends flatten or sharpen", () => {
    assert.equal(applyContrast(0.75, 0.5), 0.75);
    assert.equal(applyContrast(0.75, 0), 0.5);
    assert.equal(applyContrast(0.75, 0.25), 0.625);
    assert.equal(applyContrast(0.75, 1), 1);
    assert.equal(applyContrast(0.25, 1), 0);
  });

  test("palette index clamps to the palette", () => {
    assert.equal(paletteIndex(0.5, 5), 2);
    assert.equal(paletteIndex(0.99, 5), 3);
    assert.equal(paletteIndex(1, 5), 4);
    assert.equal(paletteIndex(-1, 5), 0);
    assert.equal(paletteIndex(2, 5), 4);
  });
});

describe("renderShadedBox", () => {
  test("horizontal blocks walk the palette left to right", () => {
    assertLines(renderShadedBox({ width: 5, height: 1 }), ["┌─────┐", "│ ░▒▓█│", "└─────┘"]);
  });

  test("title is centered in the top border", () => {
    assertLines(
      renderShadedBox({ width: 7, height: 1, title: "T", palette: "ascii", direction: "vertical" }),
      ["┌── T ──┐", "│       │", "└───────┘"],
    );
  });

  test("diagonal_reverse darkens toward the left", () => {
    assertLines(renderShadedBox({ width: 3, height: 1, direction: "diagonal_reverse" }), [
      "┌───┐",
      "│▒░ │",
      "└───┘",
    ]);
  });

  test("unknown names fall back to defaults", () => {
    assert.deepEqual(
      renderShadedBox({ width: 5, height: 1, palette: "nope", direction: "sideways", boxStyle: "zigzag" }),
      renderShadedBox({ width: 5, height: 1 }),
    );
  });

  test("output is rectangular for every direction and palette", () => {
    for (const direction of Object.keys(SHADE_FIELDS)) {
      for (const palette of Object.keys(PALETTES)) {
        const lines = renderShadedBox({ width: 9, height: 4, direction, palette, title: "load" });
        assert.equal(lines.length, 6);
        assertRectangular(lines);
      }
    }
  });
});
