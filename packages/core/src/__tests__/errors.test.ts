import { assert, describe, test } from "@cellsketch/testkit";
import { CellsketchError, fatalToError } from "../errors.js";

describe("CellsketchError", () => {
  test("carries the code and message", () => {
    const err = new CellsketchError("CSK_INVALID_ANCHOR", 'Invalid A1 anchor: "?"');
    assert.ok(err instanceof Error);
    assert.equal(err.name, "CellsketchError");
    assert.equal(err.code, "CSK_INVALID_ANCHOR");
    assert.equal(err.message, 'Invalid A1 anchor: "?"');
  });

  test("message defaults to the code", () => {
    assert.equal(new CellsketchError("CSK_INPUT_ERROR").message, "CSK_INPUT_ERROR");
  });

  test("stack starts at the caller, not the constructor", () => {
    const err = new CellsketchError("CSK_INPUT_ERROR");
    assert.equal(typeof err.stack, "string");
    assert.ok(!(err.stack ?? "").includes("new CellsketchError"));
  });

  test("fatalToError keeps the fatal code and detail", () => {
    const err = fatalToError({ code: "CSK_UNKNOWN_ELEMENT", detail: "Unknown element type" });
    assert.equal(err.code, "CSK_UNKNOWN_ELEMENT");
    assert.equal(err.message, "Unknown element type");
  });
});
