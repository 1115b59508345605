import { assert, describe, test } from "@quire/testkit";
import { QuireError, quireErrorFromLayout } from "../errors.js";
import {
  describeValue,
  formatLayoutError,
  invalidDocument,
  positionConflict,
  spanOverflow,
  unknownElementType,
  unsupportedLayoutType,
} from "../layout/errors.js";

describe("formatLayoutError", () => {
  test("one message per code", () => {
    assert.equal(
      formatLayoutError(unknownElementType({ image: "x" })),
      'Unknown element type: {"image":"x"}',
    );
    assert.equal(
      formatLayoutError(unsupportedLayoutType("chart")),
      'Unsupported layout type: "chart"',
    );
    assert.equal(
      formatLayoutError(spanOverflow({ column: 1, row: 0 }, 2, 2)),
      "colspan 2 at column 1 exceeds grid width of 2",
    );
    assert.equal(
      formatLayoutError(positionConflict({ column: 1, row: 2 })),
      "Cell at (1, 2) conflicts with an existing cell",
    );
    assert.equal(
      formatLayoutError(invalidDocument("$.layouts", "is required")),
      "$.layouts: is required",
    );
  });

  test("describeValue", () => {
    assert.equal(describeValue(undefined), "undefined");
    assert.equal(describeValue(null), "null");
    assert.equal(describeValue(3n), "3n");
    assert.equal(describeValue(() => 1), "function");
    const cyclic: { self?: unknown } = {};
    cyclic.self = cyclic;
    assert.equal(describeValue(cyclic), "[object Object]");
  });
});

describe("QuireError", () => {
  test("carries code, message and cause", () => {
    const cause = new Error("disk");
    const err = new QuireError("QUIRE_IO_ERROR", "cannot read a.json", { cause });
    assert.equal(err.name, "QuireError");
    assert.equal(err.code, "QUIRE_IO_ERROR");
    assert.equal(err.message, "cannot read a.json");
    assert.equal(err.cause, cause);
    assert.equal(err.layoutError, undefined);
    assert.ok(err instanceof Error);
  });

  test("message defaults to the code", () => {
    assert.equal(new QuireError("QUIRE_INVALID_ARGS").message, "QUIRE_INVALID_ARGS");
  });

  test("document errors map to QUIRE_INVALID_DOCUMENT", () => {
    const err = quireErrorFromLayout(invalidDocument("$.options", "expected an object"));
    assert.equal(err.code, "QUIRE_INVALID_DOCUMENT");
    assert.equal(err.message, "$.options: expected an object");
  });
});
