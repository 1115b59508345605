import { assert, describe, fixturePath, joinLines, lines, readJsonFixture, test } from "../index.js";

describe("testkit fixtures", () => {
  test("readJsonFixture parses the invoice document", () => {
    const doc = readJsonFixture("invoice.report.json");
    assert.equal(typeof doc, "object");
    assert.notEqual(doc, null);
    assert.equal(Array.isArray(doc), false);
  });

  test("fixturePath resolves under the fixtures directory", () => {
    assert.match(fixturePath("invoice.report.json"), /fixtures[\\/]invoice\.report\.json$/);
  });

  test("lines and joinLines are inverse", () => {
    const text = joinLines("#grid(", ")");
    assert.equal(text, "#grid(\n)");
    assert.deepEqual(lines(text), ["#grid(", ")"]);
  });
});
