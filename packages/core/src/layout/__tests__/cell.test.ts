import { assert, describe, test } from "@quire/testkit";
import { transformCell, transformRow } from "../cell.js";
import { transformFooter, transformHeader } from "../sections.js";

describe("transformCell", () => {
  test("defaults: origin position, unit span, no properties", () => {
    const res = transformCell({ elements: [{ text: "a" }] });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.deepEqual(res.value, {
      kind: "cell",
      position: { column: 0, row: 0 },
      span: { colspan: 1, rowspan: 1 },
      properties: {},
      content: [{ kind: "label", text: "a" }],
    });
  });

  test("explicit position, spans and properties are kept", () => {
    const res = transformCell({
      x: 2,
      y: 1,
      colspan: 2,
      rowspan: 3,
      align: ["right", "top"],
      fill: "#eeeeee",
      breakable: false,
    });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.deepEqual(res.value.position, { column: 2, row: 1 });
    assert.deepEqual(res.value.span, { colspan: 2, rowspan: 3 });
    assert.deepEqual(res.value.properties, {
      align: ["right", "top"],
      fill: "#eeeeee",
      breakable: false,
    });
    assert.deepEqual(res.value.content, []);
  });

  test("invalid coordinates and spans fall back to defaults", () => {
    const res = transformCell({ x: -1, y: 1.5, colspan: 0, rowspan: -2 });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.deepEqual(res.value.position, { column: 0, row: 0 });
    assert.deepEqual(res.value.span, { colspan: 1, rowspan: 1 });
  });

  test("content failure fails the cell", () => {
    const res = transformCell({ elements: [{ text: "ok" }, { kind: "table", rows: -1 }] });
    assert.equal(res.ok, false);
    if (res.ok) throw new Error("expected failure");
    assert.deepEqual(res.error, { code: "invalid_track_definition", axis: "rows", value: -1 });
  });
});

describe("transformRow", () => {
  test("row index comes from the caller; properties are copied", () => {
    const res = transformRow({ fill: "gray", height: 20, cells: [{}, {}] }, 4);
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.equal(res.value.kind, "row");
    assert.equal(res.value.index, 4);
    assert.deepEqual(res.value.properties, { fill: "gray", height: 20 });
    assert.equal(res.value.cells.length, 2);
  });
});

describe("table sections", () => {
  test("header defaults: repeat true, level 1", () => {
    const res = transformHeader({ entries: [{ cells: [{ elements: [{ text: "Name" }] }] }] });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.equal(res.value.kind, "header");
    assert.equal(res.value.repeat, true);
    assert.equal(res.value.level, 1);
    assert.equal(res.value.rows.length, 1);
    assert.equal(res.value.rows[0]?.index, 0);
  });

  test("bare cells are wrapped in one-cell rows at their entry index", () => {
    const res = transformHeader({
      repeat: false,
      level: 2,
      entries: [{ cells: [] }, { elements: [{ text: "solo" }] }],
    });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.equal(res.value.repeat, false);
    assert.equal(res.value.level, 2);
    assert.equal(res.value.rows.length, 2);
    const wrapped = res.value.rows[1];
    assert.equal(wrapped?.index, 1);
    assert.equal(wrapped?.cells.length, 1);
    assert.deepEqual(wrapped?.cells[0]?.content, [{ kind: "label", text: "solo" }]);
  });

  test("non-positive header level falls back to 1", () => {
    const res = transformHeader({ level: 0, entries: [] });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.equal(res.value.level, 1);
  });

  test("footer defaults to repeat false", () => {
    const res = transformFooter({ entries: [{ cells: [{}] }] });
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.deepEqual(
      { kind: res.value.kind, repeat: res.value.repeat, rows: res.value.rows.length },
      { kind: "footer", repeat: false, rows: 1 },
    );
  });
});
