import { assert, describe, test } from "@quire/testkit";
import { layout } from "../builders.js";
import { transformLayout } from "../transform.js";

describe("layout builders", () => {
  test("grid without rows has no bodyRows key", () => {
    assert.deepEqual(layout.grid({ columns: 2 }), { kind: "grid", columns: 2 });
  });

  test("table with rows", () => {
    const def = layout.table({ stroke: "none" }, [layout.row([layout.cell([layout.label("a")])])]);
    assert.deepEqual(def, {
      kind: "table",
      stroke: "none",
      bodyRows: [{ cells: [{ elements: [{ text: "a" }] }] }],
    });
  });

  test("label and field carry style and format options", () => {
    assert.deepEqual(layout.label("Total", { fontWeight: "bold" }), {
      fontWeight: "bold",
      text: "Total",
    });
    assert.deepEqual(layout.field("amount", { format: "currency", decimalPlaces: 0 }), {
      format: "currency",
      decimalPlaces: 0,
      source: "amount",
    });
  });

  test("sections and lines", () => {
    assert.deepEqual(layout.header([layout.cell()], { level: 2 }), {
      level: 2,
      entries: [{ elements: [] }],
    });
    assert.deepEqual(layout.footer([]), { entries: [] });
    assert.deepEqual(layout.hline(1, { stroke: "2pt" }), {
      stroke: "2pt",
      orientation: "horizontal",
      position: 1,
    });
    assert.deepEqual(layout.vline(0), { orientation: "vertical", position: 0 });
  });

  test("built definitions transform", () => {
    const def = layout.stack({ dir: "ttb" }, [
      layout.label("Title", { fontSize: 14 }),
      layout.grid({ columns: [{ fr: 1 }, { fr: 1 }] }, [
        layout.row([layout.cell([layout.field("a")]), layout.cell([layout.field("b")])]),
      ]),
    ]);
    const res = transformLayout(def);
    assert.equal(res.ok, true);
    if (!res.ok) throw new Error("expected ok");
    assert.equal(res.value.kind, "stack");
    if (res.value.kind !== "stack") throw new Error("expected stack");
    assert.equal(res.value.children.length, 2);
  });
});
