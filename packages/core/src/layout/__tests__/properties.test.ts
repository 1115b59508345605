import { assert, describe, test } from "@quire/testkit";
import {
  TABLE_DEFAULT_INSET,
  TABLE_DEFAULT_STROKE,
  resolveContainerProperties,
  resolveStackProperties,
} from "../properties.js";

describe("resolveContainerProperties", () => {
  test("grid has no stroke or inset fallback", () => {
    const props = resolveContainerProperties({ kind: "grid", columns: ["auto"], rows: [] });
    assert.deepEqual(props, { columns: ["auto"], rows: [] });
  });

  test("table falls back to the default stroke and inset", () => {
    const props = resolveContainerProperties({ kind: "table", columns: [], rows: [] });
    assert.equal(props.stroke, TABLE_DEFAULT_STROKE);
    assert.equal(props.inset, TABLE_DEFAULT_INSET);
    assert.equal(props.stroke, "1pt");
    assert.equal(props.inset, "5pt");
  });

  test("explicit table stroke and inset win over the defaults", () => {
    const props = resolveContainerProperties({
      kind: "table",
      columns: [],
      rows: [],
      stroke: "none",
      inset: 0,
    });
    assert.equal(props.stroke, "none");
    assert.equal(props.inset, 0);
  });

  test("general gutter is kept when no axis gutter is set", () => {
    const props = resolveContainerProperties({ kind: "grid", columns: [], rows: [], gutter: "4pt" });
    assert.equal(props.gutter, "4pt");
  });

  test("an axis gutter suppresses the general gutter", () => {
    const props = resolveContainerProperties({
      kind: "grid",
      columns: [],
      rows: [],
      gutter: "4pt",
      rowGutter: "2pt",
    });
    assert.deepEqual(props, { columns: [], rows: [], rowGutter: "2pt" });
  });
});

describe("resolveStackProperties", () => {
  test("keeps a known direction and spacing", () => {
    assert.deepEqual(resolveStackProperties({ kind: "stack", dir: "rtl", spacing: 6 }), {
      dir: "rtl",
      spacing: 6,
    });
  });

  test("empty stack has no properties", () => {
    assert.deepEqual(resolveStackProperties({ kind: "stack" }), {});
  });
});
