import { assert, describe, joinLines, test } from "@quire/testkit";
import {
  cellNode,
  footerNode,
  gridNode,
  headerNode,
  labelNode,
  lineNode,
  nestedLayoutNode,
  rowNode,
  singleContentCell,
  stackNode,
  tableNode,
} from "../../ir/nodes.js";
import { renderLayout } from "../render.js";

describe("container rendering", () => {
  test("empty containers", () => {
    assert.equal(renderLayout(gridNode({ properties: { columns: [], rows: [] } })), "#grid(\n)");
    assert.equal(renderLayout(tableNode()), "#table(\n)");
    assert.equal(renderLayout(stackNode()), "#stack(\n)");
  });

  test("grid parameters, cells with inherited row properties and lines", () => {
    const grid = gridNode({
      properties: {
        columns: ["1fr", "auto"],
        rows: [],
        gutter: 4,
        align: ["left", "top"],
        fill: "#eeeeee",
      },
      children: [
        rowNode(
          0,
          [
            cellNode({ content: [labelNode("a")] }),
            cellNode({ span: { colspan: 2, rowspan: 1 }, content: [labelNode("b")] }),
          ],
          { fill: "gray" },
        ),
        cellNode({
          properties: { inset: 2, stroke: "none", breakable: false },
          content: [labelNode("c"), labelNode("d")],
        }),
      ],
      lines: [lineNode({ orientation: "horizontal", position: 1, start: 0, end: 2 })],
    });

    assert.equal(
      renderLayout(grid),
      joinLines(
        "#grid(",
        "  columns: (1fr, auto),",
        "  gutter: 4pt,",
        "  align: left + top,",
        '  fill: rgb("#eeeeee"),',
        "  grid.cell(fill: gray)[a],",
        "  grid.cell(colspan: 2, fill: gray)[b],",
        "  grid.cell(inset: 2pt, stroke: none, breakable: false)[c d],",
        "  grid.hline(y: 1, start: 0, end: 2),",
        ")",
      ),
    );
  });

  test("axis gutters use kebab-case names", () => {
    const grid = gridNode({ properties: { columnGutter: "1em", rowGutter: 3 } });
    assert.equal(
      renderLayout(grid),
      joinLines("#grid(", "  column-gutter: 1em,", "  row-gutter: 3pt,", ")"),
    );
  });

  test("cell properties win over row properties", () => {
    const grid = gridNode({
      children: [
        rowNode(0, [cellNode({ properties: { align: "left" }, content: [labelNode("x")] })], {
          align: "center",
          inset: 1,
        }),
      ],
    });
    assert.equal(
      renderLayout(grid),
      joinLines("#grid(", "  grid.cell(align: left, inset: 1pt)[x],", ")"),
    );
  });

  test("table sections come first and last, lines after footers", () => {
    const table = tableNode({
      properties: { columns: ["auto"], rows: [], inset: "5pt", stroke: "1pt" },
      headers: [headerNode([rowNode(0, [cellNode({ content: [labelNode("H")] })])], true, 2)],
      children: [cellNode({ content: [labelNode("x")] })],
      footers: [
        footerNode([
          rowNode(0, [cellNode({ properties: { align: "right" }, content: [labelNode("F")] })]),
        ]),
      ],
      lines: [lineNode({ orientation: "vertical", position: 1, stroke: { thickness: 2 } })],
    });

    assert.equal(
      renderLayout(table),
      joinLines(
        "#table(",
        "  columns: (auto),",
        "  inset: 5pt,",
        "  stroke: 1pt,",
        "  table.header(",
        "    repeat: true,",
        "    level: 2,",
        "    [H],",
        "  ),",
        "  [x],",
        "  table.footer(",
        "    repeat: false,",
        "    table.cell(align: right)[F],",
        "  ),",
        "  table.vline(x: 1, stroke: (thickness: 2pt)),",
        ")",
      ),
    );
  });

  test("a grid nested in a stack sits one and two levels deeper", () => {
    const stack = stackNode({}, [
      singleContentCell(
        nestedLayoutNode(
          gridNode({
            properties: { columns: ["auto"] },
            children: [cellNode({ content: [labelNode("x")] })],
          }),
        ),
      ),
    ]);
    assert.equal(
      renderLayout(stack),
      joinLines("#stack(", "  [#grid(", "    columns: (auto),", "    [x],", "  )],", ")"),
    );
  });

  test("nested layouts open inline and indent with their cell", () => {
    const inner = gridNode({
      properties: { columns: ["auto", "auto"] },
      children: [cellNode({ content: [labelNode("g")] })],
    });
    const stack = stackNode({ dir: "ttb", spacing: "2pt" }, [
      singleContentCell(labelNode("s1")),
      singleContentCell(nestedLayoutNode(inner)),
    ]);
    const outer = gridNode({
      children: [cellNode({ content: [labelNode("Top"), nestedLayoutNode(stack)] })],
    });

    assert.equal(
      renderLayout(outer),
      joinLines(
        "#grid(",
        "  [Top #stack(",
        "    dir: ttb,",
        "    spacing: 2pt,",
        "    [s1],",
        "    [#grid(",
        "      columns: (auto, auto),",
        "      [g],",
        "    )],",
        "  )],",
        ")",
      ),
    );
  });
});
