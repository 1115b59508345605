import { assert, describe, joinLines, test } from "@quire/testkit";
import { cellNode, fieldNode, gridNode, stackNode } from "../../ir/nodes.js";
import { BLOCK_SEPARATOR, buildPreamble, renderLayouts, renderReport } from "../render.js";

describe("buildPreamble", () => {
  test("directives in fixed order", () => {
    assert.equal(
      buildPreamble({ fontSize: 11, font: "Inter", margin: "2cm", pageSize: "a4" }),
      joinLines(
        '#set page(paper: "a4")',
        "#set page(margin: 2cm)",
        '#set text(font: "Inter")',
        "#set text(size: 11pt)",
      ),
    );
  });

  test("no options, no preamble", () => {
    assert.equal(buildPreamble({}), "");
  });
});

describe("renderReport", () => {
  test("layouts are separated by a blank line", () => {
    assert.equal(BLOCK_SEPARATOR, "\n\n");
    assert.equal(renderReport([gridNode(), stackNode()]), "#grid(\n)\n\n#stack(\n)");
  });

  test("preamble comes first", () => {
    assert.equal(
      renderReport([gridNode()], { pageSize: "a5" }),
      '#set page(paper: "a5")\n\n#grid(\n)',
    );
  });

  test("a preamble alone", () => {
    assert.equal(renderReport([], { font: "Inter" }), '#set text(font: "Inter")');
  });

  test("locale options switch field formatting", () => {
    const grid = gridNode({
      children: [cellNode({ content: [fieldNode("n", { format: "currency" })] })],
    });
    const [plain, localized] = [
      renderLayouts([grid], { data: { n: 1234.5 } }),
      renderLayouts([grid], { data: { n: 1234.5 }, locale: "fr-FR", currency: "EUR" }),
    ];
    assert.deepEqual(plain, ["#grid(\n  [\\$1234.50],\n)"]);
    assert.deepEqual(localized, ["#grid(\n  [1 234,50 €],\n)"]);
  });

  test("currency alone enables locale formatting with en-US", () => {
    const grid = gridNode({
      children: [cellNode({ content: [fieldNode("n", { format: "currency" })] })],
    });
    assert.deepEqual(renderLayouts([grid], { data: { n: 1234.5 }, currency: "GBP" }), [
      "#grid(\n  [£1,234.50],\n)",
    ]);
  });
});
