import { assert, describe, test } from "@quire/testkit";
import { renderStyleParams, styleParams, wrapWithStyle } from "../style.js";

describe("style parameters", () => {
  test("canonical order: size, weight, style, fill, font", () => {
    assert.deepEqual(
      styleParams({
        fontFamily: "Inter",
        color: "#336699",
        fontStyle: "italic",
        fontWeight: "bold",
        fontSize: 14,
      }),
      ["size: 14pt", 'weight: "bold"', 'style: "italic"', 'fill: rgb("#336699")', 'font: "Inter"'],
    );
  });

  test("normal weight is regular; numeric weights are bare", () => {
    assert.equal(renderStyleParams({ fontWeight: "normal" }), 'weight: "regular"');
    assert.equal(renderStyleParams({ fontWeight: 600 }), "weight: 600");
    assert.equal(renderStyleParams({ fontWeight: "heavy" }), 'weight: "heavy"');
  });

  test("normal slant is omitted", () => {
    assert.equal(renderStyleParams({ fontStyle: "normal" }), "");
    assert.equal(renderStyleParams({ fontStyle: "oblique" }), 'style: "oblique"');
  });

  test("undefined style has no parameters", () => {
    assert.deepEqual(styleParams(undefined), []);
  });
});

describe("wrapWithStyle", () => {
  test("no style leaves content untouched", () => {
    assert.equal(wrapWithStyle("Total", undefined), "Total");
    assert.equal(wrapWithStyle("Total", {}), "Total");
  });

  test("text parameters wrap in #text", () => {
    assert.equal(
      wrapWithStyle("Total", { fontWeight: "bold", fontSize: "9pt" }),
      '#text(size: 9pt, weight: "bold")[Total]',
    );
  });

  test("textAlign wraps the styled text in #align", () => {
    assert.equal(
      wrapWithStyle("Total", { textAlign: "right", color: "red" }),
      "#align(right)[#text(fill: red)[Total]]",
    );
    assert.equal(wrapWithStyle("Total", { textAlign: "center" }), "#align(center)[Total]");
  });

  test("a style whose only attribute renders nothing leaves content bare", () => {
    assert.equal(wrapWithStyle("x", { fontStyle: "normal" }), "x");
  });
});
