/**
 * packages/core/src/typst/style.ts - Style resolver.
 *
 * Renders a `Style` as ordered `#text(...)` parameters:
 * size, weight, style, fill, font. Absent attributes are skipped. Text
 * alignment is not a text parameter; it wraps the styled content in
 * `#align(...)` instead.
 */

import { isEmptyStyle } from "../ir/style.js";
import type { Style } from "../ir/types.js";
import { quoteString } from "./escape.js";
import { renderColor, renderLength } from "./values.js";

/** Symbolic weights and their Typst names. */
export const FONT_WEIGHTS: Readonly<Record<string, string>> = Object.freeze({
  thin: "thin",
  extralight: "extralight",
  light: "light",
  normal: "regular",
  regular: "regular",
  medium: "medium",
  semibold: "semibold",
  bold: "bold",
  extrabold: "extrabold",
  black: "black",
});

/** Slants emitted as a `style:` parameter; `normal` is the default and omitted. */
export const FONT_STYLES: Readonly<Record<string, string | null>> = Object.freeze({
  normal: null,
  italic: "italic",
  oblique: "oblique",
});

function renderWeight(weight: string | number): string {
  if (typeof weight === "number") return String(weight);
  return quoteString(FONT_WEIGHTS[weight] ?? weight);
}

function renderSlant(slant: string): string | null {
  const known = FONT_STYLES[slant];
  if (known === null) return null;
  return quoteString(known ?? slant);
}

export function styleParams(style: Style | undefined): readonly string[] {
  if (style === undefined) return [];
  const params: string[] = [];
  if (style.fontSize !== undefined) params.push(`size: ${renderLength(style.fontSize)}`);
  if (style.fontWeight !== undefined) params.push(`weight: ${renderWeight(style.fontWeight)}`);
  if (style.fontStyle !== undefined) {
    const slant = renderSlant(style.fontStyle);
    if (slant !== null) params.push(`style: ${slant}`);
  }
  if (style.color !== undefined) params.push(`fill: ${renderColor(style.color)}`);
  if (style.fontFamily !== undefined) params.push(`font: ${quoteString(style.fontFamily)}`);
  return params;
}

export function renderStyleParams(style: Style | undefined): string {
  return styleParams(style).join(", ");
}

/** Wraps rendered content with `#text(...)` and `#align(...)` as the style requires. */
export function wrapWithStyle(content: string, style: Style | undefined): string {
  if (style === undefined || isEmptyStyle(style)) return content;
  const params = renderStyleParams(style);
  const styled = params === "" ? content : `#text(${params})[${content}]`;
  if (style.textAlign === undefined) return styled;
  return `#align(${style.textAlign})[${styled}]`;
}
