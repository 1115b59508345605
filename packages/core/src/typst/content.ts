/**
 * packages/core/src/typst/content.ts - Content rendering.
 *
 *   label  -> escape (after placeholder substitution), then style wrapper
 *   field  -> lookup, format, escape, then style wrapper
 *   nested -> the layout's container text at the enclosing cell's indent
 */

import type { ContentNode, FieldNode, FieldSource, LabelNode } from "../ir/types.js";
import type { RenderContext } from "./context.js";
import { lookupField } from "./data.js";
import { escapeMarkup } from "./escape.js";
import { DEFAULT_CURRENCY_PLACES, DEFAULT_PERCENT_PLACES, formatValue } from "./format.js";
import { interpolateVariables, renderLabelReferences } from "./interpolation.js";
import { clampDecimalPlaces } from "./locale.js";
import { renderLayoutAt } from "./layout.js";
import { wrapWithStyle } from "./style.js";

function referencePath(source: FieldSource): string {
  return typeof source === "string" ? source : source.join(".");
}

function guarded(ref: string, expr: string): string {
  return `#{ let v = ${ref}; if v == none { "-" } else { ${expr} } }`;
}

/** Typst code reading the field from `record` when the document compiles. */
export function renderFieldReference(field: FieldNode): string {
  const ref = `record.${referencePath(field.source)}`;
  switch (field.format) {
    case "currency": {
      const places = clampDecimalPlaces(field.decimalPlaces ?? DEFAULT_CURRENCY_PLACES);
      return `\\$${guarded(ref, `calc.round(v, digits: ${String(places)})`)}`;
    }
    case "percent": {
      const places = clampDecimalPlaces(field.decimalPlaces ?? DEFAULT_PERCENT_PLACES);
      return guarded(ref, `str(calc.round(v * 100, digits: ${String(places)})) + "%"`);
    }
    case "number":
      if (field.decimalPlaces !== undefined) {
        const places = clampDecimalPlaces(field.decimalPlaces);
        return guarded(ref, `calc.round(v, digits: ${String(places)})`);
      }
      return `#${ref}`;
    default:
      return `#${ref}`;
  }
}

export function renderLabel(label: LabelNode, ctx: RenderContext): string {
  let text: string;
  if (ctx.fieldMode === "reference") {
    text = renderLabelReferences(label.text);
  } else if (ctx.variables !== undefined) {
    text = escapeMarkup(interpolateVariables(label.text, ctx.variables));
  } else {
    text = escapeMarkup(label.text);
  }
  return wrapWithStyle(text, label.style);
}

export function renderField(field: FieldNode, ctx: RenderContext): string {
  if (ctx.fieldMode === "reference") return wrapWithStyle(renderFieldReference(field), field.style);
  const lookup = lookupField(ctx.data, field.source);
  const value = lookup.found ? lookup.value : undefined;
  const text = escapeMarkup(formatValue(value, field.format, field.decimalPlaces, ctx.localeFormat));
  return wrapWithStyle(text, field.style);
}

/**
 * Renders one content item. Nested layouts open inline (no leading indent)
 * and continue at `indent`, the indent level of the enclosing cell.
 */
export function renderContent(content: ContentNode, indent: number, ctx: RenderContext): string {
  switch (content.kind) {
    case "label":
      return renderLabel(content, ctx);
    case "field":
      return renderField(content, ctx);
    case "nestedLayout":
      return renderLayoutAt(content.layout, indent, ctx);
  }
}

export function renderContentList(
  content: readonly ContentNode[],
  indent: number,
  ctx: RenderContext,
): string {
  return content.map((item) => renderContent(item, indent, ctx)).join(" ");
}
