/**
 * packages/core/src/layout/content.ts - Content lowering.
 *
 * Dispatches purely on shape:
 *   - `text`   -> label
 *   - `source` -> field (format and decimal places copied through)
 *   - `kind` in grid | table | stack -> nested layout, transformed recursively
 * Anything else fails with `unknown_element_type`.
 */

import { fieldNode, labelNode, nestedLayoutNode } from "../ir/nodes.js";
import { type ContentNode, type FieldFormat, type FieldSource, isLayoutKind } from "../ir/types.js";
import type { ElementDef } from "./definitions.js";
import { resolveElementStyle } from "./elementStyle.js";
import { unknownElementType } from "./errors.js";
import { type LayoutResult, fail, ok } from "./result.js";
import { type TransformOptions, transformLayout } from "./transform.js";

const FIELD_FORMATS: readonly FieldFormat[] = Object.freeze([
  "number",
  "currency",
  "percent",
  "date",
  "datetime",
]);

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isFieldSource(v: unknown): v is FieldSource {
  if (typeof v === "string") return true;
  return Array.isArray(v) && v.length > 0 && v.every((key) => typeof key === "string");
}

function pickFormat(v: unknown): FieldFormat | undefined {
  return FIELD_FORMATS.find((format) => format === v);
}

function pickDecimalPlaces(v: unknown): number | undefined {
  if (typeof v !== "number" || !Number.isInteger(v) || v < 0) return undefined;
  return v;
}

export function lowerContent(
  element: ElementDef,
  opts: TransformOptions = {},
): LayoutResult<ContentNode> {
  const item: unknown = element;
  if (!isRecord(item)) return fail(unknownElementType(item));

  if ("text" in item) {
    const text = item["text"];
    return ok(labelNode(typeof text === "string" ? text : "", resolveElementStyle(item)));
  }

  if ("source" in item) {
    const source = item["source"];
    if (!isFieldSource(source)) return fail(unknownElementType(item));
    return ok(
      fieldNode(source, {
        format: pickFormat(item["format"]),
        decimalPlaces: pickDecimalPlaces(item["decimalPlaces"]),
        style: resolveElementStyle(item),
      }),
    );
  }

  if (isLayoutKind(item["kind"]) && "kind" in element) {
    const nested = transformLayout(element, opts);
    if (!nested.ok) return nested;
    return ok(nestedLayoutNode(nested.value));
  }

  return fail(unknownElementType(item));
}
