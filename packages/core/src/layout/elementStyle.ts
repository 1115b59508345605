import { createStyle } from "../ir/style.js";
import type { Style, StyleKey } from "../ir/types.js";

type StyleSourceBag = Readonly<{
  fontSize?: unknown;
  fontWeight?: unknown;
  fontStyle?: unknown;
  color?: unknown;
  fontFamily?: unknown;
  textAlign?: unknown;
  align?: unknown;
  style?: unknown;
}>;

type StyleValue = string | number;

function isRecord(v: unknown): v is Readonly<Record<string, unknown>> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function pickStyleValue(v: unknown): StyleValue | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number" && Number.isFinite(v)) return v;
  return undefined;
}

function pickStringValue(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

/**
 * Resolves the style of a content element.
 *
 * Attributes are read in canonical order from the element's nested `style`
 * map first, then from the flat element attributes (`align` is the flat alias
 * of `textAlign`). Returns `undefined` when no attribute is set.
 */
export function resolveElementStyle(element: StyleSourceBag): Style | undefined {
  const map: Readonly<Record<string, unknown>> = isRecord(element.style) ? element.style : {};
  const flat: Readonly<Record<string, unknown>> = element;

  const read = (key: StyleKey): unknown => {
    const fromMap = map[key];
    if (fromMap !== undefined && fromMap !== null) return fromMap;
    const fromFlat = flat[key];
    if (fromFlat !== undefined && fromFlat !== null) return fromFlat;
    return key === "textAlign" ? flat["align"] : undefined;
  };

  return createStyle({
    fontSize: pickStyleValue(read("fontSize")),
    fontWeight: pickStyleValue(read("fontWeight")),
    fontStyle: pickStringValue(read("fontStyle")),
    color: pickStringValue(read("color")),
    fontFamily: pickStringValue(read("fontFamily")),
    textAlign: pickStringValue(read("textAlign")),
  });
}
