/**
 * packages/core/src/typst/interpolation.ts - Label placeholders.
 *
 * Labels may name values as `[name]` or `[order.total]`. In value mode they
 * are substituted from the `variables` option before escaping; unknown names
 * stay as written. In reference mode `[name]` becomes a `data.variables`
 * code reference and the surrounding text is escaped.
 */

import { lookupPath } from "./data.js";
import { escapeMarkup } from "./escape.js";
import { formatIsoDateTime } from "./format.js";
import type { DataContext } from "./options.js";

const PLACEHOLDER = /\[([^\]]+)\]/g;
const REFERENCE_PLACEHOLDER = /\[([a-zA-Z_][a-zA-Z0-9_]*)\]/g;

export function formatInterpolatedValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return Number.isInteger(value) ? String(value) : value.toFixed(2);
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  if (value instanceof Date) return formatIsoDateTime(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Substitutes `[name]` placeholders; the result is not escaped. */
export function interpolateVariables(text: string, variables: DataContext): string {
  return text.replace(PLACEHOLDER, (match, name: string) => {
    const found = lookupPath(variables, name);
    if (!found.found || found.value === null || found.value === undefined) return match;
    return formatInterpolatedValue(found.value);
  });
}

/** Placeholder names in order of appearance. */
export function extractVariables(text: string): readonly string[] {
  return Array.from(text.matchAll(PLACEHOLDER), (m) => m[1] ?? "");
}

/** Escaped label text with `[name]` turned into `#data.variables.name`. */
export function renderLabelReferences(text: string): string {
  let out = "";
  let last = 0;
  for (const match of text.matchAll(REFERENCE_PLACEHOLDER)) {
    const start = match.index ?? 0;
    out += escapeMarkup(text.slice(last, start));
    out += `#data.variables.${match[1] ?? ""}`;
    last = start + match[0].length;
  }
  return out + escapeMarkup(text.slice(last));
}
