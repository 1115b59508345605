/**
 * packages/core/src/typst/data.ts - Field lookup against a data context.
 *
 * A single key is a direct lookup. A key path is walked left to right and
 * stops as soon as a step is not a record. An empty path names nothing. Absence is reported, never thrown;
 * the renderer treats every absence as an empty value.
 */

import type { FieldSource } from "../ir/types.js";
import type { DataContext } from "./options.js";

export type LookupResult =
  | Readonly<{ found: true; value: unknown }>
  | Readonly<{ found: false; reason: "not_found" | "not_a_container" }>;

function isContainer(v: unknown): v is DataContext {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !(v instanceof Date);
}

export function lookupField(data: DataContext, source: FieldSource): LookupResult {
  const path = typeof source === "string" ? [source] : source;
  if (path.length === 0) return { found: false, reason: "not_found" };
  let current: unknown = data;
  for (const key of path) {
    if (!isContainer(current)) return { found: false, reason: "not_a_container" };
    if (!Object.prototype.hasOwnProperty.call(current, key)) {
      return { found: false, reason: "not_found" };
    }
    current = current[key];
  }
  return { found: true, value: current };
}

/** Resolves a dotted path (`order.total`) the way label placeholders name values. */
export function lookupPath(data: DataContext, dotted: string): LookupResult {
  return lookupField(data, dotted.split("."));
}
