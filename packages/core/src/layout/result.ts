import { type LayoutError, unknownElementType } from "./errors.js";

/**
 * Layout operation result: success with value, or failure with the first
 * error met anywhere in the subtree.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: LayoutError }>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

export function fail(error: LayoutError): LayoutResult<never> {
  return { ok: false, error };
}

/**
 * Maps every item through `fn`, stopping at the first failure.
 * The callback receives the item's index in the input list. A hole in the
 * list fails with `unknown_element_type`.
 */
export function mapAll<T, U>(
  items: readonly T[] | undefined,
  fn: (item: T, index: number) => LayoutResult<U>,
): LayoutResult<readonly U[]> {
  const out: U[] = [];
  if (items === undefined) return ok(out);
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    if (item === undefined) return fail(unknownElementType(item));
    const res = fn(item, i);
    if (!res.ok) return res;
    out.push(res.value);
  }
  return ok(out);
}
