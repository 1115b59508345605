import { STYLE_KEYS, type Style, type StyleKey } from "./types.js";

type MutableStyle = { -readonly [K in StyleKey]?: Style[K] };

/** True when no style attribute is set. */
export function isEmptyStyle(style: Style | undefined): boolean {
  if (style === undefined) return true;
  for (const key of STYLE_KEYS) {
    if (style[key] !== undefined) return false;
  }
  return true;
}

/**
 * Builds a frozen style holding only the attributes that are set, or
 * `undefined` when none is.
 */
export function createStyle(attrs: Style): Style | undefined {
  const out: MutableStyle = {};
  let any = false;
  for (const key of STYLE_KEYS) {
    const value = attrs[key];
    if (value === undefined) continue;
    assignStyleKey(out, key, value);
    any = true;
  }
  return any ? Object.freeze(out) : undefined;
}

/** Merges two styles; attributes set on `override` win. */
export function mergeStyle(base: Style | undefined, override: Style | undefined): Style | undefined {
  if (base === undefined) return override === undefined ? undefined : createStyle(override);
  if (override === undefined) return createStyle(base);
  const merged: MutableStyle = {};
  for (const key of STYLE_KEYS) {
    const value = override[key] ?? base[key];
    if (value !== undefined) assignStyleKey(merged, key, value);
  }
  return createStyle(merged);
}

function assignStyleKey<K extends StyleKey>(
  target: MutableStyle,
  key: K,
  value: NonNullable<Style[K]>,
): void {
  target[key] = value;
}
