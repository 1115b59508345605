/**
 * packages/core/src/typst/escape.ts - Markup escaping.
 *
 * Prefixes every markup-significant character with a backslash:
 * `\ # $ @ * _ [ ] { } < >`. A single pass over the input is equivalent to
 * escaping the backslash first and the delimiters afterwards; backslashes
 * produced by escaping are never escaped again.
 */

const MARKUP_SPECIAL = /[\\#$@*_[\]{}<>]/g;

export function escapeMarkup(text: string): string {
  return text.replace(MARKUP_SPECIAL, "\\$&");
}

/** Typst string literal (code mode). */
export function quoteString(value: string): string {
  return `"${value.replace(/[\\"]/g, "\\$&")}"`;
}
