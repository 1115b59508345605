/**
 * packages/node/src/config.ts - Environment configuration.
 *
 *   QUIRE_PAGE_SIZE   paper name ("a4", "us-letter")
 *   QUIRE_MARGIN      length ("2cm"; bare numbers are points)
 *   QUIRE_FONT        default font family
 *   QUIRE_FONT_SIZE   default text size
 *   QUIRE_LOCALE      locale for numbers and dates ("de-DE")
 *   QUIRE_CURRENCY    ISO currency code ("EUR")
 *
 * Blank values are ignored.
 */

import type { Length, ReportOptions } from "@quire/core";

export type Env = Readonly<Record<string, string | undefined>>;

export type RenderConfig = Readonly<{
  pageSize?: string;
  margin?: Length;
  font?: string;
  fontSize?: Length;
  locale?: string;
  currency?: string;
}>;

export function readEnv(env: Env, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function envFlag(env: Env, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

const BARE_NUMBER = /^-?\d+(?:\.\d+)?$/;

/** "11" -> 11 (points); anything else stays a length string. */
export function parseLength(value: string): Length {
  return BARE_NUMBER.test(value) ? Number(value) : value;
}

export function readRenderConfig(env: Env = process.env): RenderConfig {
  const out: { -readonly [K in keyof RenderConfig]: RenderConfig[K] } = {};
  const pageSize = readEnv(env, "QUIRE_PAGE_SIZE");
  if (pageSize !== null) out.pageSize = pageSize;
  const margin = readEnv(env, "QUIRE_MARGIN");
  if (margin !== null) out.margin = parseLength(margin);
  const font = readEnv(env, "QUIRE_FONT");
  if (font !== null) out.font = font;
  const fontSize = readEnv(env, "QUIRE_FONT_SIZE");
  if (fontSize !== null) out.fontSize = parseLength(fontSize);
  const locale = readEnv(env, "QUIRE_LOCALE");
  if (locale !== null) out.locale = locale;
  const currency = readEnv(env, "QUIRE_CURRENCY");
  if (currency !== null) out.currency = currency;
  return Object.freeze(out);
}

type MutableReportOptions = { -readonly [K in keyof ReportOptions]: ReportOptions[K] };

/**
 * Layers option sets; later layers win, `undefined` entries never override.
 * Typical order: environment, document options, command-line flags.
 */
export function mergeReportOptions(...layers: readonly ReportOptions[]): ReportOptions {
  const out: MutableReportOptions = {};
  for (const layer of layers) {
    if (layer.pageSize !== undefined) out.pageSize = layer.pageSize;
    if (layer.margin !== undefined) out.margin = layer.margin;
    if (layer.font !== undefined) out.font = layer.font;
    if (layer.fontSize !== undefined) out.fontSize = layer.fontSize;
    if (layer.locale !== undefined) out.locale = layer.locale;
    if (layer.currency !== undefined) out.currency = layer.currency;
    if (layer.fieldMode !== undefined) out.fieldMode = layer.fieldMode;
    if (layer.variables !== undefined) out.variables = layer.variables;
    if (layer.data !== undefined) out.data = layer.data;
  }
  return Object.freeze(out);
}
