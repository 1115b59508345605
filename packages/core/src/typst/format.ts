/**
 * packages/core/src/typst/format.ts - Field value formatting.
 *
 * Locale-neutral rules:
 *   - no format : raw string form
 *   - number    : fixed precision, default 0 places
 *   - currency  : "$" + fixed precision, default 2 places
 *   - percent   : value x 100, fixed precision, default 1 place, "%" suffix
 *   - date      : YYYY-MM-DD
 *   - datetime  : YYYY-MM-DD HH:MM:SSZ (UTC; ".mmm" when milliseconds are set)
 * Decimal places are clamped to 0..15 in both modes.
 * `null`, `undefined` and "" format to "" under every format. Non-numbers
 * under numeric formats and non-dates under date formats are stringified.
 *
 * With a `LocaleFormat`, numbers get locale separators and currency symbol
 * placement, and dates follow the locale's date/time patterns.
 */

import type { FieldFormat } from "../ir/types.js";
import {
  type CurrencyConfig,
  type LocaleConfig,
  clampDecimalPlaces,
  formatLocaleCurrency,
  formatLocaleDate,
  formatLocaleDateTime,
  formatLocaleNumber,
  formatLocalePercent,
} from "./locale.js";

export const DEFAULT_NUMBER_PLACES = 0;
export const DEFAULT_CURRENCY_PLACES = 2;
export const DEFAULT_PERCENT_PLACES = 1;

export type LocaleFormat = Readonly<{
  locale: LocaleConfig;
  currency: CurrencyConfig;
}>;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;
const ISO_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

/** Dates, and ISO-8601 strings with an explicit zone, as `Date`; anything else as null. */
export function toDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value !== "string" || (!ISO_DATE.test(value) && !ISO_DATETIME.test(value))) {
    return null;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function pad(n: number, width: number): string {
  return String(n).padStart(width, "0");
}

export function formatIsoDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

export function formatIsoDateTime(date: Date): string {
  const time = `${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}`;
  const ms = date.getUTCMilliseconds();
  const fraction = ms === 0 ? "" : `.${pad(ms, 3)}`;
  return `${formatIsoDate(date)} ${time}${fraction}Z`;
}

/** Raw string form of a data value. */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value instanceof Date) return formatIsoDateTime(value);
  try {
    return JSON.stringify(value) ?? "";
  } catch {
    return String(value);
  }
}

function formatNumeric(
  value: number,
  format: "number" | "currency" | "percent",
  decimalPlaces: number | undefined,
  localeFormat: LocaleFormat | undefined,
): string {
  switch (format) {
    case "number": {
      const places = clampDecimalPlaces(decimalPlaces ?? DEFAULT_NUMBER_PLACES);
      return localeFormat
        ? formatLocaleNumber(value, places, localeFormat.locale)
        : value.toFixed(places);
    }
    case "currency": {
      if (localeFormat) {
        const { currency, locale } = localeFormat;
        return formatLocaleCurrency(value, currency, locale, decimalPlaces ?? currency.decimalPlaces);
      }
      return `$${value.toFixed(clampDecimalPlaces(decimalPlaces ?? DEFAULT_CURRENCY_PLACES))}`;
    }
    case "percent": {
      const places = clampDecimalPlaces(decimalPlaces ?? DEFAULT_PERCENT_PLACES);
      return localeFormat
        ? formatLocalePercent(value, places, localeFormat.locale)
        : `${(value * 100).toFixed(places)}%`;
    }
  }
}

export function formatValue(
  value: unknown,
  format: FieldFormat | undefined,
  decimalPlaces?: number,
  localeFormat?: LocaleFormat,
): string {
  if (value === null || value === undefined || value === "") return "";

  switch (format) {
    case undefined:
      return stringifyValue(value);
    case "number":
    case "currency":
    case "percent":
      return typeof value === "number"
        ? formatNumeric(value, format, decimalPlaces, localeFormat)
        : stringifyValue(value);
    case "date": {
      const date = toDate(value);
      if (date === null) return stringifyValue(value);
      return localeFormat ? formatLocaleDate(date, localeFormat.locale) : formatIsoDate(date);
    }
    case "datetime": {
      const date = toDate(value);
      if (date === null) return stringifyValue(value);
      return localeFormat ? formatLocaleDateTime(date, localeFormat.locale) : formatIsoDateTime(date);
    }
  }
}
