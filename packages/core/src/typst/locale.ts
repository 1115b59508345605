/**
 * packages/core/src/typst/locale.ts - Locale-aware number and date formatting.
 *
 * Unknown locales fall back to en-US. Unknown currency codes render the code
 * itself as the symbol with two decimal places.
 */

export type DatePattern = "mdy" | "dmy" | "dmy_dot" | "dmy_slash" | "ymd";

export type LocaleConfig = Readonly<{
  decimalSeparator: string;
  thousandSeparator: string;
  currencyPosition: "before" | "after";
  datePattern: DatePattern;
  clock: "12h" | "24h";
}>;

export type CurrencyConfig = Readonly<{
  symbol: string;
  decimalPlaces: number;
}>;

export const DEFAULT_LOCALE = "en-US";
export const DEFAULT_CURRENCY = "USD";

export const MAX_DECIMAL_PLACES = 15;

const EN_US: LocaleConfig = Object.freeze({
  decimalSeparator: ".",
  thousandSeparator: ",",
  currencyPosition: "before",
  datePattern: "mdy",
  clock: "12h",
});

export const LOCALES: Readonly<Record<string, LocaleConfig>> = Object.freeze({
  [DEFAULT_LOCALE]: EN_US,
  "en-GB": {
    decimalSeparator: ".",
    thousandSeparator: ",",
    currencyPosition: "before",
    datePattern: "dmy",
    clock: "24h",
  },
  "de-DE": {
    decimalSeparator: ",",
    thousandSeparator: ".",
    currencyPosition: "after",
    datePattern: "dmy_dot",
    clock: "24h",
  },
  "fr-FR": {
    decimalSeparator: ",",
    thousandSeparator: " ",
    currencyPosition: "after",
    datePattern: "dmy_slash",
    clock: "24h",
  },
  "es-ES": {
    decimalSeparator: ",",
    thousandSeparator: ".",
    currencyPosition: "after",
    datePattern: "dmy_slash",
    clock: "24h",
  },
  "ja-JP": {
    decimalSeparator: ".",
    thousandSeparator: ",",
    currencyPosition: "before",
    datePattern: "ymd",
    clock: "24h",
  },
  "zh-CN": {
    decimalSeparator: ".",
    thousandSeparator: ",",
    currencyPosition: "before",
    datePattern: "ymd",
    clock: "24h",
  },
});

export const CURRENCIES: Readonly<Record<string, CurrencyConfig>> = Object.freeze({
  USD: { symbol: "$", decimalPlaces: 2 },
  EUR: { symbol: "€", decimalPlaces: 2 },
  GBP: { symbol: "£", decimalPlaces: 2 },
  JPY: { symbol: "¥", decimalPlaces: 0 },
  CNY: { symbol: "¥", decimalPlaces: 2 },
  CHF: { symbol: "CHF", decimalPlaces: 2 },
  CAD: { symbol: "CA$", decimalPlaces: 2 },
  AUD: { symbol: "A$", decimalPlaces: 2 },
  MXN: { symbol: "MX$", decimalPlaces: 2 },
  BRL: { symbol: "R$", decimalPlaces: 2 },
});

export function resolveLocale(locale: string | undefined): LocaleConfig {
  const known = locale === undefined ? undefined : LOCALES[locale];
  return known ?? EN_US;
}

export function resolveCurrency(code: string | undefined): CurrencyConfig {
  const key = code ?? DEFAULT_CURRENCY;
  return CURRENCIES[key] ?? { symbol: key, decimalPlaces: 2 };
}

/** Decimal places as every numeric format applies them: an integer in 0..15. */
export function clampDecimalPlaces(places: number): number {
  if (!Number.isInteger(places)) return 2;
  return Math.max(0, Math.min(places, MAX_DECIMAL_PLACES));
}

function groupThousands(digits: string, separator: string): string {
  let out = "";
  for (let i = 0; i < digits.length; i++) {
    if (i > 0 && (digits.length - i) % 3 === 0) out += separator;
    out += digits[i] ?? "";
  }
  return out;
}

export function formatLocaleNumber(value: number, places: number, locale: LocaleConfig): string {
  const digits = clampDecimalPlaces(places);
  const fixed = Math.abs(value).toFixed(digits);
  const [integerPart = "0", fraction = ""] = fixed.split(".");
  const negative = value < 0 && Number(fixed) !== 0;
  const grouped = groupThousands(integerPart, locale.thousandSeparator);
  const body = digits > 0 ? `${grouped}${locale.decimalSeparator}${fraction}` : grouped;
  return negative ? `-${body}` : body;
}

export function formatLocaleCurrency(
  value: number,
  currency: CurrencyConfig,
  locale: LocaleConfig,
  places: number = currency.decimalPlaces,
): string {
  const amount = formatLocaleNumber(value, places, locale);
  return locale.currencyPosition === "before"
    ? `${currency.symbol}${amount}`
    : `${amount} ${currency.symbol}`;
}

export function formatLocalePercent(value: number, places: number, locale: LocaleConfig): string {
  return `${formatLocaleNumber(value * 100, places, locale)}%`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatLocaleDate(date: Date, locale: LocaleConfig): string {
  const year = String(date.getUTCFullYear());
  const month = pad2(date.getUTCMonth() + 1);
  const day = pad2(date.getUTCDate());
  switch (locale.datePattern) {
    case "mdy":
      return `${month}/${day}/${year}`;
    case "dmy":
    case "dmy_slash":
      return `${day}/${month}/${year}`;
    case "dmy_dot":
      return `${day}.${month}.${year}`;
    case "ymd":
      return `${year}/${month}/${day}`;
  }
}

export function formatLocaleTime(date: Date, locale: LocaleConfig): string {
  const hour = date.getUTCHours();
  const minute = pad2(date.getUTCMinutes());
  if (locale.clock === "24h") return `${pad2(hour)}:${minute}`;
  const period = hour < 12 ? "AM" : "PM";
  const displayHour = hour % 12 === 0 ? 12 : hour % 12;
  return `${String(displayHour)}:${minute} ${period}`;
}

export function formatLocaleDateTime(date: Date, locale: LocaleConfig): string {
  return `${formatLocaleDate(date, locale)} ${formatLocaleTime(date, locale)}`;
}
