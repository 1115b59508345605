import { assert, describe, test } from "@quire/testkit";
import {
  formatLocaleCurrency,
  formatLocaleDate,
  formatLocaleDateTime,
  formatLocaleNumber,
  formatLocalePercent,
  formatLocaleTime,
  resolveCurrency,
  resolveLocale,
} from "../locale.js";

const enUS = resolveLocale("en-US");
const deDE = resolveLocale("de-DE");
const frFR = resolveLocale("fr-FR");
const jaJP = resolveLocale("ja-JP");
const enGB = resolveLocale("en-GB");

describe("locale numbers", () => {
  test("thousand and decimal separators", () => {
    assert.equal(formatLocaleNumber(1234567.891, 2, enUS), "1,234,567.89");
    assert.equal(formatLocaleNumber(1234567.891, 2, deDE), "1.234.567,89");
    assert.equal(formatLocaleNumber(1234567.891, 2, frFR), "1 234 567,89");
  });

  test("negative values keep the sign unless they round to zero", () => {
    assert.equal(formatLocaleNumber(-1234.5, 1, enUS), "-1,234.5");
    assert.equal(formatLocaleNumber(-0.001, 2, enUS), "0.00");
  });

  test("decimal places are clamped to 0..15", () => {
    assert.equal(formatLocaleNumber(2.5, -3, enUS), "3");
    assert.equal(formatLocaleNumber(1, 20, enUS), "1.000000000000000");
  });

  test("currency symbol placement", () => {
    assert.equal(formatLocaleCurrency(1234.56, resolveCurrency("USD"), enUS), "$1,234.56");
    assert.equal(formatLocaleCurrency(1234.56, resolveCurrency("EUR"), deDE), "1.234,56 €");
  });

  test("JPY has no decimal places", () => {
    assert.equal(formatLocaleCurrency(1234.56, resolveCurrency("JPY"), jaJP), "¥1,235");
  });

  test("unknown currency uses its code with two places", () => {
    assert.deepEqual(resolveCurrency("XYZ"), { symbol: "XYZ", decimalPlaces: 2 });
    assert.equal(formatLocaleCurrency(5, resolveCurrency("XYZ"), enUS), "XYZ5.00");
  });

  test("percent", () => {
    assert.equal(formatLocalePercent(0.125, 1, frFR), "12,5%");
  });

  test("unknown locale falls back to en-US", () => {
    assert.equal(resolveLocale("tlh"), enUS);
    assert.equal(resolveLocale(undefined), enUS);
    assert.equal(resolveCurrency(undefined).symbol, "$");
  });
});

describe("locale dates", () => {
  const afternoon = new Date(Date.UTC(2024, 2, 5, 14, 30));
  const midnight = new Date(Date.UTC(2024, 11, 31, 0, 5));

  test("date patterns", () => {
    assert.equal(formatLocaleDate(afternoon, enUS), "03/05/2024");
    assert.equal(formatLocaleDate(afternoon, enGB), "05/03/2024");
    assert.equal(formatLocaleDate(afternoon, deDE), "05.03.2024");
    assert.equal(formatLocaleDate(afternoon, frFR), "05/03/2024");
    assert.equal(formatLocaleDate(afternoon, jaJP), "2024/03/05");
  });

  test("12h and 24h clocks", () => {
    assert.equal(formatLocaleTime(afternoon, enUS), "2:30 PM");
    assert.equal(formatLocaleTime(midnight, enUS), "12:05 AM");
    assert.equal(formatLocaleTime(afternoon, deDE), "14:30");
    assert.equal(formatLocaleTime(midnight, deDE), "00:05");
  });

  test("datetime joins date and time", () => {
    assert.equal(formatLocaleDateTime(afternoon, enUS), "03/05/2024 2:30 PM");
  });
});
