import { assert, describe, test } from "@quire/testkit";
import { envFlag, mergeReportOptions, parseLength, readEnv, readRenderConfig } from "../config.js";

describe("environment helpers", () => {
  test("readEnv trims and treats blank as unset", () => {
    assert.equal(readEnv({ A: "  x " }, "A"), "x");
    assert.equal(readEnv({ A: "   " }, "A"), null);
    assert.equal(readEnv({}, "A"), null);
  });

  test("envFlag", () => {
    assert.equal(envFlag({ F: "YES" }, "F"), true);
    assert.equal(envFlag({ F: "on" }, "F"), true);
    assert.equal(envFlag({ F: "0" }, "F", true), false);
    assert.equal(envFlag({}, "F", true), true);
  });

  test("parseLength: bare numbers are points", () => {
    assert.equal(parseLength("11"), 11);
    assert.equal(parseLength("-1.5"), -1.5);
    assert.equal(parseLength("2cm"), "2cm");
  });
});

describe("readRenderConfig", () => {
  test("reads QUIRE_* variables, skipping blank ones", () => {
    assert.deepEqual(
      readRenderConfig({
        QUIRE_PAGE_SIZE: "a4",
        QUIRE_MARGIN: "36",
        QUIRE_FONT: " ",
        QUIRE_FONT_SIZE: "10pt",
        QUIRE_LOCALE: "de-DE",
        QUIRE_CURRENCY: "EUR",
        UNRELATED: "x",
      }),
      { pageSize: "a4", margin: 36, fontSize: "10pt", locale: "de-DE", currency: "EUR" },
    );
  });

  test("empty environment", () => {
    assert.deepEqual(readRenderConfig({}), {});
  });
});

describe("mergeReportOptions", () => {
  test("later layers win; undefined never overrides", () => {
    assert.deepEqual(
      mergeReportOptions(
        { pageSize: "a4", locale: "en-US" },
        { pageSize: "a5", locale: undefined },
        { fieldMode: "reference" },
      ),
      { pageSize: "a5", locale: "en-US", fieldMode: "reference" },
    );
  });

  test("data and variables are carried", () => {
    const merged = mergeReportOptions({ variables: { a: 1 } }, { data: { b: 2 } });
    assert.deepEqual(merged, { variables: { a: 1 }, data: { b: 2 } });
  });
});
