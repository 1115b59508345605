import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { assert, describe, fixturePath, readFixture, test } from "@quire/testkit";
import { type CliIo, HELP_TEXT, flagOverrides, parseArgs, runCli } from "../cli.js";

type Captured = { io: CliIo; out: string[]; err: string[] };

function capture(cwd = process.cwd()): Captured {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      env: {},
      cwd,
    },
    out,
    err,
  };
}

describe("parseArgs", () => {
  test("flags in both spellings and one positional", () => {
    assert.deepEqual(
      parseArgs(["doc.json", "--data", "d.json", "--out=o.typ", "--reference", "--font-size", "12"]),
      {
        document: "doc.json",
        data: "d.json",
        out: "o.typ",
        fontSize: "12",
        reference: true,
        validatePlacement: false,
        help: false,
      },
    );
  });

  test("short forms", () => {
    const options = parseArgs(["-h", "-o", "x.typ"]);
    assert.equal(options.help, true);
    assert.equal(options.out, "x.typ");
  });

  test("usage errors", () => {
    assert.throws(() => parseArgs(["--bogus"]), /^QuireError: Unknown option: --bogus$/);
    assert.throws(() => parseArgs(["--data"]), /Missing value for --data/);
    assert.throws(() => parseArgs(["a.json", "b.json"]), /Unexpected argument: b\.json/);
  });
});

describe("flagOverrides", () => {
  test("maps flags to render options", () => {
    assert.deepEqual(
      flagOverrides({
        margin: "36",
        currency: "EUR",
        reference: true,
        validatePlacement: false,
        help: false,
      }),
      { margin: 36, currency: "EUR", fieldMode: "reference" },
    );
  });
});

describe("runCli", () => {
  test("--help prints usage", () => {
    const c = capture();
    assert.equal(runCli(["--help"], c.io), 0);
    assert.deepEqual(c.out, [HELP_TEXT]);
  });

  test("renders to stdout", () => {
    const c = capture();
    const code = runCli(
      [fixturePath("invoice.report.json"), "--data", fixturePath("invoice.data.json")],
      c.io,
    );
    assert.equal(code, 0);
    assert.deepEqual(c.err, []);
    assert.deepEqual(c.out, [readFixture("invoice.typ")]);
  });

  test("flags override document options", () => {
    const c = capture();
    runCli(
      [fixturePath("invoice.report.json"), "--page-size", "a5", "--data", fixturePath("invoice.data.json")],
      c.io,
    );
    assert.equal(c.out.join("").split("\n")[0], '#set page(paper: "a5")');
  });

  test("--out writes relative to the working directory", () => {
    const dir = mkdtempSync(join(tmpdir(), "quire-cli-"));
    try {
      const c = capture(dir);
      const code = runCli(
        [
          fixturePath("invoice.report.json"),
          `--data=${fixturePath("invoice.data.json")}`,
          "--out",
          "build/invoice.typ",
        ],
        c.io,
      );
      assert.equal(code, 0);
      assert.deepEqual(c.out, []);
      assert.equal(
        `${readFileSync(join(dir, "build", "invoice.typ"), "utf8")}\n`,
        readFixture("invoice.typ"),
      );
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  test("errors go to stderr with exit code 1", () => {
    const missing = capture();
    assert.equal(runCli([], missing.io), 1);
    assert.deepEqual(missing.err, ["error: Missing report document (see --help)\n"]);

    const invalid = capture();
    assert.equal(runCli([fixturePath("invalid.report.json")], invalid.io), 1);
    assert.deepEqual(invalid.err, [
      "error: $.layouts[0].bodyRows[0].cells[0].elements[0].text: expected a string\n",
    ]);
    assert.deepEqual(invalid.out, []);
  });
});
