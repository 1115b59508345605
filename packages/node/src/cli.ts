#!/usr/bin/env node
/**
 * packages/node/src/cli.ts - `quire` command.
 *
 *   quire <document.json> [--data <file.json>] [--out <file.typ>] [options]
 *
 * Writes Typst markup to stdout unless --out is given. Flags take precedence
 * over the document's options, which take precedence over QUIRE_* variables.
 */

import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { QuireError, type ReportOptions } from "@quire/core";
import { type Env, parseLength } from "./config.js";
import { buildReport, loadDataFile, loadReportDocument } from "./report.js";

export type CliOptions = {
  document?: string;
  data?: string;
  out?: string;
  pageSize?: string;
  margin?: string;
  font?: string;
  fontSize?: string;
  locale?: string;
  currency?: string;
  reference: boolean;
  validatePlacement: boolean;
  help: boolean;
};

type ValueFlag =
  | "data"
  | "out"
  | "pageSize"
  | "margin"
  | "font"
  | "fontSize"
  | "locale"
  | "currency";

const VALUE_FLAGS: Readonly<Record<string, ValueFlag>> = Object.freeze({
  "--data": "data",
  "--out": "out",
  "-o": "out",
  "--page-size": "pageSize",
  "--margin": "margin",
  "--font": "font",
  "--font-size": "fontSize",
  "--locale": "locale",
  "--currency": "currency",
});

function usageError(message: string): QuireError {
  return new QuireError("QUIRE_INVALID_ARGS", message);
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { reference: false, validatePlacement: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (arg === "--help" || arg === "-h") {
      options.help = true;
      continue;
    }
    if (arg === "--reference") {
      options.reference = true;
      continue;
    }
    if (arg === "--validate-placement") {
      options.validatePlacement = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = arg.startsWith("--") && eq > 0 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[name];
    if (key !== undefined) {
      if (name !== arg) {
        options[key] = arg.slice(eq + 1);
        continue;
      }
      const value = argv[i + 1];
      if (!value) throw usageError(`Missing value for ${arg}`);
      options[key] = value;
      i++;
      continue;
    }

    if (arg.startsWith("-")) {
      throw usageError(`Unknown option: ${arg}`);
    }
    if (!options.document) {
      options.document = arg;
      continue;
    }
    throw usageError(`Unexpected argument: ${arg}`);
  }

  return options;
}

/** Render options named on the command line. */
export function flagOverrides(options: CliOptions): ReportOptions {
  const out: { -readonly [K in keyof ReportOptions]: ReportOptions[K] } = {};
  if (options.pageSize !== undefined) out.pageSize = options.pageSize;
  if (options.margin !== undefined) out.margin = parseLength(options.margin);
  if (options.font !== undefined) out.font = options.font;
  if (options.fontSize !== undefined) out.fontSize = parseLength(options.fontSize);
  if (options.locale !== undefined) out.locale = options.locale;
  if (options.currency !== undefined) out.currency = options.currency;
  if (options.reference) out.fieldMode = "reference";
  return out;
}

export const HELP_TEXT = [
  "quire",
  "",
  "Usage:",
  "  quire <document.json> [--data <file.json>] [--out <file.typ>]",
  "",
  "Options:",
  "  --data <file>           JSON record fields are read from",
  "  --out, -o <file>        Write markup to a file instead of stdout",
  "  --page-size <name>      Paper size (a4, us-letter, ...)",
  "  --margin <length>       Page margin (2cm, 36)",
  "  --font <family>         Default font family",
  "  --font-size <length>    Default text size",
  "  --locale <tag>          Locale for numbers and dates (en-US, de-DE, ...)",
  "  --currency <code>       Currency code (USD, EUR, JPY, ...)",
  "  --reference             Emit record/variable references instead of values",
  "  --validate-placement    Check cell spans and positions against the columns",
  "  --help, -h              Show this help",
  "",
].join("\n");

export type CliIo = Readonly<{
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Env;
  cwd: string;
}>;

/** Runs the command and returns its exit code. */
export function runCli(argv: readonly string[], io: CliIo): number {
  try {
    const options = parseArgs(argv);
    if (options.help) {
      io.stdout(HELP_TEXT);
      return 0;
    }
    if (!options.document) throw usageError("Missing report document (see --help)");

    const document = loadReportDocument(resolve(io.cwd, options.document));
    const data = options.data === undefined ? undefined : loadDataFile(resolve(io.cwd, options.data));
    const outFile = options.out === undefined ? undefined : resolve(io.cwd, options.out);

    const report = buildReport({
      document,
      ...(data === undefined ? {} : { data }),
      overrides: flagOverrides(options),
      env: io.env,
      validatePlacement: options.validatePlacement,
      ...(outFile === undefined ? {} : { outFile }),
    });

    if (outFile === undefined) io.stdout(`${report.text}\n`);
    return 0;
  } catch (err) {
    io.stderr(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    return 1;
  }
}

const isMain = process.argv[1] && fileURLToPath(import.meta.url) === resolve(process.argv[1]);
if (isMain) {
  process.exitCode = runCli(process.argv.slice(2), {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    env: process.env,
    cwd: process.cwd(),
  });
}
