/**
 * packages/node/src/report.ts - Report documents on disk.
 *
 * Reads a JSON report document (and optionally a JSON data record), layers
 * render options (environment < document < overrides), renders the report
 * and writes it out. Every render emits one audit record when the render
 * audit is enabled.
 */

import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  type DataContext,
  type LayoutNode,
  QuireError,
  type ReportDocument,
  type ReportOptions,
  countNodes,
  parseReportDocument,
  quireErrorFromLayout,
  renderReport,
  transformLayout,
} from "@quire/core";
import { type Env, mergeReportOptions, readRenderConfig } from "./config.js";
import {
  type RenderAuditLogger,
  createRenderAuditLogger,
  nowMs,
  textFingerprint,
} from "./renderAudit.js";

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    throw new QuireError("QUIRE_IO_ERROR", `cannot read ${path}: ${describeError(err)}`, {
      cause: err,
    });
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new QuireError("QUIRE_INVALID_DOCUMENT", `${path}: invalid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }
}

export function loadReportDocument(path: string): ReportDocument {
  const res = parseReportDocument(readJsonFile(path));
  if (!res.ok) throw quireErrorFromLayout(res.error);
  return res.value;
}

function isDataContext(v: unknown): v is DataContext {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function loadDataFile(path: string): DataContext {
  const value = readJsonFile(path);
  if (!isDataContext(value)) {
    throw new QuireError("QUIRE_INVALID_DOCUMENT", `${path}: expected a JSON object`);
  }
  return value;
}

export function writeReportFile(path: string, text: string): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, text, "utf8");
  } catch (err) {
    throw new QuireError("QUIRE_IO_ERROR", `cannot write ${path}: ${describeError(err)}`, {
      cause: err,
    });
  }
}

export type BuildReportOptions = Readonly<{
  document: ReportDocument;
  data?: DataContext;
  /** Highest-precedence options, typically command-line flags. */
  overrides?: ReportOptions;
  env?: Env;
  validatePlacement?: boolean;
  /** Written when set; the rendered text is returned either way. */
  outFile?: string;
  audit?: RenderAuditLogger;
}>;

export type BuiltReport = Readonly<{
  text: string;
  options: ReportOptions;
  layouts: readonly LayoutNode[];
}>;

export function buildReport(opts: BuildReportOptions): BuiltReport {
  const env = opts.env ?? process.env;
  const audit = opts.audit ?? createRenderAuditLogger("report", env);
  const started = nowMs();

  const options = mergeReportOptions(
    readRenderConfig(env),
    opts.document.options,
    opts.data === undefined ? {} : { data: opts.data },
    opts.overrides ?? {},
  );

  const layouts: LayoutNode[] = [];
  for (const def of opts.document.layouts) {
    const res = transformLayout(def, { validatePlacement: opts.validatePlacement === true });
    if (!res.ok) {
      audit.emit("report.failed", {
        layouts: opts.document.layouts.length,
        error: res.error.code,
        durationMs: nowMs() - started,
      });
      throw quireErrorFromLayout(res.error);
    }
    layouts.push(res.value);
  }

  const text = renderReport(layouts, options);
  if (opts.outFile !== undefined) {
    try {
      writeReportFile(opts.outFile, text);
    } catch (err) {
      audit.emit("report.failed", {
        layouts: layouts.length,
        error: err instanceof QuireError ? err.code : "QUIRE_IO_ERROR",
        durationMs: nowMs() - started,
        outFile: opts.outFile,
      });
      throw err;
    }
  }

  if (audit.enabled) {
    const fingerprint = textFingerprint(text);
    audit.emit("report.rendered", {
      layouts: layouts.length,
      nodes: layouts.reduce((sum, layout) => sum + countNodes(layout), 0),
      bytes: fingerprint.bytes,
      hash32: fingerprint.hash32,
      durationMs: nowMs() - started,
      outFile: opts.outFile ?? null,
    });
  }

  return Object.freeze({ text, options, layouts: Object.freeze(layouts) });
}
