/**
 * packages/node/src/renderAudit.ts - Optional NDJSON render audit.
 *
 * Enable with:
 *   QUIRE_RENDER_AUDIT=1
 *
 * Optional:
 *   QUIRE_RENDER_AUDIT_LOG=/tmp/quire-render-audit.ndjson
 *   QUIRE_RENDER_AUDIT_STDERR_MIRROR=1
 *
 * When enabled without a log path, records go to
 * <tmpdir>/quire-render-audit.ndjson so report output on stdout stays clean.
 */

import { appendFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { performance } from "node:perf_hooks";
import { type Env, envFlag, readEnv } from "./config.js";

type AuditRecord = Readonly<Record<string, unknown>>;

export const DEFAULT_RENDER_AUDIT_FILE = "quire-render-audit.ndjson";

export type RenderAuditLogger = Readonly<{
  enabled: boolean;
  logPath: string | null;
  emit: (stage: string, fields?: AuditRecord) => void;
}>;

function toHex32(v: number): string {
  return `0x${(v >>> 0).toString(16).padStart(8, "0")}`;
}

function hashFnv1a32(bytes: Uint8Array): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < bytes.byteLength; i++) {
    h ^= bytes[i] ?? 0;
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export type TextFingerprint = Readonly<{
  bytes: number;
  hash32: string;
}>;

/** UTF-8 size and FNV-1a hash of rendered output. */
export function textFingerprint(text: string): TextFingerprint {
  const bytes = new TextEncoder().encode(text);
  return Object.freeze({ bytes: bytes.byteLength, hash32: toHex32(hashFnv1a32(bytes)) });
}

export function nowMs(): number {
  return performance.now();
}

const DISABLED: RenderAuditLogger = Object.freeze({
  enabled: false,
  logPath: null,
  emit: () => {},
});

export function createRenderAuditLogger(scope: string, env: Env = process.env): RenderAuditLogger {
  if (!envFlag(env, "QUIRE_RENDER_AUDIT", false)) return DISABLED;

  const logPath = readEnv(env, "QUIRE_RENDER_AUDIT_LOG") ?? join(tmpdir(), DEFAULT_RENDER_AUDIT_FILE);
  const mirror = envFlag(env, "QUIRE_RENDER_AUDIT_STDERR_MIRROR", false);

  const writeLine = (line: string): void => {
    try {
      appendFileSync(logPath, `${line}\n`, "utf8");
      if (mirror) process.stderr.write(`${line}\n`);
    } catch (err) {
      // Audit output is diagnostics only; rendering goes on.
      process.emitWarning(
        `render audit write failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  };

  return Object.freeze({
    enabled: true,
    logPath,
    emit: (stage: string, fields: AuditRecord = Object.freeze({})) => {
      writeLine(
        JSON.stringify({
          ts: new Date().toISOString(),
          pid: process.pid,
          scope,
          stage,
          ...fields,
        }),
      );
    },
  });
}
