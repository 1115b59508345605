/**
 * packages/core/src/layout/tracks.ts - Track normalization.
 *
 * Converts column/row declarations into the canonical ordered list of
 * track-size tokens used by the IR:
 *   - undefined        -> []
 *   - "auto"           -> ["auto"]
 *   - n (positive int) -> n x "auto"
 *   - list             -> element-wise: "auto", { fr: n } -> "<n>fr",
 *                         strings unchanged, bare numbers -> "<n>pt"
 */

import { type TrackAxis, invalidTrackDefinition } from "./errors.js";
import type { FrTrack, TrackDef } from "./definitions.js";
import { type LayoutResult, fail, ok } from "./result.js";

const AUTO = "auto";

/** Unit applied to bare numeric entries of a track list. */
export const BARE_TRACK_UNIT = "pt";

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

function isFrTrack(v: unknown): v is FrTrack {
  if (typeof v !== "object" || v === null || Array.isArray(v)) return false;
  return "fr" in v && isFiniteNumber(v.fr);
}

function createAutoTracks(count: number): readonly string[] {
  const out: string[] = [];
  for (let i = 0; i < count; i++) {
    out.push(AUTO);
  }
  return Object.freeze(out);
}

function normalizeTrackSize(raw: unknown): string | null {
  if (raw === AUTO) return AUTO;
  if (typeof raw === "string") return raw;
  if (isFiniteNumber(raw)) return `${String(raw)}${BARE_TRACK_UNIT}`;
  if (isFrTrack(raw)) return `${String(raw.fr)}fr`;
  return null;
}

export function normalizeTracks(
  raw: TrackDef | undefined,
  axis: TrackAxis,
): LayoutResult<readonly string[]> {
  if (raw === undefined) return ok(Object.freeze([]));
  if (raw === AUTO) return ok(Object.freeze([AUTO]));

  if (typeof raw === "number") {
    if (!Number.isInteger(raw) || raw <= 0) return fail(invalidTrackDefinition(axis, raw));
    return ok(createAutoTracks(raw));
  }

  if (Array.isArray(raw)) {
    const tracks: string[] = [];
    for (const entry of raw) {
      const token = normalizeTrackSize(entry);
      if (token === null) return fail(invalidTrackDefinition(axis, raw));
      tracks.push(token);
    }
    return ok(Object.freeze(tracks));
  }

  return fail(invalidTrackDefinition(axis, raw));
}
