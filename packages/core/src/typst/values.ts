/**
 * packages/core/src/typst/values.ts - Property value rendering.
 */

import type { Alignment, Fill, Length, Stroke } from "../ir/types.js";
import { quoteString } from "./escape.js";

/** Numbers are points; strings ("1fr", "2cm", "auto") pass through. */
export function renderLength(length: Length): string {
  return typeof length === "number" ? `${String(length)}pt` : length;
}

export function renderAlignment(align: Alignment): string {
  if (typeof align === "string") return align;
  return `${align[0]} + ${align[1]}`;
}

/** Hex colors become `rgb("#...")`; keywords and expressions pass through. */
export function renderColor(color: Fill): string {
  return color.startsWith("#") ? `rgb(${quoteString(color)})` : color;
}

export function renderStroke(stroke: Stroke): string {
  if (typeof stroke === "string" || typeof stroke === "number") return renderLength(stroke);
  const parts: string[] = [];
  if (stroke.thickness !== undefined) parts.push(`thickness: ${renderLength(stroke.thickness)}`);
  if (stroke.paint !== undefined) parts.push(`paint: ${renderColor(stroke.paint)}`);
  if (stroke.dash !== undefined) parts.push(`dash: ${quoteString(stroke.dash)}`);
  if (parts.length === 0) return "auto";
  return `(${parts.join(", ")})`;
}

/** `(auto, 1fr, 40pt)`; callers skip empty track lists. */
export function renderTracks(tracks: readonly string[]): string {
  return `(${tracks.join(", ")})`;
}

export function indentOf(level: number): string {
  return "  ".repeat(level);
}
