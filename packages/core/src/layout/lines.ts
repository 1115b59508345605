/**
 * packages/core/src/layout/lines.ts - Separator line lowering.
 */

import { lineNode } from "../ir/nodes.js";
import type { LineNode, LineOrientation, Stroke } from "../ir/types.js";
import type { LineDef } from "./definitions.js";

function boundary(v: number | undefined): number | undefined {
  if (v === undefined || !Number.isInteger(v) || v < 0) return undefined;
  return v;
}

export function transformLine(def: LineDef): LineNode {
  const line: {
    orientation: LineOrientation;
    position: number;
    start?: number;
    end?: number;
    stroke?: Stroke;
  } = {
    orientation: def.orientation === "vertical" ? "vertical" : "horizontal",
    position: boundary(def.position) ?? 0,
  };
  const start = boundary(def.start);
  if (start !== undefined) line.start = start;
  const end = boundary(def.end);
  if (end !== undefined) line.end = end;
  if (def.stroke !== undefined) line.stroke = def.stroke;
  return lineNode(line);
}

export function transformLines(defs: readonly LineDef[] | undefined): readonly LineNode[] {
  if (defs === undefined) return Object.freeze([]);
  return Object.freeze(defs.map(transformLine));
}
