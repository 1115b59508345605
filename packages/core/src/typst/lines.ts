/**
 * packages/core/src/typst/lines.ts - Separator line rendering.
 */

import type { LineNode } from "../ir/types.js";
import type { CellScope } from "./cell.js";
import { renderStroke } from "./values.js";

export function renderLine(line: LineNode, scope: CellScope): string {
  const horizontal = line.orientation === "horizontal";
  const params = [`${horizontal ? "y" : "x"}: ${String(line.position)}`];
  if (line.start !== undefined) params.push(`start: ${String(line.start)}`);
  if (line.end !== undefined) params.push(`end: ${String(line.end)}`);
  if (line.stroke !== undefined) params.push(`stroke: ${renderStroke(line.stroke)}`);
  return `${scope}.${horizontal ? "hline" : "vline"}(${params.join(", ")})`;
}
