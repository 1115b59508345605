/**
 * packages/core/src/typst/cell.ts - Cell rendering.
 *
 * A cell without parameters renders as `[content]`; otherwise as
 * `grid.cell(...)[content]` / `table.cell(...)[content]` with colspan,
 * rowspan (when > 1), align, fill, inset, stroke and `breakable: false`.
 */

import type { CellNode, CellProperties, RowNode } from "../ir/types.js";
import { renderContentList } from "./content.js";
import type { RenderContext } from "./context.js";
import { renderAlignment, renderColor, renderLength, renderStroke } from "./values.js";

export type CellScope = "grid" | "table";

export function cellParams(cell: CellNode): readonly string[] {
  const { span, properties } = cell;
  const params: string[] = [];
  if (span.colspan > 1) params.push(`colspan: ${String(span.colspan)}`);
  if (span.rowspan > 1) params.push(`rowspan: ${String(span.rowspan)}`);
  if (properties.align !== undefined) params.push(`align: ${renderAlignment(properties.align)}`);
  if (properties.fill !== undefined) params.push(`fill: ${renderColor(properties.fill)}`);
  if (properties.inset !== undefined) params.push(`inset: ${renderLength(properties.inset)}`);
  if (properties.stroke !== undefined) params.push(`stroke: ${renderStroke(properties.stroke)}`);
  if (properties.breakable === false) params.push("breakable: false");
  return params;
}

/** Cell markup without leading indent; nested layouts continue at `indent`. */
export function renderCell(
  cell: CellNode,
  scope: CellScope,
  indent: number,
  ctx: RenderContext,
): string {
  const body = `[${renderContentList(cell.content, indent, ctx)}]`;
  const params = cellParams(cell);
  if (params.length === 0) return body;
  return `${scope}.cell(${params.join(", ")})${body}`;
}

function inheritRowProperties(cell: CellNode, row: RowNode): CellNode {
  const rowProps = row.properties;
  const merged: { -readonly [K in keyof CellProperties]: CellProperties[K] } = {
    ...cell.properties,
  };
  let changed = false;
  if (merged.align === undefined && rowProps.align !== undefined) {
    merged.align = rowProps.align;
    changed = true;
  }
  if (merged.inset === undefined && rowProps.inset !== undefined) {
    merged.inset = rowProps.inset;
    changed = true;
  }
  if (merged.fill === undefined && rowProps.fill !== undefined) {
    merged.fill = rowProps.fill;
    changed = true;
  }
  if (merged.stroke === undefined && rowProps.stroke !== undefined) {
    merged.stroke = rowProps.stroke;
    changed = true;
  }
  return changed ? { ...cell, properties: merged } : cell;
}

/** A row's cells with the row's align, inset, fill and stroke applied where unset. */
export function flattenRow(row: RowNode): readonly CellNode[] {
  return row.cells.map((cell) => inheritRowProperties(cell, row));
}
