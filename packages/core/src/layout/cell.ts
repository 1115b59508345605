/**
 * packages/core/src/layout/cell.ts - Cell and row assembly.
 */

import { cellNode, rowNode } from "../ir/nodes.js";
import type { CellNode, CellProperties, RowNode, RowProperties } from "../ir/types.js";
import { lowerContent } from "./content.js";
import type { CellDef, RowDef } from "./definitions.js";
import { type LayoutResult, mapAll, ok } from "./result.js";
import type { TransformOptions } from "./transform.js";

function nonNegativeInt(v: number | undefined, fallback: number): number {
  if (v === undefined || !Number.isInteger(v) || v < 0) return fallback;
  return v;
}

function positiveInt(v: number | undefined, fallback: number): number {
  if (v === undefined || !Number.isInteger(v) || v < 1) return fallback;
  return v;
}

function cellProperties(cell: CellDef): CellProperties {
  const out: {
    -readonly [K in keyof CellProperties]: CellProperties[K];
  } = {};
  if (cell.align !== undefined) out.align = cell.align;
  if (cell.inset !== undefined) out.inset = cell.inset;
  if (cell.fill !== undefined) out.fill = cell.fill;
  if (cell.stroke !== undefined) out.stroke = cell.stroke;
  if (cell.breakable !== undefined) out.breakable = cell.breakable;
  return out;
}

function rowProperties(row: RowDef): RowProperties {
  const out: {
    -readonly [K in keyof RowProperties]: RowProperties[K];
  } = {};
  if (row.height !== undefined) out.height = row.height;
  if (row.fill !== undefined) out.fill = row.fill;
  if (row.stroke !== undefined) out.stroke = row.stroke;
  if (row.align !== undefined) out.align = row.align;
  if (row.inset !== undefined) out.inset = row.inset;
  return out;
}

export function transformCell(cell: CellDef, opts: TransformOptions = {}): LayoutResult<CellNode> {
  const content = mapAll(cell.elements, (element) => lowerContent(element, opts));
  if (!content.ok) return content;

  return ok(
    cellNode({
      position: { column: nonNegativeInt(cell.x, 0), row: nonNegativeInt(cell.y, 0) },
      span: { colspan: positiveInt(cell.colspan, 1), rowspan: positiveInt(cell.rowspan, 1) },
      properties: cellProperties(cell),
      content: content.value,
    }),
  );
}

/** Lowers a row; `index` is its position in the parent, independent of its properties. */
export function transformRow(
  row: RowDef,
  index: number,
  opts: TransformOptions = {},
): LayoutResult<RowNode> {
  const cells = mapAll(row.cells, (cell) => transformCell(cell, opts));
  if (!cells.ok) return cells;
  return ok(rowNode(index, cells.value, rowProperties(row)));
}
