/**
 * packages/core/src/layout/transform.ts - Layout tree transformer.
 *
 * Lowers a layout description to IR:
 *   1. normalize column and row tracks
 *   2. lower children in fixed order: explicit rows, bare cells, bare items
 *   3. tables: lower headers and footers
 *   4. resolve container properties (table defaults, gutter suppression)
 *   5. lower separator lines into the node's trailing `lines` slot
 *
 * The first error anywhere in the subtree aborts the whole transform.
 */

import { gridNode, singleContentCell, stackNode, tableNode } from "../ir/nodes.js";
import type { CellNode, GridChild, GridNode, LayoutNode, StackNode, TableNode } from "../ir/types.js";
import { transformCell, transformRow } from "./cell.js";
import { lowerContent } from "./content.js";
import type { GridDef, LayoutDef, StackDef, TableDef } from "./definitions.js";
import { unsupportedLayoutType } from "./errors.js";
import { transformLines } from "./lines.js";
import { placeCells } from "./placement.js";
import { resolveContainerProperties, resolveStackProperties } from "./properties.js";
import { type LayoutResult, fail, mapAll, ok } from "./result.js";
import { transformFooters, transformHeaders } from "./sections.js";
import { normalizeTracks } from "./tracks.js";

export type TransformOptions = Readonly<{
  /**
   * Run row-major placement over bare cells and bare items, assigning flow
   * positions and failing on span overflow or overlapping explicit cells.
   */
  validatePlacement?: boolean;
}>;

type ContainerParts = Readonly<{
  columns: readonly string[];
  rows: readonly string[];
  children: readonly GridChild[];
}>;

function transformContainerParts(
  def: GridDef | TableDef,
  opts: TransformOptions,
): LayoutResult<ContainerParts> {
  const columns = normalizeTracks(def.columns, "columns");
  if (!columns.ok) return columns;
  const rows = normalizeTracks(def.rows, "rows");
  if (!rows.ok) return rows;

  const bodyRows = mapAll(def.bodyRows, (row, index) => transformRow(row, index, opts));
  if (!bodyRows.ok) return bodyRows;
  const cells = mapAll(def.cells, (cell) => transformCell(cell, opts));
  if (!cells.ok) return cells;
  const items = mapAll(def.elements, (element) => {
    const content = lowerContent(element, opts);
    if (!content.ok) return content;
    return ok(singleContentCell(content.value));
  });
  if (!items.ok) return items;

  let looseCells: readonly CellNode[] = [...cells.value, ...items.value];
  if (opts.validatePlacement === true) {
    const placed = placeCells(looseCells, columns.value.length);
    if (!placed.ok) return placed;
    looseCells = placed.value;
  }

  return ok({
    columns: columns.value,
    rows: rows.value,
    children: [...bodyRows.value, ...looseCells],
  });
}

export function transformGrid(def: GridDef, opts: TransformOptions = {}): LayoutResult<GridNode> {
  const parts = transformContainerParts(def, opts);
  if (!parts.ok) return parts;

  return ok(
    gridNode({
      properties: resolveContainerProperties({ ...def, ...parts.value, kind: "grid" }),
      children: parts.value.children,
      lines: transformLines(def.lines),
    }),
  );
}

export function transformTable(def: TableDef, opts: TransformOptions = {}): LayoutResult<TableNode> {
  const parts = transformContainerParts(def, opts);
  if (!parts.ok) return parts;
  const headers = transformHeaders(def.headers, opts);
  if (!headers.ok) return headers;
  const footers = transformFooters(def.footers, opts);
  if (!footers.ok) return footers;

  return ok(
    tableNode({
      properties: resolveContainerProperties({ ...def, ...parts.value, kind: "table" }),
      children: parts.value.children,
      lines: transformLines(def.lines),
      headers: headers.value,
      footers: footers.value,
    }),
  );
}

export function transformStack(def: StackDef, opts: TransformOptions = {}): LayoutResult<StackNode> {
  const children = mapAll(def.elements, (element) => {
    const content = lowerContent(element, opts);
    if (!content.ok) return content;
    return ok(singleContentCell(content.value));
  });
  if (!children.ok) return children;
  return ok(stackNode(resolveStackProperties(def), children.value));
}

/** Lowers any layout description; unknown kinds fail with `unsupported_layout_type`. */
export function transformLayout(def: LayoutDef, opts: TransformOptions = {}): LayoutResult<LayoutNode> {
  const kind: unknown = def.kind;
  switch (def.kind) {
    case "grid":
      return transformGrid(def, opts);
    case "table":
      return transformTable(def, opts);
    case "stack":
      return transformStack(def, opts);
    default:
      return fail(unsupportedLayoutType(kind));
  }
}
