/**
 * packages/core/src/layout/placement.ts - Row-major cell placement.
 *
 * Cells with an explicit position (anything other than the origin) claim
 * their span first; the remaining cells flow left-to-right, top-to-bottom
 * into the next free slot wide enough for their colspan. The returned list
 * keeps the input order; only positions change.
 */

import { cellNode } from "../ir/nodes.js";
import type { CellNode, CellPosition } from "../ir/types.js";
import { positionConflict, spanOverflow } from "./errors.js";
import { type LayoutResult, fail, ok } from "./result.js";

function slotKey(column: number, row: number): string {
  return `${String(column)},${String(row)}`;
}

function hasExplicitPosition(cell: CellNode): boolean {
  return cell.position.column > 0 || cell.position.row > 0;
}

function coveredSlots(position: CellPosition, cell: CellNode): string[] {
  const out: string[] = [];
  for (let c = position.column; c < position.column + cell.span.colspan; c++) {
    for (let r = position.row; r < position.row + cell.span.rowspan; r++) {
      out.push(slotKey(c, r));
    }
  }
  return out;
}

function withPosition(cell: CellNode, position: CellPosition): CellNode {
  if (cell.position.column === position.column && cell.position.row === position.row) return cell;
  return cellNode({ ...cell, position });
}

/**
 * Assigns grid positions to `cells` in a grid of `columns` tracks.
 * Fails with `span_overflow` when a cell is wider than the remaining columns
 * and with `position_conflict` when explicitly positioned cells overlap.
 */
export function placeCells(
  cells: readonly CellNode[],
  columns: number,
): LayoutResult<readonly CellNode[]> {
  const width = Math.max(1, Math.trunc(columns));
  const occupied = new Set<string>();
  const placed: (CellNode | undefined)[] = cells.map(() => undefined);

  for (let i = 0; i < cells.length; i++) {
    const cell = cells[i];
    if (cell === undefined || !hasExplicitPosition(cell)) continue;
    const { position } = cell;
    if (position.column + cell.span.colspan > width) {
      return fail(spanOverflow(position, cell.span.colspan, width));
    }
    const slots = coveredSlots(position, cell);
    if (slots.some((slot) => occupied.has(slot))) return fail(positionConflict(position));
    for (const slot of slots) occupied.add(slot);
    placed[i] = cell;
  }

  let column = 0;
  let row = 0;
  for (let i = 0; i < cells.length; i++) {
    const cell = cells[i];
    if (cell === undefined || placed[i] !== undefined) continue;
    const { colspan } = cell.span;
    if (colspan > width) return fail(spanOverflow({ column, row }, colspan, width));

    for (;;) {
      const candidate = { column, row };
      const fits = column + colspan <= width;
      if (fits && !coveredSlots(candidate, cell).some((slot) => occupied.has(slot))) break;
      column++;
      if (column >= width) {
        column = 0;
        row++;
      }
    }

    const position = Object.freeze({ column, row });
    for (const slot of coveredSlots(position, cell)) occupied.add(slot);
    placed[i] = withPosition(cell, position);

    column += colspan;
    if (column >= width) {
      column = 0;
      row++;
    }
  }

  const out: CellNode[] = [];
  for (const cell of placed) {
    if (cell !== undefined) out.push(cell);
  }
  return ok(Object.freeze(out));
}
