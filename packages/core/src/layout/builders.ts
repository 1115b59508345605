/**
 * packages/core/src/layout/builders.ts - Layout definition factories.
 *
 * Thin helpers for building typed layout definitions without spelling out
 * discriminants. Each returns a plain definition for `transformLayout`.
 *
 * @example
 * ```ts
 * layout.table({ columns: 2, headers: [layout.header([layout.cell([layout.label("Name")])])] }, [
 *   layout.row([layout.cell([layout.field("name")]), layout.cell([layout.field("total", { format: "currency" })])]),
 * ])
 * ```
 */

import type { FieldSource, Stroke } from "../ir/types.js";
import type {
  CellDef,
  ElementDef,
  FieldDef,
  GridDef,
  LabelDef,
  LineDef,
  RowDef,
  SectionDef,
  StackDef,
  StyleAttrs,
  TableDef,
} from "./definitions.js";

type Props<T> = Omit<T, "kind" | "bodyRows">;

export function grid(props: Props<GridDef> = {}, rows: readonly RowDef[] = []): GridDef {
  return rows.length === 0
    ? { ...props, kind: "grid" }
    : { ...props, kind: "grid", bodyRows: rows };
}

export function table(props: Props<TableDef> = {}, rows: readonly RowDef[] = []): TableDef {
  return rows.length === 0
    ? { ...props, kind: "table" }
    : { ...props, kind: "table", bodyRows: rows };
}

export function stack(
  props: Omit<StackDef, "kind" | "elements"> = {},
  elements: readonly ElementDef[] = [],
): StackDef {
  return { ...props, kind: "stack", elements };
}

export function row(cells: readonly CellDef[], props: Omit<RowDef, "cells"> = {}): RowDef {
  return { ...props, cells };
}

export function cell(
  elements: readonly ElementDef[] = [],
  props: Omit<CellDef, "elements"> = {},
): CellDef {
  return { ...props, elements };
}

export function label(text: string, style: StyleAttrs = {}): LabelDef {
  return { ...style, text };
}

export function field(source: FieldSource, opts: Omit<FieldDef, "source"> = {}): FieldDef {
  return { ...opts, source };
}

export function header(
  entries: readonly (RowDef | CellDef)[],
  opts: Readonly<{ repeat?: boolean; level?: number }> = {},
): SectionDef {
  return { ...opts, entries };
}

export function footer(
  entries: readonly (RowDef | CellDef)[],
  opts: Readonly<{ repeat?: boolean }> = {},
): SectionDef {
  return { ...opts, entries };
}

type LineOpts = Readonly<{ start?: number; end?: number; stroke?: Stroke }>;

export function hline(y: number, opts: LineOpts = {}): LineDef {
  return { ...opts, orientation: "horizontal", position: y };
}

export function vline(x: number, opts: LineOpts = {}): LineDef {
  return { ...opts, orientation: "vertical", position: x };
}

export const layout = {
  grid,
  table,
  stack,
  row,
  cell,
  label,
  field,
  header,
  footer,
  hline,
  vline,
};
