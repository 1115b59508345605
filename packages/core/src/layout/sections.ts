/**
 * packages/core/src/layout/sections.ts - Table header/footer assembly.
 *
 * Each section entry is either a full row (it carries `cells`) or a bare
 * cell, which is wrapped in a synthetic one-cell row at the entry's position.
 */

import {
  DEFAULT_FOOTER_REPEAT,
  DEFAULT_HEADER_LEVEL,
  DEFAULT_HEADER_REPEAT,
  footerNode,
  headerNode,
  rowNode,
} from "../ir/nodes.js";
import type { FooterNode, HeaderNode, RowNode } from "../ir/types.js";
import { transformCell, transformRow } from "./cell.js";
import type { CellDef, RowDef, SectionDef } from "./definitions.js";
import { type LayoutResult, mapAll, ok } from "./result.js";
import type { TransformOptions } from "./transform.js";

function isRowDef(entry: RowDef | CellDef): entry is RowDef {
  return "cells" in entry && Array.isArray(entry.cells);
}

function transformSectionRows(
  section: SectionDef,
  opts: TransformOptions,
): LayoutResult<readonly RowNode[]> {
  return mapAll(section.entries, (entry, index) => {
    if (isRowDef(entry)) return transformRow(entry, index, opts);
    const cell = transformCell(entry, opts);
    if (!cell.ok) return cell;
    return ok(rowNode(index, [cell.value]));
  });
}

export function transformHeader(
  section: SectionDef,
  opts: TransformOptions = {},
): LayoutResult<HeaderNode> {
  const rows = transformSectionRows(section, opts);
  if (!rows.ok) return rows;
  const level =
    section.level !== undefined && Number.isInteger(section.level) && section.level > 0
      ? section.level
      : DEFAULT_HEADER_LEVEL;
  return ok(headerNode(rows.value, section.repeat ?? DEFAULT_HEADER_REPEAT, level));
}

export function transformFooter(
  section: SectionDef,
  opts: TransformOptions = {},
): LayoutResult<FooterNode> {
  const rows = transformSectionRows(section, opts);
  if (!rows.ok) return rows;
  return ok(footerNode(rows.value, section.repeat ?? DEFAULT_FOOTER_REPEAT));
}

export function transformHeaders(
  sections: readonly SectionDef[] | undefined,
  opts: TransformOptions = {},
): LayoutResult<readonly HeaderNode[]> {
  return mapAll(sections, (section) => transformHeader(section, opts));
}

export function transformFooters(
  sections: readonly SectionDef[] | undefined,
  opts: TransformOptions = {},
): LayoutResult<readonly FooterNode[]> {
  return mapAll(sections, (section) => transformFooter(section, opts));
}
