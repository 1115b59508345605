/**
 * packages/core/src/typst/layout.ts - Container rendering.
 *
 * Grid and table:
 *
 *   #table(
 *     columns: (auto, 1fr),
 *     stroke: 1pt,
 *     table.header(
 *       repeat: true,
 *       [Name],
 *       [Total],
 *     ),
 *     [Widget],
 *     [\$12.00],
 *     table.hline(y: 1),
 *   )
 *
 * Parameters come first, one per line; then headers, children, footers and
 * lines, each followed by a comma. Stacks take `dir` and `spacing` and
 * render their cells in order.
 */

import type {
  ContainerProperties,
  FooterNode,
  GridChild,
  GridNode,
  HeaderNode,
  LayoutNode,
  StackNode,
  TableNode,
} from "../ir/types.js";
import { type CellScope, flattenRow, renderCell } from "./cell.js";
import type { RenderContext } from "./context.js";
import { renderLine } from "./lines.js";
import {
  indentOf,
  renderAlignment,
  renderColor,
  renderLength,
  renderStroke,
  renderTracks,
} from "./values.js";

function renderBlock(
  opener: string,
  params: readonly string[],
  entries: readonly string[],
  indent: number,
): string {
  const inner = indentOf(indent + 1);
  const lines = [opener];
  for (const param of params) lines.push(`${inner}${param},`);
  for (const entry of entries) lines.push(`${inner}${entry},`);
  lines.push(`${indentOf(indent)})`);
  return lines.join("\n");
}

export function containerParams(properties: ContainerProperties): readonly string[] {
  const params: string[] = [];
  if (properties.columns !== undefined && properties.columns.length > 0) {
    params.push(`columns: ${renderTracks(properties.columns)}`);
  }
  if (properties.rows !== undefined && properties.rows.length > 0) {
    params.push(`rows: ${renderTracks(properties.rows)}`);
  }
  if (properties.gutter !== undefined) params.push(`gutter: ${renderLength(properties.gutter)}`);
  if (properties.columnGutter !== undefined) {
    params.push(`column-gutter: ${renderLength(properties.columnGutter)}`);
  }
  if (properties.rowGutter !== undefined) {
    params.push(`row-gutter: ${renderLength(properties.rowGutter)}`);
  }
  if (properties.align !== undefined) params.push(`align: ${renderAlignment(properties.align)}`);
  if (properties.inset !== undefined) params.push(`inset: ${renderLength(properties.inset)}`);
  if (properties.fill !== undefined) params.push(`fill: ${renderColor(properties.fill)}`);
  if (properties.stroke !== undefined) params.push(`stroke: ${renderStroke(properties.stroke)}`);
  return params;
}

function renderChildren(
  children: readonly GridChild[],
  scope: CellScope,
  indent: number,
  ctx: RenderContext,
): string[] {
  const out: string[] = [];
  for (const child of children) {
    const cells = child.kind === "row" ? flattenRow(child) : [child];
    for (const cell of cells) out.push(renderCell(cell, scope, indent, ctx));
  }
  return out;
}

function renderHeader(header: HeaderNode, indent: number, ctx: RenderContext): string {
  const params = [`repeat: ${String(header.repeat)}`];
  if (header.level > 1) params.push(`level: ${String(header.level)}`);
  return renderBlock(
    "table.header(",
    params,
    renderChildren(header.rows, "table", indent + 1, ctx),
    indent,
  );
}

function renderFooter(footer: FooterNode, indent: number, ctx: RenderContext): string {
  return renderBlock(
    "table.footer(",
    [`repeat: ${String(footer.repeat)}`],
    renderChildren(footer.rows, "table", indent + 1, ctx),
    indent,
  );
}

function renderGrid(node: GridNode, indent: number, ctx: RenderContext): string {
  const entries = [
    ...renderChildren(node.children, "grid", indent + 1, ctx),
    ...node.lines.map((line) => renderLine(line, "grid")),
  ];
  return renderBlock("#grid(", containerParams(node.properties), entries, indent);
}

function renderTable(node: TableNode, indent: number, ctx: RenderContext): string {
  const entries = [
    ...node.headers.map((header) => renderHeader(header, indent + 1, ctx)),
    ...renderChildren(node.children, "table", indent + 1, ctx),
    ...node.footers.map((footer) => renderFooter(footer, indent + 1, ctx)),
    ...node.lines.map((line) => renderLine(line, "table")),
  ];
  return renderBlock("#table(", containerParams(node.properties), entries, indent);
}

function renderStack(node: StackNode, indent: number, ctx: RenderContext): string {
  const params: string[] = [];
  if (node.properties.dir !== undefined) params.push(`dir: ${node.properties.dir}`);
  if (node.properties.spacing !== undefined) {
    params.push(`spacing: ${renderLength(node.properties.spacing)}`);
  }
  const entries = node.children.map((cell) => renderCell(cell, "grid", indent + 1, ctx));
  return renderBlock("#stack(", params, entries, indent);
}

/**
 * Renders a layout whose first line starts at the caller's cursor and whose
 * closing delimiter sits at `indent`.
 */
export function renderLayoutAt(layout: LayoutNode, indent: number, ctx: RenderContext): string {
  switch (layout.kind) {
    case "grid":
      return renderGrid(layout, indent, ctx);
    case "table":
      return renderTable(layout, indent, ctx);
    case "stack":
      return renderStack(layout, indent, ctx);
  }
}
