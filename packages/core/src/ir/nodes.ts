/**
 * packages/core/src/ir/nodes.ts - IR node constructors.
 *
 * Constructors apply the IR defaults (cell position (0,0), span (1,1),
 * header repeat/level, footer repeat) and freeze the result.
 */

import { isEmptyStyle } from "./style.js";
import type {
  CellNode,
  CellPosition,
  CellProperties,
  CellSpan,
  ContainerProperties,
  ContentNode,
  FieldFormat,
  FieldNode,
  FieldSource,
  FooterNode,
  GridChild,
  GridNode,
  HeaderNode,
  LabelNode,
  LayoutNode,
  LineNode,
  NestedLayoutNode,
  RowNode,
  RowProperties,
  StackNode,
  StackProperties,
  Style,
  TableNode,
} from "./types.js";

const ORIGIN: CellPosition = Object.freeze({ column: 0, row: 0 });
const UNIT_SPAN: CellSpan = Object.freeze({ colspan: 1, rowspan: 1 });
const EMPTY: readonly never[] = Object.freeze([]);

export const DEFAULT_HEADER_REPEAT = true;
export const DEFAULT_HEADER_LEVEL = 1;
export const DEFAULT_FOOTER_REPEAT = false;

export function labelNode(text: string, style?: Style): LabelNode {
  if (style === undefined || isEmptyStyle(style)) return Object.freeze({ kind: "label", text });
  return Object.freeze({ kind: "label", text, style });
}

export type FieldNodeOptions = Readonly<{
  format?: FieldFormat | undefined;
  decimalPlaces?: number | undefined;
  style?: Style | undefined;
}>;

export function fieldNode(source: FieldSource, opts: FieldNodeOptions = {}): FieldNode {
  const frozenSource = typeof source === "string" ? source : Object.freeze([...source]);
  const node: {
    kind: "field";
    source: FieldSource;
    format?: FieldFormat;
    decimalPlaces?: number;
    style?: Style;
  } = { kind: "field", source: frozenSource };
  if (opts.format !== undefined) node.format = opts.format;
  if (opts.decimalPlaces !== undefined) node.decimalPlaces = opts.decimalPlaces;
  if (opts.style !== undefined && !isEmptyStyle(opts.style)) node.style = opts.style;
  return Object.freeze(node);
}

export function nestedLayoutNode(layout: LayoutNode): NestedLayoutNode {
  return Object.freeze({ kind: "nestedLayout", layout });
}

export type CellNodeOptions = Readonly<{
  position?: CellPosition;
  span?: CellSpan;
  properties?: CellProperties;
  content?: readonly ContentNode[];
}>;

export function cellNode(opts: CellNodeOptions = {}): CellNode {
  return Object.freeze({
    kind: "cell",
    position: opts.position ? Object.freeze({ ...opts.position }) : ORIGIN,
    span: opts.span ? Object.freeze({ ...opts.span }) : UNIT_SPAN,
    properties: Object.freeze({ ...opts.properties }),
    content: opts.content ? Object.freeze([...opts.content]) : EMPTY,
  });
}

/** Synthetic cell wrapping exactly one content item. */
export function singleContentCell(content: ContentNode): CellNode {
  return cellNode({ content: [content] });
}

export function rowNode(
  index: number,
  cells: readonly CellNode[],
  properties: RowProperties = {},
): RowNode {
  return Object.freeze({
    kind: "row",
    index,
    properties: Object.freeze({ ...properties }),
    cells: Object.freeze([...cells]),
  });
}

export function headerNode(
  rows: readonly RowNode[],
  repeat: boolean = DEFAULT_HEADER_REPEAT,
  level: number = DEFAULT_HEADER_LEVEL,
): HeaderNode {
  return Object.freeze({ kind: "header", repeat, level, rows: Object.freeze([...rows]) });
}

export function footerNode(
  rows: readonly RowNode[],
  repeat: boolean = DEFAULT_FOOTER_REPEAT,
): FooterNode {
  return Object.freeze({ kind: "footer", repeat, rows: Object.freeze([...rows]) });
}

export function lineNode(line: Omit<LineNode, "kind">): LineNode {
  return Object.freeze({ kind: "line", ...line });
}

export type ContainerNodeParts = Readonly<{
  properties?: ContainerProperties;
  children?: readonly GridChild[];
  lines?: readonly LineNode[];
}>;

export function gridNode(parts: ContainerNodeParts = {}): GridNode {
  return Object.freeze({
    kind: "grid",
    properties: Object.freeze({ ...parts.properties }),
    children: Object.freeze([...(parts.children ?? EMPTY)]),
    lines: Object.freeze([...(parts.lines ?? EMPTY)]),
  });
}

export type TableNodeParts = ContainerNodeParts &
  Readonly<{
    headers?: readonly HeaderNode[];
    footers?: readonly FooterNode[];
  }>;

export function tableNode(parts: TableNodeParts = {}): TableNode {
  return Object.freeze({
    kind: "table",
    properties: Object.freeze({ ...parts.properties }),
    children: Object.freeze([...(parts.children ?? EMPTY)]),
    lines: Object.freeze([...(parts.lines ?? EMPTY)]),
    headers: Object.freeze([...(parts.headers ?? EMPTY)]),
    footers: Object.freeze([...(parts.footers ?? EMPTY)]),
  });
}

export function stackNode(
  properties: StackProperties = {},
  children: readonly CellNode[] = EMPTY,
): StackNode {
  return Object.freeze({
    kind: "stack",
    properties: Object.freeze({ ...properties }),
    children: Object.freeze([...children]),
  });
}

/** Counts every IR node in a layout subtree, nested layouts included. */
export function countNodes(layout: LayoutNode): number {
  let count = 1;
  const countCell = (cell: CellNode): void => {
    count += 1;
    for (const item of cell.content) {
      count += item.kind === "nestedLayout" ? 1 + countNodes(item.layout) : 1;
    }
  };
  const countRow = (row: RowNode): void => {
    count += 1;
    for (const cell of row.cells) countCell(cell);
  };

  switch (layout.kind) {
    case "stack":
      for (const cell of layout.children) countCell(cell);
      return count;
    case "table":
      for (const header of layout.headers) {
        count += 1;
        for (const row of header.rows) countRow(row);
      }
      for (const footer of layout.footers) {
        count += 1;
        for (const row of footer.rows) countRow(row);
      }
      break;
    case "grid":
      break;
  }
  for (const child of layout.children) {
    if (child.kind === "row") countRow(child);
    else countCell(child);
  }
  count += layout.lines.length;
  return count;
}
