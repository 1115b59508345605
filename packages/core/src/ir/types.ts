/**
 * packages/core/src/ir/types.ts - Intermediate representation of layouts.
 *
 * The IR is the normalized, renderer-agnostic tree produced by the layout
 * transformer. Every node is a frozen value object; a new instantiation of a
 * layout produces a fresh tree.
 *
 * @see packages/core/src/layout/transform.ts
 */

/** Length: a number of points or a target-syntax length string ("5pt", "1em", "auto"). */
export type Length = number | string;

/** Alignment keyword ("center") or a horizontal + vertical pair. */
export type Alignment = string | readonly [horizontal: string, vertical: string];

/** Fill: a color keyword, a "#rrggbb" hex color, or "none". */
export type Fill = string;

/** Stroke shorthand ("1pt", "none", 0.5) or a structured stroke. */
export type Stroke =
  | Length
  | Readonly<{
      thickness?: Length;
      paint?: string;
      dash?: string;
    }>;

export type StackDirection = "ttb" | "btt" | "ltr" | "rtl";

export type FontWeight =
  | "thin"
  | "extralight"
  | "light"
  | "normal"
  | "regular"
  | "medium"
  | "semibold"
  | "bold"
  | "extrabold"
  | "black";

export type FontStyle = "normal" | "italic" | "oblique";

export type TextAlign = "left" | "center" | "right" | "justify" | "start" | "end";

/**
 * Text styling. Every field is independently optional; a style with every
 * field absent means "no style" and renders no wrapper.
 */
export type Style = Readonly<{
  fontSize?: Length;
  fontWeight?: FontWeight | number | string;
  fontStyle?: FontStyle | string;
  color?: string;
  fontFamily?: string;
  textAlign?: TextAlign | string;
}>;

/** Canonical order of style attributes. */
export const STYLE_KEYS = Object.freeze([
  "fontSize",
  "fontWeight",
  "fontStyle",
  "color",
  "fontFamily",
  "textAlign",
] as const);

export type StyleKey = (typeof STYLE_KEYS)[number];

export type FieldFormat = "number" | "currency" | "percent" | "date" | "datetime";

/** A single key, or a key path resolved left to right. */
export type FieldSource = string | readonly string[];

export type LabelNode = Readonly<{
  kind: "label";
  text: string;
  style?: Style;
}>;

export type FieldNode = Readonly<{
  kind: "field";
  source: FieldSource;
  format?: FieldFormat;
  decimalPlaces?: number;
  style?: Style;
}>;

export type NestedLayoutNode = Readonly<{
  kind: "nestedLayout";
  layout: LayoutNode;
}>;

export type ContentNode = LabelNode | FieldNode | NestedLayoutNode;

export type CellPosition = Readonly<{ column: number; row: number }>;

export type CellSpan = Readonly<{ colspan: number; rowspan: number }>;

export type CellProperties = Readonly<{
  align?: Alignment;
  inset?: Length;
  fill?: Fill;
  stroke?: Stroke;
  breakable?: boolean;
}>;

export type CellNode = Readonly<{
  kind: "cell";
  position: CellPosition;
  span: CellSpan;
  properties: CellProperties;
  content: readonly ContentNode[];
}>;

export type RowProperties = Readonly<{
  height?: Length;
  fill?: Fill;
  stroke?: Stroke;
  align?: Alignment;
  inset?: Length;
}>;

export type RowNode = Readonly<{
  kind: "row";
  /** Zero-based position within the parent, assigned during lowering. */
  index: number;
  properties: RowProperties;
  cells: readonly CellNode[];
}>;

export type HeaderNode = Readonly<{
  kind: "header";
  repeat: boolean;
  level: number;
  rows: readonly RowNode[];
}>;

export type FooterNode = Readonly<{
  kind: "footer";
  repeat: boolean;
  rows: readonly RowNode[];
}>;

export type LineOrientation = "horizontal" | "vertical";

/** Separator line drawn across a grid or table (hline / vline). */
export type LineNode = Readonly<{
  kind: "line";
  orientation: LineOrientation;
  /** Row boundary for horizontal lines, column boundary for vertical ones. */
  position: number;
  start?: number;
  end?: number;
  stroke?: Stroke;
}>;

export type ContainerProperties = Readonly<{
  columns?: readonly string[];
  rows?: readonly string[];
  gutter?: Length;
  columnGutter?: Length;
  rowGutter?: Length;
  align?: Alignment;
  inset?: Length;
  fill?: Fill;
  stroke?: Stroke;
}>;

export type StackProperties = Readonly<{
  dir?: StackDirection;
  spacing?: Length;
}>;

export type GridChild = RowNode | CellNode;

export type GridNode = Readonly<{
  kind: "grid";
  properties: ContainerProperties;
  children: readonly GridChild[];
  /** Trailing decorations, emitted just before the container closes. */
  lines: readonly LineNode[];
}>;

export type TableNode = Readonly<{
  kind: "table";
  properties: ContainerProperties;
  children: readonly GridChild[];
  lines: readonly LineNode[];
  headers: readonly HeaderNode[];
  footers: readonly FooterNode[];
}>;

export type StackNode = Readonly<{
  kind: "stack";
  properties: StackProperties;
  /** Always single-content cells created by the assembler. */
  children: readonly CellNode[];
}>;

export type LayoutNode = GridNode | TableNode | StackNode;

export type LayoutKind = LayoutNode["kind"];

export function isLayoutKind(value: unknown): value is LayoutKind {
  return value === "grid" || value === "table" || value === "stack";
}
