/**
 * packages/core/src/layout/definitions.ts - Declarative layout descriptions.
 *
 * These are the inputs of the layout transformer: what an authoring layer
 * (builders, a JSON document, a report DSL) hands over for lowering to IR.
 *
 * @see packages/core/src/layout/builders.ts
 */

import type {
  Alignment,
  FieldFormat,
  FieldSource,
  Fill,
  Length,
  LineOrientation,
  StackDirection,
  Stroke,
  Style,
} from "../ir/types.js";

/** Fraction track ("<n>fr"). */
export type FrTrack = Readonly<{ fr: number }>;

/**
 * One entry of an explicit track list. Bare numbers are absolute points;
 * fractions are written `{ fr: n }` or as a string such as "2fr".
 */
export type TrackSizeDef = "auto" | FrTrack | string | number;

/** Track declaration: a count of auto tracks, "auto", or an explicit list. */
export type TrackDef = number | "auto" | readonly TrackSizeDef[];

/** Style attributes accepted flat on an element or inside its `style` map. */
export type StyleAttrs = Style &
  Readonly<{
    /** Alias of `textAlign` on flat element attributes. */
    align?: string;
  }>;

export type LabelDef = StyleAttrs &
  Readonly<{
    text: string;
    style?: Style;
  }>;

export type FieldDef = StyleAttrs &
  Readonly<{
    source: FieldSource;
    format?: FieldFormat;
    decimalPlaces?: number;
    style?: Style;
  }>;

export type ElementDef = LabelDef | FieldDef | LayoutDef;

export type CellDef = Readonly<{
  x?: number;
  y?: number;
  colspan?: number;
  rowspan?: number;
  align?: Alignment;
  inset?: Length;
  fill?: Fill;
  stroke?: Stroke;
  breakable?: boolean;
  elements?: readonly ElementDef[];
}>;

export type RowDef = Readonly<{
  height?: Length;
  fill?: Fill;
  stroke?: Stroke;
  align?: Alignment;
  inset?: Length;
  cells: readonly CellDef[];
}>;

export type SectionDef = Readonly<{
  repeat?: boolean;
  /** Header nesting level; ignored on footers. */
  level?: number;
  entries: readonly (RowDef | CellDef)[];
}>;

export type LineDef = Readonly<{
  orientation: LineOrientation;
  position: number;
  start?: number;
  end?: number;
  stroke?: Stroke;
}>;

type ContainerDefBase = Readonly<{
  columns?: TrackDef;
  rows?: TrackDef;
  gutter?: Length;
  columnGutter?: Length;
  rowGutter?: Length;
  align?: Alignment;
  inset?: Length;
  fill?: Fill;
  stroke?: Stroke;
  /** Explicit rows, lowered first. */
  bodyRows?: readonly RowDef[];
  /** Cells authored outside rows, lowered after the rows. */
  cells?: readonly CellDef[];
  /** Bare content items, each wrapped in its own cell, lowered last. */
  elements?: readonly ElementDef[];
  lines?: readonly LineDef[];
}>;

export type GridDef = ContainerDefBase & Readonly<{ kind: "grid" }>;

export type TableDef = ContainerDefBase &
  Readonly<{
    kind: "table";
    headers?: readonly SectionDef[];
    footers?: readonly SectionDef[];
  }>;

export type StackDef = Readonly<{
  kind: "stack";
  dir?: StackDirection;
  spacing?: Length;
  elements?: readonly ElementDef[];
}>;

export type LayoutDef = GridDef | TableDef | StackDef;
