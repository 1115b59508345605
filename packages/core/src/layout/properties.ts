/**
 * packages/core/src/layout/properties.ts - Container property resolution.
 *
 * Tables fall back to a 1pt stroke and 5pt inset; grids have no fallback.
 * An axis-specific gutter suppresses the general one. Unset entries are
 * dropped from the result.
 */

import type { ContainerProperties, Length, StackDirection, StackProperties } from "../ir/types.js";
import type { StackDef } from "./definitions.js";

export const TABLE_DEFAULT_STROKE = "1pt";
export const TABLE_DEFAULT_INSET = "5pt";

type MutableContainerProperties = {
  -readonly [K in keyof ContainerProperties]: ContainerProperties[K];
};

export type ContainerPropertyInput = Readonly<{
  kind: "grid" | "table";
  columns: readonly string[];
  rows: readonly string[];
  gutter?: Length | undefined;
  columnGutter?: Length | undefined;
  rowGutter?: Length | undefined;
  align?: ContainerProperties["align"] | undefined;
  inset?: Length | undefined;
  fill?: ContainerProperties["fill"] | undefined;
  stroke?: ContainerProperties["stroke"] | undefined;
}>;

export function resolveContainerProperties(input: ContainerPropertyInput): ContainerProperties {
  const out: MutableContainerProperties = {};
  const isTable = input.kind === "table";

  out.columns = input.columns;
  out.rows = input.rows;

  const hasAxisGutter = input.columnGutter !== undefined || input.rowGutter !== undefined;
  if (!hasAxisGutter && input.gutter !== undefined) out.gutter = input.gutter;
  if (input.columnGutter !== undefined) out.columnGutter = input.columnGutter;
  if (input.rowGutter !== undefined) out.rowGutter = input.rowGutter;

  if (input.align !== undefined) out.align = input.align;

  const inset = input.inset ?? (isTable ? TABLE_DEFAULT_INSET : undefined);
  if (inset !== undefined) out.inset = inset;

  if (input.fill !== undefined) out.fill = input.fill;

  const stroke = input.stroke ?? (isTable ? TABLE_DEFAULT_STROKE : undefined);
  if (stroke !== undefined) out.stroke = stroke;

  return Object.freeze(out);
}

const STACK_DIRECTIONS: readonly StackDirection[] = Object.freeze(["ttb", "btt", "ltr", "rtl"]);

export function resolveStackProperties(def: StackDef): StackProperties {
  const out: { dir?: StackDirection; spacing?: Length } = {};
  const dir = STACK_DIRECTIONS.find((d) => d === def.dir);
  if (dir !== undefined) out.dir = dir;
  if (def.spacing !== undefined) out.spacing = def.spacing;
  return Object.freeze(out);
}
