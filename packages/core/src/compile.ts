/**
 * packages/core/src/compile.ts - Throwing convenience API.
 *
 * Transform and render in one call. Layout failures surface as `QuireError`
 * carrying the structured `LayoutError`.
 */

import { quireErrorFromLayout } from "./errors.js";
import type { LayoutNode } from "./ir/types.js";
import type { LayoutDef } from "./layout/definitions.js";
import type { LayoutResult } from "./layout/result.js";
import { type TransformOptions, transformLayout } from "./layout/transform.js";
import type { RenderOptions, ReportOptions } from "./typst/options.js";
import { renderLayout, renderReport } from "./typst/render.js";

export type CompileOptions = TransformOptions;

export function unwrapLayout<T>(res: LayoutResult<T>): T {
  if (!res.ok) throw quireErrorFromLayout(res.error);
  return res.value;
}

export function transformLayouts(
  defs: readonly LayoutDef[],
  opts: CompileOptions = {},
): readonly LayoutNode[] {
  return defs.map((def) => unwrapLayout(transformLayout(def, opts)));
}

export function compileLayout(
  def: LayoutDef,
  opts: RenderOptions & CompileOptions = {},
): string {
  return renderLayout(unwrapLayout(transformLayout(def, opts)), opts);
}

export function compileReport(
  defs: readonly LayoutDef[],
  opts: ReportOptions & CompileOptions = {},
): string {
  return renderReport(transformLayouts(defs, opts), opts);
}
