/**
 * packages/core/src/typst/render.ts - Report rendering entry points.
 */

import type { LayoutNode } from "../ir/types.js";
import { createRenderContext } from "./context.js";
import { quoteString } from "./escape.js";
import { renderLayoutAt } from "./layout.js";
import type { PreambleOptions, RenderOptions, ReportOptions } from "./options.js";
import { renderLength } from "./values.js";

/** Separator between stand-alone layouts and after the preamble. */
export const BLOCK_SEPARATOR = "\n\n";

export function renderLayout(layout: LayoutNode, opts: RenderOptions = {}): string {
  return renderLayoutAt(layout, 0, createRenderContext(opts));
}

export function renderLayouts(
  layouts: readonly LayoutNode[],
  opts: RenderOptions = {},
): readonly string[] {
  const ctx = createRenderContext(opts);
  return layouts.map((layout) => renderLayoutAt(layout, 0, ctx));
}

/**
 * Document directives in fixed order: paper, margin, font, size. Options
 * that are not set produce no line.
 */
export function buildPreamble(opts: PreambleOptions): string {
  const lines: string[] = [];
  if (opts.pageSize !== undefined) lines.push(`#set page(paper: ${quoteString(opts.pageSize)})`);
  if (opts.margin !== undefined) lines.push(`#set page(margin: ${renderLength(opts.margin)})`);
  if (opts.font !== undefined) lines.push(`#set text(font: ${quoteString(opts.font)})`);
  if (opts.fontSize !== undefined) lines.push(`#set text(size: ${renderLength(opts.fontSize)})`);
  return lines.join("\n");
}

/** Preamble (when any) and every layout, separated by blank lines. */
export function renderReport(layouts: readonly LayoutNode[], opts: ReportOptions = {}): string {
  const blocks = [...renderLayouts(layouts, opts)];
  const preamble = buildPreamble(opts);
  if (preamble !== "") blocks.unshift(preamble);
  return blocks.join(BLOCK_SEPARATOR);
}
