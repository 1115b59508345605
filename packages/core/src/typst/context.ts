/**
 * packages/core/src/typst/context.ts - Per-render state derived from options.
 */

import type { LocaleFormat } from "./format.js";
import { resolveCurrency, resolveLocale } from "./locale.js";
import type { DataContext, FieldMode, RenderOptions } from "./options.js";

export type RenderContext = Readonly<{
  data: DataContext;
  fieldMode: FieldMode;
  variables: DataContext | undefined;
  localeFormat: LocaleFormat | undefined;
}>;

const EMPTY_DATA: DataContext = Object.freeze({});

export function createRenderContext(opts: RenderOptions = {}): RenderContext {
  const localized = opts.locale !== undefined || opts.currency !== undefined;
  return Object.freeze({
    data: opts.data ?? EMPTY_DATA,
    fieldMode: opts.fieldMode ?? "value",
    variables: opts.variables,
    localeFormat: localized
      ? Object.freeze({ locale: resolveLocale(opts.locale), currency: resolveCurrency(opts.currency) })
      : undefined,
  });
}
