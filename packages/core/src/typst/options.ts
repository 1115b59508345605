/**
 * packages/core/src/typst/options.ts - Render option types.
 */

import type { Length } from "../ir/types.js";

/** Record-like data context that fields are resolved against. */
export type DataContext = Readonly<Record<string, unknown>>;

/**
 * `value` renders resolved, formatted data. `reference` renders Typst code
 * that reads `record.*` and `data.variables.*` when the document compiles.
 */
export type FieldMode = "value" | "reference";

export type RenderOptions = Readonly<{
  /**
   * Field values. `Date` values render in UTC, so a local-midnight date
   * from a zone east of UTC shows the previous day; pass ISO strings or
   * `Date.UTC` dates for calendar dates.
   */
  data?: DataContext;
  fieldMode?: FieldMode;
  /** Values substituted for `[name]` placeholders in labels. */
  variables?: DataContext;
  /**
   * Setting `locale` or `currency` switches numbers and dates to
   * locale-aware formatting (defaults en-US and USD). With neither set the
   * locale-neutral formats apply.
   */
  locale?: string;
  currency?: string;
}>;

/** Document-level directives; each is emitted only when set. */
export type PreambleOptions = Readonly<{
  pageSize?: string;
  margin?: Length;
  font?: string;
  fontSize?: Length;
}>;

export type ReportOptions = RenderOptions & PreambleOptions;
