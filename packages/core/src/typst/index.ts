export type {
  DataContext,
  FieldMode,
  PreambleOptions,
  RenderOptions,
  ReportOptions,
} from "./options.js";
export { type RenderContext, createRenderContext } from "./context.js";
export { type LookupResult, lookupField, lookupPath } from "./data.js";
export { escapeMarkup, quoteString } from "./escape.js";
export {
  DEFAULT_CURRENCY_PLACES,
  DEFAULT_NUMBER_PLACES,
  DEFAULT_PERCENT_PLACES,
  type LocaleFormat,
  formatIsoDate,
  formatIsoDateTime,
  formatValue,
  stringifyValue,
  toDate,
} from "./format.js";
export {
  CURRENCIES,
  type CurrencyConfig,
  DEFAULT_CURRENCY,
  DEFAULT_LOCALE,
  LOCALES,
  type LocaleConfig,
  formatLocaleCurrency,
  formatLocaleDate,
  formatLocaleDateTime,
  formatLocaleNumber,
  formatLocalePercent,
  formatLocaleTime,
  resolveCurrency,
  resolveLocale,
} from "./locale.js";
export { extractVariables, interpolateVariables, renderLabelReferences } from "./interpolation.js";
export {
  FONT_STYLES,
  FONT_WEIGHTS,
  renderStyleParams,
  styleParams,
  wrapWithStyle,
} from "./style.js";
export { renderAlignment, renderColor, renderLength, renderStroke, renderTracks } from "./values.js";
export { renderContent, renderField, renderFieldReference, renderLabel } from "./content.js";
export { type CellScope, cellParams, flattenRow, renderCell } from "./cell.js";
export { renderLine } from "./lines.js";
export { containerParams, renderLayoutAt } from "./layout.js";
export {
  BLOCK_SEPARATOR,
  buildPreamble,
  renderLayout,
  renderLayouts,
  renderReport,
} from "./render.js";
