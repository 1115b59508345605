/**
 * packages/core/src/layout/document.ts - Report document reader.
 *
 * Checks an untyped value (typically parsed JSON) against the report document
 * shape and rebuilds it as typed layout definitions:
 *
 *   { "options": { ... }, "layouts": [ { "kind": "grid", ... }, ... ] }
 *
 * Shape violations fail with `invalid_document` carrying the JSON path of
 * the offending value. Semantic checks (track counts, element kinds inside
 * otherwise well-formed objects) are left to the transformer.
 */

import type { Alignment, FieldSource, Length, Stroke, Style } from "../ir/types.js";
import type { FieldMode, ReportOptions } from "../typst/options.js";
import type {
  CellDef,
  ElementDef,
  LayoutDef,
  LineDef,
  RowDef,
  SectionDef,
  StyleAttrs,
  TrackDef,
  TrackSizeDef,
} from "./definitions.js";
import { invalidDocument } from "./errors.js";
import { type LayoutResult, fail, mapAll, ok } from "./result.js";

export type ReportDocumentOptions = Omit<ReportOptions, "data">;

export type ReportDocument = Readonly<{
  options: ReportDocumentOptions;
  layouts: readonly LayoutDef[];
}>;

type Obj = Readonly<Record<string, unknown>>;
type Reader<T> = (value: unknown, path: string) => LayoutResult<T>;

function isRecord(v: unknown): v is Obj {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function expected(path: string, what: string): LayoutResult<never> {
  return fail(invalidDocument(path, `expected ${what}`));
}

const readString: Reader<string> = (v, path) =>
  typeof v === "string" ? ok(v) : expected(path, "a string");

const readBoolean: Reader<boolean> = (v, path) =>
  typeof v === "boolean" ? ok(v) : expected(path, "a boolean");

const readInteger: Reader<number> = (v, path) =>
  typeof v === "number" && Number.isInteger(v) ? ok(v) : expected(path, "an integer");

const readLength: Reader<Length> = (v, path) =>
  typeof v === "string" || (typeof v === "number" && Number.isFinite(v))
    ? ok(v)
    : expected(path, "a length");

const readStyleScalar: Reader<string | number> = (v, path) =>
  typeof v === "string" || (typeof v === "number" && Number.isFinite(v))
    ? ok(v)
    : expected(path, "a string or number");

const readAlignment: Reader<Alignment> = (v, path) => {
  if (typeof v === "string") return ok(v);
  if (Array.isArray(v) && v.length === 2) {
    const [h, vert]: unknown[] = v;
    if (typeof h === "string" && typeof vert === "string") return ok([h, vert] as const);
  }
  return expected(path, 'an alignment ("center" or ["left", "top"])');
};

const readStroke: Reader<Stroke> = (v, path) => {
  if (!isRecord(v)) return readLength(v, path);
  const thickness = optional(v, "thickness", path, readLength);
  if (!thickness.ok) return thickness;
  const paint = optional(v, "paint", path, readString);
  if (!paint.ok) return paint;
  const dash = optional(v, "dash", path, readString);
  if (!dash.ok) return dash;
  return ok({ thickness: thickness.value, paint: paint.value, dash: dash.value });
};

function readList<T>(item: Reader<T>): Reader<readonly T[]> {
  return (v, path) => {
    if (!Array.isArray(v)) return expected(path, "an array");
    const items: readonly unknown[] = v;
    return mapAll(items, (entry, index) => item(entry, `${path}[${String(index)}]`));
  };
}

function optional<T>(
  obj: Obj,
  key: string,
  path: string,
  read: Reader<T>,
): LayoutResult<T | undefined> {
  const v = obj[key];
  if (v === undefined || v === null) return ok(undefined);
  return read(v, `${path}.${key}`);
}

function required<T>(obj: Obj, key: string, path: string, read: Reader<T>): LayoutResult<T> {
  const v = obj[key];
  if (v === undefined || v === null) return fail(invalidDocument(`${path}.${key}`, "is required"));
  return read(v, `${path}.${key}`);
}

const readTrackSize: Reader<TrackSizeDef> = (v, path) => {
  if (typeof v === "string" || typeof v === "number") return ok(v);
  const fr = isRecord(v) ? v["fr"] : undefined;
  if (typeof fr === "number") return ok({ fr });
  return expected(path, 'a track size ("auto", "1fr", 40 or { "fr": 1 })');
};

const readTrack: Reader<TrackDef> = (v, path) => {
  if (typeof v === "number") return ok(v);
  if (v === "auto") return ok("auto");
  return readList(readTrackSize)(v, path);
};

const readStyleMap: Reader<Style> = (v, path) => {
  if (!isRecord(v)) return expected(path, "an object");
  return readStyleAttrs(v, path);
};

function readStyleAttrs(obj: Obj, path: string): LayoutResult<StyleAttrs> {
  const fontSize = optional(obj, "fontSize", path, readLength);
  if (!fontSize.ok) return fontSize;
  const fontWeight = optional(obj, "fontWeight", path, readStyleScalar);
  if (!fontWeight.ok) return fontWeight;
  const fontStyle = optional(obj, "fontStyle", path, readString);
  if (!fontStyle.ok) return fontStyle;
  const color = optional(obj, "color", path, readString);
  if (!color.ok) return color;
  const fontFamily = optional(obj, "fontFamily", path, readString);
  if (!fontFamily.ok) return fontFamily;
  const textAlign = optional(obj, "textAlign", path, readString);
  if (!textAlign.ok) return textAlign;
  const align = optional(obj, "align", path, readString);
  if (!align.ok) return align;
  return ok({
    fontSize: fontSize.value,
    fontWeight: fontWeight.value,
    fontStyle: fontStyle.value,
    color: color.value,
    fontFamily: fontFamily.value,
    textAlign: textAlign.value,
    align: align.value,
  });
}

const readFieldSource: Reader<FieldSource> = (v, path) => {
  if (typeof v === "string") return ok(v);
  if (Array.isArray(v) && v.length === 0) return expected(path, "at least one key");
  return readList(readString)(v, path);
};

const readElement: Reader<ElementDef> = (v, path) => {
  if (!isRecord(v)) return expected(path, "an object");
  if ("kind" in v) return readLayout(v, path);

  const attrs = readStyleAttrs(v, path);
  if (!attrs.ok) return attrs;
  const style = optional(v, "style", path, readStyleMap);
  if (!style.ok) return style;

  if ("text" in v) {
    const text = required(v, "text", path, readString);
    if (!text.ok) return text;
    return ok({ ...attrs.value, text: text.value, style: style.value });
  }

  if ("source" in v) {
    const source = required(v, "source", path, readFieldSource);
    if (!source.ok) return source;
    const format = optional(v, "format", path, readString);
    if (!format.ok) return format;
    const formatValue = format.value;
    if (
      formatValue !== undefined &&
      formatValue !== "number" &&
      formatValue !== "currency" &&
      formatValue !== "percent" &&
      formatValue !== "date" &&
      formatValue !== "datetime"
    ) {
      return fail(invalidDocument(`${path}.format`, `unknown format ${JSON.stringify(formatValue)}`));
    }
    const decimalPlaces = optional(v, "decimalPlaces", path, readInteger);
    if (!decimalPlaces.ok) return decimalPlaces;
    return ok({
      ...attrs.value,
      source: source.value,
      format: formatValue,
      decimalPlaces: decimalPlaces.value,
      style: style.value,
    });
  }

  return fail(invalidDocument(path, 'expected an element with "text", "source" or "kind"'));
};

const readCell: Reader<CellDef> = (v, path) => {
  if (!isRecord(v)) return expected(path, "an object");
  const x = optional(v, "x", path, readInteger);
  if (!x.ok) return x;
  const y = optional(v, "y", path, readInteger);
  if (!y.ok) return y;
  const colspan = optional(v, "colspan", path, readInteger);
  if (!colspan.ok) return colspan;
  const rowspan = optional(v, "rowspan", path, readInteger);
  if (!rowspan.ok) return rowspan;
  const align = optional(v, "align", path, readAlignment);
  if (!align.ok) return align;
  const inset = optional(v, "inset", path, readLength);
  if (!inset.ok) return inset;
  const fill = optional(v, "fill", path, readString);
  if (!fill.ok) return fill;
  const stroke = optional(v, "stroke", path, readStroke);
  if (!stroke.ok) return stroke;
  const breakable = optional(v, "breakable", path, readBoolean);
  if (!breakable.ok) return breakable;
  const elements = optional(v, "elements", path, readList(readElement));
  if (!elements.ok) return elements;
  return ok({
    x: x.value,
    y: y.value,
    colspan: colspan.value,
    rowspan: rowspan.value,
    align: align.value,
    inset: inset.value,
    fill: fill.value,
    stroke: stroke.value,
    breakable: breakable.value,
    elements: elements.value,
  });
};

const readRow: Reader<RowDef> = (v, path) => {
  if (!isRecord(v)) return expected(path, "an object");
  const height = optional(v, "height", path, readLength);
  if (!height.ok) return height;
  const fill = optional(v, "fill", path, readString);
  if (!fill.ok) return fill;
  const stroke = optional(v, "stroke", path, readStroke);
  if (!stroke.ok) return stroke;
  const align = optional(v, "align", path, readAlignment);
  if (!align.ok) return align;
  const inset = optional(v, "inset", path, readLength);
  if (!inset.ok) return inset;
  const cells = required(v, "cells", path, readList(readCell));
  if (!cells.ok) return cells;
  return ok({
    height: height.value,
    fill: fill.value,
    stroke: stroke.value,
    align: align.value,
    inset: inset.value,
    cells: cells.value,
  });
};

const readSectionEntry: Reader<RowDef | CellDef> = (v, path) =>
  isRecord(v) && "cells" in v ? readRow(v, path) : readCell(v, path);

const readSection: Reader<SectionDef> = (v, path) => {
  if (!isRecord(v)) return expected(path, "an object");
  const repeat = optional(v, "repeat", path, readBoolean);
  if (!repeat.ok) return repeat;
  const level = optional(v, "level", path, readInteger);
  if (!level.ok) return level;
  const entries = required(v, "entries", path, readList(readSectionEntry));
  if (!entries.ok) return entries;
  return ok({ repeat: repeat.value, level: level.value, entries: entries.value });
};

const readLine: Reader<LineDef> = (v, path) => {
  if (!isRecord(v)) return expected(path, "an object");
  const orientation = required(v, "orientation", path, readString);
  if (!orientation.ok) return orientation;
  if (orientation.value !== "horizontal" && orientation.value !== "vertical") {
    return expected(`${path}.orientation`, '"horizontal" or "vertical"');
  }
  const position = required(v, "position", path, readInteger);
  if (!position.ok) return position;
  const start = optional(v, "start", path, readInteger);
  if (!start.ok) return start;
  const end = optional(v, "end", path, readInteger);
  if (!end.ok) return end;
  const stroke = optional(v, "stroke", path, readStroke);
  if (!stroke.ok) return stroke;
  return ok({
    orientation: orientation.value,
    position: position.value,
    start: start.value,
    end: end.value,
    stroke: stroke.value,
  });
};

function readLayout(v: Obj, path: string): LayoutResult<LayoutDef> {
  const kind = v["kind"];

  if (kind === "stack") {
    const dir = optional(v, "dir", path, readString);
    if (!dir.ok) return dir;
    const dirValue = dir.value;
    if (
      dirValue !== undefined &&
      dirValue !== "ttb" &&
      dirValue !== "btt" &&
      dirValue !== "ltr" &&
      dirValue !== "rtl"
    ) {
      return expected(`${path}.dir`, '"ttb", "btt", "ltr" or "rtl"');
    }
    const spacing = optional(v, "spacing", path, readLength);
    if (!spacing.ok) return spacing;
    const elements = optional(v, "elements", path, readList(readElement));
    if (!elements.ok) return elements;
    return ok({ kind, dir: dirValue, spacing: spacing.value, elements: elements.value });
  }

  if (kind !== "grid" && kind !== "table") {
    return expected(`${path}.kind`, '"grid", "table" or "stack"');
  }

  const columns = optional(v, "columns", path, readTrack);
  if (!columns.ok) return columns;
  const rows = optional(v, "rows", path, readTrack);
  if (!rows.ok) return rows;
  const gutter = optional(v, "gutter", path, readLength);
  if (!gutter.ok) return gutter;
  const columnGutter = optional(v, "columnGutter", path, readLength);
  if (!columnGutter.ok) return columnGutter;
  const rowGutter = optional(v, "rowGutter", path, readLength);
  if (!rowGutter.ok) return rowGutter;
  const align = optional(v, "align", path, readAlignment);
  if (!align.ok) return align;
  const inset = optional(v, "inset", path, readLength);
  if (!inset.ok) return inset;
  const fill = optional(v, "fill", path, readString);
  if (!fill.ok) return fill;
  const stroke = optional(v, "stroke", path, readStroke);
  if (!stroke.ok) return stroke;
  const bodyRows = optional(v, "bodyRows", path, readList(readRow));
  if (!bodyRows.ok) return bodyRows;
  const cells = optional(v, "cells", path, readList(readCell));
  if (!cells.ok) return cells;
  const elements = optional(v, "elements", path, readList(readElement));
  if (!elements.ok) return elements;
  const lines = optional(v, "lines", path, readList(readLine));
  if (!lines.ok) return lines;

  const base = {
    columns: columns.value,
    rows: rows.value,
    gutter: gutter.value,
    columnGutter: columnGutter.value,
    rowGutter: rowGutter.value,
    align: align.value,
    inset: inset.value,
    fill: fill.value,
    stroke: stroke.value,
    bodyRows: bodyRows.value,
    cells: cells.value,
    elements: elements.value,
    lines: lines.value,
  };

  if (kind === "grid") return ok({ ...base, kind });

  const headers = optional(v, "headers", path, readList(readSection));
  if (!headers.ok) return headers;
  const footers = optional(v, "footers", path, readList(readSection));
  if (!footers.ok) return footers;
  return ok({ ...base, kind, headers: headers.value, footers: footers.value });
}

const readLayoutEntry: Reader<LayoutDef> = (v, path) =>
  isRecord(v) ? readLayout(v, path) : expected(path, "an object");

const readFieldMode: Reader<FieldMode> = (v, path) =>
  v === "value" || v === "reference" ? ok(v) : expected(path, '"value" or "reference"');

const readVariables: Reader<Obj> = (v, path) => (isRecord(v) ? ok(v) : expected(path, "an object"));

function readOptions(v: unknown, path: string): LayoutResult<ReportDocumentOptions> {
  if (v === undefined || v === null) return ok({});
  if (!isRecord(v)) return expected(path, "an object");
  const pageSize = optional(v, "pageSize", path, readString);
  if (!pageSize.ok) return pageSize;
  const margin = optional(v, "margin", path, readLength);
  if (!margin.ok) return margin;
  const font = optional(v, "font", path, readString);
  if (!font.ok) return font;
  const fontSize = optional(v, "fontSize", path, readLength);
  if (!fontSize.ok) return fontSize;
  const locale = optional(v, "locale", path, readString);
  if (!locale.ok) return locale;
  const currency = optional(v, "currency", path, readString);
  if (!currency.ok) return currency;
  const fieldMode = optional(v, "fieldMode", path, readFieldMode);
  if (!fieldMode.ok) return fieldMode;
  const variables = optional(v, "variables", path, readVariables);
  if (!variables.ok) return variables;

  const out: { -readonly [K in keyof ReportDocumentOptions]: ReportDocumentOptions[K] } = {};
  if (pageSize.value !== undefined) out.pageSize = pageSize.value;
  if (margin.value !== undefined) out.margin = margin.value;
  if (font.value !== undefined) out.font = font.value;
  if (fontSize.value !== undefined) out.fontSize = fontSize.value;
  if (locale.value !== undefined) out.locale = locale.value;
  if (currency.value !== undefined) out.currency = currency.value;
  if (fieldMode.value !== undefined) out.fieldMode = fieldMode.value;
  if (variables.value !== undefined) out.variables = variables.value;
  return ok(out);
}

/** Reads a report document; paths in errors start at `$`. */
export function parseReportDocument(value: unknown): LayoutResult<ReportDocument> {
  if (!isRecord(value)) return expected("$", "an object");
  const options = readOptions(value["options"], "$.options");
  if (!options.ok) return options;
  const layouts = required(value, "layouts", "$", readList(readLayoutEntry));
  if (!layouts.ok) return layouts;
  return ok({ options: options.value, layouts: layouts.value });
}
