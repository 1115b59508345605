/**
 * packages/core/src/layout/errors.ts - Layout transformation error taxonomy.
 *
 * Errors are plain tagged values carried by `LayoutResult`. They are produced
 * while lowering a layout description to IR; rendering never produces them.
 */

export type TrackAxis = "columns" | "rows";

export type CellCoordinate = Readonly<{ column: number; row: number }>;

export type LayoutError =
  | Readonly<{ code: "invalid_track_definition"; axis: TrackAxis; value: unknown }>
  | Readonly<{ code: "unknown_element_type"; value: unknown }>
  | Readonly<{ code: "unsupported_layout_type"; value: unknown }>
  | Readonly<{
      code: "span_overflow";
      position: CellCoordinate;
      colspan: number;
      columns: number;
    }>
  | Readonly<{ code: "position_conflict"; position: CellCoordinate }>
  | Readonly<{ code: "invalid_document"; path: string; detail: string }>;

export type LayoutErrorCode = LayoutError["code"];

export function invalidTrackDefinition(axis: TrackAxis, value: unknown): LayoutError {
  return { code: "invalid_track_definition", axis, value };
}

export function unknownElementType(value: unknown): LayoutError {
  return { code: "unknown_element_type", value };
}

export function unsupportedLayoutType(value: unknown): LayoutError {
  return { code: "unsupported_layout_type", value };
}

export function spanOverflow(
  position: CellCoordinate,
  colspan: number,
  columns: number,
): LayoutError {
  return { code: "span_overflow", position, colspan, columns };
}

export function positionConflict(position: CellCoordinate): LayoutError {
  return { code: "position_conflict", position };
}

export function invalidDocument(path: string, detail: string): LayoutError {
  return { code: "invalid_document", path, detail };
}

/** Compact, deterministic rendering of an offending value for messages. */
export function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean" || value === null) {
    return String(value);
  }
  if (typeof value === "bigint") return `${value.toString()}n`;
  if (typeof value === "function" || typeof value === "symbol") return typeof value;
  try {
    const json = JSON.stringify(value);
    return json ?? Object.prototype.toString.call(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

export function formatLayoutError(error: LayoutError): string {
  switch (error.code) {
    case "invalid_track_definition":
      return `Invalid ${error.axis} track definition: ${describeValue(error.value)}`;
    case "unknown_element_type":
      return `Unknown element type: ${describeValue(error.value)}`;
    case "unsupported_layout_type":
      return `Unsupported layout type: ${describeValue(error.value)}`;
    case "span_overflow":
      return `colspan ${String(error.colspan)} at column ${String(error.position.column)} exceeds grid width of ${String(error.columns)}`;
    case "position_conflict":
      return `Cell at (${String(error.position.column)}, ${String(error.position.row)}) conflicts with an existing cell`;
    case "invalid_document":
      return `${error.path}: ${error.detail}`;
  }
}
