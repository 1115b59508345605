/**
 * @quire/core
 *
 * Runtime-agnostic layout compilation pipeline: layout definitions are
 * lowered to a normalized IR and rendered to Typst markup.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { QuireError, type QuireErrorCode, quireErrorFromLayout } from "./errors.js";
export {
  type CellCoordinate,
  type LayoutError,
  type LayoutErrorCode,
  type TrackAxis,
  describeValue,
  formatLayoutError,
  invalidDocument,
  invalidTrackDefinition,
  positionConflict,
  spanOverflow,
  unknownElementType,
  unsupportedLayoutType,
} from "./layout/errors.js";
export { type LayoutResult, fail, mapAll, ok } from "./layout/result.js";

// =============================================================================
// IR
// =============================================================================

export * from "./ir/index.js";

// =============================================================================
// Layout definitions and transformation
// =============================================================================

export type {
  CellDef,
  ElementDef,
  FieldDef,
  FrTrack,
  GridDef,
  LabelDef,
  LayoutDef,
  LineDef,
  RowDef,
  SectionDef,
  StackDef,
  StyleAttrs,
  TableDef,
  TrackDef,
  TrackSizeDef,
} from "./layout/definitions.js";
export {
  cell,
  field,
  footer,
  grid,
  header,
  hline,
  label,
  layout,
  row,
  stack,
  table,
  vline,
} from "./layout/builders.js";
export { BARE_TRACK_UNIT, normalizeTracks } from "./layout/tracks.js";
export { resolveElementStyle } from "./layout/elementStyle.js";
export { lowerContent } from "./layout/content.js";
export { transformCell, transformRow } from "./layout/cell.js";
export {
  transformFooter,
  transformFooters,
  transformHeader,
  transformHeaders,
} from "./layout/sections.js";
export { transformLine, transformLines } from "./layout/lines.js";
export { placeCells } from "./layout/placement.js";
export {
  TABLE_DEFAULT_INSET,
  TABLE_DEFAULT_STROKE,
  resolveContainerProperties,
  resolveStackProperties,
} from "./layout/properties.js";
export {
  type TransformOptions,
  transformGrid,
  transformLayout,
  transformStack,
  transformTable,
} from "./layout/transform.js";
export {
  type ReportDocument,
  type ReportDocumentOptions,
  parseReportDocument,
} from "./layout/document.js";

// =============================================================================
// Typst rendering
// =============================================================================

export * from "./typst/index.js";

// =============================================================================
// One-call compilation
// =============================================================================

export {
  type CompileOptions,
  compileLayout,
  compileReport,
  transformLayouts,
  unwrapLayout,
} from "./compile.js";
