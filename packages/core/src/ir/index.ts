export type {
  Alignment,
  CellNode,
  CellPosition,
  CellProperties,
  CellSpan,
  ContainerProperties,
  ContentNode,
  FieldFormat,
  FieldNode,
  FieldSource,
  Fill,
  FontStyle,
  FontWeight,
  FooterNode,
  GridChild,
  GridNode,
  HeaderNode,
  LabelNode,
  LayoutKind,
  LayoutNode,
  Length,
  LineNode,
  LineOrientation,
  NestedLayoutNode,
  RowNode,
  RowProperties,
  StackDirection,
  StackNode,
  StackProperties,
  Stroke,
  Style,
  StyleKey,
  TableNode,
  TextAlign,
} from "./types.js";
export { STYLE_KEYS, isLayoutKind } from "./types.js";
export { createStyle, isEmptyStyle, mergeStyle } from "./style.js";
export {
  type CellNodeOptions,
  type ContainerNodeParts,
  DEFAULT_FOOTER_REPEAT,
  DEFAULT_HEADER_LEVEL,
  DEFAULT_HEADER_REPEAT,
  type FieldNodeOptions,
  type TableNodeParts,
  cellNode,
  countNodes,
  fieldNode,
  footerNode,
  gridNode,
  headerNode,
  labelNode,
  lineNode,
  nestedLayoutNode,
  rowNode,
  singleContentCell,
  stackNode,
  tableNode,
} from "./nodes.js";
