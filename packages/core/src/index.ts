/**
 * @cellsketch/core - Text diagram composition and rendering.
 *
 * Turns a declarative list of elements into monospace lines meant for one
 * spreadsheet column, and builds the Sheets requests that place them.
 */

// Errors
export {
  CellsketchError,
  type CellsketchErrorCode,
  type Fatal,
  type Result,
  fatalToError,
} from "./errors.js";

// Elements
export type {
  ArrowElement,
  BarChartElement,
  BoxElement,
  DiagramElement,
  DiagramElementType,
  ProgressElement,
  RowElement,
  ShadedBoxElement,
  SparklineElement,
  SpacerElement,
  TableElement,
  TextElement,
  TitleElement,
  VerticalBarChartElement,
} from "./elements/types.js";
export { ELEMENT_TYPES } from "./elements/types.js";
export { el, toBoxLines } from "./elements/el.js";
export {
  type ParseElementsOptions,
  parseElementSlots,
  parseElements,
  renderDiagramFromInput,
} from "./elements/parse.js";

// Layout
export {
  DEFAULT_DIAGRAM_WIDTH,
  type DiagramOptions,
  type DiagramSlot,
  renderDiagram,
  renderDiagramSlots,
  renderDiagramText,
} from "./layout/diagram.js";
export {
  center,
  charCount,
  indent,
  maxCharCount,
  padEnd,
  padStart,
  splitPad,
  truncate,
} from "./layout/textMeasure.js";

// Glyph tables
export {
  BOX_STYLES,
  type BoxGlyphSet,
  type BoxStyleName,
  DEFAULT_BOX_STYLE,
  getBoxStyle,
  isBoxStyleName,
} from "./renderer/boxGlyphs.js";
export {
  ARROW,
  FILL_RAMP,
  FRAME,
  FULL_BLOCK,
  LIGHT_SHADE,
  MERGE,
  SPARK_FLAT_INDEX,
  SPARK_RAMP,
} from "./renderer/blockGlyphs.js";
export {
  DEFAULT_PALETTE,
  PALETTES,
  type Palette,
  type PaletteName,
  getPalette,
  isPaletteName,
} from "./theme/palettes.js";

// Renderers
export {
  type ArrowDirection,
  type BoxRenderOptions,
  DEFAULT_BOX_PADDING,
  type RenderedBox,
  renderArrow,
  renderBox,
  renderComment,
  renderFrame,
  renderTitle,
} from "./renderer/primitives.js";
export {
  type BoxRowOptions,
  DEFAULT_ROW_SPACING,
  type RenderedBoxRow,
  boxCenters,
  mergeLines,
  renderBoxRow,
} from "./renderer/boxRow.js";
export {
  type BarChartOptions,
  DEFAULT_BAR_HEIGHT,
  DEFAULT_BAR_WIDTH,
  DEFAULT_COLUMN_GAP,
  DEFAULT_COLUMN_WIDTH,
  type BarDatum,
  type VerticalBarChartOptions,
  barEighths,
  horizontalBar,
  renderBarChart,
  renderVerticalBarChart,
} from "./widgets/barChart.js";
export { renderSparkline, sparklineIndices } from "./widgets/sparkline.js";
export {
  DEFAULT_PROGRESS_MAX,
  DEFAULT_PROGRESS_WIDTH,
  type ProgressOptions,
  progressRatio,
  renderProgress,
} from "./widgets/progress.js";
export {
  DEFAULT_CONTRAST,
  DEFAULT_SHADE_HEIGHT,
  DEFAULT_SHADE_WIDTH,
  SHADE_FIELDS,
  type ShadeDirection,
  type ShadeField,
  type ShadedBoxOptions,
  applyContrast,
  getShadeField,
  isShadeDirection,
  paletteIndex,
  renderShadedBox,
} from "./widgets/shadedBox.js";
export { type TableOptions, renderTable, tableColumnWidths } from "./widgets/table.js";
export { formatValue } from "./widgets/format.js";

// Placement
export {
  type GridAnchor,
  columnToIndex,
  indexToColumn,
  parseA1Anchor,
} from "./placement/a1.js";
export {
  type DimensionRange,
  type GridRange,
  type PlacementOptions,
  type SheetsRequest,
  buildPlacementRequests,
  columnWidthPx,
} from "./placement/requests.js";
