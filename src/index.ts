/**
 * pathsvg - Path events to SVG
 *
 * Translates event-based vector path descriptions into drawing commands,
 * computes the document view box under a global transform, and writes SVG.
 */

// Main entry point
export { SvgWriter, createWriter } from './core/SvgWriter.js';
export { SvgWriterError, isSvgWriterError } from './core/errors.js';
export type { SvgWriterErrorKind, RawBounds } from './core/errors.js';
export { FALLBACK_CANVAS_SIZE } from './core/constants.js';

// Types - Options and Results
export type {
  WriterOptions,
  ResolvedWriterOptions,
  LogLevel,
  PngOptimizationPreset,
  PngOptimizationOptions,
  RenderResult,
  WriteResult,
} from './types/index.js';
export { DEFAULT_WRITER_OPTIONS, resolveWriterOptions } from './types/index.js';

// Types - Geometry and events
export type {
  Rgba,
  Point,
  Size,
  Rect,
  Bounds,
  Transform2D,
  DrawingCommand,
  DrawingCommandType,
  PathData,
  PathEvent,
  PathEventType,
  BeginEvent,
  LineEvent,
  QuadraticEvent,
  CubicEvent,
  EndEvent,
} from './types/index.js';
export { Colors, IDENTITY_TRANSFORM } from './types/index.js';

// Types - Document
export type {
  DocumentNode,
  PathNode,
  ImageNode,
  TextNode,
  GroupNode,
  SvgDocument,
  Fill,
  FillRule,
  Stroke,
  LineCap,
  LineJoin,
  DominantBaseline,
  EmbeddedImageFormat,
  ImageRendering,
} from './types/index.js';

// Geometry
export {
  PathBuilder,
  PathEventBuilder,
  translatePathEvents,
  pathDataToSvg,
  TransformCalculator,
  fromRow,
  fromTranslate,
  fromScale,
  fromRotate,
  fromRotateAt,
  fromSkew,
  computeViewBox,
} from './geometry/index.js';
export type { ViewBoxResult } from './geometry/index.js';

// Document model
export {
  rgb,
  parseHexColor,
  fill,
  stroke,
  createPathNode,
  createImageNode,
  placeImage,
  createTextNode,
  createGroupNode,
  calculateNodeBounds,
  SvgSerializer,
} from './document/index.js';
export type { ImagePlacement } from './document/index.js';

// Text
export { FontDatabase, createFontDatabase, TextConverter } from './text/index.js';
export type { FontFace } from './text/index.js';

// Logger
export { createLogger, Logger } from './utils/Logger.js';
export type { ILogger, LogEntry, LogSink } from './utils/Logger.js';
