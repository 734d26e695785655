/**
 * Type definitions for pathsvg.
 */

// Options and configuration
export type {
  WriterOptions,
  ResolvedWriterOptions,
  LogLevel,
  PngOptimizationPreset,
  PngOptimizationOptions,
} from './options.js';
export { DEFAULT_WRITER_OPTIONS, resolveWriterOptions } from './options.js';

// Results
export type { RenderResult, WriteResult } from './results.js';

// Geometry
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
} from './geometry.js';
export { IDENTITY_TRANSFORM, Colors } from './geometry.js';

// Path events
export type {
  PathEvent,
  PathEventType,
  BeginEvent,
  LineEvent,
  QuadraticEvent,
  CubicEvent,
  EndEvent,
} from './events.js';

// Document nodes
export type {
  NodeKind,
  BaseNode,
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
} from './nodes.js';
