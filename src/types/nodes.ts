import type { Rgba, Rect, Size, Transform2D, PathData } from './geometry.js';

/**
 * Kinds of nodes in a document tree.
 */
export type NodeKind = 'path' | 'image' | 'text' | 'group';

/**
 * Fill rule for path interiors.
 */
export type FillRule = 'nonzero' | 'evenodd';

/**
 * Solid fill.
 */
export interface Fill {
  color: Rgba;
  /** Opacity 0-1 */
  opacity: number;
  rule: FillRule;
}

/**
 * Line cap styles.
 */
export type LineCap = 'butt' | 'round' | 'square';

/**
 * Line join styles.
 */
export type LineJoin = 'miter' | 'round' | 'bevel';

/**
 * Solid stroke.
 */
export interface Stroke {
  color: Rgba;
  /** Opacity 0-1 */
  opacity: number;
  /** Stroke width in user units, always positive */
  width: number;
  lineCap: LineCap;
  lineJoin: LineJoin;
  /** Dash pattern (array of dash/gap lengths) */
  dashArray?: number[];
}

/**
 * Dominant baseline used to place text relative to its origin.
 */
export type DominantBaseline =
  | 'auto'
  | 'alphabetic'
  | 'hanging'
  | 'middle'
  | 'central'
  | 'text-before-edge'
  | 'text-after-edge'
  | 'ideographic';

/**
 * Raster formats that can be embedded in a document.
 */
export type EmbeddedImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'webp';

/**
 * Image rendering hint.
 */
export type ImageRendering = 'optimizeQuality' | 'optimizeSpeed';

/**
 * Base interface for all document nodes.
 */
export interface BaseNode {
  kind: NodeKind;
  /** Optional element id */
  id?: string;
  /** Local transform, applied before any parent transform */
  transform: Transform2D;
}

/**
 * Path built from translated drawing commands.
 */
export interface PathNode extends BaseNode {
  kind: 'path';
  data: PathData;
  fill?: Fill;
  stroke?: Stroke;
}

/**
 * Embedded raster image.
 */
export interface ImageNode extends BaseNode {
  kind: 'image';
  format: EmbeddedImageFormat;
  /** Encoded image bytes */
  data: Uint8Array;
  /** Placement rectangle the image is stretched to */
  viewRect: Rect;
  rendering: ImageRendering;
}

/**
 * Single-chunk text block, converted to paths when the document is finalized.
 */
export interface TextNode extends BaseNode {
  kind: 'text';
  text: string;
  fontFamilies: string[];
  /** Font size in user units, always positive */
  fontSize: number;
  fill?: Fill;
  stroke?: Stroke;
  dominantBaseline: DominantBaseline;
}

/**
 * Group of nodes sharing a transform.
 */
export interface GroupNode extends BaseNode {
  kind: 'group';
  /** Opacity 0-1 */
  opacity?: number;
  children: DocumentNode[];
}

/**
 * Union of all node types.
 */
export type DocumentNode = PathNode | ImageNode | TextNode | GroupNode;

/**
 * A finalized document: canvas size, view box and node tree.
 */
export interface SvgDocument {
  size: Size;
  viewBox: Rect;
  root: GroupNode;
}
