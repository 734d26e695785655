/**
 * RGBA color with values 0-255 for each channel.
 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/**
 * 2D point in coordinate space.
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Size with width and height.
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * Rectangle with position and dimensions.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Axis-aligned box given by its extremes.
 */
export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

/**
 * 2D affine transform matrix.
 * Stored as [a, b, c, d, e, f] representing:
 * | a c e |
 * | b d f |
 * | 0 0 1 |
 */
export interface Transform2D {
  /** Scale X and rotation component */
  a: number;
  /** Skew Y and rotation component */
  b: number;
  /** Skew X and rotation component */
  c: number;
  /** Scale Y and rotation component */
  d: number;
  /** Translate X */
  e: number;
  /** Translate Y */
  f: number;
}

/**
 * Absolute drawing command types.
 */
export type DrawingCommandType = 'moveTo' | 'lineTo' | 'quadTo' | 'cubicTo' | 'close';

/**
 * One absolute drawing command. `moveTo` starts a new subpath.
 */
export type DrawingCommand =
  | { type: 'moveTo'; to: Point }
  | { type: 'lineTo'; to: Point }
  | { type: 'quadTo'; ctrl: Point; to: Point }
  | { type: 'cubicTo'; ctrl1: Point; ctrl2: Point; to: Point }
  | { type: 'close' };

/**
 * A validated command sequence and the bounds of all of its points.
 * Control points are included in the bounds.
 */
export interface PathData {
  readonly commands: readonly DrawingCommand[];
  readonly bounds: Bounds;
}

/**
 * Identity transform (no transformation).
 */
export const IDENTITY_TRANSFORM: Transform2D = {
  a: 1,
  b: 0,
  c: 0,
  d: 1,
  e: 0,
  f: 0,
};

/**
 * Common RGBA colors.
 */
export const Colors = {
  transparent: { r: 0, g: 0, b: 0, a: 0 },
  black: { r: 0, g: 0, b: 0, a: 255 },
  white: { r: 255, g: 255, b: 255, a: 255 },
  red: { r: 255, g: 0, b: 0, a: 255 },
  green: { r: 0, g: 128, b: 0, a: 255 },
  blue: { r: 0, g: 0, b: 255, a: 255 },
  gray: { r: 128, g: 128, b: 128, a: 255 },
} as const satisfies Record<string, Rgba>;
