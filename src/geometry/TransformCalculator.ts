/**
 * Affine transform construction and point mapping.
 */

import type { Bounds, Point, Transform2D } from '../types/geometry.js';
import { IDENTITY_TRANSFORM } from '../types/geometry.js';

/**
 * Builds a transform from its six components.
 */
export function fromRow(a: number, b: number, c: number, d: number, e: number, f: number): Transform2D {
  return { a, b, c, d, e, f };
}

export function fromTranslate(tx: number, ty: number): Transform2D {
  return { ...IDENTITY_TRANSFORM, e: tx, f: ty };
}

export function fromScale(sx: number, sy: number = sx): Transform2D {
  return { ...IDENTITY_TRANSFORM, a: sx, d: sy };
}

/**
 * Rotation about the origin.
 * @param degrees Angle in degrees, clockwise in a y-down space
 */
export function fromRotate(degrees: number): Transform2D {
  const radians = (degrees * Math.PI) / 180;
  const cos = Math.cos(radians);
  const sin = Math.sin(radians);
  return { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
}

/**
 * Rotation about a pivot point.
 */
export function fromRotateAt(degrees: number, cx: number, cy: number): Transform2D {
  const calculator = new TransformCalculator();
  return calculator.concat(
    fromTranslate(cx, cy),
    calculator.concat(fromRotate(degrees), fromTranslate(-cx, -cy))
  );
}

/**
 * Skew with the given factors (not angles).
 */
export function fromSkew(kx: number, ky: number): Transform2D {
  return { ...IDENTITY_TRANSFORM, b: ky, c: kx };
}

/**
 * Calculator for affine transforms.
 */
export class TransformCalculator {
  /**
   * Maps a point through a transform.
   */
  mapPoint(transform: Transform2D, point: Point): Point {
    return {
      x: transform.a * point.x + transform.c * point.y + transform.e,
      y: transform.b * point.x + transform.d * point.y + transform.f,
    };
  }

  /**
   * Gets the four corners of a box after transformation, in the order
   * top-left, top-right, bottom-left, bottom-right.
   */
  getTransformedCorners(bounds: Bounds, transform: Transform2D): Point[] {
    const corners: Point[] = [
      { x: bounds.minX, y: bounds.minY }, // top-left
      { x: bounds.maxX, y: bounds.minY }, // top-right
      { x: bounds.minX, y: bounds.maxY }, // bottom-left
      { x: bounds.maxX, y: bounds.maxY }, // bottom-right
    ];

    return corners.map((corner) => this.mapPoint(transform, corner));
  }

  /**
   * Gets the axis-aligned bounds of a transformed box.
   * Rotation and skew are accounted for through the mapped corners.
   */
  getBoundingBounds(bounds: Bounds, transform: Transform2D): Bounds {
    if (this.isIdentity(transform)) {
      return { ...bounds };
    }

    const corners = this.getTransformedCorners(bounds, transform);
    const xs = corners.map((c) => c.x);
    const ys = corners.map((c) => c.y);

    return {
      minX: Math.min(...xs),
      minY: Math.min(...ys),
      maxX: Math.max(...xs),
      maxY: Math.max(...ys),
    };
  }

  /**
   * Combines a parent transform with a child transform.
   * The result applies the child first, then the parent.
   */
  concat(parent: Transform2D, child: Transform2D): Transform2D {
    return {
      a: parent.a * child.a + parent.c * child.b,
      b: parent.b * child.a + parent.d * child.b,
      c: parent.a * child.c + parent.c * child.d,
      d: parent.b * child.c + parent.d * child.d,
      e: parent.a * child.e + parent.c * child.f + parent.e,
      f: parent.b * child.e + parent.d * child.f + parent.f,
    };
  }

  /**
   * Applies `other` before `transform`.
   */
  preConcat(transform: Transform2D, other: Transform2D): Transform2D {
    return this.concat(transform, other);
  }

  /**
   * Applies `other` after `transform`.
   */
  postConcat(transform: Transform2D, other: Transform2D): Transform2D {
    return this.concat(other, transform);
  }

  isIdentity(transform: Transform2D): boolean {
    return (
      transform.a === 1 &&
      transform.b === 0 &&
      transform.c === 0 &&
      transform.d === 1 &&
      transform.e === 0 &&
      transform.f === 0
    );
  }
}

/**
 * Default transform calculator instance.
 */
export const defaultTransformCalculator = new TransformCalculator();
