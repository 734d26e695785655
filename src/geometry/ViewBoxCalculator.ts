/**
 * Canvas size and view box from primitive bounds under a global transform.
 */

import type { Bounds, Rect, Transform2D } from '../types/geometry.js';
import { IDENTITY_TRANSFORM } from '../types/geometry.js';
import { FALLBACK_CANVAS_SIZE } from '../core/constants.js';
import { SvgWriterError } from '../core/errors.js';
import { defaultTransformCalculator } from './TransformCalculator.js';

/**
 * Canvas size and the rectangle it displays.
 */
export interface ViewBoxResult {
  width: number;
  height: number;
  viewBox: Rect;
}

/**
 * Span and origin on one axis, substituting the fallback extent when the
 * content has no positive span there.
 */
function resolveAxis(min: number, max: number): { start: number; span: number } {
  const span = max - min;
  if (span > 0) {
    return { start: min, span };
  }
  if (min === max) {
    // A single coordinate sits in the middle of the fallback extent
    return { start: min - FALLBACK_CANVAS_SIZE / 2, span: FALLBACK_CANVAS_SIZE };
  }
  return { start: 0, span: FALLBACK_CANVAS_SIZE };
}

/**
 * Computes the document canvas from the local bounds of its primitives.
 *
 * Every corner of every present box is mapped through the global transform,
 * so rotated or skewed content is measured after transformation. An axis
 * without positive span falls back to a 256-unit extent, which also applies
 * to the view box so that size and view box always agree.
 *
 * @param bounds Local bounds per primitive; undefined entries are skipped
 * @param globalTransform Transform applied to the whole assembled group
 * @throws SvgWriterError 'wrongBoundingBox' when a mapped corner or the result is not finite
 */
export function computeViewBox(
  bounds: Iterable<Bounds | undefined>,
  globalTransform: Transform2D = IDENTITY_TRANSFORM
): ViewBoxResult {
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  let invalid = false;

  for (const box of bounds) {
    if (!box) continue;

    for (const point of defaultTransformCalculator.getTransformedCorners(box, globalTransform)) {
      if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
        invalid = true;
      }
      minX = Math.min(minX, point.x);
      maxX = Math.max(maxX, point.x);
      minY = Math.min(minY, point.y);
      maxY = Math.max(maxY, point.y);
    }
  }

  if (invalid) {
    throw SvgWriterError.wrongBoundingBox({ minX, maxX, minY, maxY });
  }

  const x = resolveAxis(minX, maxX);
  const y = resolveAxis(minY, maxY);

  // Finite extremes can still overflow into an infinite span
  if (![x.start, x.span, y.start, y.span].every(Number.isFinite)) {
    throw SvgWriterError.wrongBoundingBox({ minX, maxX, minY, maxY });
  }

  return {
    width: x.span,
    height: y.span,
    viewBox: { x: x.start, y: y.start, width: x.span, height: y.span },
  };
}
