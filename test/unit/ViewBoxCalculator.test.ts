import { describe, it, expect } from 'vitest';
import { computeViewBox } from '../../src/geometry/ViewBoxCalculator.js';
import { fromRotate, fromRow, fromScale, fromSkew, fromTranslate } from '../../src/geometry/TransformCalculator.js';
import { SvgWriterError, isSvgWriterError } from '../../src/core/errors.js';
import { calculatePathBounds } from '../../src/geometry/PathBuilder.js';
import { translatePathEvents } from '../../src/geometry/PathTranslator.js';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('computeViewBox', () => {
  describe('Content with positive extent', () => {
    it('should use the bounds directly under the identity', () => {
      expect(computeViewBox([{ minX: 0, minY: 0, maxX: 10, maxY: 20 }])).toEqual({
        width: 10,
        height: 20,
        viewBox: { x: 0, y: 0, width: 10, height: 20 },
      });
    });

    it('should union several boxes and skip absent ones', () => {
      const result = computeViewBox([
        { minX: 0, minY: 0, maxX: 10, maxY: 10 },
        undefined,
        { minX: -5, minY: 5, maxX: 3, maxY: 30 },
      ]);

      expect(result.viewBox).toEqual({ x: -5, y: 0, width: 15, height: 30 });
    });

    it('should map boxes through a translation', () => {
      const result = computeViewBox([{ minX: 0, minY: 0, maxX: 10, maxY: 10 }], fromTranslate(5, 5));

      expect(result.viewBox).toEqual({ x: 5, y: 5, width: 10, height: 10 });
    });

    it('should map boxes through a scale', () => {
      const result = computeViewBox([{ minX: 1, minY: 1, maxX: 2, maxY: 3 }], fromScale(2));

      expect(result).toEqual({ width: 2, height: 4, viewBox: { x: 2, y: 2, width: 2, height: 4 } });
    });

    it('should measure rotated content by its mapped corners', () => {
      const result = computeViewBox([{ minX: 0, minY: 0, maxX: 10, maxY: 20 }], fromRotate(90));

      expect(result.width).toBeCloseTo(20, 10);
      expect(result.height).toBeCloseTo(10, 10);
      expect(result.viewBox.x).toBeCloseTo(-20, 10);
      expect(result.viewBox.y).toBeCloseTo(0, 10);
    });

    it('should measure skewed content by its mapped corners', () => {
      const result = computeViewBox([{ minX: 0, minY: 0, maxX: 10, maxY: 10 }], fromSkew(1, 0));

      expect(result.viewBox).toEqual({ x: 0, y: 0, width: 20, height: 10 });
    });
  });

  describe('Degenerate content', () => {
    it('should fall back to 256 on both axes for no content', () => {
      expect(computeViewBox([])).toEqual({
        width: 256,
        height: 256,
        viewBox: { x: 0, y: 0, width: 256, height: 256 },
      });
    });

    it('should treat only absent bounds as no content', () => {
      expect(computeViewBox([undefined, undefined]).viewBox).toEqual({
        x: 0,
        y: 0,
        width: 256,
        height: 256,
      });
    });

    it('should centre a single point in the fallback extent', () => {
      expect(computeViewBox([{ minX: 10, minY: 20, maxX: 10, maxY: 20 }])).toEqual({
        width: 256,
        height: 256,
        viewBox: { x: -118, y: -108, width: 256, height: 256 },
      });
    });

    it('should fall back on one axis only', () => {
      expect(computeViewBox([{ minX: 0, minY: 5, maxX: 10, maxY: 5 }])).toEqual({
        width: 10,
        height: 256,
        viewBox: { x: 0, y: -123, width: 10, height: 256 },
      });
    });

    it('should fall back when a transform collapses the content', () => {
      const result = computeViewBox([{ minX: 0, minY: 0, maxX: 10, maxY: 10 }], fromScale(0));

      expect(result.viewBox).toEqual({ x: -128, y: -128, width: 256, height: 256 });
    });
  });

  describe('Errors', () => {
    it('should reject a transform with NaN', () => {
      const error = captureError(() =>
        computeViewBox([{ minX: 0, minY: 0, maxX: 1, maxY: 1 }], fromRow(NaN, 0, 0, 1, 0, 0))
      );

      expect(isSvgWriterError(error, 'wrongBoundingBox')).toBe(true);
    });

    it('should report the raw extremes of infinite bounds', () => {
      const error = captureError(() =>
        computeViewBox([{ minX: 0, minY: 0, maxX: Infinity, maxY: 1 }])
      );

      expect(error).toBeInstanceOf(SvgWriterError);
      expect(isSvgWriterError(error) && error.bounds).toMatchObject({ minX: 0, maxX: Infinity });
    });

    it('should reject a span that overflows', () => {
      const error = captureError(() =>
        computeViewBox([{ minX: -Number.MAX_VALUE, minY: 0, maxX: Number.MAX_VALUE, maxY: 1 }])
      );

      expect(isSvgWriterError(error, 'wrongBoundingBox')).toBe(true);
    });
  });

  it('should return identical results for identical input', () => {
    const bounds = [{ minX: 0.1, minY: 0.2, maxX: 3.3, maxY: 4.4 }];
    const transform = fromRotate(33);

    expect(computeViewBox(bounds, transform)).toEqual(computeViewBox(bounds, transform));
  });

  describe('Translated paths', () => {
    it('should shift the bounds of a cubic path by exactly the translation', () => {
      const data = translatePathEvents([
        { type: 'begin', at: { x: 0, y: 0 } },
        {
          type: 'cubic',
          from: { x: 0, y: 0 },
          ctrl1: { x: 1, y: -5 },
          ctrl2: { x: 9, y: 15 },
          to: { x: 10, y: 10 },
        },
        { type: 'end', last: { x: 10, y: 10 }, first: { x: 0, y: 0 }, close: false },
      ]);
      const bounds = calculatePathBounds(data?.commands ?? []);

      const plain = computeViewBox([bounds]);
      const moved = computeViewBox([bounds], fromTranslate(7, -3));

      expect(bounds).toEqual({ minX: 0, minY: -5, maxX: 10, maxY: 15 });
      expect(plain.viewBox).toEqual({ x: 0, y: -5, width: 10, height: 20 });
      expect(moved.viewBox).toEqual({
        x: plain.viewBox.x + 7,
        y: plain.viewBox.y - 3,
        width: plain.viewBox.width,
        height: plain.viewBox.height,
      });
    });
  });
});
