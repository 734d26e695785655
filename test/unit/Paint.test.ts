import { describe, it, expect } from 'vitest';
import {
  effectiveOpacity,
  fill,
  parseHexColor,
  rgb,
  stroke,
  toSvgColor,
} from '../../src/document/Paint.js';
import { Colors } from '../../src/types/index.js';

describe('Paint', () => {
  describe('Hex color parsing', () => {
    it('should parse 6-digit hex colors', () => {
      expect(parseHexColor('FF0000')).toEqual({ r: 255, g: 0, b: 0, a: 255 });
      expect(parseHexColor('#00ff00')).toEqual({ r: 0, g: 255, b: 0, a: 255 });
    });

    it('should parse 3-digit hex shorthand', () => {
      expect(parseHexColor('00F')).toEqual({ r: 0, g: 0, b: 255, a: 255 });
    });

    it('should parse 8-digit hex with alpha', () => {
      expect(parseHexColor('FF000080')).toEqual({ r: 255, g: 0, b: 0, a: 128 });
    });

    it('should fall back to black for invalid input', () => {
      expect(parseHexColor('zzz')).toEqual(Colors.black);
      expect(parseHexColor('12345')).toEqual(Colors.black);
    });
  });

  describe('SVG colors', () => {
    it('should format channels as lowercase hex', () => {
      expect(toSvgColor(rgb(255, 128, 0))).toBe('#ff8000');
    });

    it('should clamp and round channels', () => {
      expect(toSvgColor({ r: 300, g: -4, b: 15.6, a: 255 })).toBe('#ff0010');
    });

    it('should combine opacity with alpha', () => {
      expect(effectiveOpacity({ r: 0, g: 0, b: 0, a: 51 }, 0.5)).toBeCloseTo(0.1, 10);
      expect(effectiveOpacity(Colors.red, 1)).toBe(1);
    });
  });

  describe('fill', () => {
    it('should default to opaque nonzero', () => {
      expect(fill('#336699')).toEqual({
        color: { r: 0x33, g: 0x66, b: 0x99, a: 255 },
        opacity: 1,
        rule: 'nonzero',
      });
    });

    it('should clamp opacity', () => {
      expect(fill(Colors.blue, 2).opacity).toBe(1);
      expect(fill(Colors.blue, -1).opacity).toBe(0);
      expect(fill(Colors.blue, NaN).opacity).toBe(1);
    });

    it('should copy the color', () => {
      const color = rgb(1, 2, 3);
      const paint = fill(color, 1, 'evenodd');
      color.r = 99;

      expect(paint.color.r).toBe(1);
      expect(paint.rule).toBe('evenodd');
    });
  });

  describe('stroke', () => {
    it('should use butt caps and miter joins', () => {
      expect(stroke('000000', 0.5, 2)).toEqual({
        color: { r: 0, g: 0, b: 0, a: 255 },
        opacity: 0.5,
        width: 2,
        lineCap: 'butt',
        lineJoin: 'miter',
      });
    });

    it('should reject non-positive widths', () => {
      expect(() => stroke(Colors.black, 1, 0)).toThrow(RangeError);
      expect(() => stroke(Colors.black, 1, -1)).toThrow('Stroke width must be a positive number, got -1');
      expect(() => stroke(Colors.black, 1, NaN)).toThrow(RangeError);
    });
  });
});
