/**
 * Fill and stroke construction, and color conversion for SVG attributes.
 */

import type { Rgba } from '../types/geometry.js';
import { Colors } from '../types/geometry.js';
import type { Fill, FillRule, Stroke } from '../types/nodes.js';

function clampOpacity(opacity: number): number {
  if (Number.isNaN(opacity)) return 1;
  return Math.min(1, Math.max(0, opacity));
}

/**
 * Opaque color from 0-255 channels.
 */
export function rgb(r: number, g: number, b: number): Rgba {
  return { r, g, b, a: 255 };
}

/**
 * Parses a hex color string to RGBA.
 * Accepts 3, 6 and 8 digit forms with or without `#`; anything else is black.
 */
export function parseHexColor(hex: string): Rgba {
  hex = hex.replace('#', '');

  if (!/^[0-9a-fA-F]+$/.test(hex)) {
    return { ...Colors.black };
  }

  if (hex.length === 3) {
    const c0 = hex[0] ?? '0';
    const c1 = hex[1] ?? '0';
    const c2 = hex[2] ?? '0';
    hex = c0 + c0 + c1 + c1 + c2 + c2;
  }

  if (hex.length === 6 || hex.length === 8) {
    const r = parseInt(hex.substring(0, 2), 16);
    const g = parseInt(hex.substring(2, 4), 16);
    const b = parseInt(hex.substring(4, 6), 16);
    const a = hex.length === 8 ? parseInt(hex.substring(6, 8), 16) : 255;
    return { r, g, b, a };
  }

  return { ...Colors.black };
}

function toRgba(color: Rgba | string): Rgba {
  return typeof color === 'string' ? parseHexColor(color) : { ...color };
}

/**
 * Formats the RGB channels as `#rrggbb`. Alpha is carried by the opacity attributes.
 */
export function toSvgColor(color: Rgba): string {
  const channel = (value: number): string =>
    Math.round(Math.min(255, Math.max(0, value))).toString(16).padStart(2, '0');
  return `#${channel(color.r)}${channel(color.g)}${channel(color.b)}`;
}

/**
 * Effective opacity of a paint: its own opacity times the color's alpha.
 */
export function effectiveOpacity(color: Rgba, opacity: number): number {
  return clampOpacity(opacity) * (Math.min(255, Math.max(0, color.a)) / 255);
}

/**
 * Builds a solid {@link Fill}. Opacity is clamped to [0, 1].
 */
export function fill(color: Rgba | string, opacity = 1, rule: FillRule = 'nonzero'): Fill {
  return {
    color: toRgba(color),
    opacity: clampOpacity(opacity),
    rule,
  };
}

/**
 * Builds a solid {@link Stroke} with butt caps and miter joins.
 *
 * @throws RangeError when the width is not a positive finite number
 */
export function stroke(color: Rgba | string, opacity: number, width: number): Stroke {
  if (!Number.isFinite(width) || width <= 0) {
    throw new RangeError(`Stroke width must be a positive number, got ${width}`);
  }

  return {
    color: toRgba(color),
    opacity: clampOpacity(opacity),
    width,
    lineCap: 'butt',
    lineJoin: 'miter',
  };
}
