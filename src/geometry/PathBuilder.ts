/**
 * Command-sequence construction for document paths.
 * Provides a fluent API whose `finish()` validates the sequence.
 */

import type { Point, Bounds, DrawingCommand, PathData } from '../types/geometry.js';

/**
 * Builder for absolute drawing command sequences.
 * Supports moveTo, lineTo, quadTo, cubicTo and close.
 */
export class PathBuilder {
  private commands: DrawingCommand[] = [];

  /**
   * Starts a new subpath at the given point.
   */
  moveTo(x: number, y: number): this {
    this.commands.push({ type: 'moveTo', to: { x, y } });
    return this;
  }

  /**
   * Draws a line from the current point to the specified point.
   */
  lineTo(x: number, y: number): this {
    this.commands.push({ type: 'lineTo', to: { x, y } });
    return this;
  }

  /**
   * Draws a quadratic bezier curve.
   * @param cx Control point X
   * @param cy Control point Y
   * @param x End point X
   * @param y End point Y
   */
  quadTo(cx: number, cy: number, x: number, y: number): this {
    this.commands.push({ type: 'quadTo', ctrl: { x: cx, y: cy }, to: { x, y } });
    return this;
  }

  /**
   * Draws a cubic bezier curve.
   * @param c1x First control point X
   * @param c1y First control point Y
   * @param c2x Second control point X
   * @param c2y Second control point Y
   * @param x End point X
   * @param y End point Y
   */
  cubicTo(c1x: number, c1y: number, c2x: number, c2y: number, x: number, y: number): this {
    this.commands.push({
      type: 'cubicTo',
      ctrl1: { x: c1x, y: c1y },
      ctrl2: { x: c2x, y: c2y },
      to: { x, y },
    });
    return this;
  }

  /**
   * Closes the current subpath.
   */
  close(): this {
    this.commands.push({ type: 'close' });
    return this;
  }

  /**
   * Number of commands recorded so far.
   */
  get length(): number {
    return this.commands.length;
  }

  /**
   * Validates and returns the recorded commands.
   *
   * A sequence without any segment (empty, or moves and closes only) is
   * rejected, and so is any sequence with a non-finite coordinate.
   *
   * @returns The path data, or undefined when the sequence is rejected
   */
  finish(): PathData | undefined {
    const hasSegment = this.commands.some(
      (command) => command.type === 'lineTo' || command.type === 'quadTo' || command.type === 'cubicTo'
    );
    if (!hasSegment) {
      return undefined;
    }

    const bounds = calculatePathBounds(this.commands);
    if (!bounds) {
      return undefined;
    }

    return {
      commands: [...this.commands],
      bounds,
    };
  }
}

/**
 * Points referenced by a command, control points first.
 */
export function commandPoints(command: DrawingCommand): Point[] {
  switch (command.type) {
    case 'moveTo':
    case 'lineTo':
      return [command.to];
    case 'quadTo':
      return [command.ctrl, command.to];
    case 'cubicTo':
      return [command.ctrl1, command.ctrl2, command.to];
    case 'close':
      return [];
  }
}

/**
 * Calculates the bounds of every point of a command sequence.
 *
 * @returns Bounds, or undefined when there are no points or a coordinate is not finite
 */
export function calculatePathBounds(commands: readonly DrawingCommand[]): Bounds | undefined {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const command of commands) {
    for (const point of commandPoints(command)) {
      if (!Number.isFinite(point.x) || !Number.isFinite(point.y)) {
        return undefined;
      }
      minX = Math.min(minX, point.x);
      minY = Math.min(minY, point.y);
      maxX = Math.max(maxX, point.x);
      maxY = Math.max(maxY, point.y);
    }
  }

  if (!Number.isFinite(minX)) {
    return undefined;
  }

  return { minX, minY, maxX, maxY };
}

/**
 * Formats a coordinate with at most `precision` decimals. Negative zero prints as 0.
 */
export function formatNumber(value: number, precision: number): string {
  const rounded = Number(value.toFixed(precision));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

/**
 * Serializes a command sequence as SVG path data.
 */
export function pathDataToSvg(commands: readonly DrawingCommand[], precision = 8): string {
  const n = (value: number): string => formatNumber(value, precision);

  return commands
    .map((command) => {
      switch (command.type) {
        case 'moveTo':
          return `M ${n(command.to.x)} ${n(command.to.y)}`;
        case 'lineTo':
          return `L ${n(command.to.x)} ${n(command.to.y)}`;
        case 'quadTo':
          return `Q ${n(command.ctrl.x)} ${n(command.ctrl.y)} ${n(command.to.x)} ${n(command.to.y)}`;
        case 'cubicTo':
          return (
            `C ${n(command.ctrl1.x)} ${n(command.ctrl1.y)} ` +
            `${n(command.ctrl2.x)} ${n(command.ctrl2.y)} ${n(command.to.x)} ${n(command.to.y)}`
          );
        case 'close':
          return 'Z';
      }
    })
    .join(' ');
}
