/**
 * Translates path event streams into absolute drawing commands.
 */

import type { Point, PathData } from '../types/geometry.js';
import type { PathEvent } from '../types/events.js';
import { PathBuilder } from './PathBuilder.js';

function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Converts path events into a validated command sequence.
 *
 * The scan carries one piece of state, the last point emitted. A segment or
 * end event whose recorded start differs from it gets a `moveTo` to that start
 * first. Comparison is exact: producers repeat points bit for bit when there
 * is no discontinuity. A closing end emits an explicit `lineTo(first)` before
 * `close`.
 *
 * @returns The path data, or undefined when the builder rejects the sequence
 */
export function translatePathEvents(events: Iterable<PathEvent>): PathData | undefined {
  const builder = new PathBuilder();
  let current: Point | undefined;

  const repair = (from: Point): void => {
    if (current && !samePoint(from, current)) {
      builder.moveTo(from.x, from.y);
    }
  };

  for (const event of events) {
    switch (event.type) {
      case 'begin':
        builder.moveTo(event.at.x, event.at.y);
        current = event.at;
        break;

      case 'line':
        repair(event.from);
        builder.lineTo(event.to.x, event.to.y);
        current = event.to;
        break;

      case 'quadratic':
        repair(event.from);
        // The control point is taken as given
        builder.quadTo(event.ctrl.x, event.ctrl.y, event.to.x, event.to.y);
        current = event.to;
        break;

      case 'cubic':
        repair(event.from);
        builder.cubicTo(
          event.ctrl1.x,
          event.ctrl1.y,
          event.ctrl2.x,
          event.ctrl2.y,
          event.to.x,
          event.to.y
        );
        current = event.to;
        break;

      case 'end':
        repair(event.last);
        if (event.close) {
          builder.lineTo(event.first.x, event.first.y);
          builder.close();
        }
        current = event.last;
        break;
    }
  }

  return builder.finish();
}
