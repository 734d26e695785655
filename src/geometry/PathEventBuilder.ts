/**
 * Builds path event streams from a pen-style API.
 */

import type { Point } from '../types/geometry.js';
import type { PathEvent } from '../types/events.js';

/**
 * Records begin/segment/end calls as path events.
 * Each segment event carries the point it starts from, and each end event
 * carries both the last point and the first point of its subpath.
 */
export class PathEventBuilder {
  private events: PathEvent[] = [];
  private first: Point | undefined;
  private current: Point | undefined;

  /**
   * Starts a new subpath.
   * @throws Error if a subpath is already open
   */
  begin(at: Point): this {
    if (this.current) {
      throw new Error('Cannot begin a subpath while another one is open');
    }
    this.events.push({ type: 'begin', at: { ...at } });
    this.first = { ...at };
    this.current = { ...at };
    return this;
  }

  lineTo(to: Point): this {
    const from = this.requireCurrent('lineTo');
    this.events.push({ type: 'line', from, to: { ...to } });
    this.current = { ...to };
    return this;
  }

  quadraticBezierTo(ctrl: Point, to: Point): this {
    const from = this.requireCurrent('quadraticBezierTo');
    this.events.push({ type: 'quadratic', from, ctrl: { ...ctrl }, to: { ...to } });
    this.current = { ...to };
    return this;
  }

  cubicBezierTo(ctrl1: Point, ctrl2: Point, to: Point): this {
    const from = this.requireCurrent('cubicBezierTo');
    this.events.push({ type: 'cubic', from, ctrl1: { ...ctrl1 }, ctrl2: { ...ctrl2 }, to: { ...to } });
    this.current = { ...to };
    return this;
  }

  /**
   * Ends the open subpath, closing it back to its first point when `close` is set.
   */
  end(close = false): this {
    const last = this.requireCurrent('end');
    const first = this.first ?? last;
    this.events.push({ type: 'end', last, first: { ...first }, close });
    this.current = undefined;
    this.first = undefined;
    return this;
  }

  /**
   * Whether a subpath is currently open.
   */
  isInSubpath(): boolean {
    return this.current !== undefined;
  }

  /**
   * Returns the recorded events, ending an open subpath without closing it.
   */
  build(): PathEvent[] {
    if (this.current) {
      this.end(false);
    }
    const events = this.events;
    this.events = [];
    return events;
  }

  private requireCurrent(operation: string): Point {
    if (!this.current) {
      throw new Error(`${operation} called outside of a subpath; call begin() first`);
    }
    return { ...this.current };
  }
}
