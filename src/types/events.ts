import type { Point } from './geometry.js';

/**
 * Path construction event types.
 */
export type PathEventType = 'begin' | 'line' | 'quadratic' | 'cubic' | 'end';

/**
 * Starts a new subpath at `at`.
 */
export interface BeginEvent {
  type: 'begin';
  at: Point;
}

/**
 * Straight segment.
 */
export interface LineEvent {
  type: 'line';
  from: Point;
  to: Point;
}

/**
 * Quadratic bezier segment.
 */
export interface QuadraticEvent {
  type: 'quadratic';
  from: Point;
  ctrl: Point;
  to: Point;
}

/**
 * Cubic bezier segment.
 */
export interface CubicEvent {
  type: 'cubic';
  from: Point;
  ctrl1: Point;
  ctrl2: Point;
  to: Point;
}

/**
 * Ends the current subpath. With `close` set, the subpath is closed back to `first`.
 */
export interface EndEvent {
  type: 'end';
  last: Point;
  first: Point;
  close: boolean;
}

/**
 * A single path construction event. A path is a flat ordered sequence of
 * events and may hold several `begin`…`end` subpaths back to back.
 */
export type PathEvent = BeginEvent | LineEvent | QuadraticEvent | CubicEvent | EndEvent;
