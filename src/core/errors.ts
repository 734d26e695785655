/**
 * Errors raised while building and writing documents.
 */

/**
 * Kinds of writer failures.
 * - 'wrongBoundingBox': bounds cannot form a finite, positive-area rectangle
 * - 'noFonts': a text operation ran without an attached font source
 * - 'svgFailure': path events translated to an invalid command sequence
 * - 'fontFailure': a text node was given an invalid font size
 * - 'imageFailure': image data has an unsupported format or unreadable header
 * - 'ioWrite': the document could not be written
 * - 'consumed': the writer was already finalized or moved
 */
export type SvgWriterErrorKind =
  | 'wrongBoundingBox'
  | 'noFonts'
  | 'svgFailure'
  | 'fontFailure'
  | 'imageFailure'
  | 'ioWrite'
  | 'consumed';

/**
 * Raw extremes reported with a bounding box failure.
 */
export interface RawBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface SvgWriterErrorOptions {
  bounds?: RawBounds;
  cause?: unknown;
}

export class SvgWriterError extends Error {
  readonly kind: SvgWriterErrorKind;
  readonly bounds?: RawBounds;

  constructor(kind: SvgWriterErrorKind, message: string, options: SvgWriterErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SvgWriterError';
    this.kind = kind;
    this.bounds = options.bounds;
  }

  /**
   * Bounding box failure carrying the four raw extremes.
   */
  static wrongBoundingBox(bounds: RawBounds): SvgWriterError {
    const { minX, maxX, minY, maxY } = bounds;
    return new SvgWriterError(
      'wrongBoundingBox',
      `Cannot build a view box from x=[${minX}, ${maxX}] y=[${minY}, ${maxY}]`,
      { bounds: { minX, maxX, minY, maxY } }
    );
  }
}

/**
 * Narrows an unknown value to a writer error, optionally of one kind.
 */
export function isSvgWriterError(value: unknown, kind?: SvgWriterErrorKind): value is SvgWriterError {
  return value instanceof SvgWriterError && (kind === undefined || value.kind === kind);
}
