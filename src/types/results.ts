import type { Rect } from './geometry.js';

/**
 * Result of finalizing a writer into SVG markup.
 */
export interface RenderResult {
  /**
   * Serialized SVG document.
   */
  svg: string;

  /**
   * Canvas width in user units.
   */
  width: number;

  /**
   * Canvas height in user units.
   */
  height: number;

  /**
   * View box of the document.
   */
  viewBox: Rect;
}

/**
 * Result of writing a document to a file.
 */
export interface WriteResult {
  /**
   * Path the document was written to.
   */
  filePath: string;

  /**
   * Number of bytes written.
   */
  bytesWritten: number;

  width: number;
  height: number;
  viewBox: Rect;
}
