/**
 * Shared constants for document output.
 */

/**
 * Canvas extent used on an axis whose content has no positive span.
 */
export const FALLBACK_CANVAS_SIZE = 256;

export const SVG_NAMESPACE = 'http://www.w3.org/2000/svg';

export const XLINK_NAMESPACE = 'http://www.w3.org/1999/xlink';

/**
 * File extensions picked up when loading a font directory.
 */
export const FONT_FILE_EXTENSIONS = ['.ttf', '.otf', '.woff'] as const;
