/**
 * Text module exports.
 */

export {
  FontDatabase,
  createFontDatabase,
  type FontFace,
  type FontDatabaseConfig,
} from './FontDatabase.js';
export {
  TextConverter,
  createTextConverter,
  baselineOffset,
  type TextConverterConfig,
} from './TextConverter.js';
