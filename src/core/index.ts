export { SvgWriter, createWriter } from './SvgWriter.js';

export { SvgWriterError, isSvgWriterError } from './errors.js';
export type { SvgWriterErrorKind, SvgWriterErrorOptions, RawBounds } from './errors.js';

export {
  FALLBACK_CANVAS_SIZE,
  SVG_NAMESPACE,
  XLINK_NAMESPACE,
  FONT_FILE_EXTENSIONS,
} from './constants.js';
