export { Logger, createLogger, consoleSink, formatLogEntry } from './Logger.js';
export type { ILogger, LogEntry, LogSink } from './Logger.js';

export {
  ImageDecoder,
  createImageDecoder,
  type ImageFormat,
  type DecodedImage,
  type ImageDecoderConfig,
} from './ImageDecoder.js';

export {
  PngOptimizer,
  createPngOptimizer,
  isOptimizationDisabled,
  PNG_PRESETS,
} from './PngOptimizer.js';

// Re-export PNG types from options (canonical source)
export type { PngOptimizationPreset, PngOptimizationOptions } from '../types/options.js';
