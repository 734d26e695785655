/**
 * Logging level for the writer.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * PNG optimization preset names for embedded images.
 * - 'none': Embed the bytes as given
 * - 'fast': Quick lossless recompression
 * - 'balanced': Lossless with adaptive filtering
 * - 'maximum': Strongest lossless compression
 * - 'web': Palette-based optimization (may lose quality)
 */
export type PngOptimizationPreset = 'none' | 'fast' | 'balanced' | 'maximum' | 'web';

/**
 * Custom PNG optimization options.
 * Use these for fine-grained control over compression settings.
 */
export interface PngOptimizationOptions {
  /**
   * PNG compression level (0-9).
   * 0 = fastest/largest, 9 = slowest/smallest.
   * @default 6
   */
  compressionLevel?: number;

  /**
   * Use adaptive row filtering for better compression.
   * @default true
   */
  adaptiveFiltering?: boolean;

  /**
   * Convert to indexed/palette PNG.
   * @default false
   */
  palette?: boolean;

  /**
   * Maximum colors for palette mode (2-256).
   * @default 256
   */
  colors?: number;

  /**
   * Quality threshold for palette quantization (1-100).
   * @default 90
   */
  quality?: number;

  /**
   * Floyd-Steinberg dithering strength (0.0-1.0).
   * @default 1.0
   */
  dither?: number;
}

/**
 * Options for an SVG writer.
 */
export interface WriterOptions {
  /**
   * Logging level for diagnostic output.
   * @default 'warn'
   */
  logLevel?: LogLevel;

  /**
   * Decimal places kept for coordinates in the output.
   * @default 8
   */
  precision?: number;

  /**
   * Indent the output markup.
   * @default false
   */
  pretty?: boolean;

  /**
   * Recompression of embedded PNG images.
   * Requires Sharp; without it the images are embedded as given.
   * @default 'none'
   */
  pngOptimization?: PngOptimizationPreset | PngOptimizationOptions;
}

/**
 * Writer options after merging with defaults.
 */
export interface ResolvedWriterOptions {
  logLevel: LogLevel;
  precision: number;
  pretty: boolean;
  pngOptimization: PngOptimizationPreset | PngOptimizationOptions;
}

/**
 * Default writer options.
 */
export const DEFAULT_WRITER_OPTIONS: ResolvedWriterOptions = {
  logLevel: 'warn',
  precision: 8,
  pretty: false,
  pngOptimization: 'none',
};

/**
 * Merges user options over the defaults.
 */
export function resolveWriterOptions(options: WriterOptions = {}): ResolvedWriterOptions {
  return {
    logLevel: options.logLevel ?? DEFAULT_WRITER_OPTIONS.logLevel,
    precision: options.precision ?? DEFAULT_WRITER_OPTIONS.precision,
    pretty: options.pretty ?? DEFAULT_WRITER_OPTIONS.pretty,
    pngOptimization: options.pngOptimization ?? DEFAULT_WRITER_OPTIONS.pngOptimization,
  };
}
