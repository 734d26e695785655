/**
 * Recompression of embedded PNG images using Sharp.
 * Sharp is loaded lazily; without it images are embedded unchanged.
 */

import type sharpFactory from 'sharp';
import type { PngOptimizationPreset, PngOptimizationOptions } from '../types/options.js';
import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';

/**
 * Preset configurations for PNG optimization.
 */
export const PNG_PRESETS: Record<PngOptimizationPreset, PngOptimizationOptions> = {
  /** Embed the bytes as given */
  none: {},

  fast: {
    compressionLevel: 6,
    adaptiveFiltering: true,
  },

  balanced: {
    compressionLevel: 9,
    adaptiveFiltering: true,
  },

  maximum: {
    compressionLevel: 9,
    adaptiveFiltering: true,
    palette: false,
  },

  /**
   * Palette quantization. Large savings on diagrams and flat graphics,
   * visible banding on photos and gradients.
   */
  web: {
    compressionLevel: 9,
    adaptiveFiltering: true,
    palette: true,
    colors: 256,
    quality: 85,
    dither: 1.0,
  },
};

/**
 * Sharp module type (dynamically imported).
 */
type SharpModule = typeof sharpFactory;

/**
 * Returns true when the setting asks for no recompression at all.
 */
export function isOptimizationDisabled(options: PngOptimizationPreset | PngOptimizationOptions): boolean {
  return options === 'none';
}

/**
 * PNG optimizer backed by Sharp.
 */
export class PngOptimizer {
  private sharp: SharpModule | null = null;
  private initialized = false;
  private readonly logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger ?? createLogger('warn', 'PngOptimizer');
  }

  /**
   * Attempts to load Sharp.
   * @returns true if Sharp is available, false otherwise
   */
  async initialize(): Promise<boolean> {
    if (this.initialized) {
      return this.sharp !== null;
    }

    try {
      const sharpModule = await import('sharp');
      this.sharp = sharpModule.default;
      this.logger.debug('Sharp loaded successfully');
    } catch (error) {
      this.logger.warn('Sharp not available, embedded PNGs are left as given', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.initialized = true;
    return this.sharp !== null;
  }

  /**
   * Checks if Sharp is available for optimization.
   */
  isAvailable(): boolean {
    return this.sharp !== null;
  }

  /**
   * Recompresses PNG data. Returns the input unchanged when optimization is
   * disabled, Sharp is missing, or Sharp fails on the data.
   */
  async optimize(
    data: Uint8Array,
    options: PngOptimizationPreset | PngOptimizationOptions = 'balanced'
  ): Promise<Uint8Array> {
    if (!this.sharp || isOptimizationDisabled(options)) {
      return data;
    }

    const opts = typeof options === 'string' ? PNG_PRESETS[options] : options;

    try {
      const optimized = await this.applyOptimization(this.sharp, Buffer.from(data), opts);
      this.logger.debug('PNG recompressed', this.getCompressionStats(data, optimized));
      return optimized;
    } catch (error) {
      this.logger.warn('PNG optimization failed, embedding original', {
        error: error instanceof Error ? error.message : String(error),
      });
      return data;
    }
  }

  private async applyOptimization(
    sharp: SharpModule,
    png: Buffer,
    options: PngOptimizationOptions
  ): Promise<Buffer> {
    if (options.palette) {
      try {
        return await sharp(png)
          .png({
            palette: true,
            colors: options.colors ?? 256,
            quality: options.quality ?? 90,
            dither: options.dither ?? 1.0,
            compressionLevel: options.compressionLevel ?? 9,
          })
          .toBuffer();
      } catch (paletteError) {
        this.logger.debug('Palette mode failed, falling back to standard compression', {
          error: paletteError instanceof Error ? paletteError.message : String(paletteError),
        });
      }
    }

    // Sharp instances are single-use, so every attempt starts from a new one
    return await sharp(png)
      .png({
        compressionLevel: options.compressionLevel ?? 6,
        adaptiveFiltering: options.adaptiveFiltering ?? true,
      })
      .toBuffer();
  }

  /**
   * Gets compression statistics for a pair of buffers.
   */
  getCompressionStats(
    original: Uint8Array,
    optimized: Uint8Array
  ): {
    originalSize: number;
    optimizedSize: number;
    savedBytes: number;
    reductionPercent: number;
  } {
    const originalSize = original.length;
    const optimizedSize = optimized.length;
    const savedBytes = originalSize - optimizedSize;
    const reductionPercent = originalSize > 0 ? (savedBytes / originalSize) * 100 : 0;

    return {
      originalSize,
      optimizedSize,
      savedBytes,
      reductionPercent: Math.round(reductionPercent * 100) / 100,
    };
  }
}

/**
 * Creates a PNG optimizer instance.
 * Call initialize() before using optimize.
 */
export function createPngOptimizer(logger?: ILogger): PngOptimizer {
  return new PngOptimizer(logger);
}
