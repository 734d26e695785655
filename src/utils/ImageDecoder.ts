/**
 * Inspects encoded image data for embedding.
 * Detects the format from magic bytes and reads pixel dimensions from the
 * format headers (PNG, JPEG, GIF, BMP, WebP) without decoding pixels.
 */

import type { EmbeddedImageFormat, Size } from '../types/index.js';
import type { ILogger } from './Logger.js';
import { createLogger } from './Logger.js';

/**
 * Detected image formats.
 */
export type ImageFormat = EmbeddedImageFormat | 'unknown';

/**
 * Result of inspecting an image.
 */
export interface DecodedImage {
  /** Image width in pixels */
  width: number;
  /** Image height in pixels */
  height: number;
  /** Detected format */
  format: EmbeddedImageFormat;
}

/**
 * Configuration for ImageDecoder.
 */
export interface ImageDecoderConfig {
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Image signature bytes for format detection.
 */
const IMAGE_SIGNATURES = {
  png: [0x89, 0x50, 0x4e, 0x47],  // .PNG
  jpeg: [0xff, 0xd8, 0xff],       // JPEG SOI marker
  gif: [0x47, 0x49, 0x46],        // GIF
  bmp: [0x42, 0x4d],              // BM
  webp: [0x52, 0x49, 0x46, 0x46], // RIFF (WebP container)
} as const;

/**
 * JPEG start-of-frame markers carrying the frame size.
 */
const JPEG_SOF_MARKERS = new Set([
  0xc0, 0xc1, 0xc2, 0xc3, 0xc5, 0xc6, 0xc7, 0xc9, 0xca, 0xcb, 0xcd, 0xce, 0xcf,
]);

/**
 * Reads format and size information from encoded images.
 */
export class ImageDecoder {
  private readonly logger: ILogger;

  constructor(config: ImageDecoderConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'ImageDecoder');
  }

  /**
   * Detects the image format from the data's magic bytes.
   */
  detectFormat(data: Uint8Array): ImageFormat {
    if (data.length < 4) {
      return 'unknown';
    }

    if (this.matchesSignature(data, IMAGE_SIGNATURES.png)) {
      return 'png';
    }

    if (this.matchesSignature(data, IMAGE_SIGNATURES.jpeg)) {
      return 'jpeg';
    }

    if (this.matchesSignature(data, IMAGE_SIGNATURES.gif)) {
      return 'gif';
    }

    if (this.matchesSignature(data, IMAGE_SIGNATURES.bmp)) {
      return 'bmp';
    }

    // WebP is a RIFF container with WEBP at offset 8
    if (
      this.matchesSignature(data, IMAGE_SIGNATURES.webp) &&
      data.length >= 12 &&
      data[8] === 0x57 && // W
      data[9] === 0x45 && // E
      data[10] === 0x42 && // B
      data[11] === 0x50   // P
    ) {
      return 'webp';
    }

    return 'unknown';
  }

  /**
   * Checks if the data starts with the given signature bytes.
   */
  private matchesSignature(data: Uint8Array, signature: readonly number[]): boolean {
    if (data.length < signature.length) {
      return false;
    }
    for (let i = 0; i < signature.length; i++) {
      if (data[i] !== signature[i]) {
        return false;
      }
    }
    return true;
  }

  /**
   * Reads the format and pixel size of an encoded image.
   *
   * @throws Error if the format is not supported or the header is truncated
   */
  decode(data: Uint8Array): DecodedImage {
    const format = this.detectFormat(data);
    if (format === 'unknown') {
      throw new Error('Unsupported image format');
    }

    const size = this.readSize(Buffer.from(data.buffer, data.byteOffset, data.byteLength), format);
    if (!size) {
      this.logger.error('Failed to read image header', { format, size: data.length });
      throw new Error(`Failed to read ${format} image header`);
    }

    this.logger.debug('Image header read', { format, width: size.width, height: size.height });
    return { format, width: size.width, height: size.height };
  }

  private readSize(buffer: Buffer, format: EmbeddedImageFormat): Size | undefined {
    switch (format) {
      case 'png':
        // IHDR is always the first chunk
        if (buffer.length < 24) return undefined;
        return { width: buffer.readUInt32BE(16), height: buffer.readUInt32BE(20) };

      case 'gif':
        if (buffer.length < 10) return undefined;
        return { width: buffer.readUInt16LE(6), height: buffer.readUInt16LE(8) };

      case 'bmp':
        if (buffer.length < 26) return undefined;
        // Negative height marks a top-down bitmap
        return { width: buffer.readInt32LE(18), height: Math.abs(buffer.readInt32LE(22)) };

      case 'jpeg':
        return this.readJpegSize(buffer);

      case 'webp':
        return this.readWebpSize(buffer);
    }
  }

  private readJpegSize(buffer: Buffer): Size | undefined {
    let offset = 2;
    while (offset + 9 <= buffer.length) {
      if (buffer[offset] !== 0xff) {
        return undefined;
      }
      const marker = buffer[offset + 1];
      if (marker === 0xff) {
        // Fill byte
        offset++;
        continue;
      }
      if (marker !== undefined && JPEG_SOF_MARKERS.has(marker)) {
        return { width: buffer.readUInt16BE(offset + 7), height: buffer.readUInt16BE(offset + 5) };
      }
      offset += 2 + buffer.readUInt16BE(offset + 2);
    }
    return undefined;
  }

  private readWebpSize(buffer: Buffer): Size | undefined {
    if (buffer.length < 30) return undefined;
    const chunk = buffer.toString('ascii', 12, 16);

    switch (chunk) {
      case 'VP8 ':
        return {
          width: buffer.readUInt16LE(26) & 0x3fff,
          height: buffer.readUInt16LE(28) & 0x3fff,
        };
      case 'VP8L': {
        const bits = buffer.readUInt32LE(21);
        return {
          width: (bits & 0x3fff) + 1,
          height: ((bits >>> 14) & 0x3fff) + 1,
        };
      }
      case 'VP8X':
        return {
          width: buffer.readUIntLE(24, 3) + 1,
          height: buffer.readUIntLE(27, 3) + 1,
        };
      default:
        return undefined;
    }
  }

  /**
   * Gets the MIME type for an image format.
   */
  getMimeType(format: ImageFormat): string {
    switch (format) {
      case 'png':
        return 'image/png';
      case 'jpeg':
        return 'image/jpeg';
      case 'gif':
        return 'image/gif';
      case 'bmp':
        return 'image/bmp';
      case 'webp':
        return 'image/webp';
      default:
        return 'application/octet-stream';
    }
  }

  /**
   * Encodes image data as a base64 data URI.
   */
  toDataUri(data: Uint8Array, format: ImageFormat): string {
    const base64 = Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('base64');
    return `data:${this.getMimeType(format)};base64,${base64}`;
  }
}

/**
 * Creates an ImageDecoder instance.
 */
export function createImageDecoder(logger?: ILogger): ImageDecoder {
  return new ImageDecoder({ logger });
}
