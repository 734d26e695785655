import { describe, it, expect } from 'vitest';
import { ImageDecoder } from '../../src/utils/ImageDecoder.js';
import { createLogger } from '../../src/utils/Logger.js';
import { bmpHeader, gifHeader, jpegHeader, pngHeader } from '../fixtures/images.js';

describe('ImageDecoder', () => {
  const decoder = new ImageDecoder({ logger: createLogger('silent') });

  describe('Format detection', () => {
    it('should detect formats from magic bytes', () => {
      expect(decoder.detectFormat(pngHeader(1, 1))).toBe('png');
      expect(decoder.detectFormat(jpegHeader(1, 1))).toBe('jpeg');
      expect(decoder.detectFormat(gifHeader(1, 1))).toBe('gif');
      expect(decoder.detectFormat(bmpHeader(1, 1))).toBe('bmp');
    });

    it('should detect WebP only with the WEBP tag', () => {
      const riff = Buffer.alloc(30);
      riff.write('RIFF', 0, 'ascii');
      expect(decoder.detectFormat(riff)).toBe('unknown');

      riff.write('WEBP', 8, 'ascii');
      expect(decoder.detectFormat(riff)).toBe('webp');
    });

    it('should not detect short or unknown data', () => {
      expect(decoder.detectFormat(new Uint8Array([0x89, 0x50]))).toBe('unknown');
      expect(decoder.detectFormat(new Uint8Array([1, 2, 3, 4]))).toBe('unknown');
    });
  });

  describe('Header sizes', () => {
    it('should read PNG size', () => {
      expect(decoder.decode(pngHeader(640, 480))).toEqual({ format: 'png', width: 640, height: 480 });
    });

    it('should read JPEG size from the frame header', () => {
      expect(decoder.decode(jpegHeader(64, 32))).toEqual({ format: 'jpeg', width: 64, height: 32 });
    });

    it('should read GIF size', () => {
      expect(decoder.decode(gifHeader(300, 200))).toEqual({ format: 'gif', width: 300, height: 200 });
    });

    it('should read top-down BMP height as positive', () => {
      expect(decoder.decode(bmpHeader(10, -20))).toEqual({ format: 'bmp', width: 10, height: 20 });
    });

    it('should read lossless WebP size', () => {
      const webp = Buffer.alloc(30);
      webp.write('RIFF', 0, 'ascii');
      webp.write('WEBP', 8, 'ascii');
      webp.write('VP8L', 12, 'ascii');
      // 14-bit width-1 and height-1 fields after the signature byte
      webp.writeUInt32LE((100 - 1) | ((50 - 1) << 14), 21);

      expect(decoder.decode(webp)).toEqual({ format: 'webp', width: 100, height: 50 });
    });
  });

  describe('Errors', () => {
    it('should reject unknown formats', () => {
      expect(() => decoder.decode(new Uint8Array(32))).toThrow('Unsupported image format');
    });

    it('should reject truncated headers', () => {
      expect(() => decoder.decode(pngHeader(1, 1).subarray(0, 12))).toThrow(
        'Failed to read png image header'
      );
    });
  });

  describe('Data URIs', () => {
    it('should encode with the format MIME type', () => {
      const data = new Uint8Array([1, 2, 3]);

      expect(decoder.toDataUri(data, 'jpeg')).toBe('data:image/jpeg;base64,AQID');
      expect(decoder.toDataUri(data, 'unknown')).toBe('data:application/octet-stream;base64,AQID');
    });

    it('should encode only the viewed bytes of a subarray', () => {
      const data = new Uint8Array([9, 1, 2, 3, 9]).subarray(1, 4);

      expect(decoder.toDataUri(data, 'png')).toBe('data:image/png;base64,AQID');
    });
  });
});
