import { describe, it, expect } from 'vitest';
import { PNG_PRESETS, PngOptimizer, isOptimizationDisabled } from '../../src/utils/PngOptimizer.js';
import { createLogger } from '../../src/utils/Logger.js';
import { loadSharp, pngHeader, solidPng } from '../fixtures/images.js';

const sharp = await loadSharp();

describe('PngOptimizer', () => {
  it('should treat only the none preset as disabled', () => {
    expect(isOptimizationDisabled('none')).toBe(true);
    expect(isOptimizationDisabled('balanced')).toBe(false);
    expect(isOptimizationDisabled({ compressionLevel: 0 })).toBe(false);
  });

  it('should use palette quantization only in the web preset', () => {
    const palettePresets = Object.entries(PNG_PRESETS)
      .filter(([, options]) => options.palette === true)
      .map(([name]) => name);

    expect(palettePresets).toEqual(['web']);
  });

  it('should return the input unchanged when disabled', async () => {
    const optimizer = new PngOptimizer(createLogger('silent'));
    const data = pngHeader(1, 1);

    expect(await optimizer.optimize(data, 'none')).toBe(data);
  });

  it('should return the input unchanged before initialization', async () => {
    const optimizer = new PngOptimizer(createLogger('silent'));
    const data = pngHeader(1, 1);

    expect(optimizer.isAvailable()).toBe(false);
    expect(await optimizer.optimize(data, 'maximum')).toBe(data);
  });

  it('should report compression statistics', () => {
    const optimizer = new PngOptimizer(createLogger('silent'));

    expect(optimizer.getCompressionStats(new Uint8Array(200), new Uint8Array(150))).toEqual({
      originalSize: 200,
      optimizedSize: 150,
      savedBytes: 50,
      reductionPercent: 25,
    });
  });

  describe.runIf(sharp !== undefined)('With Sharp', () => {
    function requireSharp() {
      if (!sharp) throw new Error('sharp is not installed');
      return sharp;
    }

    it('should recompress PNG data', async () => {
      const lib = requireSharp();
      const data = await solidPng(lib, 64);
      const optimizer = new PngOptimizer(createLogger('silent'));

      expect(await optimizer.initialize()).toBe(true);

      const optimized = await optimizer.optimize(data, 'maximum');
      const metadata = await lib(Buffer.from(optimized)).metadata();

      expect(optimized.length).toBeLessThan(data.length);
      expect(metadata.format).toBe('png');
      expect(metadata.width).toBe(64);
      expect(metadata.height).toBe(64);
    });

    it('should recompress with custom options', async () => {
      const lib = requireSharp();
      const data = await solidPng(lib, 32);
      const optimizer = new PngOptimizer(createLogger('silent'));
      await optimizer.initialize();

      const optimized = await optimizer.optimize(data, { compressionLevel: 9, palette: true, colors: 2 });

      expect(optimized.length).toBeLessThan(data.length);
      expect((await lib(Buffer.from(optimized)).metadata()).width).toBe(32);
    });

    it('should return the input when Sharp cannot decode it', async () => {
      const optimizer = new PngOptimizer(createLogger('silent'));
      await optimizer.initialize();
      const data = pngHeader(1, 1);

      expect(await optimizer.optimize(data, 'balanced')).toBe(data);
    });
  });
});
