/**
 * Image Utils Tests
 */

import { describe, it, expect } from 'vitest';
import sharp from 'sharp';

import { decodeImage, encodeGrayJpeg, calculateBrightness } from './image-utils.js';
import { DecodeError } from './errors.js';

describe('image-utils', () => {
  describe('decodeImage', () => {
    it('should decode a PNG into interleaved pixels', async () => {
      const pixels = Buffer.from([10, 20, 30, 40, 50, 60]);
      const png = await sharp(pixels, { raw: { width: 2, height: 1, channels: 3 } }).png().toBuffer();

      const decoded = await decodeImage(png);

      expect(decoded.width).toBe(2);
      expect(decoded.height).toBe(1);
      expect(decoded.channels).toBe(3);
      expect([...decoded.data]).toEqual([10, 20, 30, 40, 50, 60]);
    });

    it('should throw DecodeError for an empty payload', async () => {
      await expect(decodeImage(Buffer.alloc(0))).rejects.toThrow('Empty image payload');
    });

    it('should throw DecodeError for bytes that are not an image', async () => {
      const error = await decodeImage(Buffer.from('plain text')).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toHaveProperty('originalError');
    });
  });

  describe('encodeGrayJpeg', () => {
    it('should encode a plane as an RGB JPEG of the same size', async () => {
      const plane = new Uint8Array(8 * 4).fill(128);

      const jpeg = await encodeGrayJpeg(plane, 8, 4, 90);
      const metadata = await sharp(jpeg).metadata();

      expect(metadata.format).toBe('jpeg');
      expect(metadata.width).toBe(8);
      expect(metadata.height).toBe(4);
      expect(metadata.channels).toBe(3);
    });

    it('should keep a flat plane close to its gray value', async () => {
      const plane = new Uint8Array(16 * 16).fill(200);

      const decoded = await decodeImage(await encodeGrayJpeg(plane, 16, 16));

      expect(Math.abs(calculateBrightness(decoded) - 200)).toBeLessThanOrEqual(2);
    });
  });

  describe('calculateBrightness', () => {
    it('should average integer gray over all pixels', () => {
      const data = new Uint8Array([255, 255, 255, 0, 0, 0, 10, 20, 31, 100, 100, 101]);

      // gray values: 255, 0, 20, 100
      expect(calculateBrightness({ data, width: 2, height: 2, channels: 3 })).toBe(93);
    });

    it('should read single-channel images directly', () => {
      const data = new Uint8Array([10, 20, 30, 41]);

      expect(calculateBrightness({ data, width: 4, height: 1, channels: 1 })).toBe(25);
    });

    it('should return 0 for an empty image', () => {
      expect(calculateBrightness({ data: new Uint8Array(0), width: 0, height: 0, channels: 3 })).toBe(0);
    });
  });
});
