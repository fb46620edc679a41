/**
 * Shared Image Utilities
 *
 * Decoding and encoding through sharp, shared by the edge processors and the region detector.
 */

import sharp from 'sharp';

import { DecodeError, toError } from './errors.js';

/**
 * Interleaved 8-bit pixels of a decoded image
 */
export interface DecodedImage {
  data: Uint8Array;
  width: number;
  height: number;
  /** 1 (grey), 2 (grey + alpha), 3 (RGB) or 4 (RGBA) */
  channels: number;
}

/** Default JPEG quality for processed frames */
export const DEFAULT_JPEG_QUALITY = 90;

/**
 * Decode an encoded image (JPEG, PNG, WebP, ...) into raw pixels
 *
 * @throws DecodeError when the payload is empty or not an image
 */
export async function decodeImage(bytes: Buffer): Promise<DecodedImage> {
  if (bytes.length === 0) {
    throw new DecodeError('Empty image payload');
  }

  try {
    const { data, info } = await sharp(bytes).raw().toBuffer({ resolveWithObject: true });
    return {
      data,
      width: info.width,
      height: info.height,
      channels: info.channels,
    };
  } catch (error) {
    throw new DecodeError('Image could not be decoded', toError(error));
  }
}

/**
 * Encode a single-channel magnitude plane as an RGB JPEG with R=G=B
 */
export async function encodeGrayJpeg(
  plane: Uint8Array,
  width: number,
  height: number,
  quality: number = DEFAULT_JPEG_QUALITY
): Promise<Buffer> {
  const rgb = Buffer.alloc(width * height * 3);
  for (let i = 0, p = 0; i < plane.length; i++, p += 3) {
    const value = plane[i];
    rgb[p] = value;
    rgb[p + 1] = value;
    rgb[p + 2] = value;
  }

  return sharp(rgb, { raw: { width, height, channels: 3 } })
    .jpeg({ quality })
    .toBuffer();
}

/**
 * Average grayscale brightness (0-255, integer) of a decoded image
 */
export function calculateBrightness(image: DecodedImage): number {
  const pixelCount = image.width * image.height;
  if (pixelCount === 0) return 0;

  const { data, channels } = image;
  let total = 0;
  for (let p = 0; p < data.length; p += channels) {
    total += channels >= 3 ? Math.floor((data[p] + data[p + 1] + data[p + 2]) / 3) : data[p];
  }

  return Math.floor(total / pixelCount);
}
