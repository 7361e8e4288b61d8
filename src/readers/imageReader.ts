/**
 * Image asset reader
 *
 * Header fields come from image-size; PNGs are additionally fully decoded
 * with pngjs so that every pixel's alpha can be inspected.
 */

import { readFileSync } from 'node:fs';
import { imageSize } from 'image-size';
import { PNG } from 'pngjs';
import type { DecodedImage, ImageFormat } from '../types/index.js';

// signature (8) + chunk length (4) + "IHDR" (4) + width (4) + height (4)
const PNG_BIT_DEPTH_OFFSET = 24;

const FORMAT_BY_TYPE: Record<string, ImageFormat> = {
  png: 'png',
  jpg: 'jpeg',
};

/**
 * Decodes an image file. Throws when the file cannot be read, its header
 * cannot be parsed, or it is neither PNG nor JPEG.
 */
export function decodeImage(filePath: string): DecodedImage {
  const buffer = readFileSync(filePath);
  return decodeImageBuffer(buffer);
}

export function decodeImageBuffer(buffer: Buffer): DecodedImage {
  const size = imageSize(buffer);
  const type = size.type ?? 'unknown';
  const format = Object.hasOwn(FORMAT_BY_TYPE, type) ? FORMAT_BY_TYPE[type] : undefined;
  if (!format) {
    throw new Error(`unsupported image format "${type}"`);
  }
  if (typeof size.width !== 'number' || typeof size.height !== 'number') {
    throw new Error('image header has no dimensions');
  }

  if (format === 'jpeg') {
    return { width: size.width, height: size.height, format };
  }

  // 16-bit samples are kept as decoded; rescaling to 8 bits rounds 0xfffe up to 0xff
  const sixteenBit = buffer[PNG_BIT_DEPTH_OFFSET] === 16;
  const png = PNG.sync.read(buffer, { skipRescale: sixteenBit });
  const samples: ArrayLike<number> =
    sixteenBit && png.data.length === png.width * png.height * 8
      ? readUInt16Samples(png.data)
      : png.data;
  return {
    width: png.width,
    height: png.height,
    format,
    opaque: isOpaque(samples, sixteenBit ? 0xffff : 0xff),
  };
}

/** `samples` is RGBA, one element per channel, `maxAlpha` the fully opaque value. */
export function isOpaque(samples: ArrayLike<number>, maxAlpha = 0xff): boolean {
  for (let i = 3; i < samples.length; i += 4) {
    if (samples[i] !== maxAlpha) return false;
  }
  return true;
}

function readUInt16Samples(data: Buffer): Uint16Array {
  const samples = new Uint16Array(data.length / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = data.readUInt16BE(i * 2);
  }
  return samples;
}
