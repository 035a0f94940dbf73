/**
 * BMP support for the sharp codec
 *
 * Prebuilt libvips has no BMP loader or saver, so BMP containers go through bmp-js.
 * Decoded pixels are 8-bit RGB; encoded files are uncompressed 24-bit.
 */

import bmp from 'bmp-js';
import type { PixelBuffer } from '../../types/batch.types.js';

/** BITMAPCOREHEADER size; every later header stores 32-bit dimensions */
const CORE_HEADER_SIZE = 12;

/**
 * Check for the "BM" file signature
 */
export function isBmp(buffer: Buffer): boolean {
  return buffer.length >= 26 && buffer[0] === 0x42 && buffer[1] === 0x4d;
}

/**
 * Read dimensions from the DIB header without decoding pixels
 */
export function readBmpSize(buffer: Buffer): { width: number; height: number } {
  if (buffer.readUInt32LE(14) === CORE_HEADER_SIZE) {
    return { width: buffer.readUInt16LE(18), height: buffer.readUInt16LE(20) };
  }
  // Negative height marks a top-down bitmap
  return { width: buffer.readInt32LE(18), height: Math.abs(buffer.readInt32LE(22)) };
}

export function decodeBmp(buffer: Buffer): PixelBuffer {
  const { data, width, height } = bmp.decode(buffer);
  const rgb = Buffer.alloc(width * height * 3);

  for (let i = 0, o = 0; o < rgb.length; i += 4, o += 3) {
    rgb[o] = data[i + 3];
    rgb[o + 1] = data[i + 2];
    rgb[o + 2] = data[i + 1];
  }

  return { data: rgb, width, height, channels: 3 };
}

/**
 * Encode 8-bit pixels as a 24-bit BMP. Grey is expanded to RGB and alpha is dropped.
 */
export function encodeBmp(image: PixelBuffer): Buffer {
  const { data, width, height, channels } = image;
  if ((image.bytesPerSample ?? 1) !== 1) {
    throw new Error('BMP holds 8-bit samples only');
  }

  const abgr = Buffer.alloc(width * height * 4);
  for (let i = 0, o = 0; o < abgr.length; i += channels, o += 4) {
    const grey = channels < 3;
    abgr[o + 1] = grey ? data[i] : data[i + 2];
    abgr[o + 2] = grey ? data[i] : data[i + 1];
    abgr[o + 3] = data[i];
  }

  return bmp.encode({ data: abgr, width, height }).data;
}
