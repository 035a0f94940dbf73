/**
 * Equirectangular yaw rotation.
 *
 * The horizontal axis of an equirectangular panorama spans 360 degrees, so a yaw
 * rotation is a circular shift of every row. Rows are never mixed and no pixel is
 * resampled: the output is an exact permutation of the input.
 */

import type { PixelBuffer } from '../types/batch.types.js';
import { TransformError } from '../utils/errors.js';

const DEGREES_PER_TURN = 360;

/**
 * Horizontal shift in pixels for an angle, reduced to [0, width).
 *
 * Fractional shifts are rounded half-up, so angles that are not multiples of
 * 360 / width cannot always be inverted exactly.
 */
export function computeShift(angleDegrees: number, width: number): number {
  const raw = Math.round((angleDegrees / DEGREES_PER_TURN) * width);
  return ((raw % width) + width) % width;
}

/**
 * Validate buffer shape before touching pixel data
 */
export function assertPixelBuffer(image: PixelBuffer): void {
  const { data, width, height, channels } = image;
  const bytesPerSample = image.bytesPerSample ?? 1;

  if (!Number.isInteger(width) || width <= 0 || !Number.isInteger(height) || height <= 0) {
    throw new TransformError(`Invalid dimensions ${width}x${height}`);
  }
  if (!Number.isInteger(channels) || channels < 1 || channels > 4) {
    throw new TransformError(`Unsupported channel count ${channels}`);
  }
  if (bytesPerSample !== 1 && bytesPerSample !== 2) {
    throw new TransformError(`Unsupported sample size ${bytesPerSample}`);
  }

  const expected = width * height * channels * bytesPerSample;
  if (data.length !== expected) {
    const shape = `${width}x${height}x${channels}`;
    throw new TransformError(
      `Pixel buffer holds ${data.length} bytes, expected ${expected} for ${bytesPerSample === 2 ? `${shape} (16-bit)` : shape}`
    );
  }
}

/**
 * Rotate an equirectangular image around the vertical axis.
 *
 * Positive angles move content to the right: output column x holds input
 * column (x - shift) mod width.
 *
 * @returns The input itself when angle is 0, otherwise a new buffer of the same shape
 * @throws TransformError when the buffer shape is malformed or the angle is not finite
 */
export function rotateEquirectangular(image: PixelBuffer, angleDegrees: number): PixelBuffer {
  if (!Number.isFinite(angleDegrees)) {
    throw new TransformError(`Angle must be a finite number, got ${angleDegrees}`);
  }

  assertPixelBuffer(image);

  if (angleDegrees === 0) {
    return image;
  }

  const { data, width, height, channels, bytesPerSample } = image;
  const shift = computeShift(angleDegrees, width);

  if (shift === 0) {
    return { data: Buffer.from(data), width, height, channels, bytesPerSample };
  }

  // Whole pixels move together, so 16-bit samples are never split
  const pixelBytes = channels * (bytesPerSample ?? 1);
  const rowBytes = width * pixelBytes;
  const shiftBytes = shift * pixelBytes;
  const out = Buffer.allocUnsafe(data.length);

  for (let y = 0; y < height; y++) {
    const rowStart = y * rowBytes;
    const rowEnd = rowStart + rowBytes;
    // Tail of the source row wraps around to the front
    data.copy(out, rowStart, rowEnd - shiftBytes, rowEnd);
    data.copy(out, rowStart + shiftBytes, rowStart, rowEnd - shiftBytes);
  }

  return { data: out, width, height, channels, bytesPerSample };
}
