import { readFile } from 'fs/promises';
import sharp from 'sharp';
import { getConfig } from '../config/index.js';
import type { ImageCodecProvider, ImageInfo } from '../providers/interfaces/image-codec.provider.js';
import { getSharpImageCodec } from '../providers/implementations/index.js';
import { decodeBmp, isBmp } from '../providers/implementations/bmp-format.js';
import type { PixelBuffer } from '../types/batch.types.js';
import { DecodeError, getErrorMessage, toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { rotateEquirectangular } from './rotation.service.js';

const logger = createChildLogger({ service: 'preview' });

export interface PreviewOptions {
  maxWidth?: number;
  maxHeight?: number;
  codec?: ImageCodecProvider;
}

export interface RotationPreview {
  /** PNG of the downscaled input */
  original: Buffer;
  /** PNG of the downscaled input after rotation */
  rotated: Buffer;
  width: number;
  height: number;
  angle: number;
}

/**
 * Render a small before/after pair for checking an angle before running a batch.
 *
 * The image is shrunk to fit maxWidth x maxHeight (never enlarged) and the
 * rotation is applied to the shrunk pixels, so the shift is computed on the
 * preview width.
 */
export async function previewRotation(
  filePath: string,
  angle: number,
  options: PreviewOptions = {}
): Promise<RotationPreview> {
  const config = getConfig().preview;
  const { maxWidth = config.maxWidth, maxHeight = config.maxHeight } = options;
  const codec = options.codec ?? getSharpImageCodec();

  let thumbnail: PixelBuffer;
  try {
    const input = await readFile(filePath);
    let source: sharp.Sharp;
    if (isBmp(input)) {
      const { data, width, height } = decodeBmp(input);
      source = sharp(data, { raw: { width, height, channels: 3 } });
    } else {
      source = sharp(input);
    }

    const { data, info } = await source
      .resize(maxWidth, maxHeight, { fit: 'inside', withoutEnlargement: true, kernel: 'lanczos3' })
      .raw()
      .toBuffer({ resolveWithObject: true });
    thumbnail = { data, width: info.width, height: info.height, channels: info.channels };
  } catch (error) {
    throw new DecodeError(`Cannot read image: ${getErrorMessage(error)}`, filePath, toError(error));
  }

  const rotated = rotateEquirectangular(thumbnail, angle);
  const [originalPng, rotatedPng] = await Promise.all([
    codec.encode(thumbnail, 'png'),
    codec.encode(rotated, 'png'),
  ]);

  logger.debug({ filePath, angle, width: thumbnail.width, height: thumbnail.height }, 'Rendered preview');

  return {
    original: originalPng,
    rotated: rotatedPng,
    width: thumbnail.width,
    height: thumbnail.height,
    angle,
  };
}

/**
 * Read size and format of each input, keeping failures per file
 */
export async function describeImages(
  paths: readonly string[],
  codec: ImageCodecProvider = getSharpImageCodec()
): Promise<Array<ImageInfo | { path: string; error: string }>> {
  return Promise.all(
    paths.map(async (filePath) => {
      try {
        return await codec.describe(filePath);
      } catch (error) {
        return { path: filePath, error: getErrorMessage(error) };
      }
    })
  );
}
