import { readFile } from 'fs/promises';
import sharp from 'sharp';
import type {
  DecodedImage,
  EncodeOptions,
  ImageCodecProvider,
  ImageInfo,
} from '../interfaces/image-codec.provider.js';
import type { BytesPerSample, PixelBuffer } from '../../types/batch.types.js';
import { getConfig } from '../../config/index.js';
import { DecodeError, EncodeError, getErrorMessage, toError } from '../../utils/errors.js';
import { isEncodableFormat, type ImageFormat } from '../../utils/image-formats.js';
import { createChildLogger } from '../../utils/logger.js';
import { decodeBmp, encodeBmp, isBmp, readBmpSize } from './bmp-format.js';

const logger = createChildLogger({ service: 'sharp-codec' });

type SharpChannels = 1 | 2 | 3 | 4;

function toSharpChannels(channels: number): SharpChannels {
  switch (channels) {
    case 1:
    case 2:
    case 3:
    case 4:
      return channels;
    default:
      throw new EncodeError(`Cannot encode ${channels}-channel pixel data`);
  }
}

/**
 * 16-bit colourspace for the channel count, so libvips keeps two bytes per sample
 */
function deepColourspace(channels: number): 'grey16' | 'rgb16' {
  return channels < 3 ? 'grey16' : 'rgb16';
}

/**
 * Raw input for sharp. 16-bit data is handed over as a Uint16Array, which is how
 * sharp learns the sample depth of raw pixels.
 */
function toRawInput(image: PixelBuffer): Buffer | Uint16Array {
  const { data } = image;
  if ((image.bytesPerSample ?? 1) === 1) {
    return data;
  }
  if (data.byteOffset % 2 === 0) {
    return new Uint16Array(data.buffer, data.byteOffset, data.length / 2);
  }
  const aligned = new Uint8Array(data.length);
  aligned.set(data);
  return new Uint16Array(aligned.buffer);
}

async function readInput(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    throw new DecodeError(`Cannot read image: ${getErrorMessage(error)}`, filePath, toError(error));
  }
}

let sharpConfigured = false;

/**
 * Apply libvips tuning from config once per process
 */
function configureSharp(): void {
  if (sharpConfigured) return;
  sharpConfigured = true;

  const { concurrency, cache } = getConfig().sharp;
  sharp.concurrency(concurrency);
  sharp.cache(cache);
  logger.debug({ concurrency: sharp.concurrency(), cache }, 'Configured libvips');
}

/**
 * Sharp Image Codec Provider
 *
 * Uses Sharp (libvips) to decode to and encode from raw pixel buffers, keeping
 * 16-bit PNG and TIFF samples at 16 bits. BMP goes through bmp-js.
 * libvips runs on its own thread pool, so concurrent decodes and encodes
 * of different files proceed in parallel.
 */
export class SharpImageCodecProvider implements ImageCodecProvider {
  readonly providerId = 'sharp';

  constructor() {
    configureSharp();
  }

  async decode(filePath: string): Promise<DecodedImage> {
    const input = await readInput(filePath);

    if (isBmp(input)) {
      try {
        return { ...decodeBmp(input), format: 'bmp' };
      } catch (error) {
        throw new DecodeError(`Cannot decode image: ${getErrorMessage(error)}`, filePath, toError(error));
      }
    }

    let metadata: sharp.Metadata;
    const image = sharp(input);

    try {
      metadata = await image.metadata();
    } catch (error) {
      throw new DecodeError(`Cannot read image: ${getErrorMessage(error)}`, filePath, toError(error));
    }

    const { format } = metadata;
    if (!isEncodableFormat(format)) {
      throw new DecodeError(`Unsupported image format: ${format ?? 'unknown'}`, filePath);
    }

    const bytesPerSample: BytesPerSample = metadata.depth === 'ushort' ? 2 : 1;

    try {
      const pipeline =
        bytesPerSample === 2
          ? image.toColourspace(deepColourspace(metadata.channels ?? 3)).raw({ depth: 'ushort' })
          : image.raw();
      const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });
      return {
        data,
        width: info.width,
        height: info.height,
        channels: info.channels,
        bytesPerSample,
        format,
      };
    } catch (error) {
      throw new DecodeError(`Cannot decode image: ${getErrorMessage(error)}`, filePath, toError(error));
    }
  }

  async encode(image: PixelBuffer, format: ImageFormat, options: EncodeOptions = {}): Promise<Buffer> {
    const { width, height } = image;
    const channels = toSharpChannels(image.channels);
    const { jpegQuality, webpQuality } = getConfig().encoding;

    try {
      if (format === 'bmp') {
        return encodeBmp(image);
      }

      const deep = (image.bytesPerSample ?? 1) === 2;
      const raw = sharp(toRawInput(image), { raw: { width, height, channels } });
      // Only PNG and TIFF store 16-bit samples; other formats get sharp's 8-bit conversion
      const pipeline = deep && (format === 'png' || format === 'tiff') ? raw.toColourspace(deepColourspace(channels)) : raw;

      switch (format) {
        case 'jpeg':
          return await pipeline
            .jpeg({ quality: options.quality ?? jpegQuality, optimizeCoding: true })
            .toBuffer();
        case 'png':
          return await pipeline.png({ compressionLevel: 9, adaptiveFiltering: true }).toBuffer();
        case 'webp':
          return await pipeline.webp({ quality: options.quality ?? webpQuality, effort: 6 }).toBuffer();
        case 'tiff':
          return await pipeline.tiff({ compression: 'lzw' }).toBuffer();
        case 'gif':
          return await pipeline.gif().toBuffer();
      }
    } catch (error) {
      throw new EncodeError(`Cannot encode ${format}: ${getErrorMessage(error)}`, undefined, toError(error));
    }
  }

  async describe(filePath: string): Promise<ImageInfo> {
    const input = await readInput(filePath);

    if (isBmp(input)) {
      return { path: filePath, ...readBmpSize(input), format: 'bmp' };
    }

    try {
      const { width, height, format } = await sharp(input).metadata();
      return {
        path: filePath,
        width: width ?? 0,
        height: height ?? 0,
        format: format ?? 'unknown',
      };
    } catch (error) {
      throw new DecodeError(`Cannot read image: ${getErrorMessage(error)}`, filePath, toError(error));
    }
  }
}

let defaultCodec: SharpImageCodecProvider | null = null;

/**
 * Shared codec instance (created lazily so config is read on first use)
 */
export function getSharpImageCodec(): SharpImageCodecProvider {
  if (!defaultCodec) {
    defaultCodec = new SharpImageCodecProvider();
  }
  return defaultCodec;
}
