import type { PixelBuffer } from '../../types/batch.types.js';
import type { ImageFormat } from '../../utils/image-formats.js';

/**
 * Decoded image: raw pixels plus the container format they came from
 */
export interface DecodedImage extends PixelBuffer {
  format: ImageFormat;
}

/**
 * Basic image information, read without decoding pixel data
 */
export interface ImageInfo {
  path: string;
  width: number;
  height: number;
  format: string;
}

/**
 * Format-specific save parameters
 */
export interface EncodeOptions {
  /** Quality for lossy formats (1-100) */
  quality?: number;
}

/**
 * ImageCodecProvider Interface
 *
 * Implementations: SharpImageCodecProvider
 *
 * Converts between image files and raw pixel buffers. A file decoded
 * as format F must always be re-encoded as format F.
 */
export interface ImageCodecProvider {
  /** Provider identifier for logging */
  readonly providerId: string;

  /**
   * Decode an image file into raw pixels
   * @throws DecodeError if the file is missing, unreadable, corrupt or unsupported
   */
  decode(filePath: string): Promise<DecodedImage>;

  /**
   * Encode raw pixels into the given container format
   * @throws EncodeError if the pixels cannot be encoded in that format
   */
  encode(image: PixelBuffer, format: ImageFormat, options?: EncodeOptions): Promise<Buffer>;

  /**
   * Read dimensions and format from the file header
   * @throws DecodeError if the file cannot be read
   */
  describe(filePath: string): Promise<ImageInfo>;
}
