/**
 * Image Format Utilities
 *
 * Extension allow-list for batch inputs and the container formats the codec can re-encode.
 */

/**
 * Container formats that can be decoded and written back unchanged
 */
export const ENCODABLE_FORMATS = ['jpeg', 'png', 'webp', 'tiff', 'gif', 'bmp'] as const;

export type ImageFormat = (typeof ENCODABLE_FORMATS)[number];

/**
 * Extensions accepted when building a batch (lowercase, with dot)
 */
export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg',
  '.jpeg',
  '.png',
  '.bmp',
  '.tiff',
  '.tif',
  '.webp',
]);

/**
 * Get file extension from path (lowercase, with dot)
 */
export function getExtension(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

/**
 * Check whether a path carries an allowed image extension
 */
export function hasSupportedExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(getExtension(filePath));
}

/**
 * Narrow a decoder-reported format name to one we can re-encode
 */
export function isEncodableFormat(format: string | undefined): format is ImageFormat {
  return ENCODABLE_FORMATS.some((f) => f === format);
}
