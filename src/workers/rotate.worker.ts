import { writeFile } from 'fs/promises';
import path from 'path';
import type { ImageCodecProvider } from '../providers/interfaces/image-codec.provider.js';
import { getSharpImageCodec } from '../providers/implementations/index.js';
import { rotateEquirectangular } from '../services/rotation.service.js';
import type { PixelBuffer, WorkItem, WorkResult } from '../types/batch.types.js';
import {
  DecodeError,
  EncodeError,
  ImageProcessingError,
  TransformError,
  getErrorMessage,
  toError,
} from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'rotate-worker' });

export interface RotateWorkerDeps {
  codec?: ImageCodecProvider;
  writeFile?: (filePath: string, data: Buffer) => Promise<void>;
}

/**
 * Output location for an input: same base filename, inside the output directory
 */
export function getOutputPath(inputPath: string, outputDir: string): string {
  return path.join(outputDir, path.basename(inputPath));
}

/**
 * Run one step, tagging anything it throws with the step's error kind
 */
async function runStep<T>(
  step: (message: string, filePath: string, cause: Error) => ImageProcessingError,
  filePath: string,
  fn: () => Promise<T> | T
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ImageProcessingError) {
      throw error;
    }
    throw step(getErrorMessage(error), filePath, toError(error));
  }
}

const asDecodeError = (m: string, p: string, e: Error) => new DecodeError(m, p, e);
const asTransformError = (m: string, p: string, e: Error) => new TransformError(m, p, e);
const asEncodeError = (m: string, p: string, e: Error) => new EncodeError(m, p, e);

/**
 * Process a single work item: decode, rotate, re-encode in the same format, write.
 *
 * Never rejects. Every failure is returned as a `failure` result so one bad
 * file cannot disturb the other workers or the dispatcher.
 */
export async function processWorkItem(item: WorkItem, deps: RotateWorkerDeps = {}): Promise<WorkResult> {
  const startedAt = Date.now();

  try {
    const codec = deps.codec ?? getSharpImageCodec();
    const write = deps.writeFile ?? writeFile;
    const outputPath = getOutputPath(item.path, item.outputDir);

    const decodeStart = Date.now();
    const decoded = await runStep(asDecodeError, item.path, () => codec.decode(item.path));
    const decodeMs = Date.now() - decodeStart;

    const transformStart = Date.now();
    const rotated: PixelBuffer = await runStep(asTransformError, item.path, () =>
      rotateEquirectangular(decoded, item.angle)
    );
    const transformMs = Date.now() - transformStart;

    const encodeStart = Date.now();
    await runStep(asEncodeError, item.path, async () => {
      const encoded = await codec.encode(rotated, decoded.format);
      await write(outputPath, encoded);
    });
    const encodeMs = Date.now() - encodeStart;

    logger.debug({ path: item.path, outputPath, format: decoded.format }, 'Rotated image');

    return {
      status: 'success',
      path: item.path,
      outputPath,
      format: decoded.format,
      durationMs: Date.now() - startedAt,
      timings: { decodeMs, transformMs, encodeMs },
    };
  } catch (error) {
    // Untagged errors come from codec setup, before anything was decoded
    const errorKind = error instanceof ImageProcessingError ? error.errorKind : 'DecodeError';
    const message = getErrorMessage(error);

    logger.warn({ path: item.path, errorKind, error: message }, 'Failed to rotate image');

    return {
      status: 'failure',
      path: item.path,
      errorKind,
      message,
      durationMs: Date.now() - startedAt,
    };
  }
}
