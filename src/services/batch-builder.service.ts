/**
 * Batch Input Builder
 *
 * Collects the deduplicated list of image paths for a run and turns it into a BatchRun.
 */

import { randomUUID } from 'crypto';
import { readdir, stat } from 'fs/promises';
import path from 'path';
import type { BatchRun } from '../types/batch.types.js';
import { BatchValidationError } from '../utils/errors.js';
import { hasSupportedExtension } from '../utils/image-formats.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'batch-builder' });

export type SkipReason = 'duplicate' | 'not-found' | 'unsupported-extension';

export interface AddFilesResult {
  added: number;
  skipped: Array<{ path: string; reason: SkipReason }>;
}

export interface CreateBatchRunOptions {
  inputs: readonly string[];
  angle: number;
  outputDir: string;
}

async function statOrNull(filePath: string) {
  try {
    return await stat(filePath);
  } catch {
    return null;
  }
}

/**
 * Accumulates input paths in insertion order, skipping duplicates,
 * missing files and files outside the extension allow-list.
 */
export class BatchInputBuilder {
  private readonly inputs: string[] = [];
  private readonly known = new Set<string>();

  get paths(): readonly string[] {
    return this.inputs;
  }

  get size(): number {
    return this.inputs.length;
  }

  /**
   * Add files to the batch. Directories are expanded one level, in name order.
   */
  async add(paths: readonly string[]): Promise<AddFilesResult> {
    const result: AddFilesResult = { added: 0, skipped: [] };

    for (const candidate of paths) {
      const resolved = path.resolve(candidate);
      const stats = await statOrNull(resolved);

      if (stats?.isDirectory()) {
        const entries = (await readdir(resolved)).sort();
        const files = entries
          .filter((name) => hasSupportedExtension(name))
          .map((name) => path.join(resolved, name));
        const nested = await this.add(files);
        result.added += nested.added;
        result.skipped.push(...nested.skipped);
        continue;
      }

      if (!stats?.isFile()) {
        result.skipped.push({ path: candidate, reason: 'not-found' });
        continue;
      }
      if (!hasSupportedExtension(resolved)) {
        result.skipped.push({ path: candidate, reason: 'unsupported-extension' });
        continue;
      }
      if (this.known.has(resolved)) {
        result.skipped.push({ path: candidate, reason: 'duplicate' });
        continue;
      }

      this.known.add(resolved);
      this.inputs.push(resolved);
      result.added++;
    }

    logger.debug({ added: result.added, skipped: result.skipped.length, total: this.size }, 'Added files');
    return result;
  }

  clear(): void {
    this.inputs.length = 0;
    this.known.clear();
  }
}

/**
 * Create a BatchRun from a finalized input list
 *
 * @throws BatchValidationError on an empty or duplicated input list, a non-finite angle
 *   or a missing output directory
 */
export function createBatchRun(options: CreateBatchRunOptions): BatchRun {
  const { inputs, angle, outputDir } = options;

  if (inputs.length === 0) {
    throw new BatchValidationError('Batch has no input files');
  }

  const unique = new Set(inputs);
  if (unique.size !== inputs.length) {
    const duplicates = inputs.filter((p, i) => inputs.indexOf(p) !== i);
    throw new BatchValidationError('Batch contains duplicate input paths', { duplicates });
  }

  if (!Number.isFinite(angle)) {
    throw new BatchValidationError(`Rotation angle must be a finite number, got ${angle}`);
  }

  if (!outputDir) {
    throw new BatchValidationError('Output directory is required');
  }

  return {
    id: randomUUID(),
    inputs: [...inputs],
    angle,
    outputDir,
    total: inputs.length,
    completed: 0,
    failed: 0,
    results: [],
  };
}
