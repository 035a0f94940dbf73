/**
 * Batch Dispatcher
 *
 * Fans a BatchRun out to a bounded pool of workers and streams results into
 * the progress aggregator as they complete.
 */

import { constants } from 'fs';
import { access, stat } from 'fs/promises';
import { getConfig } from '../config/index.js';
import { processWorkItem } from '../workers/rotate.worker.js';
import type {
  BatchRun,
  BatchSummary,
  ProgressSink,
  WorkFn,
  WorkItem,
  WorkResult,
} from '../types/batch.types.js';
import { BatchValidationError, ImageProcessingError, getErrorMessage } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { isParallelError, parallelMap } from '../utils/parallel.js';
import { BatchTimer } from '../utils/timer.js';
import { BatchProgressAggregator } from './batch-progress.js';

const logger = createChildLogger({ service: 'dispatcher' });

/** Maximum allowed concurrency to prevent resource exhaustion */
export const MAX_CONCURRENCY = 64;

export interface DispatcherOptions {
  /**
   * Number of concurrent workers (default: config, which defaults to detected parallelism).
   * With the default worker this is capped at UV_THREADPOOL_SIZE.
   */
  concurrency?: number;
  /** Work function (default: decode, rotate, encode with sharp) */
  worker?: WorkFn;
}

/**
 * Resolve the worker count, capped at MAX_CONCURRENCY
 */
export function resolveConcurrency(override?: number): number {
  if (override !== undefined) {
    if (!Number.isInteger(override) || override < 1) {
      throw new BatchValidationError(`Concurrency must be a positive integer, got ${override}`);
    }
    return Math.min(override, MAX_CONCURRENCY);
  }
  return Math.min(getConfig().dispatcher.concurrency, MAX_CONCURRENCY);
}

/**
 * Derive the immutable work items of a run, in input order
 */
export function toWorkItems(batch: BatchRun): WorkItem[] {
  return batch.inputs.map((inputPath) =>
    Object.freeze({ path: inputPath, angle: batch.angle, outputDir: batch.outputDir })
  );
}

async function assertWritableDirectory(dir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(dir)).isDirectory();
  } catch (error) {
    throw new BatchValidationError(`Output directory does not exist: ${dir}`, {
      error: getErrorMessage(error),
    });
  }

  if (!isDirectory) {
    throw new BatchValidationError(`Output path is not a directory: ${dir}`);
  }

  try {
    await access(dir, constants.W_OK);
  } catch (error) {
    throw new BatchValidationError(`Output directory is not writable: ${dir}`, {
      error: getErrorMessage(error),
    });
  }
}

export class Dispatcher {
  private readonly concurrency: number;
  private readonly worker: WorkFn;

  constructor(options: DispatcherOptions = {}) {
    const requested = resolveConcurrency(options.concurrency);

    if (options.worker) {
      this.concurrency = requested;
      this.worker = options.worker;
      return;
    }

    // Every read, decode and encode of the sharp worker waits for a libuv thread,
    // so workers beyond the pool size would only queue
    const { threadPoolSize } = getConfig().dispatcher;
    this.concurrency = Math.min(requested, threadPoolSize);
    if (this.concurrency < requested) {
      logger.warn(
        { requested, threadPoolSize },
        'Worker count capped at the libuv thread pool size; start the process with a larger UV_THREADPOOL_SIZE for more'
      );
    }
    this.worker = (item) => processWorkItem(item);
  }

  get workerCount(): number {
    return this.concurrency;
  }

  /**
   * Reject a batch that cannot run. Nothing has been started when this throws.
   */
  async validate(batch: BatchRun): Promise<void> {
    if (batch.startedAt) {
      throw new BatchValidationError(`Batch ${batch.id} has already been started`);
    }
    if (batch.inputs.length === 0 || batch.total === 0) {
      throw new BatchValidationError('Batch has no input files');
    }
    if (batch.total !== batch.inputs.length) {
      throw new BatchValidationError(
        `Batch total ${batch.total} does not match ${batch.inputs.length} inputs`
      );
    }
    if (!Number.isFinite(batch.angle)) {
      throw new BatchValidationError(`Rotation angle must be a finite number, got ${batch.angle}`);
    }
    await assertWritableDirectory(batch.outputDir);
  }

  /**
   * Process every input exactly once and resolve with the summary.
   *
   * Per-file failures are reported in the summary; only precondition
   * violations reject, before any worker starts.
   */
  async run(batch: BatchRun, sink: ProgressSink): Promise<BatchSummary> {
    await this.validate(batch);

    // Claimed synchronously after validation so a concurrent second run is refused
    if (batch.startedAt) {
      throw new BatchValidationError(`Batch ${batch.id} has already been started`);
    }
    batch.startedAt = new Date();

    const runLogger = logger.child({ batchId: batch.id });
    const timer = new BatchTimer(runLogger);
    const aggregator = new BatchProgressAggregator(batch, sink, runLogger, timer);
    const items = toWorkItems(batch);
    const workerCount = Math.min(this.concurrency, items.length);

    runLogger.info(
      { total: batch.total, angle: batch.angle, outputDir: batch.outputDir, workers: workerCount },
      'Starting batch'
    );

    await parallelMap(items, (item) => this.invoke(item), {
      concurrency: workerCount,
      onSettled: (result) => {
        aggregator.apply(this.toResult(result));
      },
    });

    batch.finishedAt = new Date();
    const durationMs = batch.finishedAt.getTime() - batch.startedAt.getTime();

    timer.logSummary({ completed: batch.completed, failed: batch.failed });
    if (batch.completed === 0) {
      runLogger.warn({ failed: batch.failed }, 'No images were processed successfully');
    }

    return aggregator.complete(durationMs);
  }

  /**
   * Call the worker, turning a rejection into a failure result.
   * The default worker never rejects; injected ones might.
   */
  private async invoke(item: WorkItem): Promise<WorkResult> {
    const startedAt = Date.now();
    try {
      return await this.worker(item);
    } catch (error) {
      return {
        status: 'failure',
        path: item.path,
        errorKind: error instanceof ImageProcessingError ? error.errorKind : 'TransformError',
        message: getErrorMessage(error),
        durationMs: Date.now() - startedAt,
      };
    }
  }

  private toResult(result: WorkResult | Error): WorkResult {
    if (isParallelError(result)) {
      // invoke() never rejects, so parallelMap never captures an Error here
      throw result;
    }
    return result;
  }
}
