/**
 * Batch Progress Aggregation
 *
 * The only code that mutates a BatchRun's counters. Each result is applied and
 * its ProgressEvent emitted inside one synchronous call, so no sink ever sees
 * a half-updated run.
 */

import type { Logger } from 'pino';
import type {
  BatchRun,
  BatchSummary,
  ProgressEvent,
  ProgressSink,
  WorkFailure,
  WorkResult,
} from '../types/batch.types.js';
import { getErrorMessage } from '../utils/errors.js';
import type { BatchTimer } from '../utils/timer.js';

export class BatchProgressAggregator {
  private completeCalled = false;

  constructor(
    private readonly batch: BatchRun,
    private readonly sink: ProgressSink,
    private readonly logger: Logger,
    private readonly timer?: BatchTimer
  ) {}

  get settledCount(): number {
    return this.batch.completed + this.batch.failed;
  }

  /**
   * Apply one result to the run and notify the sink
   */
  apply(result: WorkResult): ProgressEvent {
    if (this.settledCount >= this.batch.total) {
      throw new Error(`Received more results than inputs (${this.batch.total})`);
    }

    if (result.status === 'success') {
      this.batch.completed++;
      this.timer?.record('decode', result.timings.decodeMs);
      this.timer?.record('transform', result.timings.transformMs);
      this.timer?.record('encode', result.timings.encodeMs);
    } else {
      this.batch.failed++;
    }
    this.batch.results.push(result);

    const event: ProgressEvent = {
      completedSoFar: this.settledCount,
      total: this.batch.total,
      lastPath: result.path,
      lastResult: result,
    };

    this.notify('onProgress', () => this.sink.onProgress(event));
    return event;
  }

  /**
   * Build the final summary and hand it to the sink. Valid once, after every input settled.
   */
  complete(durationMs: number): BatchSummary {
    if (this.completeCalled) {
      throw new Error('Batch already completed');
    }
    if (this.settledCount !== this.batch.total) {
      throw new Error(`Batch incomplete: ${this.settledCount}/${this.batch.total} results`);
    }
    this.completeCalled = true;

    const failureDetails = this.batch.results.filter(
      (r): r is WorkFailure => r.status === 'failure'
    );

    const summary: BatchSummary = {
      batchId: this.batch.id,
      total: this.batch.total,
      completed: this.batch.completed,
      failed: this.batch.failed,
      failureDetails,
      outputDir: this.batch.outputDir,
      durationMs,
    };

    const { onComplete } = this.sink;
    if (onComplete) {
      this.notify('onComplete', () => onComplete.call(this.sink, summary));
    }
    return summary;
  }

  /**
   * Sink failures are logged; they never change counters or stop the run
   */
  private notify(hook: keyof ProgressSink, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.error({ hook, error: getErrorMessage(error) }, 'Progress sink threw');
    }
  }
}
