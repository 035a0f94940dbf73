import { describe, it, expect, vi } from 'vitest';
import type { Logger } from 'pino';
import { BatchProgressAggregator } from './batch-progress.js';
import { createBatchRun } from './batch-builder.service.js';
import type { ProgressEvent, ProgressSink, WorkResult } from '../types/batch.types.js';
import { BatchTimer } from '../utils/timer.js';

function createLogger() {
  const error = vi.fn();
  return { logger: { error } as unknown as Logger, error };
}

const success = (p: string): WorkResult => ({
  status: 'success',
  path: p,
  outputPath: `/out/${p}`,
  format: 'png',
  durationMs: 5,
  timings: { decodeMs: 1, transformMs: 2, encodeMs: 2 },
});

const failure = (p: string): WorkResult => ({
  status: 'failure',
  path: p,
  errorKind: 'DecodeError',
  message: 'Cannot read image: bad header',
  durationMs: 1,
});

describe('BatchProgressAggregator', () => {
  it('should update counters and emit one event per result', () => {
    const batch = createBatchRun({ inputs: ['a', 'b', 'c'], angle: 90, outputDir: '/out' });
    const events: ProgressEvent[] = [];
    const { logger } = createLogger();
    const aggregator = new BatchProgressAggregator(batch, { onProgress: (e) => events.push(e) }, logger);

    aggregator.apply(success('b'));
    aggregator.apply(failure('a'));
    aggregator.apply(success('c'));

    expect(batch.completed).toBe(2);
    expect(batch.failed).toBe(1);
    expect(events.map((e) => [e.completedSoFar, e.total, e.lastPath])).toEqual([
      [1, 3, 'b'],
      [2, 3, 'a'],
      [3, 3, 'c'],
    ]);
    expect(events[1].lastResult.status).toBe('failure');
  });

  it('should let the sink observe consistent counters during the callback', () => {
    const batch = createBatchRun({ inputs: ['a', 'b'], angle: 10, outputDir: '/out' });
    const observed: number[] = [];
    const { logger } = createLogger();
    const aggregator = new BatchProgressAggregator(
      batch,
      { onProgress: (e) => observed.push(batch.completed + batch.failed - e.completedSoFar) },
      logger
    );

    aggregator.apply(failure('a'));
    aggregator.apply(success('b'));

    expect(observed).toEqual([0, 0]);
  });

  it('should refuse more results than inputs', () => {
    const batch = createBatchRun({ inputs: ['a'], angle: 0, outputDir: '/out' });
    const { logger } = createLogger();
    const aggregator = new BatchProgressAggregator(batch, { onProgress: vi.fn() }, logger);

    aggregator.apply(success('a'));

    expect(() => aggregator.apply(success('a'))).toThrow('Received more results than inputs (1)');
    expect(batch.completed).toBe(1);
  });

  it('should keep counting when the sink throws', () => {
    const batch = createBatchRun({ inputs: ['a', 'b'], angle: 45, outputDir: '/out' });
    const { logger, error } = createLogger();
    const sink: ProgressSink = {
      onProgress: () => {
        throw new Error('render failed');
      },
    };
    const aggregator = new BatchProgressAggregator(batch, sink, logger);

    aggregator.apply(success('a'));
    aggregator.apply(success('b'));

    expect(batch.completed).toBe(2);
    expect(error).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledWith({ hook: 'onProgress', error: 'render failed' }, 'Progress sink threw');
  });

  it('should build the summary with failure details and notify onComplete once', () => {
    const batch = createBatchRun({ inputs: ['a', 'b'], angle: 45, outputDir: '/out' });
    const onComplete = vi.fn();
    const { logger } = createLogger();
    const aggregator = new BatchProgressAggregator(batch, { onProgress: vi.fn(), onComplete }, logger);

    aggregator.apply(failure('a'));
    aggregator.apply(success('b'));
    const summary = aggregator.complete(120);

    expect(summary).toEqual({
      batchId: batch.id,
      total: 2,
      completed: 1,
      failed: 1,
      failureDetails: [failure('a')],
      outputDir: '/out',
      durationMs: 120,
    });
    expect(onComplete).toHaveBeenCalledWith(summary);
    expect(() => aggregator.complete(130)).toThrow('Batch already completed');
    expect(onComplete).toHaveBeenCalledTimes(1);
  });

  it('should refuse to complete before every input settled', () => {
    const batch = createBatchRun({ inputs: ['a', 'b'], angle: 45, outputDir: '/out' });
    const { logger } = createLogger();
    const aggregator = new BatchProgressAggregator(batch, { onProgress: vi.fn() }, logger);

    aggregator.apply(success('a'));

    expect(() => aggregator.complete(1)).toThrow('Batch incomplete: 1/2 results');
  });

  it('should record step timings of successful items', () => {
    const batch = createBatchRun({ inputs: ['a', 'b'], angle: 45, outputDir: '/out' });
    const timer = new BatchTimer();
    const { logger } = createLogger();
    const aggregator = new BatchProgressAggregator(batch, { onProgress: vi.fn() }, logger, timer);

    aggregator.apply(success('a'));
    aggregator.apply(failure('b'));

    const names = timer.getSummary().operationTotals.map((o) => [o.name, o.count]);
    expect(names).toEqual(
      expect.arrayContaining([
        ['decode', 1],
        ['transform', 1],
        ['encode', 1],
      ])
    );
    expect(names).toHaveLength(3);
  });
});
