import { describe, it, expect, vi } from 'vitest';
import type { Logger } from 'pino';
import { BatchTimer, formatDuration } from './timer.js';

describe('formatDuration', () => {
  it('should format milliseconds', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(999)).toBe('999ms');
  });

  it('should format seconds', () => {
    expect(formatDuration(1000)).toBe('1.00s');
    expect(formatDuration(12340)).toBe('12.34s');
  });

  it('should format minutes', () => {
    expect(formatDuration(60000)).toBe('1m 0.0s');
    expect(formatDuration(125500)).toBe('2m 5.5s');
  });
});

describe('BatchTimer', () => {
  it('should aggregate recorded operations sorted by total time', () => {
    const timer = new BatchTimer();
    timer.record('decode', 10);
    timer.record('decode', 30);
    timer.record('encode', 100);

    const { operationTotals } = timer.getSummary();

    expect(operationTotals).toEqual([
      { name: 'encode', count: 1, totalMs: 100, avgMs: 100, minMs: 100, maxMs: 100 },
      { name: 'decode', count: 2, totalMs: 40, avgMs: 20, minMs: 10, maxMs: 30 },
    ]);
  });

  it('should log a summary line through the given logger', () => {
    const info = vi.fn();
    const timer = new BatchTimer({ info } as unknown as Logger);
    timer.record('transform', 4);

    timer.logSummary({ batchId: 'b-1' });

    expect(info).toHaveBeenCalledTimes(1);
    const [context, message] = info.mock.calls[0];
    expect(context).toMatchObject({ batchId: 'b-1' });
    expect(message).toMatch(/^Batch finished in \d+ms \(transform: 1x @ avg 4ms\)$/);
  });
});
