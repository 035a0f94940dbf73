/**
 * Batch Timer Utility
 * Tracks total run time and per-operation durations (decode, transform, encode)
 */

import type { Logger } from 'pino';

export interface OperationSummary {
  name: string;
  count: number;
  totalMs: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export interface TimerSummary {
  totalDurationMs: number;
  totalDurationFormatted: string;
  operationTotals: OperationSummary[];
}

/**
 * Format milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms.toFixed(0)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(1);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Batch Timer - aggregates operation timings across all workers of one run
 */
export class BatchTimer {
  private readonly start: number;
  private readonly operations: Map<string, number[]> = new Map();

  constructor(private readonly logger?: Logger) {
    this.start = Date.now();
  }

  /**
   * Record a completed operation duration
   */
  record(operationType: string, durationMs: number): void {
    const list = this.operations.get(operationType);
    if (list) {
      list.push(durationMs);
    } else {
      this.operations.set(operationType, [durationMs]);
    }
  }

  elapsedMs(): number {
    return Date.now() - this.start;
  }

  getSummary(): TimerSummary {
    const totalDurationMs = this.elapsedMs();

    const operationTotals: OperationSummary[] = [];
    for (const [name, durations] of this.operations) {
      const totalMs = durations.reduce((a, b) => a + b, 0);
      operationTotals.push({
        name,
        count: durations.length,
        totalMs,
        avgMs: Math.round(totalMs / durations.length),
        minMs: Math.min(...durations),
        maxMs: Math.max(...durations),
      });
    }

    // Sort operations by total time (descending)
    operationTotals.sort((a, b) => b.totalMs - a.totalMs);

    return {
      totalDurationMs,
      totalDurationFormatted: formatDuration(totalDurationMs),
      operationTotals,
    };
  }

  /**
   * Log the final summary
   */
  logSummary(context: Record<string, unknown> = {}): void {
    if (!this.logger) return;

    const summary = this.getSummary();
    const breakdown = summary.operationTotals
      .map((o) => `${o.name}: ${o.count}x @ avg ${formatDuration(o.avgMs)}`)
      .join(' | ');

    this.logger.info(
      { ...context, totalDurationMs: summary.totalDurationMs, operations: summary.operationTotals },
      `Batch finished in ${summary.totalDurationFormatted}${breakdown ? ` (${breakdown})` : ''}`
    );
  }
}
