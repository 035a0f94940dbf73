import path from 'path';
import type { BatchSummary, ProgressEvent, ProgressSink } from '../types/batch.types.js';
import { formatDuration } from '../utils/timer.js';
import { renderProgressBar, styles } from './utils.js';

/**
 * Progress sink that prints one line per finished file and a closing summary
 */
export class ConsoleProgressReporter implements ProgressSink {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  onProgress(event: ProgressEvent): void {
    const { completedSoFar, total, lastResult } = event;
    const counter = styles.dim(`[${completedSoFar}/${total}]`);
    const name = path.basename(event.lastPath);

    const status =
      lastResult.status === 'success'
        ? styles.success(name)
        : styles.error(`${name} (${lastResult.errorKind}: ${lastResult.message})`);

    this.write(`${counter} ${renderProgressBar(completedSoFar, total)} ${status}`);
  }

  onComplete(summary: BatchSummary): void {
    this.write('');
    if (summary.completed === 0) {
      this.write(styles.warn(`No images were processed (${summary.failed} failed)`));
    } else {
      this.write(styles.success(`Processed ${summary.completed} of ${summary.total} images`));
    }
    if (summary.failed > 0) {
      this.write(styles.error(`${summary.failed} failed:`));
      for (const failure of summary.failureDetails) {
        this.write(styles.dim(`  ${failure.path}: ${failure.errorKind}: ${failure.message}`));
      }
    }
    this.write(styles.label('Output directory', summary.outputDir));
    this.write(styles.label('Duration', formatDuration(summary.durationMs)));
  }
}
