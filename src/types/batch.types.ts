import type { ProcessingErrorKind } from '../utils/errors.js';
import type { ImageFormat } from '../utils/image-formats.js';

/**
 * Bytes per channel sample: 1 for 8-bit images, 2 for 16-bit (native byte order)
 */
export type BytesPerSample = 1 | 2;

/**
 * Raw interleaved pixel data, row-major
 */
export interface PixelBuffer {
  data: Buffer;
  width: number;
  height: number;
  /** Samples per pixel (1 = grey, 2 = grey+alpha, 3 = RGB, 4 = RGBA) */
  channels: number;
  /** Defaults to 1 */
  bytesPerSample?: BytesPerSample;
}

/**
 * One invocation of the batch pipeline.
 * Counters are only mutated by the dispatcher's aggregation step.
 */
export interface BatchRun {
  readonly id: string;
  readonly inputs: readonly string[];
  /** Yaw rotation in degrees, applied to every input */
  readonly angle: number;
  readonly outputDir: string;
  readonly total: number;
  completed: number;
  failed: number;
  /** Results in arrival order */
  results: WorkResult[];
  startedAt?: Date;
  finishedAt?: Date;
}

/**
 * Everything a worker needs to process one file
 */
export type WorkItem = Readonly<{
  path: string;
  angle: number;
  outputDir: string;
}>;

/**
 * Per-step durations of a successful item
 */
export interface StepTimings {
  decodeMs: number;
  transformMs: number;
  encodeMs: number;
}

export interface WorkSuccess {
  status: 'success';
  path: string;
  outputPath: string;
  format: ImageFormat;
  durationMs: number;
  timings: StepTimings;
}

export interface WorkFailure {
  status: 'failure';
  path: string;
  errorKind: ProcessingErrorKind;
  message: string;
  durationMs: number;
}

/**
 * Outcome of one work item, produced exactly once per item
 */
export type WorkResult = WorkSuccess | WorkFailure;

/**
 * A unit of work: WorkItem in, WorkResult out. Must never reject.
 */
export type WorkFn = (item: WorkItem) => Promise<WorkResult>;

export interface ProgressEvent {
  /** completed + failed after applying lastResult */
  completedSoFar: number;
  total: number;
  lastPath: string;
  lastResult: WorkResult;
}

export interface BatchSummary {
  batchId: string;
  total: number;
  completed: number;
  failed: number;
  failureDetails: WorkFailure[];
  outputDir: string;
  durationMs: number;
}

/**
 * Receives progress and completion notifications.
 * Called synchronously from the dispatcher's aggregation step.
 */
export interface ProgressSink {
  onProgress(event: ProgressEvent): void;
  onComplete?(summary: BatchSummary): void;
}
