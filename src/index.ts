export { rotateEquirectangular, computeShift } from './services/rotation.service.js';
export { Dispatcher, MAX_CONCURRENCY, resolveConcurrency, toWorkItems } from './services/dispatcher.service.js';
export type { DispatcherOptions } from './services/dispatcher.service.js';
export { BatchProgressAggregator } from './services/batch-progress.js';
export { BatchInputBuilder, createBatchRun } from './services/batch-builder.service.js';
export type { AddFilesResult, CreateBatchRunOptions, SkipReason } from './services/batch-builder.service.js';
export { previewRotation, describeImages } from './services/preview.service.js';
export type { PreviewOptions, RotationPreview } from './services/preview.service.js';
export { processWorkItem, getOutputPath } from './workers/rotate.worker.js';
export type { RotateWorkerDeps } from './workers/rotate.worker.js';
export { SharpImageCodecProvider, getSharpImageCodec } from './providers/implementations/index.js';
export type {
  DecodedImage,
  EncodeOptions,
  ImageCodecProvider,
  ImageInfo,
} from './providers/interfaces/index.js';
export {
  AppError,
  BatchValidationError,
  ImageProcessingError,
  DecodeError,
  TransformError,
  EncodeError,
} from './utils/errors.js';
export type { ProcessingErrorKind } from './utils/errors.js';
export { ENCODABLE_FORMATS, SUPPORTED_EXTENSIONS } from './utils/image-formats.js';
export type { ImageFormat } from './utils/image-formats.js';
export type * from './types/batch.types.js';
