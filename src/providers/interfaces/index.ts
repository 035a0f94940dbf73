export type {
  DecodedImage,
  EncodeOptions,
  ImageCodecProvider,
  ImageInfo,
} from './image-codec.provider.js';
