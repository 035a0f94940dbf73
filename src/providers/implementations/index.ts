export { SharpImageCodecProvider, getSharpImageCodec } from './sharp-image-codec.provider.js';
