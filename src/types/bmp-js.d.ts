// bmp-js ships no type declarations. Pixel data is 4 bytes per pixel in A, B, G, R order.
declare module 'bmp-js' {
  interface BmpImageData {
    data: Buffer;
    width: number;
    height: number;
  }

  interface DecodedBmp extends BmpImageData {
    bitPP: number;
  }

  function decode(buffer: Buffer): DecodedBmp;
  function encode(image: BmpImageData, quality?: number): BmpImageData;

  const bmp: {
    decode: typeof decode;
    encode: typeof encode;
  };

  export default bmp;
}
