// bmp-js ships no type declarations and has no @types package.
declare module "bmp-js" {
  namespace bmp {
    interface BmpBitmap {
      width: number;
      height: number;
      /** Four bytes per pixel in A, B, G, R order */
      data: Buffer;
    }

    interface DecodedBmp extends BmpBitmap {
      is_with_alpha: boolean;
      bitPP: number;
    }

    function decode(buffer: Buffer): DecodedBmp;
    function encode(bitmap: BmpBitmap, quality?: number): BmpBitmap;
  }

  export = bmp;
}
