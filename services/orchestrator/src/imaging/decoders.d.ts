// bmp-js and utif ship no type declarations.

declare module "bmp-js" {
  namespace bmp {
    interface Bitmap {
      width: number;
      height: number;
      /** ABGR, 4 bytes per pixel. */
      data: Buffer;
    }
  }
  const bmp: {
    decode(buffer: Buffer): bmp.Bitmap;
  };
  export = bmp;
}

declare module "utif" {
  namespace UTIF {
    /** One image file directory; tags are keyed `t<number>`. */
    interface IFD {
      [tag: string]: unknown;
      width?: number;
      height?: number;
    }
  }
  const UTIF: {
    decode(buffer: ArrayBuffer | Uint8Array): UTIF.IFD[];
    decodeImage(buffer: ArrayBuffer | Uint8Array, ifd: UTIF.IFD): void;
    toRGBA8(ifd: UTIF.IFD): Uint8Array;
    encodeImage(rgba: Uint8Array, width: number, height: number): ArrayBuffer;
  };
  export = UTIF;
}
