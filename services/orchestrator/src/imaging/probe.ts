import UTIF from "utif";

export type ImageFormat = "JPEG" | "PNG" | "BMP" | "TIFF";

export type ImageMode = "L" | "LA" | "RGB" | "RGBA" | "P" | "CMYK" | "unknown";

/** Header-level description of an image; no pixel data is decoded. */
export interface ImageProbe {
  format: ImageFormat;
  width: number;
  height: number;
  mode: ImageMode;
  /** JPEG quantization tables in the order they appear in the file. */
  quantizationTables: number[][];
  /** Offset of the TIFF header inside the EXIF APP1 segment, if any. */
  exifOffset?: number;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

const JPEG_MODES: Record<number, ImageMode> = { 1: "L", 3: "RGB", 4: "CMYK" };

const PNG_MODES: Record<number, ImageMode> = { 0: "L", 2: "RGB", 3: "P", 4: "LA", 6: "RGBA" };

export function probeImage(bytes: Buffer): ImageProbe | null {
  if (isPng(bytes)) {
    return probePng(bytes);
  }
  if (isJpeg(bytes)) {
    return probeJpeg(bytes);
  }
  if (isBmp(bytes)) {
    return probeBmp(bytes);
  }
  if (isTiff(bytes)) {
    return probeTiff(bytes);
  }
  return null;
}

export function isJpeg(bytes: Buffer): boolean {
  return bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff;
}

export function isPng(bytes: Buffer): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((value, index) => bytes[index] === value);
}

export function isBmp(bytes: Buffer): boolean {
  return bytes.length >= 2 && bytes.toString("latin1", 0, 2) === "BM";
}

export function isTiff(bytes: Buffer): boolean {
  if (bytes.length < 4) return false;
  const order = bytes.toString("latin1", 0, 2);
  return (order === "II" && bytes.readUInt16LE(2) === 42) || (order === "MM" && bytes.readUInt16BE(2) === 42);
}

export function isGrayscale(mode: ImageMode): boolean {
  return mode === "L" || mode === "LA";
}

export function bytesPerPixel(byteLength: number, probe: Pick<ImageProbe, "width" | "height">): number {
  const pixels = probe.width * probe.height;
  return pixels > 0 ? byteLength / pixels : 0;
}

function probePng(bytes: Buffer): ImageProbe | null {
  // signature, then IHDR: length(4) "IHDR"(4) width(4) height(4) depth(1) colorType(1)
  if (bytes.length < 26 || bytes.toString("latin1", 12, 16) !== "IHDR") {
    return null;
  }
  const width = bytes.readUInt32BE(16);
  const height = bytes.readUInt32BE(20);
  if (width === 0 || height === 0) {
    return null;
  }
  return {
    format: "PNG",
    width,
    height,
    mode: PNG_MODES[bytes[25]] ?? "unknown",
    quantizationTables: [],
  };
}

function probeBmp(bytes: Buffer): ImageProbe | null {
  if (bytes.length < 26) {
    return null;
  }
  const headerSize = bytes.readUInt32LE(14);
  let width: number;
  let height: number;
  let bitCount: number;
  if (headerSize === 12) {
    // OS/2 core header
    width = bytes.readUInt16LE(18);
    height = bytes.readUInt16LE(20);
    bitCount = bytes.readUInt16LE(24);
  } else {
    if (headerSize < 40 || bytes.length < 30) {
      return null;
    }
    width = bytes.readInt32LE(18);
    // negative height marks a top-down bitmap
    height = Math.abs(bytes.readInt32LE(22));
    bitCount = bytes.readUInt16LE(28);
  }
  if (width <= 0 || height === 0) {
    return null;
  }
  return {
    format: "BMP",
    width,
    height,
    mode: bitCount <= 8 ? "P" : "RGB",
    quantizationTables: [],
  };
}

function firstNumber(value: unknown): number | undefined {
  if (Array.isArray(value) && typeof value[0] === "number") {
    return value[0];
  }
  return undefined;
}

function tiffMode(photometric: number | undefined, samples: number): ImageMode {
  switch (photometric) {
    case 0:
    case 1:
      return samples >= 2 ? "LA" : "L";
    case 2:
      return samples >= 4 ? "RGBA" : "RGB";
    case 3:
      return "P";
    case 5:
      return "CMYK";
    default:
      return "unknown";
  }
}

function probeTiff(bytes: Buffer): ImageProbe | null {
  let page: UTIF.IFD | undefined;
  try {
    // tag directories only; pixel strips are left undecoded
    [page] = UTIF.decode(bytes);
  } catch {
    return null;
  }
  if (!page) {
    return null;
  }
  const width = firstNumber(page.t256) ?? 0;
  const height = firstNumber(page.t257) ?? 0;
  if (width === 0 || height === 0) {
    return null;
  }
  return {
    format: "TIFF",
    width,
    height,
    mode: tiffMode(firstNumber(page.t262), firstNumber(page.t277) ?? 1),
    quantizationTables: [],
  };
}

function isStartOfFrame(marker: number): boolean {
  return (marker >= 0xc0 && marker <= 0xc3)
    || (marker >= 0xc5 && marker <= 0xc7)
    || (marker >= 0xc9 && marker <= 0xcb)
    || (marker >= 0xcd && marker <= 0xcf);
}

function isExifSegment(bytes: Buffer, start: number, end: number): boolean {
  return end - start >= 6 && bytes.toString("latin1", start, start + 4) === "Exif"
    && bytes[start + 4] === 0 && bytes[start + 5] === 0;
}

function readQuantizationTables(bytes: Buffer, start: number, end: number, tables: number[][]): void {
  let offset = start;
  while (offset < end) {
    const precision = bytes[offset] >> 4;
    const entrySize = precision === 0 ? 1 : 2;
    offset += 1;
    if (offset + 64 * entrySize > end) {
      return;
    }
    const table: number[] = [];
    for (let i = 0; i < 64; i += 1) {
      table.push(entrySize === 1 ? bytes[offset + i] : bytes.readUInt16BE(offset + i * 2));
    }
    tables.push(table);
    offset += 64 * entrySize;
  }
}

function probeJpeg(bytes: Buffer): ImageProbe | null {
  const quantizationTables: number[][] = [];
  let exifOffset: number | undefined;
  let frame: { width: number; height: number; components: number } | undefined;

  let offset = 2;
  while (offset + 4 <= bytes.length) {
    if (bytes[offset] !== 0xff) {
      break;
    }
    const marker = bytes[offset + 1];
    if (marker === 0xff) {
      // fill byte
      offset += 1;
      continue;
    }
    if (marker === 0xd8 || marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset += 2;
      continue;
    }
    if (marker === 0xd9 || marker === 0xda) {
      break;
    }

    const length = bytes.readUInt16BE(offset + 2);
    const dataStart = offset + 4;
    const dataEnd = Math.min(bytes.length, offset + 2 + length);
    if (length < 2) {
      break;
    }

    if (isStartOfFrame(marker) && dataEnd - dataStart >= 6) {
      frame = {
        height: bytes.readUInt16BE(dataStart + 1),
        width: bytes.readUInt16BE(dataStart + 3),
        components: bytes[dataStart + 5],
      };
    } else if (marker === 0xdb) {
      readQuantizationTables(bytes, dataStart, dataEnd, quantizationTables);
    } else if (marker === 0xe1 && exifOffset === undefined && isExifSegment(bytes, dataStart, dataEnd)) {
      exifOffset = dataStart + 6;
    }

    offset += 2 + length;
  }

  if (!frame || frame.width === 0 || frame.height === 0) {
    return null;
  }

  return {
    format: "JPEG",
    width: frame.width,
    height: frame.height,
    mode: JPEG_MODES[frame.components] ?? "unknown",
    quantizationTables,
    exifOffset,
  };
}
