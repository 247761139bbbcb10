/**
 * Minimal EXIF reader for the APP1 segment located by `probeImage`.
 *
 * Walks IFD0 and the Exif sub-IFD and keeps the handful of ASCII tags the
 * metadata check looks at. Every other tag is only counted.
 */

export interface ExifTags {
  tagCount: number;
  make?: string;
  model?: string;
  software?: string;
  /** Last-modified timestamp (tag 0x0132). */
  dateTime?: string;
  /** Original capture timestamp (tag 0x9003). */
  dateTimeOriginal?: string;
}

const TAG_MAKE = 0x010f;
const TAG_MODEL = 0x0110;
const TAG_SOFTWARE = 0x0131;
const TAG_DATE_TIME = 0x0132;
const TAG_EXIF_IFD = 0x8769;
const TAG_DATE_TIME_ORIGINAL = 0x9003;

const TYPE_ASCII = 2;
const TYPE_LONG = 4;

const TYPE_SIZES: Record<number, number> = { 1: 1, 2: 1, 3: 2, 4: 4, 5: 8, 7: 1, 9: 4, 10: 8 };

interface IfdEntry {
  tag: number;
  type: number;
  count: number;
  valueOffset: number;
}

class TiffReader {
  constructor(
    private readonly bytes: Buffer,
    readonly tiffStart: number,
    private readonly littleEndian: boolean,
  ) {}

  uint16(offset: number): number {
    if (offset < 0 || offset + 2 > this.bytes.length) return 0;
    return this.littleEndian ? this.bytes.readUInt16LE(offset) : this.bytes.readUInt16BE(offset);
  }

  uint32(offset: number): number {
    if (offset < 0 || offset + 4 > this.bytes.length) return 0;
    return this.littleEndian ? this.bytes.readUInt32LE(offset) : this.bytes.readUInt32BE(offset);
  }

  ascii(offset: number, count: number): string {
    const end = Math.min(this.bytes.length, offset + count);
    let value = "";
    for (let i = offset; i < end; i += 1) {
      if (this.bytes[i] === 0) break;
      value += String.fromCharCode(this.bytes[i]);
    }
    return value.trim();
  }

  entries(ifdStart: number): IfdEntry[] {
    if (ifdStart + 2 > this.bytes.length) return [];
    const count = this.uint16(ifdStart);
    const entries: IfdEntry[] = [];
    for (let i = 0; i < count; i += 1) {
      const base = ifdStart + 2 + i * 12;
      if (base + 12 > this.bytes.length) break;
      const type = this.uint16(base + 2);
      const valueCount = this.uint32(base + 4);
      const size = (TYPE_SIZES[type] ?? 1) * valueCount;
      entries.push({
        tag: this.uint16(base),
        type,
        count: valueCount,
        valueOffset: size <= 4 ? base + 8 : this.tiffStart + this.uint32(base + 8),
      });
    }
    return entries;
  }
}

export function readExif(bytes: Buffer, tiffStart: number): ExifTags | null {
  if (tiffStart + 8 > bytes.length) return null;
  const order = bytes.toString("latin1", tiffStart, tiffStart + 2);
  if (order !== "II" && order !== "MM") return null;

  const reader = new TiffReader(bytes, tiffStart, order === "II");
  if (reader.uint16(tiffStart + 2) !== 0x2a) return null;

  const tags: ExifTags = { tagCount: 0 };
  const seen = new Set<number>();
  const ifd0 = reader.entries(tiffStart + reader.uint32(tiffStart + 4));
  const exifPointer = ifd0.find((entry) => entry.tag === TAG_EXIF_IFD && entry.type === TYPE_LONG);
  const exifIfd = exifPointer ? reader.entries(tiffStart + reader.uint32(exifPointer.valueOffset)) : [];

  for (const entry of [...ifd0, ...exifIfd]) {
    seen.add(entry.tag);
    if (entry.type !== TYPE_ASCII) continue;
    const value = reader.ascii(entry.valueOffset, entry.count);
    switch (entry.tag) {
      case TAG_MAKE:
        tags.make = value;
        break;
      case TAG_MODEL:
        tags.model = value;
        break;
      case TAG_SOFTWARE:
        tags.software = value;
        break;
      case TAG_DATE_TIME:
        tags.dateTime = value;
        break;
      case TAG_DATE_TIME_ORIGINAL:
        tags.dateTimeOriginal = value;
        break;
    }
  }

  tags.tagCount = seen.size;
  return tags.tagCount > 0 ? tags : null;
}
