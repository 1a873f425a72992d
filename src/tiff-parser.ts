import { emptyContainer } from "./assembler";
import {
  ExifTags,
  ImageTags,
  isTagType,
  STRUCTURAL_TAGS,
  TAG_TYPE_SIZES,
  TagType,
} from "./tags";
import type {
  MetadataContainer,
  Rational,
  TagEntry,
  TagGroup,
  TiffHeader,
} from "./types";

interface ParsedIfd {
  tags: TagGroup;
  pointers: Map<number, number>;
  nextIfdOffset: number;
}

/**
 * Parses the TIFF header at the start of an EXIF block.
 *
 * Reads the byte order marker, magic number, and offset to IFD0.
 * EXIF blocks are always classic TIFF, so BigTIFF is rejected.
 *
 * @param view - DataView wrapping the EXIF block (without the "Exif\0\0" prefix)
 * @returns Parsed header containing endianness and first IFD offset
 * @throws Error if byte order marker or magic number is invalid
 *
 * @example
 * ```typescript
 * const view = new DataView(tiffBytes.buffer);
 * const header = parseHeader(view);
 * console.log(header.littleEndian); // true for "II" blocks
 * ```
 */
export function parseHeader(view: DataView): TiffHeader {
  if (view.byteLength < 8) {
    throw new Error("Not a valid EXIF block: too short for a TIFF header");
  }

  // 0x4949 = "II" = Intel = little-endian
  // 0x4D4D = "MM" = Motorola = big-endian
  const byteOrder = view.getUint16(0, false);

  if (byteOrder !== 0x4949 && byteOrder !== 0x4d4d) {
    throw new Error("Not a valid EXIF block: bad byte order marker");
  }

  const littleEndian = byteOrder === 0x4949;

  const magic = view.getUint16(2, littleEndian);
  if (magic === 43) {
    throw new Error("Not a valid EXIF block: BigTIFF is not allowed");
  }
  if (magic !== 42) {
    throw new Error(`Not a valid EXIF block: bad magic number ${magic}`);
  }

  return { littleEndian, firstIfdOffset: view.getUint32(4, littleEndian) };
}

function readRationals(
  view: DataView,
  offset: number,
  count: number,
  littleEndian: boolean,
  signed: boolean,
): Rational[] {
  const values: Rational[] = [];
  for (let i = 0; i < count; i++) {
    const pos = offset + i * 8;
    values.push(
      signed
        ? {
            numerator: view.getInt32(pos, littleEndian),
            denominator: view.getInt32(pos + 4, littleEndian),
          }
        : {
            numerator: view.getUint32(pos, littleEndian),
            denominator: view.getUint32(pos + 4, littleEndian),
          },
    );
  }
  return values;
}

function readNumbers(
  count: number,
  size: number,
  offset: number,
  read: (pos: number) => number,
): number[] {
  const values: number[] = [];
  for (let i = 0; i < count; i++) {
    values.push(read(offset + i * size));
  }
  return values;
}

function decodeValue(
  view: DataView,
  type: TagType,
  count: number,
  offset: number,
  littleEndian: boolean,
): TagEntry {
  const le = littleEndian;
  switch (type) {
    case TagType.Byte:
    case TagType.Undefined:
      return {
        type,
        value: new Uint8Array(
          view.buffer,
          view.byteOffset + offset,
          count,
        ).slice(),
      };
    case TagType.Ascii: {
      const bytes = new Uint8Array(
        view.buffer,
        view.byteOffset + offset,
        count,
      );
      const end = bytes.indexOf(0);
      // latin1: one character per byte
      const text = Buffer.from(
        end === -1 ? bytes : bytes.subarray(0, end),
      ).toString("latin1");
      return { type, value: text };
    }
    case TagType.Short:
      return {
        type,
        value: readNumbers(count, 2, offset, (p) => view.getUint16(p, le)),
      };
    case TagType.Long:
      return {
        type,
        value: readNumbers(count, 4, offset, (p) => view.getUint32(p, le)),
      };
    case TagType.SByte:
      return {
        type,
        value: readNumbers(count, 1, offset, (p) => view.getInt8(p)),
      };
    case TagType.SShort:
      return {
        type,
        value: readNumbers(count, 2, offset, (p) => view.getInt16(p, le)),
      };
    case TagType.SLong:
      return {
        type,
        value: readNumbers(count, 4, offset, (p) => view.getInt32(p, le)),
      };
    case TagType.Float:
      return {
        type,
        value: readNumbers(count, 4, offset, (p) => view.getFloat32(p, le)),
      };
    case TagType.Double:
      return {
        type,
        value: readNumbers(count, 8, offset, (p) => view.getFloat64(p, le)),
      };
    case TagType.Rational:
      return { type, value: readRationals(view, offset, count, le, false) };
    case TagType.SRational:
      return { type, value: readRationals(view, offset, count, le, true) };
  }
}

/**
 * Parses a single IFD at the given offset.
 *
 * Content tags are decoded into the returned group. Structural tags
 * (sub-IFD pointers and thumbnail location) are returned separately as
 * raw offsets, and entries with an unknown field type are dropped.
 *
 * @param view - DataView wrapping the EXIF block
 * @param offset - Byte offset where this IFD begins
 * @param header - Parsed header for endianness
 * @throws Error if the IFD or any of its values lies outside the block
 */
export function parseIfd(
  view: DataView,
  offset: number,
  header: TiffHeader,
): ParsedIfd {
  const { littleEndian } = header;

  if (offset + 2 > view.byteLength) {
    throw new Error(`IFD offset ${offset} is outside the EXIF block`);
  }

  const entryCount = view.getUint16(offset, littleEndian);
  const end = offset + 2 + entryCount * 12;
  if (end + 4 > view.byteLength) {
    throw new Error(`IFD at offset ${offset} is truncated`);
  }

  const tags: TagGroup = new Map();
  const pointers = new Map<number, number>();

  for (let pos = offset + 2; pos < end; pos += 12) {
    const tag = view.getUint16(pos, littleEndian);
    const type = view.getUint16(pos + 2, littleEndian);
    const count = view.getUint32(pos + 4, littleEndian);

    if (STRUCTURAL_TAGS.has(tag)) {
      // pointers may be typed LONG or IFD (13); both hold a uint32 inline
      pointers.set(
        tag,
        type === TagType.Short
          ? view.getUint16(pos + 8, littleEndian)
          : view.getUint32(pos + 8, littleEndian),
      );
      continue;
    }

    if (!isTagType(type)) {
      continue;
    }

    const size = TAG_TYPE_SIZES[type] * count;
    const valueOffset =
      size <= 4 ? pos + 8 : view.getUint32(pos + 8, littleEndian);
    if (valueOffset + size > view.byteLength) {
      throw new Error(`Value of tag ${tag} lies outside the EXIF block`);
    }

    tags.set(tag, decodeValue(view, type, count, valueOffset, littleEndian));
  }

  return { tags, pointers, nextIfdOffset: view.getUint32(end, littleEndian) };
}

/**
 * Parses a complete EXIF block into a metadata container.
 *
 * Follows IFD0 to the Exif, GPS and Interoperability sub-IFDs and to
 * IFD1, whose embedded JPEG thumbnail is copied out as well.
 *
 * @param bytes - The TIFF-structured EXIF block
 * @returns Tags grouped by IFD
 * @throws Error if the block is malformed or an IFD is referenced twice
 *
 * @example
 * ```typescript
 * const container = parseExif(findExif(jpegBytes));
 * container.primary.get(ImageTags.ImageDescription);
 * ```
 */
export function parseExif(bytes: Uint8Array): MetadataContainer {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const header = parseHeader(view);
  const container = emptyContainer();
  const seenOffsets = new Set<number>();

  const visit = (offset: number): ParsedIfd => {
    if (seenOffsets.has(offset)) {
      throw new Error(`Circular IFD reference detected at offset ${offset}`);
    }
    seenOffsets.add(offset);
    return parseIfd(view, offset, header);
  };

  if (header.firstIfdOffset === 0) {
    return container;
  }

  const ifd0 = visit(header.firstIfdOffset);
  container.primary = ifd0.tags;

  const exifOffset = ifd0.pointers.get(ImageTags.ExifIfdPointer);
  if (exifOffset) {
    const exif = visit(exifOffset);
    container.exif = exif.tags;

    const interopOffset = exif.pointers.get(ExifTags.InteropIfdPointer);
    if (interopOffset) {
      container.interop = visit(interopOffset).tags;
    }
  }

  const gpsOffset = ifd0.pointers.get(ImageTags.GpsIfdPointer);
  if (gpsOffset) {
    container.gps = visit(gpsOffset).tags;
  }

  if (ifd0.nextIfdOffset !== 0) {
    const ifd1 = visit(ifd0.nextIfdOffset);
    container.thumbnail = ifd1.tags;

    const start = ifd1.pointers.get(ImageTags.JpegInterchangeFormat);
    const length = ifd1.pointers.get(ImageTags.JpegInterchangeFormatLength);
    if (start && length && start + length <= bytes.byteLength) {
      container.thumbnailData = new Uint8Array(
        bytes.subarray(start, start + length),
      );
    }
  }

  return container;
}
