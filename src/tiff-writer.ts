import {
  ExifTags,
  ImageTags,
  STRUCTURAL_TAGS,
  TAG_TYPE_SIZES,
  TagType,
} from "./tags";
import type { MetadataContainer, TagEntry, TagGroup } from "./types";

/** Serialized blocks are always written big-endian ("MM"). */
const LITTLE_ENDIAN = false;
const HEADER_SIZE = 8;

/**
 * Number of components a tag entry serializes to. ASCII values are
 * counted in bytes including the terminating NUL.
 */
function componentCount(entry: TagEntry): number {
  if (entry.type === TagType.Ascii) {
    return entry.value.length + 1;
  }
  return entry.value.length;
}

function valueSize(entry: TagEntry): number {
  return TAG_TYPE_SIZES[entry.type] * componentCount(entry);
}

/**
 * Size of an IFD including its out-of-line values, which are padded
 * to an even length.
 */
function blockSize(group: TagGroup): number {
  let size = 2 + group.size * 12 + 4;
  for (const entry of group.values()) {
    const bytes = valueSize(entry);
    if (bytes > 4) {
      size += bytes + (bytes % 2);
    }
  }
  return size;
}

function assertFits(
  tag: number,
  value: number,
  min: number,
  max: number,
): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(
      `Value ${value} of tag ${tag} does not fit its field type`,
    );
  }
}

const U16 = 0xffff;
const U32 = 0xffffffff;
const I8 = 0x7f;
const I16 = 0x7fff;
const I32 = 0x7fffffff;

function writeValue(
  view: DataView,
  pos: number,
  tag: number,
  entry: TagEntry,
): void {
  const le = LITTLE_ENDIAN;
  switch (entry.type) {
    case TagType.Byte:
    case TagType.Undefined:
      entry.value.forEach((byte, i) => view.setUint8(pos + i, byte));
      return;
    case TagType.Ascii:
      // the trailing NUL is already zero in the fresh buffer
      Buffer.from(entry.value, "latin1").forEach((byte, i) =>
        view.setUint8(pos + i, byte),
      );
      return;
    case TagType.Short:
      entry.value.forEach((v, i) => {
        assertFits(tag, v, 0, U16);
        view.setUint16(pos + i * 2, v, le);
      });
      return;
    case TagType.Long:
      entry.value.forEach((v, i) => {
        assertFits(tag, v, 0, U32);
        view.setUint32(pos + i * 4, v, le);
      });
      return;
    case TagType.SByte:
      entry.value.forEach((v, i) => {
        assertFits(tag, v, -I8 - 1, I8);
        view.setInt8(pos + i, v);
      });
      return;
    case TagType.SShort:
      entry.value.forEach((v, i) => {
        assertFits(tag, v, -I16 - 1, I16);
        view.setInt16(pos + i * 2, v, le);
      });
      return;
    case TagType.SLong:
      entry.value.forEach((v, i) => {
        assertFits(tag, v, -I32 - 1, I32);
        view.setInt32(pos + i * 4, v, le);
      });
      return;
    case TagType.Float:
      entry.value.forEach((v, i) => view.setFloat32(pos + i * 4, v, le));
      return;
    case TagType.Double:
      entry.value.forEach((v, i) => view.setFloat64(pos + i * 8, v, le));
      return;
    case TagType.Rational:
      entry.value.forEach(({ numerator, denominator }, i) => {
        assertFits(tag, numerator, 0, U32);
        assertFits(tag, denominator, 0, U32);
        view.setUint32(pos + i * 8, numerator, le);
        view.setUint32(pos + i * 8 + 4, denominator, le);
      });
      return;
    case TagType.SRational:
      entry.value.forEach(({ numerator, denominator }, i) => {
        assertFits(tag, numerator, -I32 - 1, I32);
        assertFits(tag, denominator, -I32 - 1, I32);
        view.setInt32(pos + i * 8, numerator, le);
        view.setInt32(pos + i * 8 + 4, denominator, le);
      });
      return;
  }
}

/**
 * Writes one IFD at `offset`, followed directly by its out-of-line
 * values. Entries are written in ascending tag order.
 */
function writeIfd(
  view: DataView,
  offset: number,
  group: TagGroup,
  nextIfdOffset: number,
): void {
  const le = LITTLE_ENDIAN;
  const entries = [...group.entries()].sort(([a], [b]) => a - b);

  view.setUint16(offset, entries.length, le);
  let pos = offset + 2;
  let dataPos = pos + entries.length * 12 + 4;

  for (const [tag, entry] of entries) {
    const size = valueSize(entry);
    view.setUint16(pos, tag, le);
    view.setUint16(pos + 2, entry.type, le);
    view.setUint32(pos + 4, componentCount(entry), le);

    if (size <= 4) {
      writeValue(view, pos + 8, tag, entry);
    } else {
      view.setUint32(pos + 8, dataPos, le);
      writeValue(view, dataPos, tag, entry);
      dataPos += size + (size % 2);
    }
    pos += 12;
  }

  view.setUint32(pos, nextIfdOffset, le);
}

function contentTags(group: TagGroup): TagGroup {
  return new Map([...group].filter(([tag]) => !STRUCTURAL_TAGS.has(tag)));
}

const pointer = (offset: number): TagEntry => ({
  type: TagType.Long,
  value: [offset],
});

/**
 * Serializes a metadata container into a TIFF-structured EXIF block.
 *
 * IFD0, Exif, Interoperability, GPS and IFD1 are laid out one after
 * another, each followed by its values, with the thumbnail image last.
 * Empty sub-IFDs are left out and every pointer tag is regenerated, so
 * pointers present in the container are ignored.
 *
 * @param container - Tags to serialize
 * @returns The block, starting with the "MM" byte order marker
 * @throws RangeError if a numeric value does not fit its field type
 *
 * @example
 * ```typescript
 * const tiff = serializeExif(container);
 * const tagged = insertExif(jpegBytes, tiff);
 * ```
 */
export function serializeExif(container: MetadataContainer): Uint8Array {
  const primary = contentTags(container.primary);
  const exif = contentTags(container.exif);
  const interop = contentTags(container.interop);
  const gps = contentTags(container.gps);
  const thumbnail = contentTags(container.thumbnail);
  const { thumbnailData } = container;

  const hasInterop = interop.size > 0;
  const hasExif = exif.size > 0 || hasInterop;
  const hasGps = gps.size > 0;
  const hasThumbnail = thumbnail.size > 0 || thumbnailData !== null;

  // placeholders first so block sizes are final before offsets are known
  if (hasExif) primary.set(ImageTags.ExifIfdPointer, pointer(0));
  if (hasGps) primary.set(ImageTags.GpsIfdPointer, pointer(0));
  if (hasInterop) exif.set(ExifTags.InteropIfdPointer, pointer(0));
  if (thumbnailData) {
    thumbnail.set(ImageTags.JpegInterchangeFormat, pointer(0));
    thumbnail.set(
      ImageTags.JpegInterchangeFormatLength,
      pointer(thumbnailData.length),
    );
  }

  let offset = HEADER_SIZE;
  const place = (group: TagGroup, present: boolean): number => {
    if (!present) return 0;
    const start = offset;
    offset += blockSize(group);
    return start;
  };

  const primaryOffset = place(primary, true);
  const exifOffset = place(exif, hasExif);
  const interopOffset = place(interop, hasInterop);
  const gpsOffset = place(gps, hasGps);
  const thumbnailOffset = place(thumbnail, hasThumbnail);
  const thumbnailDataOffset = offset;
  offset += thumbnailData?.length ?? 0;

  if (hasExif) primary.set(ImageTags.ExifIfdPointer, pointer(exifOffset));
  if (hasGps) primary.set(ImageTags.GpsIfdPointer, pointer(gpsOffset));
  if (hasInterop) {
    exif.set(ExifTags.InteropIfdPointer, pointer(interopOffset));
  }
  if (thumbnailData) {
    thumbnail.set(
      ImageTags.JpegInterchangeFormat,
      pointer(thumbnailDataOffset),
    );
  }

  const bytes = new Uint8Array(offset);
  const view = new DataView(bytes.buffer);

  view.setUint16(0, 0x4d4d, false);
  view.setUint16(2, 42, LITTLE_ENDIAN);
  view.setUint32(4, primaryOffset, LITTLE_ENDIAN);

  writeIfd(view, primaryOffset, primary, thumbnailOffset);
  if (hasExif) writeIfd(view, exifOffset, exif, 0);
  if (hasInterop) writeIfd(view, interopOffset, interop, 0);
  if (hasGps) writeIfd(view, gpsOffset, gps, 0);
  if (hasThumbnail) writeIfd(view, thumbnailOffset, thumbnail, 0);
  if (thumbnailData) bytes.set(thumbnailData, thumbnailDataOffset);

  return bytes;
}
