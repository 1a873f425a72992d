/**
 * JPEG marker segment handling: locating and replacing the Exif APP1
 * segment. Only the header segments before the scan data are touched;
 * everything from SOS onwards is copied unchanged.
 */

const SOI = 0xd8;
const EOI = 0xd9;
const SOS = 0xda;
const APP0 = 0xe0;
const APP1 = 0xe1;

/** "Exif\0\0" */
const EXIF_IDENTIFIER = [0x45, 0x78, 0x69, 0x66, 0x00, 0x00];

const MAX_SEGMENT_LENGTH = 0xffff;

interface Segment {
  marker: number;
  /** Offset of the 0xFF marker byte. */
  offset: number;
  /** Total size including the two marker bytes. */
  size: number;
}

export function isJpeg(data: Uint8Array): boolean {
  return data.length >= 2 && data[0] === 0xff && data[1] === SOI;
}

function hasStandaloneMarker(marker: number): boolean {
  return marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7);
}

/**
 * Lists the marker segments between SOI and the start of scan.
 *
 * @throws Error if the data is not a JPEG or a segment is truncated
 */
export function readSegments(data: Uint8Array): Segment[] {
  if (!isJpeg(data)) {
    throw new Error("Not a JPEG file: missing SOI marker");
  }

  const segments: Segment[] = [];
  let pos = 2;

  while (pos + 1 < data.length) {
    if (data[pos] !== 0xff) {
      throw new Error(`Corrupt JPEG: expected a marker at offset ${pos}`);
    }

    const marker = data[pos + 1];
    if (marker === SOS || marker === EOI) {
      break;
    }
    // fill byte
    if (marker === 0xff) {
      pos++;
      continue;
    }
    if (hasStandaloneMarker(marker)) {
      segments.push({ marker, offset: pos, size: 2 });
      pos += 2;
      continue;
    }

    if (pos + 4 > data.length) {
      throw new Error(`Corrupt JPEG: truncated segment at offset ${pos}`);
    }
    const length = (data[pos + 2] << 8) | data[pos + 3];
    if (length < 2 || pos + 2 + length > data.length) {
      throw new Error(`Corrupt JPEG: truncated segment at offset ${pos}`);
    }

    segments.push({ marker, offset: pos, size: 2 + length });
    pos += 2 + length;
  }

  return segments;
}

function isExifSegment(data: Uint8Array, segment: Segment): boolean {
  return (
    segment.marker === APP1 &&
    segment.size >= 10 &&
    EXIF_IDENTIFIER.every((byte, i) => data[segment.offset + 4 + i] === byte)
  );
}

/**
 * Returns the TIFF-structured EXIF block of a JPEG, or null if the
 * file has no Exif APP1 segment.
 */
export function findExif(jpeg: Uint8Array): Uint8Array | null {
  const segment = readSegments(jpeg).find((s) => isExifSegment(jpeg, s));
  if (!segment) {
    return null;
  }
  return jpeg.subarray(segment.offset + 10, segment.offset + segment.size);
}

/**
 * Embeds an EXIF block into a JPEG.
 *
 * An existing Exif APP1 segment is replaced in place. Otherwise a new
 * one is inserted after SOI, or after the JFIF APP0 segment when the
 * file starts with one.
 *
 * @param jpeg - The original JPEG bytes
 * @param tiff - Block produced by `serializeExif`
 * @returns A new buffer; the input is not modified
 * @throws Error if the input is not a JPEG or the block exceeds one segment
 */
export function insertExif(jpeg: Uint8Array, tiff: Uint8Array): Uint8Array {
  const segments = readSegments(jpeg);

  const length = 2 + EXIF_IDENTIFIER.length + tiff.length;
  if (length > MAX_SEGMENT_LENGTH) {
    throw new Error(
      `EXIF block of ${tiff.length} bytes does not fit in a JPEG APP1 segment`,
    );
  }

  const app1 = new Uint8Array(2 + length);
  app1.set([0xff, APP1, length >> 8, length & 0xff, ...EXIF_IDENTIFIER]);
  app1.set(tiff, 4 + EXIF_IDENTIFIER.length);

  const existing = segments.find((s) => isExifSegment(jpeg, s));
  let start: number;
  let end: number;
  if (existing) {
    start = existing.offset;
    end = existing.offset + existing.size;
  } else {
    const first = segments[0];
    start = first?.marker === APP0 ? first.offset + first.size : 2;
    end = start;
  }

  const result = new Uint8Array(jpeg.length - (end - start) + app1.length);
  result.set(jpeg.subarray(0, start), 0);
  result.set(app1, start);
  result.set(jpeg.subarray(end), start + app1.length);
  return result;
}
