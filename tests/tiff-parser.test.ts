import { describe, expect, test } from "vitest";
import { TagType } from "../src/tags";
import { parseExif, parseHeader } from "../src/tiff-parser";

describe("parseHeader", () => {
  test("parses little-endian header", () => {
    const bytes = new Uint8Array([
      // "II" - little endian
      0x49, 0x49,
      // 42 - TIFF magic
      0x2a, 0x00,
      // 8 - first IFD offset
      0x08, 0x00, 0x00, 0x00,
    ]);

    const view = new DataView(bytes.buffer);
    const header = parseHeader(view);

    expect(header.littleEndian).toBe(true);
    expect(header.firstIfdOffset).toBe(8);
  });

  test("parses big-endian header", () => {
    const bytes = new Uint8Array([
      // "MM" - big endian
      0x4d, 0x4d,
      // 42 - TIFF magic (big endian)
      0x00, 0x2a,
      // 8 - first IFD offset (big endian)
      0x00, 0x00, 0x00, 0x08,
    ]);

    const view = new DataView(bytes.buffer);
    const header = parseHeader(view);

    expect(header.littleEndian).toBe(false);
    expect(header.firstIfdOffset).toBe(8);
  });

  test("rejects BigTIFF", () => {
    const bytes = new Uint8Array([
      0x49, 0x49,
      // 43 - BigTIFF magic
      0x2b, 0x00, 0x08, 0x00, 0x00, 0x00,
    ]);

    const view = new DataView(bytes.buffer);

    expect(() => parseHeader(view)).toThrow("BigTIFF is not allowed");
  });

  test("throws on invalid byte order marker", () => {
    const bytes = new Uint8Array([
      // invalid byte order
      0x00, 0x00, 0x2a, 0x00, 0x08, 0x00, 0x00, 0x00,
    ]);

    const view = new DataView(bytes.buffer);

    expect(() => parseHeader(view)).toThrow("bad byte order marker");
  });

  test("throws on invalid magic number", () => {
    const bytes = new Uint8Array([
      // valid byte order
      0x49, 0x49,
      // invalid magic
      0x00, 0x00, 0x08, 0x00, 0x00, 0x00,
    ]);

    const view = new DataView(bytes.buffer);

    expect(() => parseHeader(view)).toThrow("bad magic number 0");
  });

  test("throws on truncated block", () => {
    const view = new DataView(new Uint8Array([0x49, 0x49, 0x2a]).buffer);

    expect(() => parseHeader(view)).toThrow("too short");
  });
});

/**
 * Helper to build a little-endian EXIF block:
 *
 *   0  header
 *   8  IFD0: ImageDescription "Hi", Orientation 6, Exif pointer
 *  50  Exif IFD: DateTimeOriginal (20 bytes at offset 68)
 *  88  end
 */
function createExifBlock(exifPointer = 50): Uint8Array {
  const bytes = new Uint8Array(88);
  const view = new DataView(bytes.buffer);
  const le = true;

  view.setUint16(0, 0x4949, false);
  view.setUint16(2, 42, le);
  view.setUint32(4, 8, le);

  view.setUint16(8, 3, le);
  // ImageDescription, ASCII, 3 bytes inline
  view.setUint16(10, 270, le);
  view.setUint16(12, 2, le);
  view.setUint32(14, 3, le);
  bytes.set([0x48, 0x69, 0x00], 18);
  // Orientation, SHORT, 1
  view.setUint16(22, 274, le);
  view.setUint16(24, 3, le);
  view.setUint32(26, 1, le);
  view.setUint16(30, 6, le);
  // Exif IFD pointer, LONG, 1
  view.setUint16(34, 34665, le);
  view.setUint16(36, 4, le);
  view.setUint32(38, 1, le);
  view.setUint32(42, exifPointer, le);
  view.setUint32(46, 0, le);

  view.setUint16(50, 1, le);
  // DateTimeOriginal, ASCII, 20 bytes at 68
  view.setUint16(52, 36867, le);
  view.setUint16(54, 2, le);
  view.setUint32(56, 20, le);
  view.setUint32(60, 68, le);
  view.setUint32(64, 0, le);
  bytes.set(new TextEncoder().encode("2023:06:01 10:00:00\0"), 68);

  return bytes;
}

describe("parseExif", () => {
  test("reads IFD0 and the Exif sub-IFD", () => {
    const container = parseExif(createExifBlock());

    expect(container.primary.get(270)).toEqual({
      type: TagType.Ascii,
      value: "Hi",
    });
    expect(container.primary.get(274)).toEqual({
      type: TagType.Short,
      value: [6],
    });
    expect(container.exif.get(36867)).toEqual({
      type: TagType.Ascii,
      value: "2023:06:01 10:00:00",
    });
  });

  test("does not keep pointer tags as content", () => {
    const container = parseExif(createExifBlock());

    expect(container.primary.has(34665)).toBe(false);
    expect(container.gps.size).toBe(0);
    expect(container.thumbnail.size).toBe(0);
    expect(container.thumbnailData).toBeNull();
  });

  test("reads a block that sits inside a larger buffer", () => {
    const block = createExifBlock();
    const padded = new Uint8Array(block.length + 10);
    padded.set(block, 10);

    const container = parseExif(padded.subarray(10));

    expect(container.primary.get(270)?.value).toBe("Hi");
  });

  test("throws on circular IFD reference", () => {
    expect(() => parseExif(createExifBlock(8))).toThrow(
      "Circular IFD reference detected at offset 8",
    );
  });

  test("throws when a sub-IFD lies outside the block", () => {
    expect(() => parseExif(createExifBlock(500))).toThrow(
      "IFD offset 500 is outside the EXIF block",
    );
  });

  test("throws when a value lies outside the block", () => {
    const block = createExifBlock();
    new DataView(block.buffer).setUint32(60, 80, true);

    expect(() => parseExif(block)).toThrow(
      "Value of tag 36867 lies outside the EXIF block",
    );
  });
});
