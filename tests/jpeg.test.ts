import { describe, expect, test } from "vitest";
import { findExif, insertExif, isJpeg, readSegments } from "../src/jpeg";
import { APP0_SIZE, makeJpeg } from "./fixtures";

const EXIF_HEADER = [0x45, 0x78, 0x69, 0x66, 0x00, 0x00];

describe("readSegments", () => {
  test("lists header segments up to the scan", () => {
    const segments = readSegments(makeJpeg());

    expect(segments).toEqual([
      { marker: 0xe0, offset: 2, size: 18 },
      { marker: 0xdb, offset: 20, size: 7 },
    ]);
  });

  test("throws on a file that is not a JPEG", () => {
    const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47]);

    expect(isJpeg(png)).toBe(false);
    expect(() => readSegments(png)).toThrow("Not a JPEG file");
  });

  test("throws on a truncated segment", () => {
    const jpeg = Uint8Array.of(0xff, 0xd8, 0xff, 0xe1, 0x00, 0x20, 0x00);

    expect(() => readSegments(jpeg)).toThrow(
      "Corrupt JPEG: truncated segment at offset 2",
    );
  });
});

describe("insertExif", () => {
  const tiff = Uint8Array.of(0x4d, 0x4d, 0x00, 0x2a);

  test("inserts the segment after the JFIF header", () => {
    const jpeg = makeJpeg();
    const result = insertExif(jpeg, tiff);
    const app1Size = 2 + 2 + EXIF_HEADER.length + tiff.length;

    expect(result.length).toBe(jpeg.length + app1Size);
    expect([...result.subarray(0, 2 + APP0_SIZE)]).toEqual([
      ...jpeg.subarray(0, 2 + APP0_SIZE),
    ]);
    expect([...result.subarray(2 + APP0_SIZE, 2 + APP0_SIZE + 4)]).toEqual([
      0xff, 0xe1, 0x00, 0x0c,
    ]);
    expect([...result.subarray(2 + APP0_SIZE + app1Size)]).toEqual([
      ...jpeg.subarray(2 + APP0_SIZE),
    ]);
    expect(findExif(result)).toEqual(tiff);
  });

  test("inserts right after SOI when there is no JFIF header", () => {
    const result = insertExif(makeJpeg({ jfif: false }), tiff);

    expect([...result.subarray(0, 4)]).toEqual([0xff, 0xd8, 0xff, 0xe1]);
    expect(findExif(result)).toEqual(tiff);
  });

  test("replaces an existing Exif segment", () => {
    const first = insertExif(makeJpeg(), Uint8Array.of(1, 2, 3, 4, 5, 6));
    const second = insertExif(first, tiff);

    expect(findExif(second)).toEqual(tiff);
    expect(
      readSegments(second).filter((segment) => segment.marker === 0xe1),
    ).toHaveLength(1);
    expect(second).toEqual(insertExif(makeJpeg(), tiff));
  });

  test("does not modify the input", () => {
    const jpeg = makeJpeg();
    const copy = jpeg.slice();

    insertExif(jpeg, tiff);

    expect(jpeg).toEqual(copy);
  });

  test("rejects a block larger than one segment", () => {
    expect(() => insertExif(makeJpeg(), new Uint8Array(65528))).toThrow(
      "EXIF block of 65528 bytes does not fit in a JPEG APP1 segment",
    );
  });
});

describe("findExif", () => {
  test("returns null when the file has no Exif segment", () => {
    expect(findExif(makeJpeg())).toBeNull();
  });
});
