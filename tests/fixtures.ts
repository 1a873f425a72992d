import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

const SOI = [0xff, 0xd8];
// JFIF APP0, version 1.1, no thumbnail
const APP0 = [
  0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0x01, 0x01, 0x00,
  0x00, 0x01, 0x00, 0x01, 0x00, 0x00,
];
const DQT = [0xff, 0xdb, 0x00, 0x05, 0x00, 0x01, 0x02];
const SOS = [0xff, 0xda, 0x00, 0x08, 0x01, 0x01, 0x00, 0x00, 0x3f, 0x00];
const SCAN = [0x12, 0x34, 0xff, 0x00, 0x56];
const EOI = [0xff, 0xd9];

/** Byte length of the JFIF APP0 segment written by `makeJpeg`. */
export const APP0_SIZE = APP0.length;

/**
 * Builds a structurally valid JPEG with placeholder scan data. Nothing
 * in the pipeline decodes pixels, so the image content is irrelevant.
 */
export function makeJpeg({ jfif = true } = {}): Uint8Array {
  return Uint8Array.from([
    ...SOI,
    ...(jfif ? APP0 : []),
    ...DQT,
    ...SOS,
    ...SCAN,
    ...EOI,
  ]);
}

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "photolog-tagger-"));
}
