import {
  copyFileSync,
  readFileSync,
  statSync,
  utimesSync,
  writeFileSync,
} from "node:fs";
import { assembleMetadata, emptyContainer } from "./assembler";
import { findExif, insertExif, isJpeg } from "./jpeg";
import { parseExif } from "./tiff-parser";
import { serializeExif } from "./tiff-writer";
import type { ImageMetadataRequest, MetadataContainer } from "./types";

/**
 * Reads the existing EXIF tags of a JPEG so they can be carried over.
 *
 * @param path - Image to read
 * @returns The parsed tags, or an empty container if the image has none
 * @throws Error if the file cannot be read or is not a JPEG
 */
export function loadMetadata(path: string): MetadataContainer {
  const data = readFileSync(path);
  if (!isJpeg(data)) {
    throw new Error(`Not a JPEG file: ${path}`);
  }

  const exif = findExif(data);
  return exif ? parseExif(exif) : emptyContainer();
}

/**
 * Copies the source image to the destination and embeds the container
 * into the copy.
 *
 * The copy keeps the source's permissions and timestamps; bytes outside
 * the Exif segment are left untouched.
 *
 * @throws Error if the source is unreadable, the destination directory
 *   does not exist, or the image is not a JPEG
 * @throws RangeError if a tag value does not fit its field type; nothing
 *   is written in that case
 */
export function writeTaggedImage(
  request: ImageMetadataRequest,
  container: MetadataContainer,
): void {
  const { source, destination } = request;

  const tiff = serializeExif(container);
  copyFileSync(source, destination);
  writeFileSync(destination, insertExif(readFileSync(destination), tiff));

  const { atime, mtime } = statSync(source);
  utimesSync(destination, atime, mtime);
}

/**
 * Runs the full pipeline for one image: load the source's tags,
 * overlay the request, write the tagged copy.
 */
export function tagImage(request: ImageMetadataRequest): MetadataContainer {
  const container = assembleMetadata(loadMetadata(request.source), request);
  writeTaggedImage(request, container);
  return container;
}
