import { buildGpsBlock, gpsBlockToTags } from "./gps";
import { ExifTags, ImageTags, TagType } from "./tags";
import { formatExifTimestamp } from "./timestamp";
import type { ImageMetadataRequest, MetadataContainer } from "./types";

export function emptyContainer(): MetadataContainer {
  return {
    primary: new Map(),
    exif: new Map(),
    interop: new Map(),
    gps: new Map(),
    thumbnail: new Map(),
    thumbnailData: null,
  };
}

/**
 * Encodes keywords for the XPKeywords tag, which Windows defines as
 * UTF-16LE text stored in a BYTE field.
 */
export function encodeKeywords(tags: readonly string[]): Uint8Array {
  return Uint8Array.from(Buffer.from(tags.join(","), "utf16le"));
}

/**
 * Stores new text as UTF-8 in an ASCII entry, one character per byte.
 */
export function asciiValue(text: string): string {
  return Buffer.from(text, "utf8").toString("latin1");
}

/**
 * Overlays the request's metadata onto an image's existing tags.
 *
 * The container is modified in place and returned. Only inputs that are
 * present are written; nothing already in the container is cleared,
 * except the GPS group, which a new coordinate replaces entirely.
 *
 * Description and keywords go to ImageDescription and XPKeywords. Some
 * photo libraries only read these from XMP and will not show them.
 *
 * @param base - Tags loaded from the source image
 * @param request - Metadata to apply
 * @returns The updated container
 *
 * @example
 * ```typescript
 * const container = assembleMetadata(loadMetadata(request.source), request);
 * writeTaggedImage(request, container);
 * ```
 */
export function assembleMetadata(
  base: MetadataContainer,
  request: ImageMetadataRequest,
): MetadataContainer {
  if (request.geo) {
    const block = buildGpsBlock(
      request.geo.latitude,
      request.geo.longitude,
      request.altitude,
    );
    base.gps = gpsBlockToTags(block);
  }

  if (request.description) {
    base.primary.set(ImageTags.ImageDescription, {
      type: TagType.Ascii,
      value: asciiValue(request.description),
    });
  }

  if (request.timestamp) {
    const exifTime = asciiValue(formatExifTimestamp(request.timestamp));
    base.exif.set(ExifTags.DateTimeOriginal, {
      type: TagType.Ascii,
      value: exifTime,
    });
    base.primary.set(ImageTags.DateTime, {
      type: TagType.Ascii,
      value: exifTime,
    });

    // EXIF has no per-field zone, so the offset rides along in IFD1.
    const offset = request.timestamp.utcOffsetSeconds;
    if (offset !== null) {
      base.thumbnail.set(ImageTags.TimeZoneOffset, {
        type: TagType.SLong,
        value: [offset],
      });
    }
  }

  if (request.tags && request.tags.length > 0) {
    base.primary.set(ImageTags.XPKeywords, {
      type: TagType.Byte,
      value: encodeKeywords(request.tags),
    });
  }

  return base;
}
