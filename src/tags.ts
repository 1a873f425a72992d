/**
 * TIFF field types used by EXIF.
 *
 * The value determines how many bytes each component occupies and
 * how it is decoded.
 */
export const TagType = {
  Byte: 1,
  Ascii: 2,
  Short: 3,
  Long: 4,
  Rational: 5,
  SByte: 6,
  Undefined: 7,
  SShort: 8,
  SLong: 9,
  SRational: 10,
  Float: 11,
  Double: 12,
} as const;

export type TagType = (typeof TagType)[keyof typeof TagType];

/**
 * Byte size of a single component of each field type.
 */
export const TAG_TYPE_SIZES: Record<TagType, number> = {
  1: 1, // BYTE
  2: 1, // ASCII
  3: 2, // SHORT
  4: 4, // LONG
  5: 8, // RATIONAL (two LONGs)
  6: 1, // SBYTE
  7: 1, // UNDEFINED
  8: 2, // SSHORT
  9: 4, // SLONG
  10: 8, // SRATIONAL
  11: 4, // FLOAT
  12: 8, // DOUBLE
};

export function isTagType(value: number): value is TagType {
  return value >= TagType.Byte && value <= TagType.Double;
}

/** Tags of IFD0 (primary image) and IFD1 (thumbnail). */
export const ImageTags = {
  ImageDescription: 270,
  DateTime: 306,
  JpegInterchangeFormat: 513,
  JpegInterchangeFormatLength: 514,
  ExifIfdPointer: 34665,
  GpsIfdPointer: 34853,
  TimeZoneOffset: 34858,
  XPKeywords: 40094,
} as const;

/** Tags of the Exif (capture) IFD. */
export const ExifTags = {
  DateTimeOriginal: 36867,
  InteropIfdPointer: 40965,
} as const;

export const GpsTags = {
  GPSVersionID: 0,
  GPSLatitudeRef: 1,
  GPSLatitude: 2,
  GPSLongitudeRef: 3,
  GPSLongitude: 4,
  GPSAltitudeRef: 5,
  GPSAltitude: 6,
} as const;

/**
 * Tags that describe file layout rather than content. They are
 * dropped when reading and regenerated when serializing.
 */
export const STRUCTURAL_TAGS: ReadonlySet<number> = new Set([
  ImageTags.ExifIfdPointer,
  ImageTags.GpsIfdPointer,
  ImageTags.JpegInterchangeFormat,
  ImageTags.JpegInterchangeFormatLength,
  ExifTags.InteropIfdPointer,
]);
