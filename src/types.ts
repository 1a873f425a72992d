import type { TagType } from "./tags";

export interface Rational {
  numerator: number;
  denominator: number;
}

export type Hemisphere = "N" | "S" | "E" | "W" | "";

export interface Dms {
  degree: number;
  minute: number;
  second: number;
  hemisphere: Hemisphere;
}

export interface GeoCoordinate {
  latitude: number;
  longitude: number;
}

export interface GpsBlock {
  versionId: [number, number, number, number];
  altitudeRef: number;
  latitudeRef: Hemisphere;
  latitude: [Rational, Rational, Rational];
  longitudeRef: Hemisphere;
  longitude: [Rational, Rational, Rational];
  altitude?: Rational;
}

/**
 * A timestamp as written in the log, without any conversion to UTC.
 *
 * `utcOffsetSeconds` is null when the source string carried no offset.
 */
export interface CaptureTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  utcOffsetSeconds: number | null;
}

export type ImageMetadataRequest = Readonly<{
  source: string;
  destination: string;
  description: string | null;
  timestamp: CaptureTime | null;
  geo: GeoCoordinate | null;
  altitude: number | null;
  tags: readonly string[] | null;
}>;

export interface TiffHeader {
  littleEndian: boolean;
  firstIfdOffset: number;
}

/**
 * A decoded tag value. ASCII values hold one character per stored byte
 * (latin1), without the terminating NUL.
 */
export type TagEntry =
  | { type: typeof TagType.Byte | typeof TagType.Undefined; value: Uint8Array }
  | { type: typeof TagType.Ascii; value: string }
  | {
      type:
        | typeof TagType.Short
        | typeof TagType.Long
        | typeof TagType.SByte
        | typeof TagType.SShort
        | typeof TagType.SLong
        | typeof TagType.Float
        | typeof TagType.Double;
      value: number[];
    }
  | {
      type: typeof TagType.Rational | typeof TagType.SRational;
      value: Rational[];
    };

/** Tags of one IFD, keyed by tag ID. */
export type TagGroup = Map<number, TagEntry>;

export interface MetadataContainer {
  primary: TagGroup;
  exif: TagGroup;
  interop: TagGroup;
  gps: TagGroup;
  thumbnail: TagGroup;
  thumbnailData: Uint8Array | null;
}

export interface LogRecord {
  date: string;
  outfile: string;
  description: string | null;
}

export interface TaggerOptions {
  src: string;
  dest: string;
  logfile: string;
  geo: GeoCoordinate | null;
  altitude: number | null;
  tags: string[] | null;
  verbose: boolean;
}

export interface TaggerResult {
  request: ImageMetadataRequest | null;
  skippedLines: number;
}
