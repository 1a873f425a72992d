import { toDegreesMinutesSeconds, toRational } from "./coordinates";
import { GpsTags, TagType } from "./tags";
import type { Dms, GpsBlock, Rational, TagGroup } from "./types";

const GPS_VERSION: GpsBlock["versionId"] = [2, 0, 0, 0];

/** GPSAltitudeRef value for "above sea level". */
const ABOVE_SEA_LEVEL = 0;

function toRationalTriple(dms: Dms): [Rational, Rational, Rational] {
  return [toRational(dms.degree), toRational(dms.minute), toRational(dms.second)];
}

/** Rounds to the nearest integer, sending ties to the even neighbour. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction !== 0.5) {
    return Math.round(value);
  }
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Builds the GPS block for a coordinate and optional altitude.
 *
 * Coordinates are assumed to be range-checked already (see
 * `parseCoordinates`). Altitude is rounded to whole meters, with ties
 * going to the even value.
 *
 * @param latitude - Decimal degrees, negative for south
 * @param longitude - Decimal degrees, negative for west
 * @param altitude - Meters above sea level, or null
 *
 * @example
 * ```typescript
 * const block = buildGpsBlock(45.0, -93.0, 250);
 * block.longitudeRef; // "W"
 * block.altitude; // { numerator: 250, denominator: 1 }
 * ```
 */
export function buildGpsBlock(
  latitude: number,
  longitude: number,
  altitude: number | null,
): GpsBlock {
  const lat = toDegreesMinutesSeconds(latitude, "S", "N");
  const lng = toDegreesMinutesSeconds(longitude, "W", "E");

  const block: GpsBlock = {
    versionId: [...GPS_VERSION],
    altitudeRef: ABOVE_SEA_LEVEL,
    latitudeRef: lat.hemisphere,
    latitude: toRationalTriple(lat),
    longitudeRef: lng.hemisphere,
    longitude: toRationalTriple(lng),
  };

  // An altitude of exactly 0 is dropped like a missing one. The truthiness
  // check is kept on purpose; it is probably a latent bug.
  if (altitude !== null && altitude !== 0) {
    block.altitude = toRational(roundHalfEven(altitude));
  }

  return block;
}

/**
 * Converts a GPS block into the tag entries of the GPS IFD.
 */
export function gpsBlockToTags(block: GpsBlock): TagGroup {
  const group: TagGroup = new Map();
  group.set(GpsTags.GPSVersionID, {
    type: TagType.Byte,
    value: Uint8Array.from(block.versionId),
  });
  group.set(GpsTags.GPSAltitudeRef, {
    type: TagType.Byte,
    value: Uint8Array.of(block.altitudeRef),
  });
  group.set(GpsTags.GPSLatitudeRef, {
    type: TagType.Ascii,
    value: block.latitudeRef,
  });
  group.set(GpsTags.GPSLatitude, {
    type: TagType.Rational,
    value: [...block.latitude],
  });
  group.set(GpsTags.GPSLongitudeRef, {
    type: TagType.Ascii,
    value: block.longitudeRef,
  });
  group.set(GpsTags.GPSLongitude, {
    type: TagType.Rational,
    value: [...block.longitude],
  });
  if (block.altitude) {
    group.set(GpsTags.GPSAltitude, {
      type: TagType.Rational,
      value: [block.altitude],
    });
  }
  return group;
}
