import proj4 from "proj4";
import { DEFAULT_PROJECTION } from "./config.js";

const WGS84 = "WGS84";
const GEOCENTRIC = "+proj=geocent +datum=WGS84 +units=m +no_defs";

interface Converter {
  forward(coordinates: number[]): number[];
  inverse(coordinates: number[]): number[];
}

const utmConverters = new Map<string, Converter>();
let ecefConverter: Converter | undefined;

function utmDefinition(zone: number, northern: boolean): string {
  return `+proj=utm +zone=${zone}${northern ? "" : " +south"} +datum=WGS84 +units=m +no_defs`;
}

function utmConverter(zone: number, northern: boolean): Converter {
  const key = `${zone}${northern ? "N" : "S"}`;
  let converter = utmConverters.get(key);
  if (!converter) {
    converter = proj4(WGS84, utmDefinition(zone, northern));
    utmConverters.set(key, converter);
  }
  return converter;
}

/** Standard UTM zone, with the Norway (32V) and Svalbard (31X-37X) exceptions. */
export function utmZoneOf(lon: number, lat: number): number {
  if (lat >= 56 && lat < 64 && lon >= 3 && lon < 12) return 32;
  if (lat >= 72 && lat < 84) {
    if (lon >= 0 && lon < 9) return 31;
    if (lon >= 9 && lon < 21) return 33;
    if (lon >= 21 && lon < 33) return 35;
    if (lon >= 33 && lon < 42) return 37;
  }
  const zone = Math.floor((lon + 180) / 6) + 1;
  return ((zone - 1) % 60) + 1;
}

export interface UtmPosition {
  ew: number;
  ns: number;
  zone: number;
  northern: boolean;
}

/** Projects lon/lat (deg) to UTM metres; zone and hemisphere default to the point's own. */
export function lonLatToUtm(
  lon: number,
  lat: number,
  zone: number = utmZoneOf(lon, lat),
  northern: boolean = lat >= 0
): UtmPosition {
  const [ew, ns] = utmConverter(zone, northern).forward([lon, lat]);
  return { ew, ns, zone, northern };
}

export function utmToLonLat(ew: number, ns: number, zone: number, northern: boolean): [number, number] {
  const [lon, lat] = utmConverter(zone, northern).inverse([ew, ns]);
  return [lon, lat];
}

/** Ellipsoidal earth-centred coordinates in metres. */
export function lonLatAltToEcef(lon: number, lat: number, altitude: number): [number, number, number] {
  ecefConverter ??= proj4(WGS84, GEOCENTRIC);
  const [x, y, z] = ecefConverter.forward([lon, lat, altitude]);
  return [x, y, z];
}

/**
 * Reference point shared by conversions that need a fixed UTM zone and origin.
 * Instances are immutable and passed by reference.
 */
export class ProjectionPoint {
  private constructor(
    readonly lat: number,
    readonly lon: number,
    readonly ew: number,
    readonly ns: number,
    readonly zone: number,
    readonly northern: boolean
  ) {}

  static fromLonLat(point: { lat?: number; lon?: number } = {}): ProjectionPoint {
    const lat = point.lat ?? DEFAULT_PROJECTION.lat;
    const lon = point.lon ?? DEFAULT_PROJECTION.lon;
    const utm = lonLatToUtm(lon, lat);
    return new ProjectionPoint(lat, lon, utm.ew, utm.ns, utm.zone, utm.northern);
  }

  static fromUtm(ew: number, ns: number, zone: number, northern: boolean): ProjectionPoint {
    const [lon, lat] = utmToLonLat(ew, ns, zone, northern);
    return new ProjectionPoint(lat, lon, ew, ns, zone, northern);
  }

  /** Projects a lon/lat into this point's zone. */
  toUtm(lon: number, lat: number): UtmPosition {
    return lonLatToUtm(lon, lat, this.zone, this.northern);
  }

  fromUtm(ew: number, ns: number): [number, number] {
    return utmToLonLat(ew, ns, this.zone, this.northern);
  }
}
