import { type FieldMap, type FieldValue, isDirectionalVector, mapField } from "./fields.js";
import {
  CartesianGrid,
  type CoordinateTriple,
  EcefGrid,
  GeographicGrid,
  type GridBase,
  UtmGrid,
} from "./grid.js";
import { type Axis, NdArray } from "./ndarray.js";
import { ProjectionPoint, lonLatAltToEcef, lonLatToUtm, utmToLonLat } from "./projection.js";
import { info } from "./warnings.js";

function zipMap(shape: readonly number[], size: number, fn: (p: number, out: Float64Array[]) => void): NdArray[] {
  const out = [new Float64Array(size), new Float64Array(size), new Float64Array(size)];
  for (let p = 0; p < size; p++) fn(p, out);
  return out.map((data) => new NdArray(data, shape));
}

/** UTM in every node's own zone; depth km to m. */
export function geographicToUtm(grid: GeographicGrid): UtmGrid {
  const zone: number[] = [];
  const northern: boolean[] = [];
  const [ew, ns, depth] = zipMap(grid.shape, grid.size, (p, out) => {
    const utm = lonLatToUtm(grid.lon.data[p], grid.lat.data[p]);
    out[0][p] = utm.ew;
    out[1][p] = utm.ns;
    out[2][p] = grid.depth.data[p] * 1000;
    zone.push(utm.zone);
    northern.push(utm.northern);
  });
  return new UtmGrid({ ew, ns, depth, zone, northern, fields: grid.fields, attributes: grid.attributes });
}

/** UTM forced into the zone and hemisphere of `proj`. */
export function geographicToUtmZone(grid: GeographicGrid, proj: ProjectionPoint): UtmGrid {
  const [ew, ns, depth] = zipMap(grid.shape, grid.size, (p, out) => {
    const utm = proj.toUtm(grid.lon.data[p], grid.lat.data[p]);
    out[0][p] = utm.ew;
    out[1][p] = utm.ns;
    out[2][p] = grid.depth.data[p] * 1000;
  });
  return new UtmGrid({
    ew,
    ns,
    depth,
    zone: proj.zone,
    northern: proj.northern,
    fields: grid.fields,
    attributes: grid.attributes,
  });
}

export function utmToGeographic(grid: UtmGrid): GeographicGrid {
  const [lon, lat, depth] = zipMap(grid.shape, grid.size, (p, out) => {
    const [x, y] = utmToLonLat(grid.ew.data[p], grid.ns.data[p], grid.zone[p], grid.northern[p]);
    out[0][p] = x;
    out[1][p] = y;
    out[2][p] = grid.depth.data[p] / 1000;
  });
  return new GeographicGrid({ lon, lat, depth, fields: grid.fields, attributes: grid.attributes });
}

/** Kilometre offsets from the projection point. */
export function utmToCartesian(grid: UtmGrid, proj: ProjectionPoint = ProjectionPoint.fromLonLat()): CartesianGrid {
  return new CartesianGrid({
    x: grid.ew.map((v) => (v - proj.ew) / 1000),
    y: grid.ns.map((v) => (v - proj.ns) / 1000),
    z: grid.depth.map((v) => v / 1000),
    fields: grid.fields,
    attributes: grid.attributes,
  });
}

export function cartesianToUtm(grid: CartesianGrid, proj: ProjectionPoint = ProjectionPoint.fromLonLat()): UtmGrid {
  return new UtmGrid({
    ew: grid.x.map((v) => v * 1000 + proj.ew),
    ns: grid.y.map((v) => v * 1000 + proj.ns),
    depth: grid.z.map((v) => v * 1000),
    zone: proj.zone,
    northern: proj.northern,
    fields: grid.fields,
    attributes: grid.attributes,
  });
}

export function geographicToCartesian(
  grid: GeographicGrid,
  proj: ProjectionPoint = ProjectionPoint.fromLonLat()
): CartesianGrid {
  return utmToCartesian(geographicToUtmZone(grid, proj), proj);
}

export function cartesianToGeographic(
  grid: CartesianGrid,
  proj: ProjectionPoint = ProjectionPoint.fromLonLat()
): GeographicGrid {
  return utmToGeographic(cartesianToUtm(grid, proj));
}

/**
 * Rotates an east/north/up vector into the earth-centred frame at the given
 * geodetic position (degrees). Pure rotation, so the magnitude is kept.
 */
export function enuToEcefVector(
  lon: number,
  lat: number,
  east: number,
  north: number,
  up: number
): [number, number, number] {
  const az = (lon * Math.PI) / 180;
  const el = (lat * Math.PI) / 180;
  const [sinAz, cosAz, sinEl, cosEl] = [Math.sin(az), Math.cos(az), Math.sin(el), Math.cos(el)];
  return [
    -sinAz * east - sinEl * cosAz * north + cosEl * cosAz * up,
    cosAz * east - sinEl * sinAz * north + cosEl * sinAz * up,
    cosEl * north + sinEl * up,
  ];
}

function rotateVectorFields(grid: GeographicGrid): FieldMap {
  const out = new Map<string, FieldValue>();
  for (const [name, value] of grid.fields) {
    if (!isDirectionalVector(name, value)) {
      out.set(name, value);
      continue;
    }
    info(`Rotating vector field "${name}" from east/north/up into the ECEF frame`);
    const [east, north, up] = value;
    const [x, y, z] = zipMap(grid.shape, grid.size, (p, rotated) => {
      const v = enuToEcefVector(grid.lon.data[p], grid.lat.data[p], east.data[p], north.data[p], up.data[p]);
      rotated[0][p] = v[0];
      rotated[1][p] = v[1];
      rotated[2][p] = v[2];
    });
    out.set(name, [x, y, z]);
  }
  return out;
}

/** WGS84 earth-centred coordinates in km, with directional vectors rotated along. */
export function geographicToEcef(grid: GeographicGrid): EcefGrid {
  const [x, y, z] = zipMap(grid.shape, grid.size, (p, out) => {
    const xyz = lonLatAltToEcef(grid.lon.data[p], grid.lat.data[p], grid.depth.data[p] * 1000);
    out[0][p] = xyz[0] / 1000;
    out[1][p] = xyz[1] / 1000;
    out[2][p] = xyz[2] / 1000;
  });
  return new EcefGrid({ x, y, z, fields: rotateVectorFields(grid), attributes: grid.attributes });
}

/** Reverses coordinates and every field along one axis. */
export function flipGrid<G extends GridBase<G>>(grid: G, axis: Axis = 3): G {
  const [a, b, c] = grid.coordinates();
  const coords: CoordinateTriple = [a.reverseAxis(axis), b.reverseAxis(axis), c.reverseAxis(axis)];
  const fields = new Map<string, FieldValue>();
  for (const [name, value] of grid.fields) {
    fields.set(
      name,
      mapField(value, (component) => component.reverseAxis(axis))
    );
  }
  const [n1, n2, n3] = grid.dims;
  const sourceIndices: number[] = [];
  for (let k = 0; k < n3; k++) {
    for (let j = 0; j < n2; j++) {
      for (let i = 0; i < n1; i++) {
        const si = axis === 1 ? n1 - 1 - i : i;
        const sj = axis === 2 ? n2 - 1 - j : j;
        const sk = axis === 3 ? n3 - 1 - k : k;
        sourceIndices.push(si + n1 * (sj + n2 * sk));
      }
    }
  }
  return grid.derive(coords, fields, sourceIndices);
}

export interface RigidTransform {
  /** Rotation about the vertical axis through the mean x/y position, degrees counter-clockwise. */
  rotate?: number;
  translate?: readonly [number, number, number];
  scale?: number | readonly [number, number, number];
}

/**
 * Scales, rotates about the mean horizontal position, then translates a
 * Cartesian or ECEF grid. Fields are carried unchanged.
 */
export function rotateTranslateScale(grid: CartesianGrid, transform: RigidTransform): CartesianGrid;
export function rotateTranslateScale(grid: EcefGrid, transform: RigidTransform): EcefGrid;
export function rotateTranslateScale(
  grid: CartesianGrid | EcefGrid,
  transform: RigidTransform
): CartesianGrid | EcefGrid {
  const scale = transform.scale ?? 1;
  const [sx, sy, sz] = typeof scale === "number" ? [scale, scale, scale] : scale;
  const [tx, ty, tz] = transform.translate ?? [0, 0, 0];
  const angle = ((transform.rotate ?? 0) * Math.PI) / 180;
  const [cos, sin] = [Math.cos(angle), Math.sin(angle)];

  const [x0, y0, z0] = grid.coordinates();
  const x = x0.map((v) => v * sx);
  const y = y0.map((v) => v * sy);
  const z = z0.map((v) => v * sz + tz);
  const cx = x.mean();
  const cy = y.mean();
  const xr = x.map((v, p) => cos * (v - cx) - sin * (y.data[p] - cy) + cx + tx);
  const yr = y.map((v, p) => sin * (x.data[p] - cx) + cos * (v - cy) + cy + ty);
  return grid.derive([xr, yr, z], grid.fields);
}
