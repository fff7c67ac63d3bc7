import { geoDistance } from "d3-geo";
import {
  type Axis,
  type CoordinateTriple,
  DEFAULT_SECTION_DIMS,
  DEFAULT_SECTION_WIDTH_KM,
  EARTH_RADIUS_KM,
  type FieldValue,
  type GridBase,
  InvalidSectionRequestError,
  MissingPairedParameterError,
  NdArray,
  OutOfBoundsError,
  PROFILE_PLANE_DEPTH_KM,
  ProjectionPoint,
  UnsupportedDatasetShapeError,
  linspace,
  mapFields,
} from "geogrid-model";
import { FLAT, NAN_FILL, gridAxes, interpolateFields, interpolateSurfaceFields, nearestIndex } from "./interpolate.js";
import { extractIndexBox } from "./subvolume.js";

export type Point2 = readonly [number, number];

/**
 * One geometry per request: a fixed `depth`, `lat` or `lon` level, or a
 * `start`/`end` profile. For Cartesian and UTM grids `lon` addresses the first
 * coordinate, `lat` the second and `depth` the third, in the grid's units.
 */
export interface CrossSectionOptions {
  depth?: number;
  lat?: number;
  lon?: number;
  start?: Point2;
  end?: Point2;
  interpolate?: boolean;
  dims?: readonly [number, number];
  /** Band width around the section for point data, km. */
  sectionWidth?: number;
}

export type SectionRequest =
  | { kind: "level"; axis: Axis; value: number }
  | { kind: "profile"; start: Point2; end: Point2 };

export const PROFILE_DISTANCE_FIELD = "flat_cross_section";

export function parseSectionRequest(options: CrossSectionOptions): SectionRequest {
  const { start, end } = options;
  if ((start === undefined) !== (end === undefined)) {
    throw new MissingPairedParameterError("A profile needs both start and end");
  }
  const levels: SectionRequest[] = [];
  if (options.lon !== undefined) levels.push({ kind: "level", axis: 1, value: options.lon });
  if (options.lat !== undefined) levels.push({ kind: "level", axis: 2, value: options.lat });
  if (options.depth !== undefined) levels.push({ kind: "level", axis: 3, value: options.depth });
  if (start !== undefined && end !== undefined) levels.push({ kind: "profile", start, end });
  const [request] = levels;
  if (request === undefined || levels.length > 1) {
    throw new InvalidSectionRequestError(
      `Give exactly one of depth, lat, lon or start/end; got ${levels.length} section geometries`
    );
  }
  return request;
}

function checkLevel<G extends GridBase<G>>(grid: G, axis: Axis, value: number): void {
  const [lo, hi] = grid.extent()[axis - 1];
  if (!(value >= lo && value <= hi)) {
    const name = grid.coordinateNames[axis - 1];
    throw new OutOfBoundsError(`${name} level ${value} lies outside the data range [${lo} : ${hi}]`);
  }
}

function checkFrame<G extends GridBase<G>>(grid: G): void {
  if (grid.kind === "ecef") {
    throw new UnsupportedDatasetShapeError("Cross-sections of ECEF grids are not defined; convert to another frame first");
  }
}

/** Horizontal distance of every node from the first node, km. */
export function flattenCrossSection<G extends GridBase<G>>(grid: G): NdArray {
  const [a, b] = grid.coordinates();
  const x0 = a.data[0];
  const y0 = b.data[0];
  if (grid.kind === "geographic") {
    return a.map((lon, p) => geoDistance([x0, y0], [lon, b.data[p]]) * EARTH_RADIUS_KM);
  }
  const toKm = grid.units[0] === "m" ? 1 / 1000 : 1;
  return a.map((x, p) => Math.hypot(x - x0, b.data[p] - y0) * toKm);
}

function profilePoints(start: Point2, end: Point2, n: number): [Float64Array, Float64Array] {
  return [linspace(start[0], end[0], n), linspace(start[1], end[1], n)];
}

/** Sections through a volume; profiles are always interpolated. */
export function crossSectionVolume<G extends GridBase<G>>(grid: G, options: CrossSectionOptions): G {
  checkFrame(grid);
  if (grid.shapeClass.kind !== "volume") {
    throw new UnsupportedDatasetShapeError(`crossSectionVolume needs volume data, got ${grid.shapeClass.kind}`);
  }
  const request = parseSectionRequest(options);
  const dims = options.dims ?? DEFAULT_SECTION_DIMS;
  const extent = grid.extent();

  if (request.kind === "profile") {
    const [lons, lats] = profilePoints(request.start, request.end, dims[0]);
    const depths = linspace(extent[2][0], extent[2][1], dims[1]);
    const shape = [dims[0], dims[1], 1];
    const targets: CoordinateTriple = [
      NdArray.fromFunction(shape, (i) => lons[i]),
      NdArray.fromFunction(shape, (i) => lats[i]),
      NdArray.fromFunction(shape, (_i, j) => depths[j]),
    ];
    const section = grid.derive(targets, interpolateFields(grid, targets, FLAT));
    return section.addField(PROFILE_DISTANCE_FIELD, flattenCrossSection(section));
  }

  const { axis, value } = request;
  checkLevel(grid, axis, value);
  if (!options.interpolate) {
    const axes = gridAxes(grid);
    const lists = axes.map((vector, d) =>
      d === axis - 1 ? [nearestIndex(vector, value)] : Array.from(vector, (_v, i) => i)
    );
    return extractIndexBox(grid, lists[0], lists[1], lists[2]);
  }

  const free = ([1, 2, 3] as const).filter((d) => d !== axis);
  const vectors = new Map<number, Float64Array>();
  free.forEach((d, p) => vectors.set(d, linspace(extent[d - 1][0], extent[d - 1][1], dims[p])));
  const shape = [1, 2, 3].map((d) => vectors.get(d)?.length ?? 1);
  const coordinate = (d: Axis): NdArray =>
    NdArray.fromFunction(shape, (i, j, k) => {
      const vector = vectors.get(d);
      if (vector === undefined) return value;
      return vector[d === 1 ? i : d === 2 ? j : k];
    });
  const targets: CoordinateTriple = [coordinate(1), coordinate(2), coordinate(3)];
  return grid.derive(targets, interpolateFields(grid, targets, FLAT));
}

/** Profiles along a depth surface; the result is a 1-D line of `dims[0]` samples. */
export function crossSectionSurface<G extends GridBase<G>>(grid: G, options: CrossSectionOptions): G {
  checkFrame(grid);
  const shapeClass = grid.shapeClass;
  if (shapeClass.kind !== "surface" || shapeClass.flatAxis !== 3) {
    throw new UnsupportedDatasetShapeError(`crossSectionSurface needs a depth surface, got ${shapeClass.kind}`);
  }
  const request = parseSectionRequest(options);
  const n = (options.dims ?? DEFAULT_SECTION_DIMS)[0];
  const extent = grid.extent();

  let first: Float64Array;
  let second: Float64Array;
  if (request.kind === "profile") {
    [first, second] = profilePoints(request.start, request.end, n);
  } else if (request.axis === 3) {
    throw new UnsupportedDatasetShapeError("A depth surface has no horizontal cross-section");
  } else {
    checkLevel(grid, request.axis, request.value);
    const along = request.axis === 1 ? extent[1] : extent[0];
    const varying = linspace(along[0], along[1], n);
    const fixed = new Float64Array(n).fill(request.value);
    [first, second] = request.axis === 1 ? [fixed, varying] : [varying, fixed];
  }

  const firstArray = new NdArray(first, [n]);
  const secondArray = new NdArray(second, [n]);
  const sample = interpolateSurfaceFields(grid, firstArray, secondArray, NAN_FILL);
  const line = grid.derive([firstArray, secondArray, sample.depth], sample.fields);
  return request.kind === "profile" ? line.addField(PROFILE_DISTANCE_FIELD, flattenCrossSection(line)) : line;
}

type Vec3 = readonly [number, number, number];

interface PointFrame {
  /** Metric coordinates of every point. */
  position(p: number): Vec3;
  /** Converts a projected metric position back into the grid's coordinates. */
  toGrid(v: Vec3): Vec3;
  halfWidth: number;
  planeDepth: number;
  /** Metric position of a horizontal location at zero depth. */
  surfacePoint(point: Point2): Vec3;
}

function cross(a: Vec3, b: Vec3): Vec3 {
  return [a[1] * b[2] - a[2] * b[1], a[2] * b[0] - a[0] * b[2], a[0] * b[1] - a[1] * b[0]];
}

function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

interface Selection {
  kept: number[];
  projected: Vec3[];
}

/** Points within half the band width of the vertical plane through start and end. */
function selectNearPlane(count: number, frame: PointFrame, start: Point2, end: Point2): Selection {
  const p1 = frame.surfacePoint(start);
  const p2: Vec3 = [p1[0], p1[1], -frame.planeDepth];
  const p3 = frame.surfacePoint(end);
  const normal = cross(sub(p2, p1), sub(p3, p1));
  const norm2 = dot(normal, normal);
  const selection: Selection = { kept: [], projected: [] };
  for (let p = 0; p < count; p++) {
    const point = frame.position(p);
    const t = dot(normal, sub(p1, point)) / norm2;
    const distance = Math.abs(t) * Math.sqrt(norm2);
    if (distance < frame.halfWidth) {
      selection.kept.push(p);
      selection.projected.push(frame.toGrid([point[0] + t * normal[0], point[1] + t * normal[1], point[2] + t * normal[2]]));
    }
  }
  return selection;
}

/**
 * Metric frame of a point set. Geographic data is projected into the UTM zone
 * of the profile midpoint (metres); Cartesian data stays in km and UTM data in
 * metres.
 */
function pointFrame<G extends GridBase<G>>(grid: G, widthKm: number, mid: Point2): PointFrame {
  const [a, b, c] = grid.coordinates();
  if (grid.kind === "geographic") {
    const anchor = ProjectionPoint.fromLonLat({ lon: mid[0], lat: mid[1] });
    return {
      position: (p) => {
        const utm = anchor.toUtm(a.data[p], b.data[p]);
        return [utm.ew, utm.ns, c.data[p] * 1000];
      },
      toGrid: (v) => {
        const [lon, lat] = anchor.fromUtm(v[0], v[1]);
        return [lon, lat, v[2] / 1000];
      },
      halfWidth: (widthKm * 1000) / 2,
      planeDepth: PROFILE_PLANE_DEPTH_KM * 1000,
      surfacePoint: (point) => {
        const utm = anchor.toUtm(point[0], point[1]);
        return [utm.ew, utm.ns, 0];
      },
    };
  }
  const scale = grid.units[0] === "m" ? 1000 : 1;
  return {
    position: (p) => [a.data[p], b.data[p], c.data[p]],
    toGrid: (v) => v,
    halfWidth: (widthKm * scale) / 2,
    planeDepth: PROFILE_PLANE_DEPTH_KM * scale,
    surfacePoint: (point) => [point[0], point[1], 0],
  };
}

function bandSelection<G extends GridBase<G>>(grid: G, axis: Axis, level: number, widthKm: number): Selection {
  const [a, b, c] = grid.coordinates();
  const selection: Selection = { kept: [], projected: [] };
  const keep = (p: number, distance: number, halfWidth: number): void => {
    if (Math.abs(distance) < halfWidth) {
      const projected: [number, number, number] = [a.data[p], b.data[p], c.data[p]];
      projected[axis - 1] = level;
      selection.kept.push(p);
      selection.projected.push(projected);
    }
  };

  const geographic = grid.kind === "geographic";
  const lengthScale = grid.units[0] === "m" ? 1000 : 1;
  if (axis === 3 || !geographic) {
    // Depth bands compare raw depth; projected frames compare their own units.
    const values = [a, b, c][axis - 1];
    const halfWidth = axis === 3 && geographic ? widthKm / 2 : (widthKm * lengthScale) / 2;
    for (let p = 0; p < grid.size; p++) keep(p, values.data[p] - level, halfWidth);
    return selection;
  }

  const anchor =
    axis === 2
      ? ProjectionPoint.fromLonLat({ lat: level, lon: a.mean() })
      : ProjectionPoint.fromLonLat({ lat: b.mean(), lon: level });
  for (let p = 0; p < grid.size; p++) {
    const utm = anchor.toUtm(a.data[p], b.data[p]);
    const distance = axis === 2 ? utm.ns - anchor.ns : utm.ew - anchor.ew;
    keep(p, distance, (widthKm * 1000) / 2);
  }
  return selection;
}

/**
 * Selects scattered points within a band around the section and adds their
 * projection onto it as `<coordinate>_proj` fields.
 */
export function crossSectionPoints<G extends GridBase<G>>(grid: G, options: CrossSectionOptions): G {
  checkFrame(grid);
  if (grid.shapeClass.kind !== "point") {
    throw new UnsupportedDatasetShapeError(`crossSectionPoints needs point data, got ${grid.shapeClass.kind}`);
  }
  const request = parseSectionRequest(options);
  const width = options.sectionWidth ?? DEFAULT_SECTION_WIDTH_KM;

  let selection: Selection;
  if (request.kind === "profile") {
    const mid: Point2 = [(request.start[0] + request.end[0]) / 2, (request.start[1] + request.end[1]) / 2];
    selection = selectNearPlane(grid.size, pointFrame(grid, width, mid), request.start, request.end);
  } else {
    selection = bandSelection(grid, request.axis, request.value, width);
  }

  const { kept, projected } = selection;
  const [a, b, c] = grid.coordinates();
  const coords: CoordinateTriple = [a.pick(kept), b.pick(kept), c.pick(kept)];
  const fields = new Map<string, FieldValue>(mapFields(grid.fields, (component) => component.pick(kept)));
  const names = grid.coordinateNames;
  [2, 1, 0].forEach((d) => {
    fields.set(`${names[d]}_proj`, NdArray.from(projected.map((v) => v[d])));
  });
  return grid.derive(coords, fields, kept);
}

/** Dispatches on the shape class of the dataset. */
export function crossSection<G extends GridBase<G>>(grid: G, options: CrossSectionOptions): G {
  const kind = grid.shapeClass.kind;
  if (kind === "point") return crossSectionPoints(grid, options);
  if (kind === "surface") return crossSectionSurface(grid, options);
  return crossSectionVolume(grid, options);
}
