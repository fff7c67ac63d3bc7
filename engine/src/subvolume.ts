import {
  type Axis,
  type CoordinateTriple,
  DEFAULT_SUBVOLUME_DIMS,
  type GridBase,
  NdArray,
  type Range,
  UnsupportedDatasetShapeError,
  linspace,
  mapFields,
} from "geogrid-model";
import { FLAT, RegularGridInterpolator, gridAxes, interpolateFields, nearestIndex } from "./interpolate.js";

export type Bounds = readonly [number, number];

export interface SubvolumeOptions {
  /** Bounds on the first coordinate (lon, x or ew), in the grid's units. */
  lon?: Bounds;
  /** Bounds on the second coordinate (lat, y or ns). */
  lat?: Bounds;
  /** Bounds on the third coordinate (depth or z). */
  depth?: Bounds;
  interpolate?: boolean;
  dims?: readonly [number, number, number];
}

/** Indices from the lower to the higher of two node indices, in storage order. */
function indexRange(a: number, b: number): number[] {
  const out: number[] = [];
  for (let i = Math.min(a, b); i <= Math.max(a, b); i++) out.push(i);
  return out;
}

/** Copies an index box (explicit index lists per axis) out of a gridded dataset. */
export function extractIndexBox<G extends GridBase<G>>(
  grid: G,
  iIdx: readonly number[],
  jIdx: readonly number[],
  kIdx: readonly number[]
): G {
  const [a, b, c] = grid.coordinates();
  const coords: CoordinateTriple = [a.pickBox(iIdx, jIdx, kIdx), b.pickBox(iIdx, jIdx, kIdx), c.pickBox(iIdx, jIdx, kIdx)];
  const fields = mapFields(grid.fields, (component) => component.pickBox(iIdx, jIdx, kIdx));
  const sourceIndices: number[] = [];
  for (const k of kIdx) {
    for (const j of jIdx) {
      for (const i of iIdx) sourceIndices.push(a.index(i, j, k));
    }
  }
  return grid.derive(coords, fields, sourceIndices);
}

function boundsOf(extent: readonly [Range, Range, Range], options: SubvolumeOptions): [Bounds, Bounds, Bounds] {
  return [options.lon ?? extent[0], options.lat ?? extent[1], options.depth ?? extent[2]];
}

function extractPoints<G extends GridBase<G>>(grid: G, bounds: [Bounds, Bounds, Bounds]): G {
  const coords = grid.coordinates();
  const kept: number[] = [];
  for (let p = 0; p < grid.size; p++) {
    const inside = bounds.every((b, d) => {
      const v = coords[d].data[p];
      return v >= Math.min(b[0], b[1]) && v <= Math.max(b[0], b[1]);
    });
    if (inside) kept.push(p);
  }
  const picked: CoordinateTriple = [coords[0].pick(kept), coords[1].pick(kept), coords[2].pick(kept)];
  return grid.derive(
    picked,
    mapFields(grid.fields, (component) => component.pick(kept)),
    kept
  );
}

/**
 * Cuts a box out of a dataset. Without interpolation the nodes nearest to the
 * bounds delimit an index range that is copied verbatim in storage order; with interpolation
 * the box is resampled onto a regular `dims` grid with flat extrapolation.
 * Axes of length 1 stay singleton, carrying their coordinate along.
 */
export function extractSubvolume<G extends GridBase<G>>(grid: G, options: SubvolumeOptions = {}): G {
  if (grid.kind === "ecef") {
    throw new UnsupportedDatasetShapeError("Sub-volumes of ECEF grids are not defined; convert to another frame first");
  }
  const bounds = boundsOf(grid.extent(), options);
  if (grid.shapeClass.kind === "point") return extractPoints(grid, bounds);

  const axes = gridAxes(grid);
  const sizes = grid.dims;

  if (!options.interpolate) {
    const given = [options.lon, options.lat, options.depth];
    const [iIdx, jIdx, kIdx] = axes.map((axis, d) =>
      given[d] === undefined
        ? indexRange(0, sizes[d] - 1)
        : indexRange(nearestIndex(axis, bounds[d][0]), nearestIndex(axis, bounds[d][1]))
    );
    return extractIndexBox(grid, iIdx, jIdx, kIdx);
  }

  const dims = options.dims ?? DEFAULT_SUBVOLUME_DIMS;
  const outShape = sizes.map((n, d) => (n === 1 ? 1 : dims[d]));
  const vectors = outShape.map((n, d) => linspace(bounds[d][0], bounds[d][1], n));
  const regular = (axis: Axis): NdArray =>
    NdArray.fromFunction(outShape, (i, j, k) => vectors[axis - 1][axis === 1 ? i : axis === 2 ? j : k]);
  const draft: CoordinateTriple = [regular(1), regular(2), regular(3)];

  // Singleton axes take their coordinate from the source grid at the new positions.
  const source = grid.coordinates();
  const coords: CoordinateTriple = [
    sizes[0] === 1 ? new RegularGridInterpolator(axes, source[0].data, FLAT).sample(draft) : draft[0],
    sizes[1] === 1 ? new RegularGridInterpolator(axes, source[1].data, FLAT).sample(draft) : draft[1],
    sizes[2] === 1 ? new RegularGridInterpolator(axes, source[2].data, FLAT).sample(draft) : draft[2],
  ];
  return grid.derive(coords, interpolateFields(grid, draft, FLAT));
}
