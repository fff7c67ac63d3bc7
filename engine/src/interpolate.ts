import {
  type CoordinateTriple,
  type FieldMap,
  type GridBase,
  InvalidGridSpecError,
  NdArray,
  ShapeMismatchError,
  UnsupportedDatasetShapeError,
  mapFields,
} from "geogrid-model";

export type FillPolicy = { kind: "flat" } | { kind: "fill"; value: number };

export const FLAT: FillPolicy = { kind: "flat" };
export const NAN_FILL: FillPolicy = { kind: "fill", value: Number.NaN };

export interface NormalizedAxis {
  /** Axis values in increasing order. */
  values: Float64Array;
  reversed: boolean;
  /** Maps an index into `values` back to the source ordering. */
  toSource(index: number): number;
}

export function normalizeAxis(vector: ArrayLike<number>): NormalizedAxis {
  const n = vector.length;
  const reversed = n > 1 && vector[n - 1] < vector[0];
  const values = Float64Array.from(vector);
  if (reversed) values.reverse();
  return { values, reversed, toSource: (index) => (reversed ? n - 1 - index : index) };
}

/** Source index of the value closest to `target`; ties go to the smaller value. */
export function nearestIndex(vector: ArrayLike<number>, target: number): number {
  const axis = normalizeAxis(vector);
  let best = 0;
  let bestDistance = Number.POSITIVE_INFINITY;
  axis.values.forEach((v, i) => {
    const distance = Math.abs(v - target);
    if (distance < bestDistance) {
      best = i;
      bestDistance = distance;
    }
  });
  return axis.toSource(best);
}

interface Bracket {
  lo: number;
  hi: number;
  weight: number;
}

function bracket(axis: NormalizedAxis, x: number, policy: FillPolicy): Bracket | undefined {
  const v = axis.values;
  const n = v.length;
  if (n === 1) return { lo: 0, hi: 0, weight: 0 };
  let t = x;
  if (t < v[0] || t > v[n - 1]) {
    if (policy.kind === "fill") return undefined;
    t = Math.min(Math.max(t, v[0]), v[n - 1]);
  }
  let lo = 0;
  let hi = n - 1;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (v[mid] <= t) lo = mid;
    else hi = mid;
  }
  const span = v[hi] - v[lo];
  return { lo: axis.toSource(lo), hi: axis.toSource(hi), weight: span === 0 ? 0 : (t - v[lo]) / span };
}

/**
 * Multilinear interpolation on a rectilinear grid of one to three axes. Axes
 * may run in either direction; an axis of length 1 is treated as constant.
 * Values are laid out first axis fastest.
 */
export class RegularGridInterpolator {
  private readonly axes: NormalizedAxis[];
  private readonly strides: number[];

  constructor(
    axes: readonly ArrayLike<number>[],
    private readonly values: ArrayLike<number>,
    private readonly policy: FillPolicy = FLAT
  ) {
    if (axes.length < 1 || axes.length > 3) {
      throw new InvalidGridSpecError(`Interpolation needs 1 to 3 axes, got ${axes.length}`);
    }
    this.axes = axes.map(normalizeAxis);
    this.strides = [];
    let stride = 1;
    for (const axis of axes) {
      this.strides.push(stride);
      stride *= axis.length;
    }
    if (stride !== values.length) {
      throw new ShapeMismatchError(`Interpolation axes span ${stride} nodes but ${values.length} values were given`);
    }
  }

  at(...point: number[]): number {
    if (point.length !== this.axes.length) {
      throw new InvalidGridSpecError(`Expected ${this.axes.length} coordinates, got ${point.length}`);
    }
    if (point.some((x) => Number.isNaN(x))) return Number.NaN;
    const brackets: Bracket[] = [];
    for (let d = 0; d < point.length; d++) {
      const b = bracket(this.axes[d], point[d], this.policy);
      if (b === undefined) return this.policy.kind === "fill" ? this.policy.value : Number.NaN;
      brackets.push(b);
    }
    let sum = 0;
    for (let corner = 0; corner < 1 << brackets.length; corner++) {
      let weight = 1;
      let flat = 0;
      brackets.forEach((b, d) => {
        const upper = (corner >> d) & 1;
        weight *= upper ? b.weight : 1 - b.weight;
        flat += (upper ? b.hi : b.lo) * this.strides[d];
      });
      if (weight !== 0) sum += weight * this.values[flat];
    }
    return sum;
  }

  /** Evaluates at every node of the target arrays, which share one shape. */
  sample(targets: readonly NdArray[]): NdArray {
    const [first] = targets;
    if (first === undefined || targets.length !== this.axes.length) {
      throw new InvalidGridSpecError(`Expected ${this.axes.length} target arrays, got ${targets.length}`);
    }
    return first.map((_, p) => this.at(...targets.map((t) => t.data[p])));
  }
}

/** Axis vectors of a rectilinear grid: coordinate k read along axis k. */
export function gridAxes<G extends GridBase<G>>(grid: G): [Float64Array, Float64Array, Float64Array] {
  if (grid.shapeClass.kind === "point") {
    throw new UnsupportedDatasetShapeError(`${grid.label} holds scattered points, which have no grid axes`);
  }
  const [a, b, c] = grid.coordinates();
  return [a.line(1), b.line(2), c.line(3)];
}

/** Trilinear resampling of every field at the target coordinates. */
export function interpolateFields<G extends GridBase<G>>(
  grid: G,
  targets: CoordinateTriple,
  policy: FillPolicy = FLAT
): FieldMap {
  const axes = gridAxes(grid);
  return mapFields(grid.fields, (component) => new RegularGridInterpolator(axes, component.data, policy).sample(targets));
}

/** Resamples a grid onto new coordinates, fields included. */
export function resampleGrid<G extends GridBase<G>>(grid: G, targets: CoordinateTriple, policy: FillPolicy = FLAT): G {
  return grid.derive(targets, interpolateFields(grid, targets, policy));
}

export interface SurfaceSample {
  /** Interpolated value of the flat-axis coordinate (the surface depth). */
  depth: NdArray;
  fields: FieldMap;
}

/**
 * Bilinear sampling of a depth surface (flat third axis) at horizontal
 * positions, returning the surface depth and every field there.
 */
export function interpolateSurfaceFields<G extends GridBase<G>>(
  surface: G,
  first: NdArray,
  second: NdArray,
  policy: FillPolicy = NAN_FILL
): SurfaceSample {
  const shape = surface.shapeClass;
  if (shape.kind !== "surface" || shape.flatAxis !== 3) {
    throw new UnsupportedDatasetShapeError(`${surface.label} is not a depth surface`);
  }
  const [a1, a2] = gridAxes(surface);
  const sampleAt = (values: NdArray): NdArray =>
    new RegularGridInterpolator([a1, a2], values.data, policy).sample([first, second]);
  return {
    depth: sampleAt(surface.coordinates()[2]),
    fields: mapFields(surface.fields, sampleAt),
  };
}
