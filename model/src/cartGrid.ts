import { InvalidGridSpecError } from "./errors.js";
import type { FieldsInput } from "./fields.js";
import { type AnyGrid, type AttributesInput, CartesianGrid } from "./grid.js";
import { averageCells, linspace, meshGrid } from "./gridding.js";
import type { NdArray } from "./ndarray.js";

export type Bounds = readonly [number, number];

/**
 * Orthogonal grid with constant spacing, described by 1-D vectors. In 2-D the
 * axes are x and z; in 3-D x, y and z.
 */
export interface CartGrid {
  readonly kind: "cartgrid";
  readonly size: readonly number[];
  readonly spacing: readonly number[];
  readonly length: readonly number[];
  readonly min: readonly number[];
  readonly max: readonly number[];
  readonly coord1D: readonly Float64Array[];
  readonly coord1DCen: readonly Float64Array[];
}

export type CartGridSpec =
  | { size: number | readonly number[]; x: Bounds; y?: Bounds; z?: Bounds }
  | { size: number | readonly number[]; extent: number | readonly number[] };

function boundsFor(spec: CartGridSpec, dim: number): Bounds[] {
  if ("extent" in spec) {
    const extent = typeof spec.extent === "number" ? [spec.extent] : spec.extent;
    if (extent.length !== dim) {
      throw new InvalidGridSpecError(`extent has ${extent.length} entries for a ${dim}-D grid`);
    }
    if (dim === 1) return [[0, extent[0]]];
    if (dim === 2) return [[0, extent[0]], [-extent[1], 0]];
    return [[0, extent[0]], [0, extent[2]], [-extent[1], 0]];
  }
  const { x, y, z } = spec;
  if (dim === 1) return [x];
  if (dim === 2) {
    if (!z) throw new InvalidGridSpecError("A 2-D CartGrid needs x and z bounds");
    return [x, z];
  }
  if (!y || !z) throw new InvalidGridSpecError("A 3-D CartGrid needs x, y and z bounds");
  return [x, y, z];
}

export function createCartGrid(spec: CartGridSpec): CartGrid {
  const size = typeof spec.size === "number" ? [spec.size] : [...spec.size];
  const dim = size.length;
  if (dim < 1 || dim > 3) throw new InvalidGridSpecError(`CartGrid must be 1-D to 3-D, got ${dim}-D`);
  if (size.some((n) => !Number.isInteger(n) || n < 2)) {
    throw new InvalidGridSpecError(`CartGrid needs at least two points per axis, got [${size.join(", ")}]`);
  }
  const bounds = boundsFor(spec, dim);
  const min = bounds.map((b) => b[0]);
  const length = bounds.map((b) => b[1] - b[0]);
  const max = min.map((m, p) => m + length[p]);
  const spacing = length.map((l, p) => l / (size[p] - 1));
  return {
    kind: "cartgrid",
    size,
    spacing,
    length,
    min,
    max,
    coord1D: size.map((n, p) => linspace(min[p], max[p], n)),
    coord1DCen: size.map((n, p) => linspace(min[p] + spacing[p] / 2, max[p] - spacing[p] / 2, n - 1)),
  };
}

export function isCartGrid(value: unknown): value is CartGrid {
  return typeof value === "object" && value !== null && "kind" in value && value.kind === "cartgrid";
}

/** Vertex (or cell-centre) vectors of a CartGrid laid out as x, y, z. */
function cartAxes(grid: CartGrid, cell: boolean): [Float64Array, Float64Array, Float64Array] {
  const vectors = cell ? grid.coord1DCen : grid.coord1D;
  const zero = Float64Array.of(0);
  if (vectors.length === 1) return [vectors[0], zero, zero];
  if (vectors.length === 2) return [vectors[0], zero, vectors[1]];
  return [vectors[0], vectors[1], vectors[2]];
}

/**
 * 3-D coordinate arrays of a grid or CartGrid. A 2-D CartGrid becomes an x-z
 * sheet at y = 0. `cell` returns cell-centre coordinates.
 */
export function coordinateGrids(
  grid: AnyGrid | CartGrid,
  options: { cell?: boolean } = {}
): [NdArray, NdArray, NdArray] {
  const cell = options.cell ?? false;
  if (isCartGrid(grid)) {
    const [x, y, z] = cartAxes(grid, cell);
    return meshGrid(x, y, z);
  }
  const [a, b, c] = grid.coordinates();
  return cell ? [averageCells(a), averageCells(b), averageCells(c)] : [a, b, c];
}

export function cartesianGridFromCartGrid(
  grid: CartGrid,
  options: { fields?: FieldsInput; attributes?: AttributesInput } = {}
): CartesianGrid {
  const [x, y, z] = coordinateGrids(grid);
  return new CartesianGrid({ x, y, z, ...options });
}
