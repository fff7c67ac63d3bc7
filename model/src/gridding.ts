import { InvalidGridSpecError } from "./errors.js";
import { NdArray } from "./ndarray.js";

/** `n` evenly spaced values from `start` to `stop`, both ends exact. */
export function linspace(start: number, stop: number, n: number): Float64Array {
  const out = new Float64Array(Math.max(n, 0));
  if (n === 1) {
    out[0] = start;
    return out;
  }
  const step = (stop - start) / (n - 1);
  for (let p = 0; p < n; p++) out[p] = start + p * step;
  if (n > 1) out[n - 1] = stop;
  return out;
}

export type AxisInput = number | ArrayLike<number>;

function toVector(value: AxisInput): ArrayLike<number> {
  return typeof value === "number" ? [value] : value;
}

/**
 * Tensor product of three axis vectors, first axis fastest. Scalars become
 * singleton axes, so two vectors and a scalar give a surface.
 */
export function meshGrid(a: AxisInput, b: AxisInput, c: AxisInput): [NdArray, NdArray, NdArray] {
  if (typeof a === "number" && typeof b === "number" && typeof c === "number") {
    throw new InvalidGridSpecError("At least one coordinate must be a vector");
  }
  const [va, vb, vc] = [toVector(a), toVector(b), toVector(c)];
  const shape = [va.length, vb.length, vc.length];
  return [
    NdArray.fromFunction(shape, (i) => va[i]),
    NdArray.fromFunction(shape, (_i, j) => vb[j]),
    NdArray.fromFunction(shape, (_i, _j, k) => vc[k]),
  ];
}

export function lonLatDepthGrid(lon: AxisInput, lat: AxisInput, depth: AxisInput): [NdArray, NdArray, NdArray] {
  return meshGrid(lon, lat, depth);
}

export function xyzGrid(x: AxisInput, y: AxisInput, z: AxisInput): [NdArray, NdArray, NdArray] {
  return meshGrid(x, y, z);
}

/** Averages every cell's corner values, shrinking each non-singleton axis by one. */
export function averageCells(values: NdArray): NdArray {
  const [n1, n2, n3] = values.dims;
  const m = [n1, n2, n3].map((n) => Math.max(n - 1, 1));
  const offsets = (n: number): number[] => (n > 1 ? [0, 1] : [0]);
  return NdArray.fromFunction(m, (i, j, k) => {
    let sum = 0;
    let count = 0;
    for (const di of offsets(n1)) {
      for (const dj of offsets(n2)) {
        for (const dk of offsets(n3)) {
          sum += values.get(i + di, j + dj, k + dk);
          count++;
        }
      }
    }
    return sum / count;
  });
}
