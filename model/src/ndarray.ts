import { ShapeMismatchError } from "./errors.js";

export type Dims = readonly [number, number, number];
export type Axis = 1 | 2 | 3;

function product(shape: readonly number[]): number {
  return shape.reduce((acc, n) => acc * n, 1);
}

function checkShape(shape: readonly number[]): void {
  if (shape.length === 0 || shape.length > 3) {
    throw new ShapeMismatchError(`Arrays must have 1 to 3 dimensions, got ${shape.length}`);
  }
  for (const n of shape) {
    if (!Number.isInteger(n) || n < 0) {
      throw new ShapeMismatchError(`Invalid axis length ${n} in shape [${shape.join(", ")}]`);
    }
  }
}

/** Pads a shape with singleton axes up to three dimensions. */
export function toDims(shape: readonly number[]): Dims {
  return [shape[0] ?? 1, shape[1] ?? 1, shape[2] ?? 1];
}

export function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((n, i) => n === b[i]);
}

/**
 * Dense numeric array of up to three dimensions. Storage runs first axis
 * fastest, so `(i, j, k)` lives at `i + n1 * (j + n2 * k)`.
 */
export class NdArray {
  readonly data: Float64Array;
  readonly shape: readonly number[];

  constructor(data: Float64Array, shape: readonly number[]) {
    checkShape(shape);
    if (product(shape) !== data.length) {
      throw new ShapeMismatchError(
        `Data of length ${data.length} does not fit shape [${shape.join(", ")}]`
      );
    }
    this.data = data;
    this.shape = [...shape];
  }

  static zeros(shape: readonly number[]): NdArray {
    return new NdArray(new Float64Array(product(shape)), shape);
  }

  static full(shape: readonly number[], value: number): NdArray {
    return new NdArray(new Float64Array(product(shape)).fill(value), shape);
  }

  static from(values: ArrayLike<number>, shape: readonly number[] = [values.length]): NdArray {
    return new NdArray(Float64Array.from(values), shape);
  }

  static fromFunction(shape: readonly number[], fn: (i: number, j: number, k: number) => number): NdArray {
    const out = NdArray.zeros(shape);
    const [n1, n2, n3] = toDims(shape);
    let p = 0;
    for (let k = 0; k < n3; k++) {
      for (let j = 0; j < n2; j++) {
        for (let i = 0; i < n1; i++) {
          out.data[p++] = fn(i, j, k);
        }
      }
    }
    return out;
  }

  get size(): number {
    return this.data.length;
  }

  get dims(): Dims {
    return toDims(this.shape);
  }

  index(i: number, j = 0, k = 0): number {
    const [n1, n2] = this.dims;
    return i + n1 * (j + n2 * k);
  }

  get(i: number, j = 0, k = 0): number {
    return this.data[this.index(i, j, k)];
  }

  set(value: number, i: number, j = 0, k = 0): void {
    this.data[this.index(i, j, k)] = value;
  }

  map(fn: (value: number, flat: number) => number): NdArray {
    const out = new Float64Array(this.data.length);
    for (let p = 0; p < out.length; p++) out[p] = fn(this.data[p], p);
    return new NdArray(out, this.shape);
  }

  /** Minimum ignoring NaN; NaN when nothing is finite. */
  min(): number {
    let best = Number.NaN;
    for (const v of this.data) {
      if (Number.isNaN(v)) continue;
      if (Number.isNaN(best) || v < best) best = v;
    }
    return best;
  }

  max(): number {
    let best = Number.NaN;
    for (const v of this.data) {
      if (Number.isNaN(v)) continue;
      if (Number.isNaN(best) || v > best) best = v;
    }
    return best;
  }

  /** NaN-ignoring mean; NaN when every value is NaN. */
  mean(): number {
    let sum = 0;
    let n = 0;
    for (const v of this.data) {
      if (Number.isNaN(v)) continue;
      sum += v;
      n++;
    }
    return n === 0 ? Number.NaN : sum / n;
  }

  /** Values along one axis at fixed positions on the other two. */
  line(axis: Axis, at: readonly [number, number] = [0, 0]): Float64Array {
    const [n1, n2, n3] = this.dims;
    const length = axis === 1 ? n1 : axis === 2 ? n2 : n3;
    const out = new Float64Array(length);
    for (let p = 0; p < length; p++) {
      if (axis === 1) out[p] = this.get(p, at[0], at[1]);
      else if (axis === 2) out[p] = this.get(at[0], p, at[1]);
      else out[p] = this.get(at[0], at[1], p);
    }
    return out;
  }

  reverseAxis(axis: Axis): NdArray {
    const [n1, n2, n3] = this.dims;
    return NdArray.fromFunction(this.shape, (i, j, k) =>
      this.get(axis === 1 ? n1 - 1 - i : i, axis === 2 ? n2 - 1 - j : j, axis === 3 ? n3 - 1 - k : k)
    );
  }

  /** Index box given as explicit index lists per axis; result is 3-D. */
  pickBox(iIdx: readonly number[], jIdx: readonly number[], kIdx: readonly number[]): NdArray {
    return NdArray.fromFunction([iIdx.length, jIdx.length, kIdx.length], (i, j, k) =>
      this.get(iIdx[i], jIdx[j], kIdx[k])
    );
  }

  /** Flat-index selection. */
  pick(indices: readonly number[], shape: readonly number[] = [indices.length]): NdArray {
    const out = new Float64Array(indices.length);
    indices.forEach((src, p) => {
      out[p] = this.data[src];
    });
    return new NdArray(out, shape);
  }

  equals(other: NdArray): boolean {
    if (!sameShape(this.shape, other.shape)) return false;
    return this.data.every((v, p) => v === other.data[p] || (Number.isNaN(v) && Number.isNaN(other.data[p])));
  }

  toArray(): number[] {
    return Array.from(this.data);
  }
}

/** Boolean array with the same layout as {@link NdArray}. */
export class Mask {
  readonly data: Uint8Array;
  readonly shape: readonly number[];

  constructor(data: Uint8Array, shape: readonly number[]) {
    checkShape(shape);
    if (product(shape) !== data.length) {
      throw new ShapeMismatchError(`Mask of length ${data.length} does not fit shape [${shape.join(", ")}]`);
    }
    this.data = data;
    this.shape = [...shape];
  }

  get(i: number, j = 0, k = 0): boolean {
    const [n1, n2] = toDims(this.shape);
    return this.data[i + n1 * (j + n2 * k)] === 1;
  }

  count(): number {
    let n = 0;
    for (const v of this.data) n += v;
    return n;
  }
}
