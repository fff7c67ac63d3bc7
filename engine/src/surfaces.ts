import {
  type AnyGrid,
  type CartGrid,
  type FieldValue,
  type GridBase,
  Mask,
  NdArray,
  coordinateGrids,
} from "geogrid-model";
import { NAN_FILL, interpolateFields, interpolateSurfaceFields } from "./interpolate.js";

/**
 * Marks the nodes of `data` lying strictly above (or below) a depth surface
 * given in the same frame. Nodes outside the surface footprint are false.
 */
export function aboveSurface<S extends GridBase<S>>(
  data: AnyGrid | CartGrid,
  surface: S,
  options: { above?: boolean } = {}
): Mask {
  const above = options.above ?? true;
  const [x, y, z] = coordinateGrids(data);
  const { depth } = interpolateSurfaceFields(surface, x, y, NAN_FILL);
  const out = new Uint8Array(z.size);
  z.data.forEach((v, p) => {
    const level = depth.data[p];
    if (Number.isNaN(level)) return;
    if (above ? v > level : v < level) out[p] = 1;
  });
  return new Mask(out, z.shape);
}

export function belowSurface<S extends GridBase<S>>(data: AnyGrid | CartGrid, surface: S): Mask {
  return aboveSurface(data, surface, { above: false });
}

/**
 * Samples the fields of a volume at the nodes of a surface in the same frame;
 * the surface keeps its own fields and gains the volume's.
 */
export function interpolateOnSurface<V extends GridBase<V>, S extends GridBase<S>>(volume: V, surface: S): S {
  const fields = new Map<string, FieldValue>(surface.fields);
  for (const [name, value] of interpolateFields(volume, surface.coordinates(), NAN_FILL)) {
    fields.set(name, value);
  }
  return surface.withFields(fields);
}

export interface HorizontalMeanOptions {
  /** Express the result as a percentage of the layer mean. */
  percentage?: boolean;
}

/**
 * Subtracts the mean of every horizontal layer (the last axis indexes the
 * layers) from a 2-D or 3-D array. NaN values are left out of the means.
 */
export function subtractHorizontalMean(values: NdArray, options: HorizontalMeanOptions = {}): NdArray {
  const [n1, n2, n3] = values.dims;
  const layered = values.shape.length === 3;
  const layers = layered ? n3 : n2;
  const perLayer = layered ? n1 * n2 : n1;
  const means = new Float64Array(layers);
  for (let layer = 0; layer < layers; layer++) {
    let sum = 0;
    let count = 0;
    for (let p = 0; p < perLayer; p++) {
      const v = values.data[layer * perLayer + p];
      if (Number.isNaN(v)) continue;
      sum += v;
      count++;
    }
    means[layer] = count === 0 ? Number.NaN : sum / count;
  }
  return values.map((v, p) => {
    const mean = means[Math.floor(p / perLayer)];
    return options.percentage ? ((v - mean) / mean) * 100 : v - mean;
  });
}

export interface LithostaticOptions {
  /** Gravitational acceleration, m/s². */
  g?: number;
}

/**
 * Lithostatic pressure from density, summed down the last axis from the top
 * layer (the highest index), which is held at zero. Each deeper layer adds its
 * own `density * g * dz`; units follow the inputs (kg/m³ and m give Pa).
 */
export function lithostaticPressure(density: NdArray, dz: number, options: LithostaticOptions = {}): NdArray {
  const g = options.g ?? 9.81;
  const [n1, n2, n3] = density.dims;
  const rank = density.shape.length;
  const layers = rank === 3 ? n3 : rank === 2 ? n2 : n1;
  const perLayer = rank === 3 ? n1 * n2 : rank === 2 ? n1 : 1;
  const out = NdArray.zeros(density.shape);
  for (let layer = layers - 2; layer >= 0; layer--) {
    for (let p = 0; p < perLayer; p++) {
      const at = layer * perLayer + p;
      out.data[at] = out.data[at + perLayer] + density.data[at] * g * dz;
    }
  }
  return out;
}
