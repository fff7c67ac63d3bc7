import { describe, expect, it } from "vitest";
import { CartesianGrid, NdArray, createCartGrid, flipGrid, xyzGrid } from "geogrid-model";
import {
  aboveSurface,
  belowSurface,
  interpolateOnSurface,
  lithostaticPressure,
  subtractHorizontalMean,
} from "../src/index.js";
import { makeMoho, makeVolume } from "./fixtures.js";

describe("aboveSurface", () => {
  const moho = makeMoho();

  it("compares every node with the surface depth beneath it", () => {
    const above = aboveSurface(makeVolume(), moho);
    expect(above.get(0, 0, 11)).toBe(true);
    expect(above.get(0, 0, 10)).toBe(false);
    expect(belowSurface(makeVolume(), moho).get(0, 0, 10)).toBe(true);
  });

  it("follows the node order of a flipped grid", () => {
    const above = aboveSurface(flipGrid(makeVolume(), 3), moho);
    expect(above.get(0, 0, 1)).toBe(true);
    expect(above.get(0, 0, 2)).toBe(false);
  });

  it("works on CartGrid vertices", () => {
    const grid = createCartGrid({ size: [10, 20, 30], x: [0, 10], y: [0, 10], z: [-10, 2] });
    const [x, y] = xyzGrid(Array.from({ length: 11 }, (_, i) => i), Array.from({ length: 11 }, (_, i) => i), 0);
    const flat = new CartesianGrid({ x, y, z: NdArray.zeros(x.shape) });
    const above = aboveSurface(grid, flat);
    const column = Array.from({ length: 30 }, (_, k) => above.get(0, 0, k));
    expect(column.filter(Boolean)).toHaveLength(5);
    expect(belowSurface(grid, flat).count()).toBe(10 * 20 * 25);
  });

  it("leaves nodes outside the surface footprint unset", () => {
    const [x, y] = xyzGrid([0, 1], [0, 1], 0);
    const small = new CartesianGrid({ x, y, z: NdArray.zeros(x.shape) });
    const [gx, gy, gz] = xyzGrid([0.5, 5], [0.5], [1]);
    const above = aboveSurface(new CartesianGrid({ x: gx, y: gy, z: gz }), small);
    expect(above.get(0, 0, 0)).toBe(true);
    expect(above.get(1, 0, 0)).toBe(false);
  });
});

describe("interpolateOnSurface", () => {
  it("adds the volume fields at the surface nodes", () => {
    const onMoho = interpolateOnSurface(makeVolume(), makeMoho());
    expect(onMoho.fieldNames()).toEqual(["MohoDepth", "DepthData", "LonData", "Velocity"]);
    expect(onMoho.scalarField("DepthData").get(0, 0, 0)).toBeCloseTo(-60, 10);
    expect(onMoho.scalarField("LonData").get(3, 4, 0)).toBeCloseTo(13, 10);
  });
});

describe("subtractHorizontalMean", () => {
  const volume = makeVolume();

  it("removes the mean of each depth layer", () => {
    const anomaly = subtractHorizontalMean(volume.scalarField("DepthData"));
    expect(anomaly.toArray().every((v) => v === 0)).toBe(true);
  });

  it("returns percentages of the layer mean", () => {
    const percent = subtractHorizontalMean(volume.scalarField("LonData"), { percentage: true });
    expect(percent.get(0, 0, 0)).toBeCloseTo(-33.333, 3);
    expect(percent.get(10, 5, 7)).toBeCloseTo(33.333, 3);
  });

  it("treats the second axis of a 2-D array as the layers", () => {
    const sheet = NdArray.from([1, 3, Number.NaN, 10, 20, 30], [3, 2]);
    const anomaly = subtractHorizontalMean(sheet);
    expect(anomaly.get(0, 0)).toBe(-1);
    expect(anomaly.get(2, 0)).toBeNaN();
    expect(anomaly.get(2, 1)).toBe(10);
  });
});

describe("lithostaticPressure", () => {
  it("accumulates density down from a zero top layer", () => {
    const density = NdArray.from([1, 2, 3, 4, 5, 6], [2, 3]);
    const pressure = lithostaticPressure(density, 10, { g: 10 });
    expect(pressure.toArray()).toEqual([400, 600, 300, 400, 0, 0]);
    expect(density.toArray()).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("uses standard gravity along the third axis of a volume", () => {
    const column = lithostaticPressure(NdArray.full([1, 1, 4], 3000), 1000);
    const layer = 3000 * 9.81 * 1000;
    expect(column.get(0, 0, 3)).toBe(0);
    expect(column.get(0, 0, 2)).toBeCloseTo(layer, 3);
    expect(column.get(0, 0, 0)).toBeCloseTo(3 * layer, 3);
  });
});
