import { describe, expect, it } from "vitest";
import { UnsupportedDatasetShapeError, flipGrid, geographicToEcef } from "geogrid-model";
import { extractIndexBox, extractSubvolume } from "../src/index.js";
import { makeMoho, makePoints, makeVolume } from "./fixtures.js";

describe("extractSubvolume", () => {
  const volume = makeVolume();

  it("copies the index box between the nearest nodes", () => {
    const box = extractSubvolume(volume, { lon: [10, 15], lat: [30, 32] });
    expect(box.shape).toEqual([6, 3, 13]);
    expect(box.scalarField("DepthData").data[10]).toBe(-600);
    expect(box.extent()[0]).toEqual([10, 15]);
  });

  it("returns the whole dataset without bounds", () => {
    const whole = extractSubvolume(volume);
    expect(whole.shape).toEqual(volume.shape);
    expect(whole.scalarField("DepthData").equals(volume.scalarField("DepthData"))).toBe(true);
  });

  it("returns a grid with a descending depth axis unchanged", () => {
    const flipped = flipGrid(volume, 3);
    const whole = extractSubvolume(flipped);
    expect(whole.depth.equals(flipped.depth)).toBe(true);
    expect(whole.scalarField("DepthData").equals(flipped.scalarField("DepthData"))).toBe(true);
  });

  it("keeps the storage order of an axis whatever the bound order", () => {
    const flipped = flipGrid(volume, 3);
    const box = extractSubvolume(flipped, { depth: [-50, 0] });
    expect(box.shape).toEqual([11, 11, 3]);
    expect(Array.from(box.depth.line(3))).toEqual([0, -25, -50]);
    const swapped = extractSubvolume(flipped, { depth: [0, -50] });
    expect(swapped.depth.equals(box.depth)).toBe(true);
  });

  it("resamples onto dims when interpolating", () => {
    const box = extractSubvolume(volume, { lon: [10, 15], lat: [30, 32], interpolate: true, dims: [51, 21, 32] });
    expect(box.shape).toEqual([51, 21, 32]);
    expect(box.scalarField("DepthData").data[10]).toBeCloseTo(-600, 9);
    expect(box.lon.get(10, 0, 0)).toBeCloseTo(11, 12);
  });

  it("keeps singleton axes of surfaces", () => {
    const part = extractSubvolume(makeMoho(), { lon: [12, 14], interpolate: true, dims: [5, 5, 5] });
    expect(part.shape).toEqual([5, 5, 1]);
    expect(part.depth.get(4, 0, 0)).toBeCloseTo(-26, 12);
  });

  it("filters scattered points by the box", () => {
    const picked = extractSubvolume(makePoints(), { lon: [15.2, 16.5], depth: [-50, -30] });
    expect(picked.scalarField("Mag").toArray()).toEqual([3]);
  });

  it("is not defined in the earth-centred frame", () => {
    expect(() => extractSubvolume(geographicToEcef(makePoints()))).toThrow(UnsupportedDatasetShapeError);
  });
});

describe("extractIndexBox", () => {
  it("copies explicit index lists", () => {
    const box = extractIndexBox(makeVolume(), [10, 0], [5], [12]);
    expect(box.shape).toEqual([2, 1, 1]);
    expect(box.scalarField("LonData").toArray()).toEqual([20, 10]);
  });
});
