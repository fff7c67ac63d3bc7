import { describe, expect, it } from "vitest";
import { NdArray, ShapeMismatchError, UnsupportedDatasetShapeError } from "geogrid-model";
import { NAN_FILL, RegularGridInterpolator, gridAxes, nearestIndex, resampleGrid } from "../src/index.js";
import { makePoints, makeVolume } from "./fixtures.js";

describe("RegularGridInterpolator", () => {
  it("interpolates linearly along one axis", () => {
    const line = new RegularGridInterpolator([[0, 1, 2]], [0, 10, 40]);
    expect(line.at(0.5)).toBe(5);
    expect(line.at(1.5)).toBe(25);
    expect(line.at(2)).toBe(40);
  });

  it("clamps outside the axis unless a fill value is given", () => {
    expect(new RegularGridInterpolator([[0, 1, 2]], [0, 10, 40]).at(5)).toBe(40);
    expect(new RegularGridInterpolator([[0, 1, 2]], [0, 10, 40], NAN_FILL).at(5)).toBeNaN();
    expect(new RegularGridInterpolator([[0, 1, 2]], [0, 10, 40], { kind: "fill", value: -1 }).at(-3)).toBe(-1);
  });

  it("accepts descending axes", () => {
    expect(new RegularGridInterpolator([[2, 1, 0]], [40, 10, 0]).at(0.5)).toBe(5);
  });

  it("works bilinearly and treats length-1 axes as constant", () => {
    const plane = new RegularGridInterpolator(
      [
        [0, 1],
        [0, 1],
      ],
      [0, 1, 2, 3]
    );
    expect(plane.at(0.5, 0.5)).toBe(1.5);
    const strip = new RegularGridInterpolator([[0, 1], [7]], [1, 3]);
    expect(strip.at(0.5, 100)).toBe(2);
  });

  it("returns NaN for NaN input and rejects mismatched values", () => {
    expect(new RegularGridInterpolator([[0, 1]], [0, 1]).at(Number.NaN)).toBeNaN();
    expect(() => new RegularGridInterpolator([[0, 1, 2]], [0, 1])).toThrow(ShapeMismatchError);
  });
});

describe("nearestIndex", () => {
  it("breaks ties towards the smaller value in either direction", () => {
    expect(nearestIndex([0, 1, 2, 3], 1.5)).toBe(1);
    expect(nearestIndex([3, 2, 1, 0], 1.5)).toBe(2);
    expect(nearestIndex([0, 1, 2, 3], 10)).toBe(3);
  });
});

describe("grid resampling", () => {
  it("reads the axis vectors of a rectilinear grid", () => {
    const [lon, lat, depth] = gridAxes(makeVolume());
    expect(lon).toHaveLength(11);
    expect(lat[10]).toBe(40);
    expect(depth[0]).toBe(-300);
    expect(() => gridAxes(makePoints())).toThrow(UnsupportedDatasetShapeError);
  });

  it("resamples every field at new positions", () => {
    const targets = [NdArray.from([12.5]), NdArray.from([31]), NdArray.from([-110])] as const;
    const sampled = resampleGrid(makeVolume(), targets);
    expect(sampled.shapeClass.kind).toBe("point");
    expect(sampled.scalarField("DepthData").get(0)).toBeCloseTo(-220, 10);
    expect(sampled.scalarField("LonData").get(0)).toBeCloseTo(12.5, 10);
    expect(sampled.depth.get(0)).toBe(-110);
  });
});
