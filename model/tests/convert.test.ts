import { describe, expect, it } from "vitest";
import {
  CartesianGrid,
  GeographicGrid,
  NdArray,
  ProjectionPoint,
  cartesianToGeographic,
  enuToEcefVector,
  flipGrid,
  geographicToCartesian,
  geographicToEcef,
  geographicToUtm,
  isVectorField,
  lonLatAltToEcef,
  lonLatDepthGrid,
  lonLatToUtm,
  rotateTranslateScale,
  setWarningHandler,
  utmToGeographic,
  utmZoneOf,
  xyzGrid,
} from "../src/index.js";

describe("UTM zones", () => {
  it("follows the regular six-degree bands", () => {
    expect(utmZoneOf(8.2473, 49.9929)).toBe(32);
    expect(utmZoneOf(-177, 10)).toBe(1);
    expect(utmZoneOf(15, -35)).toBe(33);
  });

  it("applies the Norway and Svalbard exceptions", () => {
    expect(utmZoneOf(5, 60)).toBe(32);
    expect(utmZoneOf(10, 78)).toBe(33);
    expect(utmZoneOf(8, 78)).toBe(31);
  });
});

describe("projection point", () => {
  it("defaults to the reference location", () => {
    const proj = ProjectionPoint.fromLonLat();
    expect(proj.lat).toBe(49.9929);
    expect(proj.lon).toBe(8.2473);
    expect(proj.zone).toBe(32);
    expect(proj.northern).toBe(true);
  });

  it("round-trips through UTM", () => {
    const utm = lonLatToUtm(16.3, 35.7);
    const back = ProjectionPoint.fromUtm(utm.ew, utm.ns, utm.zone, utm.northern);
    expect(Math.abs(back.lon - 16.3)).toBeLessThan(1e-6);
    expect(Math.abs(back.lat - 35.7)).toBeLessThan(1e-6);
  });

  it("puts a zone's central meridian at 500 km easting", () => {
    expect(lonLatToUtm(9, 45).ew).toBeCloseTo(500000, 3);
  });
});

describe("grid conversions", () => {
  const [lon, lat, depth] = lonLatDepthGrid([7, 8, 9], [49, 50], [-10, 0]);
  const grid = new GeographicGrid({ lon, lat, depth, fields: { T: depth.map((d) => 10 - d) } });

  it("round-trips geographic data through per-point UTM", () => {
    const utm = geographicToUtm(grid);
    expect(utm.zone).toEqual(Array(12).fill(32));
    expect(utm.depth.get(0, 0, 0)).toBe(-10000);
    const back = utmToGeographic(utm);
    back.lon.data.forEach((v, p) => expect(Math.abs(v - lon.data[p])).toBeLessThan(1e-6));
    back.lat.data.forEach((v, p) => expect(Math.abs(v - lat.data[p])).toBeLessThan(1e-6));
    expect(back.depth.get(0, 0, 0)).toBe(-10);
    expect(back.scalarField("T").get(0, 0, 0)).toBe(20);
  });

  it("places the projection point at the Cartesian origin", () => {
    const proj = ProjectionPoint.fromLonLat({ lon: 8, lat: 50 });
    const cart = geographicToCartesian(grid, proj);
    expect(cart.x.get(1, 1, 0)).toBeCloseTo(0, 6);
    expect(cart.y.get(1, 1, 0)).toBeCloseTo(0, 6);
    expect(cart.z.get(1, 1, 0)).toBe(-10);
    const back = cartesianToGeographic(cart, proj);
    expect(back.lon.get(2, 0, 1)).toBeCloseTo(9, 6);
    expect(back.lat.get(2, 0, 1)).toBeCloseTo(49, 6);
  });
});

describe("ECEF", () => {
  it("puts the equator at the WGS84 semi-major axis", () => {
    const [x, y, z] = lonLatAltToEcef(0, 0, 0);
    expect(x).toBeCloseTo(6378137, 2);
    expect(y).toBeCloseTo(0, 4);
    expect(z).toBeCloseTo(0, 4);
  });

  it("rotates east/north/up into the earth frame", () => {
    const east = enuToEcefVector(0, 0, 1, 0, 0);
    expect(east[0]).toBeCloseTo(0, 12);
    expect(east[1]).toBeCloseTo(1, 12);
    const up = enuToEcefVector(90, 0, 0, 0, 1);
    expect(up[0]).toBeCloseTo(0, 12);
    expect(up[1]).toBeCloseTo(1, 12);
    const north = enuToEcefVector(0, 90, 0, 1, 0);
    expect(north[0]).toBeCloseTo(-1, 12);
    expect(north[2]).toBeCloseTo(0, 12);
  });

  it("converts grids and rotates every 3-vector except colors", () => {
    const infos: string[] = [];
    setWarningHandler((message, level) => {
      if (level === "info") infos.push(message);
    });
    const one = NdArray.from([1, 1]);
    const zero = NdArray.from([0, 0]);
    const points = new GeographicGrid({
      lon: NdArray.from([0, 45]),
      lat: NdArray.from([0, 30]),
      depth: NdArray.from([0, -10]),
      fields: { Velocity: [one, zero, zero], colors: [one, zero, zero], Speed: one },
    });
    const ecef = geographicToEcef(points);
    setWarningHandler(null);

    expect(ecef.x.get(0)).toBeCloseTo(6378.137, 5);
    const velocity = ecef.field("Velocity");
    const colors = ecef.field("colors");
    if (!isVectorField(velocity) || !isVectorField(colors)) throw new Error("expected vector fields");
    const [vx, vy, vz] = velocity;
    expect(vy.get(0)).toBeCloseTo(1, 12);
    const magnitude = Math.hypot(vx.get(1), vy.get(1), vz.get(1));
    expect(magnitude).toBeCloseTo(1, 12);
    expect(colors[0].get(1)).toBe(1);
    expect(ecef.field("Speed")).toBe(one);
    expect(infos).toEqual(['Rotating vector field "Velocity" from east/north/up into the ECEF frame']);
    expect(points.field("Velocity")).toEqual([one, zero, zero]);
  });
});

describe("flip and rigid transforms", () => {
  it("flips coordinates and fields along an axis", () => {
    const [lon, lat, depth] = lonLatDepthGrid([1, 2], [3, 4], [-2, -1, 0]);
    const grid = new GeographicGrid({ lon, lat, depth, fields: { D: depth } });
    const flipped = flipGrid(grid, 3);
    expect(flipped.depth.get(0, 0, 0)).toBe(0);
    expect(flipped.scalarField("D").get(1, 1, 2)).toBe(-2);
    expect(flipGrid(flipped, 3).depth.equals(depth)).toBe(true);
  });

  it("scales, rotates about the centre and translates", () => {
    const [x, y, z] = xyzGrid([0, 2], [0, 2], [-1, 0]);
    const grid = new CartesianGrid({ x, y, z });
    const moved = rotateTranslateScale(grid, { translate: [10, 20, 1] });
    expect(moved.x.get(1, 0, 0)).toBe(12);
    expect(moved.z.get(0, 0, 0)).toBe(0);
    const turned = rotateTranslateScale(grid, { rotate: 90 });
    expect(turned.x.get(1, 0, 0)).toBeCloseTo(2, 12);
    expect(turned.y.get(1, 0, 0)).toBeCloseTo(2, 12);
    const [ux, uy, uz] = xyzGrid([0, 1, 5], [0, 1], [0]);
    const uneven = rotateTranslateScale(new CartesianGrid({ x: ux, y: uy, z: uz }), { rotate: 180 });
    expect(uneven.x.get(2, 0, 0)).toBeCloseTo(-1, 12);
    expect(uneven.y.get(2, 0, 0)).toBeCloseTo(1, 12);
    const scaled = rotateTranslateScale(grid, { scale: 3 });
    expect(scaled.x.get(1, 1, 1)).toBe(6);
    expect(scaled.z.get(0, 0, 0)).toBe(-3);
  });
});
