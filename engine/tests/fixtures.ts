import { GeographicGrid, NdArray, linspace, lonLatDepthGrid } from "geogrid-model";

const range = (from: number, count: number): number[] => Array.from({ length: count }, (_, i) => from + i);

/** lon 10..20, lat 30..40 (1 degree), depth -300..0 km (25 km). */
export function makeVolume(): GeographicGrid {
  const [lon, lat, depth] = lonLatDepthGrid(range(10, 11), range(30, 11), linspace(-300, 0, 13));
  return new GeographicGrid({
    lon,
    lat,
    depth,
    fields: {
      DepthData: depth.map((d) => 2 * d),
      LonData: lon,
      Velocity: [depth, depth.map((d) => 2 * d), depth.map((d) => 3 * d)],
    },
  });
}

/** A dipping surface on the volume's footprint: depth = lon - 40. */
export function makeMoho(): GeographicGrid {
  const [lon, lat] = lonLatDepthGrid(range(10, 11), range(30, 11), 0);
  const depth = lon.map((v) => v - 40);
  return new GeographicGrid({ lon, lat, depth, fields: { MohoDepth: depth } });
}

export function makePoints(): GeographicGrid {
  return new GeographicGrid({
    lon: NdArray.from([15, 15.5, 16, 17]),
    lat: NdArray.from([35, 35, 36, 37]),
    depth: NdArray.from([-20, -26, -40, -25]),
    fields: { Mag: NdArray.from([1, 2, 3, 4]) },
  });
}

/** 5 x 5 x 5 block (lon 0..4, lat 0..4, depth -40..0) of ones with an optional spike. */
export function makeBlock(lonStart = 0, spike?: { at: readonly [number, number, number]; value: number }): GeographicGrid {
  const [lon, lat, depth] = lonLatDepthGrid(range(lonStart, 5), range(0, 5), linspace(-40, 0, 5));
  const value = NdArray.full(lon.shape, 1);
  if (spike) value.set(spike.value, ...spike.at);
  return new GeographicGrid({ lon, lat, depth, fields: { Value: value } });
}
