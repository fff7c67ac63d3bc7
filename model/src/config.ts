export const DEFAULT_PROJECTION = Object.freeze({ lat: 49.9929, lon: 8.2473 });

export const DEFAULT_ATTRIBUTE_NOTE = "No attributes were given to this dataset";
export const DEFAULT_FIELD_NAME = "DataSet1";
export const COLOR_FIELD = "colors";

export const DEFAULT_SECTION_DIMS: readonly [number, number] = [100, 100];
export const DEFAULT_SECTION_WIDTH_KM = 50;
export const DEFAULT_SUBVOLUME_DIMS: readonly [number, number, number] = [50, 50, 50];
export const DEFAULT_VOTE_DIMS: readonly [number, number, number] = [50, 50, 50];

/** Vertical offset of the second point spanning a diagonal section plane. */
export const PROFILE_PLANE_DEPTH_KM = 200;

/** Mean earth radius used for along-profile distances. */
export const EARTH_RADIUS_KM = 6371;

/** Cut-off, in standard deviations, for outliers in statistical vote maps. */
export const OUTLIER_STD_LIMIT = 5;

export function isQuiet(): boolean {
  return typeof process !== "undefined" && process.env?.GEOGRID_QUIET === "1";
}
