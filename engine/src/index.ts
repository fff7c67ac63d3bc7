export * from "./interpolate.js";
export * from "./subvolume.js";
export * from "./crossSection.js";
export * from "./votemap.js";
export * from "./surfaces.js";
