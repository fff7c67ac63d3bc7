export * from "./errors.js";
export * from "./config.js";
export * from "./warnings.js";
export * from "./ndarray.js";
export * from "./units.js";
export * from "./fields.js";
export * from "./shape.js";
export * from "./grid.js";
export * from "./projection.js";
export * from "./convert.js";
export * from "./gridding.js";
export * from "./cartGrid.js";
