import { type Axis, type Dims, toDims } from "./ndarray.js";

export type ShapeClass =
  | { kind: "point"; count: number }
  | { kind: "surface"; shape: Dims; flatAxis: Axis }
  | { kind: "volume"; shape: Dims };

export type ShapeKind = ShapeClass["kind"];

/**
 * 1-D coordinates are scattered points; a 3-D shape with exactly one axis of
 * length 1 is a surface; anything else is a volume.
 */
export function classifyShape(shape: readonly number[]): ShapeClass {
  if (shape.length === 1) return { kind: "point", count: shape[0] };
  const dims = toDims(shape);
  const singletons: Axis[] = [];
  if (dims[0] === 1) singletons.push(1);
  if (dims[1] === 1) singletons.push(2);
  if (dims[2] === 1) singletons.push(3);
  if (singletons.length === 1) return { kind: "surface", shape: dims, flatAxis: singletons[0] };
  return { kind: "volume", shape: dims };
}
