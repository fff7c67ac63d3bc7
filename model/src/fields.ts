import { COLOR_FIELD, DEFAULT_FIELD_NAME } from "./config.js";
import { InvalidFieldsError } from "./errors.js";
import { NdArray } from "./ndarray.js";

/** Two or more component arrays; three components form a directional vector. */
export type VectorField = readonly [NdArray, NdArray, ...NdArray[]];
export type FieldValue = NdArray | VectorField;
export type FieldMap = ReadonlyMap<string, FieldValue>;

export type FieldsInput = FieldMap | Readonly<Record<string, FieldValue>> | NdArray | readonly NdArray[];

export function isVectorField(value: FieldValue): value is VectorField {
  return !(value instanceof NdArray);
}

/** True for 3-component fields that follow the coordinate frame when it rotates. */
export function isDirectionalVector(name: string, value: FieldValue): value is VectorField {
  return isVectorField(value) && value.length === 3 && name !== COLOR_FIELD;
}

export function components(value: FieldValue): readonly NdArray[] {
  return isVectorField(value) ? value : [value];
}

export function mapField(value: FieldValue, fn: (component: NdArray) => NdArray): FieldValue {
  if (!isVectorField(value)) return fn(value);
  const [first, second, ...rest] = value;
  return [fn(first), fn(second), ...rest.map(fn)];
}

export function mapFields(fields: FieldMap, fn: (component: NdArray, name: string) => NdArray): FieldMap {
  const out = new Map<string, FieldValue>();
  for (const [name, value] of fields) {
    out.set(
      name,
      mapField(value, (c) => fn(c, name))
    );
  }
  return out;
}

function isFieldMap(input: FieldsInput): input is FieldMap {
  return input instanceof Map;
}

function isComponentList(input: FieldsInput | FieldValue): input is readonly NdArray[] {
  return Array.isArray(input);
}

function toVector(name: string, list: readonly NdArray[]): VectorField {
  const [first, second, ...rest] = list;
  if (first === undefined || second === undefined) {
    throw new InvalidFieldsError(`Field "${name}" needs at least two components, got ${list.length}`);
  }
  return [first, second, ...rest];
}

function checkValue(name: string, value: FieldValue): FieldValue {
  if (value instanceof NdArray) return value;
  if (isComponentList(value) && value.every((c) => c instanceof NdArray)) return toVector(name, value);
  throw new InvalidFieldsError(`Field "${name}" must be an array or a tuple of arrays`);
}

/**
 * Brings every accepted fields form into an ordered name map. A bare array or a
 * one-element tuple becomes `DataSet1`; longer tuples need names.
 */
export function normalizeFields(input?: FieldsInput): FieldMap {
  const out = new Map<string, FieldValue>();
  if (input === undefined) return out;
  if (input instanceof NdArray) {
    out.set(DEFAULT_FIELD_NAME, input);
    return out;
  }
  if (isComponentList(input)) {
    if (input.length === 1) {
      out.set(DEFAULT_FIELD_NAME, input[0]);
      return out;
    }
    throw new InvalidFieldsError(`Unnamed tuple of ${input.length} fields; give each field a name`);
  }
  const entries = isFieldMap(input) ? [...input.entries()] : Object.entries(input);
  for (const [name, value] of entries) {
    out.set(name, checkValue(name, value));
  }
  return out;
}

export function withField(fields: FieldMap, name: string, value: FieldValue): FieldMap {
  const out = new Map(fields);
  out.set(name, checkValue(name, value));
  return out;
}

export function withoutFields(fields: FieldMap, names: readonly string[]): FieldMap {
  const out = new Map(fields);
  for (const name of names) out.delete(name);
  return out;
}
