import { DEFAULT_ATTRIBUTE_NOTE } from "./config.js";
import { InvalidAttributesError, InvalidFieldsError, ShapeMismatchError } from "./errors.js";
import {
  type FieldMap,
  type FieldsInput,
  type FieldValue,
  components,
  isVectorField,
  normalizeFields,
  withField,
  withoutFields,
} from "./fields.js";
import { type Axis, type Dims, NdArray, sameShape, toDims } from "./ndarray.js";
import { type ShapeClass, classifyShape } from "./shape.js";
import { type CoordinateInput, type Unit, UnitArray } from "./units.js";
import { warn } from "./warnings.js";

export type GridKind = "geographic" | "cartesian" | "utm" | "ecef";
export type CoordinateTriple = readonly [NdArray, NdArray, NdArray];
export type Attributes = Readonly<Record<string, string>>;
export type AttributesInput = Attributes | ReadonlyMap<string, string>;
export type Range = readonly [number, number];
export type Extent = readonly [Range, Range, Range];

export interface GridOptions {
  fields?: FieldsInput;
  attributes?: AttributesInput;
}

interface GridDescriptor {
  kind: GridKind;
  label: string;
  names: readonly [string, string, string];
  units: readonly [Unit, Unit, Unit];
  checkAxisOrder: boolean;
}

function isAttributeMap(input: AttributesInput): input is ReadonlyMap<string, string> {
  return input instanceof Map;
}

function normalizeAttributes(input: AttributesInput | undefined): Attributes {
  if (input === undefined) return { note: DEFAULT_ATTRIBUTE_NOTE };
  let entries: [string, unknown][];
  if (isAttributeMap(input)) {
    entries = [...input.entries()];
  } else if (typeof input === "object" && input !== null && !Array.isArray(input)) {
    entries = Object.entries(input);
  } else {
    throw new InvalidAttributesError("Attributes must be a map of strings");
  }
  const out: Record<string, string> = {};
  for (const [key, value] of entries) {
    if (typeof value !== "string") {
      throw new InvalidAttributesError(`Attribute "${key}" must be a string`);
    }
    out[key] = value;
  }
  return out;
}

function maxStep(values: NdArray, axis: Axis): number {
  const [n1, n2, n3] = values.dims;
  let best = 0;
  for (let k = 0; k < n3; k++) {
    for (let j = 0; j < n2; j++) {
      for (let i = 0; i < n1; i++) {
        if ((axis === 1 && i === n1 - 1) || (axis === 2 && j === n2 - 1) || (axis === 3 && k === n3 - 1)) continue;
        const next = values.get(axis === 1 ? i + 1 : i, axis === 2 ? j + 1 : j, axis === 3 ? k + 1 : k);
        const step = Math.abs(next - values.get(i, j, k));
        if (step > best) best = step;
      }
    }
  }
  return best;
}

function checkAxisOrder(label: string, names: readonly [string, string, string], coords: CoordinateTriple): void {
  const dims = coords[0].dims;
  if (coords[0].shape.length !== 3 || dims.some((n) => n < 2)) return;
  const first = [maxStep(coords[0], 1), maxStep(coords[0], 2), maxStep(coords[0], 3)];
  if (first[1] > first[0] || first[2] > first[0]) {
    warn(`${label}: ${names[0]} changes faster along axis 2 or 3 than along axis 1; check the coordinate order`);
  }
  const second = [maxStep(coords[1], 1), maxStep(coords[1], 2), maxStep(coords[1], 3)];
  if (second[0] > second[1] || second[2] > second[1]) {
    warn(`${label}: ${names[1]} changes faster along axis 1 or 3 than along axis 2; check the coordinate order`);
  }
}

/**
 * Shared behaviour of the four coordinate-system variants. Coordinates are
 * stored in the variant's canonical units; every field component has the
 * coordinate shape. Instances never change; edits return siblings.
 */
export abstract class GridBase<Self extends GridBase<Self>> {
  readonly kind: GridKind;
  readonly label: string;
  readonly coordinateNames: readonly [string, string, string];
  readonly units: readonly [Unit, Unit, Unit];
  readonly fields: FieldMap;
  readonly attributes: Attributes;
  protected readonly coords: CoordinateTriple;

  protected constructor(
    descriptor: GridDescriptor,
    coords: readonly [CoordinateInput, CoordinateInput, CoordinateInput],
    options: GridOptions
  ) {
    this.kind = descriptor.kind;
    this.label = descriptor.label;
    this.coordinateNames = descriptor.names;
    this.units = descriptor.units;
    const [u1, u2, u3] = descriptor.units;
    this.coords = [
      UnitArray.from(coords[0], u1).to(u1).values,
      UnitArray.from(coords[1], u2).to(u2).values,
      UnitArray.from(coords[2], u3).to(u3).values,
    ];

    const shape = this.coords[0].shape;
    if (shape.length === 2) {
      throw new ShapeMismatchError(`${descriptor.label} coordinates must be 1-D points or 3-D grids`);
    }
    this.coords.forEach((c, p) => {
      if (!sameShape(c.shape, shape)) {
        throw new ShapeMismatchError(
          `${descriptor.names[p]} has shape [${c.shape.join(", ")}], expected [${shape.join(", ")}]`
        );
      }
    });

    this.fields = normalizeFields(options.fields);
    for (const [name, value] of this.fields) {
      for (const c of components(value)) {
        if (!sameShape(c.shape, shape)) {
          throw new ShapeMismatchError(
            `Field "${name}" has shape [${c.shape.join(", ")}], expected [${shape.join(", ")}]`
          );
        }
      }
    }

    this.attributes = normalizeAttributes(options.attributes);
    if (descriptor.checkAxisOrder) checkAxisOrder(descriptor.label, descriptor.names, this.coords);
  }

  /** Builds a sibling of the same variant; `sourceIndices` maps each new node to a source node. */
  abstract derive(coords: CoordinateTriple, fields: FieldMap, sourceIndices?: readonly number[]): Self;

  coordinates(): CoordinateTriple {
    return this.coords;
  }

  coordinate(axis: Axis): UnitArray {
    return new UnitArray(this.coords[axis - 1], this.units[axis - 1]);
  }

  get shape(): readonly number[] {
    return this.coords[0].shape;
  }

  get dims(): Dims {
    return toDims(this.shape);
  }

  get size(): number {
    return this.coords[0].size;
  }

  get shapeClass(): ShapeClass {
    return classifyShape(this.shape);
  }

  extent(): Extent {
    const [a, b, c] = this.coords;
    return [
      [a.min(), a.max()],
      [b.min(), b.max()],
      [c.min(), c.max()],
    ];
  }

  fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  field(name: string): FieldValue {
    const value = this.fields.get(name);
    if (value === undefined) {
      throw new InvalidFieldsError(`${this.label} has no field "${name}" (fields: ${this.fieldNames().join(", ")})`);
    }
    return value;
  }

  scalarField(name: string): NdArray {
    const value = this.field(name);
    if (isVectorField(value)) {
      throw new InvalidFieldsError(`Field "${name}" has ${value.length} components, expected a scalar`);
    }
    return value;
  }

  withFields(fields: FieldMap): Self {
    return this.derive(this.coords, fields);
  }

  addField(name: string, value: FieldValue): Self {
    return this.withFields(withField(this.fields, name, value));
  }

  addFields(values: Readonly<Record<string, FieldValue>>): Self {
    let fields = this.fields;
    for (const [name, value] of Object.entries(values)) fields = withField(fields, name, value);
    return this.withFields(fields);
  }

  removeField(names: string | readonly string[]): Self {
    return this.withFields(withoutFields(this.fields, typeof names === "string" ? [names] : names));
  }

  summary(): string {
    const extent = this.extent();
    const lines = [this.label, `  size      : [${this.shape.join(", ")}]`];
    this.coordinateNames.forEach((name, p) => {
      lines.push(`  ${name.padEnd(10)}in [ ${extent[p][0]} : ${extent[p][1]} ] ${this.units[p]}`);
    });
    const fieldList = [...this.fields].map(([name, value]) =>
      isVectorField(value) ? `${name} (${value.length} components)` : name
    );
    lines.push(`  fields    : ${fieldList.join(", ") || "none"}`);
    lines.push(`  attributes: ${Object.keys(this.attributes).join(", ") || "none"}`);
    return lines.join("\n");
  }
}

const GEOGRAPHIC: GridDescriptor = {
  kind: "geographic",
  label: "GeographicGrid",
  names: ["lon", "lat", "depth"],
  units: ["deg", "deg", "km"],
  checkAxisOrder: true,
};

export interface GeographicGridInit extends GridOptions {
  lon: CoordinateInput;
  lat: CoordinateInput;
  /** Negative below the surface; bare arrays are read as km. */
  depth: CoordinateInput;
}

export class GeographicGrid extends GridBase<GeographicGrid> {
  constructor(init: GeographicGridInit) {
    super(GEOGRAPHIC, [init.lon, init.lat, init.depth], init);
  }

  get lon(): NdArray {
    return this.coords[0];
  }

  get lat(): NdArray {
    return this.coords[1];
  }

  get depth(): NdArray {
    return this.coords[2];
  }

  derive(coords: CoordinateTriple, fields: FieldMap): GeographicGrid {
    return new GeographicGrid({ lon: coords[0], lat: coords[1], depth: coords[2], fields, attributes: this.attributes });
  }
}

const CARTESIAN: GridDescriptor = {
  kind: "cartesian",
  label: "CartesianGrid",
  names: ["x", "y", "z"],
  units: ["km", "km", "km"],
  checkAxisOrder: true,
};

export interface XyzGridInit extends GridOptions {
  x: CoordinateInput;
  y: CoordinateInput;
  z: CoordinateInput;
}

export class CartesianGrid extends GridBase<CartesianGrid> {
  constructor(init: XyzGridInit) {
    super(CARTESIAN, [init.x, init.y, init.z], init);
  }

  get x(): NdArray {
    return this.coords[0];
  }

  get y(): NdArray {
    return this.coords[1];
  }

  get z(): NdArray {
    return this.coords[2];
  }

  derive(coords: CoordinateTriple, fields: FieldMap): CartesianGrid {
    return new CartesianGrid({ x: coords[0], y: coords[1], z: coords[2], fields, attributes: this.attributes });
  }
}

const ECEF: GridDescriptor = {
  kind: "ecef",
  label: "EcefGrid",
  names: ["x", "y", "z"],
  units: ["km", "km", "km"],
  checkAxisOrder: false,
};

/** Earth-centred, earth-fixed coordinates. */
export class EcefGrid extends GridBase<EcefGrid> {
  constructor(init: XyzGridInit) {
    super(ECEF, [init.x, init.y, init.z], init);
  }

  get x(): NdArray {
    return this.coords[0];
  }

  get y(): NdArray {
    return this.coords[1];
  }

  get z(): NdArray {
    return this.coords[2];
  }

  derive(coords: CoordinateTriple, fields: FieldMap): EcefGrid {
    return new EcefGrid({ x: coords[0], y: coords[1], z: coords[2], fields, attributes: this.attributes });
  }
}

const UTM: GridDescriptor = {
  kind: "utm",
  label: "UtmGrid",
  names: ["ew", "ns", "depth"],
  units: ["m", "m", "m"],
  checkAxisOrder: true,
};

export interface UtmGridInit extends GridOptions {
  ew: CoordinateInput;
  ns: CoordinateInput;
  depth: CoordinateInput;
  /** One zone for every node, or one per node. */
  zone: number | readonly number[];
  northern: boolean | readonly boolean[];
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function broadcast<T>(value: T | readonly T[], size: number, name: string): readonly T[] {
  if (!isList(value)) return new Array<T>(size).fill(value);
  if (value.length !== size) {
    throw new ShapeMismatchError(`UtmGrid ${name} has ${value.length} entries, expected ${size}`);
  }
  return value;
}

export class UtmGrid extends GridBase<UtmGrid> {
  readonly zone: readonly number[];
  readonly northern: readonly boolean[];

  constructor(init: UtmGridInit) {
    super(UTM, [init.ew, init.ns, init.depth], init);
    this.zone = broadcast(init.zone, this.size, "zone");
    this.northern = broadcast(init.northern, this.size, "northern");
  }

  get ew(): NdArray {
    return this.coords[0];
  }

  get ns(): NdArray {
    return this.coords[1];
  }

  get depth(): NdArray {
    return this.coords[2];
  }

  derive(coords: CoordinateTriple, fields: FieldMap, sourceIndices?: readonly number[]): UtmGrid {
    const size = coords[0].size;
    let zone: number | readonly number[];
    let northern: boolean | readonly boolean[];
    if (sourceIndices !== undefined) {
      zone = sourceIndices.map((p) => this.zone[p]);
      northern = sourceIndices.map((p) => this.northern[p]);
    } else if (size === this.size) {
      zone = this.zone;
      northern = this.northern;
    } else {
      zone = this.zone[0];
      northern = this.northern[0];
    }
    return new UtmGrid({
      ew: coords[0],
      ns: coords[1],
      depth: coords[2],
      zone,
      northern,
      fields,
      attributes: this.attributes,
    });
  }
}

export type AnyGrid = GeographicGrid | CartesianGrid | UtmGrid | EcefGrid;
