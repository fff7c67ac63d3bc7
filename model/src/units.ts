import { ShapeMismatchError, UnitMismatchError } from "./errors.js";
import { NdArray } from "./ndarray.js";

export type LengthUnit = "km" | "m";
export type Unit = LengthUnit | "deg" | "none";

const METRES_PER: Record<LengthUnit, number> = { km: 1000, m: 1 };

export function isLengthUnit(unit: Unit): unit is LengthUnit {
  return unit === "km" || unit === "m";
}

/** Multiplier taking a value in `from` to `to`. */
export function conversionFactor(from: Unit, to: Unit): number {
  if (from === to) return 1;
  if (isLengthUnit(from) && isLengthUnit(to)) return METRES_PER[from] / METRES_PER[to];
  throw new UnitMismatchError(`Cannot convert ${from} to ${to}`);
}

/** An array of coordinate values bound to the unit they are expressed in. */
export class UnitArray {
  constructor(
    readonly values: NdArray,
    readonly unit: Unit
  ) {}

  /** Bare arrays take `defaultUnit`; unit-tagged input keeps its own. */
  static from(input: CoordinateInput, defaultUnit: Unit): UnitArray {
    return input instanceof UnitArray ? input : new UnitArray(input, defaultUnit);
  }

  get shape(): readonly number[] {
    return this.values.shape;
  }

  to(unit: Unit): UnitArray {
    if (unit === this.unit) return this;
    const source = this.unit;
    if (!isLengthUnit(source) || !isLengthUnit(unit)) {
      throw new UnitMismatchError(`Cannot convert ${source} to ${unit}`);
    }
    const from = METRES_PER[source];
    const to = METRES_PER[unit];
    return new UnitArray(
      this.values.map((v) => (v * from) / to),
      unit
    );
  }

  add(other: UnitArray | number): UnitArray {
    return this.combine(other, 1);
  }

  subtract(other: UnitArray | number): UnitArray {
    return this.combine(other, -1);
  }

  scale(k: number): UnitArray {
    return new UnitArray(
      this.values.map((v) => v * k),
      this.unit
    );
  }

  private combine(other: UnitArray | number, sign: 1 | -1): UnitArray {
    if (typeof other === "number") {
      const offset = sign * other;
      return new UnitArray(
        this.values.map((v) => v + offset),
        this.unit
      );
    }
    const rhs = other.to(this.unit).values;
    if (rhs.size !== this.values.size) {
      throw new ShapeMismatchError(`Cannot combine arrays of ${this.values.size} and ${rhs.size} values`);
    }
    return new UnitArray(
      this.values.map((v, p) => v + sign * rhs.data[p]),
      this.unit
    );
  }
}

export type CoordinateInput = UnitArray | NdArray;
