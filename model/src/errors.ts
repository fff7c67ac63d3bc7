/**
 * Failures raised by grid construction and the engines. Every error is thrown
 * synchronously, before any numeric work starts.
 */
export class GridError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A coordinate or field component does not match the grid shape. */
export class ShapeMismatchError extends GridError {}

/** Attributes were neither a string map nor absent. */
export class InvalidAttributesError extends GridError {}

/** Fields could not be normalised into a named map, or a field is missing. */
export class InvalidFieldsError extends GridError {}

/** Two unit-tagged values were combined across incompatible units. */
export class UnitMismatchError extends GridError {}

/** A fixed section level lies outside the data extent. */
export class OutOfBoundsError extends GridError {}

/** `start` was given without `end`, or the other way round. */
export class MissingPairedParameterError extends GridError {}

/** The operation is not defined for this shape class or grid variant. */
export class UnsupportedDatasetShapeError extends GridError {}

/** A vote criterion could not be parsed or names an unknown field. */
export class InvalidCriterionError extends GridError {}

/** A cross-section request names zero or several geometries. */
export class InvalidSectionRequestError extends GridError {}

/** A CartGrid or coordinate-grid request is malformed. */
export class InvalidGridSpecError extends GridError {}
