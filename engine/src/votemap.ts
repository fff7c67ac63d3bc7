import {
  DEFAULT_VOTE_DIMS,
  type Extent,
  GeographicGrid,
  InvalidCriterionError,
  NdArray,
  OUTLIER_STD_LIMIT,
  UnsupportedDatasetShapeError,
} from "geogrid-model";
import { type Bounds, extractSubvolume } from "./subvolume.js";

export type ComparisonOp = "<" | "<=" | ">" | ">=" | "==" | "!=";

export interface Criterion {
  field: string;
  op: ComparisonOp;
  threshold: number;
}

export type CriterionInput = string | Criterion;

export type VoteExtent = "overlapping" | "maximum" | { lon: Bounds; lat: Bounds; depth: Bounds };

export interface VoteMapOptions {
  dims?: readonly [number, number, number];
  extent?: VoteExtent;
}

export const VOTE_FIELD = "votemap";
export const COVERAGE_FIELD = "coverage";

const CRITERION_PATTERN = /^\s*([A-Za-z_][\w.]*)\s*(<=|>=|==|!=|<|>)\s*(\S+)\s*$/;

function isComparisonOp(op: string): op is ComparisonOp {
  return op === "<" || op === "<=" || op === ">" || op === ">=" || op === "==" || op === "!=";
}

/** Parses `"<field> <op> <number>"`, e.g. `"Vs > 4.2"`. */
export function parseCriterion(input: CriterionInput): Criterion {
  if (typeof input !== "string") return input;
  const match = CRITERION_PATTERN.exec(input);
  if (!match) throw new InvalidCriterionError(`Cannot parse criterion "${input}"`);
  const [, field, op, raw] = match;
  const threshold = Number(raw);
  if (!isComparisonOp(op) || raw === "" || !Number.isFinite(threshold)) {
    throw new InvalidCriterionError(`Criterion "${input}" needs a numeric threshold`);
  }
  return { field, op, threshold };
}

export function compare(value: number, op: ComparisonOp, threshold: number): boolean {
  switch (op) {
    case "<":
      return value < threshold;
    case "<=":
      return value <= threshold;
    case ">":
      return value > threshold;
    case ">=":
      return value >= threshold;
    case "==":
      return value === threshold;
    case "!=":
      return !Number.isNaN(value) && value !== threshold;
  }
}

/** Common box of several datasets: their intersection, their union or an explicit box. */
export function commonExtent(datasets: readonly GeographicGrid[], extent: VoteExtent = "overlapping"): [Bounds, Bounds, Bounds] {
  if (typeof extent !== "string") return [extent.lon, extent.lat, extent.depth];
  const extents: Extent[] = datasets.map((d) => d.extent());
  const overlapping = extent === "overlapping";
  const axis = (d: number): Bounds => {
    const lows = extents.map((e) => e[d][0]);
    const highs = extents.map((e) => e[d][1]);
    return overlapping ? [Math.max(...lows), Math.min(...highs)] : [Math.min(...lows), Math.max(...highs)];
  };
  return [axis(0), axis(1), axis(2)];
}

function isList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function toList<T>(value: T | readonly T[]): readonly T[] {
  return isList(value) ? value : [value];
}

function resampleAll(
  datasets: readonly GeographicGrid[],
  bounds: [Bounds, Bounds, Bounds],
  dims: readonly [number, number, number]
): GeographicGrid[] {
  return datasets.map((dataset) => {
    if (dataset.shapeClass.kind !== "volume") {
      throw new UnsupportedDatasetShapeError(`Vote maps need volume data, got ${dataset.shapeClass.kind}`);
    }
    return extractSubvolume(dataset, { lon: bounds[0], lat: bounds[1], depth: bounds[2], interpolate: true, dims });
  });
}

/**
 * Counts, per cell of a common regular grid, how many datasets satisfy their
 * criterion. The result holds the counts in a `votemap` field.
 */
export function voteMap(
  datasets: GeographicGrid | readonly GeographicGrid[],
  criteria: CriterionInput | readonly CriterionInput[],
  options: VoteMapOptions = {}
): GeographicGrid {
  const sets = toList(datasets);
  const parsed = toList(criteria).map(parseCriterion);
  if (sets.length === 0 || sets.length !== parsed.length) {
    throw new InvalidCriterionError(`Got ${sets.length} datasets and ${parsed.length} criteria; give one criterion per dataset`);
  }
  sets.forEach((set, p) => {
    if (!set.hasField(parsed[p].field)) {
      throw new InvalidCriterionError(
        `Criterion field "${parsed[p].field}" is not in dataset ${p + 1} (fields: ${set.fieldNames().join(", ")})`
      );
    }
  });

  const dims = options.dims ?? DEFAULT_VOTE_DIMS;
  const resampled = resampleAll(sets, commonExtent(sets, options.extent), dims);
  const [base] = resampled;
  const votes = NdArray.zeros(base.shape);
  resampled.forEach((set, p) => {
    const { field, op, threshold } = parsed[p];
    const values = set.scalarField(field);
    values.data.forEach((v, i) => {
      if (compare(v, op, threshold)) votes.data[i] += 1;
    });
  });
  return new GeographicGrid({ lon: base.lon, lat: base.lat, depth: base.depth, fields: { [VOTE_FIELD]: votes } });
}

export interface StatisticalVoteOptions extends VoteMapOptions {
  /** Votes for anomalies beyond this many standard deviations; the sign picks the side. */
  thresholdStd?: number;
  meanCorrection?: boolean;
  /** Only cells deeper than this enter the statistics; read as negative down either way. */
  minDepth?: number;
  votes?: "absolute" | "relative";
}

export type StatisticalVoteResult =
  | { kind: "absolute"; grid: GeographicGrid; votes: NdArray }
  | { kind: "relative"; grid: GeographicGrid; scores: NdArray; coverage: NdArray };

interface Moments {
  mean: number;
  std: number;
}

function moments(values: readonly number[]): Moments {
  const n = values.length;
  if (n === 0) return { mean: Number.NaN, std: Number.NaN };
  const mean = values.reduce((acc, v) => acc + v, 0) / n;
  if (n === 1) return { mean, std: Number.NaN };
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (n - 1);
  return { mean, std: Math.sqrt(variance) };
}

function inside(value: number, range: readonly [number, number]): boolean {
  return value >= range[0] && value <= range[1];
}

/**
 * Votes for statistically anomalous cells across datasets. Each dataset is
 * resampled onto a common grid; cells outside its own bounding box or holding
 * 0 carry no coverage. Statistics come from covered cells deeper than
 * `minDepth`, with outliers beyond five standard deviations dropped.
 */
export function statisticalVoteMap(
  datasets: readonly GeographicGrid[],
  fieldNames: string | readonly string[],
  options: StatisticalVoteOptions = {}
): StatisticalVoteResult {
  const names = toList(fieldNames);
  if (datasets.length === 0 || (names.length !== 1 && names.length !== datasets.length)) {
    throw new InvalidCriterionError(`Got ${datasets.length} datasets and ${names.length} field names`);
  }
  const fieldFor = (p: number): string => (names.length === 1 ? names[0] : names[p]);
  datasets.forEach((set, p) => {
    if (!set.hasField(fieldFor(p))) {
      throw new InvalidCriterionError(`Field "${fieldFor(p)}" is not in dataset ${p + 1}`);
    }
  });

  const thresholdStd = options.thresholdStd ?? 1;
  const meanCorrection = options.meanCorrection ?? true;
  const minDepth = -Math.abs(options.minDepth ?? 0);
  const dims = options.dims ?? DEFAULT_VOTE_DIMS;
  const resampled = resampleAll(datasets, commonExtent(datasets, options.extent), dims);
  const [base] = resampled;
  const votes = NdArray.zeros(base.shape);
  const coverage = NdArray.zeros(base.shape);

  resampled.forEach((set, p) => {
    const [lonRange, latRange, depthRange] = datasets[p].extent();
    const values = set.scalarField(fieldFor(p));
    const covered = new Uint8Array(values.size);
    const sample: number[] = [];
    values.data.forEach((v, i) => {
      const within =
        inside(set.lon.data[i], lonRange) && inside(set.lat.data[i], latRange) && inside(set.depth.data[i], depthRange);
      if (!within || v === 0 || Number.isNaN(v)) return;
      covered[i] = 1;
      coverage.data[i] += 1;
      if (set.depth.data[i] < minDepth) sample.push(v);
    });

    const initial = moments(sample);
    const kept = sample.filter((v) => Math.abs(v - initial.mean) <= OUTLIER_STD_LIMIT * initial.std);
    const { mean, std } = moments(kept);
    if (Number.isNaN(std)) return;
    const limit = thresholdStd * std;
    values.data.forEach((v, i) => {
      if (!covered[i]) return;
      const anomaly = meanCorrection ? v - mean : v;
      if (thresholdStd >= 0 ? anomaly > limit : anomaly < limit) votes.data[i] += 1;
    });
  });

  const coords = { lon: base.lon, lat: base.lat, depth: base.depth };
  if (options.votes === "relative") {
    const scores = votes.map((v, i) => (coverage.data[i] === 0 ? 0 : v / coverage.data[i]));
    const grid = new GeographicGrid({ ...coords, fields: { [VOTE_FIELD]: scores, [COVERAGE_FIELD]: coverage } });
    return { kind: "relative", grid, scores, coverage };
  }
  const grid = new GeographicGrid({ ...coords, fields: { [VOTE_FIELD]: votes, [COVERAGE_FIELD]: coverage } });
  return { kind: "absolute", grid, votes };
}
