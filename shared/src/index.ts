// SPDX-License-Identifier: Apache-2.0
export { ShuffleError, InvalidParameterError, ShapeMismatchError } from "./errors";
export type { ShuffleErrorKind } from "./errors";

export { fnv1a, mulberry32, createRng, splitRng } from "./random";
export type { Rng } from "./random";

export { rankWeights, assertInequality } from "./shuffle/weights";
export { elitistShuffle } from "./shuffle/elitist";
export { uniformShuffle } from "./shuffle/uniform";
export { createShuffle, SHUFFLE_KINDS } from "./shuffle/registry";
export type { ShuffleKind, ShuffleOptions } from "./shuffle/registry";

export { simulate, simulateTally, DEFAULT_SIMULATIONS } from "./simulate/aggregator";
export type { ShuffleProcedure } from "./simulate/aggregator";
export { LandingTally, mergeTallies, landingPositions } from "./simulate/tally";
export type { LandingDistribution } from "./simulate/tally";
export {
  landingMatrix,
  landingCurve,
  cumulativeMass,
  expectedPosition,
  stayProbability,
  maxUniformDeviation,
  toRecord,
} from "./simulate/summary";
