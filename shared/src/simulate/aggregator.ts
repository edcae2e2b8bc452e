// SPDX-License-Identifier: Apache-2.0
import { InvalidParameterError } from "../errors";
import { assertItemCount, LandingTally, type LandingDistribution } from "./tally";

export const DEFAULT_SIMULATIONS = 5000;

/**
 * A shuffle under test. It may return the permuted sequence, or permute
 * `items` in place and return nothing.
 */
export type ShuffleProcedure = (items: number[]) => readonly number[] | void;

function isArrangement(value: readonly number[] | void): value is readonly number[] {
  return value !== undefined;
}

function assertSimulations(nSimulations: number): void {
  if (!Number.isInteger(nSimulations) || nSimulations <= 0) {
    throw new InvalidParameterError(`simulation count must be an integer > 0, got ${nSimulations}`);
  }
}

/** Run `nSimulations` trials of `shuffle` over `0..nItems-1` and count where each item lands. */
export function simulateTally(
  shuffle: ShuffleProcedure,
  nItems: number,
  nSimulations: number = DEFAULT_SIMULATIONS,
): LandingTally {
  assertItemCount(nItems);
  assertSimulations(nSimulations);

  const tally = new LandingTally(nItems);
  for (let t = 0; t < nSimulations; t++) {
    const items = Array.from({ length: nItems }, (_, i) => i);
    const result = shuffle(items);
    tally.record(isArrangement(result) ? result : items);
  }
  return tally;
}

/**
 * Empirical landing distribution of `shuffle`: for each initial position,
 * the probability of ending at each final position. Each observation
 * weighs `1/nSimulations`.
 */
export function simulate(
  shuffle: ShuffleProcedure,
  nItems: number,
  nSimulations: number = DEFAULT_SIMULATIONS,
): LandingDistribution {
  return simulateTally(shuffle, nItems, nSimulations).toDistribution();
}
