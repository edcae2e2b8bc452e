// SPDX-License-Identifier: Apache-2.0
import type { Rng } from "../random";
import type { ShuffleProcedure } from "../simulate/aggregator";
import { elitistShuffle } from "./elitist";
import { uniformShuffle } from "./uniform";
import { assertInequality } from "./weights";

export const SHUFFLE_KINDS = ["elitist", "uniform", "identity", "reverse"] as const;

export type ShuffleKind = (typeof SHUFFLE_KINDS)[number];

export interface ShuffleOptions {
  rng: Rng;
  /** Only read by `elitist`. */
  inequality?: number;
}

/**
 * Build a shuffle procedure for the aggregator. `identity` and `reverse`
 * are deterministic baselines and never touch the rng.
 */
export function createShuffle(kind: ShuffleKind, options: ShuffleOptions): ShuffleProcedure {
  const { rng } = options;
  switch (kind) {
    case "elitist": {
      const inequality = options.inequality ?? 1;
      assertInequality(inequality);
      return (items) => elitistShuffle(items, inequality, rng);
    }
    case "uniform":
      return (items) => uniformShuffle(items, rng);
    case "identity":
      return (items) => items;
    case "reverse":
      return (items) => {
        items.reverse();
      };
  }
}
