// SPDX-License-Identifier: Apache-2.0
import type { Rng } from "../random";
import { rankWeights } from "./weights";

/**
 * Pick one pool slot with probability proportional to its weight among the
 * slots still in the pool. Returns -1 when the pool has no weight left.
 */
function drawSlot(weights: number[], rng: Rng): number {
  let total = 0;
  for (const w of weights) total += w;
  if (total <= 0) return -1;

  // Scaling the draw by the remaining total is the same as renormalizing
  // the remaining weights to sum to 1.
  const r = rng() * total;
  let acc = 0;
  let lastPositive = -1;
  for (let i = 0; i < weights.length; i++) {
    if (weights[i] <= 0) continue;
    acc += weights[i];
    lastPositive = i;
    if (r < acc) return i;
  }
  // r landed past the accumulated sum through rounding
  return lastPositive;
}

/**
 * Shuffle with a bias toward the initial ranking: items near the front are
 * more likely to stay near the front. `inequality` controls the strength of
 * the bias (0 is a uniform shuffle). Returns a new array; `items` is left
 * untouched.
 *
 * Each output slot is filled by weighted sampling without replacement over
 * the rank weights from {@link rankWeights}.
 */
export function elitistShuffle<T>(items: readonly T[], inequality: number, rng: Rng): T[] {
  const weights = rankWeights(items.length, inequality);
  const poolItems = [...items];
  const poolWeights = Array.from(weights);
  const out: T[] = [];

  while (poolItems.length > 0) {
    const slot = drawSlot(poolWeights, rng);
    if (slot < 0) {
      // Trailing weights underflowed to zero: keep the rest in rank order.
      out.push(...poolItems);
      break;
    }
    out.push(poolItems[slot]);
    poolItems.splice(slot, 1);
    poolWeights.splice(slot, 1);
  }
  return out;
}
