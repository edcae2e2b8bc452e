// SPDX-License-Identifier: Apache-2.0
import { InvalidParameterError } from "../errors";

export function assertInequality(inequality: number): void {
  if (!Number.isFinite(inequality) || inequality < 0) {
    throw new InvalidParameterError(
      `inequality must be a finite number >= 0, got ${inequality}`,
    );
  }
}

/**
 * Rank weights for `n` positions: base score `1 - i/n` raised to
 * `inequality`, then L1-normalized. Rank 0 always carries the largest
 * weight; an exponent of 0 makes every weight `1/n`.
 */
export function rankWeights(n: number, inequality: number): Float64Array {
  assertInequality(inequality);
  const weights = new Float64Array(n);
  let total = 0;
  for (let i = 0; i < n; i++) {
    weights[i] = (1 - i / n) ** inequality;
    total += weights[i];
  }
  for (let i = 0; i < n; i++) {
    weights[i] /= total;
  }
  return weights;
}
