// SPDX-License-Identifier: Apache-2.0
import type { LandingDistribution } from "./tally";

/** Dense `[initial][final]` probabilities, zero where nothing landed. */
export function landingMatrix(dist: LandingDistribution, nItems: number): number[][] {
  const matrix = Array.from({ length: nItems }, () => new Array<number>(nItems).fill(0));
  for (const [initial, row] of dist) {
    if (initial >= nItems) continue;
    for (const [final, p] of row) {
      if (final < nItems) matrix[initial][final] = p;
    }
  }
  return matrix;
}

/** `[final, probability]` pairs for one initial position, by final position. */
export function landingCurve(dist: LandingDistribution, initial: number): Array<[number, number]> {
  const row = dist.get(initial);
  if (!row) return [];
  return [...row.entries()].sort((a, b) => a[0] - b[0]);
}

/** Probability that `initial` ends up in one of the first `k` positions. */
export function cumulativeMass(dist: LandingDistribution, initial: number, k: number): number {
  let mass = 0;
  for (const [final, p] of dist.get(initial) ?? []) {
    if (final < k) mass += p;
  }
  return mass;
}

export function expectedPosition(dist: LandingDistribution, initial: number): number {
  let sum = 0;
  for (const [final, p] of dist.get(initial) ?? []) sum += final * p;
  return sum;
}

export function stayProbability(dist: LandingDistribution, initial: number): number {
  return dist.get(initial)?.get(initial) ?? 0;
}

/** Largest distance of any cell from the uniform `1/nItems`. */
export function maxUniformDeviation(dist: LandingDistribution, nItems: number): number {
  if (nItems === 0) return 0;
  const uniform = 1 / nItems;
  let worst = 0;
  for (const row of landingMatrix(dist, nItems)) {
    for (const p of row) worst = Math.max(worst, Math.abs(p - uniform));
  }
  return worst;
}

/** JSON-friendly copy, keys stringified. */
export function toRecord(dist: LandingDistribution): Record<string, Record<string, number>> {
  const out: Record<string, Record<string, number>> = {};
  for (const [initial, row] of dist) {
    const inner: Record<string, number> = {};
    for (const [final, p] of row) inner[String(final)] = p;
    out[String(initial)] = inner;
  }
  return out;
}
