// SPDX-License-Identifier: Apache-2.0
import { InvalidParameterError, ShapeMismatchError } from "../errors";

/** initial position → final position → probability, keys ascending. */
export type LandingDistribution = ReadonlyMap<number, ReadonlyMap<number, number>>;

export function assertItemCount(nItems: number): void {
  if (!Number.isInteger(nItems) || nItems < 0) {
    throw new InvalidParameterError(`item count must be an integer >= 0, got ${nItems}`);
  }
}

/**
 * Position of every item in `arrangement`, indexed by item. Throws unless
 * `arrangement` is a permutation of `0..nItems-1`.
 */
export function landingPositions(arrangement: readonly number[], nItems: number): Int32Array {
  if (arrangement.length !== nItems) {
    throw new ShapeMismatchError(
      `shuffle returned ${arrangement.length} items, expected ${nItems}`,
      nItems,
      arrangement.length,
    );
  }
  const positions = new Int32Array(nItems).fill(-1);
  for (let pos = 0; pos < nItems; pos++) {
    const item = arrangement[pos];
    if (!Number.isInteger(item) || item < 0 || item >= nItems) {
      throw new ShapeMismatchError(
        `shuffle returned unknown item ${item} at position ${pos}`,
        nItems,
        arrangement.length,
      );
    }
    if (positions[item] !== -1) {
      throw new ShapeMismatchError(
        `shuffle returned item ${item} twice (positions ${positions[item]} and ${pos})`,
        nItems,
        arrangement.length,
      );
    }
    positions[item] = pos;
  }
  return positions;
}

/**
 * Integer landing counts for one simulation run, one sparse row per initial
 * position holding only the final positions observed so far. Counting
 * instead of summing `1/trials` per observation keeps merges exact; the
 * division happens once in {@link toDistribution}.
 */
export class LandingTally {
  readonly nItems: number;
  private rows: Map<number, number>[];
  private _trials = 0;

  constructor(nItems: number) {
    assertItemCount(nItems);
    this.nItems = nItems;
    this.rows = Array.from({ length: nItems }, () => new Map<number, number>());
  }

  get trials(): number {
    return this._trials;
  }

  /** Count one trial's arrangement. Throws if it is not a permutation. */
  record(arrangement: readonly number[]): void {
    const positions = landingPositions(arrangement, this.nItems);
    for (let item = 0; item < this.nItems; item++) {
      const row = this.rows[item];
      const final = positions[item];
      row.set(final, (row.get(final) ?? 0) + 1);
    }
    this._trials++;
  }

  count(initial: number, final: number): number {
    return this.rows[initial]?.get(final) ?? 0;
  }

  merge(other: LandingTally): void {
    if (other.nItems !== this.nItems) {
      throw new ShapeMismatchError(
        `cannot merge a tally of ${other.nItems} items into one of ${this.nItems}`,
        this.nItems,
        other.nItems,
      );
    }
    other.rows.forEach((theirs, initial) => {
      const ours = this.rows[initial];
      for (const [final, c] of theirs) {
        ours.set(final, (ours.get(final) ?? 0) + c);
      }
    });
    this._trials += other._trials;
  }

  /**
   * Probabilities per initial position, final positions ascending. Only
   * final positions that were observed get an entry. A tally with no
   * trials yields an empty map.
   */
  toDistribution(): LandingDistribution {
    const dist = new Map<number, Map<number, number>>();
    if (this._trials === 0) return dist;
    this.rows.forEach((counts, initial) => {
      const row = new Map<number, number>();
      const finals = [...counts.keys()].sort((a, b) => a - b);
      for (const final of finals) {
        row.set(final, (counts.get(final) ?? 0) / this._trials);
      }
      dist.set(initial, row);
    });
    return dist;
  }
}

/** Sum partial tallies into a new one. Addition order does not matter. */
export function mergeTallies(tallies: readonly LandingTally[]): LandingTally {
  if (tallies.length === 0) {
    throw new InvalidParameterError("mergeTallies needs at least one tally");
  }
  const merged = new LandingTally(tallies[0].nItems);
  for (const t of tallies) merged.merge(t);
  return merged;
}
