// SPDX-License-Identifier: Apache-2.0
import type { Rng } from "../random";

/**
 * In-place Fisher-Yates shuffle. Returns nothing: the permutation is the
 * mutated array.
 */
export function uniformShuffle<T>(array: T[], rng: Rng): void {
  for (let i = array.length - 1; i > 0; i--) {
    const j = (rng() * (i + 1)) | 0;
    const tmp = array[i];
    array[i] = array[j];
    array[j] = tmp;
  }
}
