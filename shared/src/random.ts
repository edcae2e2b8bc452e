// SPDX-License-Identifier: Apache-2.0

/** Uniform float in [0, 1). */
export type Rng = () => number;

export function fnv1a(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function mulberry32(seed: number): Rng {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded random source. String seeds are hashed with FNV-1a; numeric seeds
 * are used directly as the 32-bit state. Same seed always produces the
 * same stream.
 */
export function createRng(seed: string | number): Rng {
  return mulberry32(typeof seed === "string" ? fnv1a(seed) : seed);
}

/**
 * Derive `count` independent streams from one seed, one per slice of a
 * run that is split into partial tallies.
 */
export function splitRng(seed: string | number, count: number): Rng[] {
  return Array.from({ length: count }, (_, i) => createRng(`${seed}#${i}`));
}
