// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { simulate, simulateTally, type ShuffleProcedure } from "./aggregator";
import { cumulativeMass, stayProbability } from "./summary";
import { createRng } from "../random";
import { elitistShuffle } from "../shuffle/elitist";
import { uniformShuffle } from "../shuffle/uniform";
import { InvalidParameterError, ShapeMismatchError } from "../errors";

function rowSums(dist: ReturnType<typeof simulate>): number[] {
  return [...dist.values()].map(row => [...row.values()].reduce((a, b) => a + b, 0));
}

describe("simulate", () => {
  test("inequality 0 lands uniformly", () => {
    const rng = createRng("uniform-3");
    const dist = simulate(items => elitistShuffle(items, 0, rng), 3, 6000);
    expect(dist.size).toBe(3);
    for (const row of dist.values()) {
      for (let final = 0; final < 3; final++) {
        expect(Math.abs((row.get(final) ?? 0) - 1 / 3)).toBeLessThan(0.05);
      }
    }
  });

  test("in-place Fisher-Yates lands uniformly", () => {
    const rng = createRng("fisher-yates");
    const dist = simulate(items => uniformShuffle(items, rng), 4, 6000);
    for (const row of dist.values()) {
      for (let final = 0; final < 4; final++) {
        expect(Math.abs((row.get(final) ?? 0) - 0.25)).toBeLessThan(0.05);
      }
    }
  });

  test("higher ranks keep at least as much mass near the front", () => {
    const rng = createRng("monotone");
    const n = 5;
    const dist = simulate(items => elitistShuffle(items, 2, rng), n, 6000);
    for (let k = 1; k < n; k++) {
      for (let a = 0; a < n; a++) {
        for (let b = a + 1; b < n; b++) {
          expect(cumulativeMass(dist, a, k)).toBeGreaterThanOrEqual(cumulativeMass(dist, b, k));
        }
      }
    }
  });

  test("top rank stays put more often than under a uniform shuffle", () => {
    const rng = createRng("stay");
    const dist = simulate(items => elitistShuffle(items, 3, rng), 6, 3000);
    expect(stayProbability(dist, 0)).toBeGreaterThan(1 / 6 + 0.1);
  });

  test("every row sums to 1", () => {
    const rng = createRng("normalized");
    const dist = simulate(items => elitistShuffle(items, 1.3, rng), 7, 999);
    for (const sum of rowSums(dist)) {
      expect(sum).toBeCloseTo(1, 10);
    }
  });

  test("every trial is checked as a permutation", () => {
    const rng = createRng("bijection");
    const seen: number[][] = [];
    simulate(items => {
      const out = elitistShuffle(items, 1, rng);
      seen.push(out);
      return out;
    }, 6, 200);
    expect(seen).toHaveLength(200);
    for (const out of seen) {
      expect([...out].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);
    }
  });

  test("one item always stays at position 0", () => {
    const rng = createRng("single");
    const dist = simulate(items => elitistShuffle(items, 2, rng), 1);
    expect(dist).toEqual(new Map([[0, new Map([[0, 1]])]]));
  });

  test("a large item count only stores observed cells", () => {
    const n = 40000;
    const dist = simulate(items => items, n, 2);
    expect(dist.size).toBe(n);
    expect(dist.get(0)).toEqual(new Map([[0, 1]]));
    expect(dist.get(n - 1)).toEqual(new Map([[n - 1, 1]]));
    expect(dist.get(12345)?.size).toBe(1);
  });

  test("zero items gives an empty distribution", () => {
    const rng = createRng("empty");
    expect(simulate(items => elitistShuffle(items, 1, rng), 0, 100).size).toBe(0);
  });

  test("returning the arrangement and mutating in place are equivalent", () => {
    const returned: ShuffleProcedure = items => [...items].reverse();
    const inPlace: ShuffleProcedure = items => {
      items.reverse();
    };
    const expected = new Map([
      [0, new Map([[2, 1]])],
      [1, new Map([[1, 1]])],
      [2, new Map([[0, 1]])],
    ]);
    expect(simulate(returned, 3, 10)).toEqual(expected);
    expect(simulate(inPlace, 3, 10)).toEqual(expected);
  });

  test("each observation weighs 1/nSimulations", () => {
    let flip = false;
    const alternate: ShuffleProcedure = items => {
      flip = !flip;
      return flip ? items : [...items].reverse();
    };
    const dist = simulate(alternate, 2, 4);
    expect(dist.get(0)).toEqual(new Map([[0, 0.5], [1, 0.5]]));
    expect(dist.get(1)).toEqual(new Map([[0, 0.5], [1, 0.5]]));
  });

  describe("broken shuffles", () => {
    test("dropping an item is a shape mismatch", () => {
      expect(() => simulate(items => items.slice(1), 4, 10)).toThrow(ShapeMismatchError);
    });

    test("duplicating an item is a shape mismatch", () => {
      expect(() => simulate(() => [0, 0, 2], 3, 10)).toThrow(ShapeMismatchError);
    });

    test("an unknown item is a shape mismatch", () => {
      expect(() => simulate(() => [0, 1, 5], 3, 10)).toThrow(ShapeMismatchError);
    });

    test("the error carries both lengths", () => {
      try {
        simulate(items => [...items, 3], 3, 1);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ShapeMismatchError);
        if (e instanceof ShapeMismatchError) {
          expect(e.kind).toBe("ShapeMismatch");
          expect(e.expected).toBe(3);
          expect(e.actual).toBe(4);
        }
      }
    });
  });

  describe("parameter validation", () => {
    test.each([0, -1, 1.5, NaN])("simulation count %s is rejected", (nSimulations) => {
      expect(() => simulate(items => items, 3, nSimulations)).toThrow(InvalidParameterError);
    });

    test.each([-1, 2.5])("item count %s is rejected", (nItems) => {
      expect(() => simulate(items => items, nItems, 10)).toThrow(InvalidParameterError);
    });

    test("the shuffle is never called when parameters are invalid", () => {
      let calls = 0;
      expect(() => simulate(items => {
        calls++;
        return items;
      }, 3, 0)).toThrow(InvalidParameterError);
      expect(calls).toBe(0);
    });
  });
});

describe("simulateTally", () => {
  test("defaults to 5000 trials", () => {
    expect(simulateTally(items => items, 2).trials).toBe(5000);
  });
});
