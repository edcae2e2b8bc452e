// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { createShuffle } from "./registry";
import { createRng } from "../random";
import { InvalidParameterError } from "../errors";

describe("createShuffle", () => {
  const rng = createRng("registry");

  test("identity returns its input", () => {
    const items = [0, 1, 2];
    expect(createShuffle("identity", { rng })(items)).toBe(items);
  });

  test("reverse works in place and returns nothing", () => {
    const items = [0, 1, 2, 3];
    expect(createShuffle("reverse", { rng })(items)).toBeUndefined();
    expect(items).toEqual([3, 2, 1, 0]);
  });

  test("uniform works in place and returns nothing", () => {
    const items = [0, 1, 2, 3, 4, 5];
    expect(createShuffle("uniform", { rng })(items)).toBeUndefined();
    expect([...items].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  test("elitist returns a new permutation", () => {
    const items = [0, 1, 2, 3, 4, 5];
    const out = createShuffle("elitist", { rng, inequality: 2 })(items);
    expect(out).not.toBe(items);
    expect(out).toHaveLength(6);
    expect(out).toEqual(expect.arrayContaining(items));
  });

  test("elitist rejects a negative inequality when built", () => {
    expect(() => createShuffle("elitist", { rng, inequality: -1 })).toThrow(InvalidParameterError);
  });
});
