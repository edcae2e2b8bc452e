// SPDX-License-Identifier: Apache-2.0
import {
  expectedPosition,
  landingMatrix,
  toRecord,
  type LandingDistribution,
} from "@elitist-shuffle/shared";
import type { SimulateOptions } from "./options";

const DECIMALS = 3;
const MIN_WIDTH = 6;

function pad(cell: string, width: number): string {
  return cell.padStart(width);
}

/**
 * Plain-text landing table: one row per initial position, one column per
 * final position, and the expected final position at the end.
 */
export function formatTable(dist: LandingDistribution, nItems: number): string {
  if (nItems === 0) return "(no items)\n";

  const width = Math.max(MIN_WIDTH, String(nItems - 1).length + 1);
  const header = ["from", ...Array.from({ length: nItems }, (_, i) => `→${i}`), "E[pos]"];
  const lines = [header.map((h) => pad(h, width)).join(" ")];

  landingMatrix(dist, nItems).forEach((row, initial) => {
    const cells = [
      String(initial),
      ...row.map((p) => p.toFixed(DECIMALS)),
      expectedPosition(dist, initial).toFixed(2),
    ];
    lines.push(cells.map((c) => pad(c, width)).join(" "));
  });
  return lines.join("\n") + "\n";
}

export interface SimulationPayload {
  items: number;
  simulations: number;
  inequality: number;
  shuffle: string;
  seed: string;
  distribution: Record<string, Record<string, number>>;
}

export function toPayload(dist: LandingDistribution, options: SimulateOptions): SimulationPayload {
  return {
    items: options.items,
    simulations: options.simulations,
    inequality: options.inequality,
    shuffle: options.shuffle,
    seed: options.seed,
    distribution: toRecord(dist),
  };
}

export function formatWeights(weights: Float64Array): string {
  return Array.from(weights, (w, rank) => `${rank}\t${w}`).join("\n") + (weights.length > 0 ? "\n" : "");
}
