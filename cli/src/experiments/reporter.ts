// SPDX-License-Identifier: Apache-2.0
import type { ExperimentResult } from "./evaluate";

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

function statusIcon(passed: boolean): string {
  return passed ? `${GREEN}✓${RESET}` : `${RED}✗${RESET}`;
}

export function reportExperiments(file: string, results: ExperimentResult[]): boolean {
  let totalPassed = 0;
  let totalFailed = 0;

  process.stderr.write(`\n${DIM}── ${file} ──${RESET}\n`);

  for (const r of results) {
    const { items, simulations, shuffle, inequality } = r.experiment;
    const params = shuffle === "elitist" ? `${shuffle}, inequality ${inequality}` : shuffle;
    process.stderr.write(`  ${statusIcon(r.passed)} ${r.name} ${DIM}(${items} items × ${simulations} trials, ${params})${RESET}\n`);
    process.stderr.write(`    ${DIM}stay: ${r.stay.map((p) => p.toFixed(3)).join(" ")}${RESET}\n`);
    process.stderr.write(`    ${DIM}max deviation from uniform: ${r.deviation.toFixed(4)}${RESET}\n`);

    if (!r.passed) {
      for (const f of r.failures) {
        process.stderr.write(`    ${RED}${f.expectation}: expected ${f.expected}, got ${f.actual}${RESET}\n`);
      }
      totalFailed++;
    } else {
      totalPassed++;
    }
  }

  process.stderr.write("\n");

  const parts = [`${GREEN}${totalPassed} passed${RESET}`];
  if (totalFailed > 0) parts.push(`${RED}${totalFailed} failed${RESET}`);
  process.stderr.write(`${parts.join(", ")}\n`);

  return totalFailed === 0;
}
