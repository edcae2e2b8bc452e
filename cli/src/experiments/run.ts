// SPDX-License-Identifier: Apache-2.0
import { fileURLToPath } from "node:url";
import { createLog } from "../log";
import { runExperiment } from "./evaluate";
import { loadExperiments } from "./loader";
import { reportExperiments } from "./reporter";

export const DEFAULT_EXPERIMENTS_PATH = fileURLToPath(new URL("../../experiments/default.yaml", import.meta.url));

/** Run every experiment in the file. Returns whether all expectations held. */
export function runExperiments(options: { file?: string; verbose: boolean }): boolean {
  const log = createLog(options.verbose);
  const suite = loadExperiments(options.file ?? DEFAULT_EXPERIMENTS_PATH);
  log(`Loaded ${suite.experiments.length} experiments from ${suite.file}`);

  const results = suite.experiments.map((experiment) => {
    log(`Running "${experiment.name}"…`);
    return runExperiment(experiment);
  });
  return reportExperiments(suite.file, results);
}
