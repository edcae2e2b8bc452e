// SPDX-License-Identifier: Apache-2.0
import {
  createRng,
  createShuffle,
  maxUniformDeviation,
  simulate,
  stayProbability,
  type LandingDistribution,
} from "@elitist-shuffle/shared";
import type { Experiment, Expectations } from "./loader";

export interface ExpectationFailure {
  expectation: string;
  expected: string;
  actual: string;
}

export interface ExperimentResult {
  name: string;
  experiment: Experiment;
  distribution: LandingDistribution;
  /** Stay probability per initial position. */
  stay: number[];
  deviation: number;
  passed: boolean;
  failures: ExpectationFailure[];
}

function checkExpectations(expect: Expectations, deviation: number, topStay: number): ExpectationFailure[] {
  const failures: ExpectationFailure[] = [];

  if (expect.max_uniform_deviation !== undefined && deviation > expect.max_uniform_deviation) {
    failures.push({
      expectation: "max_uniform_deviation",
      expected: `<= ${expect.max_uniform_deviation}`,
      actual: deviation.toFixed(4),
    });
  }
  if (expect.min_uniform_deviation !== undefined && deviation < expect.min_uniform_deviation) {
    failures.push({
      expectation: "min_uniform_deviation",
      expected: `>= ${expect.min_uniform_deviation}`,
      actual: deviation.toFixed(4),
    });
  }
  if (expect.min_top_stay !== undefined && topStay < expect.min_top_stay) {
    failures.push({
      expectation: "min_top_stay",
      expected: `>= ${expect.min_top_stay}`,
      actual: topStay.toFixed(4),
    });
  }
  return failures;
}

export function runExperiment(experiment: Experiment): ExperimentResult {
  const shuffle = createShuffle(experiment.shuffle, {
    rng: createRng(experiment.seed),
    inequality: experiment.inequality,
  });
  const distribution = simulate(shuffle, experiment.items, experiment.simulations);
  const stay = Array.from({ length: experiment.items }, (_, i) => stayProbability(distribution, i));
  const deviation = maxUniformDeviation(distribution, experiment.items);
  const failures = checkExpectations(experiment.expect, deviation, experiment.items > 0 ? stay[0] : 0);

  return {
    name: experiment.name,
    experiment,
    distribution,
    stay,
    deviation,
    passed: failures.length === 0,
    failures,
  };
}
