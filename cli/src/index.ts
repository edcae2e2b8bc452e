// SPDX-License-Identifier: Apache-2.0
import cac from "cac";
import {
  createRng,
  createShuffle,
  rankWeights,
  simulate,
} from "@elitist-shuffle/shared";
import { createLog } from "./log";
import { parseOptions, rawFlagValue, SimulateOptionsSchema, WeightsOptionsSchema } from "./options";
import { formatTable, formatWeights, toPayload } from "./report";
import { runExperiments } from "./experiments/run";

process.stdout.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EPIPE") process.exit(0);
  throw err;
});

function fail(err: unknown): never {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
}

const cli = cac("elitist-shuffle");

cli
  .command("simulate", "Measure where each initial rank lands after shuffling")
  .option("--items <n>", "Number of ranked items (default: 10)")
  .option("--simulations <n>", "Number of trials (default: 5000)")
  .option("--inequality <x>", "Bias exponent for the elitist shuffle, >= 0 (default: 1)")
  .option("--shuffle <kind>", "elitist, uniform, identity or reverse (default: elitist)")
  .option("--seed <seed>", "Random seed (default: elitist)")
  .option("--output <format>", "Output format: table, json (default: table)")
  .option("--verbose", "Print detailed progress")
  .action((raw: Record<string, unknown>) => {
    try {
      const options = parseOptions(SimulateOptionsSchema, {
        ...raw,
        seed: rawFlagValue(cli.rawArgs, "seed") ?? raw.seed,
      });
      const log = createLog(options.verbose);
      log(
        `Running ${options.simulations} trials of ${options.shuffle} over ${options.items} items (seed "${options.seed}")`,
      );
      const shuffle = createShuffle(options.shuffle, {
        rng: createRng(options.seed),
        inequality: options.inequality,
      });
      const dist = simulate(shuffle, options.items, options.simulations);

      if (options.output === "json") {
        process.stdout.write(JSON.stringify(toPayload(dist, options), null, 2) + "\n");
      } else {
        process.stdout.write(formatTable(dist, options.items));
      }
    } catch (err) {
      fail(err);
    }
  });

cli
  .command("weights", "Print the normalized rank weights for an inequality")
  .option("--items <n>", "Number of ranked items (default: 10)")
  .option("--inequality <x>", "Bias exponent, >= 0 (default: 1)")
  .action((raw: Record<string, unknown>) => {
    try {
      const options = parseOptions(WeightsOptionsSchema, raw);
      process.stdout.write(formatWeights(rankWeights(options.items, options.inequality)));
    } catch (err) {
      fail(err);
    }
  });

cli
  .command("experiments [file]", "Run a YAML suite of landing-distribution experiments")
  .option("--verbose", "Print detailed progress", { default: false })
  .action((file: string | undefined, options: { verbose: boolean }) => {
    let allPassed: boolean;
    try {
      allPassed = runExperiments({ file, verbose: options.verbose });
    } catch (err) {
      fail(err);
    }
    process.exit(allPassed ? 0 : 1);
  });

cli.help();
cli.parse();
