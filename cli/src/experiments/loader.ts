// SPDX-License-Identifier: Apache-2.0
import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { DEFAULT_SIMULATIONS, SHUFFLE_KINDS } from "@elitist-shuffle/shared";
import { DEFAULT_INEQUALITY, DEFAULT_SEED } from "../options";

const ExpectationsSchema = z
  .object({
    max_uniform_deviation: z.number().min(0).optional(),
    min_uniform_deviation: z.number().min(0).optional(),
    min_top_stay: z.number().min(0).max(1).optional(),
  })
  .strict();

const ExperimentSchema = z
  .object({
    name: z.string().min(1),
    items: z.number().int().min(0),
    simulations: z.number().int().positive().default(DEFAULT_SIMULATIONS),
    shuffle: z.enum(SHUFFLE_KINDS).default("elitist"),
    inequality: z.number().finite().min(0).default(DEFAULT_INEQUALITY),
    seed: z.union([z.string(), z.number()]).transform(String).default(DEFAULT_SEED),
    expect: ExpectationsSchema.default({}),
  })
  .strict();

export type Experiment = z.infer<typeof ExperimentSchema>;
export type Expectations = z.infer<typeof ExpectationsSchema>;

export interface ExperimentSuite {
  file: string;
  experiments: Experiment[];
}

/** Parse and validate a YAML list of experiments. `file` is only used in messages. */
export function parseExperiments(raw: string, file: string): ExperimentSuite {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${file}: YAML parse error: ${msg}`);
  }

  if (!Array.isArray(parsed)) {
    throw new Error(`${file}: expected a YAML array of experiments`);
  }

  const experiments = parsed.map((entry: unknown, idx) => {
    const result = ExperimentSchema.safeParse(entry);
    if (!result.success) {
      const label = describeEntry(entry, idx);
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new Error(`${file}: experiment ${label} is invalid: ${details}`);
    }
    return result.data;
  });
  return { file, experiments };
}

function describeEntry(entry: unknown, idx: number): string {
  if (typeof entry === "object" && entry !== null && "name" in entry && typeof entry.name === "string") {
    return `${idx} ("${entry.name}")`;
  }
  return String(idx);
}

export function loadExperiments(filePath: string): ExperimentSuite {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Experiment file not found: ${filePath}`);
  }
  return parseExperiments(fs.readFileSync(filePath, "utf-8"), path.basename(filePath));
}
