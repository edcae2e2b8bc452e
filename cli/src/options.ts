// SPDX-License-Identifier: Apache-2.0
import { z } from "zod";
import { DEFAULT_SIMULATIONS, SHUFFLE_KINDS } from "@elitist-shuffle/shared";

export const DEFAULT_ITEMS = 10;
export const DEFAULT_INEQUALITY = 1;
export const DEFAULT_SEED = "elitist";

export const OUTPUT_FORMATS = ["table", "json"] as const;

const Items = z.coerce.number().int().min(0);
const Inequality = z.coerce.number().finite().min(0);
// cac turns numeric-looking values into numbers
const Seed = z.union([z.string(), z.number()]).transform(String);

export const SimulateOptionsSchema = z.object({
  items: Items.default(DEFAULT_ITEMS),
  simulations: z.coerce.number().int().positive().default(DEFAULT_SIMULATIONS),
  inequality: Inequality.default(DEFAULT_INEQUALITY),
  shuffle: z.enum(SHUFFLE_KINDS).default("elitist"),
  seed: Seed.default(DEFAULT_SEED),
  output: z.enum(OUTPUT_FORMATS).default("table"),
  verbose: z.boolean().default(false),
});

export type SimulateOptions = z.infer<typeof SimulateOptionsSchema>;

export const WeightsOptionsSchema = z.object({
  items: Items.default(DEFAULT_ITEMS),
  inequality: Inequality.default(DEFAULT_INEQUALITY),
});

export type WeightsOptions = z.infer<typeof WeightsOptionsSchema>;

/**
 * Value of `--name value` or `--name=value` exactly as typed, last one
 * winning. cac turns numeric-looking values into numbers, which would
 * read the seed `007` as `7`.
 */
export function rawFlagValue(args: readonly string[], name: string): string | undefined {
  const flag = `--${name}`;
  let value: string | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--") break;
    if (arg === flag && i + 1 < args.length) {
      value = args[i + 1];
      i++;
    } else if (arg.startsWith(`${flag}=`)) {
      value = arg.slice(flag.length + 1);
    }
  }
  return value;
}

/** Validate raw cac options, naming the offending flag on failure. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `--${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid options: ${details}`);
  }
  return parsed.data;
}
