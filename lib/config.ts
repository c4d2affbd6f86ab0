/**
 * @fileoverview Dataset generation configuration
 *
 * Read from the environment (scripts load `.env.local` through dotenv
 * first) and validated with zod. Every value has a default, so an empty
 * environment reproduces the reference dataset runs.
 *
 * @module lib/config
 */

import { z } from "zod"
import { ValidationError } from "@/lib/errors"

const booleanFromEnv = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

const DatasetEnvSchema = z.object({
  DATASET_SEED: z.coerce.number().int().default(12345),
  SAMPLE_RATIO: z.coerce.number().gt(0).max(1).default(1),
  STRICT_MODE: booleanFromEnv.default("true"),
  MAX_RETRY_ATTEMPTS: z.coerce.number().int().nonnegative().default(100),

  ATTACK_SEED: z.coerce.number().int().default(42),
  ATTACK_SAMPLE_SIZE: z.coerce.number().int().positive().default(100),
  MIN_ATTACK_TEXT_LENGTH: z.coerce.number().int().nonnegative().default(500),

  SOURCE_TRAIN_JSONL: z.string().min(1).default("data/train.jsonl"),
  SOURCE_TEST_JSONL: z.string().min(1).default("data/test.jsonl"),
  VARIANT_TRAIN_JSONL: z.string().min(1).default("data/train_with_variants.jsonl"),
  VARIANT_TEST_JSONL: z.string().min(1).default("data/test_with_variants.jsonl"),
  ATTACK_TRAIN_JSONL: z.string().min(1).default("data/train_with_attacks.jsonl"),
  ATTACK_TEST_JSONL: z.string().min(1).default("data/test_with_attacks.jsonl"),
})

export type DatasetConfig = z.output<typeof DatasetEnvSchema>

/**
 * Parse dataset configuration from an environment object.
 *
 * @throws {ValidationError} listing every invalid variable
 */
export function loadDatasetConfig(env: NodeJS.ProcessEnv = process.env): DatasetConfig {
  const parsed = DatasetEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return parsed.data
}
