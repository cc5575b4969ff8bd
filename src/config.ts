import { config as loadDotEnv } from "dotenv"
import { z } from "zod"

import { defaultDbPath } from "./db/store.js"
import type { SamplingBounds } from "./records/fingerprint.js"

loadDotEnv()

export interface EnvConfig {
  dbPath: string
  concurrency: number
  batchSize: number
  cacheCapacity: number
  sampling: SamplingBounds
}

const positiveInt = z.coerce.number().int().min(1)

const envSchema = z
  .object({
    AREA_HARVEST_DB_PATH: z.string().trim().optional(),
    AREA_HARVEST_CONCURRENCY: positiveInt.max(32).default(2),
    AREA_HARVEST_BATCH_SIZE: positiveInt.default(20),
    AREA_HARVEST_CACHE_CAPACITY: positiveInt.default(50_000),
    AREA_HARVEST_SAMPLE_MIN: positiveInt.default(1024),
    AREA_HARVEST_SAMPLE_MAX: positiveInt.default(8192),
  })
  .refine((env) => env.AREA_HARVEST_SAMPLE_MAX >= env.AREA_HARVEST_SAMPLE_MIN, {
    message: "AREA_HARVEST_SAMPLE_MAX must be >= AREA_HARVEST_SAMPLE_MIN",
    path: ["AREA_HARVEST_SAMPLE_MAX"],
  })

/** Empty variables count as unset. */
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => entry[1] !== undefined && entry[1].trim() !== "",
    ),
  )

export const readEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const parsed = envSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid environment${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  const values = parsed.data
  return {
    dbPath: values.AREA_HARVEST_DB_PATH || defaultDbPath(),
    concurrency: values.AREA_HARVEST_CONCURRENCY,
    batchSize: values.AREA_HARVEST_BATCH_SIZE,
    cacheCapacity: values.AREA_HARVEST_CACHE_CAPACITY,
    sampling: {
      minChars: values.AREA_HARVEST_SAMPLE_MIN,
      maxChars: values.AREA_HARVEST_SAMPLE_MAX,
    },
  }
}
