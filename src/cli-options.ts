import { z } from "zod"

import type { EnvConfig } from "./config.js"
import { MAX_CONCURRENCY } from "./jobs/job-spec.js"
import { PRODUCER_NAMES } from "./producers/registry.js"
import type { ProducerName } from "./producers/registry.js"
import { areaSlug } from "./producers/types.js"

export interface RunOptions {
  businessType: string
  areas: string[]
  areasFile: string | null
  region?: string
  perArea: number
  output: string
  append: boolean
  overwrite: boolean
  resume: boolean
  concurrency: number
  source: ProducerName
  sourceDir: string
  batchSize: number
  cacheCapacity: number
  strict: boolean
  preview: number
  plain: boolean
  verbose: boolean
  history: boolean
}

const numberOption = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .union([z.string(), z.number()])
    .transform((v) => Number(v))
    .pipe(z.number().int().min(min).max(max))

/** `--areas Adyar Velachery` and `--areas "Adyar,Velachery"` are equivalent. */
const areaListSchema = z.preprocess(
  (val) =>
    Array.isArray(val)
      ? val.flatMap((v) => String(v).split(",")).map((v) => v.trim()).filter(Boolean)
      : [],
  z.array(z.string()),
)

const runOptionsSchema = z
  .object({
    businessType: z.string().trim().min(1, "--business-type is required"),
    areas: areaListSchema,
    areasFile: z.string().trim().min(1).nullable(),
    region: z.string().trim().min(1).optional(),
    perArea: numberOption(1),
    output: z.string().trim().min(1).optional(),
    append: z.boolean().default(false),
    overwrite: z.boolean().default(false),
    resume: z.boolean().default(true),
    concurrency: numberOption(1, MAX_CONCURRENCY),
    source: z.enum(PRODUCER_NAMES),
    sourceDir: z.string().trim().min(1),
    batchSize: numberOption(1),
    cacheCapacity: numberOption(1),
    strict: z.boolean().default(false),
    preview: numberOption(0),
    plain: z.boolean().default(false),
    verbose: z.boolean().default(false),
    history: z.boolean().default(true),
  })
  .refine((opts) => opts.areas.length > 0 || opts.areasFile !== null, {
    message: "Provide --areas or --areas-file",
    path: ["areas"],
  })
  .refine((opts) => opts.areas.length === 0 || opts.areasFile === null, {
    message: "Use either --areas or --areas-file, not both",
    path: ["areasFile"],
  })

const formatIssue = (error: z.ZodError): string => {
  const issue = error.issues[0]
  const path = issue.path.join(".")
  return `Invalid option${path ? ` (${path})` : ""}: ${issue.message}`
}

export const defaultOutputFile = (businessType: string): string =>
  `output/${areaSlug(businessType)}.csv`

export const parseRunOptions = (opts: Record<string, unknown>, env: EnvConfig): RunOptions => {
  const raw = {
    businessType: opts["businessType"] ?? "",
    areas: opts["areas"],
    areasFile: opts["areasFile"] ?? null,
    region: opts["region"],
    perArea: opts["perArea"] ?? "20",
    output: opts["output"],
    append: opts["append"] ?? false,
    overwrite: opts["overwrite"] ?? false,
    resume: opts["resume"] ?? true,
    concurrency: opts["concurrency"] ?? env.concurrency,
    source: opts["source"] ?? "jsonl",
    sourceDir: opts["sourceDir"] ?? "data",
    batchSize: opts["batchSize"] ?? env.batchSize,
    cacheCapacity: opts["cacheCapacity"] ?? env.cacheCapacity,
    strict: opts["strict"] ?? false,
    preview: opts["preview"] ?? "10",
    plain: opts["plain"] ?? false,
    verbose: opts["verbose"] ?? false,
    history: opts["history"] ?? true,
  }
  const parsed = runOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    throw new Error(formatIssue(parsed.error))
  }
  const { output, ...rest } = parsed.data
  return { ...rest, output: output ?? defaultOutputFile(rest.businessType) }
}

export const parseLimitOption = (value: unknown, fallback: number): number => {
  const parsed = numberOption(1).safeParse(value ?? fallback)
  if (!parsed.success) {
    throw new Error(formatIssue(parsed.error))
  }
  return parsed.data
}
