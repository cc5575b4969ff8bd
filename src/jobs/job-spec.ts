import { z } from "zod"

import { InvalidJobSpecError } from "./errors.js"

export const MAX_CONCURRENCY = 32

const hasUniqueNames = (areas: string[]): boolean =>
  new Set(areas.map((area) => area.toLowerCase())).size === areas.length

export const jobSpecSchema = z.object({
  businessType: z.string().trim().min(1, "business type must not be blank"),
  areas: z
    .array(z.string().trim().min(1, "area names must not be blank"))
    .min(1, "at least one area is required")
    .refine(hasUniqueNames, "area names must be unique"),
  perArea: z
    .number()
    .int("results per area must be an integer")
    .positive("results per area must be at least 1"),
  outputFile: z.string().trim().min(1, "output file must not be blank"),
  append: z.boolean().default(false),
  /** Lets a fresh job truncate an artifact that already holds rows. */
  overwrite: z.boolean().default(false),
  concurrency: z
    .number()
    .int("concurrency must be an integer")
    .min(1, "concurrency must be at least 1")
    .max(MAX_CONCURRENCY, `concurrency must be at most ${MAX_CONCURRENCY}`)
    .default(2),
  region: z.string().trim().min(1).optional(),
  policy: z.enum(["partial", "strict"]).default("partial"),
})

export type JobSpecInput = z.input<typeof jobSpecSchema>
export type JobSpec = z.output<typeof jobSpecSchema>

export const parseJobSpec = (input: JobSpecInput): JobSpec => {
  const result = jobSpecSchema.safeParse(input)
  if (!result.success) {
    throw new InvalidJobSpecError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      ),
    )
  }
  return result.data
}

/** Text handed to producers, e.g. `"dentists in Adyar, Chennai"`. */
export const buildSearchQuery = (businessType: string, area: string, region?: string): string =>
  region ? `${businessType} in ${area}, ${region}` : `${businessType} in ${area}`
