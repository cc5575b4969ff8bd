import { readFile } from "node:fs/promises"

import yaml from "js-yaml"
import { z } from "zod"

import { getErrorMessage } from "../utils/errors.js"

export interface AreasFile {
  region: string | null
  areas: string[]
}

const areaNames = z.array(z.string().trim().min(1, "area names must not be blank"))

const areasFileSchema = z.union([
  areaNames,
  z.object({
    region: z.string().trim().min(1).optional(),
    areas: areaNames,
  }),
])

/**
 * Accepts either a bare YAML list of areas or `{ region, areas }`.
 */
export const parseAreasFile = (text: string, source = "areas file"): AreasFile => {
  let document: unknown
  try {
    document = yaml.load(text)
  } catch (error) {
    throw new Error(`Cannot parse ${source}: ${getErrorMessage(error)}`, { cause: error })
  }

  const parsed = areasFileSchema.safeParse(document)
  if (!parsed.success) {
    throw new Error(`${source} must be a list of areas or { region, areas }`)
  }
  if (Array.isArray(parsed.data)) {
    return { region: null, areas: parsed.data }
  }
  return { region: parsed.data.region ?? null, areas: parsed.data.areas }
}

export const loadAreasFile = async (path: string): Promise<AreasFile> =>
  parseAreasFile(await readFile(path, "utf-8"), path)
