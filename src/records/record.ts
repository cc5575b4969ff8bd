import { z } from "zod"

import { coerceFloat, coerceInt } from "../utils/coerce.js"

// ── Columns ─────────────────────────────────────────────────────────

/** Artifact column order for a freshly created CSV. */
export const RECORD_COLUMNS = [
  "name",
  "address",
  "website",
  "phone_number",
  "reviews_count",
  "reviews_average",
  "store_shopping",
  "in_store_pickup",
  "store_delivery",
  "place_type",
  "opens_at",
  "introduction",
] as const

export type RecordColumn = (typeof RECORD_COLUMNS)[number]

export type ServiceFlag = "Yes" | "No"

export interface BusinessRecord {
  readonly name: string
  readonly address: string
  readonly website: string
  readonly phone_number: string
  readonly reviews_count: number | null
  readonly reviews_average: number | null
  readonly store_shopping: ServiceFlag
  readonly in_store_pickup: ServiceFlag
  readonly store_delivery: ServiceFlag
  readonly place_type: string
  readonly opens_at: string
  readonly introduction: string
}

// ── Raw input normalization ─────────────────────────────────────────

const TRUTHY_FLAGS = new Set(["yes", "y", "true", "1", "available"])

export const toServiceFlag = (value: unknown): ServiceFlag => {
  if (typeof value === "boolean") {
    return value ? "Yes" : "No"
  }
  if (typeof value === "number") {
    return value === 1 ? "Yes" : "No"
  }
  if (typeof value === "string") {
    return TRUTHY_FLAGS.has(value.trim().toLowerCase()) ? "Yes" : "No"
  }
  return "No"
}

const toText = (value: unknown): string =>
  typeof value === "string" || typeof value === "number" ? String(value).trim() : ""

const optionalField = z.unknown().optional()

/**
 * Shape accepted from producers. Missing optional fields fall back to their
 * defaults; only `name` is required.
 */
export const rawRecordSchema = z
  .object({
    name: z.string().trim().min(1, "Record name is required"),
    address: optionalField,
    website: optionalField,
    phone_number: optionalField,
    reviews_count: optionalField,
    reviews_average: optionalField,
    store_shopping: optionalField,
    in_store_pickup: optionalField,
    store_delivery: optionalField,
    place_type: optionalField,
    opens_at: optionalField,
    introduction: optionalField,
  })
  .transform(
    (raw): BusinessRecord => ({
      name: raw.name,
      address: toText(raw.address),
      website: toText(raw.website),
      phone_number: toText(raw.phone_number),
      reviews_count: coerceInt(raw.reviews_count),
      reviews_average: coerceFloat(raw.reviews_average),
      store_shopping: toServiceFlag(raw.store_shopping),
      in_store_pickup: toServiceFlag(raw.in_store_pickup),
      store_delivery: toServiceFlag(raw.store_delivery),
      place_type: toText(raw.place_type),
      opens_at: toText(raw.opens_at),
      introduction: toText(raw.introduction),
    }),
  )

export type RawRecordResult =
  | { success: true; record: BusinessRecord }
  | { success: false; message: string }

export const parseRawRecord = (value: unknown): RawRecordResult => {
  const result = rawRecordSchema.safeParse(value)
  if (result.success) {
    return { success: true, record: Object.freeze(result.data) }
  }
  const issue = result.error.issues[0]
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : ""
  return { success: false, message: `${path}${issue.message}` }
}

// ── Header resolution ───────────────────────────────────────────────

/** Record column behind each header cell, `null` where the record has no value. */
export type HeaderLayout = readonly (RecordColumn | null)[]

// Identity columns also match a cell that contains their name, e.g. "Business Name".
const LOOSE_COLUMNS: readonly RecordColumn[] = ["name", "address"]

const normalizeHeaderCell = (cell: string): string =>
  cell.trim().toLowerCase().replaceAll(/[\s-]+/g, "_")

/**
 * Maps an artifact header onto record columns, ignoring case, blanks and
 * `-`/`_` differences. Each record column is claimed by one cell at most.
 */
export const resolveHeader = (header: readonly string[]): HeaderLayout => {
  const cells = header.map(normalizeHeaderCell)
  const layout: (RecordColumn | null)[] = cells.map(() => null)

  for (const column of RECORD_COLUMNS) {
    const index = cells.indexOf(column)
    if (index !== -1 && layout[index] === null) {
      layout[index] = column
    }
  }
  for (const column of LOOSE_COLUMNS) {
    if (layout.includes(column)) {
      continue
    }
    const index = cells.findIndex((cell, position) => layout[position] === null && cell.includes(column))
    if (index !== -1) {
      layout[index] = column
    }
  }
  return layout
}

// ── CSV projection ──────────────────────────────────────────────────

const cellValue = (record: BusinessRecord, column: RecordColumn | null): string => {
  if (column === null) {
    return ""
  }
  const value = record[column]
  return value === null ? "" : String(value)
}

/** Projects a record onto a resolved header; unmatched columns stay empty. */
export const toCsvRow = (record: BusinessRecord, layout: HeaderLayout): string[] =>
  layout.map((column) => cellValue(record, column))

export const toDisplayRow = (record: BusinessRecord): Record<string, string> =>
  Object.fromEntries(RECORD_COLUMNS.map((column) => [column, cellValue(record, column)]))
