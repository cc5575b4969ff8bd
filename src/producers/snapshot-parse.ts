import * as cheerio from "cheerio"
import { z } from "zod"

import { parseRawRecord } from "../records/record.js"
import type { BusinessRecord } from "../records/record.js"
import { coerceFloat, coerceInt } from "../utils/coerce.js"
import { firstText, isRecord, toRecordOrNull } from "../utils/type-guards.js"

const itemListLdSchema = z
  .object({
    "@type": z.literal("ItemList"),
    itemListElement: z.array(z.unknown()),
  })
  .loose()

const GENERIC_TYPES = new Set(["localbusiness", "place", "organization", "thing"])

export interface SnapshotParseResult {
  /** False when the page carries no result list at all (blocked or unexpected page). */
  listFound: boolean
  records: BusinessRecord[]
  /** List entries dropped because they lacked a usable name. */
  skipped: number
}

const coerceArray = (value: unknown): unknown[] => {
  if (Array.isArray(value)) {
    return value
  }
  return value === null || value === undefined ? [] : [value]
}

const formatAddress = (value: unknown): string => {
  if (typeof value === "string") {
    return value.trim()
  }
  const address = toRecordOrNull(value)
  if (!address) {
    return ""
  }
  return [
    address.streetAddress,
    address.addressLocality,
    address.addressRegion,
    address.postalCode,
  ]
    .map((part) => firstText(part))
    .filter((part): part is string => part !== null)
    .join(", ")
}

const placeType = (item: Record<string, unknown>): string => {
  const explicit = firstText(item.additionalType, item.category)
  if (explicit) {
    return explicit
  }
  const specific = coerceArray(item["@type"]).find(
    (type): type is string => typeof type === "string" && !GENERIC_TYPES.has(type.toLowerCase()),
  )
  return specific ?? ""
}

const openingHours = (value: unknown): string =>
  coerceArray(value)
    .map((entry) => firstText(entry))
    .filter((entry): entry is string => entry !== null)
    .join("; ")

interface ServiceFlags {
  store_shopping: boolean
  in_store_pickup: boolean
  store_delivery: boolean
}

/** Reads `amenityFeature` entries such as `{ name: "Delivery", value: true }`. */
const serviceFlags = (value: unknown): ServiceFlags => {
  const flags: ServiceFlags = { store_shopping: false, in_store_pickup: false, store_delivery: false }
  for (const feature of coerceArray(value)) {
    if (!isRecord(feature) || typeof feature.name !== "string") {
      continue
    }
    const enabled = feature.value === true || feature.value === "true" || feature.value === "Yes"
    const name = feature.name.toLowerCase()
    if (name.includes("pickup") || name.includes("pick-up")) {
      flags.in_store_pickup ||= enabled
    } else if (name.includes("delivery")) {
      flags.store_delivery ||= enabled
    } else if (name.includes("shopping")) {
      flags.store_shopping ||= enabled
    }
  }
  return flags
}

const toRawRecord = (item: Record<string, unknown>): Record<string, unknown> => {
  const rating = toRecordOrNull(item.aggregateRating)
  return {
    name: firstText(item.name) ?? "",
    address: formatAddress(item.address),
    website: firstText(item.url, ...coerceArray(item.sameAs)) ?? "",
    phone_number: firstText(item.telephone) ?? "",
    reviews_count: rating ? coerceInt(rating.reviewCount ?? rating.ratingCount) : null,
    reviews_average: rating ? coerceFloat(rating.ratingValue) : null,
    ...serviceFlags(item.amenityFeature),
    place_type: placeType(item),
    opens_at: openingHours(item.openingHours),
    introduction: firstText(item.description) ?? "",
  }
}

const listEntryItem = (entry: unknown): Record<string, unknown> | null => {
  const listItem = toRecordOrNull(entry)
  if (!listItem) {
    return null
  }
  return toRecordOrNull(listItem.item) ?? (listItem.name === undefined ? null : listItem)
}

const candidateObjects = (parsed: unknown): unknown[] =>
  coerceArray(parsed).flatMap((node) => {
    const graph = toRecordOrNull(node)?.["@graph"]
    return graph === undefined ? [node] : coerceArray(graph)
  })

/** Extracts businesses from the schema.org `ItemList` of a saved results page. */
export const parseSnapshotPage = (html: string): SnapshotParseResult => {
  const $ = cheerio.load(html)
  const records: BusinessRecord[] = []
  let listFound = false
  let skipped = 0

  for (const script of $('script[type="application/ld+json"]').toArray()) {
    const scriptText = $(script).text().trim()
    if (!scriptText) {
      continue
    }
    let parsed: unknown
    try {
      parsed = JSON.parse(scriptText)
    } catch {
      continue
    }

    for (const candidate of candidateObjects(parsed)) {
      const itemList = itemListLdSchema.safeParse(candidate)
      if (!itemList.success) {
        continue
      }
      listFound = true
      for (const entry of itemList.data.itemListElement) {
        const item = listEntryItem(entry)
        const result = item ? parseRawRecord(toRawRecord(item)) : null
        if (result?.success) {
          records.push(result.record)
        } else {
          skipped += 1
        }
      }
    }
  }

  return { listFound, records, skipped }
}
