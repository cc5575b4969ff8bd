import { createHash } from "node:crypto"

import type { BusinessRecord } from "./record.js"

export interface SamplingBounds {
  /** Identity strings shorter than this are hashed in full. */
  minChars: number
  /** Hard cap on how much of an identity string is hashed. */
  maxChars: number
}

export const DEFAULT_SAMPLING: SamplingBounds = { minChars: 1024, maxChars: 8192 }

const FINGERPRINT_LENGTH = 16

export const validateSamplingBounds = (bounds: SamplingBounds): SamplingBounds => {
  if (!Number.isInteger(bounds.minChars) || bounds.minChars < 1) {
    throw new RangeError(`Sampling minimum must be a positive integer, got ${bounds.minChars}`)
  }
  if (!Number.isInteger(bounds.maxChars) || bounds.maxChars < bounds.minChars) {
    throw new RangeError(
      `Sampling maximum must be an integer >= ${bounds.minChars}, got ${bounds.maxChars}`,
    )
  }
  return bounds
}

export const normalizeIdentityPart = (value: string): string =>
  value.normalize("NFKC").toLowerCase().replaceAll(/\s+/g, " ").trim()

export const identityString = (name: string, address: string): string =>
  `${normalizeIdentityPart(name)}|${normalizeIdentityPart(address)}`

export const sampleWindow = (length: number, bounds: SamplingBounds): number =>
  Math.min(Math.max(length, bounds.minChars), bounds.maxChars)

export const sampleIdentity = (identity: string, bounds: SamplingBounds = DEFAULT_SAMPLING): string =>
  identity.slice(0, sampleWindow(identity.length, bounds))

export const fingerprintOf = (
  name: string,
  address: string,
  bounds: SamplingBounds = DEFAULT_SAMPLING,
): string =>
  createHash("sha1")
    .update(sampleIdentity(identityString(name, address), bounds))
    .digest("hex")
    .slice(0, FINGERPRINT_LENGTH)

export const fingerprintRecord = (
  record: Pick<BusinessRecord, "name" | "address">,
  bounds: SamplingBounds = DEFAULT_SAMPLING,
): string => fingerprintOf(record.name, record.address, bounds)
