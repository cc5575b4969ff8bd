import type { BusinessRecord } from "../records/record.js"

// ── Producer contract ───────────────────────────────────────────────

export interface ProduceRequest {
  area: string
  businessType: string
  /** Free-text search, e.g. `"dentists in Adyar, Chennai"`. */
  query: string
  /** Accepted-record cap of the area. Producers may yield more; the runner stops pulling. */
  limit: number
}

/**
 * Source of raw listings for one area. Records are yielded one at a time and
 * may repeat; deduplication happens downstream.
 */
export interface RecordProducer {
  readonly name: string
  produce(request: ProduceRequest, signal?: AbortSignal): AsyncIterable<BusinessRecord>
}

// ── Error model ─────────────────────────────────────────────────────

/** Unrecoverable extraction failure for one area. Never fails the whole job. */
export class ProducerError extends Error {
  constructor(
    readonly area: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ProducerError"
  }
}

const SENSITIVE_PARAM_NAMES = new Set([
  "apikey",
  "api_key",
  "token",
  "auth",
  "key",
  "secret",
  "password",
  "access_token",
  "bearer",
])

const MAX_MESSAGE_LENGTH = 200

/**
 * Strip sensitive query parameters and auth tokens from a URL or message
 * before it is stored as an area or job failure.
 */
export const sanitizeForError = (input: string): string => {
  let cleaned = input.replaceAll(/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, "$1 [REDACTED]")

  try {
    const url = new URL(cleaned)
    let hasSensitive = false
    for (const key of url.searchParams.keys()) {
      if (SENSITIVE_PARAM_NAMES.has(key.toLowerCase())) {
        url.searchParams.set(key, "[REDACTED]")
        hasSensitive = true
      }
    }
    if (hasSensitive) {
      cleaned = url.toString()
    }
  } catch {
    // not a bare URL; redact query-string fragments embedded in the message
    cleaned = cleaned.replaceAll(
      /([?&])(apikey|api_key|token|auth|key|secret|password|access_token|bearer)=[^&\s]*/gi,
      "$1$2=[REDACTED]",
    )
  }

  if (cleaned.length > MAX_MESSAGE_LENGTH) {
    return `${cleaned.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
  }
  return cleaned
}

/** File-name slug of an area: `"T. Nagar"` → `"t-nagar"`. */
export const areaSlug = (area: string): string => {
  const slug = area
    .normalize("NFKD")
    .replaceAll(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replaceAll(/[^a-z0-9]+/g, "-")
    .replaceAll(/^-+|-+$/g, "")
  return slug || "area"
}
