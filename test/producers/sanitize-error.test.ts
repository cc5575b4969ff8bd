import { describe, expect, it } from "vitest"

import { areaSlug, sanitizeForError } from "../../src/producers/types.js"

describe("sanitizeForError", () => {
  it("strips Bearer tokens from messages", () => {
    expect(sanitizeForError("Listing request failed with Bearer test-secret")).toBe(
      "Listing request failed with Bearer [REDACTED]",
    )
  })

  it("strips Basic auth credentials from messages", () => {
    expect(sanitizeForError("Auth error with Basic dGVzdDp0ZXN0")).toBe(
      "Auth error with Basic [REDACTED]",
    )
  })

  it("strips sensitive query parameters from URLs", () => {
    expect(sanitizeForError("https://maps.example.com/search?key=test-secret&q=dentists")).toBe(
      "https://maps.example.com/search?key=%5BREDACTED%5D&q=dentists",
    )
  })

  it("strips query parameters embedded in a message", () => {
    expect(sanitizeForError("GET /search?q=dentists&token=test-secret returned 403")).toBe(
      "GET /search?q=dentists&token=[REDACTED] returned 403",
    )
  })

  it("truncates long messages to 200 characters", () => {
    const sanitized = sanitizeForError("x".repeat(250))

    expect(sanitized).toHaveLength(200)
    expect(sanitized.endsWith("...")).toBe(true)
  })

  it("keeps messages without secrets unchanged", () => {
    expect(sanitizeForError("No result list found in data/adyar.html")).toBe(
      "No result list found in data/adyar.html",
    )
    expect(sanitizeForError("")).toBe("")
  })
})

describe("areaSlug", () => {
  it("builds file-name slugs from area names", () => {
    expect(areaSlug("T. Nagar")).toBe("t-nagar")
    expect(areaSlug("  Anna Nagar West ")).toBe("anna-nagar-west")
    expect(areaSlug("Besant Nagar (2nd Ave)")).toBe("besant-nagar-2nd-ave")
    expect(areaSlug("Périyar")).toBe("periyar")
    expect(areaSlug("!!!")).toBe("area")
  })
})
