import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { tmpdir } from "node:os"

import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { DedupGate } from "../../src/dedup/dedup-gate.js"
import { FingerprintCache } from "../../src/dedup/fingerprint-cache.js"
import { makeRecord } from "../helpers/records.js"

describe("DedupGate", () => {
  let tmpDir: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "dedup-gate-test-"))
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  it("accepts the first sighting and rejects every later one", () => {
    const gate = new DedupGate(new FingerprintCache(100))
    const original = makeRecord("Smile Dental", "12 Beach Rd")
    const sameBusiness = makeRecord("smile  DENTAL", "12 beach rd", { phone_number: "044-9" })

    expect(gate.admit(original)).toBe("accepted")
    expect(gate.admit(sameBusiness)).toBe("rejected")
    expect(gate.admit(original)).toBe("rejected")
    expect(gate.admit(makeRecord("Tooth Care", "Main Rd"))).toBe("accepted")
    expect(gate.stats).toEqual({ accepted: 2, rejected: 2, seeded: 0 })
  })

  it("seeds fingerprints from an existing artifact in any column order", async () => {
    const artifact = join(tmpDir, "existing.csv")
    await writeFile(
      artifact,
      'address,name,phone_number\n"12, Beach Rd",Sea View Clinic,044-1\nMain Rd,Tooth Care,\n',
    )
    const gate = new DedupGate(new FingerprintCache(100))

    expect(await gate.seedFromArtifact(artifact)).toBe(2)
    expect(gate.admit(makeRecord("Sea View Clinic", "12, Beach Rd"))).toBe("rejected")
    expect(gate.admit(makeRecord("tooth care", "main rd"))).toBe("rejected")
    expect(gate.admit(makeRecord("Pearl Dental", "Main Rd"))).toBe("accepted")
    expect(gate.stats).toEqual({ accepted: 1, rejected: 2, seeded: 2 })
  })

  it("seeds nothing from a missing artifact", async () => {
    const gate = new DedupGate(new FingerprintCache(10))
    expect(await gate.seedFromArtifact(join(tmpDir, "missing.csv"))).toBe(0)
    expect(gate.admit(makeRecord("Sea View Clinic", "12, Beach Rd"))).toBe("accepted")
  })
})
