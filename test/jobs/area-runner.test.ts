import { describe, expect, it } from "vitest"

import { DedupGate } from "../../src/dedup/dedup-gate.js"
import { FingerprintCache } from "../../src/dedup/fingerprint-cache.js"
import { AreaRunner } from "../../src/jobs/area-runner.js"
import type { AreaRunnerConfig } from "../../src/jobs/area-runner.js"
import type { JobEvent } from "../../src/jobs/types.js"
import { WriterError } from "../../src/output/types.js"
import { CancellationError } from "../../src/utils/cancel.js"
import { FunctionProducer, MemoryWriter, inMemoryProducer, makeRecord } from "../helpers/records.js"

const clinicA = makeRecord("Smile Dental", "12 Beach Rd")
const clinicB = makeRecord("Tooth Care", "Main Rd")
const clinicC = makeRecord("Pearl Dental", "Temple St")

const setup = (overrides: Partial<AreaRunnerConfig> = {}) => {
  const events: JobEvent[] = []
  const writer = new MemoryWriter()
  const runner = new AreaRunner({
    jobId: "job-1",
    area: "Adyar",
    businessType: "dentists",
    region: "Chennai",
    perArea: 10,
    producer: inMemoryProducer({}),
    gate: new DedupGate(new FingerprintCache(100)),
    writer,
    publish: (event) => events.push(event),
    now: () => new Date("2026-01-01T00:00:00.000Z"),
    ...overrides,
  })
  return { runner, events, writer }
}

describe("AreaRunner", () => {
  it("accepts unique records and counts duplicates", async () => {
    const producer = inMemoryProducer({ Adyar: [clinicA, clinicA, clinicB] })
    const { runner, events, writer } = setup({ producer })

    await runner.run(new AbortController().signal)

    expect(runner.snapshot()).toEqual({
      area: "Adyar",
      status: "completed",
      accepted: 2,
      duplicates: 1,
      raw: 3,
      error: null,
      startedAt: "2026-01-01T00:00:00.000Z",
      endedAt: "2026-01-01T00:00:00.000Z",
    })
    expect(writer.records).toEqual([clinicA, clinicB])
    expect(producer.requests).toEqual([
      { area: "Adyar", businessType: "dentists", query: "dentists in Adyar, Chennai", limit: 10 },
    ])
    expect(events.map((event) => event.type)).toEqual([
      "area-state",
      "area-progress",
      "area-progress",
      "area-progress",
      "area-state",
    ])
  })

  it("reports each record with its admission in progress events", async () => {
    const { runner, events } = setup({ producer: inMemoryProducer({ Adyar: [clinicA, clinicA] }) })

    await runner.run(new AbortController().signal)

    const progress = events.flatMap((event) =>
      event.type === "area-progress" ? [[event.accepted, event.duplicates, event.admitted]] : [],
    )
    expect(progress).toEqual([
      [1, 0, true],
      [1, 1, false],
    ])
  })

  it("stops pulling once the per-area cap is reached", async () => {
    let pulled = 0
    const producer = new FunctionProducer(async function* () {
      for (const record of [clinicA, clinicB, clinicC]) {
        pulled += 1
        yield record
      }
    })
    const { runner, writer } = setup({ producer, perArea: 2 })

    await runner.run(new AbortController().signal)

    expect(runner.status).toBe("completed")
    expect(writer.records).toEqual([clinicA, clinicB])
    expect(pulled).toBe(2)
  })

  it("counts duplicates beyond the cap only until the cap is reached", async () => {
    const producer = inMemoryProducer({ Adyar: [clinicA, clinicA, clinicA, clinicB, clinicC] })
    const { runner } = setup({ producer, perArea: 2 })

    await runner.run(new AbortController().signal)

    expect(runner.snapshot()).toMatchObject({ accepted: 2, duplicates: 2, raw: 4 })
  })

  it("fails the area when the producer throws, keeping accepted records", async () => {
    const producer = inMemoryProducer({ Adyar: [clinicA, new Error("blocked by captcha")] })
    const { runner, writer } = setup({ producer })

    await runner.run(new AbortController().signal)

    expect(runner.snapshot()).toMatchObject({
      status: "failed",
      accepted: 1,
      error: "blocked by captcha",
    })
    expect(writer.records).toEqual([clinicA])
  })

  it("uses the producer name when the failure has no message", async () => {
    const { runner } = setup({ producer: inMemoryProducer({ Adyar: [new Error("  ")] }) })

    await runner.run(new AbortController().signal)

    expect(runner.snapshot().error).toBe("test producer failed")
  })

  it("redacts credentials from failure details", async () => {
    const producer = inMemoryProducer({
      Adyar: [new Error("Request failed with Bearer test-secret")],
    })
    const { runner } = setup({ producer })

    await runner.run(new AbortController().signal)

    expect(runner.snapshot().error).toBe("Request failed with Bearer [REDACTED]")
  })

  it("fails without starting when the signal is already aborted", async () => {
    const producer = inMemoryProducer({ Adyar: [clinicA] })
    const { runner, events } = setup({ producer })
    const controller = new AbortController()
    controller.abort(new CancellationError("stopped"))

    await runner.run(controller.signal)

    expect(runner.snapshot()).toMatchObject({
      status: "failed",
      error: "Cancelled: stopped",
      startedAt: null,
      raw: 0,
    })
    expect(producer.requests).toEqual([])
    expect(events).toHaveLength(1)
  })

  it("fails and re-throws when the writer fails", async () => {
    const writer = new MemoryWriter(2)
    const { runner } = setup({
      producer: inMemoryProducer({ Adyar: [clinicA, clinicB, clinicC] }),
      writer,
    })

    await expect(runner.run(new AbortController().signal)).rejects.toBeInstanceOf(WriterError)
    expect(runner.snapshot()).toMatchObject({
      status: "failed",
      accepted: 1,
      raw: 2,
      error: "disk full",
    })
  })

  it("cancels only while pending", async () => {
    const { runner } = setup({ producer: inMemoryProducer({ Adyar: [clinicA] }) })

    expect(runner.cancelPending("Cancelled: shutdown")).toBe(true)
    expect(runner.cancelPending("again")).toBe(false)
    await runner.run(new AbortController().signal)

    expect(runner.snapshot()).toMatchObject({
      status: "failed",
      error: "Cancelled: shutdown",
      raw: 0,
    })
  })

  it("does not change a finished area", async () => {
    const { runner } = setup({ producer: inMemoryProducer({ Adyar: [clinicA] }) })
    await runner.run(new AbortController().signal)

    expect(runner.cancelPending("late")).toBe(false)
    expect(runner.isTerminal).toBe(true)
    expect(runner.snapshot().error).toBeNull()
  })

  describe("resume", () => {
    it("skips consumed records and counts earlier rows towards the cap", async () => {
      const clinicD = makeRecord("Care Dental", "North St")
      const producer = inMemoryProducer({ Adyar: [clinicA, clinicB, clinicC, clinicD] })
      const { runner, writer } = setup({ producer, perArea: 3 })

      expect(runner.resumeFrom({ accepted: 2, position: 2 })).toBe(true)
      await runner.run(new AbortController().signal)

      expect(writer.records).toEqual([clinicC])
      expect(runner.snapshot()).toMatchObject({ status: "completed", accepted: 1, raw: 1 })
      expect(producer.requests[0]?.limit).toBe(1)
      expect(runner.progress()).toEqual({ accepted: 3, position: 3 })
    })

    it("keeps the saved position when the producer fails before reaching it", async () => {
      const producer = inMemoryProducer({ Adyar: [clinicA, new Error("timeout")] })
      const { runner } = setup({ producer })

      runner.resumeFrom({ accepted: 1, position: 4 })
      await runner.run(new AbortController().signal)

      expect(runner.status).toBe("failed")
      expect(runner.progress()).toEqual({ accepted: 1, position: 4 })
    })

    it("only resumes a pending runner", async () => {
      const { runner } = setup()
      await runner.run(new AbortController().signal)

      expect(runner.resumeFrom({ accepted: 1, position: 1 })).toBe(false)
      expect(runner.progress()).toEqual({ accepted: 0, position: 0 })
    })

    it("exposes the search query", () => {
      expect(setup().runner.query).toBe("dentists in Adyar, Chennai")
    })
  })
})
