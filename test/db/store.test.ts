import { mkdtemp, rm } from "node:fs/promises"
import { join } from "node:path"
import { tmpdir } from "node:os"
import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { JobHistoryStore } from "../../src/db/store.js"
import type { AreaState, JobAggregate, ResumePoint } from "../../src/jobs/types.js"

const makeArea = (overrides: Partial<AreaState> = {}): AreaState => ({
  area: "Adyar",
  status: "completed",
  accepted: 5,
  duplicates: 2,
  raw: 7,
  error: null,
  startedAt: "2026-03-01T10:00:01.000Z",
  endedAt: "2026-03-01T10:00:09.000Z",
  ...overrides,
})

const makeAggregate = (overrides: Partial<JobAggregate> = {}): JobAggregate => ({
  id: "job-1",
  businessType: "dentists",
  region: "Chennai",
  outputFile: "output/dentists.csv",
  append: false,
  perArea: 10,
  concurrency: 2,
  policy: "partial",
  status: "completed",
  areas: [
    makeArea(),
    makeArea({ area: "Velachery", status: "failed", accepted: 0, duplicates: 0, raw: 0, error: "timeout" }),
  ],
  accepted: 5,
  duplicates: 2,
  raw: 7,
  target: 20,
  artifactRows: 5,
  error: null,
  createdAt: "2026-03-01T10:00:00.000Z",
  endedAt: "2026-03-01T10:00:10.000Z",
  metrics: { elapsedSeconds: 10, throughputPerMinute: 30, etaSeconds: null },
  ...overrides,
})

const makePoint = (overrides: Partial<ResumePoint> = {}): ResumePoint => ({
  query: "dentists in Adyar, Chennai",
  outputFile: "/data/dentists.csv",
  target: 20,
  accepted: 7,
  position: 12,
  updatedAt: "2026-03-01T10:00:10.000Z",
  ...overrides,
})

describe("JobHistoryStore", () => {
  let tmpDir: string
  let dbPath: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "history-store-test-"))
    dbPath = join(tmpDir, "nested", "history.db")
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  it("records a job with its areas", async () => {
    const store = await JobHistoryStore.open(dbPath)
    await store.recordJob(makeAggregate())

    expect(await store.listJobs()).toEqual([
      {
        id: "job-1",
        businessType: "dentists",
        region: "Chennai",
        outputFile: "output/dentists.csv",
        appendMode: false,
        policy: "partial",
        status: "completed",
        perArea: 10,
        accepted: 5,
        duplicates: 2,
        artifactRows: 5,
        error: null,
        createdAt: "2026-03-01T10:00:00.000Z",
        endedAt: "2026-03-01T10:00:10.000Z",
      },
    ])

    const areas = await store.getAreaResults("job-1")
    expect(areas.map(({ area, status, accepted, error }) => ({ area, status, accepted, error }))).toEqual([
      { area: "Adyar", status: "completed", accepted: 5, error: null },
      { area: "Velachery", status: "failed", accepted: 0, error: "timeout" },
    ])
    store.close()
  })

  it("replaces a job recorded twice", async () => {
    const store = await JobHistoryStore.open(dbPath)
    await store.recordJob(makeAggregate({ status: "failed", error: "disk full" }))
    await store.recordJob(makeAggregate({ areas: [makeArea()] }))

    const jobs = await store.listJobs()
    expect(jobs).toHaveLength(1)
    expect(jobs[0]?.status).toBe("completed")
    expect(jobs[0]?.error).toBeNull()
    expect(await store.getAreaResults("job-1")).toHaveLength(1)
    store.close()
  })

  it("lists the newest jobs first up to the limit", async () => {
    const store = await JobHistoryStore.open(dbPath)
    await store.recordJob(makeAggregate({ id: "job-1", createdAt: "2026-03-01T10:00:00.000Z" }))
    await store.recordJob(makeAggregate({ id: "job-2", createdAt: "2026-03-02T10:00:00.000Z" }))
    await store.recordJob(makeAggregate({ id: "job-3", createdAt: "2026-03-03T10:00:00.000Z" }))

    expect((await store.listJobs(2)).map((job) => job.id)).toEqual(["job-3", "job-2"])
    store.close()
  })

  it("keeps history across reopening", async () => {
    const first = await JobHistoryStore.open(dbPath)
    await first.recordJob(makeAggregate({ append: true }))
    first.close()

    const second = await JobHistoryStore.open(dbPath)
    expect((await second.listJobs()).map((job) => job.appendMode)).toEqual([true])
    second.close()
  })

  it("rejects instead of throwing when the write fails", async () => {
    const store = await JobHistoryStore.open(dbPath)
    store.close()

    await expect(store.recordJob(makeAggregate())).rejects.toThrow()
  })

  describe("resume points", () => {
    it("saves, loads and clears the point of one query and artifact", async () => {
      const store = await JobHistoryStore.open(dbPath)
      await store.saveResumePoint(makePoint())

      expect(await store.loadResumePoint("dentists in Adyar, Chennai", "/data/dentists.csv")).toEqual(
        makePoint(),
      )
      expect(await store.loadResumePoint("dentists in Adyar, Chennai", "/data/clinics.csv")).toBeNull()

      await store.clearResumePoint("dentists in Adyar, Chennai", "/data/dentists.csv")
      expect(await store.loadResumePoint("dentists in Adyar, Chennai", "/data/dentists.csv")).toBeNull()
      store.close()
    })

    it("replaces the point saved for the same key", async () => {
      const store = await JobHistoryStore.open(dbPath)
      await store.saveResumePoint(makePoint())
      await store.saveResumePoint(
        makePoint({ accepted: 9, position: 15, updatedAt: "2026-03-01T11:00:00.000Z" }),
      )

      expect(await store.listResumePoints()).toEqual([
        makePoint({ accepted: 9, position: 15, updatedAt: "2026-03-01T11:00:00.000Z" }),
      ])
      store.close()
    })

    it("lists the points of one artifact, latest first", async () => {
      const store = await JobHistoryStore.open(dbPath)
      await store.saveResumePoint(makePoint({ query: "dentists in Adyar", updatedAt: "2026-03-01T10:00:00.000Z" }))
      await store.saveResumePoint(
        makePoint({ query: "dentists in Velachery", updatedAt: "2026-03-02T10:00:00.000Z" }),
      )
      await store.saveResumePoint(makePoint({ outputFile: "/data/clinics.csv" }))

      expect((await store.listResumePoints("/data/dentists.csv")).map((point) => point.query)).toEqual([
        "dentists in Velachery",
        "dentists in Adyar",
      ])
      expect(await store.listResumePoints()).toHaveLength(3)
      store.close()
    })
  })
})
