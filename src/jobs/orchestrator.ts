import { randomUUID } from "node:crypto"
import { resolve } from "node:path"

import pLimit from "p-limit"

import { DedupGate } from "../dedup/dedup-gate.js"
import { FingerprintCache } from "../dedup/fingerprint-cache.js"
import { EventChannel } from "../events/event-channel.js"
import { artifactHasRowsSync, previewArtifact } from "../output/artifact.js"
import { CsvOutputWriter, DEFAULT_BATCH_SIZE } from "../output/csv-writer.js"
import type { OutputWriter, OutputWriterConfig } from "../output/types.js"
import { sanitizeForError } from "../producers/types.js"
import type { RecordProducer } from "../producers/types.js"
import { DEFAULT_SAMPLING, validateSamplingBounds } from "../records/fingerprint.js"
import type { SamplingBounds } from "../records/fingerprint.js"
import { RECORD_COLUMNS, toDisplayRow } from "../records/record.js"
import type { BusinessRecord } from "../records/record.js"
import type { VerboseLog } from "../rendering/types.js"
import { CancellationError, cancellationDetail, isCancellationError } from "../utils/cancel.js"
import { getErrorMessage } from "../utils/errors.js"
import { AreaRunner } from "./area-runner.js"
import {
  ArtifactExistsError,
  ArtifactNotReadyError,
  JobConflictError,
  JobNotFoundError,
  RateLimitExceededError,
} from "./errors.js"
import { parseJobSpec } from "./job-spec.js"
import type { JobSpec, JobSpecInput } from "./job-spec.js"
import { DEFAULT_METRICS_WINDOW_MS, ThroughputTracker } from "./metrics.js"
import type {
  ArtifactInfo,
  JobAggregate,
  JobEvent,
  JobHandle,
  JobHistoryRecorder,
  JobMetrics,
  JobPreview,
  JobStatus,
  ResumeStore,
} from "./types.js"

export const DEFAULT_CACHE_CAPACITY = 50_000
export const DEFAULT_PREVIEW_LIMIT = 10
const RECENT_RECORD_LIMIT = 25

export interface OrchestratorOptions {
  producer: RecordProducer
  channel?: EventChannel<JobEvent>
  history?: JobHistoryRecorder
  /** Keeps per-area progress so an appending job continues where the last run stopped. */
  resume?: ResumeStore
  verbose?: VerboseLog
  /** Fingerprints kept per job. */
  cacheCapacity?: number
  batchSize?: number
  sampling?: SamplingBounds
  /** Jobs allowed to run at the same time. */
  maxActiveJobs?: number
  /** Job starts allowed within `submissionWindowMs`. */
  submissionLimit?: number
  submissionWindowMs?: number
  /** Finished jobs are forgotten this long after they end. */
  cleanupAfterMs?: number
  metricsWindowMs?: number
  /** Minimum gap between two `job-metrics` events of a running job. */
  metricsIntervalMs?: number
  createWriter?: (config: OutputWriterConfig) => OutputWriter
  now?: () => number
  createId?: () => string
}

interface JobEntry {
  id: string
  spec: JobSpec
  outputPath: string
  controller: AbortController
  gate: DedupGate
  writer: OutputWriter
  runners: AreaRunner[]
  status: JobStatus
  error: string | null
  createdAt: number
  endedAt: number | null
  existingRows: number
  throughput: ThroughputTracker
  recent: BusinessRecord[]
  lastMetricsAt: number
}

const positiveInteger = (name: string, value: number): number => {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`)
  }
  return value
}

// ── JobOrchestrator ─────────────────────────────────────────────────

/**
 * Registry and scheduler of harvest jobs. Each job owns one fingerprint
 * cache, one dedup gate and one output writer shared by all of its areas.
 */
export class JobOrchestrator {
  readonly channel: EventChannel<JobEvent>

  private readonly jobs = new Map<string, JobEntry>()
  private readonly recentStarts: number[] = []

  private readonly producer: RecordProducer
  private readonly history: JobHistoryRecorder | undefined
  private readonly resume: ResumeStore | undefined
  private readonly verbose: VerboseLog | undefined
  private readonly cacheCapacity: number
  private readonly batchSize: number
  private readonly sampling: SamplingBounds
  private readonly maxActiveJobs: number
  private readonly submissionLimit: number
  private readonly submissionWindowMs: number
  private readonly cleanupAfterMs: number
  private readonly metricsWindowMs: number
  private readonly metricsIntervalMs: number
  private readonly createWriter: (config: OutputWriterConfig) => OutputWriter
  private readonly now: () => number
  private readonly createId: () => string

  constructor(options: OrchestratorOptions) {
    this.producer = options.producer
    this.channel = options.channel ?? new EventChannel<JobEvent>()
    this.history = options.history
    this.resume = options.resume
    this.verbose = options.verbose
    this.cacheCapacity = positiveInteger("Cache capacity", options.cacheCapacity ?? DEFAULT_CACHE_CAPACITY)
    this.batchSize = positiveInteger("Batch size", options.batchSize ?? DEFAULT_BATCH_SIZE)
    this.sampling = validateSamplingBounds(options.sampling ?? DEFAULT_SAMPLING)
    this.maxActiveJobs = positiveInteger("Max active jobs", options.maxActiveJobs ?? 2)
    this.submissionLimit = positiveInteger("Submission limit", options.submissionLimit ?? 5)
    this.submissionWindowMs = options.submissionWindowMs ?? 60_000
    this.cleanupAfterMs = options.cleanupAfterMs ?? 15 * 60_000
    this.metricsWindowMs = options.metricsWindowMs ?? DEFAULT_METRICS_WINDOW_MS
    this.metricsIntervalMs = options.metricsIntervalMs ?? 1_000
    this.createWriter = options.createWriter ?? ((config) => new CsvOutputWriter(config))
    this.now = options.now ?? Date.now
    this.createId = options.createId ?? randomUUID
  }

  /**
   * Validates and starts a job. Throws before any side effect when the spec is
   * invalid, a submission limit is hit, another running job owns the file, or
   * a fresh job would truncate an artifact holding rows.
   */
  submit(input: JobSpecInput): JobHandle {
    const spec = parseJobSpec(input)
    const now = this.now()
    this.cleanupFinishedJobs(now)
    this.enforceSubmissionLimits(spec, now)

    const entry = this.createEntry(spec, now)
    this.jobs.set(entry.id, entry)
    this.recentStarts.push(now)
    this.verbose?.(
      "jobs",
      `job ${entry.id} accepted: ${spec.areas.length} areas × ${spec.perArea} → ${spec.outputFile}`,
    )

    const done = this.execute(entry).catch((error: unknown) => this.failUnexpectedly(entry, error))
    return { id: entry.id, done }
  }

  status(jobId: string): JobAggregate {
    return this.snapshot(this.getEntry(jobId))
  }

  /** Newest first. */
  list(): JobAggregate[] {
    return [...this.jobs.values()].reverse().map((entry) => this.snapshot(entry))
  }

  /**
   * Pending areas fail at once; running areas stop after their current record.
   * Returns false when the job already finished.
   */
  cancel(jobId: string, reason = "Job cancelled by request"): boolean {
    const entry = this.getEntry(jobId)
    if (entry.status !== "running") {
      return false
    }
    if (!entry.controller.signal.aborted) {
      entry.controller.abort(new CancellationError(reason))
      this.verbose?.("jobs", `job ${jobId} cancelled: ${reason}`)
    }
    this.failPendingAreas(entry)
    return true
  }

  artifact(jobId: string): ArtifactInfo {
    const entry = this.getEntry(jobId)
    if (entry.status !== "completed") {
      throw new ArtifactNotReadyError(jobId, entry.status)
    }
    return { path: entry.spec.outputFile, rows: this.artifactRows(entry) }
  }

  /**
   * Completed jobs are previewed from the artifact prefix; running or failed
   * jobs from their most recent accepted records.
   */
  async preview(jobId: string, limit = DEFAULT_PREVIEW_LIMIT): Promise<JobPreview> {
    const entry = this.getEntry(jobId)
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`Preview limit must be a non-negative integer, got ${limit}`)
    }
    if (entry.status === "completed") {
      const preview = await previewArtifact(entry.spec.outputFile, limit)
      return { jobId, source: "artifact", columns: preview.columns, rows: preview.rows }
    }
    const recent = limit === 0 ? [] : entry.recent.slice(-limit)
    return {
      jobId,
      source: "memory",
      columns: [...RECORD_COLUMNS],
      rows: recent.map(toDisplayRow),
    }
  }

  /** Forgets finished jobs that ended more than `cleanupAfterMs` ago. Returns how many. */
  cleanupFinishedJobs(now = this.now()): number {
    let removed = 0
    for (const [id, entry] of this.jobs) {
      if (entry.endedAt !== null && now - entry.endedAt > this.cleanupAfterMs) {
        this.jobs.delete(id)
        removed += 1
      }
    }
    if (removed > 0) {
      this.verbose?.("jobs", `cleaned up ${removed} finished jobs`)
    }
    return removed
  }

  // ── Submission ──────────────────────────────────────────────────────

  private enforceSubmissionLimits(spec: JobSpec, now: number): void {
    while (this.recentStarts.length > 0 && now - this.recentStarts[0] >= this.submissionWindowMs) {
      this.recentStarts.shift()
    }
    if (this.recentStarts.length >= this.submissionLimit) {
      throw new RateLimitExceededError(
        `At most ${this.submissionLimit} jobs can be started every ${Math.round(this.submissionWindowMs / 1000)}s`,
      )
    }

    const active = [...this.jobs.values()].filter((entry) => entry.status === "running")
    const outputPath = resolve(spec.outputFile)
    const owner = active.find((entry) => entry.outputPath === outputPath)
    if (owner) {
      throw new JobConflictError(spec.outputFile, owner.id)
    }
    if (active.length >= this.maxActiveJobs) {
      throw new RateLimitExceededError(
        `${active.length} jobs are already running (limit ${this.maxActiveJobs})`,
      )
    }
    if (!spec.append && !spec.overwrite && artifactHasRowsSync(spec.outputFile)) {
      throw new ArtifactExistsError(spec.outputFile)
    }
  }

  private createEntry(spec: JobSpec, now: number): JobEntry {
    const id = this.createId()
    const controller = new AbortController()
    const gate = new DedupGate(new FingerprintCache(this.cacheCapacity), this.sampling)
    const writer = this.createWriter({
      path: spec.outputFile,
      mode: spec.append ? "append" : "fresh",
      batchSize: this.batchSize,
      onFlush: (count, rowsWritten) => {
        this.channel.publish({ type: "records-committed", jobId: id, count, rowsWritten })
      },
    })
    const throughput = new ThroughputTracker(this.metricsWindowMs)
    throughput.record(now, 0)

    const entry: JobEntry = {
      id,
      spec,
      outputPath: resolve(spec.outputFile),
      controller,
      gate,
      writer,
      runners: [],
      status: "running",
      error: null,
      createdAt: now,
      endedAt: null,
      existingRows: 0,
      throughput,
      recent: [],
      lastMetricsAt: now,
    }

    entry.runners = spec.areas.map(
      (area) =>
        new AreaRunner({
          jobId: id,
          area,
          businessType: spec.businessType,
          region: spec.region,
          perArea: spec.perArea,
          producer: this.producer,
          gate,
          writer,
          publish: (event) => {
            this.onAreaEvent(entry, event)
          },
          onAccepted: (record) => {
            entry.recent.push(record)
            if (entry.recent.length > RECENT_RECORD_LIMIT) {
              entry.recent.shift()
            }
          },
          now: () => new Date(this.now()),
        }),
    )
    return entry
  }

  // ── Execution ───────────────────────────────────────────────────────

  private async execute(entry: JobEntry): Promise<JobAggregate> {
    const { spec, writer } = entry
    this.channel.publish({
      type: "job-started",
      jobId: entry.id,
      businessType: spec.businessType,
      areas: [...spec.areas],
      perArea: spec.perArea,
      outputFile: spec.outputFile,
      append: spec.append,
    })

    let fatal: unknown = null
    try {
      await this.prepareArtifact(entry)
      await this.resumeAreas(entry)
      await this.runAreas(entry)
    } catch (error) {
      if (!(isCancellationError(error) && entry.controller.signal.aborted)) {
        fatal = error
        this.abortJob(entry, error)
      }
    }

    try {
      await writer.close()
    } catch (error) {
      fatal ??= error
    }

    return this.finalize(entry, fatal)
  }

  private async prepareArtifact(entry: JobEntry): Promise<void> {
    const { spec, writer, gate } = entry
    await writer.open()
    if (spec.append) {
      entry.existingRows = await gate.seedFromArtifact(spec.outputFile, entry.controller.signal)
      this.verbose?.("jobs", `seeded ${entry.existingRows} fingerprints from ${spec.outputFile}`)
    }
    this.channel.publish({
      type: "artifact-ready",
      jobId: entry.id,
      outputFile: spec.outputFile,
      existingRows: entry.existingRows,
    })
  }

  /**
   * Appending jobs continue each area from its saved point, as long as the
   * artifact still holds the rows that point accounts for. Fresh jobs start
   * the artifact over and drop the points.
   */
  private async resumeAreas(entry: JobEntry): Promise<void> {
    const store = this.resume
    if (!store) {
      return
    }
    for (const runner of entry.runners) {
      if (!entry.spec.append) {
        await this.withResumeStore(`clear ${runner.area}`, () =>
          store.clearResumePoint(runner.query, entry.outputPath),
        )
        continue
      }
      const point = await this.withResumeStore(`load ${runner.area}`, () =>
        store.loadResumePoint(runner.query, entry.outputPath),
      )
      if (!point) {
        continue
      }
      if (point.accepted > entry.existingRows) {
        this.verbose?.(
          "resume",
          `dropping resume point of ${runner.area}: ${point.accepted} rows saved, ${entry.existingRows} in artifact`,
        )
        await this.withResumeStore(`clear ${runner.area}`, () =>
          store.clearResumePoint(runner.query, entry.outputPath),
        )
        continue
      }
      runner.resumeFrom({ accepted: point.accepted, position: point.position })
      this.verbose?.(
        "resume",
        `${runner.area} resumes at record ${point.position} with ${point.accepted}/${entry.spec.perArea} accepted`,
      )
    }
  }

  /** Completed areas drop their point; unfinished areas save where they stopped. */
  private async saveResumePoints(entry: JobEntry): Promise<void> {
    const store = this.resume
    if (!store) {
      return
    }
    const updatedAt = new Date(this.now()).toISOString()
    for (const runner of entry.runners) {
      if (runner.status === "completed") {
        await this.withResumeStore(`clear ${runner.area}`, () =>
          store.clearResumePoint(runner.query, entry.outputPath),
        )
        continue
      }
      const progress = runner.progress()
      if (progress.position === 0) {
        continue
      }
      await this.withResumeStore(`save ${runner.area}`, () =>
        store.saveResumePoint({
          query: runner.query,
          outputFile: entry.outputPath,
          target: entry.spec.perArea,
          accepted: progress.accepted,
          position: progress.position,
          updatedAt,
        }),
      )
    }
  }

  private async withResumeStore<T>(action: string, run: () => Promise<T>): Promise<T | null> {
    try {
      return await run()
    } catch (error) {
      this.verbose?.("resume", `failed to ${action}: ${getErrorMessage(error)}`)
      return null
    }
  }

  private async runAreas(entry: JobEntry): Promise<void> {
    const limit = pLimit(entry.spec.concurrency)
    const outcomes = await Promise.allSettled(
      entry.runners.map((runner) => limit(() => this.runArea(entry, runner))),
    )
    const failure = outcomes.find(
      (outcome): outcome is PromiseRejectedResult => outcome.status === "rejected",
    )
    if (failure) {
      throw failure.reason
    }
  }

  private async runArea(entry: JobEntry, runner: AreaRunner): Promise<void> {
    try {
      await runner.run(entry.controller.signal)
    } catch (error) {
      this.abortJob(entry, error)
      throw error
    }
  }

  /** Job-level failure: every area that is not done yet fails. */
  private abortJob(entry: JobEntry, error: unknown): void {
    if (!entry.controller.signal.aborted) {
      const message = `Output writer failed: ${sanitizeForError(getErrorMessage(error))}`
      entry.controller.abort(new Error(message))
      this.verbose?.("jobs", `job ${entry.id} aborted: ${message}`)
    }
    this.failPendingAreas(entry)
  }

  private failPendingAreas(entry: JobEntry): void {
    const detail = cancellationDetail(entry.controller.signal)
    for (const runner of entry.runners) {
      runner.cancelPending(detail)
    }
  }

  private async finalize(entry: JobEntry, fatal: unknown): Promise<JobAggregate> {
    entry.endedAt = this.now()
    if (fatal === null) {
      entry.status = this.deriveStatus(entry)
      entry.error = entry.status === "failed" ? this.failureSummary(entry) : null
    } else {
      entry.status = "failed"
      entry.error = sanitizeForError(getErrorMessage(fatal))
    }

    this.publishMetrics(entry)
    const aggregate = this.snapshot(entry)
    this.verbose?.(
      "jobs",
      `job ${entry.id} ${aggregate.status}: ${aggregate.accepted} accepted, ${aggregate.duplicates} duplicates`,
    )
    await this.saveResumePoints(entry)
    await this.recordHistory(aggregate)
    this.channel.publish({ type: "job-finished", jobId: entry.id, aggregate })
    return aggregate
  }

  private async failUnexpectedly(entry: JobEntry, error: unknown): Promise<JobAggregate> {
    if (!entry.controller.signal.aborted) {
      entry.controller.abort(new Error(getErrorMessage(error)))
    }
    this.failPendingAreas(entry)
    return this.finalize(entry, error)
  }

  private deriveStatus(entry: JobEntry): JobStatus {
    const completed = entry.runners.filter((runner) => runner.status === "completed").length
    if (entry.spec.policy === "strict") {
      return completed === entry.runners.length ? "completed" : "failed"
    }
    return completed > 0 ? "completed" : "failed"
  }

  private failureSummary(entry: JobEntry): string {
    const { signal } = entry.controller
    if (signal.aborted) {
      return cancellationDetail(signal)
    }
    const failed = entry.runners.filter((runner) => runner.status === "failed").length
    return entry.spec.policy === "strict"
      ? `${failed} of ${entry.runners.length} areas failed`
      : "No area completed"
  }

  private async recordHistory(aggregate: JobAggregate): Promise<void> {
    if (!this.history) {
      return
    }
    try {
      await this.history.recordJob(aggregate)
    } catch (error) {
      this.verbose?.("history", `failed to record job ${aggregate.id}: ${getErrorMessage(error)}`)
    }
  }

  // ── Progress ────────────────────────────────────────────────────────

  private onAreaEvent(entry: JobEntry, event: JobEvent): void {
    this.channel.publish(event)
    if (event.type !== "area-progress") {
      return
    }

    const now = this.now()
    if (event.admitted) {
      entry.throughput.record(now, this.acceptedTotal(entry))
    }
    if (now - entry.lastMetricsAt >= this.metricsIntervalMs) {
      this.publishMetrics(entry)
    }
  }

  private publishMetrics(entry: JobEntry): void {
    entry.lastMetricsAt = this.now()
    this.channel.publish({
      type: "job-metrics",
      jobId: entry.id,
      accepted: this.acceptedTotal(entry),
      target: this.target(entry),
      metrics: this.metrics(entry),
    })
  }

  private metrics(entry: JobEntry): JobMetrics {
    const end = entry.endedAt ?? this.now()
    const elapsedSeconds = Math.max(end - entry.createdAt, 0) / 1000
    const metrics = entry.throughput.compute(
      elapsedSeconds,
      this.acceptedTotal(entry),
      this.target(entry),
    )
    return entry.endedAt === null ? metrics : { ...metrics, etaSeconds: null }
  }

  // ── Snapshots ───────────────────────────────────────────────────────

  private getEntry(jobId: string): JobEntry {
    const entry = this.jobs.get(jobId)
    if (!entry) {
      throw new JobNotFoundError(jobId)
    }
    return entry
  }

  private acceptedTotal(entry: JobEntry): number {
    return entry.runners.reduce((sum, runner) => sum + runner.snapshot().accepted, 0)
  }

  private target(entry: JobEntry): number {
    return entry.spec.areas.length * entry.spec.perArea
  }

  private artifactRows(entry: JobEntry): number {
    return entry.existingRows + entry.writer.rowsWritten
  }

  private snapshot(entry: JobEntry): JobAggregate {
    const areas = entry.runners.map((runner) => runner.snapshot())
    const { spec } = entry
    return {
      id: entry.id,
      businessType: spec.businessType,
      region: spec.region ?? null,
      outputFile: spec.outputFile,
      append: spec.append,
      perArea: spec.perArea,
      concurrency: spec.concurrency,
      policy: spec.policy,
      status: entry.status,
      areas,
      accepted: areas.reduce((sum, area) => sum + area.accepted, 0),
      duplicates: areas.reduce((sum, area) => sum + area.duplicates, 0),
      raw: areas.reduce((sum, area) => sum + area.raw, 0),
      target: this.target(entry),
      artifactRows: this.artifactRows(entry),
      error: entry.error,
      createdAt: new Date(entry.createdAt).toISOString(),
      endedAt: entry.endedAt === null ? null : new Date(entry.endedAt).toISOString(),
      metrics: this.metrics(entry),
    }
  }
}
