import type { BusinessRecord } from "../records/record.js"

export type AreaStatus = "pending" | "running" | "completed" | "failed"

export type JobStatus = "running" | "completed" | "failed"

/**
 * `partial`: a job completes when at least one area completed.
 * `strict`: every area has to complete.
 */
export type FailurePolicy = "partial" | "strict"

export interface AreaState {
  area: string
  status: AreaStatus
  /**
   * Records handed to the writer. Rows still buffered when the writer fails
   * are counted here but never reach the artifact; `JobAggregate.artifactRows`
   * counts committed rows only.
   */
  accepted: number
  duplicates: number
  raw: number
  /** Set exactly when `status` is `failed`. */
  error: string | null
  startedAt: string | null
  endedAt: string | null
}

export interface JobMetrics {
  elapsedSeconds: number
  throughputPerMinute: number
  etaSeconds: number | null
}

export interface JobAggregate {
  id: string
  businessType: string
  region: string | null
  outputFile: string
  append: boolean
  perArea: number
  concurrency: number
  policy: FailurePolicy
  status: JobStatus
  areas: AreaState[]
  accepted: number
  duplicates: number
  raw: number
  /** Upper bound on accepted records: areas × per-area cap. */
  target: number
  /** Data rows in the artifact: rows found on open plus rows committed by this job. */
  artifactRows: number
  error: string | null
  createdAt: string
  endedAt: string | null
  metrics: JobMetrics
}

export interface JobHandle {
  id: string
  /** Resolves with the final aggregate. Never rejects. */
  done: Promise<JobAggregate>
}

export interface ArtifactInfo {
  path: string
  rows: number
}

export interface JobPreview {
  jobId: string
  /** `artifact` rows were read back from the file; `memory` rows are recent accepted records. */
  source: "artifact" | "memory"
  columns: string[]
  rows: Record<string, string>[]
}

/** Persists finished jobs. Implemented by the SQLite history store. */
export interface JobHistoryRecorder {
  recordJob(aggregate: JobAggregate): Promise<void>
}

/** Where an unfinished area stopped, keyed by search query and resolved artifact path. */
export interface ResumePoint {
  query: string
  outputFile: string
  /** Per-area cap of the job that saved the point. */
  target: number
  /** Rows the area has added to the artifact so far. */
  accepted: number
  /** Producer records consumed so far; a resumed area skips this many. */
  position: number
  updatedAt: string
}

/** Keeps resume points between runs. Implemented by the SQLite history store. */
export interface ResumeStore {
  loadResumePoint(query: string, outputFile: string): Promise<ResumePoint | null>
  saveResumePoint(point: ResumePoint): Promise<void>
  clearResumePoint(query: string, outputFile: string): Promise<void>
}

// ── Events ──────────────────────────────────────────────────────────

export type JobEvent =
  | {
      type: "job-started"
      jobId: string
      businessType: string
      areas: string[]
      perArea: number
      outputFile: string
      append: boolean
    }
  | { type: "artifact-ready"; jobId: string; outputFile: string; existingRows: number }
  | { type: "area-state"; jobId: string; state: AreaState }
  | {
      type: "area-progress"
      jobId: string
      area: string
      accepted: number
      duplicates: number
      raw: number
      perArea: number
      record: BusinessRecord
      admitted: boolean
    }
  | { type: "records-committed"; jobId: string; count: number; rowsWritten: number }
  | { type: "job-metrics"; jobId: string; accepted: number; target: number; metrics: JobMetrics }
  | { type: "job-finished"; jobId: string; aggregate: JobAggregate }

export type JobEventType = JobEvent["type"]
