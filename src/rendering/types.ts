import type { JobHistoryRow } from "../db/store.js"
import type { AreaState, AreaStatus, JobAggregate, JobMetrics } from "../jobs/types.js"

export type VerboseLog = (scope: string, message: string) => void

export interface RunHeader {
  jobId: string
  businessType: string
  region: string | null
  areaCount: number
  perArea: number
  outputFile: string
  append: boolean
  concurrency: number
  source: string
}

export interface AreaProgressView {
  area: string
  status: AreaStatus
  accepted: number
  duplicates: number
  raw: number
}

export interface PreviewTable {
  title: string
  columns: string[]
  rows: Record<string, string>[]
}

export interface SpinnerHandle {
  update(text: string): void
  succeed(text: string): void
  fail(text: string): void
  warn(text: string): void
}

export interface CliRenderer {
  // --- Setup ---
  header(info: RunHeader): void
  artifactReady(outputFile: string, existingRows: number): void

  // --- Area progress ---
  updateArea(view: AreaProgressView): void
  areaFinished(state: AreaState): void
  updateMetrics(accepted: number, target: number, metrics: JobMetrics): void
  stopProgress(): void
  createSpinner(text: string): SpinnerHandle

  // --- Results ---
  showSummary(aggregate: JobAggregate): void
  showPreview(preview: PreviewTable): void
  showHistory(rows: JobHistoryRow[]): void

  // --- General ---
  logVerbose(scope: string, message: string, elapsedSec: number): void
  pipelineComplete(elapsedSeconds: number, outputFile: string): void
  warn(message: string): void
  error(message: string): void
}
