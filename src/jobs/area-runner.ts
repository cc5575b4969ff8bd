import type { DedupGate } from "../dedup/dedup-gate.js"
import type { OutputWriter } from "../output/types.js"
import { WriterError } from "../output/types.js"
import type { RecordProducer } from "../producers/types.js"
import { sanitizeForError } from "../producers/types.js"
import type { BusinessRecord } from "../records/record.js"
import { cancellationDetail } from "../utils/cancel.js"
import { getErrorMessage } from "../utils/errors.js"
import { buildSearchQuery } from "./job-spec.js"
import type { AreaState, AreaStatus, JobEvent } from "./types.js"

export interface AreaRunnerConfig {
  jobId: string
  area: string
  businessType: string
  region?: string
  perArea: number
  producer: RecordProducer
  gate: DedupGate
  writer: OutputWriter
  publish: (event: JobEvent) => void
  /** Called after an accepted record was handed to the writer. */
  onAccepted?: (record: BusinessRecord) => void
  now?: () => Date
}

/** Where a previous run of the same area stopped. */
export interface ResumeProgress {
  /** Rows that run added to the artifact; they count towards the per-area cap. */
  accepted: number
  /** Producer records that run consumed; they are skipped. */
  position: number
}

const TERMINAL: ReadonlySet<AreaStatus> = new Set(["completed", "failed"])

/**
 * Drives one area from `pending` to `completed` or `failed`. Only this runner
 * mutates its state; terminal states are final.
 */
export class AreaRunner {
  readonly query: string
  private readonly state: AreaState
  private readonly now: () => Date
  private resumed: ResumeProgress = { accepted: 0, position: 0 }
  private consumed = 0

  constructor(private readonly config: AreaRunnerConfig) {
    this.query = buildSearchQuery(config.businessType, config.area, config.region)
    this.now = config.now ?? (() => new Date())
    this.state = {
      area: config.area,
      status: "pending",
      accepted: 0,
      duplicates: 0,
      raw: 0,
      error: null,
      startedAt: null,
      endedAt: null,
    }
  }

  get area(): string {
    return this.state.area
  }

  get status(): AreaStatus {
    return this.state.status
  }

  get isTerminal(): boolean {
    return TERMINAL.has(this.state.status)
  }

  snapshot(): AreaState {
    return { ...this.state }
  }

  /** Continues from an earlier run. Only applies before the runner starts. */
  resumeFrom(progress: ResumeProgress): boolean {
    if (this.state.status !== "pending") {
      return false
    }
    this.resumed = { ...progress }
    return true
  }

  /** Progress across this run and the one it resumed. */
  progress(): ResumeProgress {
    return {
      accepted: this.resumed.accepted + this.state.accepted,
      position: Math.max(this.consumed, this.resumed.position),
    }
  }

  /**
   * Producer failures and cancellation end in `failed` and resolve normally.
   * A `WriterError` also ends in `failed` and is re-thrown for the job.
   */
  async run(signal: AbortSignal): Promise<void> {
    if (this.state.status !== "pending") {
      return
    }
    if (signal.aborted) {
      this.fail(cancellationDetail(signal))
      return
    }

    this.state.startedAt = this.now().toISOString()
    this.transition("running")

    const { area, businessType, perArea, producer } = this.config
    const remaining = perArea - this.resumed.accepted
    if (remaining <= 0) {
      this.finish("completed")
      return
    }
    const request = { area, businessType, query: this.query, limit: remaining }

    try {
      for await (const record of producer.produce(request, signal)) {
        if (signal.aborted) {
          break
        }
        this.consumed += 1
        if (this.consumed <= this.resumed.position) {
          continue
        }
        await this.process(record)
        if (this.state.accepted >= remaining) {
          break
        }
      }
    } catch (error) {
      if (error instanceof WriterError) {
        this.fail(sanitizeForError(error.message))
        throw error
      }
      this.fail(signal.aborted ? cancellationDetail(signal) : this.failureDetail(error))
      return
    }

    if (signal.aborted) {
      this.fail(cancellationDetail(signal))
      return
    }
    this.finish("completed")
  }

  /** Fails a runner that has not started. Returns false once it is running or done. */
  cancelPending(reason: string): boolean {
    if (this.state.status !== "pending") {
      return false
    }
    this.fail(reason)
    return true
  }

  private async process(record: BusinessRecord): Promise<void> {
    this.state.raw += 1
    const admitted = this.config.gate.admit(record) === "accepted"
    if (admitted) {
      await this.config.writer.write(record)
      this.state.accepted += 1
      this.config.onAccepted?.(record)
    } else {
      this.state.duplicates += 1
    }

    this.config.publish({
      type: "area-progress",
      jobId: this.config.jobId,
      area: this.state.area,
      accepted: this.state.accepted,
      duplicates: this.state.duplicates,
      raw: this.state.raw,
      perArea: this.config.perArea,
      record,
      admitted,
    })
  }

  private failureDetail(error: unknown): string {
    const message = sanitizeForError(getErrorMessage(error).trim())
    return message || `${this.config.producer.name} producer failed`
  }

  private fail(detail: string): void {
    if (this.isTerminal) {
      return
    }
    this.state.error = detail
    this.finish("failed")
  }

  private finish(status: "completed" | "failed"): void {
    if (this.isTerminal) {
      return
    }
    this.state.endedAt = this.now().toISOString()
    this.transition(status)
  }

  private transition(status: AreaStatus): void {
    this.state.status = status
    this.config.publish({ type: "area-state", jobId: this.config.jobId, state: this.snapshot() })
  }
}
