import type { BusinessRecord } from "../records/record.js"

export type WriteMode = "fresh" | "append"

export interface OutputWriterConfig {
  path: string
  mode: WriteMode
  /** Rows buffered before a flush is triggered by `write`. Defaults to 20. */
  batchSize?: number
  /** Called after each successful flush with the batch size and running total. */
  onFlush?: (committed: number, rowsWritten: number) => void
}

/**
 * Sink shared by every area of a job. `write` resolves once the record is
 * buffered, or once the flush it triggered has committed.
 */
export interface OutputWriter {
  readonly path: string
  readonly rowsWritten: number
  readonly pendingRows: number
  open(): Promise<void>
  write(record: BusinessRecord): Promise<void>
  flush(): Promise<void>
  close(): Promise<void>
}

export class WriterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "WriterError"
  }
}
