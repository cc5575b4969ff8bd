import { appendFile, mkdir, writeFile } from "node:fs/promises"
import { dirname } from "node:path"

import Papa from "papaparse"

import { RECORD_COLUMNS, resolveHeader, toCsvRow } from "../records/record.js"
import type { BusinessRecord, HeaderLayout } from "../records/record.js"
import { getErrorMessage } from "../utils/errors.js"
import { endsWithLineBreak, readArtifactHeader } from "./artifact.js"
import { WriterError } from "./types.js"
import type { OutputWriter, OutputWriterConfig } from "./types.js"

export const DEFAULT_BATCH_SIZE = 20

const LINE_BREAK = "\n"

const toCsvText = (rows: string[][]): string =>
  `${Papa.unparse(rows, { newline: LINE_BREAK, quotes: false })}${LINE_BREAK}`

/**
 * Buffered CSV appender. Every flush is a single `appendFile` of whole rows,
 * and flushes run one after another on a promise chain.
 */
export class CsvOutputWriter implements OutputWriter {
  readonly path: string
  private readonly mode: OutputWriterConfig["mode"]
  private readonly batchSize: number
  private readonly onFlush: OutputWriterConfig["onFlush"]

  private columns: readonly string[] = RECORD_COLUMNS
  private layout: HeaderLayout = RECORD_COLUMNS
  private buffer: BusinessRecord[] = []
  private chain: Promise<void> = Promise.resolve()
  private failure: WriterError | null = null
  private closing: Promise<void> | null = null
  private opened = false
  private needsLeadingBreak = false

  private committed = 0
  private flushes = 0
  private reusedHeader = false

  constructor(config: OutputWriterConfig) {
    const batchSize = config.batchSize ?? DEFAULT_BATCH_SIZE
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`)
    }
    this.path = config.path
    this.mode = config.mode
    this.batchSize = batchSize
    this.onFlush = config.onFlush
  }

  get rowsWritten(): number {
    return this.committed
  }

  get pendingRows(): number {
    return this.buffer.length
  }

  get batchesFlushed(): number {
    return this.flushes
  }

  /** Column order rows are written in; the existing header's order in append mode. */
  get header(): readonly string[] {
    return this.columns
  }

  /** True when `open` found an artifact to append to instead of writing a header. */
  get appendingToExisting(): boolean {
    return this.reusedHeader
  }

  async open(): Promise<void> {
    if (this.failure) {
      throw this.failure
    }
    if (this.opened) {
      return
    }
    try {
      await mkdir(dirname(this.path), { recursive: true })
      const existingHeader = this.mode === "append" ? await readArtifactHeader(this.path) : null
      if (existingHeader && existingHeader.length > 0) {
        this.columns = existingHeader
        this.layout = resolveHeader(existingHeader)
        this.reusedHeader = true
        this.needsLeadingBreak = !(await endsWithLineBreak(this.path))
      } else {
        await writeFile(this.path, toCsvText([[...RECORD_COLUMNS]]), "utf-8")
      }
      this.opened = true
    } catch (error) {
      throw this.fail(`Cannot open output artifact ${this.path}: ${getErrorMessage(error)}`, error)
    }
  }

  write(record: BusinessRecord): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.failure)
    }
    if (this.closing) {
      return Promise.reject(new WriterError(`Output writer for ${this.path} is closed`))
    }
    if (!this.opened) {
      return Promise.reject(new WriterError(`Output writer for ${this.path} was not opened`))
    }

    this.buffer.push(record)
    if (this.buffer.length >= this.batchSize) {
      return this.flush()
    }
    return Promise.resolve()
  }

  flush(): Promise<void> {
    const run = this.chain.then(() => this.commitBuffered())
    this.chain = run.catch(() => undefined)
    return run
  }

  close(): Promise<void> {
    this.closing ??= this.flush()
    return this.closing
  }

  private async commitBuffered(): Promise<void> {
    if (this.failure) {
      throw this.failure
    }
    if (this.buffer.length === 0) {
      return
    }

    const batch = this.buffer
    this.buffer = []
    const prefix = this.needsLeadingBreak ? LINE_BREAK : ""
    const text = prefix + toCsvText(batch.map((record) => toCsvRow(record, this.layout)))

    try {
      await appendFile(this.path, text, "utf-8")
    } catch (error) {
      throw this.fail(
        `Failed to append ${batch.length} rows to ${this.path}: ${getErrorMessage(error)}`,
        error,
      )
    }

    this.needsLeadingBreak = false
    this.committed += batch.length
    this.flushes += 1
    this.onFlush?.(batch.length, this.committed)
  }

  private fail(message: string, cause: unknown): WriterError {
    this.failure ??= new WriterError(message, { cause })
    return this.failure
  }
}
