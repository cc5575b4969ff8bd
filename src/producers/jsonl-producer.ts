import { createReadStream } from "node:fs"
import { stat } from "node:fs/promises"
import { join } from "node:path"
import { createInterface } from "node:readline"

import { parseRawRecord } from "../records/record.js"
import type { BusinessRecord } from "../records/record.js"
import { isCancellationError, throwIfAborted } from "../utils/cancel.js"
import { getErrorMessage, isMissingFileError } from "../utils/errors.js"
import { ProducerError, areaSlug } from "./types.js"
import type { ProduceRequest, RecordProducer } from "./types.js"

export interface JsonlProducerConfig {
  sourceDir: string
}

/**
 * Replays extracted listings from `<source-dir>/<area-slug>.jsonl`, one JSON
 * object per line. Blank lines are ignored; a malformed line fails the area.
 */
export class JsonlProducer implements RecordProducer {
  readonly name = "jsonl"

  constructor(private readonly config: JsonlProducerConfig) {}

  sourceFile(area: string): string {
    return join(this.config.sourceDir, `${areaSlug(area)}.jsonl`)
  }

  async *produce(request: ProduceRequest, signal?: AbortSignal): AsyncGenerator<BusinessRecord> {
    const file = this.sourceFile(request.area)
    await this.ensureReadable(file, request.area)

    const input = createReadStream(file, { encoding: "utf-8" })
    const lines = createInterface({ input, crlfDelay: Infinity })
    let lineNumber = 0
    try {
      for await (const line of lines) {
        lineNumber += 1
        throwIfAborted(signal)
        if (!line.trim()) {
          continue
        }
        yield this.parseLine(line, lineNumber, request.area)
      }
    } catch (error) {
      if (error instanceof ProducerError || isCancellationError(error)) {
        throw error
      }
      throw new ProducerError(
        request.area,
        `Failed to read ${file}: ${getErrorMessage(error)}`,
        { cause: error },
      )
    } finally {
      lines.close()
      input.destroy()
    }
  }

  private async ensureReadable(file: string, area: string): Promise<void> {
    try {
      await stat(file)
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new ProducerError(area, `No source data for area "${area}" (${file})`, {
          cause: error,
        })
      }
      throw new ProducerError(area, `Cannot access ${file}: ${getErrorMessage(error)}`, {
        cause: error,
      })
    }
  }

  private parseLine(line: string, lineNumber: number, area: string): BusinessRecord {
    let parsed: unknown
    try {
      parsed = JSON.parse(line)
    } catch (error) {
      throw new ProducerError(area, `Line ${lineNumber} is not valid JSON`, { cause: error })
    }
    const result = parseRawRecord(parsed)
    if (!result.success) {
      throw new ProducerError(area, `Line ${lineNumber}: ${result.message}`)
    }
    return result.record
  }
}
