import { readFile } from "node:fs/promises"
import { join } from "node:path"

import type { BusinessRecord } from "../records/record.js"
import { throwIfAborted } from "../utils/cancel.js"
import { getErrorMessage, isMissingFileError } from "../utils/errors.js"
import type { VerboseLog } from "../rendering/types.js"
import { parseSnapshotPage } from "./snapshot-parse.js"
import { ProducerError, areaSlug } from "./types.js"
import type { ProduceRequest, RecordProducer } from "./types.js"

export interface SnapshotProducerConfig {
  sourceDir: string
  verbose?: VerboseLog
}

/** Extracts listings from saved search-result pages, `<source-dir>/<area-slug>.html`. */
export class SnapshotProducer implements RecordProducer {
  readonly name = "snapshot"

  constructor(private readonly config: SnapshotProducerConfig) {}

  sourceFile(area: string): string {
    return join(this.config.sourceDir, `${areaSlug(area)}.html`)
  }

  async *produce(request: ProduceRequest, signal?: AbortSignal): AsyncGenerator<BusinessRecord> {
    const file = this.sourceFile(request.area)
    const html = await this.readPage(file, request.area)
    throwIfAborted(signal)

    const page = parseSnapshotPage(html)
    if (!page.listFound) {
      throw new ProducerError(request.area, `No result list found in ${file}`)
    }
    if (page.skipped > 0) {
      this.config.verbose?.(
        this.name,
        `${request.area}: skipped ${page.skipped} entries without a business name`,
      )
    }

    for (const record of page.records) {
      throwIfAborted(signal)
      yield record
    }
  }

  private async readPage(file: string, area: string): Promise<string> {
    try {
      return await readFile(file, "utf-8")
    } catch (error) {
      const message = isMissingFileError(error)
        ? `No snapshot for area "${area}" (${file})`
        : `Cannot read ${file}: ${getErrorMessage(error)}`
      throw new ProducerError(area, message, { cause: error })
    }
  }
}
