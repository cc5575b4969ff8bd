import type { JobHistoryRow } from "../db/store.js"
import type { AreaState, JobAggregate, JobMetrics } from "../jobs/types.js"
import { formatMetrics, previewColumns, truncate } from "./format.js"
import type {
  AreaProgressView,
  CliRenderer,
  PreviewTable,
  RunHeader,
  SpinnerHandle,
} from "./types.js"

/** Line-oriented output for pipes, CI logs and `--plain`. */
export class PlainRenderer implements CliRenderer {
  private perArea = 1
  private readonly lastBuckets = new Map<string, number>()

  header(info: RunHeader): void {
    this.perArea = info.perArea
    console.log("=== Area Harvest ===")
    console.log(`Job:      ${info.jobId}`)
    console.log(`Business: ${info.businessType}`)
    console.log(`Areas:    ${info.areaCount}${info.region ? ` (${info.region})` : ""} × ${info.perArea}`)
    console.log(`Output:   ${info.outputFile}${info.append ? " (append)" : ""}`)
    console.log(`Source:   ${info.source}, concurrency ${info.concurrency}`)
    console.log("")
  }

  artifactReady(outputFile: string, existingRows: number): void {
    if (existingRows > 0) {
      console.log(`Appending to ${outputFile}: ${existingRows} existing rows marked as seen`)
    }
  }

  updateArea(view: AreaProgressView): void {
    // one line per 10% step of the area's cap
    const ratio = this.perArea > 0 ? view.accepted / this.perArea : 0
    const bucket = Math.floor(Math.min(ratio, 1) * 10)
    if (view.status === "running" && this.lastBuckets.get(view.area) === bucket) {
      return
    }
    this.lastBuckets.set(view.area, bucket)
    console.log(
      `[${view.area}] ${view.accepted}/${this.perArea} accepted, ${view.duplicates} duplicates (${view.status})`,
    )
  }

  areaFinished(state: AreaState): void {
    this.lastBuckets.delete(state.area)
    if (state.status === "failed") {
      console.log(`[ERR] ${state.area} - ${state.error ?? "failed"}`)
      return
    }
    console.log(`[OK] ${state.area} - ${state.accepted} accepted, ${state.duplicates} duplicates`)
  }

  updateMetrics(_accepted: number, _target: number, _metrics: JobMetrics): void {
    // no-op: totals are printed with the summary
  }

  stopProgress(): void {
    this.lastBuckets.clear()
  }

  createSpinner(text: string): SpinnerHandle {
    console.log(`Starting: ${text}`)
    let lastText = text
    return {
      update(nextText) {
        if (nextText !== lastText) {
          console.log(nextText)
          lastText = nextText
        }
      },
      succeed(finalText) {
        console.log(`Done: ${finalText}`)
      },
      fail(finalText) {
        console.log(`Failed: ${finalText}`)
      },
      warn(finalText) {
        console.log(`Warning: ${finalText}`)
      },
    }
  }

  showSummary(aggregate: JobAggregate): void {
    console.log("")
    console.log("Area                 Status     Accepted  Duplicates  Raw")
    for (const area of aggregate.areas) {
      console.log(
        `${area.area.padEnd(20)} ${area.status.padEnd(10)} ${String(area.accepted).padStart(8)}  ${String(area.duplicates).padStart(10)}  ${String(area.raw).padStart(3)}`,
      )
    }
    const totals = `${aggregate.accepted} accepted, ${aggregate.duplicates} duplicates, ${aggregate.artifactRows} rows in artifact`
    console.log(
      aggregate.status === "completed"
        ? `[OK] ${totals}`
        : `[FAILED] ${aggregate.error ?? "job failed"} (${totals})`,
    )
    console.log(
      formatMetrics(aggregate.accepted, aggregate.target, aggregate.metrics),
    )
  }

  showPreview(preview: PreviewTable): void {
    const columns = previewColumns(preview.columns)
    console.log("")
    console.log(preview.title)
    if (preview.rows.length === 0) {
      console.log("  (no rows)")
      return
    }
    console.log(columns.join(" | "))
    for (const row of preview.rows) {
      console.log(columns.map((column) => truncate(row[column] ?? "", 36)).join(" | "))
    }
  }

  showHistory(rows: JobHistoryRow[]): void {
    if (rows.length === 0) {
      console.log("No recorded jobs yet.")
      return
    }
    for (const row of rows) {
      console.log(
        `${row.createdAt}  ${row.status.padEnd(9)}  ${row.businessType}  ${row.accepted} accepted, ${row.duplicates} dups  ${row.outputFile}`,
      )
    }
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  pipelineComplete(elapsedSeconds: number, outputFile: string): void {
    console.log("")
    console.log("=== Harvest Complete ===")
    console.log(`Duration: ${elapsedSeconds}s`)
    console.log(`Output:   ${outputFile}`)
  }

  warn(message: string): void {
    console.warn(message)
  }

  error(message: string): void {
    console.error(message)
  }
}
