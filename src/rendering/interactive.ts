import boxen from "boxen"
import chalk from "chalk"
import cliProgress from "cli-progress"
import Table from "cli-table3"
import ora from "ora"

import type { JobHistoryRow } from "../db/store.js"
import type { AreaState, AreaStatus, JobAggregate, JobMetrics } from "../jobs/types.js"
import { formatMetrics, previewColumns, truncate } from "./format.js"
import type {
  AreaProgressView,
  CliRenderer,
  PreviewTable,
  RunHeader,
  SpinnerHandle,
} from "./types.js"

const STATUS_LABELS: Record<AreaStatus, string> = {
  pending: chalk.gray("pending"),
  running: chalk.cyan("running"),
  completed: chalk.green("completed"),
  failed: chalk.red("failed"),
}

export class InteractiveRenderer implements CliRenderer {
  private multiBar: cliProgress.MultiBar | null = null
  private readonly bars = new Map<string, cliProgress.SingleBar>()
  private totalBar: cliProgress.SingleBar | null = null
  private perArea = 1

  header(info: RunHeader): void {
    this.perArea = info.perArea
    const where = info.region ? `${info.areaCount} areas, ${info.region}` : `${info.areaCount} areas`
    const body = [
      `${chalk.bold("Job")}         ${info.jobId}`,
      `${chalk.bold("Business")}    ${info.businessType}`,
      `${chalk.bold("Areas")}       ${where} × ${info.perArea} results`,
      `${chalk.bold("Output")}      ${info.outputFile} ${info.append ? chalk.yellow("(append)") : ""}`,
      `${chalk.bold("Source")}      ${info.source}, concurrency ${info.concurrency}`,
    ].join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold("Area Harvest"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  artifactReady(outputFile: string, existingRows: number): void {
    if (existingRows > 0) {
      this.print(chalk.cyan(`Appending to ${outputFile}: ${existingRows} existing rows marked as seen`))
    }
  }

  updateArea(view: AreaProgressView): void {
    const bar = this.getOrCreateBar(view.area)
    bar.update(view.accepted, {
      label: view.area,
      detail: `${view.duplicates} dup | ${STATUS_LABELS[view.status]}`,
    })
  }

  areaFinished(state: AreaState): void {
    const bar = this.getOrCreateBar(state.area)
    bar.update(state.accepted, {
      label: state.area,
      detail: `${state.duplicates} dup | ${STATUS_LABELS[state.status]}`,
    })
    if (state.status === "failed" && state.error) {
      this.print(chalk.red(`[ERR] ${state.area} - ${state.error}`))
    }
  }

  updateMetrics(accepted: number, target: number, metrics: JobMetrics): void {
    const multi = this.getOrCreateMultiBar()
    if (!this.totalBar) {
      this.totalBar = multi.create(target, 0, { label: chalk.bold("total"), detail: "" })
    }
    this.totalBar.setTotal(target)
    this.totalBar.update(accepted, {
      label: chalk.bold("total"),
      detail: chalk.dim(formatMetrics(accepted, target, metrics)),
    })
  }

  stopProgress(): void {
    this.multiBar?.stop()
    this.multiBar = null
    this.totalBar = null
    this.bars.clear()
  }

  createSpinner(text: string): SpinnerHandle {
    const spinner = ora(text).start()
    return {
      update(nextText) {
        spinner.text = nextText
      },
      succeed(finalText) {
        spinner.succeed(finalText)
      },
      fail(finalText) {
        spinner.fail(finalText)
      },
      warn(finalText) {
        spinner.warn(finalText)
      },
    }
  }

  showSummary(aggregate: JobAggregate): void {
    const table = new Table({
      head: ["Area", "Status", "Accepted", "Duplicates", "Raw", "Detail"].map((h) => chalk.bold(h)),
    })
    for (const area of aggregate.areas) {
      table.push([
        area.area,
        STATUS_LABELS[area.status],
        area.accepted,
        area.duplicates,
        area.raw,
        area.error ? truncate(area.error, 60) : "",
      ])
    }
    console.log(table.toString())

    const totals = `${aggregate.accepted} accepted, ${aggregate.duplicates} duplicates, ${aggregate.artifactRows} rows in artifact`
    if (aggregate.status === "completed") {
      console.log(chalk.green(`[OK] ${totals}`))
    } else {
      console.log(chalk.red(`[FAILED] ${aggregate.error ?? "job failed"} (${totals})`))
    }
  }

  showPreview(preview: PreviewTable): void {
    const columns = previewColumns(preview.columns)
    console.log(chalk.bold(preview.title))
    if (preview.rows.length === 0) {
      console.log(chalk.gray("  (no rows)"))
      return
    }
    const table = new Table({ head: columns.map((column) => chalk.bold(column)) })
    for (const row of preview.rows) {
      table.push(columns.map((column) => truncate(row[column] ?? "", 36)))
    }
    console.log(table.toString())
  }

  showHistory(rows: JobHistoryRow[]): void {
    if (rows.length === 0) {
      console.log(chalk.gray("No recorded jobs yet."))
      return
    }
    const table = new Table({
      head: ["Started", "Business", "Status", "Accepted", "Dups", "Rows", "Output"].map((h) =>
        chalk.bold(h),
      ),
    })
    for (const row of rows) {
      table.push([
        row.createdAt.replace("T", " ").slice(0, 19),
        truncate(row.businessType, 24),
        row.status === "completed" ? chalk.green(row.status) : chalk.red(row.status),
        row.accepted,
        row.duplicates,
        row.artifactRows,
        truncate(row.outputFile, 40),
      ])
    }
    console.log(table.toString())
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    this.print(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  pipelineComplete(elapsedSeconds: number, outputFile: string): void {
    console.log(
      boxen(
        `${chalk.bold("Duration")}    ${elapsedSeconds}s\n${chalk.bold("Output")}      ${outputFile}`,
        {
          title: chalk.green("Harvest Complete"),
          borderColor: "green",
          padding: 1,
        },
      ),
    )
  }

  warn(message: string): void {
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    console.error(chalk.red(message))
  }

  private print(line: string): void {
    if (this.multiBar) {
      this.multiBar.log(`${line}\n`)
      return
    }
    console.log(line)
  }

  private getOrCreateBar(area: string): cliProgress.SingleBar {
    const existing = this.bars.get(area)
    if (existing) {
      return existing
    }
    const bar = this.getOrCreateMultiBar().create(this.perArea, 0, { label: area, detail: "" })
    this.bars.set(area, bar)
    return bar
  }

  private getOrCreateMultiBar(): cliProgress.MultiBar {
    if (!this.multiBar) {
      this.multiBar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          emptyOnZero: true,
          format: (options, params, payload: Record<string, unknown>) => {
            const label = typeof payload.label === "string" ? payload.label : ""
            const detail = typeof payload.detail === "string" ? payload.detail : ""
            const barSize = options.barsize ?? 20
            const completeSize = Math.round(params.progress * barSize)
            const bar =
              (options.barCompleteString ?? "").substring(0, completeSize) +
              (options.barIncompleteString ?? "").substring(0, barSize - completeSize)
            return `  ${bar} ${params.value}/${params.total} | ${label} | ${detail}`
          },
        },
        cliProgress.Presets.shades_classic,
      )
    }

    return this.multiBar
  }
}
