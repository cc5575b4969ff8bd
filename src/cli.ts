#!/usr/bin/env node
import { resolve } from "node:path"

import { Command } from "commander"

import { parseLimitOption, parseRunOptions } from "./cli-options.js"
import type { RunOptions } from "./cli-options.js"
import { readEnvConfig } from "./config.js"
import { JobHistoryStore } from "./db/store.js"
import { EventChannel } from "./events/event-channel.js"
import { countArtifactRows, previewArtifact } from "./output/artifact.js"
import { loadAreasFile } from "./jobs/areas-file.js"
import { JobOrchestrator } from "./jobs/orchestrator.js"
import type { JobEvent } from "./jobs/types.js"
import { createProducer } from "./producers/registry.js"
import { createRenderer, renderJobEvent } from "./rendering/index.js"
import type { CliRenderer, VerboseLog } from "./rendering/types.js"
import { isCancellationError } from "./utils/cancel.js"
import { getErrorMessage } from "./utils/errors.js"

type CommandAction = (...args: unknown[]) => Promise<void>

interface CommandHandlers {
  run: (opts: Record<string, unknown>) => Promise<number>
  preview: (file: string, opts: Record<string, unknown>) => Promise<number>
  history: (opts: Record<string, unknown>) => Promise<number>
  resumePoints: (file: string | undefined, opts: Record<string, unknown>) => Promise<number>
}

const toOptionBag = (value: unknown): Record<string, unknown> =>
  typeof value === "object" && value !== null ? Object.fromEntries(Object.entries(value)) : {}

const createProgram = (handlers: CommandHandlers, setExitCode: (code: number) => void): Command => {
  const program = new Command()
  program.name("area-harvest").description("Harvest business listings area by area into one CSV")

  const runAction: CommandAction = async (opts) => {
    setExitCode(await handlers.run(toOptionBag(opts)))
  }
  program
    .command("run")
    .description("Run one harvest job")
    .requiredOption("--business-type <type>", 'Business type to search for (e.g. "dentists")')
    .option("--areas <areas...>", "Area names (space or comma separated)")
    .option("--areas-file <path>", "YAML file listing the areas")
    .option("--region <region>", 'Region appended to every search (e.g. "Chennai")')
    .option("--per-area <number>", "Accepted results per area", "20")
    .option("--output <file>", "CSV artifact (default: output/<business-type>.csv)")
    .option("--append", "Append to an existing artifact, skipping rows it already holds", false)
    .option("--overwrite", "Start over an existing artifact that already holds rows", false)
    .option("--no-resume", "Do not continue areas from where an earlier run stopped")
    .option("--concurrency <number>", "Areas harvested in parallel")
    .option("--source <name>", "Record producer: jsonl or snapshot", "jsonl")
    .option("--source-dir <path>", "Directory holding per-area source files", "data")
    .option("--batch-size <number>", "Rows per CSV flush")
    .option("--cache-capacity <number>", "Fingerprints remembered per job")
    .option("--strict", "Fail the job when any area fails", false)
    .option("--preview <number>", "Rows to preview after the run (0 disables)", "10")
    .option("--plain", "Line-oriented output without progress bars", false)
    .option("--verbose", "Show detailed timing logs", false)
    .option("--no-history", "Do not record the job in the history database")
    .action(runAction)

  const previewAction: CommandAction = async (file, opts) => {
    setExitCode(await handlers.preview(String(file), toOptionBag(opts)))
  }
  program
    .command("preview")
    .description("Show the first rows of a CSV artifact")
    .argument("<file>", "CSV artifact")
    .option("--limit <number>", "Rows to show", "10")
    .option("--plain", "Plain output", false)
    .action(previewAction)

  const historyAction: CommandAction = async (opts) => {
    setExitCode(await handlers.history(toOptionBag(opts)))
  }
  program
    .command("history")
    .description("List recorded jobs")
    .option("--limit <number>", "Jobs to show", "20")
    .option("--plain", "Plain output", false)
    .action(historyAction)

  const resumePointsAction: CommandAction = async (file, opts) => {
    setExitCode(
      await handlers.resumePoints(typeof file === "string" ? file : undefined, toOptionBag(opts)),
    )
  }
  program
    .command("resume-points")
    .description("List where unfinished areas stopped")
    .argument("[file]", "Only points of this CSV artifact")
    .option("--plain", "Plain output", false)
    .action(resumePointsAction)

  return program
}

const rendererFor = (plain: unknown): CliRenderer =>
  createRenderer(plain === true || !process.stdout.isTTY ? "plain" : "interactive")

interface SigintHandle {
  interrupted: () => boolean
  dispose: () => void
}

const setupSigintCancellation = (renderer: CliRenderer, cancel: () => void): SigintHandle => {
  let sigintCount = 0
  const onSigint = () => {
    sigintCount += 1
    if (sigintCount === 1) {
      renderer.warn("\nInterrupted (CTRL+C). Finishing current records...")
      cancel()
      return
    }
    renderer.error("Force exit requested.")
    process.exit(130)
  }
  process.on("SIGINT", onSigint)
  return {
    interrupted: () => sigintCount > 0,
    dispose: () => process.off("SIGINT", onSigint),
  }
}

const resolveAreas = async (
  options: RunOptions,
): Promise<{ areas: string[]; region: string | undefined }> => {
  if (!options.areasFile) {
    return { areas: options.areas, region: options.region }
  }
  const file = await loadAreasFile(options.areasFile)
  return { areas: file.areas, region: options.region ?? file.region ?? undefined }
}

// ── Commands ────────────────────────────────────────────────────────

const runCommand = async (rawOpts: Record<string, unknown>): Promise<number> => {
  const env = readEnvConfig()
  const options = parseRunOptions(rawOpts, env)
  const renderer = rendererFor(options.plain)
  const startedAt = Date.now()
  const verboseLog: VerboseLog | undefined = options.verbose
    ? (scope, message) => {
        renderer.logVerbose(scope, message, (Date.now() - startedAt) / 1000)
      }
    : undefined

  const { areas, region } = await resolveAreas(options)
  const store = options.history ? await JobHistoryStore.open(env.dbPath) : null
  const orchestrator = new JobOrchestrator({
    producer: createProducer(options.source, options.sourceDir, verboseLog),
    channel: new EventChannel<JobEvent>({
      onListenerError: (error) => {
        renderer.warn(`Progress display failed: ${getErrorMessage(error)}`)
      },
    }),
    history: store ?? undefined,
    resume: options.resume ? (store ?? undefined) : undefined,
    verbose: verboseLog,
    cacheCapacity: options.cacheCapacity,
    batchSize: options.batchSize,
    sampling: env.sampling,
  })
  const unsubscribe = orchestrator.channel.subscribe((event) => {
    renderJobEvent(renderer, event)
  })

  let jobId: string | null = null
  const sigint = setupSigintCancellation(renderer, () => {
    if (jobId) {
      orchestrator.cancel(jobId, "Interrupted by user (SIGINT)")
    }
  })

  try {
    const handle = orchestrator.submit({
      businessType: options.businessType,
      areas,
      region,
      perArea: options.perArea,
      outputFile: options.output,
      append: options.append,
      overwrite: options.overwrite,
      concurrency: options.concurrency,
      policy: options.strict ? "strict" : "partial",
    })
    jobId = handle.id
    renderer.header({
      jobId: handle.id,
      businessType: options.businessType,
      region: region ?? null,
      areaCount: areas.length,
      perArea: options.perArea,
      outputFile: options.output,
      append: options.append,
      concurrency: options.concurrency,
      source: options.source,
    })

    const aggregate = await handle.done
    renderer.stopProgress()
    renderer.showSummary(aggregate)

    if (aggregate.status === "completed" && options.preview > 0) {
      const preview = await orchestrator.preview(handle.id, options.preview)
      renderer.showPreview({
        title: `First ${preview.rows.length} rows of ${aggregate.outputFile}`,
        columns: preview.columns,
        rows: preview.rows,
      })
    }

    if (sigint.interrupted()) {
      renderer.warn("Run cancelled by user.")
      return 130
    }
    if (aggregate.status === "completed") {
      renderer.pipelineComplete(Math.round((Date.now() - startedAt) / 1000), aggregate.outputFile)
      return 0
    }
    return 1
  } finally {
    renderer.stopProgress()
    unsubscribe()
    sigint.dispose()
    store?.close()
  }
}

const previewCommand = async (file: string, rawOpts: Record<string, unknown>): Promise<number> => {
  const limit = parseLimitOption(rawOpts["limit"], 10)
  const renderer = rendererFor(rawOpts["plain"])
  const spinner = renderer.createSpinner(`Reading ${file}`)

  const preview = await previewArtifact(file, limit)
  if (preview.columns.length === 0) {
    spinner.fail(`${file} is missing or empty`)
    return 1
  }
  const rows = await countArtifactRows(file)
  spinner.succeed(`${rows} rows in ${file}`)
  renderer.showPreview({
    title: `First ${preview.rows.length} of ${rows} rows`,
    columns: preview.columns,
    rows: preview.rows,
  })
  return 0
}

const historyCommand = async (rawOpts: Record<string, unknown>): Promise<number> => {
  const limit = parseLimitOption(rawOpts["limit"], 20)
  const renderer = rendererFor(rawOpts["plain"])
  const store = await JobHistoryStore.open(readEnvConfig().dbPath)
  try {
    renderer.showHistory(await store.listJobs(limit))
    return 0
  } finally {
    store.close()
  }
}

const resumePointsCommand = async (
  file: string | undefined,
  rawOpts: Record<string, unknown>,
): Promise<number> => {
  const renderer = rendererFor(rawOpts["plain"])
  const spinner = renderer.createSpinner("Reading resume points")
  const store = await JobHistoryStore.open(readEnvConfig().dbPath)
  try {
    const points = await store.listResumePoints(file === undefined ? undefined : resolve(file))
    if (points.length === 0) {
      spinner.succeed("No unfinished areas to resume")
      return 0
    }
    spinner.succeed(`${points.length} unfinished areas`)
    renderer.showPreview({
      title: "Resume points",
      columns: ["query", "output_file", "accepted", "target", "position", "updated_at"],
      rows: points.map((point) => ({
        query: point.query,
        output_file: point.outputFile,
        accepted: String(point.accepted),
        target: String(point.target),
        position: String(point.position),
        updated_at: point.updatedAt,
      })),
    })
    return 0
  } finally {
    store.close()
  }
}

const main = async (argv: string[] = process.argv): Promise<number> => {
  let exitCode = 0
  const program = createProgram(
    {
      run: runCommand,
      preview: previewCommand,
      history: historyCommand,
      resumePoints: resumePointsCommand,
    },
    (code) => {
      exitCode = code
    },
  )
  await program.parseAsync(argv)
  return exitCode
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    if (isCancellationError(error)) {
      console.error("Run cancelled by user.")
      process.exit(130)
    }
    console.error(`Error: ${getErrorMessage(error)}`)
    process.exit(1)
  })
