import { mkdir } from "node:fs/promises"
import { dirname, resolve } from "node:path"
import { homedir } from "node:os"

import Database from "better-sqlite3"
import { drizzle } from "drizzle-orm/better-sqlite3"
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { and, asc, desc, eq } from "drizzle-orm"
import type { SQL } from "drizzle-orm"

import * as schema from "./schema.js"
import type {
  AreaState,
  JobAggregate,
  JobHistoryRecorder,
  ResumePoint,
  ResumeStore,
} from "../jobs/types.js"

// ── Public types ────────────────────────────────────────────────────

export type JobHistoryRow = typeof schema.jobs.$inferSelect

export type AreaResultRow = typeof schema.areaResults.$inferSelect

// ── JobHistoryStore ─────────────────────────────────────────────────

export const defaultDbPath = (): string => resolve(homedir(), ".area-harvest", "history.db")

export class JobHistoryStore implements JobHistoryRecorder, ResumeStore {
  private constructor(
    private readonly db: BetterSQLite3Database<typeof schema>,
    private readonly sqlite: InstanceType<typeof Database>,
  ) {}

  /** Factory: opens the DB and creates missing tables. */
  static async open(dbPath: string = defaultDbPath()): Promise<JobHistoryStore> {
    await mkdir(dirname(dbPath), { recursive: true })
    const sqlite = new Database(dbPath)
    sqlite.pragma("journal_mode = WAL")
    sqlite.pragma("foreign_keys = ON")
    sqlite.exec(schema.CREATE_TABLES_SQL)
    return new JobHistoryStore(drizzle(sqlite, { schema }), sqlite)
  }

  /** Writes a finished job and its areas in one transaction. Re-recording replaces both. */
  recordJob(aggregate: JobAggregate): Promise<void> {
    return Promise.resolve().then(() => {
      this.writeJob(aggregate)
    })
  }

  async listJobs(limit = 20): Promise<JobHistoryRow[]> {
    return await this.db
      .select()
      .from(schema.jobs)
      .orderBy(desc(schema.jobs.createdAt))
      .limit(limit)
  }

  async getAreaResults(jobId: string): Promise<AreaResultRow[]> {
    return await this.db
      .select()
      .from(schema.areaResults)
      .where(eq(schema.areaResults.jobId, jobId))
      .orderBy(asc(schema.areaResults.id))
  }

  // ── Resume points ───────────────────────────────────────────────────

  async loadResumePoint(query: string, outputFile: string): Promise<ResumePoint | null> {
    const rows = await this.db
      .select()
      .from(schema.resumePoints)
      .where(this.resumeKey(query, outputFile))
      .limit(1)
    return rows.at(0) ?? null
  }

  /** Upserts the point of one query and artifact. */
  async saveResumePoint(point: ResumePoint): Promise<void> {
    await this.db
      .insert(schema.resumePoints)
      .values(point)
      .onConflictDoUpdate({
        target: [schema.resumePoints.query, schema.resumePoints.outputFile],
        set: {
          target: point.target,
          accepted: point.accepted,
          position: point.position,
          updatedAt: point.updatedAt,
        },
      })
  }

  async clearResumePoint(query: string, outputFile: string): Promise<void> {
    await this.db.delete(schema.resumePoints).where(this.resumeKey(query, outputFile))
  }

  /** Saved points, most recently updated first; only those of `outputFile` when given. */
  async listResumePoints(outputFile?: string): Promise<ResumePoint[]> {
    return await this.db
      .select()
      .from(schema.resumePoints)
      .where(outputFile === undefined ? undefined : eq(schema.resumePoints.outputFile, outputFile))
      .orderBy(desc(schema.resumePoints.updatedAt))
  }

  close(): void {
    this.sqlite.close()
  }

  private resumeKey(query: string, outputFile: string): SQL | undefined {
    return and(
      eq(schema.resumePoints.query, query),
      eq(schema.resumePoints.outputFile, outputFile),
    )
  }

  private writeJob(aggregate: JobAggregate): void {
    const job = {
      id: aggregate.id,
      businessType: aggregate.businessType,
      region: aggregate.region,
      outputFile: aggregate.outputFile,
      appendMode: aggregate.append,
      policy: aggregate.policy,
      status: aggregate.status,
      perArea: aggregate.perArea,
      accepted: aggregate.accepted,
      duplicates: aggregate.duplicates,
      artifactRows: aggregate.artifactRows,
      error: aggregate.error,
      createdAt: aggregate.createdAt,
      endedAt: aggregate.endedAt,
    }

    this.db.transaction((tx) => {
      tx.delete(schema.areaResults).where(eq(schema.areaResults.jobId, aggregate.id)).run()
      tx.insert(schema.jobs)
        .values(job)
        .onConflictDoUpdate({ target: schema.jobs.id, set: job })
        .run()
      if (aggregate.areas.length > 0) {
        tx.insert(schema.areaResults)
          .values(aggregate.areas.map((area) => toAreaRow(aggregate.id, area)))
          .run()
      }
    })
  }
}

const toAreaRow = (jobId: string, area: AreaState): typeof schema.areaResults.$inferInsert => ({
  jobId,
  area: area.area,
  status: area.status,
  accepted: area.accepted,
  duplicates: area.duplicates,
  raw: area.raw,
  error: area.error,
  startedAt: area.startedAt,
  endedAt: area.endedAt,
})
