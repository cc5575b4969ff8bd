import { sqliteTable, text, integer, primaryKey, uniqueIndex } from "drizzle-orm/sqlite-core"

export const jobs = sqliteTable("jobs", {
  id: text("id").primaryKey(),
  businessType: text("business_type").notNull(),
  region: text("region"),
  outputFile: text("output_file").notNull(),
  appendMode: integer("append_mode", { mode: "boolean" }).notNull(),
  policy: text("policy").notNull(), // "partial" | "strict"
  status: text("status").notNull(), // "completed" | "failed"
  perArea: integer("per_area").notNull(),
  accepted: integer("accepted").notNull(),
  duplicates: integer("duplicates").notNull(),
  artifactRows: integer("artifact_rows").notNull(),
  error: text("error"),
  createdAt: text("created_at").notNull(), // ISO timestamp
  endedAt: text("ended_at"),
})

export const areaResults = sqliteTable(
  "area_results",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    jobId: text("job_id")
      .notNull()
      .references(() => jobs.id),
    area: text("area").notNull(),
    status: text("status").notNull(),
    accepted: integer("accepted").notNull(),
    duplicates: integer("duplicates").notNull(),
    raw: integer("raw").notNull(),
    error: text("error"),
    startedAt: text("started_at"),
    endedAt: text("ended_at"),
  },
  (table) => [uniqueIndex("uq_job_area").on(table.jobId, table.area)],
)

export const resumePoints = sqliteTable(
  "resume_points",
  {
    query: text("query").notNull(),
    outputFile: text("output_file").notNull(), // resolved path
    target: integer("target").notNull(),
    accepted: integer("accepted").notNull(),
    position: integer("position").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => [primaryKey({ columns: [table.query, table.outputFile] })],
)

/** DDL matching the tables above, applied on open. */
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS jobs (
  id TEXT PRIMARY KEY NOT NULL,
  business_type TEXT NOT NULL,
  region TEXT,
  output_file TEXT NOT NULL,
  append_mode INTEGER NOT NULL,
  policy TEXT NOT NULL,
  status TEXT NOT NULL,
  per_area INTEGER NOT NULL,
  accepted INTEGER NOT NULL,
  duplicates INTEGER NOT NULL,
  artifact_rows INTEGER NOT NULL,
  error TEXT,
  created_at TEXT NOT NULL,
  ended_at TEXT
);
CREATE TABLE IF NOT EXISTS area_results (
  id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
  job_id TEXT NOT NULL REFERENCES jobs(id),
  area TEXT NOT NULL,
  status TEXT NOT NULL,
  accepted INTEGER NOT NULL,
  duplicates INTEGER NOT NULL,
  raw INTEGER NOT NULL,
  error TEXT,
  started_at TEXT,
  ended_at TEXT
);
CREATE UNIQUE INDEX IF NOT EXISTS uq_job_area ON area_results (job_id, area);
CREATE TABLE IF NOT EXISTS resume_points (
  query TEXT NOT NULL,
  output_file TEXT NOT NULL,
  target INTEGER NOT NULL,
  accepted INTEGER NOT NULL,
  position INTEGER NOT NULL,
  updated_at TEXT NOT NULL,
  PRIMARY KEY (query, output_file)
);
`
