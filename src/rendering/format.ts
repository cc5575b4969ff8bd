import type { JobMetrics } from "../jobs/types.js"

const PREFERRED_PREVIEW_COLUMNS = [
  "name",
  "address",
  "phone_number",
  "reviews_count",
  "reviews_average",
]

const MAX_PREVIEW_COLUMNS = 5

/** Columns worth showing in a terminal-width preview. */
export const previewColumns = (columns: readonly string[]): string[] => {
  const preferred = PREFERRED_PREVIEW_COLUMNS.filter((column) => columns.includes(column))
  return preferred.length > 0 ? preferred : columns.slice(0, MAX_PREVIEW_COLUMNS)
}

export const truncate = (value: string, max: number): string => {
  const compact = value.trim().replaceAll(/\s+/g, " ")
  return compact.length > max ? `${compact.slice(0, max - 3)}...` : compact
}

/** `42s`, `3m 05s`, `1h 02m`. */
export const formatDuration = (seconds: number): string => {
  const total = Math.max(Math.round(seconds), 0)
  if (total < 60) {
    return `${total}s`
  }
  const minutes = Math.floor(total / 60)
  if (minutes < 60) {
    return `${minutes}m ${String(total % 60).padStart(2, "0")}s`
  }
  return `${Math.floor(minutes / 60)}h ${String(minutes % 60).padStart(2, "0")}m`
}

export const formatMetrics = (accepted: number, target: number, metrics: JobMetrics): string => {
  const rate = `${metrics.throughputPerMinute.toFixed(1)}/min`
  const eta = metrics.etaSeconds === null ? "eta --" : `eta ${formatDuration(metrics.etaSeconds)}`
  return `${accepted}/${target} accepted | ${rate} | ${eta}`
}
