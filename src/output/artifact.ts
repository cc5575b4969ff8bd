import { closeSync, createReadStream, openSync, readSync } from "node:fs"
import { open, stat } from "node:fs/promises"

import Papa from "papaparse"

import { resolveHeader } from "../records/record.js"
import { isMissingFileError, isNotAFileError } from "../utils/errors.js"
import { isStringArray } from "../utils/type-guards.js"
import { throwIfAborted } from "../utils/cancel.js"

export interface ArtifactPreview {
  columns: string[]
  rows: Record<string, string>[]
}

export interface RecordIdentity {
  name: string
  address: string
}

/** Size of the file in bytes, or `null` when it does not exist. */
export const artifactSize = async (path: string): Promise<number | null> => {
  try {
    return (await stat(path)).size
  } catch (error) {
    if (isMissingFileError(error)) {
      return null
    }
    throw error
  }
}

const PROBE_BYTES = 64 * 1024

/**
 * Whether the file has content after its header line. Reads the first 64 KiB
 * synchronously. A path that is not a regular file holds no rows; opening the
 * writer reports it.
 */
export const artifactHasRowsSync = (path: string): boolean => {
  let fd: number | null = null
  try {
    fd = openSync(path, "r")
    const buffer = Buffer.alloc(PROBE_BYTES)
    const read = readSync(fd, buffer, 0, PROBE_BYTES, 0)
    const text = buffer.toString("utf-8", 0, read)
    const headerEnd = text.indexOf("\n")
    return headerEnd !== -1 && text.slice(headerEnd + 1).trim().length > 0
  } catch (error) {
    if (isNotAFileError(error)) {
      return false
    }
    throw error
  } finally {
    if (fd !== null) {
      closeSync(fd)
    }
  }
}

/**
 * Streams CSV rows (header included) without materializing the file.
 * A missing file yields nothing. Breaking out of the loop releases the file.
 */
export async function* readArtifactRows(
  path: string,
  signal?: AbortSignal,
): AsyncGenerator<string[], void, undefined> {
  const size = await artifactSize(path)
  if (size === null || size === 0) {
    return
  }

  const source = createReadStream(path, { encoding: "utf-8" })
  const parser = Papa.parse(Papa.NODE_STREAM_INPUT, { skipEmptyLines: true })
  source.on("error", (error) => parser.destroy(error))
  source.pipe(parser)

  try {
    for await (const row of parser) {
      throwIfAborted(signal)
      if (isStringArray(row)) {
        yield row
      }
    }
  } finally {
    source.destroy()
    parser.destroy()
  }
}

export const readArtifactHeader = async (path: string): Promise<string[] | null> => {
  for await (const row of readArtifactRows(path)) {
    return row.map((column) => column.trim())
  }
  return null
}

/** Whether a non-empty file ends with a line break (new rows can be appended as is). */
export const endsWithLineBreak = async (path: string): Promise<boolean> => {
  const handle = await open(path, "r")
  try {
    const { size } = await handle.stat()
    if (size === 0) {
      return true
    }
    const buffer = Buffer.alloc(1)
    await handle.read(buffer, 0, 1, size - 1)
    return buffer[0] === 0x0a
  } finally {
    await handle.close()
  }
}

/**
 * Yields the `name` and `address` cell of every data row, located the way the
 * writer locates them when appending. Other cells are
 * read by the parser but never retained.
 */
export async function* scanArtifactIdentities(
  path: string,
  signal?: AbortSignal,
): AsyncGenerator<RecordIdentity, void, undefined> {
  let nameIndex = -1
  let addressIndex = -1
  let headerSeen = false

  for await (const row of readArtifactRows(path, signal)) {
    if (!headerSeen) {
      headerSeen = true
      const layout = resolveHeader(row)
      nameIndex = layout.indexOf("name")
      addressIndex = layout.indexOf("address")
      continue
    }
    yield {
      name: nameIndex === -1 ? "" : (row[nameIndex] ?? ""),
      address: addressIndex === -1 ? "" : (row[addressIndex] ?? ""),
    }
  }
}

/** First `limit` data rows keyed by header column. Reads only the file prefix. */
export const previewArtifact = async (path: string, limit: number): Promise<ArtifactPreview> => {
  let columns: string[] | null = null
  const rows: Record<string, string>[] = []
  if (limit < 1) {
    return { columns: (await readArtifactHeader(path)) ?? [], rows }
  }

  for await (const row of readArtifactRows(path)) {
    if (columns === null) {
      columns = row.map((column) => column.trim())
      continue
    }
    const header = columns
    rows.push(Object.fromEntries(header.map((column, index) => [column, row[index] ?? ""])))
    if (rows.length >= limit) {
      break
    }
  }
  return { columns: columns ?? [], rows }
}

/** Number of data rows (header excluded). Streams the whole file. */
export const countArtifactRows = async (path: string, signal?: AbortSignal): Promise<number> => {
  let rows = -1
  for await (const _row of readArtifactRows(path, signal)) {
    rows += 1
  }
  return Math.max(rows, 0)
}
