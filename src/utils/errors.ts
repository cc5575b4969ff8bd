export const getErrorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT"

const NOT_A_FILE_CODES: ReadonlySet<unknown> = new Set(["ENOENT", "ENOTDIR", "EISDIR"])

/** The path does not name a regular file: missing, under a file, or a directory. */
export const isNotAFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && NOT_A_FILE_CODES.has(error.code)
