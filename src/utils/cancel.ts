export class CancellationError extends Error {
  constructor(message = "Job cancelled") {
    super(message)
    this.name = "CancellationError"
  }
}

export const toCancellationError = (signal: AbortSignal): CancellationError => {
  const reason: unknown = signal.reason
  if (reason instanceof CancellationError) {
    return reason
  }
  if (reason instanceof Error && reason.message.trim()) {
    return new CancellationError(reason.message)
  }
  if (typeof reason === "string" && reason.trim()) {
    return new CancellationError(reason)
  }
  return new CancellationError()
}

/** Failure detail recorded on an area that stopped because its job was aborted. */
export const cancellationDetail = (signal: AbortSignal): string =>
  `Cancelled: ${toCancellationError(signal).message}`

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (!signal?.aborted) {
    return
  }
  throw toCancellationError(signal)
}

export const isCancellationError = (value: unknown): boolean => {
  if (value instanceof CancellationError) {
    return true
  }
  if (!(value instanceof Error)) {
    return false
  }
  return value.name === "AbortError" || value.name === "CancellationError"
}
