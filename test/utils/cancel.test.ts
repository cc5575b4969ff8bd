import { describe, expect, it } from "vitest"

import {
  CancellationError,
  cancellationDetail,
  isCancellationError,
  throwIfAborted,
  toCancellationError,
} from "../../src/utils/cancel.js"

const abortedWith = (reason?: unknown): AbortSignal => {
  const controller = new AbortController()
  controller.abort(reason)
  return controller.signal
}

describe("cancellation helpers", () => {
  it("keeps a cancellation reason as is", () => {
    const reason = new CancellationError("Interrupted")
    expect(toCancellationError(abortedWith(reason))).toBe(reason)
  })

  it("wraps error and string reasons", () => {
    expect(toCancellationError(abortedWith(new Error("Output writer failed: disk full"))).message).toBe(
      "Output writer failed: disk full",
    )
    expect(toCancellationError(abortedWith("shutdown")).message).toBe("shutdown")
  })

  it("describes why an area stopped", () => {
    expect(cancellationDetail(abortedWith(new CancellationError("Job cancelled by request")))).toBe(
      "Cancelled: Job cancelled by request",
    )
  })

  it("throws only once aborted", () => {
    expect(() => throwIfAborted(undefined)).not.toThrow()
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow()
    expect(() => throwIfAborted(abortedWith("stop"))).toThrow(CancellationError)
  })

  it("recognizes cancellation and abort errors", () => {
    const abortError = new Error("aborted")
    abortError.name = "AbortError"

    expect(isCancellationError(new CancellationError())).toBe(true)
    expect(isCancellationError(abortError)).toBe(true)
    expect(isCancellationError(new Error("disk full"))).toBe(false)
    expect(isCancellationError("AbortError")).toBe(false)
  })
})
