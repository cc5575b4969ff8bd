import type { JobMetrics } from "./types.js"

export const DEFAULT_METRICS_WINDOW_MS = 180_000

interface ProgressSample {
  at: number
  accepted: number
}

/**
 * Sliding window of accepted-record samples. Throughput is the slope between
 * the oldest and newest sample still inside the window.
 */
export class ThroughputTracker {
  private readonly samples: ProgressSample[] = []

  constructor(private readonly windowMs: number = DEFAULT_METRICS_WINDOW_MS) {}

  record(at: number, accepted: number): void {
    this.samples.push({ at, accepted })
    const cutoff = at - this.windowMs
    while (this.samples.length > 2 && this.samples[0].at < cutoff) {
      this.samples.shift()
    }
  }

  compute(elapsedSeconds: number, accepted: number, target: number): JobMetrics {
    const idle: JobMetrics = { elapsedSeconds, throughputPerMinute: 0, etaSeconds: null }
    if (this.samples.length < 2) {
      return idle
    }

    const first = this.samples[0]
    const last = this.samples[this.samples.length - 1]
    const seconds = (last.at - first.at) / 1000
    const delta = last.accepted - first.accepted
    if (seconds <= 0 || delta <= 0) {
      return idle
    }

    const perSecond = delta / seconds
    const remaining = Math.max(target - accepted, 0)
    return {
      elapsedSeconds,
      throughputPerMinute: perSecond * 60,
      etaSeconds: remaining / perSecond,
    }
  }
}
