import { EventEmitter } from "node:events"

const EVENT = "event"

export const DEFAULT_STREAM_BUFFER = 256

export interface EventChannelOptions {
  /** Receives exceptions thrown by subscribers; they never reach the publisher. */
  onListenerError?: (error: unknown) => void
}

export interface EventStreamOptions {
  /** Oldest buffered events are dropped once this many are waiting. */
  bufferSize?: number
  signal?: AbortSignal
}

/**
 * Publish/subscribe fan-out. `publish` dispatches synchronously to every
 * subscriber and never waits on a consumer.
 */
export class EventChannel<TEvent> {
  private readonly emitter = new EventEmitter()
  private readonly onListenerError: (error: unknown) => void

  constructor(options: EventChannelOptions = {}) {
    this.emitter.setMaxListeners(0)
    this.onListenerError = options.onListenerError ?? (() => undefined)
  }

  publish(event: TEvent): void {
    this.emitter.emit(EVENT, event)
  }

  /** Registers `listener` and returns the matching unsubscribe function. */
  subscribe(listener: (event: TEvent) => void): () => void {
    const guarded = (event: TEvent): void => {
      try {
        listener(event)
      } catch (error) {
        this.onListenerError(error)
      }
    }
    this.emitter.on(EVENT, guarded)
    return () => {
      this.emitter.off(EVENT, guarded)
    }
  }

  get subscriberCount(): number {
    return this.emitter.listenerCount(EVENT)
  }

  /** Async-iterable view for consumers that pull at their own pace. */
  stream(options: EventStreamOptions = {}): EventStream<TEvent> {
    const bufferSize = options.bufferSize ?? DEFAULT_STREAM_BUFFER
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new RangeError(`Stream buffer size must be a positive integer, got ${bufferSize}`)
    }
    const { signal } = options
    let unsubscribe: () => void = () => undefined
    const onAbort = (): void => {
      stream.end()
    }
    const stream = new EventStream<TEvent>(bufferSize, () => {
      unsubscribe()
      signal?.removeEventListener("abort", onAbort)
    })
    unsubscribe = this.subscribe((event) => {
      stream.push(event)
    })

    if (signal?.aborted) {
      stream.end()
    } else {
      signal?.addEventListener("abort", onAbort, { once: true })
    }
    return stream
  }
}

export class EventStream<TEvent> implements AsyncIterableIterator<TEvent> {
  private readonly buffer: TEvent[] = []
  private waiting: ((result: IteratorResult<TEvent>) => void) | null = null
  private ended = false
  private droppedCount = 0

  constructor(
    private readonly bufferSize: number,
    private readonly detach: () => void,
  ) {}

  /** Events discarded because the consumer fell behind. */
  get dropped(): number {
    return this.droppedCount
  }

  get buffered(): number {
    return this.buffer.length
  }

  push(event: TEvent): void {
    if (this.ended) {
      return
    }
    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: event, done: false })
      return
    }
    if (this.buffer.length >= this.bufferSize) {
      this.buffer.shift()
      this.droppedCount += 1
    }
    this.buffer.push(event)
  }

  /** Stops receiving; already buffered events are still delivered. */
  end(): void {
    if (this.ended) {
      return
    }
    this.ended = true
    this.detach()
    if (this.waiting) {
      const resolve = this.waiting
      this.waiting = null
      resolve({ value: undefined, done: true })
    }
  }

  next(): Promise<IteratorResult<TEvent>> {
    if (this.buffer.length > 0) {
      const [event] = this.buffer.splice(0, 1)
      return Promise.resolve({ value: event, done: false })
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true })
    }
    return new Promise((resolve) => {
      this.waiting = resolve
    })
  }

  return(): Promise<IteratorResult<TEvent>> {
    this.buffer.length = 0
    this.end()
    return Promise.resolve({ value: undefined, done: true })
  }

  [Symbol.asyncIterator](): this {
    return this
  }
}
