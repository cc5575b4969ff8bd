import type { ProduceRequest, RecordProducer } from "../../src/producers/types.js"
import type { BusinessRecord } from "../../src/records/record.js"
import { WriterError } from "../../src/output/types.js"
import type { OutputWriter } from "../../src/output/types.js"

export const makeRecord = (
  name: string,
  address: string,
  overrides: Partial<BusinessRecord> = {},
): BusinessRecord => ({
  name,
  address,
  website: "",
  phone_number: "",
  reviews_count: null,
  reviews_average: null,
  store_shopping: "No",
  in_store_pickup: "No",
  store_delivery: "No",
  place_type: "",
  opens_at: "",
  introduction: "",
  ...overrides,
})

export type ProduceFn = (request: ProduceRequest, signal?: AbortSignal) => AsyncIterable<BusinessRecord>

/** Producer driven by a per-test function; remembers every request it received. */
export class FunctionProducer implements RecordProducer {
  readonly name = "test"
  readonly requests: ProduceRequest[] = []

  constructor(private readonly fn: ProduceFn) {}

  produce(request: ProduceRequest, signal?: AbortSignal): AsyncIterable<BusinessRecord> {
    this.requests.push(request)
    return this.fn(request, signal)
  }

  requestedAreas(): string[] {
    return this.requests.map((request) => request.area)
  }
}

/**
 * Yields the listed records of each area, letting other areas run between
 * records. An `Error` entry is thrown when reached.
 */
export const inMemoryProducer = (
  byArea: Record<string, readonly (BusinessRecord | Error)[]>,
): FunctionProducer =>
  new FunctionProducer(async function* (request) {
    for (const item of byArea[request.area] ?? []) {
      await Promise.resolve()
      if (item instanceof Error) {
        throw item
      }
      yield item
    }
  })

export interface Deferred {
  promise: Promise<void>
  resolve: () => void
}

export const deferred = (): Deferred => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

/** Writer kept in memory; the `failOnWrite`-th write rejects, as do all later ones. */
export class MemoryWriter implements OutputWriter {
  readonly path = "memory.csv"
  readonly records: BusinessRecord[] = []
  private writes = 0
  private failure: WriterError | null = null
  closeCalls = 0

  constructor(private readonly failOnWrite = Number.POSITIVE_INFINITY) {}

  get rowsWritten(): number {
    return this.records.length
  }

  get pendingRows(): number {
    return 0
  }

  open(): Promise<void> {
    return Promise.resolve()
  }

  write(record: BusinessRecord): Promise<void> {
    this.writes += 1
    if (this.failure || this.writes >= this.failOnWrite) {
      this.failure ??= new WriterError("disk full")
      return Promise.reject(this.failure)
    }
    this.records.push(record)
    return Promise.resolve()
  }

  flush(): Promise<void> {
    return this.failure ? Promise.reject(this.failure) : Promise.resolve()
  }

  close(): Promise<void> {
    this.closeCalls += 1
    return this.flush()
  }
}
