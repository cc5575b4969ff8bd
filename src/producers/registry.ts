import type { VerboseLog } from "../rendering/types.js"
import { JsonlProducer } from "./jsonl-producer.js"
import { SnapshotProducer } from "./snapshot-producer.js"
import type { RecordProducer } from "./types.js"

export const PRODUCER_NAMES = ["jsonl", "snapshot"] as const

export type ProducerName = (typeof PRODUCER_NAMES)[number]

const PRODUCER_NAME_SET = new Set<string>(PRODUCER_NAMES)

export const isProducerName = (value: string): value is ProducerName => PRODUCER_NAME_SET.has(value)

export const createProducer = (
  name: ProducerName,
  sourceDir: string,
  verbose?: VerboseLog,
): RecordProducer => {
  switch (name) {
    case "jsonl":
      return new JsonlProducer({ sourceDir })
    case "snapshot":
      return new SnapshotProducer({ sourceDir, verbose })
  }
}
