import { DEFAULT_SAMPLING, fingerprintOf, fingerprintRecord } from "../records/fingerprint.js"
import type { SamplingBounds } from "../records/fingerprint.js"
import type { BusinessRecord } from "../records/record.js"
import { scanArtifactIdentities } from "../output/artifact.js"
import type { FingerprintCache } from "./fingerprint-cache.js"

export type Admission = "accepted" | "rejected"

export interface DedupGateStats {
  accepted: number
  rejected: number
  /** Rows read from an existing artifact before the job started. */
  seeded: number
}

export class DedupGate {
  private accepted = 0
  private rejected = 0
  private seeded = 0

  constructor(
    private readonly cache: FingerprintCache,
    private readonly sampling: SamplingBounds = DEFAULT_SAMPLING,
  ) {}

  /** First sighting wins; there is no second chance for a rejected record. */
  admit(record: BusinessRecord): Admission {
    if (this.cache.probeAndMark(fingerprintRecord(record, this.sampling))) {
      this.accepted += 1
      return "accepted"
    }
    this.rejected += 1
    return "rejected"
  }

  /**
   * Marks every row of an existing artifact as seen so appended runs do not
   * repeat them. Returns the number of rows scanned.
   */
  async seedFromArtifact(path: string, signal?: AbortSignal): Promise<number> {
    let scanned = 0
    for await (const identity of scanArtifactIdentities(path, signal)) {
      this.cache.probeAndMark(fingerprintOf(identity.name, identity.address, this.sampling))
      scanned += 1
    }
    this.seeded += scanned
    return scanned
  }

  get stats(): DedupGateStats {
    return { accepted: this.accepted, rejected: this.rejected, seeded: this.seeded }
  }
}
