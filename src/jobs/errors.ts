export class InvalidJobSpecError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid job: ${issues.join("; ")}`)
    this.name = "InvalidJobSpecError"
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`)
    this.name = "JobNotFoundError"
  }
}

export class RateLimitExceededError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "RateLimitExceededError"
  }
}

export class JobConflictError extends Error {
  constructor(
    readonly outputFile: string,
    readonly runningJobId: string,
  ) {
    super(`Job ${runningJobId} is already writing to ${outputFile}`)
    this.name = "JobConflictError"
  }
}

export class ArtifactExistsError extends Error {
  constructor(readonly outputFile: string) {
    super(`${outputFile} already holds rows; append to it or allow overwriting it`)
    this.name = "ArtifactExistsError"
  }
}

export class ArtifactNotReadyError extends Error {
  constructor(
    readonly jobId: string,
    readonly status: string,
  ) {
    super(`Artifact of job ${jobId} is not available (job is ${status})`)
    this.name = "ArtifactNotReadyError"
  }
}
