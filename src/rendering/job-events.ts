import type { JobEvent } from "../jobs/types.js"
import type { CliRenderer } from "./types.js"

/** Routes orchestrator events to the renderer. */
export const renderJobEvent = (renderer: CliRenderer, event: JobEvent): void => {
  switch (event.type) {
    case "artifact-ready":
      renderer.artifactReady(event.outputFile, event.existingRows)
      return
    case "area-state":
      if (event.state.status === "completed" || event.state.status === "failed") {
        renderer.areaFinished(event.state)
      } else {
        renderer.updateArea({
          area: event.state.area,
          status: event.state.status,
          accepted: event.state.accepted,
          duplicates: event.state.duplicates,
          raw: event.state.raw,
        })
      }
      return
    case "area-progress":
      renderer.updateArea({
        area: event.area,
        status: "running",
        accepted: event.accepted,
        duplicates: event.duplicates,
        raw: event.raw,
      })
      return
    case "job-metrics":
      renderer.updateMetrics(event.accepted, event.target, event.metrics)
      return
    case "job-finished":
      renderer.stopProgress()
      return
    case "job-started":
    case "records-committed":
      return
  }
}
