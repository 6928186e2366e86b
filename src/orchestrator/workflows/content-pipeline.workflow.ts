import { proxyActivities, defineQuery, defineSignal, setHandler, ActivityFailure, ApplicationFailure, CancelledFailure, CancellationScope, log } from "@temporalio/workflow"
import type { PipelineActivities } from "../activities"
import type { Summary, WorkflowResult, WorkItem } from "../activities/types"
import { CANCEL_SIGNAL, PROGRESS_QUERY, SOURCE_SUMMARY_QUERY, type PipelineActivityName } from "../constants"
import { DEFAULT_ACTIVITY_POLICIES, toActivityOptions, type ActivityPolicies } from "../dispatch/activity-policies"
import { fromActivityFailure, type CallOutcome } from "../dispatch/failures"
import { describeProgress, initialState, type PipelineState, type WorkflowProgress } from "./pipeline.machine"
import { runPipeline, type PipelineActivityPort } from "./pipeline.runner"

export interface ContentPipelineInput {
  item: WorkItem
  // Carried in the input so that replays see the policies the run started with
  policies?: ActivityPolicies
}

export const getProgressQuery = defineQuery<WorkflowProgress>(PROGRESS_QUERY)

// Source-language summary, kept available after a translation failure
export const getSourceSummaryQuery = defineQuery<Summary | null>(SOURCE_SUMMARY_QUERY)

export const cancelPipelineSignal = defineSignal(CANCEL_SIGNAL)

/**
 * Run one activity to its terminal outcome. Outstanding calls are shielded
 * from cancellation so they settle before the workflow stops.
 */
async function settle<T>(activity: PipelineActivityName, call: () => Promise<T>): Promise<CallOutcome<T>> {
  try {
    const value = await CancellationScope.nonCancellable(call)
    return { ok: true, value }
  } catch (error) {
    if (error instanceof ActivityFailure) {
      return { ok: false, failure: fromActivityFailure(activity, error.cause, error.retryState) }
    }
    throw error
  }
}

/**
 * Content Pipeline Workflow
 *
 * 1. Extract the source transcript
 * 2. Summarize it (high-level sentence, key takeaways, action items)
 * 3. Translate transcript and summary in parallel, then join
 *
 * Returns the complete WorkflowResult, or fails with an ApplicationFailure whose
 * type is the PipelineFailure kind and whose details carry the failure.
 */
export async function contentPipelineWorkflow(input: ContentPipelineInput): Promise<WorkflowResult> {
  const policies = input.policies ?? DEFAULT_ACTIVITY_POLICIES

  const { extractTranscript } = proxyActivities<PipelineActivities>(toActivityOptions(policies.extractTranscript))
  const { summarizeTranscript } = proxyActivities<PipelineActivities>(toActivityOptions(policies.summarizeTranscript))
  const { translateTranscript } = proxyActivities<PipelineActivities>(toActivityOptions(policies.translateTranscript))
  const { translateSummary } = proxyActivities<PipelineActivities>(toActivityOptions(policies.translateSummary))

  let state: PipelineState = initialState(input.item)
  let sourceSummary: Summary | null = null
  let cancelRequested = false

  setHandler(getProgressQuery, () => describeProgress(state))
  setHandler(getSourceSummaryQuery, () => sourceSummary)
  setHandler(cancelPipelineSignal, () => {
    cancelRequested = true
  })

  const port: PipelineActivityPort = {
    extractTranscript: (item) => settle("extractTranscript", () => extractTranscript(item)),
    summarizeTranscript: (transcript) => settle("summarizeTranscript", () => summarizeTranscript(transcript)),
    translateTranscript: (transcript, targetLanguage) => settle("translateTranscript", () => translateTranscript(transcript, targetLanguage)),
    translateSummary: (summary, targetLanguage) => settle("translateSummary", () => translateSummary(summary, targetLanguage)),
  }

  const final = await runPipeline(input.item, port, {
    isCancelled: () => cancelRequested || CancellationScope.current().consideredCancelled,
    onTransition: (next) => {
      state = next
      if (next.status === "Translating") {
        sourceSummary = next.summary
      }
    },
    log: (message) => log.info(message),
  })

  switch (final.status) {
    case "Completed":
      return final.result
    case "Failed":
      throw ApplicationFailure.create({
        type: final.failure.kind,
        message: final.failure.message,
        nonRetryable: true,
        details: [final.failure],
      })
    case "Cancelled":
      throw new CancelledFailure(`Pipeline for ${input.item.itemId} cancelled during ${final.stage}`, [final.stage])
  }
}
