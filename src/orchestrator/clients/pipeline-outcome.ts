import { ApplicationFailure, CancelledFailure } from "@temporalio/common"
import type { WorkflowResult, WorkItem } from "../activities/types"
import type { PipelineFailure, PipelineFailureKind, PipelineStage, TerminalState } from "../workflows/pipeline.machine"

/**
 * What the submission client reports for one execution: the full result or a
 * single terminal failure, never a partial result
 */
export type PipelineOutcome =
  | { status: "completed"; result: WorkflowResult }
  | { status: "failed"; failure: PipelineFailure }
  | { status: "cancelled"; stage?: PipelineStage }
  // Failures outside the pipeline itself, e.g. execution timeout or lost connection
  | { status: "error"; message: string }

export interface BatchEntry {
  workflowId: string
  item: WorkItem
  outcome: PipelineOutcome
}

export interface BatchReport {
  total: number
  completed: number
  failed: number
  cancelled: number
  errored: number
  entries: BatchEntry[]
}

const FAILURE_STAGES: Record<PipelineFailureKind, PipelineStage> = {
  ExtractionFailed: "Extracting",
  SummarizationFailed: "Summarizing",
  TranslationFailed: "Translating",
}

const PIPELINE_STAGES: readonly string[] = ["Pending", "Extracting", "Summarizing", "Translating"]

function isPipelineFailureKind(value: unknown): value is PipelineFailureKind {
  return typeof value === "string" && Object.keys(FAILURE_STAGES).includes(value)
}

function isPipelineStage(value: unknown): value is PipelineStage {
  return typeof value === "string" && PIPELINE_STAGES.includes(value)
}

export function isPipelineFailure(value: unknown): value is PipelineFailure {
  if (typeof value !== "object" || value === null) {
    return false
  }
  return "kind" in value && isPipelineFailureKind(value.kind) && "stage" in value && isPipelineStage(value.stage) && "message" in value && typeof value.message === "string" && "causes" in value && Array.isArray(value.causes)
}

export function outcomeFromState(state: TerminalState): PipelineOutcome {
  switch (state.status) {
    case "Completed":
      return { status: "completed", result: state.result }
    case "Failed":
      return { status: "failed", failure: state.failure }
    case "Cancelled":
      return { status: "cancelled", stage: state.stage }
  }
}

/**
 * Map the cause of a failed workflow execution to an outcome
 */
export function outcomeFromWorkflowError(cause: unknown): PipelineOutcome {
  if (cause instanceof ApplicationFailure && isPipelineFailureKind(cause.type)) {
    const [details] = cause.details ?? []
    if (isPipelineFailure(details)) {
      return { status: "failed", failure: details }
    }
    return {
      status: "failed",
      failure: { kind: cause.type, stage: FAILURE_STAGES[cause.type], message: cause.message, causes: [] },
    }
  }

  if (cause instanceof CancelledFailure) {
    const [stage] = cause.details
    return isPipelineStage(stage) ? { status: "cancelled", stage } : { status: "cancelled" }
  }

  return { status: "error", message: cause instanceof Error ? cause.message : String(cause) }
}

export function buildBatchReport(entries: BatchEntry[]): BatchReport {
  const count = (status: PipelineOutcome["status"]) => entries.filter((entry) => entry.outcome.status === status).length

  return {
    total: entries.length,
    completed: count("completed"),
    failed: count("failed"),
    cancelled: count("cancelled"),
    errored: count("error"),
    entries,
  }
}
