import type { Summary, Transcript, TranslatedSummary, TranslatedTranscript, WorkflowResult, WorkItem } from "../activities/types"
import type { CallOutcome, StepFailure } from "../dispatch/failures"

/**
 * Content pipeline state machine
 *
 * Pending → Extracting → Summarizing → Translating → Completed, with Failed and
 * Cancelled reachable from every non-terminal state. `transition` is a pure
 * reducer over recorded events, so folding the same history always yields the
 * same state and the same next command.
 */

export type PipelineStage = "Pending" | "Extracting" | "Summarizing" | "Translating"

export type PipelineFailureKind = "ExtractionFailed" | "SummarizationFailed" | "TranslationFailed"

export interface PipelineFailure {
  kind: PipelineFailureKind
  stage: PipelineStage
  message: string
  causes: StepFailure[]
}

export type PipelineState =
  | { status: "Pending"; item: WorkItem }
  | { status: "Extracting"; item: WorkItem }
  | { status: "Summarizing"; item: WorkItem; transcript: Transcript }
  | { status: "Translating"; item: WorkItem; transcript: Transcript; summary: Summary }
  | { status: "Completed"; item: WorkItem; result: WorkflowResult }
  | { status: "Failed"; item: WorkItem; failure: PipelineFailure }
  | { status: "Cancelled"; item: WorkItem; stage: PipelineStage }

export type TerminalState = Extract<PipelineState, { status: "Completed" | "Failed" | "Cancelled" }>

export type PipelineEvent =
  | { type: "Started" }
  | { type: "Extracted"; outcome: CallOutcome<Transcript> }
  | { type: "Summarized"; outcome: CallOutcome<Summary> }
  | { type: "Translated"; transcript: CallOutcome<TranslatedTranscript>; summary: CallOutcome<TranslatedSummary> }
  | { type: "CancelRequested" }

export type PipelineCommand =
  | { type: "ExtractTranscript"; item: WorkItem }
  | { type: "SummarizeTranscript"; transcript: Transcript }
  | { type: "TranslateBoth"; transcript: Transcript; summary: Summary; targetLanguage: string }

export type TranslationJoin =
  | { tag: "bothOk"; transcript: TranslatedTranscript; summary: TranslatedSummary }
  | { tag: "transcriptFailed"; failures: StepFailure[] }
  | { tag: "summaryFailed"; failures: StepFailure[] }
  | { tag: "bothFailed"; failures: StepFailure[] }

export interface WorkflowProgress {
  currentStep: number
  totalSteps: number
  stepName: string
  percentComplete: number
  status: "running" | "completed" | "failed" | "cancelled"
  error?: string
}

/**
 * Raised when an event does not fit the state it is applied to, i.e. the
 * recorded history does not belong to this workflow definition.
 */
export class PipelineTransitionError extends Error {
  constructor(
    readonly status: PipelineState["status"],
    readonly eventType: PipelineEvent["type"],
  ) {
    super(`Event ${eventType} cannot be applied in state ${status}`)
    this.name = "PipelineTransitionError"
  }
}

export const TOTAL_STEPS = 3

const STAGE_PROGRESS: Record<PipelineStage, { step: number; name: string; percent: number }> = {
  Pending: { step: 0, name: "Starting", percent: 0 },
  Extracting: { step: 1, name: "Extracting transcript", percent: 10 },
  Summarizing: { step: 2, name: "Summarizing transcript", percent: 40 },
  Translating: { step: 3, name: "Translating transcript and summary", percent: 70 },
}

export function initialState(item: WorkItem): PipelineState {
  return { status: "Pending", item }
}

export function isTerminal(state: PipelineState): state is TerminalState {
  return state.status === "Completed" || state.status === "Failed" || state.status === "Cancelled"
}

export function joinTranslations(transcript: CallOutcome<TranslatedTranscript>, summary: CallOutcome<TranslatedSummary>): TranslationJoin {
  if (transcript.ok) {
    return summary.ok ? { tag: "bothOk", transcript: transcript.value, summary: summary.value } : { tag: "summaryFailed", failures: [summary.failure] }
  }
  return summary.ok ? { tag: "transcriptFailed", failures: [transcript.failure] } : { tag: "bothFailed", failures: [transcript.failure, summary.failure] }
}

function failed(item: WorkItem, kind: PipelineFailureKind, stage: PipelineStage, causes: StepFailure[]): PipelineState {
  const message = `${kind} at ${stage}: ${causes.map((cause) => cause.message).join("; ")}`
  return { status: "Failed", item, failure: { kind, stage, message, causes } }
}

export function transition(state: PipelineState, event: PipelineEvent): PipelineState {
  if (isTerminal(state)) {
    throw new PipelineTransitionError(state.status, event.type)
  }

  if (event.type === "CancelRequested") {
    return { status: "Cancelled", item: state.item, stage: state.status }
  }

  if (state.status === "Pending" && event.type === "Started") {
    return { status: "Extracting", item: state.item }
  }

  if (state.status === "Extracting" && event.type === "Extracted") {
    return event.outcome.ok ? { status: "Summarizing", item: state.item, transcript: event.outcome.value } : failed(state.item, "ExtractionFailed", "Extracting", [event.outcome.failure])
  }

  if (state.status === "Summarizing" && event.type === "Summarized") {
    return event.outcome.ok ? { status: "Translating", item: state.item, transcript: state.transcript, summary: event.outcome.value } : failed(state.item, "SummarizationFailed", "Summarizing", [event.outcome.failure])
  }

  if (state.status === "Translating" && event.type === "Translated") {
    const join = joinTranslations(event.transcript, event.summary)
    if (join.tag !== "bothOk") {
      return failed(state.item, "TranslationFailed", "Translating", join.failures)
    }
    return {
      status: "Completed",
      item: state.item,
      result: {
        item: state.item,
        transcript: state.transcript,
        summary: state.summary,
        translatedTranscript: join.transcript,
        translatedSummary: join.summary,
      },
    }
  }

  throw new PipelineTransitionError(state.status, event.type)
}

/**
 * The activity work the current state asks for. Pending waits for Started;
 * terminal states ask for nothing.
 */
export function nextCommand(state: PipelineState): PipelineCommand | undefined {
  switch (state.status) {
    case "Extracting":
      return { type: "ExtractTranscript", item: state.item }
    case "Summarizing":
      return { type: "SummarizeTranscript", transcript: state.transcript }
    case "Translating":
      return { type: "TranslateBoth", transcript: state.transcript, summary: state.summary, targetLanguage: state.item.targetLanguage }
    default:
      return undefined
  }
}

export function replay(item: WorkItem, events: readonly PipelineEvent[]): PipelineState {
  return events.reduce(transition, initialState(item))
}

export function describeProgress(state: PipelineState): WorkflowProgress {
  switch (state.status) {
    case "Completed":
      return { currentStep: TOTAL_STEPS, totalSteps: TOTAL_STEPS, stepName: "Completed", percentComplete: 100, status: "completed" }
    case "Failed": {
      const stage = STAGE_PROGRESS[state.failure.stage]
      return { currentStep: stage.step, totalSteps: TOTAL_STEPS, stepName: stage.name, percentComplete: stage.percent, status: "failed", error: state.failure.message }
    }
    case "Cancelled": {
      const stage = STAGE_PROGRESS[state.stage]
      return { currentStep: stage.step, totalSteps: TOTAL_STEPS, stepName: "Cancelled", percentComplete: stage.percent, status: "cancelled" }
    }
    default: {
      const stage = STAGE_PROGRESS[state.status]
      return { currentStep: stage.step, totalSteps: TOTAL_STEPS, stepName: stage.name, percentComplete: stage.percent, status: "running" }
    }
  }
}
