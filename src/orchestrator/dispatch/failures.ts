import { ApplicationFailure, RetryState, TimeoutFailure } from "@temporalio/common"
import { isActivityErrorKind, type ActivityErrorKind } from "../activities/errors"
import type { PipelineActivityName } from "../constants"

export interface AttemptFailure {
  kind: ActivityErrorKind
  message: string
}

/**
 * Terminal failure of one logical activity call, as seen by the workflow
 */
export interface StepFailure extends AttemptFailure {
  activity: PipelineActivityName
  // Set when kind is RetriesExhausted
  lastAttempt?: AttemptFailure
}

export type CallOutcome<T> = { ok: true; value: T } | { ok: false; failure: StepFailure }

export function classifyError(error: unknown): AttemptFailure {
  if (error instanceof ApplicationFailure && isActivityErrorKind(error.type)) {
    return { kind: error.type, message: error.message }
  }
  if (error instanceof TimeoutFailure) {
    return { kind: "ActivityTimeout", message: error.message }
  }
  return { kind: "BackendError", message: error instanceof Error ? error.message : String(error) }
}

export function isNonRetryable(error: unknown): boolean {
  return error instanceof ApplicationFailure && error.nonRetryable === true
}

export function exhaustedFailure(activity: PipelineActivityName, lastAttempt: AttemptFailure, attempts: number): StepFailure {
  return {
    activity,
    kind: "RetriesExhausted",
    message: `${activity} failed after ${attempts} attempt(s): ${lastAttempt.message}`,
    lastAttempt,
  }
}

/**
 * Map the cause and retry state of a Temporal ActivityFailure to a StepFailure
 */
export function fromActivityFailure(activity: PipelineActivityName, cause: unknown, retryState: RetryState | undefined): StepFailure {
  const attempt = classifyError(cause)

  if (retryState === RetryState.MAXIMUM_ATTEMPTS_REACHED || retryState === RetryState.TIMEOUT) {
    return {
      activity,
      kind: "RetriesExhausted",
      message: `${activity} exhausted its retry policy: ${attempt.message}`,
      lastAttempt: attempt,
    }
  }

  return { activity, ...attempt }
}
