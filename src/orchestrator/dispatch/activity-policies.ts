import type { ActivityOptions } from "@temporalio/common"
import type { PipelineActivityName } from "../constants"

export interface RetrySettings {
  maximumAttempts: number
  initialIntervalMs: number
  backoffCoefficient: number
  maximumIntervalMs: number
}

export interface ActivityPolicy {
  startToCloseTimeoutMs: number
  retry: RetrySettings
}

export type ActivityPolicies = Record<PipelineActivityName, ActivityPolicy>

export const DEFAULT_RETRY: RetrySettings = {
  maximumAttempts: 3,
  initialIntervalMs: 1000,
  backoffCoefficient: 2,
  maximumIntervalMs: 10000,
}

export const DEFAULT_ACTIVITY_POLICIES: ActivityPolicies = {
  extractTranscript: { startToCloseTimeoutMs: 30000, retry: DEFAULT_RETRY },
  summarizeTranscript: { startToCloseTimeoutMs: 25000, retry: DEFAULT_RETRY },
  translateTranscript: { startToCloseTimeoutMs: 20000, retry: DEFAULT_RETRY },
  translateSummary: { startToCloseTimeoutMs: 20000, retry: DEFAULT_RETRY },
}

export function toActivityOptions(policy: ActivityPolicy): ActivityOptions {
  return {
    startToCloseTimeout: policy.startToCloseTimeoutMs,
    retry: {
      maximumAttempts: policy.retry.maximumAttempts,
      initialInterval: policy.retry.initialIntervalMs,
      backoffCoefficient: policy.retry.backoffCoefficient,
      maximumInterval: policy.retry.maximumIntervalMs,
    },
  }
}

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelayMs(retry: RetrySettings, attempt: number): number {
  const delay = retry.initialIntervalMs * Math.pow(retry.backoffCoefficient, attempt - 1)
  return Math.min(delay, retry.maximumIntervalMs)
}
