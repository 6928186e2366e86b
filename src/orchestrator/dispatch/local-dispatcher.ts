import { Logger } from "@nestjs/common"
import { setTimeout as sleep } from "timers/promises"
import { v4 as uuidv4 } from "uuid"
import type { PipelineActivities } from "../activities"
import type { Summary, Transcript, TranslatedSummary, TranslatedTranscript, WorkItem } from "../activities/types"
import { activityTimeoutFailure } from "../activities/errors"
import type { PipelineActivityName } from "../constants"
import type { PipelineActivityPort } from "../workflows/pipeline.runner"
import { backoffDelayMs, type ActivityPolicies } from "./activity-policies"
import { classifyError, exhaustedFailure, isNonRetryable, type CallOutcome } from "./failures"
import type { LocalTaskQueue } from "./local-task-queue"

/**
 * Schedules activity attempts on a local task queue and applies each
 * activity's start-to-close timeout and retry policy.
 *
 * Delivery is at-least-once: an attempt that times out is retried even if its
 * worker later finishes, and the late completion is dropped.
 */
export class LocalDispatcher implements PipelineActivityPort {
  private readonly logger = new Logger(LocalDispatcher.name)

  constructor(
    private readonly queue: LocalTaskQueue,
    private readonly policies: ActivityPolicies,
  ) {}

  extractTranscript(item: WorkItem): Promise<CallOutcome<Transcript>> {
    return this.call("extractTranscript", (activities) => activities.extractTranscript(item))
  }

  summarizeTranscript(transcript: Transcript): Promise<CallOutcome<Summary>> {
    return this.call("summarizeTranscript", (activities) => activities.summarizeTranscript(transcript))
  }

  translateTranscript(transcript: Transcript, targetLanguage: string): Promise<CallOutcome<TranslatedTranscript>> {
    return this.call("translateTranscript", (activities) => activities.translateTranscript(transcript, targetLanguage))
  }

  translateSummary(summary: Summary, targetLanguage: string): Promise<CallOutcome<TranslatedSummary>> {
    return this.call("translateSummary", (activities) => activities.translateSummary(summary, targetLanguage))
  }

  private async call<T>(activity: PipelineActivityName, invoke: (activities: PipelineActivities) => Promise<T>): Promise<CallOutcome<T>> {
    const policy = this.policies[activity]

    for (let attempt = 1; ; attempt++) {
      try {
        const value = await this.schedule(activity, attempt, policy.startToCloseTimeoutMs, invoke)
        return { ok: true, value }
      } catch (error) {
        const failure = classifyError(error)

        if (isNonRetryable(error)) {
          this.logger.warn(`[Dispatch] ${activity} failed with non-retryable ${failure.kind}: ${failure.message}`)
          return { ok: false, failure: { activity, ...failure } }
        }

        if (attempt >= policy.retry.maximumAttempts) {
          this.logger.error(`[Dispatch] ${activity} exhausted all ${attempt} attempts`)
          return { ok: false, failure: exhaustedFailure(activity, failure, attempt) }
        }

        const delayMs = backoffDelayMs(policy.retry, attempt)
        this.logger.warn(`[Dispatch] ${activity} attempt ${attempt}/${policy.retry.maximumAttempts} failed (${failure.kind}), retrying in ${delayMs}ms`)
        await sleep(delayMs)
      }
    }
  }

  private schedule<T>(activity: PipelineActivityName, attempt: number, timeoutMs: number, invoke: (activities: PipelineActivities) => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.enqueue({
        id: uuidv4(),
        activity,
        attempt,
        execute: async (activities) => {
          // The clock starts when a worker picks the task up
          let timer: ReturnType<typeof setTimeout> | undefined
          const timeout = new Promise<never>((_, rejectTimeout) => {
            timer = setTimeout(() => rejectTimeout(activityTimeoutFailure(activity, timeoutMs)), timeoutMs)
          })

          try {
            resolve(await Promise.race([invoke(activities), timeout]))
          } catch (error) {
            reject(error)
          } finally {
            clearTimeout(timer)
          }
        },
      })
    })
  }
}
