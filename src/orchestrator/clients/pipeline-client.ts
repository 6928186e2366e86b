import { Logger } from "@nestjs/common"
import { WorkflowFailedError } from "@temporalio/client"
import type { Summary, WorkflowResult, WorkItem } from "../activities/types"
import { CANCEL_SIGNAL, PROGRESS_QUERY, SOURCE_SUMMARY_QUERY } from "../constants"
import type { ActivityPolicies } from "../dispatch/activity-policies"
import { TOTAL_STEPS, type WorkflowProgress } from "../workflows/pipeline.machine"
import { buildBatchReport, outcomeFromWorkflowError, type BatchEntry, type BatchReport, type PipelineOutcome } from "./pipeline-outcome"
import { createWorkflowId } from "./workflow-id"
import type { WorkflowGateway } from "./workflow-gateway"

export interface PipelineClientOptions {
  taskQueue: string
  workflowExecutionTimeoutMs: number
  policies: ActivityPolicies
}

export interface StartedPipeline {
  workflowId: string
  item: WorkItem
}

export interface PipelineStatus {
  workflowId: string
  status: string
  outcome?: PipelineOutcome
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Wait for a workflow result and turn it into an outcome
 */
export async function settleResult(result: Promise<WorkflowResult>): Promise<PipelineOutcome> {
  try {
    return { status: "completed", result: await result }
  } catch (error) {
    if (error instanceof WorkflowFailedError) {
      return outcomeFromWorkflowError(error.cause)
    }
    return { status: "error", message: getErrorMessage(error) }
  }
}

/**
 * Submission client: one workflow execution per (item, target language),
 * all started together, each settled on its own
 */
export class PipelineClient {
  private readonly logger = new Logger(PipelineClient.name)

  constructor(
    private readonly gateway: WorkflowGateway,
    private readonly options: PipelineClientOptions,
  ) {}

  async start(item: WorkItem, workflowId: string = createWorkflowId(item)): Promise<StartedPipeline> {
    this.logger.log(`Starting content pipeline: ${workflowId}`)

    await this.gateway.start(
      { item, policies: this.options.policies },
      {
        workflowId,
        taskQueue: this.options.taskQueue,
        workflowExecutionTimeoutMs: this.options.workflowExecutionTimeoutMs,
      },
    )

    return { workflowId, item }
  }

  startBatch(items: WorkItem[]): Promise<StartedPipeline[]> {
    return Promise.all(items.map((item) => this.start(item)))
  }

  awaitOutcome(workflowId: string): Promise<PipelineOutcome> {
    return settleResult(this.gateway.result(workflowId))
  }

  /**
   * Start every item and wait for all of them. A start or execution failure
   * only affects its own entry.
   */
  async executeBatch(items: WorkItem[], onSettled?: (entry: BatchEntry) => void): Promise<BatchReport> {
    const entries = await Promise.all(
      items.map(async (item): Promise<BatchEntry> => {
        const workflowId = createWorkflowId(item)
        let entry: BatchEntry
        try {
          await this.start(item, workflowId)
          entry = { workflowId, item, outcome: await this.awaitOutcome(workflowId) }
        } catch (error) {
          this.logger.error(`Could not start ${workflowId}: ${getErrorMessage(error)}`)
          entry = { workflowId, item, outcome: { status: "error", message: getErrorMessage(error) } }
        }
        onSettled?.(entry)
        return entry
      }),
    )

    return buildBatchReport(entries)
  }

  async getStatus(workflowId: string): Promise<PipelineStatus> {
    const status = await this.gateway.describe(workflowId)

    if (status === "RUNNING") {
      return { workflowId, status }
    }

    return { workflowId, status, outcome: await this.awaitOutcome(workflowId) }
  }

  async queryProgress(workflowId: string): Promise<WorkflowProgress> {
    const status = await this.gateway.describe(workflowId)

    if (status === "COMPLETED") {
      return { currentStep: TOTAL_STEPS, totalSteps: TOTAL_STEPS, stepName: "Completed", percentComplete: 100, status: "completed" }
    }

    // These executions stopped outside the workflow code, so there is no state to query
    if (status === "TIMED_OUT" || status === "TERMINATED") {
      return { currentStep: 0, totalSteps: TOTAL_STEPS, stepName: status, percentComplete: 0, status: "failed", error: `Workflow ${status.toLowerCase()}` }
    }

    return this.gateway.query<WorkflowProgress>(workflowId, PROGRESS_QUERY)
  }

  querySourceSummary(workflowId: string): Promise<Summary | null> {
    return this.gateway.query<Summary | null>(workflowId, SOURCE_SUMMARY_QUERY)
  }

  async cancel(workflowId: string): Promise<void> {
    this.logger.log(`Requesting cancellation of ${workflowId}`)
    await this.gateway.signal(workflowId, CANCEL_SIGNAL)
  }
}
