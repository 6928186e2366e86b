import { Logger } from "@nestjs/common"
import type { PipelineActivities } from "../activities"
import type { WorkItem } from "../activities/types"
import { buildBatchReport, outcomeFromState, type BatchEntry, type BatchReport } from "../clients/pipeline-outcome"
import { createWorkflowId } from "../clients/workflow-id"
import { TASK_QUEUE } from "../constants"
import type { ActivityPolicies } from "../dispatch/activity-policies"
import { LocalDispatcher } from "../dispatch/local-dispatcher"
import { TaskQueueBroker } from "../dispatch/local-task-queue"
import { LocalWorker } from "../dispatch/local-worker"
import { describeProgress, type PipelineState, type WorkflowProgress } from "../workflows/pipeline.machine"
import { runPipeline } from "../workflows/pipeline.runner"
import { InMemoryHistoryStore, type HistoryStore } from "./history-store"

export interface LocalPipelineEngineOptions {
  activities: PipelineActivities
  policies: ActivityPolicies
  taskQueue?: string
  workers?: number
  history?: HistoryStore
}

/**
 * Runs content pipelines without a Temporal server: workflow decisions in this
 * process, activities on local workers polling a named in-process queue, and
 * every decision event written to a history store so an execution can resume
 * after a restart.
 */
export class LocalPipelineEngine {
  private readonly logger = new Logger(LocalPipelineEngine.name)
  private readonly broker = new TaskQueueBroker()
  private readonly dispatcher: LocalDispatcher
  private readonly workers: LocalWorker[]
  private readonly history: HistoryStore
  // Cancel requests for executions that have not finished yet
  private readonly cancelled = new Set<string>()
  // Last known state per execution; single executions keep it for progress lookups after they end
  private readonly states = new Map<string, PipelineState>()
  private workerRuns: Promise<void>[] = []

  constructor(options: LocalPipelineEngineOptions) {
    const queue = this.broker.queue(options.taskQueue ?? TASK_QUEUE)
    const workerCount = options.workers ?? 2

    this.dispatcher = new LocalDispatcher(queue, options.policies)
    this.workers = Array.from({ length: workerCount }, (_, index) => new LocalWorker(queue, options.activities, `local-worker-${index + 1}`))
    this.history = options.history ?? new InMemoryHistoryStore()
  }

  start(): void {
    if (this.workerRuns.length > 0) {
      return
    }
    this.workerRuns = this.workers.map((worker) => worker.run())
  }

  /**
   * Run one execution to its terminal outcome. Passing the ID of an execution
   * with recorded history resumes it from where it stopped.
   */
  async execute(item: WorkItem, workflowId: string = createWorkflowId(item)): Promise<BatchEntry> {
    try {
      const history = await this.history.load(workflowId)

      const final = await runPipeline(item, this.dispatcher, {
        history,
        record: (event) => this.history.append(workflowId, event),
        onTransition: (state) => {
          this.states.set(workflowId, state)
        },
        isCancelled: () => this.cancelled.has(workflowId),
        log: (message) => this.logger.log(message),
      })

      return { workflowId, item, outcome: outcomeFromState(final) }
    } finally {
      this.cancelled.delete(workflowId)
    }
  }

  /**
   * Independent executions, one per item; a failing item never affects the others
   */
  async executeBatch(items: WorkItem[], onSettled?: (entry: BatchEntry) => void): Promise<BatchReport> {
    const entries = await Promise.all(
      items.map(async (item): Promise<BatchEntry> => {
        const workflowId = createWorkflowId(item)
        let entry: BatchEntry
        try {
          entry = await this.execute(item, workflowId)
        } catch (error) {
          this.logger.error(`Execution ${workflowId} errored: ${error instanceof Error ? error.message : String(error)}`)
          entry = { workflowId, item, outcome: { status: "error", message: error instanceof Error ? error.message : String(error) } }
        }
        // Batch outcomes live in the report
        this.states.delete(workflowId)
        onSettled?.(entry)
        return entry
      }),
    )

    return buildBatchReport(entries)
  }

  /**
   * Takes effect once the execution's outstanding activity calls settle
   */
  cancel(workflowId: string): void {
    this.cancelled.add(workflowId)
  }

  progress(workflowId: string): WorkflowProgress | undefined {
    const state = this.states.get(workflowId)
    return state ? describeProgress(state) : undefined
  }

  async shutdown(): Promise<void> {
    for (const worker of this.workers) {
      worker.shutdown()
    }
    this.broker.closeAll()
    await Promise.all(this.workerRuns)
    this.workerRuns = []
  }
}
