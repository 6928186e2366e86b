import type { WorkflowClient } from "@temporalio/client"
import type { WorkflowResult } from "../activities/types"
import { WORKFLOW_TYPE } from "../constants"
import type { ContentPipelineInput } from "../workflows"

export interface StartWorkflowOptions {
  workflowId: string
  taskQueue: string
  workflowExecutionTimeoutMs: number
}

/**
 * The handful of Temporal client calls the submission side makes, keyed by
 * workflow ID
 */
export interface WorkflowGateway {
  start(input: ContentPipelineInput, options: StartWorkflowOptions): Promise<string>
  // Temporal execution status name, e.g. RUNNING or COMPLETED
  describe(workflowId: string): Promise<string>
  result(workflowId: string): Promise<WorkflowResult>
  query<T>(workflowId: string, queryName: string): Promise<T>
  signal(workflowId: string, signalName: string): Promise<void>
}

export function createWorkflowGateway(client: WorkflowClient): WorkflowGateway {
  return {
    start: async (input, options) => {
      const handle = await client.start(WORKFLOW_TYPE, {
        args: [input],
        workflowId: options.workflowId,
        taskQueue: options.taskQueue,
        workflowExecutionTimeout: options.workflowExecutionTimeoutMs,
      })
      return handle.workflowId
    },
    describe: async (workflowId) => {
      const description = await client.getHandle(workflowId).describe()
      return description.status.name
    },
    result: (workflowId) => client.getHandle(workflowId).result(),
    query: <T>(workflowId: string, queryName: string) => client.getHandle(workflowId).query<T>(queryName),
    signal: (workflowId, signalName) => client.getHandle(workflowId).signal(signalName),
  }
}
