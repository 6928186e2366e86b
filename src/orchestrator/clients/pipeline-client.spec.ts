import { WorkflowFailedError } from "@temporalio/client"
import { ApplicationFailure, RetryState } from "@temporalio/common"
import type { WorkflowResult, WorkItem } from "../activities/types"
import { DEFAULT_ACTIVITY_POLICIES } from "../dispatch/activity-policies"
import type { ContentPipelineInput } from "../workflows"
import { PipelineClient, settleResult } from "./pipeline-client"
import type { BatchEntry } from "./pipeline-outcome"
import type { StartWorkflowOptions } from "./workflow-gateway"

const item: WorkItem = { itemId: "demo-001", sourceLanguage: "en", targetLanguage: "es" }

const result: WorkflowResult = {
  item,
  transcript: { itemId: "demo-001", language: "en", text: "Hello.", provenance: "mock" },
  summary: { itemId: "demo-001", language: "en", highLevel: "Hi.", keyTakeaways: ["a", "b", "c"], actionItems: ["x", "y"] },
  translatedTranscript: { itemId: "demo-001", language: "es", text: "Hola.", sourceLanguage: "en" },
  translatedSummary: { itemId: "demo-001", language: "es", sections: [{ heading: "Resumen general", text: "Hola." }] },
}

function createGateway() {
  return {
    start: jest.fn(async (_input: ContentPipelineInput, options: StartWorkflowOptions) => options.workflowId),
    describe: jest.fn(async (_workflowId: string) => "RUNNING"),
    result: jest.fn(async (_workflowId: string) => result),
    query: jest.fn(),
    signal: jest.fn(async (_workflowId: string, _signalName: string) => undefined),
  }
}

describe("PipelineClient", () => {
  let gateway: ReturnType<typeof createGateway>
  let client: PipelineClient

  beforeEach(() => {
    gateway = createGateway()
    client = new PipelineClient(gateway, { taskQueue: "test-queue", workflowExecutionTimeoutMs: 120000, policies: DEFAULT_ACTIVITY_POLICIES })
  })

  describe("start", () => {
    it("should start the workflow with the item and the activity policies", async () => {
      await expect(client.start(item, "wf-1")).resolves.toEqual({ workflowId: "wf-1", item })

      expect(gateway.start).toHaveBeenCalledWith({ item, policies: DEFAULT_ACTIVITY_POLICIES }, { workflowId: "wf-1", taskQueue: "test-queue", workflowExecutionTimeoutMs: 120000 })
    })

    it("should give every item its own workflow ID", async () => {
      const started = await client.startBatch([item, { ...item, targetLanguage: "ja" }])

      expect(started[0].workflowId).toMatch(/^content-pipeline-demo-001-es-[0-9a-f-]{36}$/)
      expect(started[1].workflowId).toMatch(/^content-pipeline-demo-001-ja-[0-9a-f-]{36}$/)
      expect(gateway.start).toHaveBeenCalledTimes(2)
    })
  })

  describe("executeBatch", () => {
    it("should settle each item on its own", async () => {
      const failure = ApplicationFailure.create({ type: "TranslationFailed", message: "TranslationFailed at Translating: boom", nonRetryable: true })
      gateway.start.mockImplementation(async (input, options) => {
        if (input.item.targetLanguage === "pt") {
          throw new Error("connection refused")
        }
        return options.workflowId
      })
      gateway.result.mockImplementation(async (workflowId) => {
        if (workflowId.includes("-ja-")) {
          throw new WorkflowFailedError("Workflow execution failed", failure, RetryState.NON_RETRYABLE_FAILURE)
        }
        return result
      })
      const settled: BatchEntry[] = []

      const report = await client.executeBatch([item, { ...item, targetLanguage: "ja" }, { ...item, targetLanguage: "pt" }], (entry) => settled.push(entry))

      expect(report).toMatchObject({ total: 3, completed: 1, failed: 1, cancelled: 0, errored: 1 })
      expect(report.entries.map((entry) => entry.outcome.status)).toEqual(["completed", "failed", "error"])
      expect(report.entries[1].outcome).toEqual({
        status: "failed",
        failure: { kind: "TranslationFailed", stage: "Translating", message: "TranslationFailed at Translating: boom", causes: [] },
      })
      expect(report.entries[2].outcome).toEqual({ status: "error", message: "connection refused" })
      expect(settled).toHaveLength(3)
      expect(gateway.result).toHaveBeenCalledTimes(2)
    })
  })

  describe("getStatus", () => {
    it("should not wait for the result of a running workflow", async () => {
      await expect(client.getStatus("wf-1")).resolves.toEqual({ workflowId: "wf-1", status: "RUNNING" })
      expect(gateway.result).not.toHaveBeenCalled()
    })

    it("should include the outcome of a closed workflow", async () => {
      gateway.describe.mockResolvedValue("COMPLETED")

      await expect(client.getStatus("wf-1")).resolves.toEqual({ workflowId: "wf-1", status: "COMPLETED", outcome: { status: "completed", result } })
    })
  })

  describe("queryProgress", () => {
    it("should query a running workflow", async () => {
      const progress = { currentStep: 2, totalSteps: 3, stepName: "Summarizing transcript", percentComplete: 40, status: "running" }
      gateway.query.mockResolvedValue(progress)

      await expect(client.queryProgress("wf-1")).resolves.toEqual(progress)
      expect(gateway.query).toHaveBeenCalledWith("wf-1", "getProgress")
    })

    it("should answer for a completed workflow without a query", async () => {
      gateway.describe.mockResolvedValue("COMPLETED")

      await expect(client.queryProgress("wf-1")).resolves.toEqual({ currentStep: 3, totalSteps: 3, stepName: "Completed", percentComplete: 100, status: "completed" })
      expect(gateway.query).not.toHaveBeenCalled()
    })

    it("should report a timed out workflow as failed", async () => {
      gateway.describe.mockResolvedValue("TIMED_OUT")

      await expect(client.queryProgress("wf-1")).resolves.toEqual({ currentStep: 0, totalSteps: 3, stepName: "TIMED_OUT", percentComplete: 0, status: "failed", error: "Workflow timed_out" })
    })
  })

  describe("querySourceSummary", () => {
    it("should query the source summary", async () => {
      gateway.query.mockResolvedValue(result.summary)

      await expect(client.querySourceSummary("wf-1")).resolves.toEqual(result.summary)
      expect(gateway.query).toHaveBeenCalledWith("wf-1", "getSourceSummary")
    })
  })

  describe("cancel", () => {
    it("should send the cancel signal", async () => {
      await client.cancel("wf-1")

      expect(gateway.signal).toHaveBeenCalledWith("wf-1", "cancelPipeline")
    })
  })
})

describe("settleResult", () => {
  it("should report errors that are not workflow failures", async () => {
    await expect(settleResult(Promise.reject(new Error("Workflow execution not found")))).resolves.toEqual({ status: "error", message: "Workflow execution not found" })
  })
})
