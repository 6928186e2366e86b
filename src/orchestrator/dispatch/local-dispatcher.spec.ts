import { MockContentBackend } from "../activities/backends"
import { createPipelineActivities } from "../activities/pipeline.activities"
import type { WorkItem } from "../activities/types"
import type { ActivityPolicies, ActivityPolicy } from "./activity-policies"
import { LocalDispatcher } from "./local-dispatcher"
import { LocalTaskQueue, TaskQueueBroker } from "./local-task-queue"
import { LocalWorker } from "./local-worker"

function policiesWith(policy: ActivityPolicy): ActivityPolicies {
  return {
    extractTranscript: policy,
    summarizeTranscript: policy,
    translateTranscript: policy,
    translateSummary: policy,
  }
}

const fastPolicy: ActivityPolicy = {
  startToCloseTimeoutMs: 500,
  retry: { maximumAttempts: 3, initialIntervalMs: 5, backoffCoefficient: 2, maximumIntervalMs: 20 },
}

const item: WorkItem = { itemId: "demo-001", sourceLanguage: "en", targetLanguage: "es" }

describe("LocalDispatcher", () => {
  let backend: MockContentBackend
  let broker: TaskQueueBroker
  let worker: LocalWorker
  let workerRun: Promise<void>

  function startWorker(queueName = "test-queue") {
    const activities = createPipelineActivities({ backend, supportedLanguages: ["es"] })
    worker = new LocalWorker(broker.queue(queueName), activities, "test-worker")
    workerRun = worker.run()
  }

  beforeEach(() => {
    backend = new MockContentBackend()
    broker = new TaskQueueBroker()
  })

  afterEach(async () => {
    worker.shutdown()
    broker.closeAll()
    await workerRun
  })

  it("should return the activity result from a worker", async () => {
    startWorker()
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policiesWith(fastPolicy))

    const outcome = await dispatcher.extractTranscript(item)

    expect(outcome).toEqual({
      ok: true,
      value: { itemId: "demo-001", language: "en", text: "This is a mock English transcript for video demo-001. It covers product updates and next steps.", provenance: "mock" },
    })
  })

  it("should retry a transient backend error until an attempt succeeds", async () => {
    const lookup = jest.spyOn(backend, "lookupTranscript").mockRejectedValueOnce(new Error("socket hang up")).mockRejectedValueOnce(new Error("socket hang up"))
    startWorker()
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policiesWith(fastPolicy))

    const outcome = await dispatcher.extractTranscript(item)

    expect(outcome.ok).toBe(true)
    expect(lookup).toHaveBeenCalledTimes(3)
  })

  it("should give up with RetriesExhausted carrying the last attempt", async () => {
    const lookup = jest.spyOn(backend, "lookupTranscript").mockRejectedValue(new Error("socket hang up"))
    startWorker()
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policiesWith(fastPolicy))

    const outcome = await dispatcher.extractTranscript(item)

    expect(outcome).toEqual({
      ok: false,
      failure: {
        activity: "extractTranscript",
        kind: "RetriesExhausted",
        message: "extractTranscript failed after 3 attempt(s): socket hang up",
        lastAttempt: { kind: "BackendError", message: "socket hang up" },
      },
    })
    expect(lookup).toHaveBeenCalledTimes(3)
  })

  it("should not retry a non-retryable failure", async () => {
    const lookup = jest.spyOn(backend, "lookupTranscript")
    startWorker()
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policiesWith(fastPolicy))

    const outcome = await dispatcher.extractTranscript({ ...item, itemId: "missing-item" })

    expect(outcome).toEqual({
      ok: false,
      failure: { activity: "extractTranscript", kind: "NotFound", message: "No transcript found for item 'missing-item'" },
    })
    expect(lookup).toHaveBeenCalledTimes(1)
  })

  it("should time out an attempt that outlives its start-to-close timeout", async () => {
    jest.spyOn(backend, "lookupTranscript").mockImplementation(() => new Promise(() => undefined))
    startWorker()
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policiesWith({ startToCloseTimeoutMs: 20, retry: { ...fastPolicy.retry, maximumAttempts: 2 } }))

    const outcome = await dispatcher.extractTranscript(item)

    expect(outcome).toEqual({
      ok: false,
      failure: {
        activity: "extractTranscript",
        kind: "RetriesExhausted",
        message: "extractTranscript failed after 2 attempt(s): Activity extractTranscript exceeded its 20ms timeout",
        lastAttempt: { kind: "ActivityTimeout", message: "Activity extractTranscript exceeded its 20ms timeout" },
      },
    })
  })

  it("should retry malformed generator output", async () => {
    const generate = jest.spyOn(backend, "generateSummary").mockResolvedValueOnce("not json")
    startWorker()
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policiesWith(fastPolicy))

    const outcome = await dispatcher.summarizeTranscript({ itemId: "demo-001", language: "en", text: "Hello.", provenance: "mock" })

    expect(outcome.ok && outcome.value.keyTakeaways).toHaveLength(3)
    expect(generate).toHaveBeenCalledTimes(2)
  })

  it("should use the policy of the called activity", async () => {
    const translate = jest.spyOn(backend, "translate").mockRejectedValue(new Error("rate limited"))
    startWorker()
    const policies = { ...policiesWith(fastPolicy), translateTranscript: { ...fastPolicy, retry: { ...fastPolicy.retry, maximumAttempts: 1 } } }
    const dispatcher = new LocalDispatcher(broker.queue("test-queue"), policies)

    const outcome = await dispatcher.translateTranscript({ itemId: "demo-001", language: "en", text: "Hello.", provenance: "mock" }, "es")

    expect(outcome.ok === false && outcome.failure.message).toBe("translateTranscript failed after 1 attempt(s): rate limited")
    expect(translate).toHaveBeenCalledTimes(1)
  })

  it("should only deliver tasks to workers polling the same queue", async () => {
    startWorker("other-queue")
    const queue = broker.queue("test-queue")
    const dispatcher = new LocalDispatcher(queue, policiesWith(fastPolicy))

    const pending = dispatcher.extractTranscript(item)
    await new Promise((resolve) => setTimeout(resolve, 20))

    expect(queue.size).toBe(1)

    const activities = createPipelineActivities({ backend, supportedLanguages: ["es"] })
    const second = new LocalWorker(queue, activities, "second-worker")
    const secondRun = second.run()

    await expect(pending).resolves.toMatchObject({ ok: true })
    second.shutdown()
    await secondRun
  })
})

describe("LocalTaskQueue", () => {
  it("should resolve a waiting poll with undefined once closed", async () => {
    const queue = new LocalTaskQueue("closing-queue")

    const poll = queue.poll()
    queue.close()

    await expect(poll).resolves.toBeUndefined()
    expect(queue.isClosed).toBe(true)
    expect(() => queue.enqueue({ id: "t1", activity: "extractTranscript", attempt: 1, execute: async () => undefined })).toThrow("Task queue closing-queue is closed")
  })

  it("should resolve a poll with undefined when its signal aborts", async () => {
    const queue = new LocalTaskQueue("abort-queue")
    const abort = new AbortController()

    const poll = queue.poll(abort.signal)
    abort.abort()

    await expect(poll).resolves.toBeUndefined()
  })

  it("should hand tasks out in enqueue order", async () => {
    const queue = new LocalTaskQueue("fifo-queue")
    const execute = async () => undefined

    queue.enqueue({ id: "t1", activity: "extractTranscript", attempt: 1, execute })
    queue.enqueue({ id: "t2", activity: "summarizeTranscript", attempt: 1, execute })

    await expect(queue.poll()).resolves.toMatchObject({ id: "t1" })
    await expect(queue.poll()).resolves.toMatchObject({ id: "t2" })
    expect(queue.size).toBe(0)
  })
})
