import type { PipelineActivities } from "../activities"
import type { PipelineActivityName } from "../constants"

/**
 * One attempt of one activity call, waiting for a worker
 */
export interface ActivityTask {
  readonly id: string
  readonly activity: PipelineActivityName
  readonly attempt: number
  // Runs the attempt against the polling worker's activities; never rejects
  execute(activities: PipelineActivities, workerIdentity: string): Promise<void>
}

/**
 * In-process named task queue with long-polling
 */
export class LocalTaskQueue {
  private readonly pending: ActivityTask[] = []
  private readonly pollers: Array<(task: ActivityTask | undefined) => void> = []
  private closed = false

  constructor(readonly name: string) {}

  get size(): number {
    return this.pending.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  enqueue(task: ActivityTask): void {
    if (this.closed) {
      throw new Error(`Task queue ${this.name} is closed`)
    }

    const poller = this.pollers.shift()
    if (poller) {
      poller(task)
    } else {
      this.pending.push(task)
    }
  }

  /**
   * Resolves with the next task, or undefined once the queue is closed or the
   * signal aborts
   */
  poll(signal?: AbortSignal): Promise<ActivityTask | undefined> {
    const next = this.pending.shift()
    if (next) {
      return Promise.resolve(next)
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined)
    }

    return new Promise((resolve) => {
      const poller = (task: ActivityTask | undefined) => {
        signal?.removeEventListener("abort", onAbort)
        resolve(task)
      }
      const onAbort = () => {
        const index = this.pollers.indexOf(poller)
        if (index >= 0) {
          this.pollers.splice(index, 1)
        }
        resolve(undefined)
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.pollers.push(poller)
    })
  }

  close(): void {
    this.closed = true
    for (const poller of this.pollers.splice(0)) {
      poller(undefined)
    }
  }
}

/**
 * Named queues; a worker only ever sees tasks of the queue it polls
 */
export class TaskQueueBroker {
  private readonly queues = new Map<string, LocalTaskQueue>()

  queue(name: string): LocalTaskQueue {
    let queue = this.queues.get(name)
    if (!queue) {
      queue = new LocalTaskQueue(name)
      this.queues.set(name, queue)
    }
    return queue
  }

  closeAll(): void {
    for (const queue of this.queues.values()) {
      queue.close()
    }
  }
}
