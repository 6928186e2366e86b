import { Logger } from "@nestjs/common"
import type { PipelineActivities } from "../activities"
import type { LocalTaskQueue } from "./local-task-queue"

/**
 * Long-polls one task queue and executes activity tasks with its own
 * activity implementations. Tasks run concurrently; a worker holds no state
 * shared with other workers.
 */
export class LocalWorker {
  private readonly logger = new Logger(LocalWorker.name)
  private readonly inFlight = new Set<Promise<void>>()
  private abort: AbortController | null = null

  constructor(
    private readonly queue: LocalTaskQueue,
    private readonly activities: PipelineActivities,
    readonly identity: string,
  ) {}

  /**
   * Resolves after shutdown once in-flight tasks have finished
   */
  async run(): Promise<void> {
    if (this.abort) {
      throw new Error(`Worker ${this.identity} is already running`)
    }

    const abort = new AbortController()
    this.abort = abort
    this.logger.log(`Worker ${this.identity} polling task queue: ${this.queue.name}`)

    while (!abort.signal.aborted) {
      const task = await this.queue.poll(abort.signal)
      if (!task) {
        break
      }

      const execution = task.execute(this.activities, this.identity).finally(() => {
        this.inFlight.delete(execution)
      })
      this.inFlight.add(execution)
    }

    await Promise.allSettled([...this.inFlight])
    this.abort = null
    this.logger.log(`Worker ${this.identity} stopped`)
  }

  shutdown(): void {
    this.abort?.abort()
  }
}
