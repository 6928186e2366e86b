import * as fs from "fs/promises"
import * as path from "path"
import type { PipelineEvent } from "../workflows/pipeline.machine"

/**
 * Ordered event history per workflow execution
 */
export interface HistoryStore {
  load(workflowId: string): Promise<PipelineEvent[]>
  append(workflowId: string, event: PipelineEvent): Promise<void>
}

export class InMemoryHistoryStore implements HistoryStore {
  private readonly histories = new Map<string, PipelineEvent[]>()

  async load(workflowId: string): Promise<PipelineEvent[]> {
    return [...(this.histories.get(workflowId) ?? [])]
  }

  async append(workflowId: string, event: PipelineEvent): Promise<void> {
    const history = this.histories.get(workflowId) ?? []
    history.push(event)
    this.histories.set(workflowId, history)
  }
}

/**
 * One JSON-lines file per workflow execution under `directory`
 */
export class FileHistoryStore implements HistoryStore {
  constructor(private readonly directory: string) {}

  async load(workflowId: string): Promise<PipelineEvent[]> {
    let content: string
    try {
      content = await fs.readFile(this.fileFor(workflowId), "utf-8")
    } catch (error) {
      if (isMissingFile(error)) {
        return []
      }
      throw error
    }

    return content
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line): PipelineEvent => JSON.parse(line))
  }

  async append(workflowId: string, event: PipelineEvent): Promise<void> {
    await fs.mkdir(this.directory, { recursive: true })
    await fs.appendFile(this.fileFor(workflowId), `${JSON.stringify(event)}\n`, "utf-8")
  }

  private fileFor(workflowId: string): string {
    return path.join(this.directory, `${workflowId.replace(/[^a-zA-Z0-9-_]/g, "-")}.jsonl`)
  }
}

// Matched on shape: fs errors may come from another realm
function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT"
}
