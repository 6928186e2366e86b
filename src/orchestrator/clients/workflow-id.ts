import { v4 as uuidv4 } from "uuid"
import type { WorkItem } from "../activities/types"

/**
 * Workflow ID: content-pipeline-<item>-<target language>-<uuid>
 */
export function createWorkflowId(item: WorkItem): string {
  const itemPart = item.itemId.replace(/[^a-zA-Z0-9-_]/g, "-").toLowerCase()
  const languagePart = item.targetLanguage.toLowerCase().replace(/[^a-z0-9-]/g, "-")
  return `content-pipeline-${itemPart}-${languagePart}-${uuidv4()}`
}
