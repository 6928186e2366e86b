/**
 * Shared identifiers for the content pipeline.
 *
 * Safe to import from workflow code: no Node.js or framework dependencies.
 */

// Task queue shared by every worker and every submission of this pipeline
export const TASK_QUEUE = "content-pipeline-queue"

export const WORKFLOW_TYPE = "contentPipelineWorkflow"

export const PROGRESS_QUERY = "getProgress"
export const SOURCE_SUMMARY_QUERY = "getSourceSummary"
export const CANCEL_SIGNAL = "cancelPipeline"

export const SOURCE_LANGUAGE = "en"

/**
 * Every target language the pipeline knows how to label. The configured
 * supported set is a subset of these.
 */
export const KNOWN_LANGUAGES = ["es", "ja", "pt"] as const

export type TargetLanguage = (typeof KNOWN_LANGUAGES)[number]

export function isKnownLanguage(value: string): value is TargetLanguage {
  return (KNOWN_LANGUAGES as readonly string[]).includes(value)
}

export const PIPELINE_ACTIVITY_NAMES = ["extractTranscript", "summarizeTranscript", "translateTranscript", "translateSummary"] as const

export type PipelineActivityName = (typeof PIPELINE_ACTIVITY_NAMES)[number]
