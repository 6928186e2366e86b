// Barrel exports only - no class/interface/type definitions allowed in index.ts

// Types
export type { WorkItem, Transcript, Summary, SummarySection, TranslatedTranscript, TranslatedSummary, WorkflowResult, SummaryDraft, TranscriptRecord, TranslationRequest } from "./types"

// Activities
export { createPipelineActivities, SECTION_HEADINGS, type PipelineActivities, type PipelineActivityDeps } from "./pipeline.activities"

// Failures
export { ACTIVITY_ERROR_KINDS, isActivityErrorKind, type ActivityErrorKind } from "./errors"

// Backends
export { createContentBackend, MockContentBackend, MockTranscriptCatalog, OpenAIContentBackend, CONTENT_BACKENDS, type ContentBackend, type ContentBackendName, type ContentBackendSettings } from "./backends"
