// Barrel exports only - no class/interface/type definitions allowed in index.ts

export type { ContentBackend, ContentBackendName, TranscriptCatalog } from "./content-backend"
export { CONTENT_BACKENDS } from "./content-backend"
export { MockContentBackend, MockTranscriptCatalog } from "./mock.backend"
export { OpenAIContentBackend, createOpenAIClient, type ChatCompletionClient } from "./openai.backend"
export { createContentBackend, type ContentBackendSettings } from "./backend.factory"
