import type { ContentBackend, ContentBackendName } from "./content-backend"
import { MockContentBackend, MockTranscriptCatalog } from "./mock.backend"
import { OpenAIContentBackend, createOpenAIClient } from "./openai.backend"

export interface ContentBackendSettings {
  backend: ContentBackendName
  openaiApiKey: string
  openaiModel: string
}

/**
 * Select the activity backend at worker start-up
 */
export function createContentBackend(settings: ContentBackendSettings): ContentBackend {
  const catalog = new MockTranscriptCatalog()

  if (settings.backend === "openai") {
    const client = createOpenAIClient({ apiKey: settings.openaiApiKey, model: settings.openaiModel })
    return new OpenAIContentBackend(client, settings.openaiModel, catalog)
  }

  return new MockContentBackend(catalog)
}
