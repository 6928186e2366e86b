import catalogData from "./mock-catalog.json"
import templates from "./mock-templates.json"
import type { ContentBackend, ContentBackendName, TranscriptCatalog } from "./content-backend"
import type { Transcript, TranscriptRecord, TranslationRequest } from "../types"

const MOCK_PROVENANCE = "mock"

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => values[key] ?? placeholder)
}

/**
 * Transcripts bundled with the service, keyed by item id
 */
export class MockTranscriptCatalog implements TranscriptCatalog {
  private readonly entries: Map<string, { language: string; transcript: string }>

  constructor(items: Record<string, { language: string; transcript: string }> = catalogData.items) {
    this.entries = new Map(Object.entries(items))
  }

  lookup(itemId: string, language: string): TranscriptRecord | undefined {
    const entry = this.entries.get(itemId)
    if (!entry || entry.language !== language) {
      return undefined
    }
    return { text: entry.transcript, provenance: MOCK_PROVENANCE }
  }
}

/**
 * Template-based backend. Output depends only on the input, so repeated
 * executions of an activity produce identical results.
 */
export class MockContentBackend implements ContentBackend {
  readonly name: ContentBackendName = "mock"

  constructor(private readonly catalog: TranscriptCatalog = new MockTranscriptCatalog()) {}

  async lookupTranscript(itemId: string, language: string): Promise<TranscriptRecord | undefined> {
    return this.catalog.lookup(itemId, language)
  }

  async generateSummary(transcript: Transcript): Promise<string> {
    const values = { itemId: transcript.itemId }
    return JSON.stringify({
      highLevel: fillTemplate(templates.summary.highLevel, values),
      keyTakeaways: templates.summary.keyTakeaways.map((line) => fillTemplate(line, values)),
      actionItems: templates.summary.actionItems.map((line) => fillTemplate(line, values)),
    })
  }

  async translate(request: TranslationRequest): Promise<string> {
    const template = templates.translation[request.kind][request.targetLanguage]
    return fillTemplate(template, { itemId: request.itemId, text: request.text })
  }
}
