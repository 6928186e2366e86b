import type { Transcript, TranscriptRecord, TranslationRequest } from "../types"

export const CONTENT_BACKENDS = ["mock", "openai"] as const

export type ContentBackendName = (typeof CONTENT_BACKENDS)[number]

/**
 * Capability every activity backend implements. Backends do the work; the
 * activities around them own validation and failure typing.
 */
export interface ContentBackend {
  readonly name: ContentBackendName

  /**
   * Resolves undefined when the item is unknown
   */
  lookupTranscript(itemId: string, language: string): Promise<TranscriptRecord | undefined>

  /**
   * Raw JSON document with highLevel, keyTakeaways and actionItems
   */
  generateSummary(transcript: Transcript): Promise<string>

  translate(request: TranslationRequest): Promise<string>
}

/**
 * Source of transcripts, shared by all backends since extraction itself
 * happens upstream of this service
 */
export interface TranscriptCatalog {
  lookup(itemId: string, language: string): TranscriptRecord | undefined
}
