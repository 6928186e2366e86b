/**
 * Activity Types for the Content Pipeline
 */

import type { TargetLanguage } from "../constants"

/**
 * Immutable input of one workflow execution
 */
export interface WorkItem {
  itemId: string
  sourceLanguage: string
  // Narrowed to TargetLanguage by the translation activities
  targetLanguage: string
}

export interface Transcript {
  itemId: string
  language: string
  text: string
  // Where the text came from; recorded for audit only
  provenance: string
}

export interface Summary {
  itemId: string
  language: string
  highLevel: string
  keyTakeaways: string[]
  actionItems: string[]
}

export interface TranslatedTranscript {
  itemId: string
  language: TargetLanguage
  text: string
  sourceLanguage: string
}

export interface SummarySection {
  heading: string
  text: string
}

export interface TranslatedSummary {
  itemId: string
  language: TargetLanguage
  sections: SummarySection[]
}

/**
 * Only assembled once all four activities succeeded for the item
 */
export interface WorkflowResult {
  item: WorkItem
  transcript: Transcript
  summary: Summary
  translatedTranscript: TranslatedTranscript
  translatedSummary: TranslatedSummary
}

/**
 * Raw structured content a summary generator must produce
 */
export interface SummaryDraft {
  highLevel: string
  keyTakeaways: string[]
  actionItems: string[]
}

export interface TranscriptRecord {
  text: string
  provenance: string
}

export interface TranslationRequest {
  kind: "transcript" | "summary"
  itemId: string
  text: string
  sourceLanguage: string
  targetLanguage: TargetLanguage
}
