/**
 * Content Pipeline Activities
 *
 * Each activity is a stateless call from a typed input to a typed output.
 * The backend (mock templates or a model service) is chosen at worker start-up;
 * validation and failure typing live here so every backend honors the same
 * contract.
 */

import { Logger } from "@nestjs/common"
import { isKnownLanguage, type TargetLanguage } from "../constants"
import type { ContentBackend } from "./backends"
import { malformedOutputFailure, notFoundFailure, unsupportedLanguageFailure } from "./errors"
import { parseSummaryDraft } from "./summary.schema"
import type { Summary, Transcript, TranslatedSummary, TranslatedTranscript, TranslationRequest, WorkItem } from "./types"

/**
 * Localized headings for the overview, key takeaways and action items sections
 */
export const SECTION_HEADINGS: Record<TargetLanguage, readonly [string, string, string]> = {
  es: ["Resumen general", "Puntos clave", "Acciones de seguimiento"],
  ja: ["概要", "主要なポイント", "フォローアップのアクション"],
  pt: ["Resumo geral", "Principais aprendizados", "Ações de acompanhamento"],
}

export interface PipelineActivityDeps {
  backend: ContentBackend
  supportedLanguages: readonly TargetLanguage[]
}

export function createPipelineActivities({ backend, supportedLanguages }: PipelineActivityDeps) {
  const logger = new Logger("PipelineActivities")

  // The only place a target language string is checked
  function requireSupportedLanguage(language: string): TargetLanguage {
    if (!isKnownLanguage(language) || !supportedLanguages.includes(language)) {
      throw unsupportedLanguageFailure(language, supportedLanguages)
    }
    return language
  }

  async function translateText(request: TranslationRequest): Promise<string> {
    const text = await backend.translate(request)
    if (!text.trim()) {
      throw malformedOutputFailure(`empty ${request.kind} translation for ${request.itemId}`)
    }
    return text
  }

  /**
   * Activity: look up the source transcript for an item
   */
  async function extractTranscript(item: WorkItem): Promise<Transcript> {
    logger.log(`[Activity] Extracting transcript for ${item.itemId} (${backend.name})`)

    const record = await backend.lookupTranscript(item.itemId, item.sourceLanguage)
    if (!record) {
      logger.warn(`[Activity] Unknown item: ${item.itemId}`)
      throw notFoundFailure(item.itemId)
    }

    return {
      itemId: item.itemId,
      language: item.sourceLanguage,
      text: record.text,
      provenance: record.provenance,
    }
  }

  /**
   * Activity: high-level summary, key takeaways and action items in the
   * transcript's language
   */
  async function summarizeTranscript(transcript: Transcript): Promise<Summary> {
    logger.log(`[Activity] Summarizing transcript for ${transcript.itemId}`)

    const draft = parseSummaryDraft(await backend.generateSummary(transcript))

    return {
      itemId: transcript.itemId,
      language: transcript.language,
      highLevel: draft.highLevel,
      keyTakeaways: draft.keyTakeaways,
      actionItems: draft.actionItems,
    }
  }

  async function translateTranscript(transcript: Transcript, targetLanguage: string): Promise<TranslatedTranscript> {
    const language = requireSupportedLanguage(targetLanguage)
    logger.log(`[Activity] Translating transcript for ${transcript.itemId}: ${transcript.language} → ${language}`)

    const text = await translateText({
      kind: "transcript",
      itemId: transcript.itemId,
      text: transcript.text,
      sourceLanguage: transcript.language,
      targetLanguage: language,
    })

    return {
      itemId: transcript.itemId,
      language,
      text,
      sourceLanguage: transcript.language,
    }
  }

  /**
   * Activity: translate the summary into three sections with localized
   * headings. List items keep their order.
   */
  async function translateSummary(summary: Summary, targetLanguage: string): Promise<TranslatedSummary> {
    const language = requireSupportedLanguage(targetLanguage)
    logger.log(`[Activity] Translating summary for ${summary.itemId}: ${summary.language} → ${language}`)

    const translate = (text: string) =>
      translateText({
        kind: "summary",
        itemId: summary.itemId,
        text,
        sourceLanguage: summary.language,
        targetLanguage: language,
      })

    const [highLevel, keyTakeaways, actionItems] = await Promise.all([translate(summary.highLevel), Promise.all(summary.keyTakeaways.map((line) => translate(line))), Promise.all(summary.actionItems.map((line) => translate(line)))])
    const [overviewHeading, takeawaysHeading, actionsHeading] = SECTION_HEADINGS[language]

    return {
      itemId: summary.itemId,
      language,
      sections: [
        { heading: overviewHeading, text: highLevel },
        { heading: takeawaysHeading, text: keyTakeaways.join("\n") },
        { heading: actionsHeading, text: actionItems.join("\n") },
      ],
    }
  }

  return { extractTranscript, summarizeTranscript, translateTranscript, translateSummary }
}

export type PipelineActivities = ReturnType<typeof createPipelineActivities>
