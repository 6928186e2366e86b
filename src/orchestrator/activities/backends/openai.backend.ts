/**
 * Model-backed activity backend
 *
 * Uses GPT chat completions for summarization (JSON mode) and translation.
 * Transcripts still come from the catalog: speech-to-text runs upstream.
 */

import OpenAI from "openai"
import * as https from "https"
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions"
import type { ContentBackend, ContentBackendName, TranscriptCatalog } from "./content-backend"
import type { Transcript, TranscriptRecord, TranslationRequest } from "../types"

const LANGUAGE_NAMES: Record<string, string> = {
  en: "English",
  es: "Spanish",
  ja: "Japanese",
  pt: "Portuguese",
}

/**
 * The slice of the OpenAI client this backend calls
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>
    }
  }
}

export interface OpenAIBackendOptions {
  apiKey: string
  model: string
  timeoutMs?: number
}

export function createOpenAIClient(options: OpenAIBackendOptions): OpenAI {
  // Keep-alive agent so bursts of translation calls reuse connections
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
    keepAliveMsecs: 30000,
  })

  return new OpenAI({
    apiKey: options.apiKey,
    httpAgent: httpsAgent,
    timeout: options.timeoutMs ?? 60000,
    maxRetries: 0, // The dispatch layer owns retries
  })
}

export class OpenAIContentBackend implements ContentBackend {
  readonly name: ContentBackendName = "openai"

  constructor(
    private readonly client: ChatCompletionClient,
    private readonly model: string,
    private readonly catalog: TranscriptCatalog,
  ) {}

  async lookupTranscript(itemId: string, language: string): Promise<TranscriptRecord | undefined> {
    return this.catalog.lookup(itemId, language)
  }

  async generateSummary(transcript: Transcript): Promise<string> {
    const language = LANGUAGE_NAMES[transcript.language] ?? transcript.language

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: "system",
          content: `You are a content summarizer. Summarize the following transcript in ${language}.
Write exactly one high-level sentence, 3-5 key takeaways and 2-4 follow-up action items.

Format your response as JSON:
{
  "highLevel": "one sentence",
  "keyTakeaways": ["takeaway 1", "takeaway 2", "takeaway 3"],
  "actionItems": ["action 1", "action 2"]
}`,
        },
        {
          role: "user",
          content: transcript.text,
        },
      ],
      temperature: 0.2,
      response_format: { type: "json_object" },
    })

    return response.choices[0]?.message?.content ?? ""
  }

  async translate(request: TranslationRequest): Promise<string> {
    const source = LANGUAGE_NAMES[request.sourceLanguage] ?? request.sourceLanguage
    const target = LANGUAGE_NAMES[request.targetLanguage] ?? request.targetLanguage

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        {
          role: "system",
          content: `You are a professional translator. Translate the following ${request.kind} text from ${source} to ${target}.
Preserve the meaning, tone, and style of the original text.
Only output the translated text, nothing else.`,
        },
        {
          role: "user",
          content: request.text,
        },
      ],
      temperature: 0,
    })

    return response.choices[0]?.message?.content?.trim() ?? ""
  }
}
