import * as Joi from "joi"
import { malformedOutputFailure } from "./errors"
import type { SummaryDraft } from "./types"

// A sentence terminator followed by more text
const SECOND_SENTENCE = /(?:[.!?]\s+|[。！？])\S/

const summaryDraftSchema = Joi.object<SummaryDraft>({
  highLevel: Joi.string()
    .trim()
    .min(1)
    .pattern(SECOND_SENTENCE, { name: "single sentence", invert: true })
    .messages({ "string.pattern.invert.name": "{{#label}} must be a single sentence" })
    .required(),
  keyTakeaways: Joi.array().items(Joi.string().trim().min(1)).min(3).max(5).required(),
  actionItems: Joi.array().items(Joi.string().trim().min(1)).min(2).max(4).required(),
})

/**
 * Parse generator output into the three summary fields, or fail with
 * MalformedOutput
 */
export function parseSummaryDraft(raw: string): SummaryDraft {
  let document: unknown
  try {
    document = JSON.parse(raw)
  } catch (error) {
    throw malformedOutputFailure(`not valid JSON (${error instanceof Error ? error.message : String(error)})`)
  }

  const { value, error } = summaryDraftSchema.validate(document, { stripUnknown: true })
  if (error) {
    throw malformedOutputFailure(error.message)
  }
  if (!value) {
    throw malformedOutputFailure("empty document")
  }
  return value
}
