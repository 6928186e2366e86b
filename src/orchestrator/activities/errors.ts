import { ApplicationFailure } from "@temporalio/common"

/**
 * Failure kinds an activity call can end with.
 *
 * The first three are raised by activities themselves; ActivityTimeout is
 * raised by the dispatch layer for a single attempt; RetriesExhausted wraps the
 * last attempt once the retry budget is spent. BackendError covers anything
 * unclassified (network, SDK errors).
 */
export const ACTIVITY_ERROR_KINDS = ["NotFound", "MalformedOutput", "UnsupportedLanguage", "ActivityTimeout", "RetriesExhausted", "BackendError"] as const

export type ActivityErrorKind = (typeof ACTIVITY_ERROR_KINDS)[number]

export function isActivityErrorKind(value: unknown): value is ActivityErrorKind {
  return typeof value === "string" && (ACTIVITY_ERROR_KINDS as readonly string[]).includes(value)
}

export function notFoundFailure(itemId: string): ApplicationFailure {
  return ApplicationFailure.create({
    type: "NotFound",
    message: `No transcript found for item '${itemId}'`,
    nonRetryable: true,
  })
}

export function unsupportedLanguageFailure(language: string, supported: readonly string[]): ApplicationFailure {
  return ApplicationFailure.create({
    type: "UnsupportedLanguage",
    message: `Unsupported language '${language}'. Supported: ${supported.join(", ")}.`,
    nonRetryable: true,
  })
}

export function malformedOutputFailure(detail: string): ApplicationFailure {
  return ApplicationFailure.create({
    type: "MalformedOutput",
    message: `Generator returned malformed content: ${detail}`,
  })
}

export function activityTimeoutFailure(activity: string, timeoutMs: number): ApplicationFailure {
  return ApplicationFailure.create({
    type: "ActivityTimeout",
    message: `Activity ${activity} exceeded its ${timeoutMs}ms timeout`,
  })
}
