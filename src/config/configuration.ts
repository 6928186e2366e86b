import { Logger } from "@nestjs/common"
import * as Joi from "joi"
import { CONTENT_BACKENDS, type ContentBackendName, type ContentBackendSettings } from "../orchestrator/activities/backends"
import { KNOWN_LANGUAGES, TASK_QUEUE, type TargetLanguage } from "../orchestrator/constants"
import type { ActivityPolicies, RetrySettings } from "../orchestrator/dispatch/activity-policies"

export interface PipelineConfig {
  // Service
  SERVICE_NAME: string
  PORT: number
  NODE_ENV: "development" | "production" | "test"

  // Temporal
  TEMPORAL_SERVER_ADDRESS: string
  TEMPORAL_NAMESPACE: string
  TEMPORAL_TASK_QUEUE: string
  WORKFLOW_EXECUTION_TIMEOUT_MS: number

  // Activity backends
  CONTENT_BACKEND: ContentBackendName
  OPENAI_API_KEY: string
  OPENAI_MODEL: string
  SUPPORTED_LANGUAGES: TargetLanguage[]

  // Activity timeouts and retry policy
  EXTRACT_TIMEOUT_MS: number
  SUMMARIZE_TIMEOUT_MS: number
  TRANSLATE_TRANSCRIPT_TIMEOUT_MS: number
  TRANSLATE_SUMMARY_TIMEOUT_MS: number
  ACTIVITY_MAX_ATTEMPTS: number
  ACTIVITY_INITIAL_INTERVAL_MS: number
  ACTIVITY_BACKOFF_COEFFICIENT: number
  ACTIVITY_MAXIMUM_INTERVAL_MS: number

  // Local dispatch
  LOCAL_WORKERS: number
  HISTORY_DIR?: string
}

const positiveInteger = () => Joi.number().integer().positive()

const schema = Joi.object<PipelineConfig>({
  // Service
  SERVICE_NAME: Joi.string().required(),
  PORT: Joi.number().port().default(3001),
  NODE_ENV: Joi.string().valid("development", "production", "test").default("development"),

  // Temporal
  TEMPORAL_SERVER_ADDRESS: Joi.string().required(),
  TEMPORAL_NAMESPACE: Joi.string().default("default"),
  TEMPORAL_TASK_QUEUE: Joi.string().default(TASK_QUEUE),
  WORKFLOW_EXECUTION_TIMEOUT_MS: positiveInteger().default(120000),

  // Activity backends
  CONTENT_BACKEND: Joi.string()
    .valid(...CONTENT_BACKENDS)
    .default("mock"),
  OPENAI_API_KEY: Joi.when("CONTENT_BACKEND", {
    is: "openai",
    then: Joi.string().min(1).required(),
    otherwise: Joi.string().allow("").default(""),
  }),
  OPENAI_MODEL: Joi.string().default("gpt-4o-mini"),
  SUPPORTED_LANGUAGES: Joi.array()
    .items(Joi.string().valid(...KNOWN_LANGUAGES))
    .min(1)
    .unique()
    .required(),

  // Activity timeouts and retry policy
  EXTRACT_TIMEOUT_MS: positiveInteger().default(30000),
  SUMMARIZE_TIMEOUT_MS: positiveInteger().default(25000),
  TRANSLATE_TRANSCRIPT_TIMEOUT_MS: positiveInteger().default(20000),
  TRANSLATE_SUMMARY_TIMEOUT_MS: positiveInteger().default(20000),
  ACTIVITY_MAX_ATTEMPTS: positiveInteger().default(3),
  ACTIVITY_INITIAL_INTERVAL_MS: positiveInteger().default(1000),
  ACTIVITY_BACKOFF_COEFFICIENT: Joi.number().min(1).default(2),
  ACTIVITY_MAXIMUM_INTERVAL_MS: positiveInteger().default(10000),

  // Local dispatch
  LOCAL_WORKERS: positiveInteger().default(2),
  HISTORY_DIR: Joi.string().optional(),
})

function splitList(value: string | undefined): string[] | undefined {
  return value
    ?.split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

/**
 * Read and validate configuration from the environment
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const config = {
    // Service
    SERVICE_NAME: env.SERVICE_NAME || "content-pipeline",
    PORT: env.PORT,
    NODE_ENV: env.NODE_ENV,

    // Temporal
    TEMPORAL_SERVER_ADDRESS: env.TEMPORAL_SERVER_ADDRESS || "localhost:7233",
    TEMPORAL_NAMESPACE: env.TEMPORAL_NAMESPACE,
    TEMPORAL_TASK_QUEUE: env.TEMPORAL_TASK_QUEUE,
    WORKFLOW_EXECUTION_TIMEOUT_MS: env.WORKFLOW_EXECUTION_TIMEOUT_MS,

    // Activity backends
    CONTENT_BACKEND: env.CONTENT_BACKEND,
    OPENAI_API_KEY: env.OPENAI_API_KEY,
    OPENAI_MODEL: env.OPENAI_MODEL,
    SUPPORTED_LANGUAGES: splitList(env.SUPPORTED_LANGUAGES) ?? [...KNOWN_LANGUAGES],

    // Activity timeouts and retry policy
    EXTRACT_TIMEOUT_MS: env.EXTRACT_TIMEOUT_MS,
    SUMMARIZE_TIMEOUT_MS: env.SUMMARIZE_TIMEOUT_MS,
    TRANSLATE_TRANSCRIPT_TIMEOUT_MS: env.TRANSLATE_TRANSCRIPT_TIMEOUT_MS,
    TRANSLATE_SUMMARY_TIMEOUT_MS: env.TRANSLATE_SUMMARY_TIMEOUT_MS,
    ACTIVITY_MAX_ATTEMPTS: env.ACTIVITY_MAX_ATTEMPTS,
    ACTIVITY_INITIAL_INTERVAL_MS: env.ACTIVITY_INITIAL_INTERVAL_MS,
    ACTIVITY_BACKOFF_COEFFICIENT: env.ACTIVITY_BACKOFF_COEFFICIENT,
    ACTIVITY_MAXIMUM_INTERVAL_MS: env.ACTIVITY_MAXIMUM_INTERVAL_MS,

    // Local dispatch
    LOCAL_WORKERS: env.LOCAL_WORKERS,
    HISTORY_DIR: env.HISTORY_DIR,
  }

  const { value, error } = schema.validate(config, { allowUnknown: true })

  if (error) {
    throw new Error(`Config validation error: ${error.message}`)
  }
  if (!value) {
    throw new Error("Config validation error: empty configuration")
  }

  new Logger("Configuration").log(`${value.SERVICE_NAME} configurations validated successfully.`)

  return value
}

export type ActivityPolicySettings = Pick<
  PipelineConfig,
  "EXTRACT_TIMEOUT_MS" | "SUMMARIZE_TIMEOUT_MS" | "TRANSLATE_TRANSCRIPT_TIMEOUT_MS" | "TRANSLATE_SUMMARY_TIMEOUT_MS" | "ACTIVITY_MAX_ATTEMPTS" | "ACTIVITY_INITIAL_INTERVAL_MS" | "ACTIVITY_BACKOFF_COEFFICIENT" | "ACTIVITY_MAXIMUM_INTERVAL_MS"
>

export function activityPoliciesFromConfig(config: ActivityPolicySettings): ActivityPolicies {
  const retry: RetrySettings = {
    maximumAttempts: config.ACTIVITY_MAX_ATTEMPTS,
    initialIntervalMs: config.ACTIVITY_INITIAL_INTERVAL_MS,
    backoffCoefficient: config.ACTIVITY_BACKOFF_COEFFICIENT,
    maximumIntervalMs: config.ACTIVITY_MAXIMUM_INTERVAL_MS,
  }

  return {
    extractTranscript: { startToCloseTimeoutMs: config.EXTRACT_TIMEOUT_MS, retry },
    summarizeTranscript: { startToCloseTimeoutMs: config.SUMMARIZE_TIMEOUT_MS, retry },
    translateTranscript: { startToCloseTimeoutMs: config.TRANSLATE_TRANSCRIPT_TIMEOUT_MS, retry },
    translateSummary: { startToCloseTimeoutMs: config.TRANSLATE_SUMMARY_TIMEOUT_MS, retry },
  }
}

export function contentBackendSettings(config: Pick<PipelineConfig, "CONTENT_BACKEND" | "OPENAI_API_KEY" | "OPENAI_MODEL">): ContentBackendSettings {
  return {
    backend: config.CONTENT_BACKEND,
    openaiApiKey: config.OPENAI_API_KEY,
    openaiModel: config.OPENAI_MODEL,
  }
}
