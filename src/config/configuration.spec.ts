import { activityPoliciesFromConfig, contentBackendSettings, loadConfiguration } from "./configuration"

describe("Configuration", () => {
  describe("loadConfiguration", () => {
    it("should apply defaults to an empty environment", () => {
      const config = loadConfiguration({})

      expect(config).toMatchObject({
        SERVICE_NAME: "content-pipeline",
        PORT: 3001,
        NODE_ENV: "development",
        TEMPORAL_SERVER_ADDRESS: "localhost:7233",
        TEMPORAL_NAMESPACE: "default",
        TEMPORAL_TASK_QUEUE: "content-pipeline-queue",
        WORKFLOW_EXECUTION_TIMEOUT_MS: 120000,
        CONTENT_BACKEND: "mock",
        OPENAI_API_KEY: "",
        OPENAI_MODEL: "gpt-4o-mini",
        SUPPORTED_LANGUAGES: ["es", "ja", "pt"],
        ACTIVITY_MAX_ATTEMPTS: 3,
        LOCAL_WORKERS: 2,
      })
      expect(config.HISTORY_DIR).toBeUndefined()
    })

    it("should convert numeric values and split the language list", () => {
      const config = loadConfiguration({ PORT: "4000", SUPPORTED_LANGUAGES: " es, pt ", ACTIVITY_BACKOFF_COEFFICIENT: "1.5" })

      expect(config.PORT).toBe(4000)
      expect(config.SUPPORTED_LANGUAGES).toEqual(["es", "pt"])
      expect(config.ACTIVITY_BACKOFF_COEFFICIENT).toBe(1.5)
    })

    it("should reject a language the pipeline cannot label", () => {
      expect(() => loadConfiguration({ SUPPORTED_LANGUAGES: "es,fr" })).toThrow('Config validation error: "SUPPORTED_LANGUAGES[1]" must be one of [es, ja, pt]')
    })

    it("should require an API key for the openai backend", () => {
      expect(() => loadConfiguration({ CONTENT_BACKEND: "openai" })).toThrow('Config validation error: "OPENAI_API_KEY" is required')
      expect(loadConfiguration({ CONTENT_BACKEND: "openai", OPENAI_API_KEY: "test-secret" }).OPENAI_API_KEY).toBe("test-secret")
    })

    it("should reject an unknown backend", () => {
      expect(() => loadConfiguration({ CONTENT_BACKEND: "whisper" })).toThrow('Config validation error: "CONTENT_BACKEND" must be one of [mock, openai]')
    })
  })

  describe("activityPoliciesFromConfig", () => {
    it("should give each activity its own timeout and the shared retry policy", () => {
      const policies = activityPoliciesFromConfig(loadConfiguration({ EXTRACT_TIMEOUT_MS: "5000", ACTIVITY_MAX_ATTEMPTS: "5" }))

      expect(policies.extractTranscript).toEqual({
        startToCloseTimeoutMs: 5000,
        retry: { maximumAttempts: 5, initialIntervalMs: 1000, backoffCoefficient: 2, maximumIntervalMs: 10000 },
      })
      expect(policies.summarizeTranscript.startToCloseTimeoutMs).toBe(25000)
      expect(policies.translateTranscript.startToCloseTimeoutMs).toBe(20000)
      expect(policies.translateSummary.retry).toBe(policies.extractTranscript.retry)
    })
  })

  describe("contentBackendSettings", () => {
    it("should pick the backend settings", () => {
      expect(contentBackendSettings(loadConfiguration({ OPENAI_MODEL: "gpt-test" }))).toEqual({ backend: "mock", openaiApiKey: "", openaiModel: "gpt-test" })
    })
  })
})
