import { Injectable, OnModuleInit, OnModuleDestroy, Logger } from "@nestjs/common"
import { ConfigService } from "@nestjs/config"
import { Connection, WorkflowClient } from "@temporalio/client"
import { activityPoliciesFromConfig, type PipelineConfig } from "../../config/configuration"
import { PipelineClient } from "./pipeline-client"
import { createWorkflowGateway } from "./workflow-gateway"

/**
 * Submission side of the pipeline inside the API process. Starts, inspects and
 * signals workflows; never executes activities.
 */
@Injectable()
export class TemporalClientService implements OnModuleInit, OnModuleDestroy {
  private connection: Connection | null = null
  private pipelineClient: PipelineClient | null = null

  protected logger = new Logger(TemporalClientService.name)

  constructor(private readonly configService: ConfigService<PipelineConfig, true>) {}

  async onModuleInit() {
    const address = this.configService.get("TEMPORAL_SERVER_ADDRESS", { infer: true })
    const namespace = this.configService.get("TEMPORAL_NAMESPACE", { infer: true })

    this.logger.log(`Connecting to Temporal server at ${address}...`)

    try {
      this.connection = await Connection.connect({
        address,
        tls: false,
      })

      // Verify connection
      await this.connection.workflowService.getSystemInfo({})
    } catch (error) {
      this.logger.error(`Failed to connect to Temporal: ${error instanceof Error ? error.message : String(error)}`)
      throw error
    }

    const client = new WorkflowClient({
      connection: this.connection,
      namespace,
    })

    this.pipelineClient = new PipelineClient(createWorkflowGateway(client), {
      taskQueue: this.configService.get("TEMPORAL_TASK_QUEUE", { infer: true }),
      workflowExecutionTimeoutMs: this.configService.get("WORKFLOW_EXECUTION_TIMEOUT_MS", { infer: true }),
      policies: activityPoliciesFromConfig({
        EXTRACT_TIMEOUT_MS: this.configService.get("EXTRACT_TIMEOUT_MS", { infer: true }),
        SUMMARIZE_TIMEOUT_MS: this.configService.get("SUMMARIZE_TIMEOUT_MS", { infer: true }),
        TRANSLATE_TRANSCRIPT_TIMEOUT_MS: this.configService.get("TRANSLATE_TRANSCRIPT_TIMEOUT_MS", { infer: true }),
        TRANSLATE_SUMMARY_TIMEOUT_MS: this.configService.get("TRANSLATE_SUMMARY_TIMEOUT_MS", { infer: true }),
        ACTIVITY_MAX_ATTEMPTS: this.configService.get("ACTIVITY_MAX_ATTEMPTS", { infer: true }),
        ACTIVITY_INITIAL_INTERVAL_MS: this.configService.get("ACTIVITY_INITIAL_INTERVAL_MS", { infer: true }),
        ACTIVITY_BACKOFF_COEFFICIENT: this.configService.get("ACTIVITY_BACKOFF_COEFFICIENT", { infer: true }),
        ACTIVITY_MAXIMUM_INTERVAL_MS: this.configService.get("ACTIVITY_MAXIMUM_INTERVAL_MS", { infer: true }),
      }),
    })

    this.logger.log(`✅ Temporal client initialized for namespace:address = ${namespace}:${address}`)
  }

  async onModuleDestroy() {
    if (this.connection) {
      await this.connection.close()
      this.connection = null
      this.logger.log("Temporal connection closed.")
    }
  }

  get pipelines(): PipelineClient {
    if (!this.pipelineClient) {
      throw new Error("Temporal client is not initialized.")
    }
    return this.pipelineClient
  }
}
