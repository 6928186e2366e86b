import { Injectable, Logger } from "@nestjs/common"
import { ConfigService } from "@nestjs/config"
import { WorkflowNotFoundError } from "@temporalio/common"
import { TemporalClientService } from "./orchestrator/clients/temporal-client.service"
import type { PipelineStatus } from "./orchestrator/clients/pipeline-client"
import { SOURCE_LANGUAGE } from "./orchestrator/constants"
import type { Summary, WorkItem } from "./orchestrator/activities/types"
import type { WorkflowProgress } from "./orchestrator/workflows/pipeline.machine"
import type { PipelineConfig } from "./config/configuration"
import { SubmitPipelineDto, StartPipelineResponseDto, CancelPipelineResponseDto } from "./dto"
import { PipelineException, WorkflowException, WorkflowNotFoundException, WorkflowClosedException, TemporalConnectionException } from "./common/exceptions"

/**
 * Helper function to extract error message from unknown error type
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * Helper function to check if error message contains a specific string
 */
function errorContains(error: unknown, ...patterns: string[]): boolean {
  const message = getErrorMessage(error)
  return patterns.some((p) => message.includes(p))
}

@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name)

  constructor(
    private readonly configService: ConfigService<PipelineConfig, true>,
    private readonly temporalClient: TemporalClientService,
  ) {}

  getHealthStatus() {
    this.logger.log("Health check requested")
    return {
      status: "ok",
      service: this.configService.get("SERVICE_NAME", { infer: true }),
      timestamp: new Date().toISOString(),
    }
  }

  getServiceInfo() {
    return {
      name: this.configService.get("SERVICE_NAME", { infer: true }),
      version: "1.0.0",
      description: "Content Pipeline Orchestrator",
      environment: this.configService.get("NODE_ENV", { infer: true }),
    }
  }

  /**
   * Start one workflow per submitted item
   */
  async startPipelines(dto: SubmitPipelineDto): Promise<StartPipelineResponseDto[]> {
    const items: WorkItem[] = dto.items.map((entry) => ({
      itemId: entry.itemId,
      sourceLanguage: entry.sourceLanguage ?? SOURCE_LANGUAGE,
      targetLanguage: entry.targetLanguage,
    }))

    this.logger.log(`Starting ${items.length} pipeline(s): ${items.map((item) => `${item.itemId} → ${item.targetLanguage}`).join(", ")}`)

    try {
      const started = await this.temporalClient.pipelines.startBatch(items)
      return started.map(({ workflowId, item }): StartPipelineResponseDto => ({ workflowId, itemId: item.itemId, targetLanguage: item.targetLanguage, status: "started" }))
    } catch (error) {
      throw this.toHttpException(error, "start pipelines")
    }
  }

  async getPipelineStatus(workflowId: string): Promise<PipelineStatus> {
    this.logger.log(`Getting status for workflow: ${workflowId}`)

    try {
      return await this.temporalClient.pipelines.getStatus(workflowId)
    } catch (error) {
      throw this.toHttpException(error, "get workflow status", workflowId)
    }
  }

  async getPipelineProgress(workflowId: string): Promise<WorkflowProgress> {
    try {
      return await this.temporalClient.pipelines.queryProgress(workflowId)
    } catch (error) {
      throw this.toHttpException(error, "query workflow progress", workflowId)
    }
  }

  /**
   * Source-language summary; also available when the translations failed
   */
  async getSourceSummary(workflowId: string): Promise<{ workflowId: string; summary: Summary | null }> {
    try {
      const summary = await this.temporalClient.pipelines.querySourceSummary(workflowId)
      return { workflowId, summary }
    } catch (error) {
      throw this.toHttpException(error, "query source summary", workflowId)
    }
  }

  async cancelPipeline(workflowId: string): Promise<CancelPipelineResponseDto> {
    this.logger.log(`Cancelling workflow: ${workflowId}`)

    try {
      const { status } = await this.temporalClient.pipelines.getStatus(workflowId)
      if (status !== "RUNNING") {
        throw new WorkflowClosedException(workflowId, status)
      }

      await this.temporalClient.pipelines.cancel(workflowId)
      return { workflowId, status: "cancel-requested" }
    } catch (error) {
      throw this.toHttpException(error, "cancel workflow", workflowId)
    }
  }

  private toHttpException(error: unknown, action: string, workflowId?: string): PipelineException {
    // Re-throw custom exceptions
    if (error instanceof PipelineException) {
      return error
    }

    const errorMsg = getErrorMessage(error)

    if (workflowId && (error instanceof WorkflowNotFoundError || errorContains(error, "not found", "NOT_FOUND"))) {
      return new WorkflowNotFoundException(workflowId)
    }

    this.logger.error(`Failed to ${action}: ${errorMsg}`, error instanceof Error ? error.stack : undefined)

    if (errorContains(error, "connection", "UNAVAILABLE")) {
      return new TemporalConnectionException("Temporal server is unavailable. Please try again later.")
    }

    return new WorkflowException(`Failed to ${action}: ${errorMsg}`)
  }
}
