import { Controller, Get, Post, Body, Param, HttpCode, HttpStatus } from "@nestjs/common"
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from "@nestjs/swagger"
import { PipelineService } from "./pipeline.service"
import { SubmitPipelineDto, StartPipelineResponseDto, PipelineStatusDto, PipelineProgressDto, CancelPipelineResponseDto, ErrorResponseDto } from "./dto"

const WORKFLOW_ID_EXAMPLE = "content-pipeline-demo-001-es-4b3f0c9e-2a8d-4e7b-9a61-0d6c1f5e2b77"

@Controller()
export class PipelineController {
  constructor(private readonly pipelineService: PipelineService) {}

  @Get("health")
  @ApiTags("health")
  @ApiOperation({ summary: "Health check", description: "Check if the service is running" })
  @ApiResponse({ status: 200, description: "Service is healthy" })
  healthCheck() {
    return this.pipelineService.getHealthStatus()
  }

  @Get()
  @ApiTags("health")
  @ApiOperation({ summary: "Service info", description: "Get service information and version" })
  @ApiResponse({ status: 200, description: "Service information" })
  getInfo() {
    return this.pipelineService.getServiceInfo()
  }

  @Post("pipelines")
  @ApiTags("pipelines")
  @ApiOperation({
    summary: "Start content pipelines",
    description: "Start one workflow per (item, target language). Each workflow extracts the transcript, summarizes it and translates transcript and summary in parallel.",
  })
  @ApiResponse({ status: 201, description: "Workflows started successfully", type: [StartPipelineResponseDto] })
  @ApiResponse({ status: 400, description: "Invalid request body", type: ErrorResponseDto })
  @ApiResponse({ status: 503, description: "Temporal server unavailable", type: ErrorResponseDto })
  async startPipelines(@Body() dto: SubmitPipelineDto) {
    return this.pipelineService.startPipelines(dto)
  }

  @Get("pipelines/:workflowId")
  @ApiTags("pipelines")
  @ApiOperation({
    summary: "Get workflow status",
    description: "Get the execution status of a pipeline and, once it has closed, its terminal outcome",
  })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 200, description: "Workflow status retrieved", type: PipelineStatusDto })
  @ApiResponse({ status: 404, description: "Workflow not found", type: ErrorResponseDto })
  async getPipelineStatus(@Param("workflowId") workflowId: string) {
    return this.pipelineService.getPipelineStatus(workflowId)
  }

  @Get("pipelines/:workflowId/progress")
  @ApiTags("pipelines")
  @ApiOperation({ summary: "Get workflow progress", description: "Query the current stage of a pipeline" })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 200, description: "Workflow progress", type: PipelineProgressDto })
  @ApiResponse({ status: 404, description: "Workflow not found", type: ErrorResponseDto })
  async getPipelineProgress(@Param("workflowId") workflowId: string) {
    return this.pipelineService.getPipelineProgress(workflowId)
  }

  @Get("pipelines/:workflowId/source-summary")
  @ApiTags("pipelines")
  @ApiOperation({ summary: "Get source summary", description: "Source-language summary, available once summarization finished, also when the translations failed" })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 200, description: "Source summary, or null before summarization" })
  @ApiResponse({ status: 404, description: "Workflow not found", type: ErrorResponseDto })
  async getSourceSummary(@Param("workflowId") workflowId: string) {
    return this.pipelineService.getSourceSummary(workflowId)
  }

  @Post("pipelines/:workflowId/cancel")
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiTags("pipelines")
  @ApiOperation({ summary: "Cancel a pipeline", description: "Outstanding activities settle, then the workflow ends cancelled without scheduling further work" })
  @ApiParam({ name: "workflowId", description: "Unique workflow identifier", example: WORKFLOW_ID_EXAMPLE })
  @ApiResponse({ status: 202, description: "Cancellation requested", type: CancelPipelineResponseDto })
  @ApiResponse({ status: 404, description: "Workflow not found", type: ErrorResponseDto })
  @ApiResponse({ status: 409, description: "Workflow already closed", type: ErrorResponseDto })
  async cancelPipeline(@Param("workflowId") workflowId: string) {
    return this.pipelineService.cancelPipeline(workflowId)
  }
}
