import { IsString, IsOptional, IsNotEmpty, IsIn, IsArray, ArrayMinSize, ValidateNested } from "class-validator"
import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger"
import { Type } from "class-transformer"
import { KNOWN_LANGUAGES, SOURCE_LANGUAGE } from "../orchestrator/constants"

/**
 * One (item, target language) pair; each pair becomes its own workflow execution
 */
export class PipelineItemDto {
  @ApiProperty({
    description: "Identifier of the content item whose transcript is processed",
    example: "demo-001",
  })
  @IsString()
  @IsNotEmpty({ message: "itemId is required" })
  itemId!: string

  @ApiPropertyOptional({
    description: "Language of the source transcript",
    example: SOURCE_LANGUAGE,
    default: SOURCE_LANGUAGE,
  })
  @IsIn([SOURCE_LANGUAGE])
  @IsOptional()
  sourceLanguage?: string

  // Only the shape is checked here; the translation activities enforce the supported set
  @ApiProperty({
    description: "Target language for the translated transcript and summary",
    example: "es",
    enum: KNOWN_LANGUAGES,
  })
  @IsString()
  @IsNotEmpty({ message: "targetLanguage is required" })
  targetLanguage!: string
}

/**
 * DTO for submitting a batch of pipelines
 */
export class SubmitPipelineDto {
  @ApiProperty({ description: "Work items to process", type: [PipelineItemDto] })
  @IsArray()
  @ArrayMinSize(1, { message: "items must contain at least one work item" })
  @ValidateNested({ each: true })
  @Type(() => PipelineItemDto)
  items!: PipelineItemDto[]
}

/**
 * Response DTO for one started workflow
 */
export class StartPipelineResponseDto {
  @ApiProperty({ description: "Unique workflow identifier", example: "content-pipeline-demo-001-es-4b3f0c9e-2a8d-4e7b-9a61-0d6c1f5e2b77" })
  workflowId!: string

  @ApiProperty({ description: "Item identifier", example: "demo-001" })
  itemId!: string

  @ApiProperty({ description: "Target language", example: "es" })
  targetLanguage!: string

  @ApiProperty({ description: "Initial workflow status", example: "started", enum: ["started"] })
  status!: "started"
}

/**
 * Response DTO for workflow progress
 */
export class PipelineProgressDto {
  @ApiProperty({ description: "Current step", example: 2 })
  currentStep!: number

  @ApiProperty({ description: "Total number of steps", example: 3 })
  totalSteps!: number

  @ApiProperty({ description: "Name of the current step", example: "Summarizing transcript" })
  stepName!: string

  @ApiProperty({ description: "Completion percentage", example: 40 })
  percentComplete!: number

  @ApiProperty({ description: "Progress status", example: "running", enum: ["running", "completed", "failed", "cancelled"] })
  status!: "running" | "completed" | "failed" | "cancelled"

  @ApiPropertyOptional({ description: "Failure message", example: "TranslationFailed at Translating: Unsupported language 'fr'. Supported: es, ja, pt." })
  error?: string
}

/**
 * Response DTO for workflow status
 */
export class PipelineStatusDto {
  @ApiProperty({ description: "Unique workflow identifier", example: "content-pipeline-demo-001-es-4b3f0c9e-2a8d-4e7b-9a61-0d6c1f5e2b77" })
  workflowId!: string

  @ApiProperty({ description: "Temporal execution status", example: "RUNNING", enum: ["RUNNING", "COMPLETED", "FAILED", "CANCELLED", "TERMINATED", "CONTINUED_AS_NEW", "TIMED_OUT", "UNKNOWN"] })
  status!: string

  @ApiPropertyOptional({
    description: "Terminal outcome once the execution has closed: completed with the full result, failed with one PipelineFailure, cancelled, or error",
    type: "object",
    additionalProperties: true,
  })
  outcome?: Record<string, unknown>
}

/**
 * Response DTO for a cancellation request
 */
export class CancelPipelineResponseDto {
  @ApiProperty({ description: "Unique workflow identifier" })
  workflowId!: string

  @ApiProperty({ description: "Cancellation status", example: "cancel-requested", enum: ["cancel-requested"] })
  status!: "cancel-requested"
}

/**
 * Error response DTO
 */
export class ErrorResponseDto {
  @ApiProperty({ description: "HTTP status code", example: 400 })
  statusCode!: number

  @ApiProperty({ description: "Error message", example: "itemId is required" })
  message!: string

  @ApiPropertyOptional({ description: "Error type", example: "Bad Request" })
  error?: string

  @ApiProperty({ description: "Timestamp of the error", example: "2026-01-29T08:00:00.000Z" })
  timestamp!: string
}
