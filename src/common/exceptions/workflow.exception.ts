import { HttpStatus } from "@nestjs/common"
import { PipelineException } from "./pipeline.exception"

/**
 * Exception for workflow-related errors
 */
export class WorkflowException extends PipelineException {
  constructor(message: string, status: HttpStatus = HttpStatus.BAD_REQUEST) {
    super(message, status, "WorkflowError")
  }
}

/**
 * Exception when a workflow is not found
 */
export class WorkflowNotFoundException extends PipelineException {
  constructor(workflowId: string) {
    super(`Workflow not found: ${workflowId}`, HttpStatus.NOT_FOUND, "WorkflowNotFound")
  }
}

/**
 * Exception when a signal or query reaches a workflow that already closed
 */
export class WorkflowClosedException extends PipelineException {
  constructor(workflowId: string, status: string) {
    super(`Workflow ${workflowId} is already closed (${status})`, HttpStatus.CONFLICT, "WorkflowClosed")
  }
}
