import { HttpStatus } from "@nestjs/common"
import { PipelineException } from "./pipeline.exception"

/**
 * Exception for Temporal connection errors
 */
export class TemporalConnectionException extends PipelineException {
  constructor(message: string = "Failed to connect to Temporal server") {
    super(message, HttpStatus.SERVICE_UNAVAILABLE, "TemporalConnectionError")
  }
}
