import { HttpException, HttpStatus } from "@nestjs/common"

/**
 * Base exception for the content pipeline service
 */
export class PipelineException extends HttpException {
  constructor(
    message: string | string[],
    status: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    public readonly code?: string,
  ) {
    super(
      {
        statusCode: status,
        message,
        error: code || "PipelineError",
        timestamp: new Date().toISOString(),
      },
      status,
    )
  }
}
