import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from "@nestjs/common"
import { Request, Response } from "express"

interface ErrorResponse {
  statusCode: number
  message: string | string[]
  error: string
  timestamp: string
  path: string
  method: string
  requestId?: string
}

type ErrorSummary = Pick<ErrorResponse, "statusCode" | "message" | "error">

const STATUS_NAMES: Partial<Record<number, string>> = {
  [HttpStatus.BAD_REQUEST]: "Bad Request",
  [HttpStatus.NOT_FOUND]: "Not Found",
  [HttpStatus.CONFLICT]: "Conflict",
  [HttpStatus.TOO_MANY_REQUESTS]: "Too Many Requests",
  [HttpStatus.INTERNAL_SERVER_ERROR]: "Internal Server Error",
  [HttpStatus.SERVICE_UNAVAILABLE]: "Service Unavailable",
}

function isMessage(value: unknown): value is string | string[] {
  return typeof value === "string" || (Array.isArray(value) && value.every((entry) => typeof entry === "string"))
}

/**
 * Formats every error leaving the HTTP layer as an ErrorResponse
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp()
    const request = http.getRequest<Request>()
    const summary = this.summarize(exception)

    const body: ErrorResponse = {
      ...summary,
      timestamp: new Date().toISOString(),
      path: request.url,
      method: request.method,
    }

    const requestId = request.headers["x-request-id"]
    if (typeof requestId === "string" && requestId) {
      body.requestId = requestId
    }

    const line = `${request.method} ${request.url} - ${summary.statusCode} - ${JSON.stringify(summary.message)}`
    if (summary.statusCode >= 500) {
      this.logger.error(line)
    } else {
      this.logger.warn(line)
    }

    http.getResponse<Response>().status(summary.statusCode).json(body)
  }

  private summarize(exception: unknown): ErrorSummary {
    if (exception instanceof HttpException) {
      return this.summarizeHttpException(exception)
    }

    if (exception instanceof Error) {
      this.logger.error(`Unexpected error: ${exception.message}`, exception.stack)
      return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, message: exception.message || "Internal server error", error: "InternalServerError" }
    }

    this.logger.error(`Unknown error type: ${JSON.stringify(exception)}`)
    return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, message: "An unexpected error occurred", error: "UnknownError" }
  }

  // Nest and PipelineException bodies carry message and error; plain string bodies carry neither
  private summarizeHttpException(exception: HttpException): ErrorSummary {
    const statusCode = exception.getStatus()
    const fallbackError = STATUS_NAMES[statusCode] ?? "Unknown Error"
    const response = exception.getResponse()

    if (typeof response === "string") {
      return { statusCode, message: response, error: fallbackError }
    }

    const message = "message" in response && isMessage(response.message) && response.message.length > 0 ? response.message : exception.message
    const error = "error" in response && typeof response.error === "string" && response.error ? response.error : fallbackError
    return { statusCode, message, error }
  }
}
