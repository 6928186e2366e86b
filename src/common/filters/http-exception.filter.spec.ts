import { ArgumentsHost, HttpException, HttpStatus } from "@nestjs/common"
import { HttpExceptionFilter } from "./http-exception.filter"
import { PipelineException, ValidationException, WorkflowNotFoundException } from "../exceptions"

describe("HttpExceptionFilter", () => {
  let filter: HttpExceptionFilter

  const mockJson = jest.fn()
  const mockStatus = jest.fn().mockReturnValue({ json: mockJson })
  const mockGetResponse = jest.fn().mockReturnValue({ status: mockStatus })
  const mockGetRequest = jest.fn()

  const mockArgumentsHost: ArgumentsHost = {
    getArgs: jest.fn(),
    getArgByIndex: jest.fn(),
    getType: jest.fn().mockReturnValue("http"),
    switchToRpc: jest.fn(),
    switchToWs: jest.fn(),
    switchToHttp: jest.fn().mockReturnValue({
      getResponse: mockGetResponse,
      getRequest: mockGetRequest,
      getNext: jest.fn(),
    }),
  }

  beforeEach(() => {
    filter = new HttpExceptionFilter()
    jest.clearAllMocks()
    mockGetRequest.mockReturnValue({
      url: "/pipelines",
      method: "GET",
      headers: {},
    })
    jest.useFakeTimers()
    jest.setSystemTime(new Date("2026-01-29T10:00:00.000Z"))
  })

  afterEach(() => {
    jest.useRealTimers()
  })

  describe("catch", () => {
    it("should handle HttpException with default format", () => {
      const exception = new HttpException("Test error", HttpStatus.BAD_REQUEST)

      filter.catch(exception, mockArgumentsHost)

      expect(mockStatus).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST)
      expect(mockJson).toHaveBeenCalledWith({
        statusCode: HttpStatus.BAD_REQUEST,
        message: "Test error",
        error: "Bad Request",
        path: "/pipelines",
        method: "GET",
        timestamp: "2026-01-29T10:00:00.000Z",
      })
    })

    it("should keep the message list produced by the validation pipe", () => {
      const exception = new HttpException(
        {
          statusCode: HttpStatus.BAD_REQUEST,
          message: ["items.0.itemId should not be empty"],
          error: "Bad Request",
        },
        HttpStatus.BAD_REQUEST,
      )

      filter.catch(exception, mockArgumentsHost)

      expect(mockJson).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.BAD_REQUEST,
          message: ["items.0.itemId should not be empty"],
          error: "Bad Request",
        }),
      )
    })

    it("should report request validation failures with their message list", () => {
      filter.catch(new ValidationException(["items.1.itemId: itemId is required"]), mockArgumentsHost)

      expect(mockStatus).toHaveBeenCalledWith(HttpStatus.BAD_REQUEST)
      expect(mockJson).toHaveBeenCalledWith({
        statusCode: HttpStatus.BAD_REQUEST,
        message: ["items.1.itemId: itemId is required"],
        error: "ValidationError",
        path: "/pipelines",
        method: "GET",
        timestamp: "2026-01-29T10:00:00.000Z",
      })
    })

    it("should handle PipelineException", () => {
      const exception = new PipelineException("Custom pipeline error", HttpStatus.BAD_GATEWAY, "CustomError")

      filter.catch(exception, mockArgumentsHost)

      expect(mockStatus).toHaveBeenCalledWith(HttpStatus.BAD_GATEWAY)
      expect(mockJson).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.BAD_GATEWAY,
          message: "Custom pipeline error",
          error: "CustomError",
        }),
      )
    })

    it("should handle WorkflowNotFoundException", () => {
      const exception = new WorkflowNotFoundException("workflow-123")

      filter.catch(exception, mockArgumentsHost)

      expect(mockStatus).toHaveBeenCalledWith(HttpStatus.NOT_FOUND)
      expect(mockJson).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.NOT_FOUND,
          message: "Workflow not found: workflow-123",
          error: "WorkflowNotFound",
        }),
      )
    })

    it("should handle generic Error (non-HttpException)", () => {
      filter.catch(new Error("Generic error"), mockArgumentsHost)

      expect(mockStatus).toHaveBeenCalledWith(HttpStatus.INTERNAL_SERVER_ERROR)
      expect(mockJson).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: "Generic error",
          error: "InternalServerError",
        }),
      )
    })

    it("should handle values that are not errors", () => {
      filter.catch("boom", mockArgumentsHost)

      expect(mockJson).toHaveBeenCalledWith(
        expect.objectContaining({
          statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
          message: "An unexpected error occurred",
          error: "UnknownError",
        }),
      )
    })

    it("should include requestId if present in headers", () => {
      mockGetRequest.mockReturnValue({
        url: "/pipelines",
        method: "POST",
        headers: { "x-request-id": "req-12345" },
      })

      filter.catch(new HttpException("Test", HttpStatus.OK), mockArgumentsHost)

      expect(mockJson).toHaveBeenCalledWith(
        expect.objectContaining({
          method: "POST",
          requestId: "req-12345",
        }),
      )
    })
  })
})
