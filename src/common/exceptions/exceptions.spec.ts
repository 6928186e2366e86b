import { HttpStatus } from "@nestjs/common"
import { plainToInstance } from "class-transformer"
import { validate } from "class-validator"
import { SubmitPipelineDto } from "../../dto"
import { PipelineException, WorkflowException, WorkflowNotFoundException, WorkflowClosedException, TemporalConnectionException, ValidationException } from "./index"

describe("Pipeline exceptions", () => {
  it.each([
    { name: "PipelineException", exception: new PipelineException("Unexpected state"), status: HttpStatus.INTERNAL_SERVER_ERROR, message: "Unexpected state", error: "PipelineError" },
    { name: "WorkflowException", exception: new WorkflowException("Failed to start pipelines: boom"), status: HttpStatus.BAD_REQUEST, message: "Failed to start pipelines: boom", error: "WorkflowError" },
    { name: "WorkflowNotFoundException", exception: new WorkflowNotFoundException("content-pipeline-demo-001-es-1"), status: HttpStatus.NOT_FOUND, message: "Workflow not found: content-pipeline-demo-001-es-1", error: "WorkflowNotFound" },
    { name: "WorkflowClosedException", exception: new WorkflowClosedException("wf-1", "COMPLETED"), status: HttpStatus.CONFLICT, message: "Workflow wf-1 is already closed (COMPLETED)", error: "WorkflowClosed" },
    { name: "TemporalConnectionException", exception: new TemporalConnectionException(), status: HttpStatus.SERVICE_UNAVAILABLE, message: "Failed to connect to Temporal server", error: "TemporalConnectionError" },
  ])("$name should carry its status, message and error code", ({ exception, status, message, error }) => {
    expect(exception.getStatus()).toBe(status)
    expect(exception.getResponse()).toEqual({ statusCode: status, message, error, timestamp: expect.any(String) })
  })

  it("should let a workflow failure use another status", () => {
    expect(new WorkflowException("Busy", HttpStatus.CONFLICT).getStatus()).toBe(HttpStatus.CONFLICT)
  })

  it("should keep the error code on the exception", () => {
    expect(new PipelineException("Upstream failed", HttpStatus.BAD_GATEWAY, "UpstreamError").code).toBe("UpstreamError")
  })

  describe("ValidationException", () => {
    it("should list every failed constraint with its property path", async () => {
      const dto = plainToInstance(SubmitPipelineDto, { items: [{ itemId: "demo-001", targetLanguage: "es" }, { itemId: "", targetLanguage: "ja" }] })

      const exception = ValidationException.fromValidationErrors(await validate(dto))

      expect(exception.getStatus()).toBe(HttpStatus.BAD_REQUEST)
      expect(exception.getResponse()).toMatchObject({ message: ["items.1.itemId: itemId is required"], error: "ValidationError" })
    })

    it("should report an empty batch", async () => {
      const exception = ValidationException.fromValidationErrors(await validate(plainToInstance(SubmitPipelineDto, { items: [] })))

      expect(exception.getResponse()).toMatchObject({ message: ["items: items must contain at least one work item"] })
    })
  })
})
