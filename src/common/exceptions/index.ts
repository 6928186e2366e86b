// Barrel exports only - no class/interface/type definitions allowed in index.ts

export { PipelineException } from "./pipeline.exception"
export { WorkflowException, WorkflowNotFoundException, WorkflowClosedException } from "./workflow.exception"
export { TemporalConnectionException } from "./temporal.exception"
export { ValidationException } from "./validation.exception"
