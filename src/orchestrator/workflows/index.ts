// Barrel exports only - every exported function is registered as a workflow type

export { contentPipelineWorkflow, getProgressQuery, getSourceSummaryQuery, cancelPipelineSignal, type ContentPipelineInput } from "./content-pipeline.workflow"
