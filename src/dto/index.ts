// Barrel exports only - no class/interface/type definitions allowed in index.ts

export { PipelineItemDto, SubmitPipelineDto, StartPipelineResponseDto, PipelineProgressDto, PipelineStatusDto, CancelPipelineResponseDto, ErrorResponseDto } from "./pipeline.dto"
