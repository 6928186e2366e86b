import { Module } from "@nestjs/common"
import { ConfigModule } from "@nestjs/config"
import { PipelineWorkerService } from "./pipeline-worker.service"

@Module({
  imports: [ConfigModule],
  providers: [PipelineWorkerService],
})
export class PipelineWorkerModule {}
