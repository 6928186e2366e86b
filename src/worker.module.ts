import { Module } from "@nestjs/common"
import { ConfigModule } from "@nestjs/config"
import { LoggerModule } from "nestjs-pino"
import { loadConfiguration } from "./config/configuration"
import { loggerParams } from "./config/logger.config"
import { PipelineWorkerModule } from "./orchestrator/worker/pipeline-worker.module"

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [() => ({ ...loadConfiguration() })],
      cache: true,
      isGlobal: true,
    }),
    LoggerModule.forRoot(loggerParams("ContentPipelineWorker")),
    PipelineWorkerModule,
  ],
})
export class WorkerModule {}
