import { Module } from "@nestjs/common"
import { ConfigModule } from "@nestjs/config"
import { LoggerModule } from "nestjs-pino"
import { PipelineController } from "./pipeline.controller"
import { PipelineService } from "./pipeline.service"
import { TemporalClientModule } from "./orchestrator/clients/temporal-client.module"
import { loadConfiguration } from "./config/configuration"
import { loggerParams } from "./config/logger.config"

@Module({
  imports: [
    ConfigModule.forRoot({
      load: [() => ({ ...loadConfiguration() })],
      cache: true,
      isGlobal: true,
    }),
    LoggerModule.forRoot(loggerParams("ContentPipeline")),
    TemporalClientModule,
  ],
  controllers: [PipelineController],
  providers: [PipelineService],
})
export class PipelineModule {}
