import "reflect-metadata"
import { NestFactory } from "@nestjs/core"
import { PipelineModule } from "./pipeline.module"
import { ValidationPipe } from "@nestjs/common"
import { Logger } from "nestjs-pino"
import { ConfigService } from "@nestjs/config"
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger"
import { HttpExceptionFilter } from "./common/filters/http-exception.filter"
import { ValidationException } from "./common/exceptions"

async function bootstrap() {
  const app = await NestFactory.create(PipelineModule, { bufferLogs: true })

  app.useLogger(app.get(Logger))
  app.enableShutdownHooks()

  // Global exception filter for consistent error responses
  app.useGlobalFilters(new HttpExceptionFilter())

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      enableDebugMessages: true,
      forbidNonWhitelisted: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      exceptionFactory: (errors) => ValidationException.fromValidationErrors(errors),
    }),
  )

  // Swagger Configuration
  const config = new DocumentBuilder().setTitle("Content Pipeline API").setDescription("Submit and track transcript summarization and translation workflows running on Temporal").setVersion("1.0.0").addTag("pipelines", "Content pipeline endpoints").addTag("health", "Health check endpoints").build()

  const document = SwaggerModule.createDocument(app, config)
  SwaggerModule.setup("api", app, document)

  const configService = app.get(ConfigService)
  const port = configService.get<number>("PORT", 3001)

  await app.listen(port)

  const logger = app.get(Logger)
  logger.log(`🚀 Content pipeline service is running on port ${port}`)
  logger.log(`📚 Swagger documentation available at http://localhost:${port}/api`)
}

bootstrap().catch((error: unknown) => {
  console.error("Service failed to start:", error)
  process.exit(1)
})
