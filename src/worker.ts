import "reflect-metadata"
import { NestFactory } from "@nestjs/core"
import { Logger } from "nestjs-pino"
import { WorkerModule } from "./worker.module"

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(WorkerModule, { bufferLogs: true })

  app.useLogger(app.get(Logger))
  app.enableShutdownHooks()

  await app.init()

  app.get(Logger).log("🚀 Content pipeline worker is polling for tasks")
}

bootstrap().catch((error: unknown) => {
  console.error("Worker failed to start:", error)
  process.exit(1)
})
