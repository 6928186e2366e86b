import { Injectable, OnApplicationBootstrap, OnModuleDestroy, Logger } from "@nestjs/common"
import { ConfigService } from "@nestjs/config"
import { NativeConnection, Worker, bundleWorkflowCode } from "@temporalio/worker"
import * as path from "path"
import { contentBackendSettings, type PipelineConfig } from "../../config/configuration"
import { createContentBackend, createPipelineActivities } from "../activities"

/**
 * Hosts the pipeline workflow and its four activities on the task queue.
 * Never starts workflows.
 */
@Injectable()
export class PipelineWorkerService implements OnApplicationBootstrap, OnModuleDestroy {
  private worker: Worker | null = null
  private connection: NativeConnection | null = null
  private running: Promise<void> | null = null

  protected logger = new Logger(PipelineWorkerService.name)

  constructor(private readonly configService: ConfigService<PipelineConfig, true>) {}

  async onApplicationBootstrap() {
    const address = this.configService.get("TEMPORAL_SERVER_ADDRESS", { infer: true })
    const namespace = this.configService.get("TEMPORAL_NAMESPACE", { infer: true })
    const taskQueue = this.configService.get("TEMPORAL_TASK_QUEUE", { infer: true })

    const backend = createContentBackend(
      contentBackendSettings({
        CONTENT_BACKEND: this.configService.get("CONTENT_BACKEND", { infer: true }),
        OPENAI_API_KEY: this.configService.get("OPENAI_API_KEY", { infer: true }),
        OPENAI_MODEL: this.configService.get("OPENAI_MODEL", { infer: true }),
      }),
    )
    const supportedLanguages = this.configService.get("SUPPORTED_LANGUAGES", { infer: true })

    this.logger.log(`Connecting worker to Temporal at ${address}...`)
    this.connection = await NativeConnection.connect({ address })

    const workflowsPath = path.resolve(__dirname, "../workflows")
    this.logger.log(`Bundling workflows from: ${workflowsPath}`)
    const workflowBundle = await bundleWorkflowCode({ workflowsPath })
    this.logger.log(`✅ Workflow bundle created`)

    this.worker = await Worker.create({
      connection: this.connection,
      namespace,
      taskQueue,
      workflowBundle,
      activities: createPipelineActivities({ backend, supportedLanguages }),
    })

    this.logger.log(`✅ Temporal worker started for task queue: ${taskQueue} (backend: ${backend.name}, languages: ${supportedLanguages.join(", ")})`)

    this.running = this.worker.run().catch((error: unknown) => {
      this.logger.error(`❌ Worker error: ${error instanceof Error ? error.message : String(error)}`)
      // A worker that stopped polling leaves the process useless; let the shutdown hooks close it
      process.exitCode = 1
      process.kill(process.pid, "SIGTERM")
    })
  }

  async onModuleDestroy() {
    if (this.worker) {
      this.worker.shutdown()
      // run() resolves once in-flight activities have settled
      await this.running
      this.worker = null
      this.running = null
      this.logger.log("Temporal worker shut down.")
    }

    if (this.connection) {
      await this.connection.close()
      this.connection = null
    }
  }
}
