#!/usr/bin/env ts-node

/**
 * Content Pipeline CLI
 *
 * Submits one workflow per (item, target language), waits for every one of
 * them and prints a per-item report.
 *
 * Usage:
 *   npm run submit -- --items demo-001,onboarding-101 --targets es,ja
 *   npm run submit -- --items demo-001 --targets pt --local
 */

import "reflect-metadata"
import { Command } from "commander"
import * as chalk from "chalk"
import * as cliProgress from "cli-progress"
import { Logger } from "@nestjs/common"
import { Connection, WorkflowClient } from "@temporalio/client"
import { activityPoliciesFromConfig, contentBackendSettings, loadConfiguration, type PipelineConfig } from "../src/config/configuration"
import { createContentBackend, createPipelineActivities } from "../src/orchestrator/activities"
import type { WorkItem } from "../src/orchestrator/activities/types"
import { PipelineClient } from "../src/orchestrator/clients/pipeline-client"
import type { BatchEntry, BatchReport } from "../src/orchestrator/clients/pipeline-outcome"
import { createWorkflowGateway } from "../src/orchestrator/clients/workflow-gateway"
import { SOURCE_LANGUAGE } from "../src/orchestrator/constants"
import { FileHistoryStore, InMemoryHistoryStore } from "../src/orchestrator/local/history-store"
import { LocalPipelineEngine } from "../src/orchestrator/local/local-pipeline.engine"

interface SubmitOptions {
  items: string
  targets: string
  source: string
  local?: boolean
  backend?: string
  json?: boolean
}

type Runner = (items: WorkItem[], onSettled: (entry: BatchEntry) => void) => Promise<BatchReport>

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
}

/**
 * Every (item, target language) pair becomes its own work item
 */
function buildWorkItems(options: SubmitOptions): WorkItem[] {
  const itemIds = splitList(options.items)
  const targets = splitList(options.targets)
  return itemIds.flatMap((itemId) => targets.map((targetLanguage) => ({ itemId, sourceLanguage: options.source, targetLanguage })))
}

/**
 * Submit to the workers behind the Temporal task queue
 */
async function createTemporalRunner(config: PipelineConfig): Promise<{ run: Runner; close: () => Promise<void> }> {
  console.log(chalk.gray(`Connecting to Temporal at ${config.TEMPORAL_SERVER_ADDRESS}...`))

  const connection = await Connection.connect({
    address: config.TEMPORAL_SERVER_ADDRESS,
    tls: false,
  })

  const client = new PipelineClient(createWorkflowGateway(new WorkflowClient({ connection, namespace: config.TEMPORAL_NAMESPACE })), {
    taskQueue: config.TEMPORAL_TASK_QUEUE,
    workflowExecutionTimeoutMs: config.WORKFLOW_EXECUTION_TIMEOUT_MS,
    policies: activityPoliciesFromConfig(config),
  })

  return {
    run: (items, onSettled) => client.executeBatch(items, onSettled),
    close: () => connection.close(),
  }
}

/**
 * Run workflows and activity workers inside this process
 */
function createLocalRunner(config: PipelineConfig): { run: Runner; close: () => Promise<void> } {
  const activities = createPipelineActivities({
    backend: createContentBackend(contentBackendSettings(config)),
    supportedLanguages: config.SUPPORTED_LANGUAGES,
  })

  const engine = new LocalPipelineEngine({
    activities,
    policies: activityPoliciesFromConfig(config),
    taskQueue: config.TEMPORAL_TASK_QUEUE,
    workers: config.LOCAL_WORKERS,
    history: config.HISTORY_DIR ? new FileHistoryStore(config.HISTORY_DIR) : new InMemoryHistoryStore(),
  })
  engine.start()

  console.log(chalk.gray(`Running locally with ${config.LOCAL_WORKERS} worker(s), backend ${config.CONTENT_BACKEND}`))

  return {
    run: (items, onSettled) => engine.executeBatch(items, onSettled),
    close: () => engine.shutdown(),
  }
}

function describeEntry(entry: BatchEntry): string {
  const label = `${entry.item.itemId} → ${entry.item.targetLanguage}`

  switch (entry.outcome.status) {
    case "completed": {
      const headings = entry.outcome.result.translatedSummary.sections.map((section) => section.heading).join(" / ")
      return `${chalk.green("✔")} ${label} ${chalk.gray(`[${headings}]`)}`
    }
    case "failed":
      return `${chalk.red("✖")} ${label} ${chalk.red(entry.outcome.failure.message)}`
    case "cancelled":
      return `${chalk.yellow("■")} ${label} ${chalk.yellow(`cancelled${entry.outcome.stage ? ` during ${entry.outcome.stage}` : ""}`)}`
    case "error":
      return `${chalk.red("!")} ${label} ${chalk.red(entry.outcome.message)}`
  }
}

function printReport(report: BatchReport): void {
  console.log(chalk.bold("\nResults:"))
  console.log(chalk.gray("─".repeat(50)))
  for (const entry of report.entries) {
    console.log(describeEntry(entry))
    console.log(chalk.gray(`    ${entry.workflowId}`))
  }
  console.log(chalk.gray("─".repeat(50)))
  console.log(chalk.white(`Total: ${report.total}  ${chalk.green(`completed: ${report.completed}`)}  ${chalk.red(`failed: ${report.failed}`)}  ${chalk.yellow(`cancelled: ${report.cancelled}`)}  ${chalk.red(`errors: ${report.errored}`)}`))
}

// ==========================================
// Main Program
// ==========================================

const program = new Command()

program.name("content-pipeline").description("Content Pipeline CLI - summarize and translate transcripts with one workflow per item and language").version("1.0.0")

program
  .requiredOption("-i, --items <ids>", "Comma-separated item IDs (e.g. demo-001,onboarding-101)")
  .option("-t, --targets <languages>", "Comma-separated target languages", "es,ja,pt")
  .option("-s, --source <language>", "Source language of the transcripts", SOURCE_LANGUAGE)
  .option("--local", "Run workflows and workers in this process instead of on Temporal")
  .option("--backend <name>", "Activity backend for --local runs (mock or openai)")
  .option("--json", "Print the batch report as JSON")
  .action(async (options: SubmitOptions) => {
    // Keep framework logs out of the progress bar
    Logger.overrideLogger(["error", "warn"])

    let close: (() => Promise<void>) | undefined

    try {
      const config = loadConfiguration(options.backend ? { ...process.env, CONTENT_BACKEND: options.backend } : process.env)
      const items = buildWorkItems(options)

      if (items.length === 0) {
        console.log(chalk.red("Error: --items and --targets must name at least one value"))
        program.help()
      }

      console.log(chalk.bold.cyan("\n📝 Content Pipeline CLI\n"))
      console.log(chalk.white(`Submitting ${chalk.cyan(String(items.length))} workflow(s)`))

      const runner = options.local ? createLocalRunner(config) : await createTemporalRunner(config)
      close = runner.close

      const progressBar = new cliProgress.SingleBar(
        {
          format: `${chalk.cyan("{bar}")} ${chalk.yellow("{value}/{total}")} settled | ${chalk.white("{last}")}`,
          hideCursor: true,
        },
        cliProgress.Presets.shades_classic,
      )
      progressBar.start(items.length, 0, { last: "waiting..." })

      const report = await runner.run(items, (entry) => {
        progressBar.increment(1, { last: `${entry.item.itemId} → ${entry.item.targetLanguage}: ${entry.outcome.status}` })
      })
      progressBar.stop()

      if (options.json) {
        console.log(JSON.stringify(report, null, 2))
      } else {
        printReport(report)
      }

      process.exitCode = report.completed === report.total ? 0 : 1
    } catch (error) {
      console.log(chalk.red(`\n❌ Error: ${error instanceof Error ? error.message : String(error)}`))
      process.exitCode = 1
    } finally {
      await close?.()
    }
  })

program.parseAsync().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
