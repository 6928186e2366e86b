import type { Summary, Transcript, TranslatedSummary, TranslatedTranscript, WorkItem } from "../activities/types"
import type { CallOutcome } from "../dispatch/failures"
import { initialState, isTerminal, nextCommand, transition, type PipelineCommand, type PipelineEvent, type PipelineState, type TerminalState } from "./pipeline.machine"

/**
 * One logical call per activity. Retries and timeouts happen behind the port;
 * a call resolves with the value or with its terminal failure and never rejects.
 */
export interface PipelineActivityPort {
  extractTranscript(item: WorkItem): Promise<CallOutcome<Transcript>>
  summarizeTranscript(transcript: Transcript): Promise<CallOutcome<Summary>>
  translateTranscript(transcript: Transcript, targetLanguage: string): Promise<CallOutcome<TranslatedTranscript>>
  translateSummary(summary: Summary, targetLanguage: string): Promise<CallOutcome<TranslatedSummary>>
}

export interface RunPipelineOptions {
  // Events recorded by an earlier run of the same execution
  history?: readonly PipelineEvent[]
  // Persist a new event; awaited before the event is applied
  record?: (event: PipelineEvent) => void | Promise<void>
  onTransition?: (state: PipelineState, event: PipelineEvent) => void
  // Checked before each new command, and again once outstanding calls have settled
  isCancelled?: () => boolean
  log?: (message: string) => void
}

async function execute(command: PipelineCommand, port: PipelineActivityPort): Promise<PipelineEvent> {
  switch (command.type) {
    case "ExtractTranscript":
      return { type: "Extracted", outcome: await port.extractTranscript(command.item) }
    case "SummarizeTranscript":
      return { type: "Summarized", outcome: await port.summarizeTranscript(command.transcript) }
    case "TranslateBoth": {
      // Fan out, then join on both branches
      const [transcript, summary] = await Promise.all([port.translateTranscript(command.transcript, command.targetLanguage), port.translateSummary(command.summary, command.targetLanguage)])
      return { type: "Translated", transcript, summary }
    }
  }
}

/**
 * Drive one workflow execution to a terminal state.
 *
 * Recorded history is folded first without touching the port, so activities
 * whose results are already known are never invoked again.
 */
export async function runPipeline(item: WorkItem, port: PipelineActivityPort, options: RunPipelineOptions = {}): Promise<TerminalState> {
  const log = options.log ?? (() => undefined)
  let state = initialState(item)

  const apply = (event: PipelineEvent) => {
    state = transition(state, event)
    options.onTransition?.(state, event)
  }

  const history = options.history ?? []
  for (const event of history) {
    apply(event)
  }
  if (history.length > 0) {
    log(`Replayed ${history.length} event(s) for ${item.itemId}, resuming at ${state.status}`)
  }

  const commit = async (event: PipelineEvent) => {
    await options.record?.(event)
    apply(event)
  }

  if (state.status === "Pending") {
    log(`Starting pipeline for ${item.itemId}: ${item.sourceLanguage} → ${item.targetLanguage}`)
    await commit({ type: "Started" })
  }

  while (!isTerminal(state)) {
    if (options.isCancelled?.()) {
      log(`Cancellation requested for ${item.itemId} during ${state.status}`)
      await commit({ type: "CancelRequested" })
      break
    }

    const command = nextCommand(state)
    if (!command) {
      break
    }

    log(`${item.itemId}: ${state.status} → ${command.type}`)
    const event = await execute(command, port)

    // A cancel that arrived while the calls were outstanding wins over the stage's terminal outcome
    if (options.isCancelled?.() && isTerminal(transition(state, event))) {
      log(`Cancellation requested for ${item.itemId} while ${state.status}; discarding the settled ${event.type} outcome`)
      await commit({ type: "CancelRequested" })
      break
    }

    await commit(event)
  }

  if (!isTerminal(state)) {
    throw new Error(`Pipeline for ${item.itemId} stopped in non-terminal state ${state.status}`)
  }

  log(`Pipeline for ${item.itemId} finished as ${state.status}`)
  return state
}
