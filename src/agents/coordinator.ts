/**
 * Pipeline Coordinator
 *
 * Sequences the stage agents over one subject's conversation context:
 * Data Aggregation → Pattern Detection → Risk Assessment → Action Alerting.
 * Each stage's run must reach a terminal status before the next starts.
 * A terminal failure halts the pipeline; later stages (and their side
 * effects) never run. An engine call that throws outside a run ends the
 * pipeline as errored, keeping the reports of the stages that finished.
 *
 * No tool execution or LLM logic here.
 */

import type { Logger } from '../lib/logger.js';
import logger from '../lib/logger.js';
import { RunTerminalFailure } from '../lib/errors.js';
import type { ReasoningEngine, RunStatus } from '../lib/reasoning-engine.js';
import type { ToolExecutor } from '../tools/tool-executor.js';
import { driveRun } from './runtime/run-driver.js';
import type { ConversationContext } from './runtime/conversation.js';
import type { PollingPolicy } from './runtime/polling.js';
import type { Message, StageDefinition, StageName, ToolResult } from './runtime/agent-protocol.js';

// ─── Public types ─────────────────────────────────────────────────────

export interface StageReport {
  stage: StageName;
  runId: string;
  status: RunStatus;
  statusPath: RunStatus[];
  toolResults: ToolResult[];
  /** Message appended to the context by this stage, if any */
  output: Message | null;
  durationMs: number;
}

export type PipelineOutcome =
  | {
      status: 'completed';
      stages: StageReport[];
      finalMessage: Message | null;
    }
  | {
      status: 'halted';
      stages: StageReport[];
      haltedAt: StageName;
      failure: RunTerminalFailure;
    }
  | {
      status: 'errored';
      stages: StageReport[];
      erroredAt: StageName;
      error: unknown;
    };

export interface PipelineDeps {
  engine: ReasoningEngine;
  executor: ToolExecutor;
  stages: StageDefinition[];
  polling: PollingPolicy;
}

// ─── Coordinator ──────────────────────────────────────────────────────

export class PipelineCoordinator {
  private readonly engine: ReasoningEngine;
  private readonly executor: ToolExecutor;
  private readonly polling: PollingPolicy;
  readonly stages: readonly StageDefinition[];

  constructor(deps: PipelineDeps) {
    if (deps.stages.length === 0) {
      throw new Error('Pipeline needs at least one stage');
    }
    const names = new Set(deps.stages.map((s) => s.identity.name));
    if (names.size !== deps.stages.length) {
      throw new Error('Pipeline stages must be unique');
    }
    this.engine = deps.engine;
    this.executor = deps.executor;
    this.polling = deps.polling;
    this.stages = Object.freeze([...deps.stages].sort((a, b) => a.position - b.position));
  }

  /**
   * Run every stage in order against `context`. The first stage sees the
   * seeded request; later stages see only the accumulated context.
   */
  async run(
    context: ConversationContext,
    options: { log?: Logger; signal?: AbortSignal } = {},
  ): Promise<PipelineOutcome> {
    const log = options.log ?? logger;
    const reports: StageReport[] = [];
    let finalMessage: Message | null = null;

    for (const [index, stage] of this.stages.entries()) {
      const name = stage.identity.name;
      log.info({ stage: name, step: `${index + 1}/${this.stages.length}` }, `Running ${stage.identity.title}`);

      let result: { report: StageReport; detail?: string };
      try {
        result = await this.runStage(context, stage, log, options.signal);
      } catch (err) {
        log.error({ err, stage: name }, 'Pipeline errored');
        return { status: 'errored', stages: reports, erroredAt: name, error: err };
      }
      const { report, detail } = result;
      reports.push(report);

      if (report.status !== 'completed') {
        const failure = new RunTerminalFailure(
          `Stage ${name} run ${report.status}${detail ? `: ${detail}` : ''}`,
          name,
          report.status,
          detail,
        );
        log.error({ err: failure }, 'Pipeline halted');
        return { status: 'halted', stages: reports, haltedAt: name, failure };
      }

      if (report.output) {
        finalMessage = report.output;
        log.info({ stage: name, output: report.output.text.slice(0, 500) }, 'Stage output');
      }
    }

    return { status: 'completed', stages: reports, finalMessage };
  }

  private async runStage(
    context: ConversationContext,
    stage: StageDefinition,
    log: Logger,
    signal?: AbortSignal,
  ): Promise<{ report: StageReport; detail?: string }> {
    const name = stage.identity.name;
    const startedAt = this.polling.now();
    const release = context.acquire(name);
    try {
      const outcome = await driveRun({
        engine: this.engine,
        executor: this.executor,
        stage,
        contextId: context.id,
        polling: this.polling,
        signal,
        log,
      });

      const output = outcome.status === 'completed' && outcome.output
        ? context.recordAgentResponse(name, outcome.output)
        : null;

      const report: StageReport = {
        stage: name,
        runId: outcome.run.id,
        status: outcome.status,
        statusPath: outcome.statusPath,
        toolResults: outcome.toolResults,
        output,
        durationMs: this.polling.now() - startedAt,
      };
      return outcome.status === 'completed' ? { report } : { report, detail: outcome.detail };
    } finally {
      release();
    }
  }
}
