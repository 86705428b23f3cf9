/**
 * Session Runner: one full pipeline pass for one subject.
 *
 * Opens a fresh conversation context, seeds the subject request for the
 * lookback window ending now, runs the coordinator and logs the outcome.
 * Not idempotent: every call starts a new context, and a re-run can repeat
 * side effects such as opening a second review case for the same subject.
 */

import { createSessionLogger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import type { ReasoningEngine, RunStatus } from '../lib/reasoning-engine.js';
import type { PipelineCoordinator, StageReport } from './coordinator.js';
import { ConversationContext } from './runtime/conversation.js';
import type { Message, StageName } from './runtime/agent-protocol.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface AnalysisWindow {
  start: string;
  end: string;
}

interface SessionOutcomeBase {
  subjectId: string;
  window: AnalysisWindow;
  contextId: string | null;
  stages: StageReport[];
}

export type SessionOutcome =
  | (SessionOutcomeBase & { status: 'completed'; finalMessage: Message | null })
  | (SessionOutcomeBase & { status: 'halted'; haltedAt: StageName; terminalStatus: RunStatus; detail?: string })
  | (SessionOutcomeBase & { status: 'errored'; error: string; erroredAt?: StageName });

/** ISO timestamp to the second, UTC, without zone suffix: YYYY-MM-DDTHH:MM:SS */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

export function computeWindow(now: Date, lookbackDays: number): AnalysisWindow {
  const start = new Date(now.getTime() - lookbackDays * DAY_MS);
  return { start: formatTimestamp(start), end: formatTimestamp(now) };
}

export function buildSubjectRequest(subjectId: string, window: AnalysisWindow): string {
  return `Please gather data for merchant '${subjectId}' from ${window.start} to ${window.end}.`;
}

export interface SessionRunnerDeps {
  engine: ReasoningEngine;
  coordinator: PipelineCoordinator;
  now?: () => Date;
}

export class SessionRunner {
  private readonly engine: ReasoningEngine;
  private readonly coordinator: PipelineCoordinator;
  private readonly now: () => Date;

  constructor(deps: SessionRunnerDeps) {
    this.engine = deps.engine;
    this.coordinator = deps.coordinator;
    this.now = deps.now ?? (() => new Date());
  }

  async runSession(subjectId: string, lookbackDays: number, signal?: AbortSignal): Promise<SessionOutcome> {
    const log = createSessionLogger(subjectId);
    const window = computeWindow(this.now(), lookbackDays);
    log.info({ window }, 'Starting analysis');

    let context: ConversationContext | null = null;
    try {
      context = await ConversationContext.open(this.engine, signal);
      const sessionLog = log.child({ context: context.id });
      await context.appendSubjectRequest(buildSubjectRequest(subjectId, window), signal);

      const outcome = await this.coordinator.run(context, { log: sessionLog, signal });

      if (outcome.status === 'errored') {
        sessionLog.error({ err: outcome.error, erroredAt: outcome.erroredAt }, 'Analysis failed');
        return {
          status: 'errored',
          subjectId,
          window,
          contextId: context.id,
          stages: outcome.stages,
          erroredAt: outcome.erroredAt,
          error: errorMessage(outcome.error),
        };
      }

      if (outcome.status === 'halted') {
        sessionLog.warn(
          { haltedAt: outcome.haltedAt, status: outcome.failure.status, detail: outcome.failure.detail },
          'Analysis halted',
        );
        return {
          status: 'halted',
          subjectId,
          window,
          contextId: context.id,
          stages: outcome.stages,
          haltedAt: outcome.haltedAt,
          terminalStatus: outcome.stages[outcome.stages.length - 1]?.status ?? 'failed',
          ...(outcome.failure.detail !== undefined ? { detail: outcome.failure.detail } : {}),
        };
      }

      sessionLog.info({ finalMessage: outcome.finalMessage?.text.slice(0, 500) }, 'Analysis complete');
      return {
        status: 'completed',
        subjectId,
        window,
        contextId: context.id,
        stages: outcome.stages,
        finalMessage: outcome.finalMessage,
      };
    } catch (err) {
      log.error({ err }, 'Analysis failed');
      return {
        status: 'errored',
        subjectId,
        window,
        contextId: context?.id ?? null,
        stages: [],
        error: errorMessage(err),
      };
    }
  }
}
