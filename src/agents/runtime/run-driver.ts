/**
 * Run Driver: drives one engine run to a terminal status.
 *
 * Loop:
 *   1. Create the run for the stage's agent
 *   2. Poll; on queued/in_progress wait the backoff interval and poll again
 *   3. On requires_tool_output execute every pending call not yet answered,
 *      then submit those outputs in one call
 *   4. On completed read the newest message; on failed/cancelled/expired
 *      return the failure descriptor
 *
 * Poll errors are retried after the longer error delay. The whole wait,
 * each status check included, is bounded by the policy's maxWaitMs; past it
 * the run is cancelled.
 */

import type { Logger } from '../../lib/logger.js';
import logger from '../../lib/logger.js';
import { createCombinedAbortSignal, DeadlineExceededError, raceAbort } from '../../lib/abort.js';
import { TransientPollError, errorMessage } from '../../lib/errors.js';
import { isTerminalFailure } from '../../lib/reasoning-engine.js';
import type {
  ReasoningEngine,
  RunHandle,
  RunSnapshot,
  RunStatus,
  ToolOutput,
} from '../../lib/reasoning-engine.js';
import { serializeOutcome, toolFailure } from '../../tools/tool-executor.js';
import type { ToolCallOutcome, ToolExecutor } from '../../tools/tool-executor.js';
import { isToolName } from '../../tools/tool-schemas.js';
import type { PollingPolicy } from './polling.js';
import type {
  RunFailed,
  RunOutcome,
  StageDefinition,
  ToolCallRequest,
  ToolResult,
} from './agent-protocol.js';

// ─── Public API ──────────────────────────────────────────────────────

export interface DriveRunParams {
  engine: ReasoningEngine;
  executor: ToolExecutor;
  stage: StageDefinition;
  contextId: string;
  polling: PollingPolicy;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Create a run for `stage` against the context and drive it to a terminal
 * status. Only run creation and the final message read can reject; every
 * other failure is folded into the returned outcome.
 */
export async function driveRun(params: DriveRunParams): Promise<RunOutcome> {
  const { engine, stage, contextId, polling, signal } = params;
  const log = (params.log ?? logger).child({ stage: stage.identity.name });

  const run = await engine.createRun(contextId, stage.agentId, undefined, signal);
  const runLog = log.child({ run: run.id });
  runLog.info({ agent: stage.agentId }, 'Run submitted');

  const statusPath: RunStatus[] = ['submitted'];
  const toolResults: ToolResult[] = [];
  // Results are cached by token so a resubmission never re-executes a tool.
  const resultsByToken = new Map<string, ToolResult>();
  const submittedTokens = new Set<string>();

  const deadline = polling.now() + polling.maxWaitMs;
  let attempt = 0;

  const record = (status: RunStatus) => {
    if (statusPath[statusPath.length - 1] !== status) {
      statusPath.push(status);
      attempt = 0;
      runLog.debug({ status }, 'Run status changed');
    }
  };

  const fail = (status: RunFailed['status'], detail?: string): RunFailed => {
    record(status);
    return { status, run, statusPath, toolResults, ...(detail !== undefined ? { detail } : {}) };
  };

  const exceedMaxWait = async (): Promise<RunFailed> => {
    runLog.warn({ maxWaitMs: polling.maxWaitMs }, 'Run exceeded maximum wait; cancelling');
    await cancelQuietly(engine, run, runLog);
    return fail('cancelled', `Run exceeded maximum wait of ${polling.maxWaitMs}ms`);
  };

  while (true) {
    if (signal?.aborted) {
      runLog.warn('Run driver aborted; cancelling run');
      await cancelQuietly(engine, run, runLog);
      return fail('cancelled', 'Aborted by caller');
    }
    if (polling.now() >= deadline) {
      return exceedMaxWait();
    }

    // A status check that never settles must not outlive the deadline.
    const check = createCombinedAbortSignal(signal, deadline - polling.now());
    let snapshot: RunSnapshot;
    try {
      snapshot = await raceAbort(engine.getRun(run, check.signal), check.signal);
    } catch (err) {
      if (signal?.aborted) continue;
      if (check.signal.reason instanceof DeadlineExceededError) {
        return exceedMaxWait();
      }
      const pollError = new TransientPollError(`Status check failed: ${errorMessage(err)}`, run.id);
      runLog.warn({ err: pollError, delayMs: polling.errorDelayMs }, 'Run status check failed; retrying');
      await polling.sleep(polling.errorDelayMs, signal);
      continue;
    } finally {
      check.cleanup();
    }

    record(snapshot.status);

    if (snapshot.status === 'completed') {
      const latest = await engine.getLatestMessage(contextId, signal);
      const output = latest && latest.role === 'assistant' ? latest : null;
      if (!output) {
        runLog.warn('Run completed without an agent message');
      }
      runLog.info({ toolCalls: toolResults.length }, 'Run completed');
      return { status: 'completed', run, statusPath, toolResults, output };
    }

    if (isTerminalFailure(snapshot.status)) {
      runLog.error({ status: snapshot.status, detail: snapshot.lastError }, 'Run ended without completing');
      return fail(snapshot.status, snapshot.lastError);
    }

    if (snapshot.status === 'requires_tool_output') {
      // A lagging poll can still list tokens that were already answered.
      const batch = dedupeByToken(snapshot.pendingToolCalls).filter((call) => !submittedTokens.has(call.token));
      if (batch.length > 0) {
        const results = await resolveBatch(batch, resultsByToken, params, runLog);
        const outputs: ToolOutput[] = results.map((r) => ({ token: r.token, output: serializeOutcome(r.outcome) }));

        runLog.info({ count: outputs.length }, 'Submitting tool outputs');
        try {
          await engine.submitToolOutputs(run, outputs, signal);
          for (const r of results) {
            submittedTokens.add(r.token);
            toolResults.push(r);
          }
        } catch (err) {
          // Next poll still shows the batch; cached results are resubmitted.
          runLog.error({ err }, 'Tool output submission failed');
        }
      }
    }

    await polling.sleep(polling.backoff.nextDelay(attempt++), signal);
  }
}

// ─── Batch execution ─────────────────────────────────────────────────

function dedupeByToken(calls: ToolCallRequest[]): ToolCallRequest[] {
  const seen = new Set<string>();
  return calls.filter((call) => {
    if (seen.has(call.token)) return false;
    seen.add(call.token);
    return true;
  });
}

/**
 * Produce exactly one result per call in `batch`, in batch order. Cached
 * results are reused; the rest run sequentially, then the stage's
 * parallel-safe tools concurrently.
 */
async function resolveBatch(
  batch: ToolCallRequest[],
  cache: Map<string, ToolResult>,
  params: DriveRunParams,
  log: Logger,
): Promise<ToolResult[]> {
  const pending = batch.filter((call) => !cache.has(call.token));
  const parallelSafe = new Set<string>(params.stage.parallel_safe_tools);
  const sequentialCalls = pending.filter((call) => !parallelSafe.has(call.name));
  const parallelCalls = pending.filter((call) => parallelSafe.has(call.name));

  for (const call of sequentialCalls) {
    log.info({ tool: call.name, token: call.token }, 'Executing tool (sequential)');
    const outcome = await executeCall(call, params, log);
    cache.set(call.token, { token: call.token, name: call.name, outcome });
  }

  if (parallelCalls.length > 0) {
    log.info({ tools: parallelCalls.map((c) => c.name) }, `Executing ${parallelCalls.length} tools in parallel`);
    const outcomes = await Promise.all(parallelCalls.map((call) => executeCall(call, params, log)));
    parallelCalls.forEach((call, i) => {
      cache.set(call.token, { token: call.token, name: call.name, outcome: outcomes[i] });
    });
  }

  return batch.map((call) => {
    const result = cache.get(call.token);
    if (!result) {
      throw new Error(`No tool result for token ${call.token}`);
    }
    return result;
  });
}

/** Resolve one call to an outcome. Never rejects. */
async function executeCall(call: ToolCallRequest, params: DriveRunParams, log: Logger): Promise<ToolCallOutcome> {
  const { stage, executor, signal } = params;

  if (!isToolName(call.name)) {
    log.warn({ tool: call.name }, 'Unknown tool called');
    return toolFailure('unknown_tool', `Unknown tool: ${call.name}`);
  }
  if (!stage.tools.includes(call.name)) {
    log.warn({ tool: call.name }, 'Tool not available to this stage');
    return toolFailure('not_permitted', `Tool ${call.name} is not available to stage ${stage.identity.name}`);
  }

  let args: unknown;
  try {
    args = JSON.parse(call.rawArguments);
  } catch {
    log.warn({ tool: call.name, raw: call.rawArguments.slice(0, 200) }, 'Tool arguments are not valid JSON');
    return toolFailure('argument_mismatch', `Could not parse arguments for ${call.name} as JSON`);
  }

  try {
    return await executor.execute(call.name, args, signal);
  } catch (err) {
    log.error({ tool: call.name, error: errorMessage(err) }, 'Tool executor threw');
    return toolFailure('tool_error', errorMessage(err));
  }
}

async function cancelQuietly(engine: ReasoningEngine, run: RunHandle, log: Logger): Promise<void> {
  try {
    await engine.cancelRun(run);
  } catch (err) {
    log.error({ err }, 'Run cancellation request failed');
  }
}
