#!/usr/bin/env node
import logger from './lib/logger.js';
import { loadConfig, requireApiKey } from './lib/config.js';
import type { AppConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { AssistantsProvider } from './lib/assistants-provider.js';
import { HttpToolExecutor } from './tools/tool-executor.js';
import { PipelineCoordinator } from './agents/coordinator.js';
import { SessionRunner } from './agents/session.js';
import { runBatch } from './agents/batch.js';
import { createPollingPolicy } from './agents/runtime/polling.js';
import {
  AGENT_ID_ENV_KEYS,
  buildStageDefinitions,
  provisionStageAgents,
  resolveAgentIds,
} from './agents/stages.js';
import { STAGE_NAMES } from './agents/runtime/agent-protocol.js';

const USAGE = `Usage:
  merchant-risk-pipeline run [subjectId...]   Analyse subjects (default: SUBJECT_IDS)
  merchant-risk-pipeline provision            Create the stage agents and print their ids
  merchant-risk-pipeline tools                List tools offered by the tool service`;

function createEngine(config: AppConfig): AssistantsProvider {
  return new AssistantsProvider({ apiKey: requireApiKey(config), baseUrl: config.OPENAI_BASE_URL });
}

function createExecutor(config: AppConfig): HttpToolExecutor {
  return new HttpToolExecutor({ baseUrl: config.TOOL_SERVER_URL, timeoutMs: config.TOOL_TIMEOUT_MS });
}

async function runCommand(config: AppConfig, args: string[], signal: AbortSignal): Promise<number> {
  const subjectIds = args.length > 0 ? args : config.SUBJECT_IDS;
  if (subjectIds.length === 0) {
    logger.error('No subjects given: pass ids as arguments or set SUBJECT_IDS');
    return 1;
  }

  const engine = createEngine(config);
  const executor = createExecutor(config);
  const stages = buildStageDefinitions(resolveAgentIds(config));

  try {
    const tools = await executor.listTools(signal);
    logger.info({ url: config.TOOL_SERVER_URL, tools: tools.length }, 'Tool service reachable');
  } catch (err) {
    logger.fatal({ url: config.TOOL_SERVER_URL, error: errorMessage(err) }, 'Could not reach the tool service');
    return 1;
  }

  const coordinator = new PipelineCoordinator({
    engine,
    executor,
    stages,
    polling: createPollingPolicy({
      backoff: config.RUN_POLL_BACKOFF,
      intervalMs: config.RUN_POLL_INTERVAL_MS,
      maxIntervalMs: config.RUN_POLL_MAX_INTERVAL_MS,
      errorDelayMs: config.RUN_POLL_ERROR_DELAY_MS,
      maxWaitMs: config.RUN_MAX_WAIT_MS,
    }),
  });
  const runner = new SessionRunner({ engine, coordinator });

  const outcomes = await runBatch(runner, subjectIds, {
    lookbackDays: config.LOOKBACK_DAYS,
    concurrency: config.SESSION_CONCURRENCY,
    delayMs: config.SESSION_DELAY_MS,
    signal,
  });

  const summary = outcomes.map((o) => ({
    subjectId: o.subjectId,
    status: o.status,
    ...(o.status === 'halted' ? { haltedAt: o.haltedAt, terminalStatus: o.terminalStatus } : {}),
    ...(o.status === 'errored' ? { error: o.error, ...(o.erroredAt ? { erroredAt: o.erroredAt } : {}) } : {}),
  }));
  process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
  return outcomes.every((o) => o.status === 'completed') ? 0 : 2;
}

async function provisionCommand(config: AppConfig): Promise<number> {
  const ids = await provisionStageAgents(createEngine(config), config.ASSISTANT_MODEL);
  for (const stage of STAGE_NAMES) {
    process.stdout.write(`${AGENT_ID_ENV_KEYS[stage]}=${ids[stage]}\n`);
  }
  return 0;
}

async function toolsCommand(config: AppConfig, signal: AbortSignal): Promise<number> {
  const tools = await createExecutor(config).listTools(signal);
  for (const tool of tools) {
    process.stdout.write(`${tool.name}\t${tool.description}\n`);
  }
  return 0;
}

async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  const config = loadConfig();
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted; cancelling in-flight runs');
    controller.abort();
  });

  switch (command) {
    case 'run':
      return runCommand(config, args, controller.signal);
    case 'provision':
      return provisionCommand(config);
    case 'tools':
      return toolsCommand(config, controller.signal);
    default:
      process.stderr.write(USAGE + '\n');
      return command ? 1 : 0;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Fatal error');
    process.exitCode = 1;
  });
