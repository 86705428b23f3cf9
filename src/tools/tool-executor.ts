/**
 * Tool Executor: HTTP client for the external analytics tool service.
 *
 * Every failure mode (unknown tool, schema mismatch, structured service error,
 * timeout, transport fault, malformed body) comes back as a failed
 * ToolCallOutcome. `execute` never rejects.
 */

import { z } from 'zod';
import logger from '../lib/logger.js';
import { createCombinedAbortSignal, DeadlineExceededError, raceAbort } from '../lib/abort.js';
import { ArgumentMismatchError, ToolExecutionError, errorMessage } from '../lib/errors.js';
import { isToolName, toolSchemas } from './tool-schemas.js';

// ─── Outcome types ───────────────────────────────────────────────────

export type ToolErrorCode =
  | 'unknown_tool'
  | 'not_permitted'
  | 'argument_mismatch'
  | 'tool_error'
  | 'timeout'
  | 'transport'
  | 'aborted';

export interface ToolError {
  code: ToolErrorCode;
  message: string;
}

export type ToolCallOutcome =
  | { ok: true; value: unknown }
  | { ok: false; error: ToolError };

export interface ToolListing {
  name: string;
  description: string;
}

export interface ToolExecutor {
  execute(name: string, args: unknown, signal?: AbortSignal): Promise<ToolCallOutcome>;
  listTools(signal?: AbortSignal): Promise<ToolListing[]>;
}

/** The text submitted back to the engine for one tool call. */
export function serializeOutcome(outcome: ToolCallOutcome): string {
  if (outcome.ok) {
    return JSON.stringify(outcome.value ?? {});
  }
  return JSON.stringify({ error: outcome.error.message, code: outcome.error.code });
}

export function toolFailure(code: ToolErrorCode, message: string): ToolCallOutcome {
  return { ok: false, error: { code, message } };
}

// ─── Wire validation ─────────────────────────────────────────────────

const executeResponseSchema = z.union([
  z.object({ error: z.string() }),
  z.object({ result: z.unknown().refine((value) => value !== undefined, 'missing result') }),
]);

const toolListingSchema = z.array(
  z.object({ name: z.string(), description: z.string() }),
);

function embeddedError(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;
  const error: unknown = Reflect.get(value, 'error');
  return typeof error === 'string' ? error : null;
}

// ─── HTTP executor ───────────────────────────────────────────────────

export interface HttpToolExecutorConfig {
  baseUrl: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export class HttpToolExecutor implements ToolExecutor {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: HttpToolExecutorConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.timeoutMs = config.timeoutMs;
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async execute(name: string, args: unknown, signal?: AbortSignal): Promise<ToolCallOutcome> {
    const log = logger.child({ tool: name });

    if (!isToolName(name)) {
      log.warn('Unknown tool requested');
      return toolFailure('unknown_tool', `Unknown tool: ${name}`);
    }

    const { signal: callSignal, cleanup } = createCombinedAbortSignal(signal, this.timeoutMs);
    try {
      const parsed = toolSchemas[name].safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
          .join('; ');
        throw new ArgumentMismatchError(`Argument mismatch for tool '${name}': ${issues}`, name);
      }

      log.debug({ args: parsed.data }, 'Requesting tool execution');
      const value = await raceAbort(this.post(name, parsed.data, callSignal), callSignal);
      log.debug('Tool execution succeeded');
      return { ok: true, value };
    } catch (err) {
      const outcome = this.classify(name, err, callSignal);
      log.warn({ code: outcome.error.code, error: outcome.error.message }, 'Tool execution failed');
      return outcome;
    } finally {
      cleanup();
    }
  }

  async listTools(signal?: AbortSignal): Promise<ToolListing[]> {
    const { signal: callSignal, cleanup } = createCombinedAbortSignal(signal, this.timeoutMs);
    try {
      const response = await raceAbort(this.fetchImpl(`${this.baseUrl}/tools`, { signal: callSignal }), callSignal);
      if (!response.ok) {
        throw new ToolExecutionError(`Tool listing failed with status ${response.status}`, 'list_tools');
      }
      const body: unknown = await response.json();
      return toolListingSchema.parse(body);
    } finally {
      cleanup();
    }
  }

  private async post(name: string, args: Record<string, unknown>, signal: AbortSignal): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}/execute`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ tool_name: name, arguments: args }),
      signal,
    });

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new ToolExecutionError(
        `Tool service returned invalid JSON (status ${response.status}): ${errorMessage(err)}`,
        name,
      );
    }

    const parsed = executeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ToolExecutionError(`Tool service returned an unexpected body (status ${response.status})`, name);
    }
    if ('error' in parsed.data) {
      throw new ToolExecutionError(parsed.data.error, name);
    }

    const soft = embeddedError(parsed.data.result);
    if (soft !== null) {
      throw new ToolExecutionError(soft, name);
    }
    return parsed.data.result;
  }

  private classify(name: string, err: unknown, signal: AbortSignal): { ok: false; error: ToolError } {
    if (err instanceof ArgumentMismatchError) {
      return { ok: false, error: { code: 'argument_mismatch', message: err.message } };
    }
    if (err instanceof ToolExecutionError) {
      return { ok: false, error: { code: 'tool_error', message: err.message } };
    }
    if (signal.aborted) {
      if (signal.reason instanceof DeadlineExceededError) {
        return {
          ok: false,
          error: { code: 'timeout', message: `Tool '${name}' timed out after ${signal.reason.timeoutMs}ms` },
        };
      }
      return { ok: false, error: { code: 'aborted', message: `Tool '${name}' was aborted` } };
    }
    return {
      ok: false,
      error: { code: 'transport', message: `Tool service connection error: ${errorMessage(err)}` },
    };
  }
}
