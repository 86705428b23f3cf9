import { z } from 'zod';
import logger from './logger.js';
import { EngineRequestError } from './errors.js';
import { withRetry } from './retry.js';
import type {
  CreateAgentParams,
  EngineMessage,
  PendingToolCall,
  ReasoningEngine,
  RunHandle,
  RunSnapshot,
  RunStatus,
  ToolOutput,
} from './reasoning-engine.js';

// ─── Response validation ─────────────────────────────────────────────

const idResponseSchema = z.object({ id: z.string() });

const messageSchema = z.object({
  id: z.string(),
  role: z.enum(['user', 'assistant']),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.object({ value: z.string() }).optional(),
    }),
  ),
});

const messageListSchema = z.object({ data: z.array(messageSchema) });

const runSchema = z.object({
  id: z.string(),
  thread_id: z.string(),
  status: z.string(),
  required_action: z
    .object({
      submit_tool_outputs: z.object({
        tool_calls: z.array(
          z.object({
            id: z.string(),
            function: z.object({ name: z.string(), arguments: z.string() }),
          }),
        ),
      }),
    })
    .nullish(),
  last_error: z.object({ code: z.string(), message: z.string() }).nullish(),
  incomplete_details: z.object({ reason: z.string() }).nullish(),
});

type RawRun = z.infer<typeof runSchema>;

// ─── Status mapping ──────────────────────────────────────────────────

const STATUS_MAP: Record<string, RunStatus> = {
  queued: 'queued',
  in_progress: 'in_progress',
  // Cancellation in flight: keep polling until the engine reports `cancelled`.
  cancelling: 'in_progress',
  requires_action: 'requires_tool_output',
  completed: 'completed',
  failed: 'failed',
  cancelled: 'cancelled',
  expired: 'expired',
  incomplete: 'failed',
};

export function mapRunStatus(raw: string): RunStatus {
  const mapped = STATUS_MAP[raw];
  if (!mapped) {
    logger.warn({ status: raw }, 'Unknown run status from engine; treating as in_progress');
    return 'in_progress';
  }
  return mapped;
}

function toSnapshot(run: RawRun): RunSnapshot {
  const status = mapRunStatus(run.status);
  const pendingToolCalls: PendingToolCall[] = status === 'requires_tool_output'
    ? (run.required_action?.submit_tool_outputs.tool_calls ?? []).map((tc) => ({
        token: tc.id,
        name: tc.function.name,
        rawArguments: tc.function.arguments,
      }))
    : [];

  let lastError: string | undefined;
  if (run.last_error) {
    lastError = `${run.last_error.code}: ${run.last_error.message}`;
  } else if (run.status === 'incomplete' && run.incomplete_details) {
    lastError = `incomplete: ${run.incomplete_details.reason}`;
  }

  return {
    id: run.id,
    contextId: run.thread_id,
    status,
    pendingToolCalls,
    ...(lastError !== undefined ? { lastError } : {}),
  };
}

function toEngineMessage(message: z.infer<typeof messageSchema>): EngineMessage {
  const text = message.content
    .filter((block) => block.type === 'text' && block.text)
    .map((block) => block.text?.value ?? '')
    .join('\n');
  return { id: message.id, role: message.role, text };
}

// ─── Provider ────────────────────────────────────────────────────────

export interface AssistantsProviderConfig {
  apiKey: string;
  baseUrl: string;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
  /** Attempts for non-polling requests on transient failures */
  maxAttempts?: number;
  retryBaseDelayMs?: number;
}

/**
 * ReasoningEngine backed by the Assistants v2 REST API (threads, messages, runs).
 */
export class AssistantsProvider implements ReasoningEngine {
  readonly name = 'assistants';
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(config: AssistantsProviderConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.maxAttempts = config.maxAttempts ?? 3;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000;
  }

  async createContext(signal?: AbortSignal): Promise<string> {
    const body = await this.retrying('create thread', () => this.request('POST', '/threads', {}, signal), signal);
    return idResponseSchema.parse(body).id;
  }

  async appendMessage(contextId: string, text: string, signal?: AbortSignal): Promise<EngineMessage> {
    const body = await this.retrying(
      'append message',
      () => this.request('POST', `/threads/${contextId}/messages`, { role: 'user', content: text }, signal),
      signal,
    );
    return toEngineMessage(messageSchema.parse(body));
  }

  async createRun(
    contextId: string,
    agentId: string,
    instructions?: string,
    signal?: AbortSignal,
  ): Promise<RunHandle> {
    const payload: Record<string, unknown> = { assistant_id: agentId };
    if (instructions) payload.instructions = instructions;
    const body = await this.retrying(
      'create run',
      () => this.request('POST', `/threads/${contextId}/runs`, payload, signal),
      signal,
    );
    const run = runSchema.parse(body);
    return { id: run.id, contextId: run.thread_id };
  }

  /** Not retried here: the run driver owns the poll-error backoff. */
  async getRun(handle: RunHandle, signal?: AbortSignal): Promise<RunSnapshot> {
    const body = await this.request('GET', `/threads/${handle.contextId}/runs/${handle.id}`, undefined, signal);
    return toSnapshot(runSchema.parse(body));
  }

  async submitToolOutputs(handle: RunHandle, outputs: ToolOutput[], signal?: AbortSignal): Promise<void> {
    await this.retrying(
      'submit tool outputs',
      () => this.request(
        'POST',
        `/threads/${handle.contextId}/runs/${handle.id}/submit_tool_outputs`,
        { tool_outputs: outputs.map((o) => ({ tool_call_id: o.token, output: o.output })) },
        signal,
      ),
      signal,
    );
  }

  async cancelRun(handle: RunHandle): Promise<void> {
    await this.request('POST', `/threads/${handle.contextId}/runs/${handle.id}/cancel`, {});
  }

  async getLatestMessage(contextId: string, signal?: AbortSignal): Promise<EngineMessage | null> {
    const body = await this.retrying(
      'list messages',
      () => this.request('GET', `/threads/${contextId}/messages?order=desc&limit=1`, undefined, signal),
      signal,
    );
    const [latest] = messageListSchema.parse(body).data;
    return latest ? toEngineMessage(latest) : null;
  }

  async createAgent(params: CreateAgentParams): Promise<string> {
    const body = await this.retrying('create assistant', () => this.request('POST', '/assistants', {
      name: params.name,
      instructions: params.instructions,
      model: params.model,
      tools: params.tools.map((fn) => ({ type: 'function', function: fn })),
    }));
    return idResponseSchema.parse(body).id;
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private retrying<T>(operation: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.maxAttempts,
      baseDelay: this.retryBaseDelayMs,
      signal,
      onRetry: (attempt, err) => {
        logger.warn({ operation, attempt, error: err.message }, 'Engine request retry');
      },
    });
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body?: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
        'OpenAI-Beta': 'assistants=v2',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
      signal,
    });

    if (!response.ok) {
      const errText = await response.text().catch(() => '');
      throw new EngineRequestError(
        `Engine API error ${response.status} on ${method} ${path}: ${errText}`,
        response.status,
        response.headers,
      );
    }

    const data: unknown = await response.json();
    return data;
  }
}
