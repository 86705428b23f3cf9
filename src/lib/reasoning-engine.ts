// ─── Run status ──────────────────────────────────────────────────────

export const TERMINAL_FAILURE_STATUSES = ['failed', 'cancelled', 'expired'] as const;

export type TerminalFailureStatus = (typeof TERMINAL_FAILURE_STATUSES)[number];

export type RunStatus =
  | 'submitted'
  | 'queued'
  | 'in_progress'
  | 'requires_tool_output'
  | 'completed'
  | TerminalFailureStatus;

export function isTerminalFailure(status: RunStatus): status is TerminalFailureStatus {
  return TERMINAL_FAILURE_STATUSES.some((terminal) => terminal === status);
}

// ─── Shared interfaces ───────────────────────────────────────────────

/**
 * A tool call the engine is waiting on. `rawArguments` is the JSON text the
 * engine produced; it is parsed and validated by the tool executor.
 */
export interface PendingToolCall {
  token: string;
  name: string;
  rawArguments: string;
}

export interface RunHandle {
  id: string;
  contextId: string;
}

export interface RunSnapshot extends RunHandle {
  status: RunStatus;
  pendingToolCalls: PendingToolCall[];
  lastError?: string;
}

export interface ToolOutput {
  token: string;
  output: string;
}

export interface EngineMessage {
  id: string;
  role: 'user' | 'assistant';
  text: string;
}

/** JSON Schema function definition handed to the engine at provisioning time */
export interface FunctionToolDef {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface CreateAgentParams {
  name: string;
  instructions: string;
  model: string;
  tools: FunctionToolDef[];
}

// ─── Provider interface ──────────────────────────────────────────────

/**
 * Boundary to the asynchronous reasoning engine. A context is the engine's
 * conversation (thread); a run executes one agent against it.
 */
export interface ReasoningEngine {
  readonly name: string;
  createContext(signal?: AbortSignal): Promise<string>;
  appendMessage(contextId: string, text: string, signal?: AbortSignal): Promise<EngineMessage>;
  createRun(
    contextId: string,
    agentId: string,
    instructions?: string,
    signal?: AbortSignal,
  ): Promise<RunHandle>;
  getRun(handle: RunHandle, signal?: AbortSignal): Promise<RunSnapshot>;
  submitToolOutputs(handle: RunHandle, outputs: ToolOutput[], signal?: AbortSignal): Promise<void>;
  cancelRun(handle: RunHandle): Promise<void>;
  getLatestMessage(contextId: string, signal?: AbortSignal): Promise<EngineMessage | null>;
  createAgent(params: CreateAgentParams): Promise<string>;
}
