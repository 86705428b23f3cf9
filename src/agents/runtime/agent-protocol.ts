/**
 * Agent Protocol: Standard types for the staged risk pipeline.
 *
 * Defines stage identity, stage definitions, tool-call requests/results,
 * conversation messages and run outcomes. Engine-facing types live in
 * lib/reasoning-engine.ts; this module binds them to pipeline concepts.
 */

import type {
  EngineMessage,
  RunHandle,
  RunStatus,
  TerminalFailureStatus,
} from '../../lib/reasoning-engine.js';
import type { ToolCallOutcome } from '../../tools/tool-executor.js';
import type { ToolName } from '../../tools/tool-schemas.js';

// ─── Stage Identity ──────────────────────────────────────────────────

export const STAGE_NAMES = [
  'data_aggregation',
  'pattern_detection',
  'risk_assessment',
  'action_alerting',
] as const;

export type StageName = (typeof STAGE_NAMES)[number];

export interface AgentIdentity {
  /** Stable stage key (e.g. 'data_aggregation') */
  name: StageName;
  /** Human-readable agent name used when provisioning (e.g. 'Data Aggregation') */
  title: string;
  domain: 'merchant_risk';
}

// ─── Stage Definition ────────────────────────────────────────────────

/**
 * Everything about a stage that is known before configuration is loaded.
 */
export interface StageTemplate {
  identity: AgentIdentity;
  /** Agent instructions, set on the engine-side agent at provisioning */
  instructions: string;
  /** Tools this stage's agent may call; requests for any other tool are refused */
  tools: readonly ToolName[];
  /**
   * Tools safe to dispatch concurrently within one batch. Other tools run
   * sequentially, in request order, before the parallel group.
   */
  parallel_safe_tools: readonly ToolName[];
}

/** A stage bound to its engine-side agent and its place in the ordering. */
export interface StageDefinition extends StageTemplate {
  agentId: string;
  position: number;
}

// ─── Conversation ────────────────────────────────────────────────────

export type MessageRole = 'subject_request' | 'agent_response';

export interface Message {
  /** Sequence index; insertion order is the only ordering key */
  readonly position: number;
  readonly role: MessageRole;
  readonly text: string;
  readonly engineMessageId: string;
  /** Producing stage, for agent responses */
  readonly stage?: StageName;
}

// ─── Tool calls ──────────────────────────────────────────────────────

export interface ToolCallRequest {
  token: string;
  name: string;
  rawArguments: string;
}

export interface ToolResult {
  token: string;
  name: string;
  outcome: ToolCallOutcome;
}

// ─── Run outcome ─────────────────────────────────────────────────────

interface RunOutcomeBase {
  run: RunHandle;
  /** Statuses observed, consecutive duplicates collapsed, starting at 'submitted' */
  statusPath: RunStatus[];
  /** Every tool result submitted during the run, in submission order */
  toolResults: ToolResult[];
}

export interface RunCompleted extends RunOutcomeBase {
  status: 'completed';
  /** Newest agent message in the context, null if the run produced none */
  output: EngineMessage | null;
}

export interface RunFailed extends RunOutcomeBase {
  status: TerminalFailureStatus;
  detail?: string;
}

export type RunOutcome = RunCompleted | RunFailed;
