/**
 * Conversation Context: append-only message log for one subject's pipeline.
 *
 * The engine holds the authoritative thread; this log mirrors what the
 * pipeline put into it (the seeded request) and what each completed stage
 * produced. Messages are frozen on append and never reordered or removed.
 * At most one run may act on the context at a time.
 */

import type { EngineMessage, ReasoningEngine } from '../../lib/reasoning-engine.js';
import type { Message, StageName } from './agent-protocol.js';

export class ConversationContext {
  private readonly log: Message[] = [];
  private activeStage: StageName | null = null;

  private constructor(
    private readonly engine: ReasoningEngine,
    readonly id: string,
  ) {}

  /** Open a fresh context on the engine. */
  static async open(engine: ReasoningEngine, signal?: AbortSignal): Promise<ConversationContext> {
    const id = await engine.createContext(signal);
    return new ConversationContext(engine, id);
  }

  get messages(): readonly Message[] {
    return this.log.slice();
  }

  get length(): number {
    return this.log.length;
  }

  latest(): Message | undefined {
    return this.log[this.log.length - 1];
  }

  /** Append the subject's request to the engine thread and the local log. */
  async appendSubjectRequest(text: string, signal?: AbortSignal): Promise<Message> {
    if (this.activeStage) {
      throw new Error(`Cannot append a request while stage '${this.activeStage}' holds the context`);
    }
    const engineMessage = await this.engine.appendMessage(this.id, text, signal);
    return this.push({ role: 'subject_request', text, engineMessageId: engineMessage.id });
  }

  /**
   * Record a completed stage's output. Returns null (and appends nothing) when
   * the engine message is already in the log, i.e. the stage added no reply.
   */
  recordAgentResponse(stage: StageName, engineMessage: EngineMessage): Message | null {
    if (this.activeStage !== stage) {
      throw new Error(`Stage '${stage}' does not hold the context`);
    }
    if (this.log.some((m) => m.engineMessageId === engineMessage.id)) {
      return null;
    }
    return this.push({
      role: 'agent_response',
      text: engineMessage.text,
      engineMessageId: engineMessage.id,
      stage,
    });
  }

  /**
   * Claim the context for one stage's run. Returns the release function.
   * Throws if another stage already holds it.
   */
  acquire(stage: StageName): () => void {
    if (this.activeStage) {
      throw new Error(`Context ${this.id} is held by stage '${this.activeStage}'; cannot start '${stage}'`);
    }
    this.activeStage = stage;
    return () => {
      if (this.activeStage === stage) this.activeStage = null;
    };
  }

  private push(fields: Omit<Message, 'position'>): Message {
    const message: Message = Object.freeze({ position: this.log.length, ...fields });
    this.log.push(message);
    return message;
  }
}
