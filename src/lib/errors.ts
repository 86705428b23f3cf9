/**
 * Error taxonomy for the pipeline.
 *
 * Only ConfigError and EngineRequestError are ever thrown past the component
 * that raised them. Tool errors become tool results, terminal run failures
 * become halts, and poll errors are retried by the run driver.
 */

export type PipelineErrorCode =
  | 'CONFIG_ERROR'
  | 'ENGINE_REQUEST_ERROR'
  | 'TOOL_EXECUTION_ERROR'
  | 'ARGUMENT_MISMATCH'
  | 'RUN_TERMINAL_FAILURE'
  | 'TRANSIENT_POLL_ERROR';

export class PipelineError extends Error {
  constructor(message: string, public readonly code: PipelineErrorCode) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** Non-2xx response from the reasoning engine. `status` drives retry classification. */
export class EngineRequestError extends PipelineError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly headers?: Headers,
  ) {
    super(message, 'ENGINE_REQUEST_ERROR');
    this.name = 'EngineRequestError';
  }
}

export class ToolExecutionError extends PipelineError {
  constructor(message: string, public readonly toolName: string) {
    super(message, 'TOOL_EXECUTION_ERROR');
    this.name = 'ToolExecutionError';
  }
}

export class ArgumentMismatchError extends PipelineError {
  constructor(message: string, public readonly toolName: string) {
    super(message, 'ARGUMENT_MISMATCH');
    this.name = 'ArgumentMismatchError';
  }
}

export class RunTerminalFailure extends PipelineError {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly status: string,
    public readonly detail?: string,
  ) {
    super(message, 'RUN_TERMINAL_FAILURE');
    this.name = 'RunTerminalFailure';
  }
}

export class TransientPollError extends PipelineError {
  constructor(message: string, public readonly runId: string) {
    super(message, 'TRANSIENT_POLL_ERROR');
    this.name = 'TransientPollError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
