/**
 * Polling policy for the run driver. Clock, sleep and backoff are injected
 * so tests can drive the loop without real delays.
 */

import { sleep } from '../../lib/abort.js';

export interface BackoffStrategy {
  /** Delay before the next poll; `attempt` counts polls since the last status change */
  nextDelay(attempt: number): number;
}

export function constantBackoff(intervalMs: number): BackoffStrategy {
  return { nextDelay: () => intervalMs };
}

export function exponentialBackoff(options: { baseMs: number; maxMs: number; factor?: number }): BackoffStrategy {
  const factor = options.factor ?? 2;
  return {
    nextDelay: (attempt) => Math.min(options.maxMs, options.baseMs * Math.pow(factor, attempt)),
  };
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export { sleep };

export interface PollingPolicy {
  backoff: BackoffStrategy;
  /** Delay after a failed status check */
  errorDelayMs: number;
  /** Overall bound on waiting for one run to reach a terminal status */
  maxWaitMs: number;
  now: () => number;
  sleep: Sleep;
}

export type BackoffKind = 'constant' | 'exponential';

export function createPollingPolicy(options: {
  backoff: BackoffKind;
  intervalMs: number;
  maxIntervalMs: number;
  errorDelayMs: number;
  maxWaitMs: number;
}): PollingPolicy {
  return {
    backoff: options.backoff === 'exponential'
      ? exponentialBackoff({ baseMs: options.intervalMs, maxMs: options.maxIntervalMs })
      : constantBackoff(options.intervalMs),
    errorDelayMs: options.errorDelayMs,
    maxWaitMs: options.maxWaitMs,
    now: Date.now,
    sleep,
  };
}
