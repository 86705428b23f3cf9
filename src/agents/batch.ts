// Runs sessions for several subjects with a concurrency limit. Starts are
// spaced by `delayMs`; results come back in input order.

import logger from '../lib/logger.js';
import { sleep as defaultSleep } from './runtime/polling.js';
import type { Sleep } from './runtime/polling.js';
import type { SessionOutcome, SessionRunner } from './session.js';

export interface BatchOptions {
  lookbackDays: number;
  /** Max subjects in flight at once (default: 1) */
  concurrency?: number;
  /** Minimum gap between two subject starts (default: 0) */
  delayMs?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
  onOutcome?: (outcome: SessionOutcome) => void;
}

export async function runBatch(
  runner: Pick<SessionRunner, 'runSession'>,
  subjectIds: readonly string[],
  options: BatchOptions,
): Promise<SessionOutcome[]> {
  const concurrency = Math.max(1, options.concurrency ?? 1);
  const delayMs = options.delayMs ?? 0;
  const wait = options.sleep ?? defaultSleep;
  const results: SessionOutcome[] = new Array<SessionOutcome>(subjectIds.length);

  let next = 0;
  let startGate: Promise<void> = Promise.resolve();

  const claim = async (): Promise<number | null> => {
    if (next >= subjectIds.length || options.signal?.aborted) return null;
    const index = next++;
    if (index > 0 && delayMs > 0) {
      startGate = startGate.then(() => wait(delayMs, options.signal));
      await startGate;
    }
    return index;
  };

  const worker = async () => {
    for (let index = await claim(); index !== null; index = await claim()) {
      const subjectId = subjectIds[index];
      const outcome = await runner.runSession(subjectId, options.lookbackDays, options.signal);
      results[index] = outcome;
      options.onOutcome?.(outcome);
    }
  };

  logger.info({ subjects: subjectIds.length, concurrency }, 'Starting batch');
  await Promise.all(Array.from({ length: Math.min(concurrency, subjectIds.length) }, worker));
  return results.filter((r): r is SessionOutcome => r !== undefined);
}
