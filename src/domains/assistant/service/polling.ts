/**
 * @fileoverview Bounded polling for assistant runs.
 *
 * The wait between polls is a pure function of the attempt count and the
 * elapsed time, so the loop can be driven by a fake clock in tests.
 */

import type { BackoffMode } from '../../../config.js';
import { AuthError, GenerationTimeoutError, RemoteError } from '../../../utils/errors.js';
import type { AppLogger } from '../../../utils/observability/index.js';
import type { AssistantProvider, RunHandle } from '../types.js';

export type PollPolicy = {
  intervalMs: number;
  maxIntervalMs: number;
  maxAttempts: number;
  timeoutMs: number;
  backoff: BackoffMode;
};

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * Delay before the next poll, or null when the budget is spent.
 *
 * @param attempt Polls already made (>= 1)
 * @param elapsedMs Time since the run was started
 */
export function pollDelayMs(attempt: number, elapsedMs: number, policy: PollPolicy): number | null {
  if (attempt >= policy.maxAttempts) return null;

  const remainingMs = policy.timeoutMs - elapsedMs;
  if (remainingMs <= 0) return null;

  const base = policy.backoff === 'exponential'
    ? Math.min(policy.intervalMs * 2 ** (attempt - 1), policy.maxIntervalMs)
    : policy.intervalMs;

  return Math.min(base, remainingMs);
}

/** The timeout is reported either way; a failed cancel is only logged. */
async function cancelAbandonedRun(assistant: AssistantProvider, handle: RunHandle, logger: AppLogger): Promise<void> {
  try {
    await assistant.cancelRun(handle);
    logger.info('generation_cancelled', { runId: handle.runId });
  } catch (error) {
    if (error instanceof AuthError) throw error;
    logger.warn('generation_cancel_failed', {
      runId: handle.runId,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Poll a run until it completes or fails.
 *
 * @returns The assistant's reply text
 * @throws GenerationTimeoutError when the policy is exhausted first; the run
 *   is cancelled before it is thrown
 * @throws RemoteError when the run failed or completed without a reply
 */
export async function waitForRun(
  assistant: AssistantProvider,
  handle: RunHandle,
  policy: PollPolicy,
  clock: Clock,
  logger: AppLogger
): Promise<string> {
  const startedAt = clock.now();
  let attempt = 0;

  for (;;) {
    const poll = await assistant.pollRun(handle);
    attempt++;

    if (poll.status === 'completed') {
      const output = poll.output?.trim() ?? '';
      if (!output) {
        throw new RemoteError('generation completed without a reply', { runId: handle.runId });
      }
      return output;
    }

    if (poll.status === 'failed') {
      throw new RemoteError(`generation failed: ${poll.error ?? 'unknown error'}`, { runId: handle.runId });
    }

    const elapsedMs = clock.now() - startedAt;
    const delay = pollDelayMs(attempt, elapsedMs, policy);
    if (delay === null) {
      await cancelAbandonedRun(assistant, handle, logger);
      throw new GenerationTimeoutError(attempt, elapsedMs);
    }

    logger.debug('generation_poll_pending', { runId: handle.runId, status: poll.status, attempt, delayMs: delay });
    await clock.sleep(delay);
  }
}
