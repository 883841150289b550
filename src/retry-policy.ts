// ABOUTME: Backoff delay calculation for rate-limited search requests
// ABOUTME: Supports a fixed delay or capped exponential growth, optionally with full jitter

import { setTimeout as delay } from 'timers/promises';
import type { RetryPolicy } from './types.js';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

/** Policy for routines that never retry: one attempt, no wait */
export const NO_RETRY: RetryPolicy = {
  maxAttempts: 1,
  delayMs: 0,
  strategy: 'fixed',
  maxDelayMs: 0,
  jitter: false,
};

/**
 * Delay before the next attempt, given how many attempts have already failed (1-based)
 */
export function backoffDelay(
  policy: RetryPolicy,
  failedAttempts: number,
  random: () => number = Math.random
): number {
  const base = policy.strategy === 'exponential'
    ? Math.min(policy.delayMs * 2 ** (failedAttempts - 1), policy.maxDelayMs)
    : policy.delayMs;

  if (!policy.jitter) return base;
  return Math.floor(random() * base);
}
