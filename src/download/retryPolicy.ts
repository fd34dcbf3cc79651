import { isFatalHarvestError } from "../core/errors";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type ItemState =
  | { phase: "attempting"; attempt: number }
  | { phase: "success"; attemptCount: number }
  | { phase: "failed"; attemptCount: number; error: unknown; fatal: boolean };

export type AttemptingState = Extract<ItemState, { phase: "attempting" }>;

export type AttemptOutcome = { ok: true } | { ok: false; error: unknown };

export interface Transition {
  state: ItemState;
  /** Wait before the next attempt; 0 unless the item is retried. */
  delayMs: number;
}

export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/** A pending item's first attempt. */
export function startItem(): AttemptingState {
  return { phase: "attempting", attempt: 1 };
}

/** Attempting(n) -> Attempting(n + 1) | Success | Failed, with no I/O. */
export function recordAttempt(state: AttemptingState, outcome: AttemptOutcome, policy: RetryPolicy): Transition {
  if (outcome.ok) {
    return { state: { phase: "success", attemptCount: state.attempt }, delayMs: 0 };
  }

  if (isFatalHarvestError(outcome.error)) {
    return {
      state: { phase: "failed", attemptCount: state.attempt, error: outcome.error, fatal: true },
      delayMs: 0,
    };
  }

  if (state.attempt > policy.maxRetries) {
    return {
      state: { phase: "failed", attemptCount: state.attempt, error: outcome.error, fatal: false },
      delayMs: 0,
    };
  }

  return {
    state: { phase: "attempting", attempt: state.attempt + 1 },
    delayMs: backoffDelay(state.attempt, policy),
  };
}
