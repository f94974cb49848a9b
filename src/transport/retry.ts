export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
  backoffFactor: number;
}

export type RetryState =
  | { phase: "init" }
  | { phase: "attempting"; attempt: number }
  | { phase: "retry-wait"; attempt: number; delayMs: number }
  | { phase: "succeeded"; attempt: number }
  | { phase: "failed"; attempt: number }
  | { phase: "exhausted"; attempt: number };

export type RetryEvent =
  | { type: "start" }
  | { type: "success" }
  | { type: "failure"; retriable: boolean }
  | { type: "waited" };

export type AttemptOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error; retriable: boolean };

/** Delay before the `retryNumber`-th retry (1-based). */
export function backoffDelay(policy: RetryPolicy, retryNumber: number): number {
  return policy.retryDelayMs * policy.backoffFactor ** (retryNumber - 1);
}

export function transition(state: RetryState, event: RetryEvent, policy: RetryPolicy): RetryState {
  switch (state.phase) {
    case "init":
      if (event.type === "start") {
        return { phase: "attempting", attempt: 1 };
      }
      break;
    case "attempting":
      if (event.type === "success") {
        return { phase: "succeeded", attempt: state.attempt };
      }
      if (event.type === "failure") {
        if (!event.retriable) {
          return { phase: "failed", attempt: state.attempt };
        }
        // attempt n has used n - 1 retries so far
        if (state.attempt > policy.maxRetries) {
          return { phase: "exhausted", attempt: state.attempt };
        }
        return {
          phase: "retry-wait",
          attempt: state.attempt,
          delayMs: backoffDelay(policy, state.attempt)
        };
      }
      break;
    case "retry-wait":
      if (event.type === "waited") {
        return { phase: "attempting", attempt: state.attempt + 1 };
      }
      break;
    default:
      break;
  }
  throw new Error(`Invalid retry transition: ${event.type} while ${state.phase}`);
}

/**
 * Drives `attempt` through the retry machine. An exception thrown by
 * `attempt` (rather than returned as a failed outcome) ends the run at once.
 */
export async function runWithRetry<T>(
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void>,
  attempt: (attemptNumber: number) => Promise<AttemptOutcome<T>>,
  onTransition?: (state: RetryState) => void
): Promise<T> {
  let state = transition({ phase: "init" }, { type: "start" }, policy);
  let lastError: Error | null = null;

  while (true) {
    onTransition?.(state);

    switch (state.phase) {
      case "attempting": {
        const outcome = await attempt(state.attempt);
        if (outcome.ok) {
          state = transition(state, { type: "success" }, policy);
          onTransition?.(state);
          return outcome.value;
        }
        lastError = outcome.error;
        state = transition(state, { type: "failure", retriable: outcome.retriable }, policy);
        break;
      }
      case "retry-wait":
        await sleep(state.delayMs);
        state = transition(state, { type: "waited" }, policy);
        break;
      case "failed":
      case "exhausted":
        throw lastError ?? new Error(`Request ${state.phase} after ${state.attempt} attempts`);
      default:
        throw new Error(`Retry loop stalled in ${state.phase}`);
    }
  }
}
