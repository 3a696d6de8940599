export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
}

/**
 * Reconnection state threaded through a source's read loop.
 */
export interface BackoffState {
  attempt: number;
  nextDelayMs: number;
}

export function initialBackoff(policy: BackoffPolicy): BackoffState {
  return { attempt: 0, nextDelayMs: policy.initialDelayMs };
}

/**
 * State after another failed attempt: delay doubles, capped at maxDelayMs.
 */
export function nextBackoff(state: BackoffState, policy: BackoffPolicy): BackoffState {
  return {
    attempt: state.attempt + 1,
    nextDelayMs: Math.min(state.nextDelayMs * 2, policy.maxDelayMs),
  };
}
