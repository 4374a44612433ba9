// src/runner/scheduler/backoff.ts

/** Restart policy for streaming scripts that exit unexpectedly. */
export type RestartPolicy = {
  /** Restarts attempted after consecutive failures before staying failed. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  /** An instance that stayed up this long resets the failure count. */
  resetAfterMs: number;
};

export const DEFAULT_RESTART_POLICY: RestartPolicy = {
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 10_000,
  factor: 2,
  resetAfterMs: 30_000,
};

/** Delay before restart number `attempt` (1-based). */
export const backoffDelay = (attempt: number, policy: RestartPolicy): number =>
  Math.min(
    policy.maxDelayMs,
    Math.round(policy.baseDelayMs * policy.factor ** Math.max(0, attempt - 1)),
  );
