/*
Purpose: tagged outcomes for remote calls and bounded retry with exponential backoff.
Assumptions: adapters never throw for expected remote failures; they return a RemoteResult
  and let callers decide. Only transient failures are retried.
Usage: const res = await withRetries(() => api.describeImage(id, region), policy);
*/

// =============================================================================
// TYPES
// =============================================================================

export type RemoteResult<T> =
  | { status: "success"; value: T }
  | { status: "transient-failure"; reason: string }
  | { status: "permanent-failure"; reason: string; notFound?: boolean };

export type RemoteFailure = Exclude<RemoteResult<never>, { status: "success" }>;

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
};

export type RetryOptions = {
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; reason: string }) => void;
};

export type RetriedResult<T> = RemoteResult<T> & { attempts: number };

// =============================================================================
// RESULT HELPERS
// =============================================================================

export function success<T>(value: T): RemoteResult<T> {
  return { status: "success", value };
}

export function transientFailure(reason: string): RemoteFailure {
  return { status: "transient-failure", reason };
}

export function permanentFailure(reason: string, opts: { notFound?: boolean } = {}): RemoteFailure {
  return opts.notFound
    ? { status: "permanent-failure", reason, notFound: true }
    : { status: "permanent-failure", reason };
}

// =============================================================================
// RETRY
// =============================================================================

const MAX_BACKOFF_EXPONENT = 5;

export async function withRetries<T>(
  operation: (attempt: number) => Promise<RemoteResult<T>>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<RetriedResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const sleep = options.sleep ?? delay;
  let attempt = 1;

  while (true) {
    const result = await operation(attempt);
    if (result.status !== "transient-failure") {
      return { ...result, attempts: attempt };
    }

    if (attempt >= maxAttempts || options.signal?.aborted) {
      return {
        status: "transient-failure",
        reason: `${result.reason} (gave up after ${attempt} attempt${attempt === 1 ? "" : "s"})`,
        attempts: attempt,
      };
    }

    const delayMs = retryDelayMs(attempt, policy.baseDelayMs);
    options.onRetry?.({ attempt, delayMs, reason: result.reason });
    await sleep(delayMs);
    attempt += 1;
  }
}

export function retryDelayMs(attempt: number, baseDelayMs: number): number {
  const capped = Math.min(Math.max(attempt, 1), MAX_BACKOFF_EXPONENT);
  return baseDelayMs * 2 ** (capped - 1);
}

function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}
