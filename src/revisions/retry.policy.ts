export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffMs: readonly number[];
}

export type RetryDecision =
  | { readonly action: "retry" }
  | { readonly action: "skip"; readonly reason: string }
  | { readonly action: "raise" };

export type RetryOutcome<T> =
  | { readonly status: "ok"; readonly value: T; readonly attempts: number }
  | { readonly status: "skipped"; readonly reason: string; readonly attempts: number }
  | { readonly status: "exhausted"; readonly attempts: number; readonly lastError: unknown };

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createRetryPolicy(maxAttempts: number, backoffMs: readonly number[] = []): RetryPolicy {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new Error(`RETRY_POLICY_ERROR maxAttempts must be an integer >= 1 (got ${String(maxAttempts)})`);
  }
  for (const delay of backoffMs) {
    if (!Number.isFinite(delay) || delay < 0) {
      throw new Error(`RETRY_POLICY_ERROR backoff delays must be >= 0 (got ${String(delay)})`);
    }
  }
  return Object.freeze({
    maxAttempts,
    backoffMs: Object.freeze([...backoffMs]),
  });
}

// Manifest listing: three tries, then move on to the next revision.
export const LISTING_RETRY_POLICY = createRetryPolicy(3);

// The archive is known to hold the file here, so this budget is larger, but still finite.
export const CONTENT_RETRY_POLICY = createRetryPolicy(10, [250, 500, 1000, 2000, 5000]);

function delayBefore(policy: RetryPolicy, attempt: number): number {
  if (policy.backoffMs.length === 0) {
    return 0;
  }
  return policy.backoffMs[Math.min(attempt - 2, policy.backoffMs.length - 1)] ?? 0;
}

export async function attemptWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  classify: (error: unknown) => RetryDecision,
  wait: Sleep = sleep
): Promise<RetryOutcome<T>> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    if (attempt > 1) {
      const delayMs = delayBefore(policy, attempt);
      if (delayMs > 0) {
        await wait(delayMs);
      }
    }

    try {
      const value = await operation(attempt);
      return { status: "ok", value, attempts: attempt };
    } catch (error) {
      const decision = classify(error);
      if (decision.action === "raise") {
        throw error;
      }
      if (decision.action === "skip") {
        return { status: "skipped", reason: decision.reason, attempts: attempt };
      }
      lastError = error;
    }
  }

  return { status: "exhausted", attempts: policy.maxAttempts, lastError };
}
