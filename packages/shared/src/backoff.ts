export interface BackoffPolicy {
  initialMs: number;
  maxMs: number;
}

function sanitizePositiveInt(value: number, fallback: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

export function normalizeBackoffPolicy(policy: BackoffPolicy): BackoffPolicy {
  const initialMs = sanitizePositiveInt(policy.initialMs, 1000);
  const maxMs = Math.max(initialMs, sanitizePositiveInt(policy.maxMs, 60_000));
  return { initialMs, maxMs };
}

/** initial, 2x, 4x, ... capped at maxMs. `attempt` counts from 0. */
export function calculateBackoffMs(attempt: number, policy: BackoffPolicy): number {
  const { initialMs, maxMs } = normalizeBackoffPolicy(policy);
  const step = Math.max(0, Math.floor(attempt));
  // 2^31 overflows the cap long before it matters
  if (step >= 31) {
    return maxMs;
  }
  return Math.min(maxMs, initialMs * Math.pow(2, step));
}
