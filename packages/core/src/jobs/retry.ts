/**
 * Backoff policy for failed job attempts.
 *
 * Unlike an in-process retry loop, nothing sleeps here: the scheduler only
 * decides, and the job store parks the job as `pending` with a
 * `next_attempt_at` gate. Delays are deterministic (no jitter) so a resumed
 * run reproduces the same schedule.
 */

import type { Job, JobError, JobErrorKind, RetryConfig } from "@archive/contracts";
import { isRetryableKind } from "../errors";

export type RetryDecision =
  | { action: "retry"; delayMs: number; notBefore: Date }
  | { action: "terminal"; reason: string };

export function computeBackoffDelay(attempts: number, config: Pick<RetryConfig, "base_delay_ms" | "max_delay_ms">): number {
  const n = Math.max(0, attempts);
  return Math.min(config.base_delay_ms * Math.pow(2, n), config.max_delay_ms);
}

const TERMINAL_REASONS: Partial<Record<JobErrorKind, string>> = {
  auth_required: "platform requires authentication",
  not_found: "media not found",
  removed: "media removed by platform",
  cancelled: "cancelled",
  internal: "internal error",
};

export class RetryScheduler {
  constructor(private readonly config: RetryConfig) {}

  /**
   * @param hintMs server-provided wait (e.g. a rate limit's retry-after); the
   * computed backoff is raised to it but never past `max_delay_ms`.
   */
  decide(job: Pick<Job, "attempts">, error: JobError, now: Date, hintMs?: number | null): RetryDecision {
    if (job.attempts >= this.config.max_attempts) {
      return { action: "terminal", reason: `attempt limit reached (${job.attempts}/${this.config.max_attempts})` };
    }
    if (error.kind === "fingerprint" && error.occurrences >= this.config.fingerprint_failure_limit) {
      return { action: "terminal", reason: `fingerprint failed ${error.occurrences} times in a row` };
    }
    if (!isRetryableKind(error.kind)) {
      return { action: "terminal", reason: TERMINAL_REASONS[error.kind] ?? error.kind };
    }

    let delayMs = computeBackoffDelay(job.attempts, this.config);
    if (hintMs && hintMs > delayMs) delayMs = Math.min(hintMs, this.config.max_delay_ms);
    return { action: "retry", delayMs, notBefore: new Date(now.getTime() + delayMs) };
  }
}
