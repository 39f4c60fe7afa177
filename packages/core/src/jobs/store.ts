import { randomUUID } from "node:crypto";
import type { IngestEntry, Job, JobError, JobEvent, JobStatus, Platform } from "@archive/contracts";
import { assertTransition, isInFlight, isTerminal } from "./state-machine";

export type JobPatch = Partial<
  Pick<
    Job,
    | "next_attempt_at"
    | "last_error"
    | "media_path"
    | "content_hash"
    | "duration_seconds"
    | "width"
    | "height"
    | "duplicate_of"
    | "result"
    | "claimed_by"
    | "lease_expires_at"
  >
>;

export type ClaimOptions = {
  workerId: string;
  now: Date;
  leaseMs: number;
  /** A lease-expired job already claimed this many times is failed instead of reclaimed. */
  maxAttempts: number;
};

export type TransitionOptions = {
  /** Only apply when the job is still held by this worker. */
  owner?: string;
  now: Date;
};

export type JobEventInput = {
  level?: JobEvent["level"];
  message: string;
  from_status?: JobStatus | null;
  to_status?: JobStatus | null;
  data_json?: unknown;
};

export type StatusCounts = Record<JobStatus, number>;

/**
 * Durable per-URL job table. Every mutation is a compare-and-set keyed by url;
 * implementations must make `claimNext` and `transition` atomic.
 */
export interface JobStore {
  /** Insert a pending job unless one already exists for the url. */
  upsert(entry: IngestEntry & { platform: Platform }, now: Date): Promise<{ job: Job; created: boolean }>;
  get(url: string): Promise<Job | null>;
  /**
   * Claim the next runnable job: a pending job whose backoff has elapsed, or an
   * in-flight job whose lease expired (restarting it at `fetching`). Urgent
   * jobs first, then oldest `next_attempt_at`/`created_at`. Increments
   * `attempts`.
   */
  claimNext(opts: ClaimOptions): Promise<Job | null>;
  /** Extend the lease of an in-flight job still held by `owner`; false when the claim is gone. */
  renewLease(url: string, owner: string, until: Date, now: Date): Promise<boolean>;
  /** Move `from -> to` and apply `patch`; returns null when the job is no longer in `from`. */
  transition(url: string, from: JobStatus, to: JobStatus, patch: JobPatch, opts: TransitionOptions): Promise<Job | null>;
  /** Flag a job for cancellation; a pending job is failed on the spot. */
  requestCancel(url: string, now: Date): Promise<Job | null>;
  /** Jobs that `claimNext` would hand out at `now`. */
  listResumable(now: Date): Promise<Job[]>;
  /** Earliest future `next_attempt_at` among pending jobs. */
  nextWakeAt(): Promise<Date | null>;
  list(opts?: { statuses?: JobStatus[]; limit?: number }): Promise<Job[]>;
  countByStatus(): Promise<StatusCounts>;
  addEvent(url: string, event: JobEventInput, now: Date): Promise<void>;
  listEvents(url: string): Promise<JobEvent[]>;
}

export function emptyStatusCounts(): StatusCounts {
  return { pending: 0, fetching: 0, dedup_checking: 0, extracting: 0, fusing: 0, completed: 0, duplicate: 0, failed: 0 };
}

export function newPendingJob(entry: IngestEntry & { platform: Platform }, now: Date): Job {
  const ts = now.toISOString();
  return {
    url: entry.url,
    platform: entry.platform,
    status: "pending",
    priority: entry.priority,
    attempts: 0,
    last_attempt_at: null,
    next_attempt_at: null,
    last_error: null,
    media_path: null,
    content_hash: null,
    duration_seconds: null,
    width: null,
    height: null,
    duplicate_of: null,
    result: null,
    cancel_requested: false,
    claimed_by: null,
    lease_expires_at: null,
    created_at: ts,
    updated_at: ts,
    finished_at: null,
  };
}

export function isClaimable(job: Job, now: Date): boolean {
  if (job.status === "pending") {
    return !job.next_attempt_at || Date.parse(job.next_attempt_at) <= now.getTime();
  }
  if (isInFlight(job.status)) {
    return !job.lease_expires_at || Date.parse(job.lease_expires_at) <= now.getTime();
  }
  return false;
}

export function compareClaimOrder(a: Job, b: Job): number {
  if (a.priority !== b.priority) return a.priority === "urgent" ? -1 : 1;
  const at = Date.parse(a.next_attempt_at ?? a.created_at);
  const bt = Date.parse(b.next_attempt_at ?? b.created_at);
  if (at !== bt) return at - bt;
  return a.created_at < b.created_at ? -1 : a.created_at > b.created_at ? 1 : 0;
}

function cancelledError(stage: JobStatus): JobError {
  return { kind: "cancelled", message: "cancelled", stage, retryable: false, occurrences: 1 };
}

export const LOST_LEASE_LIMIT_MESSAGE = "attempt limit reached after lost lease";

/** Error recorded when a job keeps losing its worker and has no attempts left. */
export function lostLeaseError(job: Pick<Job, "status" | "last_error">): JobError {
  const previous = job.last_error;
  return {
    kind: "internal",
    message: LOST_LEASE_LIMIT_MESSAGE,
    stage: job.status,
    retryable: false,
    occurrences: previous && previous.kind === "internal" ? previous.occurrences + 1 : 1,
  };
}

export function lostLeaseEvent(job: Pick<Job, "status" | "attempts">): JobEventInput {
  return {
    level: "warn",
    message: "failed",
    from_status: job.status,
    to_status: "failed",
    data_json: { kind: "internal", message: LOST_LEASE_LIMIT_MESSAGE, attempts: job.attempts },
  };
}

/** Process-local store. Used by tests and dry runs; not durable across restarts. */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();
  private readonly events = new Map<string, JobEvent[]>();

  async upsert(entry: IngestEntry & { platform: Platform }, now: Date): Promise<{ job: Job; created: boolean }> {
    const existing = this.jobs.get(entry.url);
    if (existing) return { job: { ...existing }, created: false };
    const job = newPendingJob(entry, now);
    this.jobs.set(job.url, job);
    return { job: { ...job }, created: true };
  }

  async get(url: string): Promise<Job | null> {
    const job = this.jobs.get(url);
    return job ? { ...job } : null;
  }

  async claimNext(opts: ClaimOptions): Promise<Job | null> {
    const candidates = [...this.jobs.values()].filter((j) => isClaimable(j, opts.now)).sort(compareClaimOrder);
    const ts = opts.now.toISOString();
    for (const job of candidates) {
      if (isInFlight(job.status) && job.attempts >= opts.maxAttempts) {
        this.jobs.set(job.url, {
          ...job,
          status: "failed",
          last_error: lostLeaseError(job),
          next_attempt_at: null,
          claimed_by: null,
          lease_expires_at: null,
          updated_at: ts,
          finished_at: ts,
        });
        await this.addEvent(job.url, lostLeaseEvent(job), opts.now);
        continue;
      }
      const claimed: Job = {
        ...job,
        status: "fetching",
        attempts: job.attempts + 1,
        last_attempt_at: ts,
        next_attempt_at: null,
        claimed_by: opts.workerId,
        lease_expires_at: new Date(opts.now.getTime() + opts.leaseMs).toISOString(),
        updated_at: ts,
      };
      this.jobs.set(job.url, claimed);
      return { ...claimed };
    }
    return null;
  }

  async renewLease(url: string, owner: string, until: Date, now: Date): Promise<boolean> {
    const job = this.jobs.get(url);
    if (!job || !isInFlight(job.status) || job.claimed_by !== owner) return false;
    this.jobs.set(url, { ...job, lease_expires_at: until.toISOString(), updated_at: now.toISOString() });
    return true;
  }

  async transition(url: string, from: JobStatus, to: JobStatus, patch: JobPatch, opts: TransitionOptions): Promise<Job | null> {
    assertTransition(from, to);
    const job = this.jobs.get(url);
    if (!job || job.status !== from) return null;
    if (opts.owner !== undefined && job.claimed_by !== opts.owner) return null;
    const ts = opts.now.toISOString();
    const next: Job = {
      ...job,
      ...patch,
      status: to,
      updated_at: ts,
      finished_at: isTerminal(to) ? ts : job.finished_at,
    };
    if (isTerminal(to) || to === "pending") {
      next.claimed_by = null;
      next.lease_expires_at = null;
    }
    this.jobs.set(url, next);
    return { ...next };
  }

  async requestCancel(url: string, now: Date): Promise<Job | null> {
    const job = this.jobs.get(url);
    if (!job) return null;
    if (isTerminal(job.status)) return { ...job };
    const ts = now.toISOString();
    const next: Job =
      job.status === "pending"
        ? {
            ...job,
            status: "failed",
            cancel_requested: true,
            last_error: cancelledError("pending"),
            next_attempt_at: null,
            updated_at: ts,
            finished_at: ts,
          }
        : { ...job, cancel_requested: true, updated_at: ts };
    this.jobs.set(url, next);
    return { ...next };
  }

  async listResumable(now: Date): Promise<Job[]> {
    return [...this.jobs.values()]
      .filter((j) => isClaimable(j, now))
      .sort(compareClaimOrder)
      .map((j) => ({ ...j }));
  }

  async nextWakeAt(): Promise<Date | null> {
    let earliest: number | null = null;
    for (const j of this.jobs.values()) {
      if (j.status !== "pending" || !j.next_attempt_at) continue;
      const t = Date.parse(j.next_attempt_at);
      if (earliest === null || t < earliest) earliest = t;
    }
    return earliest === null ? null : new Date(earliest);
  }

  async list(opts?: { statuses?: JobStatus[]; limit?: number }): Promise<Job[]> {
    const statuses = opts?.statuses;
    const out = [...this.jobs.values()]
      .filter((j) => !statuses || statuses.includes(j.status))
      .sort((a, b) => (a.created_at < b.created_at ? -1 : a.created_at > b.created_at ? 1 : a.url.localeCompare(b.url)))
      .map((j) => ({ ...j }));
    return opts?.limit ? out.slice(0, opts.limit) : out;
  }

  async countByStatus(): Promise<StatusCounts> {
    const out = emptyStatusCounts();
    for (const j of this.jobs.values()) out[j.status] += 1;
    return out;
  }

  async addEvent(url: string, event: JobEventInput, now: Date): Promise<void> {
    const list = this.events.get(url) ?? [];
    list.push({
      id: randomUUID(),
      url,
      ts: now.toISOString(),
      level: event.level ?? "info",
      message: event.message,
      from_status: event.from_status ?? null,
      to_status: event.to_status ?? null,
      data_json: event.data_json ?? null,
    });
    this.events.set(url, list);
  }

  async listEvents(url: string): Promise<JobEvent[]> {
    return [...(this.events.get(url) ?? [])];
  }
}
