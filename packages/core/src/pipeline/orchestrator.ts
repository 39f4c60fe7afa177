import crypto from "node:crypto";
import path from "node:path";
import pLimit from "p-limit";
import {
  TERMINAL_STATUSES,
  type EvidenceFragment,
  type EvidenceSource,
  type ExportRecord,
  type IngestEntry,
  type Job,
  type JobError,
  type JobStatus,
  type PipelineConfig,
  type ProposedTag,
} from "@archive/contracts";
import type { ArchiveIndex } from "../archive/archive-index";
import { PlatformError, toJobError } from "../errors";
import type { ExtractionContext, LabelProposal, SignalExtractor } from "../extractors/types";
import { shouldRunVision } from "../extractors/visual-description";
import type { Fingerprinter } from "../frames/fingerprint";
import { fuse } from "../fusion/fuse";
import { RetryScheduler } from "../jobs/retry";
import { canTransition } from "../jobs/state-machine";
import { emptyStatusCounts, type JobPatch, type JobStore, type StatusCounts } from "../jobs/store";
import { logger as rootLogger, type Logger } from "../logger";
import type { Metrics } from "../metrics/metrics";
import { detectPlatform, normalizeJobUrl } from "../platform/detect";
import type { FetchedMedia, PlatformGateway } from "../platform/gateway";
import type { ProposedTagLog } from "../taxonomy/proposed-tags";
import type { TagRelationships } from "../taxonomy/relationships";

const MAX_IDLE_SLEEP_MS = 5_000;
const ERROR_BACKOFF_MS = 1_000;
const MIN_HEARTBEAT_MS = 1_000;

export type OrchestratorDeps = {
  store: JobStore;
  archive: ArchiveIndex;
  gateway: PlatformGateway;
  fingerprinter: Fingerprinter;
  /** Required extractors always run; optional ones follow `extraction.vision_mode`. */
  extractors: SignalExtractor[];
  relationships: TagRelationships;
  proposedTags: ProposedTagLog;
  config: PipelineConfig;
  logger?: Logger;
  metrics?: Metrics | null;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  workerId?: string;
};

export type RunOptions = {
  /** Keep running through backoff windows until every job is terminal. */
  waitForBackoff?: boolean;
  concurrency?: number;
  signal?: AbortSignal;
};

export type RunSummary = {
  processed: number;
  /** Status each processed attempt ended in (`pending` = re-queued with backoff). */
  outcomes: StatusCounts;
};

export type IngestSummary = {
  created: Job[];
  existing: Job[];
};

/** The job no longer holds the claim this worker expected (lease lost or state changed). */
class ClaimLostError extends Error {
  constructor(
    readonly url: string,
    readonly from: JobStatus,
    readonly to: JobStatus
  ) {
    super(`lost claim on ${url} moving ${from} -> ${to}`);
    this.name = "ClaimLostError";
  }
}

function jobDirName(url: string): string {
  return crypto.createHash("sha256").update(url).digest("hex").slice(0, 16);
}

function cancelledError(stage: JobStatus): JobError {
  return { kind: "cancelled", message: "cancelled", stage, retryable: false, occurrences: 1 };
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Drives jobs through fetch, dedup, extraction and fusion. All shared state
 * lives in the injected JobStore and ArchiveIndex, so several orchestrators
 * (or processes) can work the same table.
 */
export class PipelineOrchestrator {
  private readonly store: JobStore;
  private readonly log: Logger;
  private readonly metrics: Metrics | null;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly retry: RetryScheduler;
  private readonly compute: ReturnType<typeof pLimit>;
  private readonly workerId: string;

  private active = 0;
  private waiters: Array<() => void> = [];
  /** url -> worker id, for every attempt this orchestrator is driving. */
  private readonly held = new Map<string, string>();

  constructor(private readonly deps: OrchestratorDeps) {
    this.store = deps.store;
    this.log = deps.logger ?? rootLogger.child({ component: "orchestrator" });
    this.metrics = deps.metrics ?? null;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.retry = new RetryScheduler(deps.config.retry);
    this.compute = pLimit(deps.config.compute_concurrency);
    this.workerId = deps.workerId ?? `worker-${process.pid}`;
  }

  // ── Queue operations ──────────────────────────────────────────────────────

  async ingest(entries: IngestEntry[]): Promise<IngestSummary> {
    const out: IngestSummary = { created: [], existing: [] };
    for (const entry of entries) {
      const url = normalizeJobUrl(entry.url);
      const { job, created } = await this.store.upsert({ url, priority: entry.priority, platform: detectPlatform(url) }, this.now());
      if (created) {
        await this.store.addEvent(url, { message: "ingested", to_status: "pending", data_json: { priority: job.priority } }, this.now());
        out.created.push(job);
      } else {
        out.existing.push(job);
      }
    }
    this.log.info({ created: out.created.length, existing: out.existing.length }, "ingested urls");
    return out;
  }

  async requestCancel(url: string): Promise<Job | null> {
    const before = await this.store.get(url);
    const job = await this.store.requestCancel(url, this.now());
    if (!job || !before) return job;
    if (before.status === "pending" && job.status === "failed") {
      await this.store.addEvent(url, { message: "cancelled", from_status: "pending", to_status: "failed" }, this.now());
    } else if (!before.cancel_requested && job.cancel_requested) {
      await this.store.addEvent(url, { message: "cancel requested", data_json: { status: job.status } }, this.now());
    }
    return job;
  }

  getJob(url: string): Promise<Job | null> {
    return this.store.get(normalizeJobUrl(url));
  }

  async exportResults(opts?: { statuses?: JobStatus[] }): Promise<ExportRecord[]> {
    const jobs = await this.store.list({ statuses: opts?.statuses ?? [...TERMINAL_STATUSES] });
    return jobs.map((j) => ({
      url: j.url,
      platform: j.platform,
      status: j.status,
      duplicate_of: j.duplicate_of,
      last_error: j.last_error,
      classification: j.result,
    }));
  }

  // ── Scheduling ────────────────────────────────────────────────────────────

  async run(opts?: RunOptions): Promise<RunSummary> {
    const concurrency = Math.max(1, opts?.concurrency ?? this.deps.config.concurrency);
    const summary: RunSummary = { processed: 0, outcomes: emptyStatusCounts() };
    const onAbort = () => this.notify();
    opts?.signal?.addEventListener("abort", onAbort);
    try {
      await Promise.all(
        Array.from({ length: concurrency }, (_, i) => this.workerLoop(`${this.workerId}-${i}`, summary, opts))
      );
    } finally {
      opts?.signal?.removeEventListener("abort", onAbort);
    }
    this.log.info({ processed: summary.processed, outcomes: summary.outcomes }, "run finished");
    return summary;
  }

  /** Claim and drive a single job; null when nothing is claimable. */
  async processNext(workerId: string = this.workerId): Promise<Job | null> {
    const job = await this.claim(workerId);
    if (!job) return null;
    return this.processJob(job, workerId);
  }

  /** Renew the leases this orchestrator holds first, so a long stage is never mistaken for a dead worker. */
  private async claim(workerId: string): Promise<Job | null> {
    await this.renewHeld();
    return this.store.claimNext({
      workerId,
      now: this.now(),
      leaseMs: this.deps.config.lease_ms,
      maxAttempts: this.deps.config.retry.max_attempts,
    });
  }

  private async workerLoop(workerId: string, summary: RunSummary, opts?: RunOptions): Promise<void> {
    while (!opts?.signal?.aborted) {
      let claimed: Job | null;
      try {
        claimed = await this.claim(workerId);
      } catch (err) {
        if (!opts?.waitForBackoff) throw err;
        this.log.error({ err, workerId }, "claim failed; backing off");
        await this.sleep(ERROR_BACKOFF_MS);
        continue;
      }
      if (claimed) {
        this.active += 1;
        try {
          const done = await this.processJob(claimed, workerId);
          summary.processed += 1;
          summary.outcomes[done.status] += 1;
        } finally {
          this.active -= 1;
          this.notify();
        }
        continue;
      }

      if (!opts?.waitForBackoff) return;

      const wake = await this.store.nextWakeAt();
      if (wake) {
        const delay = Math.max(0, wake.getTime() - this.now().getTime());
        this.log.debug({ workerId, delayMs: delay }, "waiting for backoff");
        await this.sleep(Math.min(delay, MAX_IDLE_SLEEP_MS));
      } else if (this.active > 0) {
        // Another worker may still re-queue its job.
        await new Promise<void>((resolve) => this.waiters.push(resolve));
      } else {
        this.notify();
        return;
      }
    }
  }

  private notify(): void {
    const waiting = this.waiters;
    this.waiters = [];
    for (const resolve of waiting) resolve();
  }

  // ── Leases ────────────────────────────────────────────────────────────────

  private async renewLease(url: string, owner: string): Promise<void> {
    const now = this.now();
    const renewed = await this.store.renewLease(url, owner, new Date(now.getTime() + this.deps.config.lease_ms), now);
    if (!renewed) this.log.warn({ url, workerId: owner }, "lease renewal missed; claim is gone");
  }

  private async renewHeld(): Promise<void> {
    for (const [url, owner] of [...this.held]) await this.renewLease(url, owner);
  }

  /** Keep the claim alive while a stage runs; the returned function stops it. */
  private startHeartbeat(url: string, owner: string): () => void {
    this.held.set(url, owner);
    const every = Math.max(MIN_HEARTBEAT_MS, Math.floor(this.deps.config.lease_ms / 3));
    const timer = setInterval(() => {
      this.renewLease(url, owner).catch((err: unknown) => this.log.warn({ err, url }, "lease heartbeat failed"));
    }, every);
    timer.unref();
    return () => {
      clearInterval(timer);
      this.held.delete(url);
    };
  }

  // ── One attempt ───────────────────────────────────────────────────────────

  /** Drive a claimed job (status `fetching`) until it is terminal or re-queued. */
  async processJob(claimed: Job, workerId: string): Promise<Job> {
    const log = this.log.child({ url: claimed.url, attempt: claimed.attempts, workerId });
    const startedAt = Date.now();
    log.info({ platform: claimed.platform, priority: claimed.priority }, "job claimed");

    let job = claimed;
    const stopHeartbeat = this.startHeartbeat(claimed.url, workerId);
    try {
      await this.store.addEvent(
        claimed.url,
        { message: "claimed", to_status: "fetching", data_json: { attempts: claimed.attempts, worker: workerId } },
        this.now()
      );
      job = await this.drive(claimed, workerId, log);
    } catch (err) {
      job = await this.recover(claimed, workerId, err, log);
    } finally {
      stopHeartbeat();
    }

    this.metrics?.jobsTotal.inc({ status: job.status });
    this.metrics?.jobDurationMs.observe({ status: job.status }, Date.now() - startedAt);
    log.info({ status: job.status, ms: Date.now() - startedAt }, "attempt finished");
    return job;
  }

  /**
   * An error outside the stage handlers (usually the store itself) still ends
   * the attempt through `fail`, so the job gets a `last_error` instead of
   * waiting out its lease. If the store cannot be reached at all, the lease
   * takes over.
   */
  private async recover(claimed: Job, workerId: string, err: unknown, log: Logger): Promise<Job> {
    try {
      if (err instanceof ClaimLostError) {
        log.warn({ from: err.from, to: err.to }, "claim lost; abandoning attempt");
        return (await this.store.get(claimed.url)) ?? claimed;
      }
      log.error({ err }, "attempt crashed");
      const current = await this.store.get(claimed.url);
      if (!current || current.claimed_by !== workerId || !canTransition(current.status, "failed")) return current ?? claimed;
      return await this.fail(current, workerId, err, log);
    } catch (inner) {
      log.error({ err: inner }, "could not record the crash; leaving the job to its lease");
      return claimed;
    }
  }

  private async drive(claimed: Job, workerId: string, log: Logger): Promise<Job> {
    let job = claimed;
    const workDir = path.join(this.deps.config.work_dir, jobDirName(job.url));

    // fetching
    if (await this.cancelRequested(job)) return this.cancel(job, workerId);
    let fetched: FetchedMedia;
    try {
      fetched = await this.timed("fetching", () => this.deps.gateway.fetch(job.url, { workDir }));
    } catch (err) {
      return this.fail(job, workerId, err, log);
    }
    job = await this.move(job, workerId, "dedup_checking", {
      media_path: fetched.asset.path,
      duration_seconds: fetched.asset.duration_seconds,
      width: fetched.asset.width,
      height: fetched.asset.height,
    });

    // dedup_checking
    if (await this.cancelRequested(job)) return this.cancel(job, workerId);
    let hash: string;
    let duplicateOf: string | null;
    try {
      hash = await this.timed("fingerprint", () => this.compute(() => this.deps.fingerprinter.fingerprint(fetched.asset)));
      const res = await this.deps.archive.checkAndInsert({
        url: job.url,
        hash,
        duration_seconds: fetched.asset.duration_seconds,
        width: fetched.asset.width,
        height: fetched.asset.height,
      });
      duplicateOf = res.duplicateOf?.url ?? null;
      if (res.duplicateOf) {
        log.info({ duplicateOf, distance: res.duplicateOf.distance, durationDelta: res.duplicateOf.duration_delta }, "duplicate media");
      }
    } catch (err) {
      return this.fail(job, workerId, err, log);
    }
    if (duplicateOf) {
      return this.move(job, workerId, "duplicate", { content_hash: hash, duplicate_of: duplicateOf, last_error: null });
    }
    job = await this.move(job, workerId, "extracting", { content_hash: hash });

    // extracting
    if (await this.cancelRequested(job)) return this.cancel(job, workerId);
    const asset = { ...fetched.asset, perceptual_hash: hash };
    const extraction = await this.timed("extracting", () => this.extract(job, asset, workDir, log));
    job = await this.move(job, workerId, "fusing", {});

    // fusing
    if (await this.cancelRequested(job)) return this.cancel(job, workerId);
    const result = fuse({
      fragments: extraction.fragments,
      relationships: this.deps.relationships,
      expectedSources: extraction.expected,
      requiredSources: extraction.required,
      config: this.deps.config.fusion,
      now: this.now(),
    });
    log.info(
      { category: result.category, confidence: result.overall_confidence, review: result.requires_review },
      "classified"
    );
    return this.move(job, workerId, "completed", { result, last_error: null }, {
      category: result.category,
      overall_confidence: result.overall_confidence,
      requires_review: result.requires_review,
    });
  }

  private async extract(
    job: Job,
    asset: FetchedMedia["asset"],
    workDir: string,
    log: Logger
  ): Promise<{ fragments: EvidenceFragment[]; expected: EvidenceSource[]; required: EvidenceSource[] }> {
    const proposals: ProposedTag[] = [];
    const ctx: ExtractionContext = {
      url: job.url,
      asset,
      workDir,
      config: this.deps.config.extraction,
      logger: log,
      compute: (fn) => this.compute(fn),
      propose: (items: LabelProposal[], source: EvidenceSource) => {
        const at = this.now().toISOString();
        for (const p of items) proposals.push({ ...p, url: job.url, source, proposed_at: at });
      },
    };

    const mode = this.deps.config.extraction.vision_mode;
    const required = this.deps.extractors.filter((e) => e.required);
    const optional = this.deps.extractors.filter((e) => !e.required);
    const firstPass = mode === "always" ? [...required, ...optional] : required;

    const fragments = (await Promise.all(firstPass.map((e) => this.runExtractor(e, ctx, job, log)))).flat();
    const ran = [...firstPass];

    if (mode === "auto" && optional.length) {
      const preliminary = fuse({
        fragments,
        relationships: this.deps.relationships,
        expectedSources: required.map((e) => e.source),
        config: this.deps.config.fusion,
        now: this.now(),
      });
      const run = shouldRunVision({
        mode,
        priority: job.priority,
        preliminary,
        relationships: this.deps.relationships,
        reviewThreshold: this.deps.config.fusion.review_threshold,
      });
      log.debug({ category: preliminary.category, confidence: preliminary.overall_confidence, run }, "vision gate");
      if (run) {
        fragments.push(...(await Promise.all(optional.map((e) => this.runExtractor(e, ctx, job, log)))).flat());
        ran.push(...optional);
      }
    }

    if (proposals.length) {
      try {
        await this.deps.proposedTags.append(proposals);
      } catch (err) {
        log.warn({ err, count: proposals.length }, "could not record proposed tags");
      }
    }

    return {
      fragments,
      expected: [...new Set(ran.map((e) => e.source))],
      required: [...new Set(ran.filter((e) => e.required).map((e) => e.source))],
    };
  }

  /** Collect an extractor's fragments; a failure keeps whatever it yielded first. */
  private async runExtractor(extractor: SignalExtractor, ctx: ExtractionContext, job: Job, log: Logger): Promise<EvidenceFragment[]> {
    const out: EvidenceFragment[] = [];
    const startedAt = Date.now();
    try {
      for await (const fragment of extractor.extract(ctx)) out.push(fragment);
    } catch (err) {
      const error = toJobError(err, "extracting");
      this.metrics?.extractorFailuresTotal.inc({ source: extractor.source });
      log.warn({ extractor: extractor.name, err }, "extractor failed");
      await this.store.addEvent(
        job.url,
        {
          level: "warn",
          message: `extractor ${extractor.name} failed`,
          data_json: { kind: error.kind, message: error.message, kept_fragments: out.length },
        },
        this.now()
      );
    }
    this.metrics?.extractorFragmentsTotal.inc({ source: extractor.source }, out.length);
    this.metrics?.stageDurationMs.observe({ stage: `extract:${extractor.name}` }, Date.now() - startedAt);
    log.debug({ extractor: extractor.name, fragments: out.length }, "extractor done");
    return out;
  }

  // ── Transitions ───────────────────────────────────────────────────────────

  private async timed<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      return await fn();
    } finally {
      this.metrics?.stageDurationMs.observe({ stage }, Date.now() - startedAt);
    }
  }

  private async cancelRequested(job: Job): Promise<boolean> {
    const current = await this.store.get(job.url);
    return Boolean(current?.cancel_requested);
  }

  /** Compare-and-set move that also renews the lease and records a JobEvent. */
  private async move(job: Job, owner: string, to: JobStatus, patch: JobPatch, data?: Record<string, unknown>): Promise<Job> {
    const now = this.now();
    const renewed: JobPatch = { ...patch };
    if (!TERMINAL_STATUSES.includes(to) && to !== "pending") {
      renewed.lease_expires_at = new Date(now.getTime() + this.deps.config.lease_ms).toISOString();
    }
    const next = await this.store.transition(job.url, job.status, to, renewed, { owner, now });
    if (!next) throw new ClaimLostError(job.url, job.status, to);
    await this.store.addEvent(
      job.url,
      {
        level: to === "failed" ? "warn" : "info",
        message: to === "pending" ? "re-queued" : to,
        from_status: job.status,
        to_status: to,
        data_json: data ?? null,
      },
      now
    );
    return next;
  }

  private cancel(job: Job, owner: string): Promise<Job> {
    this.log.info({ url: job.url, stage: job.status }, "job cancelled");
    return this.move(job, owner, "failed", { last_error: cancelledError(job.status) }, { reason: "cancelled" });
  }

  private async fail(job: Job, owner: string, err: unknown, log: Logger): Promise<Job> {
    const error = toJobError(err, job.status, job.last_error);
    const hint = err instanceof PlatformError ? err.retryAfterMs : null;
    const decision = this.retry.decide(job, error, this.now(), hint);

    if (decision.action === "retry" && canTransition(job.status, "pending")) {
      log.warn({ kind: error.kind, err, delayMs: decision.delayMs }, "attempt failed; retrying later");
      return this.move(
        job,
        owner,
        "pending",
        { last_error: error, next_attempt_at: decision.notBefore.toISOString() },
        { kind: error.kind, message: error.message, delay_ms: decision.delayMs }
      );
    }

    const reason = decision.action === "terminal" ? decision.reason : `${error.kind} is not retryable from ${job.status}`;
    log.error({ kind: error.kind, err, reason }, "job failed");
    return this.move(job, owner, "failed", { last_error: { ...error, retryable: false } }, { kind: error.kind, message: error.message, reason });
  }
}
