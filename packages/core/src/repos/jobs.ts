import { JobEventSchema, JobSchema, type IngestEntry, type Job, type JobEvent, type JobStatus, type Platform } from "@archive/contracts";
import type pg from "pg";
import { assertTransition, isTerminal } from "../jobs/state-machine";
import {
  emptyStatusCounts,
  lostLeaseError,
  lostLeaseEvent,
  type ClaimOptions,
  type JobEventInput,
  type JobPatch,
  type JobStore,
  type StatusCounts,
  type TransitionOptions,
} from "../jobs/store";

function iso(expr: string, alias: string = expr): string {
  return `to_char(${expr} AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"') as ${alias}`;
}

const JOB_COLUMNS = `
  url,
  platform,
  status,
  priority,
  attempts,
  ${iso("last_attempt_at")},
  ${iso("next_attempt_at")},
  last_error,
  media_path,
  content_hash,
  duration_seconds,
  width,
  height,
  duplicate_of,
  result,
  cancel_requested,
  claimed_by,
  ${iso("lease_expires_at")},
  ${iso("created_at")},
  ${iso("updated_at")},
  ${iso("finished_at")}
`;

const IN_FLIGHT_SQL = `('fetching','dedup_checking','extracting','fusing')`;

// Columns a transition patch may write; jsonb ones are serialized explicitly.
const PATCH_COLUMNS: ReadonlyArray<{ key: keyof JobPatch; json: boolean }> = [
  { key: "next_attempt_at", json: false },
  { key: "last_error", json: true },
  { key: "media_path", json: false },
  { key: "content_hash", json: false },
  { key: "duration_seconds", json: false },
  { key: "width", json: false },
  { key: "height", json: false },
  { key: "duplicate_of", json: false },
  { key: "result", json: true },
  { key: "claimed_by", json: false },
  { key: "lease_expires_at", json: false },
];

const INSERT_EVENT_SQL = `INSERT INTO job_events (url, ts, level, message, from_status, to_status, data_json) VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb)`;

function eventParams(url: string, event: JobEventInput, now: Date): unknown[] {
  return [
    url,
    now.toISOString(),
    event.level ?? "info",
    event.message,
    event.from_status ?? null,
    event.to_status ?? null,
    event.data_json === undefined ? null : JSON.stringify(event.data_json),
  ];
}

function parseJob(row: unknown): Job {
  return JobSchema.parse(row);
}

export class PgJobStore implements JobStore {
  constructor(private readonly pool: pg.Pool) {}

  async upsert(entry: IngestEntry & { platform: Platform }, now: Date): Promise<{ job: Job; created: boolean }> {
    const inserted = await this.pool.query(
      `
      INSERT INTO jobs (url, platform, priority, created_at, updated_at)
      VALUES ($1, $2, $3, $4, $4)
      ON CONFLICT (url) DO NOTHING
      RETURNING ${JOB_COLUMNS}
      `,
      [entry.url, entry.platform, entry.priority, now.toISOString()]
    );
    if (inserted.rowCount) return { job: parseJob(inserted.rows[0]), created: true };
    const existing = await this.get(entry.url);
    if (!existing) throw new Error(`job for ${entry.url} vanished during upsert`);
    return { job: existing, created: false };
  }

  async get(url: string): Promise<Job | null> {
    const res = await this.pool.query(`SELECT ${JOB_COLUMNS} FROM jobs WHERE url = $1`, [url]);
    if (res.rowCount === 0) return null;
    return parseJob(res.rows[0]);
  }

  async claimNext(opts: ClaimOptions): Promise<Job | null> {
    await this.failExhaustedLeases(opts);
    const now = opts.now.toISOString();
    const lease = new Date(opts.now.getTime() + opts.leaseMs).toISOString();
    const res = await this.pool.query(
      `
      UPDATE jobs
      SET
        status = 'fetching',
        attempts = attempts + 1,
        last_attempt_at = $2,
        next_attempt_at = NULL,
        claimed_by = $1,
        lease_expires_at = $3,
        updated_at = $2
      WHERE url = (
        SELECT url FROM jobs
        WHERE (status = 'pending' AND (next_attempt_at IS NULL OR next_attempt_at <= $2))
           OR (status IN ${IN_FLIGHT_SQL} AND (lease_expires_at IS NULL OR lease_expires_at <= $2))
        ORDER BY (priority = 'urgent') DESC, COALESCE(next_attempt_at, created_at) ASC, created_at ASC
        LIMIT 1
        FOR UPDATE SKIP LOCKED
      )
      RETURNING ${JOB_COLUMNS}
      `,
      [opts.workerId, now, lease]
    );
    if (res.rowCount === 0) return null;
    return parseJob(res.rows[0]);
  }

  /** Lease-expired jobs with no attempts left are failed rather than handed out again. */
  private async failExhaustedLeases(opts: ClaimOptions): Promise<void> {
    const now = opts.now.toISOString();
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      try {
        const res = await client.query(
          `
          SELECT ${JOB_COLUMNS}
          FROM jobs
          WHERE status IN ${IN_FLIGHT_SQL}
            AND (lease_expires_at IS NULL OR lease_expires_at <= $1)
            AND attempts >= $2
          FOR UPDATE SKIP LOCKED
          `,
          [now, opts.maxAttempts]
        );
        for (const row of res.rows) {
          const job = parseJob(row);
          await client.query(
            `
            UPDATE jobs
            SET
              status = 'failed',
              last_error = $2::jsonb,
              next_attempt_at = NULL,
              claimed_by = NULL,
              lease_expires_at = NULL,
              updated_at = $3,
              finished_at = $3
            WHERE url = $1
            `,
            [job.url, JSON.stringify(lostLeaseError(job)), now]
          );
          await client.query(INSERT_EVENT_SQL, eventParams(job.url, lostLeaseEvent(job), opts.now));
        }
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
    } finally {
      client.release();
    }
  }

  async renewLease(url: string, owner: string, until: Date, now: Date): Promise<boolean> {
    const res = await this.pool.query(
      `
      UPDATE jobs
      SET lease_expires_at = $3, updated_at = $4
      WHERE url = $1 AND claimed_by = $2 AND status IN ${IN_FLIGHT_SQL}
      `,
      [url, owner, until.toISOString(), now.toISOString()]
    );
    return (res.rowCount ?? 0) > 0;
  }

  async transition(url: string, from: JobStatus, to: JobStatus, patch: JobPatch, opts: TransitionOptions): Promise<Job | null> {
    assertTransition(from, to);
    const now = opts.now.toISOString();
    const params: unknown[] = [url, from, to, now];
    const sets = ["status = $3", "updated_at = $4"];
    if (isTerminal(to)) sets.push("finished_at = $4");

    const releaseClaim = isTerminal(to) || to === "pending";
    for (const col of PATCH_COLUMNS) {
      if (!(col.key in patch)) continue;
      if (releaseClaim && (col.key === "claimed_by" || col.key === "lease_expires_at")) continue;
      const value = patch[col.key];
      params.push(col.json && value !== null && value !== undefined ? JSON.stringify(value) : value ?? null);
      sets.push(`${col.key} = $${params.length}${col.json ? "::jsonb" : ""}`);
    }
    if (releaseClaim) sets.push("claimed_by = NULL", "lease_expires_at = NULL");

    let where = "url = $1 AND status = $2";
    if (opts.owner !== undefined) {
      params.push(opts.owner);
      where += ` AND claimed_by = $${params.length}`;
    }

    const res = await this.pool.query(`UPDATE jobs SET ${sets.join(", ")} WHERE ${where} RETURNING ${JOB_COLUMNS}`, params);
    if (res.rowCount === 0) return null;
    return parseJob(res.rows[0]);
  }

  async requestCancel(url: string, now: Date): Promise<Job | null> {
    const cancelled = JSON.stringify({ kind: "cancelled", message: "cancelled", stage: "pending", retryable: false, occurrences: 1 });
    const res = await this.pool.query(
      `
      UPDATE jobs
      SET
        cancel_requested = true,
        updated_at = $2,
        status = CASE WHEN status = 'pending' THEN 'failed' ELSE status END,
        last_error = CASE WHEN status = 'pending' THEN $3::jsonb ELSE last_error END,
        next_attempt_at = CASE WHEN status = 'pending' THEN NULL ELSE next_attempt_at END,
        finished_at = CASE WHEN status = 'pending' THEN $2 ELSE finished_at END
      WHERE url = $1 AND status NOT IN ('completed','duplicate','failed')
      RETURNING ${JOB_COLUMNS}
      `,
      [url, now.toISOString(), cancelled]
    );
    if (res.rowCount) return parseJob(res.rows[0]);
    return this.get(url);
  }

  async listResumable(now: Date): Promise<Job[]> {
    const res = await this.pool.query(
      `
      SELECT ${JOB_COLUMNS}
      FROM jobs
      WHERE (status = 'pending' AND (next_attempt_at IS NULL OR next_attempt_at <= $1))
         OR (status IN ${IN_FLIGHT_SQL} AND (lease_expires_at IS NULL OR lease_expires_at <= $1))
      ORDER BY (priority = 'urgent') DESC, COALESCE(next_attempt_at, created_at) ASC, created_at ASC
      `,
      [now.toISOString()]
    );
    return res.rows.map(parseJob);
  }

  async nextWakeAt(): Promise<Date | null> {
    const res = await this.pool.query<{ wake: string | null }>(
      `SELECT ${iso("min(next_attempt_at)", "wake")} FROM jobs WHERE status = 'pending'`
    );
    const wake = res.rows[0]?.wake ?? null;
    return wake ? new Date(wake) : null;
  }

  async list(opts?: { statuses?: JobStatus[]; limit?: number }): Promise<Job[]> {
    const limit = Math.min(opts?.limit ?? 10_000, 100_000);
    const res = await this.pool.query(
      `
      SELECT ${JOB_COLUMNS}
      FROM jobs
      WHERE ($1::text[] IS NULL OR status = ANY($1::text[]))
      ORDER BY created_at ASC, url ASC
      LIMIT $2
      `,
      [opts?.statuses ?? null, limit]
    );
    return res.rows.map(parseJob);
  }

  async countByStatus(): Promise<StatusCounts> {
    const res = await this.pool.query<{ status: string; n: string }>(
      "SELECT status, count(*)::text AS n FROM jobs GROUP BY status"
    );
    const out = emptyStatusCounts();
    for (const row of res.rows) {
      const parsed = JobSchema.shape.status.safeParse(row.status);
      if (parsed.success) out[parsed.data] = Number(row.n);
    }
    return out;
  }

  async addEvent(url: string, event: JobEventInput, now: Date): Promise<void> {
    await this.pool.query(INSERT_EVENT_SQL, eventParams(url, event, now));
  }

  async listEvents(url: string): Promise<JobEvent[]> {
    const res = await this.pool.query(
      `
      SELECT
        id::text as id,
        url,
        ${iso("ts")},
        level,
        message,
        from_status,
        to_status,
        data_json
      FROM job_events
      WHERE url = $1
      ORDER BY ts ASC, id ASC
      `,
      [url]
    );
    return res.rows.map((r) => JobEventSchema.parse(r));
  }
}
