import test from "node:test";
import assert from "node:assert/strict";
import { canTransition, InvalidTransitionError } from "../src/jobs/state-machine";
import { InMemoryJobStore } from "../src/jobs/store";

const T0 = new Date("2026-03-01T12:00:00.000Z");

function at(ms: number): Date {
  return new Date(T0.getTime() + ms);
}

test("transition table", () => {
  assert.equal(canTransition("pending", "fetching"), true);
  assert.equal(canTransition("dedup_checking", "duplicate"), true);
  assert.equal(canTransition("extracting", "pending"), false);
  assert.equal(canTransition("fusing", "completed"), true);
  assert.equal(canTransition("completed", "pending"), false);
  assert.equal(canTransition("failed", "fetching"), false);
  for (const from of ["pending", "fetching", "dedup_checking", "extracting", "fusing"] as const) {
    assert.equal(canTransition(from, "failed"), true, from);
  }
});

test("upsert creates a pending job once per url", async () => {
  const store = new InMemoryJobStore();
  const first = await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  assert.equal(first.created, true);
  assert.equal(first.job.status, "pending");
  assert.equal(first.job.attempts, 0);
  assert.equal(first.job.created_at, "2026-03-01T12:00:00.000Z");

  const again = await store.upsert({ url: "https://x.com/a/status/1", priority: "urgent", platform: "twitter" }, at(1000));
  assert.equal(again.created, false);
  assert.equal(again.job.priority, "normal");
  assert.equal((await store.list()).length, 1);
});

test("claimNext hands out urgent jobs first, then the oldest", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.upsert({ url: "https://x.com/a/status/2", priority: "normal", platform: "twitter" }, at(1));
  await store.upsert({ url: "https://x.com/a/status/3", priority: "urgent", platform: "twitter" }, at(2));

  const order: string[] = [];
  for (;;) {
    const job = await store.claimNext({ workerId: "w1", now: at(10), leaseMs: 60_000, maxAttempts: 5 });
    if (!job) break;
    order.push(job.url);
  }
  assert.deepEqual(order, ["https://x.com/a/status/3", "https://x.com/a/status/1", "https://x.com/a/status/2"]);
});

test("claimNext marks the job fetching, counts the attempt and takes a lease", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  const job = await store.claimNext({ workerId: "w1", now: at(5_000), leaseMs: 60_000, maxAttempts: 5 });
  assert.ok(job);
  assert.equal(job.status, "fetching");
  assert.equal(job.attempts, 1);
  assert.equal(job.claimed_by, "w1");
  assert.equal(job.last_attempt_at, "2026-03-01T12:00:05.000Z");
  assert.equal(job.lease_expires_at, "2026-03-01T12:01:05.000Z");
  assert.equal(await store.claimNext({ workerId: "w2", now: at(6_000), leaseMs: 60_000, maxAttempts: 5 }), null);
});

test("a job whose lease expired is reclaimed from the start", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  const first = await store.claimNext({ workerId: "w1", now: T0, leaseMs: 1_000, maxAttempts: 5 });
  assert.ok(first);
  await store.transition(first.url, "fetching", "dedup_checking", {}, { owner: "w1", now: at(500) });

  assert.equal((await store.listResumable(at(900))).length, 0);
  assert.equal((await store.listResumable(at(1_000))).length, 1);

  const reclaimed = await store.claimNext({ workerId: "w2", now: at(2_000), leaseMs: 1_000, maxAttempts: 5 });
  assert.equal(reclaimed?.status, "fetching");
  assert.equal(reclaimed?.attempts, 2);
  assert.equal(reclaimed?.claimed_by, "w2");

  // The old owner's compare-and-set now misses.
  assert.equal(await store.transition(first.url, "fetching", "dedup_checking", {}, { owner: "w1", now: at(2_100) }), null);
});

test("a job that keeps losing its lease fails once the attempt limit is used", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);

  const attempts: number[] = [];
  for (let i = 0; i < 12; i++) {
    const job = await store.claimNext({ workerId: "w1", now: at(i * 2_000), leaseMs: 1_000, maxAttempts: 3 });
    if (!job) break;
    attempts.push(job.attempts);
  }
  assert.deepEqual(attempts, [1, 2, 3]);

  const job = await store.get("https://x.com/a/status/1");
  assert.equal(job?.status, "failed");
  assert.equal(job?.attempts, 3);
  assert.equal(job?.claimed_by, null);
  assert.equal(job?.finished_at, "2026-03-01T12:00:06.000Z");
  assert.deepEqual(job?.last_error, {
    kind: "internal",
    message: "attempt limit reached after lost lease",
    stage: "fetching",
    retryable: false,
    occurrences: 1,
  });
  const last = (await store.listEvents("https://x.com/a/status/1")).at(-1);
  assert.equal(last?.level, "warn");
  assert.equal(last?.from_status, "fetching");
  assert.equal(last?.to_status, "failed");
  assert.deepEqual(last?.data_json, { kind: "internal", message: "attempt limit reached after lost lease", attempts: 3 });
});

test("renewLease extends only the owner's in-flight claim", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.claimNext({ workerId: "w1", now: T0, leaseMs: 1_000, maxAttempts: 5 });

  assert.equal(await store.renewLease("https://x.com/a/status/1", "w2", at(5_000), at(500)), false);
  assert.equal(await store.renewLease("https://x.com/a/status/1", "w1", at(5_000), at(500)), true);
  assert.equal((await store.get("https://x.com/a/status/1"))?.lease_expires_at, "2026-03-01T12:00:05.000Z");
  assert.equal(await store.claimNext({ workerId: "w2", now: at(2_000), leaseMs: 1_000, maxAttempts: 5 }), null);

  await store.transition("https://x.com/a/status/1", "fetching", "failed", {}, { owner: "w1", now: at(3_000) });
  assert.equal(await store.renewLease("https://x.com/a/status/1", "w1", at(9_000), at(3_500)), false);
  assert.equal(await store.renewLease("https://x.com/a/status/9", "w1", at(9_000), at(3_500)), false);
});

test("transition is a compare-and-set on status", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.claimNext({ workerId: "w1", now: T0, leaseMs: 60_000, maxAttempts: 5 });

  assert.equal(await store.transition("https://x.com/a/status/1", "extracting", "fusing", {}, { now: at(1) }), null);
  await assert.rejects(
    store.transition("https://x.com/a/status/1", "fetching", "completed", {}, { now: at(1) }),
    InvalidTransitionError
  );

  const moved = await store.transition(
    "https://x.com/a/status/1",
    "fetching",
    "dedup_checking",
    { media_path: "/tmp/m.mp4", duration_seconds: 12 },
    { owner: "w1", now: at(2) }
  );
  assert.equal(moved?.status, "dedup_checking");
  assert.equal(moved?.media_path, "/tmp/m.mp4");
  assert.equal(moved?.claimed_by, "w1");
  assert.equal(moved?.finished_at, null);
});

test("re-queueing releases the claim and gates the next attempt", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.claimNext({ workerId: "w1", now: T0, leaseMs: 60_000, maxAttempts: 5 });
  const requeued = await store.transition(
    "https://x.com/a/status/1",
    "fetching",
    "pending",
    {
      next_attempt_at: at(60_000).toISOString(),
      last_error: { kind: "rate_limited", message: "429", stage: "fetching", retryable: true, occurrences: 1 },
    },
    { owner: "w1", now: at(10) }
  );
  assert.equal(requeued?.claimed_by, null);
  assert.equal(requeued?.lease_expires_at, null);
  assert.equal((await store.nextWakeAt())?.toISOString(), "2026-03-01T12:01:00.000Z");

  assert.equal(await store.claimNext({ workerId: "w1", now: at(59_999), leaseMs: 60_000, maxAttempts: 5 }), null);
  const retried = await store.claimNext({ workerId: "w1", now: at(60_000), leaseMs: 60_000, maxAttempts: 5 });
  assert.equal(retried?.attempts, 2);
  assert.equal(retried?.next_attempt_at, null);
  assert.equal(retried?.last_error?.kind, "rate_limited");
});

test("terminal transitions stamp finished_at", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.claimNext({ workerId: "w1", now: T0, leaseMs: 60_000, maxAttempts: 5 });
  const failed = await store.transition("https://x.com/a/status/1", "fetching", "failed", {}, { owner: "w1", now: at(42) });
  assert.equal(failed?.finished_at, "2026-03-01T12:00:00.042Z");
  assert.equal(failed?.claimed_by, null);
  assert.deepEqual(await store.listResumable(at(10_000_000)), []);
});

test("requestCancel fails a pending job at once and flags an in-flight one", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.upsert({ url: "https://x.com/a/status/2", priority: "normal", platform: "twitter" }, at(1));
  await store.claimNext({ workerId: "w1", now: at(2), leaseMs: 60_000, maxAttempts: 5 });

  const pending = await store.requestCancel("https://x.com/a/status/2", at(3));
  assert.equal(pending?.status, "failed");
  assert.deepEqual(pending?.last_error, { kind: "cancelled", message: "cancelled", stage: "pending", retryable: false, occurrences: 1 });

  const inFlight = await store.requestCancel("https://x.com/a/status/1", at(4));
  assert.equal(inFlight?.status, "fetching");
  assert.equal(inFlight?.cancel_requested, true);

  assert.equal(await store.requestCancel("https://x.com/a/status/9", at(5)), null);
});

test("countByStatus and list filters", async () => {
  const store = new InMemoryJobStore();
  await store.upsert({ url: "https://x.com/a/status/1", priority: "normal", platform: "twitter" }, T0);
  await store.upsert({ url: "https://x.com/a/status/2", priority: "normal", platform: "twitter" }, at(1));
  await store.requestCancel("https://x.com/a/status/2", at(2));

  const counts = await store.countByStatus();
  assert.equal(counts.pending, 1);
  assert.equal(counts.failed, 1);
  assert.equal(counts.completed, 0);
  assert.deepEqual(
    (await store.list({ statuses: ["failed"] })).map((j) => j.url),
    ["https://x.com/a/status/2"]
  );
});

test("events are kept in insertion order", async () => {
  const store = new InMemoryJobStore();
  await store.addEvent("https://x.com/a/status/1", { message: "ingested", to_status: "pending" }, T0);
  await store.addEvent("https://x.com/a/status/1", { level: "warn", message: "extractor x failed" }, at(1));
  const events = await store.listEvents("https://x.com/a/status/1");
  assert.deepEqual(
    events.map((e) => [e.level, e.message, e.to_status]),
    [
      ["info", "ingested", "pending"],
      ["warn", "extractor x failed", null],
    ]
  );
});
