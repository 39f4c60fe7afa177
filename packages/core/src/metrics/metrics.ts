import client from "prom-client";

export type Metrics = {
  register: client.Registry;
  jobsTotal: client.Counter<"status">;
  jobDurationMs: client.Histogram<"status">;
  stageDurationMs: client.Histogram<"stage">;
  extractorFragmentsTotal: client.Counter<"source">;
  extractorFailuresTotal: client.Counter<"source">;
};

declare global {
  var __vea_metrics__: Metrics | undefined;
}

export function initMetrics(): Metrics {
  if (globalThis.__vea_metrics__) return globalThis.__vea_metrics__;

  const register = new client.Registry();
  client.collectDefaultMetrics({ register });

  const jobsTotal = new client.Counter({
    name: "vea_jobs_total",
    help: "Job attempts by outcome status",
    labelNames: ["status"] as const,
    registers: [register],
  });

  const jobDurationMs = new client.Histogram({
    name: "vea_job_duration_ms",
    help: "Job attempt duration in ms",
    labelNames: ["status"] as const,
    buckets: [250, 1_000, 5_000, 15_000, 30_000, 60_000, 120_000, 300_000, 600_000, 1_800_000],
    registers: [register],
  });

  const stageDurationMs = new client.Histogram({
    name: "vea_stage_duration_ms",
    help: "Pipeline stage duration in ms",
    labelNames: ["stage"] as const,
    buckets: [10, 50, 250, 1_000, 5_000, 15_000, 60_000, 300_000, 900_000],
    registers: [register],
  });

  const extractorFragmentsTotal = new client.Counter({
    name: "vea_extractor_fragments_total",
    help: "Evidence fragments produced",
    labelNames: ["source"] as const,
    registers: [register],
  });

  const extractorFailuresTotal = new client.Counter({
    name: "vea_extractor_failures_total",
    help: "Extractor invocations that failed",
    labelNames: ["source"] as const,
    registers: [register],
  });

  const m = { register, jobsTotal, jobDurationMs, stageDurationMs, extractorFragmentsTotal, extractorFailuresTotal };
  globalThis.__vea_metrics__ = m;
  return m;
}
