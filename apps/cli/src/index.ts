#!/usr/bin/env tsx
import { readFileSync, writeFileSync } from "node:fs";
import { Command } from "commander";
import { JobPrioritySchema, JobStatusSchema, TERMINAL_STATUSES, type JobStatus } from "@archive/contracts";
import {
  closePool,
  createRuntime,
  parseLabelledExamples,
  parseUrlList,
  runMigrations,
  scoreAgainstLabels,
  type PipelineRuntime,
} from "@archive/core";
import { formatDuration, printTable, truncate } from "./format.js";

function asInt(input: string | undefined, fallback: number): number {
  const n = Number(input);
  return input !== undefined && Number.isFinite(n) ? n : fallback;
}

function parseStatuses(input: string | undefined): JobStatus[] {
  if (!input) return [...TERMINAL_STATUSES];
  return input
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map((s) => JobStatusSchema.parse(s));
}

function handleErr(err: unknown): never {
  if (err instanceof Error) {
    console.error(`error: ${err.message}`);
    process.exit(1);
  }
  console.error(`error: ${String(err)}`);
  process.exit(1);
}

/** Open the pipeline runtime for one command and always release its pool. */
async function withRuntime<T>(fn: (rt: PipelineRuntime) => Promise<T>, opts?: { concurrency?: number }): Promise<T> {
  const rt = createRuntime({ concurrency: opts?.concurrency });
  try {
    return await fn(rt);
  } finally {
    await rt.close();
  }
}

const program = new Command();
program
  .name("archive")
  .description("Video evidence archive: ingest, deduplicate and classify social video URLs")
  .option("--json", "Machine-friendly JSON output", false);

function globalOpts(): { json: boolean } {
  return program.opts<{ json: boolean }>();
}

program
  .command("migrate")
  .description("Apply pending database migrations")
  .action(async () => {
    try {
      const applied = await runMigrations();
      if (globalOpts().json) console.log(JSON.stringify({ ok: true, applied }, null, 2));
      else console.log(applied.length ? `applied: ${applied.join(", ")}` : "schema up to date");
      await closePool();
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("ingest")
  .description("Queue every URL in a list file (one per line, '#' comments, optional priority)")
  .argument("<file>", "URL list file")
  .option("--priority <p>", "Default priority for lines without one: normal|urgent", "normal")
  .action(async (file: string, cmd: { priority: string }) => {
    try {
      const opts = globalOpts();
      const defaultPriority = JobPrioritySchema.parse(cmd.priority);
      const parsed = parseUrlList(readFileSync(file, "utf8"), { defaultPriority });
      for (const issue of parsed.issues) console.error(`skipped line ${issue.line}: ${issue.reason}`);

      const summary = await withRuntime((rt) => rt.orchestrator.ingest(parsed.entries));
      if (opts.json) {
        console.log(
          JSON.stringify(
            {
              created: summary.created.map((j) => j.url),
              existing: summary.existing.map((j) => ({ url: j.url, status: j.status })),
              skipped: parsed.issues,
            },
            null,
            2
          )
        );
        return;
      }
      console.log(`created ${summary.created.length}, already known ${summary.existing.length}, skipped ${parsed.issues.length}`);
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("run")
  .description("Process queued jobs until none is claimable")
  .option("--concurrency <n>", "Concurrent jobs (default VEA_CONCURRENCY or 2)")
  .option("--wait", "Sleep through retry backoff until every job is terminal", false)
  .action(async (cmd: { concurrency?: string; wait: boolean }) => {
    try {
      const opts = globalOpts();
      const concurrency = cmd.concurrency ? Math.max(1, asInt(cmd.concurrency, 1)) : undefined;
      const startedAt = Date.now();
      const ac = new AbortController();
      process.once("SIGINT", () => ac.abort());

      const { summary, counts } = await withRuntime(
        async (rt) => {
          const summary = await rt.orchestrator.run({ waitForBackoff: cmd.wait, concurrency, signal: ac.signal });
          return { summary, counts: await rt.store.countByStatus() };
        },
        { concurrency }
      );

      if (opts.json) {
        console.log(JSON.stringify({ ...summary, counts, elapsed_ms: Date.now() - startedAt }, null, 2));
        return;
      }
      console.log(`processed ${summary.processed} attempt(s) in ${formatDuration(Date.now() - startedAt)}`);
      printTable(
        JobStatusSchema.options.map((status) => ({ status, this_run: summary.outcomes[status], total: counts[status] }))
      );
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("status")
  .description("Show one job and its event log")
  .argument("<url>", "Job URL")
  .action(async (url: string) => {
    try {
      const opts = globalOpts();
      const found = await withRuntime(async (rt) => {
        const job = await rt.orchestrator.getJob(url);
        return job ? { job, events: await rt.store.listEvents(job.url) } : null;
      });
      if (!found) throw new Error(`no job for ${url}`);
      const { job, events } = found;

      if (opts.json) {
        console.log(JSON.stringify({ job, events }, null, 2));
        return;
      }
      console.log(`url:       ${job.url}`);
      console.log(`platform:  ${job.platform}`);
      console.log(`status:    ${job.status}${job.cancel_requested ? " (cancel requested)" : ""}`);
      console.log(`attempts:  ${job.attempts}`);
      if (job.next_attempt_at) console.log(`next try:  ${job.next_attempt_at}`);
      if (job.duplicate_of) console.log(`duplicate: ${job.duplicate_of}`);
      if (job.last_error) console.log(`error:     ${job.last_error.kind}: ${truncate(job.last_error.message, 120)}`);
      if (job.result) {
        console.log(`category:  ${job.result.category} (${job.result.overall_confidence})`);
        console.log(`tags:      ${job.result.tags.map((t) => `${t.label} ${t.confidence}`).join(", ") || "-"}`);
        if (job.result.review_reason) console.log(`review:    ${job.result.review_reason}`);
      }
      console.log("");
      printTable(
        events.map((e) => ({
          ts: e.ts,
          level: e.level,
          from: e.from_status,
          to: e.to_status,
          message: truncate(e.message, 60),
        }))
      );
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("cancel")
  .description("Cancel a job; an in-flight job stops at its next stage boundary")
  .argument("<url>", "Job URL")
  .action(async (url: string) => {
    try {
      const opts = globalOpts();
      const job = await withRuntime((rt) => rt.orchestrator.requestCancel(url.trim()));
      if (!job) throw new Error(`no job for ${url}`);
      if (opts.json) console.log(JSON.stringify(job, null, 2));
      else console.log(`${job.url}: ${job.status}${job.cancel_requested && job.status !== "failed" ? " (cancel requested)" : ""}`);
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("export")
  .description("Export terminal jobs with their classification")
  .option("--status <csv>", "Statuses to include (default completed,duplicate,failed)")
  .option("--out <file>", "Write JSON to a file instead of stdout")
  .action(async (cmd: { status?: string; out?: string }) => {
    try {
      const opts = globalOpts();
      const statuses = parseStatuses(cmd.status);
      const records = await withRuntime((rt) => rt.orchestrator.exportResults({ statuses }));

      if (cmd.out) {
        writeFileSync(cmd.out, JSON.stringify(records, null, 2) + "\n");
        console.error(`wrote ${records.length} record(s) to ${cmd.out}`);
        return;
      }
      if (opts.json) {
        console.log(JSON.stringify(records, null, 2));
        return;
      }
      printTable(
        records.map((r) => ({
          status: r.status,
          category: r.classification?.category ?? "",
          confidence: r.classification?.overall_confidence ?? "",
          review: r.classification ? (r.classification.requires_review ? "yes" : "no") : "",
          detail: r.duplicate_of ?? r.last_error?.kind ?? "",
          url: truncate(r.url, 70),
        }))
      );
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("proposed-tags")
  .description("List labels suggested outside the closed category and tag sets")
  .option("--limit <n>", "Max rows", "200")
  .action(async (cmd: { limit: string }) => {
    try {
      const opts = globalOpts();
      const rows = await withRuntime((rt) => rt.proposedTags.list({ limit: Math.max(1, asInt(cmd.limit, 200)) }));
      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      printTable(
        rows.map((p) => ({
          label: p.label,
          kind: p.kind,
          source: p.source,
          confidence: p.confidence,
          url: truncate(p.url, 60),
        }))
      );
    } catch (err) {
      handleErr(err);
    }
  });

program
  .command("validate")
  .description("Score exported classifications against a labelled JSON set")
  .argument("<labels>", "JSON array of { url, category, tags }")
  .action(async (labelsFile: string) => {
    try {
      const opts = globalOpts();
      const labels = parseLabelledExamples(JSON.parse(readFileSync(labelsFile, "utf8")));
      const records = await withRuntime((rt) => rt.orchestrator.exportResults({ statuses: ["completed"] }));
      const report = scoreAgainstLabels(records, labels);

      if (opts.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      console.log(`evaluated:         ${report.evaluated} (${report.missing.length} without a classification)`);
      console.log(`category accuracy: ${report.category_accuracy}`);
      console.log(`tag precision:     ${report.tag_precision}`);
      console.log(`tag recall:        ${report.tag_recall}`);
      if (report.mismatches.length) {
        console.log("");
        printTable(report.mismatches.map((m) => ({ expected: m.expected, actual: m.actual, url: truncate(m.url, 70) })));
      }
    } catch (err) {
      handleErr(err);
    }
  });

program.parseAsync(process.argv).catch(handleErr);
