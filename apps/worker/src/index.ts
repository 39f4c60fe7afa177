import http from "http";
import { createRuntime, getArchiveDefaultNumber, initMetrics, logger } from "@archive/core";

const metrics = initMetrics();

const METRICS_PORT = Number(
  process.env.METRICS_PORT || process.env.VEA_WORKER_METRICS_PORT || getArchiveDefaultNumber("VEA_WORKER_METRICS_PORT", 48510)
);
const IDLE_POLL_MS = Math.max(1_000, Number(process.env.VEA_WORKER_IDLE_POLL_MS || 10_000));

const runtime = createRuntime({ metrics, logger: logger.child({ service: "worker" }) });
const shutdown = new AbortController();

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done);
  });
}

async function loop(): Promise<void> {
  const applied = await runtime.migrate();
  if (applied.length) logger.info({ applied }, "Worker applied migrations");
  while (!shutdown.signal.aborted) {
    const summary = await runtime.orchestrator.run({ waitForBackoff: true, signal: shutdown.signal });
    if (summary.processed > 0) {
      const counts = await runtime.store.countByStatus();
      logger.info({ processed: summary.processed, outcomes: summary.outcomes, counts }, "Worker drained queue");
    }
    // New URLs arrive through the CLI; poll for them.
    await sleep(IDLE_POLL_MS, shutdown.signal);
  }
}

const server = http.createServer(async (req, res) => {
  if (!req.url) return;

  if (req.url === "/health") {
    res.writeHead(200, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok: true, service: "archive-worker" }));
    return;
  }

  if (req.url === "/metrics") {
    res.writeHead(200, { "content-type": metrics.register.contentType });
    res.end(await metrics.register.metrics());
    return;
  }

  res.writeHead(404, { "content-type": "application/json" });
  res.end(JSON.stringify({ error: "not_found" }));
});

server.listen(METRICS_PORT, () => {
  logger.info({ port: METRICS_PORT }, "Worker metrics server listening");
});

const running = loop().catch((err: unknown) => {
  logger.error({ err }, "Worker loop crashed");
  process.exitCode = 1;
  server.close();
  return runtime.close();
});

process.on("SIGINT", async () => {
  logger.info("SIGINT received, shutting down");
  shutdown.abort();
  await running;
  server.close();
  await runtime.close();
  process.exit();
});
