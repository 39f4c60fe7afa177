import test from "node:test";
import assert from "node:assert/strict";
import { createRuntime } from "../src/runtime";
import { silentLogger } from "./helpers";

const MEMORY_ENV = {
  VEA_STORAGE: "memory",
  VEA_TRANSCRIBER: "mock",
  VEA_OCR: "disabled",
  VEA_WORK_DIR: "/tmp/vea-test",
};

test("a memory runtime queues and exports without a database", async () => {
  const rt = createRuntime({ env: MEMORY_ENV, logger: silentLogger });
  try {
    assert.equal(rt.config.work_dir, "/tmp/vea-test");
    assert.equal(rt.relationships.version, 1);
    assert.deepEqual(await rt.migrate(), []);

    const summary = await rt.orchestrator.ingest([{ url: "https://x.com/someone/status/9", priority: "urgent" }]);
    assert.equal(summary.created.length, 1);
    assert.equal(summary.created[0]?.platform, "twitter");
    assert.equal((await rt.store.countByStatus()).pending, 1);
    assert.deepEqual(await rt.orchestrator.exportResults(), []);
  } finally {
    await rt.close();
  }
});

test("an explicit concurrency overrides the environment", async () => {
  const rt = createRuntime({ env: { ...MEMORY_ENV, VEA_CONCURRENCY: "3" }, logger: silentLogger, concurrency: 6 });
  try {
    assert.equal(rt.config.concurrency, 6);
  } finally {
    await rt.close();
  }
});
