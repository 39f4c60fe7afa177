import path from "path";
import { fileURLToPath } from "url";
import { closePool, getPool } from "../db/pool";
import { migrateDb } from "../db/migrate";
import { logger } from "../logger";

export const migrationsDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "migrations");

/** Bring the configured database up to date; returns the files applied now. */
export async function runMigrations(env: Record<string, string | undefined> = process.env): Promise<string[]> {
  const client = await getPool(env).connect();
  try {
    const res = await migrateDb({ client, migrationsDir });
    return res.applied;
  } finally {
    client.release();
  }
}

async function main() {
  try {
    const applied = await runMigrations();
    console.log(JSON.stringify({ ok: true, applied }, null, 2));
  } finally {
    await closePool();
  }
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((err: unknown) => {
    logger.error({ err }, "migration failed");
    console.error(JSON.stringify({ ok: false, error: err instanceof Error ? err.message : String(err) }, null, 2));
    process.exit(1);
  });
}
