import fs from "fs";
import path from "path";
import type pg from "pg";
import { logger } from "../logger";

// Arbitrary key shared by every process that migrates this database.
const MIGRATION_LOCK_KEY = 7_314_202;

export function listMigrationFiles(migrationsDir: string): string[] {
  return fs
    .readdirSync(migrationsDir)
    .filter((f) => /^\d{3}_[a-z0-9_]+\.sql$/.test(f))
    .sort();
}

/**
 * Apply every pending `NNN_name.sql` file in order, each in its own
 * transaction. A session advisory lock serializes workers that start together.
 */
export async function migrateDb({
  client,
  migrationsDir,
}: {
  client: pg.PoolClient;
  migrationsDir: string;
}): Promise<{ applied: string[] }> {
  await client.query("SELECT pg_advisory_lock($1)", [MIGRATION_LOCK_KEY]);
  try {
    await client.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        filename text PRIMARY KEY,
        applied_at timestamptz NOT NULL DEFAULT now()
      );
    `);

    const done = await client.query<{ filename: string }>("SELECT filename FROM schema_migrations");
    const applied = new Set(done.rows.map((r) => r.filename));
    const newlyApplied: string[] = [];

    for (const filename of listMigrationFiles(migrationsDir)) {
      if (applied.has(filename)) continue;
      const sql = fs.readFileSync(path.join(migrationsDir, filename), "utf8");
      await client.query("BEGIN");
      try {
        await client.query(sql);
        await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
        await client.query("COMMIT");
      } catch (err) {
        await client.query("ROLLBACK");
        throw new Error(`migration ${filename} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
      }
      logger.info({ filename }, "migration applied");
      newlyApplied.push(filename);
    }
    return { applied: newlyApplied };
  } finally {
    await client.query("SELECT pg_advisory_unlock($1)", [MIGRATION_LOCK_KEY]);
  }
}
