import pg from "pg";
import { z } from "zod";
import { getArchiveDefault } from "../config/defaults";
import { logger } from "../logger";

const { Pool } = pg;

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  VEA_DB_POOL_MAX: z.coerce.number().int().positive().optional(),
});

let _pool: pg.Pool | null = null;

/** Process-wide pool; the first caller's env wins. */
export function getPool(env: Record<string, string | undefined> = process.env): pg.Pool {
  if (_pool) return _pool;
  const parsed = EnvSchema.parse({ DATABASE_URL: env.DATABASE_URL?.trim() || undefined, VEA_DB_POOL_MAX: env.VEA_DB_POOL_MAX?.trim() || undefined });
  const connectionString = parsed.DATABASE_URL ?? getArchiveDefault("DATABASE_URL");
  const pool = new Pool({ connectionString, max: parsed.VEA_DB_POOL_MAX ?? 10 });
  // An idle client losing its connection must not take the worker down.
  pool.on("error", (err) => logger.error({ err }, "postgres idle client error"));
  _pool = pool;
  return pool;
}

/** End the shared pool; a later getPool() opens a fresh one. */
export async function closePool(): Promise<void> {
  const pool = _pool;
  if (!pool) return;
  _pool = null;
  await pool.end();
}
