import type pg from "pg";
import type { DedupConfig } from "@archive/contracts";
import {
  compareFingerprints,
  hashBands,
  pickBestMatch,
  type ArchiveIndex,
  type ArchiveMatch,
  type FingerprintEntry,
} from "../archive/archive-index";

/** Advisory-lock namespace for fingerprint bands (first key of the two-int form). */
const BAND_LOCK_NAMESPACE = 41_017;

type FingerprintRow = {
  url: string;
  hash: string;
  duration_seconds: number;
  width: number;
  height: number;
};

async function selectCandidates(client: pg.PoolClient, probe: FingerprintEntry): Promise<FingerprintEntry[]> {
  const res = await client.query<FingerprintRow>(
    `
    SELECT url, hash, duration_seconds, width, height
    FROM archive_fingerprints
    WHERE bands && $1::int[]
      AND url <> $2
    ORDER BY inserted_at ASC
    `,
    [hashBands(probe.hash), probe.url]
  );
  return res.rows;
}

async function upsertFingerprint(client: pg.PoolClient, entry: FingerprintEntry): Promise<void> {
  await client.query(
    `
    INSERT INTO archive_fingerprints (url, hash, bands, duration_seconds, width, height)
    VALUES ($1, $2, $3::int[], $4, $5, $6)
    ON CONFLICT (url) DO UPDATE
    SET hash = EXCLUDED.hash,
        bands = EXCLUDED.bands,
        duration_seconds = EXCLUDED.duration_seconds,
        width = EXCLUDED.width,
        height = EXCLUDED.height
    `,
    [entry.url, entry.hash, hashBands(entry.hash), entry.duration_seconds, entry.width, entry.height]
  );
}

function findMatch(probe: FingerprintEntry, candidates: FingerprintEntry[], config: DedupConfig): ArchiveMatch | null {
  const matches: ArchiveMatch[] = [];
  for (const c of candidates) {
    const m = compareFingerprints(probe, c, config);
    if (m) matches.push(m);
  }
  return pickBestMatch(matches);
}

export class PgArchiveIndex implements ArchiveIndex {
  constructor(
    private readonly pool: pg.Pool,
    private readonly config: DedupConfig
  ) {}

  async lookup(probe: FingerprintEntry): Promise<ArchiveMatch | null> {
    const client = await this.pool.connect();
    try {
      return findMatch(probe, await selectCandidates(client, probe), this.config);
    } finally {
      client.release();
    }
  }

  async insert(entry: FingerprintEntry): Promise<void> {
    const client = await this.pool.connect();
    try {
      await upsertFingerprint(client, entry);
    } finally {
      client.release();
    }
  }

  /**
   * Locks every band of the probe hash for the transaction. Any two hashes
   * close enough to match share a band, so racing near-duplicates serialize
   * on that band's lock and the second one sees the first one's row.
   */
  async checkAndInsert(probe: FingerprintEntry): Promise<{ duplicateOf: ArchiveMatch | null }> {
    const bands = [...hashBands(probe.hash)].sort((a, b) => a - b);
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      try {
        for (const band of bands) {
          await client.query("SELECT pg_advisory_xact_lock($1::int, $2::int)", [BAND_LOCK_NAMESPACE, band]);
        }
        const match = findMatch(probe, await selectCandidates(client, probe), this.config);
        if (!match) await upsertFingerprint(client, probe);
        await client.query("COMMIT");
        return { duplicateOf: match };
      } catch (err) {
        await client.query("ROLLBACK");
        throw err;
      }
    } finally {
      client.release();
    }
  }

  async size(): Promise<number> {
    const res = await this.pool.query<{ n: string }>("SELECT count(*)::text AS n FROM archive_fingerprints");
    return Number(res.rows[0]?.n ?? 0);
  }
}
