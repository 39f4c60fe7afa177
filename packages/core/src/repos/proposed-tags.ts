import { ProposedTagSchema, type ProposedTag } from "@archive/contracts";
import type pg from "pg";
import type { ProposedTagLog } from "../taxonomy/proposed-tags";

export class PgProposedTagLog implements ProposedTagLog {
  constructor(private readonly pool: pg.Pool) {}

  async append(entries: ProposedTag[]): Promise<void> {
    if (!entries.length) return;
    const values: unknown[] = [];
    const rows: string[] = [];
    for (const e of entries) {
      const base = values.length;
      values.push(e.label, e.kind, e.url, e.source, e.confidence, e.proposed_at);
      rows.push(`($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`);
    }
    await this.pool.query(
      `INSERT INTO proposed_tags (label, kind, url, source, confidence, proposed_at) VALUES ${rows.join(", ")}`,
      values
    );
  }

  async list(opts?: { limit?: number }): Promise<ProposedTag[]> {
    const limit = Math.min(opts?.limit ?? 1000, 10_000);
    const res = await this.pool.query(
      `
      SELECT
        label,
        kind,
        url,
        source,
        confidence,
        to_char(proposed_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"') as proposed_at
      FROM proposed_tags
      ORDER BY proposed_at ASC, id ASC
      LIMIT $1
      `,
      [limit]
    );
    return res.rows.map((r) => ProposedTagSchema.parse(r));
  }
}
