import type { ProposedTag } from "@archive/contracts";

/** Append-only log of labels a model suggested outside the closed sets. */
export interface ProposedTagLog {
  append(entries: ProposedTag[]): Promise<void>;
  list(opts?: { limit?: number }): Promise<ProposedTag[]>;
}

export class InMemoryProposedTagLog implements ProposedTagLog {
  private readonly entries: ProposedTag[] = [];

  async append(entries: ProposedTag[]): Promise<void> {
    for (const e of entries) this.entries.push({ ...e });
  }

  async list(opts?: { limit?: number }): Promise<ProposedTag[]> {
    const out = this.entries.map((e) => ({ ...e }));
    return opts?.limit ? out.slice(0, opts.limit) : out;
  }
}
