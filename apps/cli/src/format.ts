type Cell = string | number | boolean | null | undefined;

/** "850ms", "12.4s", "3m 07s", "1h 02m". */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  if (total < 1000) return `${total}ms`;
  if (total < 60_000) return `${(total / 1000).toFixed(1)}s`;
  const mins = Math.floor(total / 60_000);
  if (mins < 60) return `${mins}m ${String(Math.floor((total % 60_000) / 1000)).padStart(2, "0")}s`;
  return `${Math.floor(mins / 60)}h ${String(mins % 60).padStart(2, "0")}m`;
}

export function truncate(s: string, n: number): string {
  if (s.length <= n) return s;
  return n <= 1 ? s.slice(0, n) : `${s.slice(0, n - 1)}…`;
}

function cellText(value: Cell): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "yes" : "no";
  return String(value);
}

/**
 * Plain-text table with columns from the first row's keys. Numeric columns are
 * right-aligned.
 */
export function renderTable(rows: ReadonlyArray<Record<string, Cell>>): string[] {
  const first = rows[0];
  if (!first) return ["(none)"];
  const cols = Object.keys(first);
  const numeric = cols.map((c) => rows.every((r) => typeof r[c] === "number" || r[c] === null || r[c] === undefined));
  const widths = cols.map((c) => Math.max(c.length, ...rows.map((r) => cellText(r[c]).length)));

  const line = (cells: string[]) =>
    cells
      .map((text, i) => (numeric[i] ? text.padStart(widths[i] ?? 0) : text.padEnd(widths[i] ?? 0)))
      .join("  ")
      .trimEnd();

  return [line(cols), line(widths.map((w) => "-".repeat(w))), ...rows.map((r) => line(cols.map((c) => cellText(r[c]))))];
}

export function printTable(rows: ReadonlyArray<Record<string, Cell>>): void {
  for (const l of renderTable(rows)) console.log(l);
}
