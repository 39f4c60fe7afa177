import { JobPrioritySchema, type IngestEntry, type JobPriority } from "@archive/contracts";
import { isHttpUrl, normalizeJobUrl } from "../platform/detect";

export type UrlListIssue = { line: number; text: string; reason: string };

export type ParsedUrlList = {
  entries: IngestEntry[];
  issues: UrlListIssue[];
};

/**
 * Parse a URL list: one URL per line, blank lines and `#` comments ignored.
 * A line may carry a priority as a second token (`urgent` / `normal`) or a
 * leading `!` for urgent. Repeated URLs keep their first occurrence, upgraded
 * to urgent when any repetition asks for it.
 */
export function parseUrlList(text: string, opts?: { defaultPriority?: JobPriority }): ParsedUrlList {
  const defaultPriority = opts?.defaultPriority ?? "normal";
  const byUrl = new Map<string, IngestEntry>();
  const issues: UrlListIssue[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i] ?? "";
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    let body = line;
    let priority: JobPriority = defaultPriority;
    if (body.startsWith("!")) {
      priority = "urgent";
      body = body.slice(1).trim();
    }

    const [urlToken, priorityToken, ...rest] = body.split(/\s+/);
    if (!urlToken) continue;
    if (priorityToken !== undefined) {
      const parsed = JobPrioritySchema.safeParse(priorityToken.toLowerCase());
      if (!parsed.success || rest.length > 0) {
        issues.push({ line: i + 1, text: raw, reason: `unrecognized priority '${priorityToken}'` });
        continue;
      }
      priority = parsed.data;
    }

    const url = normalizeJobUrl(urlToken);
    if (!isHttpUrl(url)) {
      issues.push({ line: i + 1, text: raw, reason: "not an http(s) URL" });
      continue;
    }
    const existing = byUrl.get(url);
    if (existing) {
      if (priority === "urgent") existing.priority = "urgent";
      continue;
    }
    byUrl.set(url, { url, priority });
  }

  return { entries: [...byUrl.values()], issues };
}
