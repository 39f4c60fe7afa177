import type { MediaAsset, PlatformErrorKind } from "@archive/contracts";

export type FetchedMedia = {
  asset: MediaAsset;
  metadata: Record<string, unknown>;
};

export interface PlatformGateway {
  /** Download the media behind `url` into `workDir`; throws PlatformError. */
  fetch(url: string, opts: { workDir: string }): Promise<FetchedMedia>;
}

const KIND_PATTERNS: ReadonlyArray<{ kind: PlatformErrorKind; re: RegExp }> = [
  { kind: "auth_required", re: /log ?in|sign ?in|private|authenticat|cookies|age-restricted|members-only/i },
  { kind: "rate_limited", re: /\b429\b|rate.?limit|too many requests/i },
  { kind: "not_found", re: /\b404\b|not found|does not exist|no video/i },
  // Server-side outages read like "unavailable" but clear up on their own.
  { kind: "platform_unknown", re: /\bHTTP Error 5\d\d\b|\b5\d\d\b.*(server|gateway|service)|temporarily|try again later/i },
  { kind: "removed", re: /removed|deleted|suspended|unavailable|copyright|terminated/i },
];

/** Map downloader output to a platform error kind; first matching rule wins. */
export function classifyPlatformFailure(output: string): PlatformErrorKind {
  for (const { kind, re } of KIND_PATTERNS) {
    if (re.test(output)) return kind;
  }
  return "platform_unknown";
}

/** Seconds from a "retry after N" hint, as milliseconds. */
export function parseRetryAfterMs(output: string): number | null {
  const m = output.match(/retry.?after[:\s]+(\d+)/i);
  return m?.[1] ? parseInt(m[1], 10) * 1000 : null;
}
