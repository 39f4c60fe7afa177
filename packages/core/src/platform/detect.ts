import type { Platform } from "@archive/contracts";

const PLATFORM_HOSTS: ReadonlyArray<{ platform: Platform; hosts: readonly string[] }> = [
  { platform: "twitter", hosts: ["twitter.com", "x.com", "t.co", "fxtwitter.com", "vxtwitter.com"] },
  { platform: "instagram", hosts: ["instagram.com", "instagr.am"] },
  { platform: "facebook", hosts: ["facebook.com", "fb.com", "fb.watch"] },
  { platform: "youtube", hosts: ["youtube.com", "youtu.be", "youtube-nocookie.com"] },
];

function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.+$/g, "");
}

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/** Trim surrounding whitespace; URLs are otherwise kept verbatim as job keys. */
export function normalizeJobUrl(raw: string): string {
  return raw.trim();
}

export function isHttpUrl(url: string): boolean {
  try {
    const u = new URL(url);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

export function detectPlatform(url: string): Platform {
  let host: string;
  try {
    const u = new URL(url.trim());
    if (u.protocol !== "http:" && u.protocol !== "https:") return "unknown";
    host = normalizeHost(u.hostname);
  } catch {
    return "unknown";
  }
  if (!host) return "unknown";

  for (const entry of PLATFORM_HOSTS) {
    if (entry.hosts.some((d) => hostMatches(host, d))) return entry.platform;
  }
  return "unknown";
}
