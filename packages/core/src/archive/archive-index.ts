import type { DedupConfig } from "@archive/contracts";
import { HASH_BITS, HASH_HEX_LENGTH, hammingDistance } from "../frames/fingerprint";

export const BAND_COUNT = 8;
const BAND_HEX = HASH_HEX_LENGTH / BAND_COUNT;
const BAND_VALUES = 1 << (HASH_BITS / BAND_COUNT);

export interface FingerprintEntry {
  url: string;
  hash: string;
  duration_seconds: number;
  width: number;
  height: number;
}

export interface ArchiveMatch {
  url: string;
  hash: string;
  distance: number;
  duration_delta: number;
}

export interface ArchiveIndex {
  /** Read-only probe; never matches the entry's own url. */
  lookup(probe: FingerprintEntry): Promise<ArchiveMatch | null>;
  /** Idempotent per url: re-inserting replaces the stored fingerprint. */
  insert(entry: FingerprintEntry): Promise<void>;
  /**
   * Lookup and, when nothing matches, insert, as one atomic step with respect
   * to any other probe that shares a hash band.
   */
  checkAndInsert(probe: FingerprintEntry): Promise<{ duplicateOf: ArchiveMatch | null }>;
  size(): Promise<number>;
}

/**
 * Split a hash into 8 bands of 8 bits, each tagged with its position so band
 * keys never collide across positions. Two hashes within Hamming distance
 * < 8 share at least one band (pigeonhole), so band candidates are exhaustive
 * for any threshold the config accepts.
 */
export function hashBands(hash: string): number[] {
  if (!/^[0-9a-f]{16}$/.test(hash)) throw new Error(`invalid perceptual hash '${hash}'`);
  const bands: number[] = [];
  for (let i = 0; i < BAND_COUNT; i++) {
    const value = parseInt(hash.slice(i * BAND_HEX, (i + 1) * BAND_HEX), 16);
    bands.push(i * BAND_VALUES + value);
  }
  return bands;
}

export function compareFingerprints(
  probe: FingerprintEntry,
  candidate: FingerprintEntry,
  config: DedupConfig
): ArchiveMatch | null {
  if (candidate.url === probe.url) return null;
  const distance = hammingDistance(probe.hash, candidate.hash);
  if (distance >= config.hamming_threshold) return null;
  const durationDelta = Math.abs(probe.duration_seconds - candidate.duration_seconds);
  if (durationDelta >= config.duration_tolerance_seconds) return null;
  return { url: candidate.url, hash: candidate.hash, distance, duration_delta: durationDelta };
}

/** Closest hash wins, then closest duration; remaining ties keep the first candidate. */
export function pickBestMatch(matches: ArchiveMatch[]): ArchiveMatch | null {
  let best: ArchiveMatch | null = null;
  for (const m of matches) {
    if (
      !best ||
      m.distance < best.distance ||
      (m.distance === best.distance && m.duration_delta < best.duration_delta)
    ) {
      best = m;
    }
  }
  return best;
}

export class InMemoryArchiveIndex implements ArchiveIndex {
  private readonly entries = new Map<string, FingerprintEntry>();
  private readonly bands = new Map<number, Set<string>>();

  constructor(private readonly config: DedupConfig) {}

  async lookup(probe: FingerprintEntry): Promise<ArchiveMatch | null> {
    return this.findMatch(probe);
  }

  async insert(entry: FingerprintEntry): Promise<void> {
    this.store(entry);
  }

  // No await between the probe and the insert, so concurrent callers on the
  // event loop observe each other's entries.
  async checkAndInsert(probe: FingerprintEntry): Promise<{ duplicateOf: ArchiveMatch | null }> {
    const match = this.findMatch(probe);
    if (match) return { duplicateOf: match };
    this.store(probe);
    return { duplicateOf: null };
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  private findMatch(probe: FingerprintEntry): ArchiveMatch | null {
    const seen = new Set<string>();
    const matches: ArchiveMatch[] = [];
    for (const band of hashBands(probe.hash)) {
      for (const url of this.bands.get(band) ?? []) {
        if (seen.has(url)) continue;
        seen.add(url);
        const candidate = this.entries.get(url);
        if (!candidate) continue;
        const m = compareFingerprints(probe, candidate, this.config);
        if (m) matches.push(m);
      }
    }
    return pickBestMatch(matches);
  }

  private store(entry: FingerprintEntry): void {
    const previous = this.entries.get(entry.url);
    if (previous) {
      for (const band of hashBands(previous.hash)) this.bands.get(band)?.delete(entry.url);
    }
    this.entries.set(entry.url, { ...entry });
    for (const band of hashBands(entry.hash)) {
      let set = this.bands.get(band);
      if (!set) {
        set = new Set();
        this.bands.set(band, set);
      }
      set.add(entry.url);
    }
  }
}
