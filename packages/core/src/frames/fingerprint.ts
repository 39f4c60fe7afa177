/**
 * Media fingerprinting via perceptual hashing.
 *
 * Uses average hash (aHash): resize one frame to 8x8, grayscale, compare each
 * pixel to the mean. Computed via ffmpeg; no native image dependencies.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { MediaAsset } from "@archive/contracts";
import { FingerprintError } from "../errors";

const execFileAsync = promisify(execFile);

export const HASH_BITS = 64;
export const HASH_HEX_LENGTH = HASH_BITS / 4;

/** Seconds into the media where the fingerprint frame is sampled. */
export function fingerprintOffset(durationSeconds: number): number {
  if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) return 0;
  return Math.min(1.0, durationSeconds / 2);
}

/**
 * Pack 64 grayscale pixels into a 16-char hex average hash.
 * Bit order: row-major, first pixel is the most significant bit.
 */
export function averageHash(pixels: ArrayLike<number>): string {
  if (pixels.length < HASH_BITS) {
    throw new Error(`expected ${HASH_BITS} pixels, got ${pixels.length}`);
  }
  let sum = 0;
  for (let i = 0; i < HASH_BITS; i++) sum += pixels[i] ?? 0;
  const mean = sum / HASH_BITS;

  let hash = BigInt(0);
  for (let i = 0; i < HASH_BITS; i++) {
    if ((pixels[i] ?? 0) >= mean) {
      hash |= BigInt(1) << BigInt(HASH_BITS - 1 - i);
    }
  }
  return hash.toString(16).padStart(HASH_HEX_LENGTH, "0");
}

/**
 * Compute Hamming distance between two 64-bit hex hashes.
 * Returns number of differing bits (0 = identical, 64 = maximally different).
 */
export function hammingDistance(hash1: string, hash2: string): number {
  const a = BigInt(`0x${hash1}`);
  const b = BigInt(`0x${hash2}`);
  let xor = a ^ b;
  let count = 0;
  while (xor > BigInt(0)) {
    count += Number(xor & BigInt(1));
    xor >>= BigInt(1);
  }
  return count;
}

export interface Fingerprinter {
  fingerprint(asset: Pick<MediaAsset, "path" | "duration_seconds">): Promise<string>;
}

async function readGrayPixels(videoPath: string, offsetSeconds: number, timeoutMs: number): Promise<Buffer> {
  const { stdout } = await execFileAsync(
    "ffmpeg",
    ["-v", "error", "-ss", String(offsetSeconds), "-i", videoPath, "-frames:v", "1", "-vf", "scale=8:8,format=gray", "-f", "rawvideo", "-pix_fmt", "gray", "-"],
    { encoding: "buffer", timeout: timeoutMs, maxBuffer: 1024 * 1024 }
  );
  return stdout;
}

/**
 * Same bytes in, same hash out: the frame offset depends only on duration.
 * Unreadable or truncated frames raise FingerprintError.
 */
export function createFfmpegFingerprinter(opts?: { timeoutMs?: number }): Fingerprinter {
  const timeoutMs = opts?.timeoutMs ?? 15_000;
  return {
    async fingerprint(asset) {
      const offset = fingerprintOffset(asset.duration_seconds);
      let pixels: Buffer;
      try {
        pixels = await readGrayPixels(asset.path, offset, timeoutMs);
      } catch (err) {
        throw new FingerprintError(asset.path, `ffmpeg could not sample a frame at ${offset}s`, { cause: err });
      }
      if (pixels.length < HASH_BITS) {
        throw new FingerprintError(asset.path, `frame at ${offset}s decoded to ${pixels.length} of ${HASH_BITS} pixels`);
      }
      return averageHash(pixels);
    },
  };
}
