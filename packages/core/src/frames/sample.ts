import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import { logger } from "../logger";

const execFileAsync = promisify(execFile);

export const MIN_STRATEGIC_SAMPLES = 5;

/** Fraction of the media at each end where overlay text tends to sit. */
const EDGE_WINDOW = 0.15;

export interface SampledFrame {
  frameIndex: number;
  timestampMs: number;
  filePath: string;
}

function spread(a: number, b: number, k: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < k; i++) out.push(a + ((b - a) * (i + 1)) / (k + 1));
  return out;
}

/**
 * Sample offsets (seconds) clustered near the start and end of the media with
 * a single probe at the midpoint. Always returns at least five offsets in
 * ascending order.
 */
export function strategicOffsets(durationSeconds: number, count: number = MIN_STRATEGIC_SAMPLES): number[] {
  const n = Math.max(MIN_STRATEGIC_SAMPLES, Math.floor(count));
  const d = Number.isFinite(durationSeconds) ? Math.max(0, durationSeconds) : 0;
  const head = Math.ceil((n - 1) / 2);
  const tail = n - 1 - head;

  const raw = [...spread(0, d * EDGE_WINDOW, head), d / 2, ...spread(d * (1 - EDGE_WINDOW), d, tail)];
  const upper = Math.max(0, d - 0.1);
  return raw.map((t) => Math.round(Math.min(upper, Math.max(0, t)) * 1000) / 1000);
}

/**
 * Grab one JPEG per offset. Offsets ffmpeg cannot decode are skipped, so the
 * result may be shorter than `offsets`; frame indices follow offset order.
 */
export async function extractFramesAt(
  videoPath: string,
  outputDir: string,
  offsets: number[],
  opts?: { maxWidth?: number; timeoutMs?: number; prefix?: string }
): Promise<SampledFrame[]> {
  const maxWidth = opts?.maxWidth ?? 1280;
  const prefix = opts?.prefix ?? "frame";
  await fs.mkdir(outputDir, { recursive: true });

  const frames: SampledFrame[] = [];
  for (let i = 0; i < offsets.length; i++) {
    const offset = offsets[i] ?? 0;
    const filePath = path.join(outputDir, `${prefix}_${String(i).padStart(3, "0")}.jpg`);
    try {
      await execFileAsync(
        "ffmpeg",
        ["-v", "error", "-ss", String(offset), "-i", videoPath, "-frames:v", "1", "-vf", `scale='min(${maxWidth},iw)':-2`, "-q:v", "2", "-y", filePath],
        { timeout: opts?.timeoutMs ?? 30_000, maxBuffer: 10 * 1024 * 1024 }
      );
      await fs.access(filePath);
    } catch (err) {
      logger.debug({ err, videoPath, offset }, "frame sample skipped");
      continue;
    }
    frames.push({ frameIndex: i, timestampMs: Math.round(offset * 1000), filePath });
  }
  return frames;
}
