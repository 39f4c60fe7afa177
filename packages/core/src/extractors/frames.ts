import type { MediaAsset } from "@archive/contracts";
import { extractFramesAt, strategicOffsets, type SampledFrame } from "../frames/sample";

export type FrameSampler = (asset: MediaAsset, outputDir: string, offsets: number[]) => Promise<SampledFrame[]>;

export const ffmpegFrameSampler: FrameSampler = (asset, outputDir, offsets) => extractFramesAt(asset.path, outputDir, offsets);

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}

/**
 * Sample strategic frames and pair each decoded frame with the capability's
 * per-frame output. Frame indices follow offset order.
 */
export async function readFrames(
  asset: MediaAsset,
  outputDir: string,
  count: number,
  sampler: FrameSampler,
  read: (framePaths: string[]) => Promise<string[]>
): Promise<{ frames: SampledFrame[]; texts: Map<number, string> }> {
  const frames = await sampler(asset, outputDir, strategicOffsets(asset.duration_seconds, count));
  const texts = new Map<number, string>();
  if (!frames.length) return { frames, texts };
  const out = await read(frames.map((f) => f.filePath));
  frames.forEach((f, i) => texts.set(f.frameIndex, collapseWhitespace(out[i] ?? "")));
  return { frames, texts };
}
