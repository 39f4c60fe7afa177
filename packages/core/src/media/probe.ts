import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

const FfprobeSchema = z.object({
  format: z
    .object({
      duration: z.coerce.number().optional(),
      format_name: z.string().optional(),
      size: z.coerce.number().optional(),
      tags: z.record(z.string()).optional(),
    })
    .default({}),
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        codec_name: z.string().optional(),
        width: z.number().int().optional(),
        height: z.number().int().optional(),
        duration: z.coerce.number().optional(),
      })
    )
    .default([]),
});

export type MediaProbe = {
  duration_seconds: number;
  width: number;
  height: number;
  has_video: boolean;
  has_audio: boolean;
  video_codec: string | null;
  audio_codec: string | null;
  format: string | null;
  size_bytes: number | null;
  title: string | null;
};

export function parseProbeOutput(stdout: string): MediaProbe {
  const parsed = FfprobeSchema.parse(JSON.parse(stdout));
  const video = parsed.streams.find((s) => s.codec_type === "video");
  const audio = parsed.streams.find((s) => s.codec_type === "audio");
  const duration = parsed.format.duration ?? video?.duration ?? audio?.duration ?? 0;

  return {
    duration_seconds: Number.isFinite(duration) ? Math.max(0, duration) : 0,
    width: video?.width ?? 0,
    height: video?.height ?? 0,
    has_video: Boolean(video),
    has_audio: Boolean(audio),
    video_codec: video?.codec_name?.toUpperCase() ?? null,
    audio_codec: audio?.codec_name?.toUpperCase() ?? null,
    format: parsed.format.format_name?.split(",")[0]?.toUpperCase() ?? null,
    size_bytes: parsed.format.size ?? null,
    title: parsed.format.tags?.title ?? null,
  };
}

export async function probeMedia(filePath: string, opts?: { timeoutMs?: number }): Promise<MediaProbe> {
  const { stdout } = await execFileAsync(
    "ffprobe",
    ["-v", "quiet", "-print_format", "json", "-show_format", "-show_streams", filePath],
    { timeout: opts?.timeoutMs ?? 30_000, maxBuffer: 10 * 1024 * 1024 }
  );
  return parseProbeOutput(stdout);
}
