import fs from "node:fs/promises";
import path from "node:path";
import { PlatformError } from "../errors";
import { probeMedia, type MediaProbe } from "../media/probe";
import { lastOutputLine, spawnCapture, type SpawnCaptureResult } from "../process/spawn";
import { classifyPlatformFailure, parseRetryAfterMs, type FetchedMedia, type PlatformGateway } from "./gateway";

const MEDIA_EXT = /\.(mp4|mkv|webm|mov|m4v)$/i;
const METADATA_KEYS = [
  "id",
  "title",
  "uploader",
  "uploader_id",
  "upload_date",
  "timestamp",
  "description",
  "webpage_url",
  "extractor_key",
  "duration",
  "view_count",
] as const;

export type YtDlpGatewayOpts = {
  binaryPath?: string;
  timeoutMs?: number;
  /** Extra arguments, e.g. `--cookies` for platforms behind a login. */
  extraArgs?: string[];
  run?: (cmd: string, args: string[], opts: { timeoutMs: number }) => Promise<SpawnCaptureResult>;
  probe?: (filePath: string) => Promise<MediaProbe>;
};

function pickMetadata(raw: unknown): Record<string, unknown> {
  if (typeof raw !== "object" || raw === null) return {};
  const out: Record<string, unknown> = {};
  for (const key of METADATA_KEYS) {
    if (key in raw) out[key] = Reflect.get(raw, key);
  }
  return out;
}

const MERGED_MEDIA = "media.mp4";

/** The merged `media.mp4` wins over intermediate format files (`media.f137.mp4`). */
async function findDownloadedFiles(workDir: string): Promise<{ media: string | null; info: string | null }> {
  const entries = await fs.readdir(workDir);
  const candidates = entries.filter((f) => MEDIA_EXT.test(f) && !f.endsWith(".part")).sort();
  const media = candidates.includes(MERGED_MEDIA) ? MERGED_MEDIA : (candidates[0] ?? null);
  const info = entries.find((f) => f.endsWith(".info.json")) ?? null;
  return {
    media: media ? path.join(workDir, media) : null,
    info: info ? path.join(workDir, info) : null,
  };
}

export function createYtDlpGateway(opts?: YtDlpGatewayOpts): PlatformGateway {
  const bin = opts?.binaryPath ?? "yt-dlp";
  const timeoutMs = opts?.timeoutMs ?? 300_000;
  const run: NonNullable<YtDlpGatewayOpts["run"]> = opts?.run ?? ((cmd, args, o) => spawnCapture(cmd, args, o));
  const probe: NonNullable<YtDlpGatewayOpts["probe"]> = opts?.probe ?? ((filePath) => probeMedia(filePath));

  return {
    async fetch(url, { workDir }): Promise<FetchedMedia> {
      // A killed attempt can leave partial or unmerged files behind.
      await fs.rm(workDir, { recursive: true, force: true });
      await fs.mkdir(workDir, { recursive: true });
      const args = [
        "-f",
        "best[ext=mp4]/bestvideo[ext=mp4]+bestaudio/best",
        "--merge-output-format",
        "mp4",
        "--write-info-json",
        "--no-playlist",
        "--no-progress",
        "--no-warnings",
        "-o",
        path.join(workDir, "media.%(ext)s"),
        ...(opts?.extraArgs ?? []),
        url,
      ];

      let res: SpawnCaptureResult;
      try {
        res = await run(bin, args, { timeoutMs });
      } catch (err) {
        throw new PlatformError("platform_unknown", `could not start ${bin}`, { cause: err });
      }
      if (res.timedOut) throw new PlatformError("platform_unknown", `${bin} timed out after ${timeoutMs}ms`);
      if (res.exitCode !== 0) {
        const output = `${res.stderr}\n${res.stdout}`;
        throw new PlatformError(classifyPlatformFailure(output), lastOutputLine(res) || `${bin} exited ${res.exitCode}`, {
          retryAfterMs: parseRetryAfterMs(output),
        });
      }

      const files = await findDownloadedFiles(workDir);
      if (!files.media) throw new PlatformError("not_found", "no video in the downloaded post");

      let metadata: Record<string, unknown> = {};
      if (files.info) {
        metadata = pickMetadata(JSON.parse(await fs.readFile(files.info, "utf8")));
      }

      const probed = await probe(files.media);
      if (!probed.has_video) throw new PlatformError("not_found", "downloaded file has no video stream");

      return {
        asset: {
          path: files.media,
          duration_seconds: probed.duration_seconds,
          width: probed.width,
          height: probed.height,
          perceptual_hash: null,
          has_audio: probed.has_audio,
          metadata: {
            ...metadata,
            video_codec: probed.video_codec,
            audio_codec: probed.audio_codec,
            format: probed.format,
            size_bytes: probed.size_bytes,
          },
        },
        metadata,
      };
    },
  };
}
