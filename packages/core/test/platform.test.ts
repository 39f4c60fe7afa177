import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PlatformError } from "../src/errors";
import type { MediaProbe } from "../src/media/probe";
import { parseProbeOutput } from "../src/media/probe";
import { detectPlatform, isHttpUrl } from "../src/platform/detect";
import { classifyPlatformFailure, parseRetryAfterMs } from "../src/platform/gateway";
import { createYtDlpGateway } from "../src/platform/yt-dlp";
import { processFailure, type SpawnCaptureResult } from "../src/process/spawn";

test("detectPlatform recognizes supported hosts and subdomains", () => {
  assert.equal(detectPlatform("https://x.com/someone/status/1"), "twitter");
  assert.equal(detectPlatform("https://mobile.twitter.com/someone/status/1"), "twitter");
  assert.equal(detectPlatform("https://www.instagram.com/reel/abc/"), "instagram");
  assert.equal(detectPlatform("https://fb.watch/xyz/"), "facebook");
  assert.equal(detectPlatform("https://m.facebook.com/watch/?v=1"), "facebook");
  assert.equal(detectPlatform("https://youtu.be/abc"), "youtube");
  assert.equal(detectPlatform("  https://WWW.YOUTUBE.COM/watch?v=abc  "), "youtube");
});

test("detectPlatform returns unknown for lookalikes and non-http input", () => {
  assert.equal(detectPlatform("https://notx.com/a"), "unknown");
  assert.equal(detectPlatform("https://example.org/video.mp4"), "unknown");
  assert.equal(detectPlatform("ftp://x.com/a"), "unknown");
  assert.equal(detectPlatform("not a url"), "unknown");
});

test("isHttpUrl", () => {
  assert.equal(isHttpUrl("https://x.com/a"), true);
  assert.equal(isHttpUrl("http://example.org"), true);
  assert.equal(isHttpUrl("mailto:someone@example.org"), false);
  assert.equal(isHttpUrl("x.com/a"), false);
});

test("classifyPlatformFailure maps downloader output to kinds", () => {
  assert.equal(classifyPlatformFailure("ERROR: [instagram] abc: Requested content is not available, login required"), "auth_required");
  assert.equal(classifyPlatformFailure("ERROR: Private video"), "auth_required");
  assert.equal(classifyPlatformFailure("ERROR: HTTP Error 429: Too Many Requests"), "rate_limited");
  assert.equal(classifyPlatformFailure("ERROR: HTTP Error 404: Not Found"), "not_found");
  assert.equal(classifyPlatformFailure("ERROR: This video has been removed for violating the terms"), "removed");
  assert.equal(classifyPlatformFailure("ERROR: Unable to extract data"), "platform_unknown");
  assert.equal(classifyPlatformFailure("ERROR: [twitter] 1890: HTTP Error 503: Service Unavailable"), "platform_unknown");
  assert.equal(classifyPlatformFailure("ERROR: 502 Bad Gateway from upstream server"), "platform_unknown");
  assert.equal(classifyPlatformFailure("ERROR: This video is temporarily unavailable"), "platform_unknown");
  assert.equal(classifyPlatformFailure("ERROR: Something went wrong. Try again later."), "platform_unknown");
  assert.equal(classifyPlatformFailure("ERROR: Video unavailable. This video is no longer available"), "removed");
});

test("parseRetryAfterMs reads a retry-after hint in seconds", () => {
  assert.equal(parseRetryAfterMs("429 Too Many Requests; Retry-After: 90"), 90_000);
  assert.equal(parseRetryAfterMs("please retry after 5 seconds"), 5_000);
  assert.equal(parseRetryAfterMs("HTTP Error 429"), null);
});

test("parseProbeOutput reads duration, resolution and codecs", () => {
  const probe = parseProbeOutput(
    JSON.stringify({
      format: { duration: "12.480000", format_name: "mov,mp4,m4a,3gp,3g2,mj2", size: "834112" },
      streams: [
        { codec_type: "video", codec_name: "h264", width: 720, height: 1280 },
        { codec_type: "audio", codec_name: "aac" },
      ],
    })
  );
  assert.deepEqual(probe, {
    duration_seconds: 12.48,
    width: 720,
    height: 1280,
    has_video: true,
    has_audio: true,
    video_codec: "H264",
    audio_codec: "AAC",
    format: "MOV",
    size_bytes: 834112,
    title: null,
  });
});

function spawnResult(overrides: Partial<SpawnCaptureResult>): SpawnCaptureResult {
  return { stdout: "", stderr: "", exitCode: 0, signal: null, timedOut: false, durationMs: 5, ...overrides };
}

const PROBE: MediaProbe = {
  duration_seconds: 31.5,
  width: 640,
  height: 360,
  has_video: true,
  has_audio: true,
  video_codec: "H264",
  audio_codec: "AAC",
  format: "MOV",
  size_bytes: 1000,
  title: null,
};

test("yt-dlp gateway returns the downloaded asset with picked metadata", async () => {
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "vea-gateway-"));
  try {
    const calls: string[][] = [];
    const gateway = createYtDlpGateway({
      extraArgs: ["--cookies", "cookies.txt"],
      run: async (_cmd, args) => {
        calls.push(args);
        await fs.writeFile(path.join(workDir, "media.mp4"), "not really a video");
        await fs.writeFile(
          path.join(workDir, "media.info.json"),
          JSON.stringify({ id: "100", title: "Clip", uploader: "someone", formats: [{ big: true }] })
        );
        return spawnResult({});
      },
      probe: async () => PROBE,
    });

    const fetched = await gateway.fetch("https://x.com/someone/status/100", { workDir });
    assert.equal(fetched.asset.path, path.join(workDir, "media.mp4"));
    assert.equal(fetched.asset.duration_seconds, 31.5);
    assert.equal(fetched.asset.perceptual_hash, null);
    assert.deepEqual(fetched.metadata, { id: "100", title: "Clip", uploader: "someone" });
    assert.equal(fetched.asset.metadata.video_codec, "H264");
    assert.equal(calls.length, 1);
    const args = calls[0] ?? [];
    assert.equal(args[args.length - 1], "https://x.com/someone/status/100");
    assert.ok(args.includes("--cookies"));
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
});

test("yt-dlp gateway starts from an empty work dir and prefers the merged file", async () => {
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "vea-gateway-"));
  try {
    await fs.writeFile(path.join(workDir, "media.f137.mp4"), "video only, from a killed attempt");
    await fs.writeFile(path.join(workDir, "media.mp4.part"), "half a download");
    let seenAtStart: string[] = [];
    const gateway = createYtDlpGateway({
      run: async () => {
        seenAtStart = await fs.readdir(workDir);
        await fs.writeFile(path.join(workDir, "media.f136.mp4"), "video stream");
        await fs.writeFile(path.join(workDir, "media.mp4"), "merged");
        return spawnResult({});
      },
      probe: async () => PROBE,
    });

    const fetched = await gateway.fetch("https://x.com/someone/status/103", { workDir });
    assert.deepEqual(seenAtStart, []);
    assert.equal(fetched.asset.path, path.join(workDir, "media.mp4"));
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
});

test("yt-dlp gateway classifies a failed download", async () => {
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "vea-gateway-"));
  try {
    const gateway = createYtDlpGateway({
      run: async () => spawnResult({ exitCode: 1, stderr: "ERROR: HTTP Error 429: Too Many Requests (retry after 30)\n" }),
      probe: async () => PROBE,
    });
    await assert.rejects(gateway.fetch("https://x.com/someone/status/101", { workDir }), (err: unknown) => {
      assert.ok(err instanceof PlatformError);
      assert.equal(err.kind, "rate_limited");
      assert.equal(err.retryAfterMs, 30_000);
      assert.equal(err.retryable, true);
      assert.equal(err.message, "ERROR: HTTP Error 429: Too Many Requests (retry after 30)");
      return true;
    });
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
});

test("yt-dlp gateway reports a post without video as not_found", async () => {
  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "vea-gateway-"));
  try {
    const gateway = createYtDlpGateway({ run: async () => spawnResult({}), probe: async () => PROBE });
    await assert.rejects(gateway.fetch("https://x.com/someone/status/102", { workDir }), (err: unknown) => {
      assert.ok(err instanceof PlatformError);
      assert.equal(err.kind, "not_found");
      assert.equal(err.retryable, false);
      return true;
    });
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
});

test("processFailure describes unsuccessful tool runs", () => {
  assert.equal(processFailure("tesseract", spawnResult({})), null);
  assert.equal(processFailure("tesseract", spawnResult({ timedOut: true, exitCode: null, signal: "SIGTERM" })), "tesseract timed out after 5ms");
  assert.equal(
    processFailure("tesseract", spawnResult({ exitCode: 1, stderr: "Error opening data file\n" })),
    "tesseract failed (exit 1): Error opening data file"
  );
  assert.equal(processFailure("whisper.cpp", spawnResult({ exitCode: null, signal: "SIGKILL" })), "whisper.cpp failed (signal SIGKILL)");
});
