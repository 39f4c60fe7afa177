import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/** Extract a 16 kHz mono PCM WAV track, the input format whisper.cpp expects. */
export async function extractAudioWav(videoPath: string, outputPath: string, opts?: { timeoutMs?: number }): Promise<string> {
  await execFileAsync(
    "ffmpeg",
    ["-v", "error", "-i", videoPath, "-vn", "-acodec", "pcm_s16le", "-ar", "16000", "-ac", "1", "-y", outputPath],
    { timeout: opts?.timeoutMs ?? 120_000, maxBuffer: 10 * 1024 * 1024 }
  );
  return outputPath;
}
