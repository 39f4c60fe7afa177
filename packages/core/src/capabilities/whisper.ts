import { processFailure, spawnCapture } from "../process/spawn";
import type { Transcriber, Transcript } from "../extractors/types";

export type WhisperCppOpts = {
  binaryPath: string;
  modelPath: string;
  threads?: number;
  timeoutMs?: number;
};

/** whisper.cpp reports the detected language on stderr when run with `-l auto`. */
export function parseDetectedLanguage(stderr: string): string | null {
  const m = stderr.match(/auto-detected language:\s*([a-z]{2,3})\b/i);
  return m?.[1]?.toLowerCase() ?? null;
}

/** Join whisper.cpp's `-nt` output lines into one transcript. */
export function parseWhisperText(stdout: string): string {
  return stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0 && !/^\[(?:BLANK_AUDIO|MUSIC|Music)\]$/.test(l))
    .join(" ");
}

export function createWhisperCppTranscriber(opts: WhisperCppOpts): Transcriber {
  return {
    name: "whisper-cpp",
    async transcribe(audioPath: string, language: string): Promise<Transcript> {
      const args = ["-m", opts.modelPath, "-f", audioPath, "-nt"];
      if (opts.threads) args.push("-t", String(opts.threads));
      args.push("-l", language || "auto");

      const res = await spawnCapture(opts.binaryPath, args, { timeoutMs: opts.timeoutMs ?? 900_000 });
      const failure = processFailure("whisper.cpp", res);
      if (failure) throw new Error(failure);

      return {
        text: parseWhisperText(res.stdout),
        language: language === "auto" ? parseDetectedLanguage(res.stderr) : language,
      };
    },
  };
}
