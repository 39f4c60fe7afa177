import { spawn } from "node:child_process";

export type SpawnCaptureResult = {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  durationMs: number;
};

export type SpawnCaptureOpts = {
  cwd?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  /** Keep only the tail of each stream beyond this many characters. */
  maxOutputChars?: number;
};

const KILL_GRACE_MS = 2_000;
const DEFAULT_MAX_OUTPUT_CHARS = 4 * 1024 * 1024;

function appendTail(buf: string, chunk: string, max: number): string {
  const next = buf + chunk;
  return next.length > max ? next.slice(next.length - max) : next;
}

/**
 * Run a media tool to completion and capture its output. Never rejects on a
 * non-zero exit; only a spawn failure (missing binary) rejects. On timeout the
 * child gets SIGTERM, then SIGKILL after a short grace period.
 */
export function spawnCapture(cmd: string, args: string[], opts?: SpawnCaptureOpts): Promise<SpawnCaptureResult> {
  const startedAt = Date.now();
  const timeoutMs = Math.max(250, opts?.timeoutMs ?? 120_000);
  const maxChars = opts?.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;

  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";
    let timedOut = false;
    let killTimer: NodeJS.Timeout | null = null;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGTERM");
      killTimer = setTimeout(() => child.kill("SIGKILL"), KILL_GRACE_MS);
    }, timeoutMs);

    const stopTimers = () => {
      clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (d: string) => {
      stdout = appendTail(stdout, d, maxChars);
    });
    child.stderr.on("data", (d: string) => {
      stderr = appendTail(stderr, d, maxChars);
    });

    child.on("error", (err) => {
      stopTimers();
      reject(err);
    });

    child.on("close", (code, signal) => {
      stopTimers();
      resolve({ stdout, stderr, exitCode: code, signal, timedOut, durationMs: Date.now() - startedAt });
    });
  });
}

/** Last non-empty stderr/stdout line, for error messages. */
export function lastOutputLine(res: Pick<SpawnCaptureResult, "stdout" | "stderr">): string {
  const lines = `${res.stderr}\n${res.stdout}`
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter(Boolean);
  return lines[lines.length - 1] ?? "";
}

/** Human-readable reason a tool run did not succeed, or null when it did. */
export function processFailure(tool: string, res: SpawnCaptureResult): string | null {
  if (res.timedOut) return `${tool} timed out after ${res.durationMs}ms`;
  if (res.exitCode === 0) return null;
  const how = res.exitCode === null ? `signal ${res.signal ?? "unknown"}` : `exit ${res.exitCode}`;
  const detail = lastOutputLine(res);
  return detail ? `${tool} failed (${how}): ${detail}` : `${tool} failed (${how})`;
}
