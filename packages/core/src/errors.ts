import type { EvidenceSource, JobError, JobErrorKind, JobStatus, PlatformErrorKind } from "@archive/contracts";

const RETRYABLE_PLATFORM_KINDS: ReadonlySet<PlatformErrorKind> = new Set(["rate_limited", "platform_unknown"]);

export class PlatformError extends Error {
  readonly kind: PlatformErrorKind;
  readonly retryAfterMs: number | null;

  constructor(kind: PlatformErrorKind, message: string, opts?: { retryAfterMs?: number | null; cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = "PlatformError";
    this.kind = kind;
    this.retryAfterMs = opts?.retryAfterMs ?? null;
  }

  get retryable(): boolean {
    return RETRYABLE_PLATFORM_KINDS.has(this.kind);
  }
}

/** Raised when a media file cannot be sampled for a perceptual hash. */
export class FingerprintError extends Error {
  readonly path: string;

  constructor(path: string, message: string, opts?: { cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = "FingerprintError";
    this.path = path;
  }
}

export class ExtractionError extends Error {
  readonly extractor: string;
  readonly source: EvidenceSource;

  constructor(extractor: string, source: EvidenceSource, message: string, opts?: { cause?: unknown }) {
    super(message, { cause: opts?.cause });
    this.name = "ExtractionError";
    this.extractor = extractor;
    this.source = source;
  }
}

const NETWORK_CODES = new Set(["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EAI_AGAIN", "EPIPE", "ENETUNREACH"]);

function errnoCode(err: unknown): string | null {
  if (typeof err !== "object" || err === null || !("code" in err)) return null;
  const code = err.code;
  return typeof code === "string" ? code : null;
}

function errorKind(err: unknown, stage: JobStatus | null): JobErrorKind {
  if (err instanceof PlatformError) return err.kind;
  if (err instanceof FingerprintError) return "fingerprint";
  if (err instanceof ExtractionError) return "extraction";
  const code = errnoCode(err);
  if (code && NETWORK_CODES.has(code)) return "network";
  if (stage === "fetching") return "platform_unknown";
  return "internal";
}

export function isRetryableKind(kind: JobErrorKind): boolean {
  switch (kind) {
    case "rate_limited":
    case "platform_unknown":
    case "network":
    case "extraction":
    case "fingerprint":
      return true;
    default:
      return false;
  }
}

/**
 * Map any thrown value to the persisted `JobError` shape. Consecutive failures
 * of the same kind accumulate in `occurrences`.
 */
export function toJobError(err: unknown, stage: JobStatus | null, previous?: JobError | null): JobError {
  const kind = errorKind(err, stage);
  const message = err instanceof Error ? err.message : String(err);
  const occurrences = previous && previous.kind === kind ? previous.occurrences + 1 : 1;
  return { kind, message: message || kind, stage, retryable: isRetryableKind(kind), occurrences };
}
