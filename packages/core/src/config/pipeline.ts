import { z } from "zod";
import { PipelineConfigSchema, VisionModeSchema, type PipelineConfig } from "@archive/contracts";

const EnvSchema = z.object({
  VEA_CONCURRENCY: z.coerce.number().int().positive().optional(),
  VEA_COMPUTE_CONCURRENCY: z.coerce.number().int().positive().optional(),
  VEA_LEASE_MS: z.coerce.number().int().positive().optional(),
  VEA_WORK_DIR: z.string().min(1).optional(),
  VEA_DEDUP_HAMMING_THRESHOLD: z.coerce.number().int().optional(),
  VEA_DEDUP_DURATION_TOLERANCE_S: z.coerce.number().optional(),
  VEA_RETRY_BASE_DELAY_MS: z.coerce.number().int().optional(),
  VEA_RETRY_MAX_DELAY_MS: z.coerce.number().int().optional(),
  VEA_RETRY_MAX_ATTEMPTS: z.coerce.number().int().optional(),
  VEA_REVIEW_THRESHOLD: z.coerce.number().optional(),
  VEA_TRANSCRIPT_MIN_CHARS: z.coerce.number().int().optional(),
  VEA_TRANSCRIPT_FALLBACK_LANGUAGE: z.string().optional(),
  VEA_OCR_FRAMES: z.coerce.number().int().optional(),
  VEA_OCR_LANGUAGES: z.string().optional(),
  VEA_VISION_MODE: VisionModeSchema.optional(),
});

function clean(s: unknown): string {
  return typeof s === "string" ? s.trim() : "";
}

function blankToUndefined(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    const s = clean(v);
    if (s) out[k] = s;
  }
  return out;
}

/**
 * Build the pipeline configuration from `VEA_*` environment variables.
 * Unset variables fall through to the schema defaults; out-of-range values throw.
 */
export function loadPipelineConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const e = EnvSchema.parse(blankToUndefined(env));
  const fallbackLanguage = e.VEA_TRANSCRIPT_FALLBACK_LANGUAGE;

  return PipelineConfigSchema.parse({
    concurrency: e.VEA_CONCURRENCY,
    compute_concurrency: e.VEA_COMPUTE_CONCURRENCY,
    lease_ms: e.VEA_LEASE_MS,
    work_dir: e.VEA_WORK_DIR,
    dedup: {
      hamming_threshold: e.VEA_DEDUP_HAMMING_THRESHOLD,
      duration_tolerance_seconds: e.VEA_DEDUP_DURATION_TOLERANCE_S,
    },
    retry: {
      base_delay_ms: e.VEA_RETRY_BASE_DELAY_MS,
      max_delay_ms: e.VEA_RETRY_MAX_DELAY_MS,
      max_attempts: e.VEA_RETRY_MAX_ATTEMPTS,
    },
    fusion: {
      review_threshold: e.VEA_REVIEW_THRESHOLD,
    },
    extraction: {
      transcript_min_chars: e.VEA_TRANSCRIPT_MIN_CHARS,
      // "none" disables the explicit-language retry.
      transcript_fallback_language: fallbackLanguage === "none" ? null : fallbackLanguage,
      ocr_frame_count: e.VEA_OCR_FRAMES,
      ocr_languages: e.VEA_OCR_LANGUAGES ? e.VEA_OCR_LANGUAGES.split(/[+,]/).map(clean).filter(Boolean) : undefined,
      vision_mode: e.VEA_VISION_MODE,
    },
  });
}
