import { z } from "zod";

export const IsoDateTimeSchema = z.string().min(1);
export type IsoDateTime = z.infer<typeof IsoDateTimeSchema>;

export const ConfidenceSchema = z.number().min(0).max(1);

// ── Platforms ────────────────────────────────────────────────────────────────

export const PlatformSchema = z.enum(["twitter", "instagram", "facebook", "youtube", "unknown"]);
export type Platform = z.infer<typeof PlatformSchema>;

export const PlatformErrorKindSchema = z.enum(["auth_required", "rate_limited", "not_found", "removed", "platform_unknown"]);
export type PlatformErrorKind = z.infer<typeof PlatformErrorKindSchema>;

// ── Jobs ─────────────────────────────────────────────────────────────────────

export const JobStatusSchema = z.enum([
  "pending",
  "fetching",
  "dedup_checking",
  "extracting",
  "fusing",
  "completed",
  "duplicate",
  "failed",
]);
export type JobStatus = z.infer<typeof JobStatusSchema>;

export const TERMINAL_STATUSES: readonly JobStatus[] = ["completed", "duplicate", "failed"];
export const IN_FLIGHT_STATUSES: readonly JobStatus[] = ["fetching", "dedup_checking", "extracting", "fusing"];

export const JobPrioritySchema = z.enum(["normal", "urgent"]);
export type JobPriority = z.infer<typeof JobPrioritySchema>;

export const JobErrorKindSchema = z.enum([
  "auth_required",
  "rate_limited",
  "not_found",
  "removed",
  "platform_unknown",
  "fingerprint",
  "extraction",
  "network",
  "cancelled",
  "internal",
]);
export type JobErrorKind = z.infer<typeof JobErrorKindSchema>;

export const JobErrorSchema = z.object({
  kind: JobErrorKindSchema,
  message: z.string(),
  stage: JobStatusSchema.nullable(),
  retryable: z.boolean(),
  occurrences: z.number().int().positive(),
});
export type JobError = z.infer<typeof JobErrorSchema>;

// ── Evidence ─────────────────────────────────────────────────────────────────

export const EvidenceSourceSchema = z.enum(["audio", "ocr", "vision"]);
export type EvidenceSource = z.infer<typeof EvidenceSourceSchema>;

export const FragmentKindSchema = z.enum(["content", "category_hint", "tag_hint"]);
export type FragmentKind = z.infer<typeof FragmentKindSchema>;

export const EvidenceFragmentSchema = z.object({
  text: z.string(),
  kind: FragmentKindSchema,
  source: EvidenceSourceSchema,
  confidence: ConfidenceSchema,
  frame_refs: z.array(z.number().int().nonnegative()),
});
export type EvidenceFragment = z.infer<typeof EvidenceFragmentSchema>;

export const MediaAssetSchema = z.object({
  path: z.string().min(1),
  duration_seconds: z.number().nonnegative(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  perceptual_hash: z
    .string()
    .regex(/^[0-9a-f]{16}$/)
    .nullable(),
  has_audio: z.boolean(),
  metadata: z.record(z.unknown()).default({}),
});
export type MediaAsset = z.infer<typeof MediaAssetSchema>;

// ── Classification ───────────────────────────────────────────────────────────

export const UNKNOWN_CATEGORY = "Unknown";

export const ClassifiedTagSchema = z.object({
  label: z.string().min(1),
  confidence: ConfidenceSchema,
  source: EvidenceSourceSchema,
  sources: z.array(EvidenceSourceSchema),
  evidence: z.array(z.string()),
  frame_refs: z.array(z.number().int().nonnegative()),
  implied_by: z.string().nullable(),
});
export type ClassifiedTag = z.infer<typeof ClassifiedTagSchema>;

export const DroppedTagSchema = z.object({
  label: z.string().min(1),
  confidence: ConfidenceSchema,
  conflicts_with: z.string().min(1),
});
export type DroppedTag = z.infer<typeof DroppedTagSchema>;

export const ClassificationSchema = z.object({
  category: z.string().min(1),
  tags: z.array(ClassifiedTagSchema),
  overall_confidence: ConfidenceSchema,
  requires_review: z.boolean(),
  review_reason: z.string().nullable(),
  dropped_tags: z.array(DroppedTagSchema),
  source_coverage: z.array(EvidenceSourceSchema),
  classified_at: IsoDateTimeSchema,
});
export type Classification = z.infer<typeof ClassificationSchema>;

export const JobSchema = z.object({
  url: z.string().min(1),
  platform: PlatformSchema,
  status: JobStatusSchema,
  priority: JobPrioritySchema,
  attempts: z.number().int().nonnegative(),
  last_attempt_at: IsoDateTimeSchema.nullable(),
  next_attempt_at: IsoDateTimeSchema.nullable(),
  last_error: JobErrorSchema.nullable(),
  media_path: z.string().nullable(),
  content_hash: z.string().nullable(),
  duration_seconds: z.number().nonnegative().nullable(),
  width: z.number().int().nonnegative().nullable(),
  height: z.number().int().nonnegative().nullable(),
  duplicate_of: z.string().nullable(),
  result: ClassificationSchema.nullable(),
  cancel_requested: z.boolean(),
  claimed_by: z.string().nullable(),
  lease_expires_at: IsoDateTimeSchema.nullable(),
  created_at: IsoDateTimeSchema,
  updated_at: IsoDateTimeSchema,
  finished_at: IsoDateTimeSchema.nullable(),
});
export type Job = z.infer<typeof JobSchema>;

export const JobEventSchema = z.object({
  id: z.string().min(1),
  url: z.string().min(1),
  ts: IsoDateTimeSchema,
  level: z.enum(["debug", "info", "warn", "error"]),
  message: z.string(),
  from_status: JobStatusSchema.nullable(),
  to_status: JobStatusSchema.nullable(),
  data_json: z.unknown().nullable(),
});
export type JobEvent = z.infer<typeof JobEventSchema>;

export const IngestEntrySchema = z.object({
  url: z.string().min(1),
  priority: JobPrioritySchema.default("normal"),
});
export type IngestEntry = z.infer<typeof IngestEntrySchema>;

// ── Tag relationships ────────────────────────────────────────────────────────

export const TagRuleSchema = z.object({
  label: z.string().min(1),
  parent: z.string().min(1).nullable().default(null),
  implies: z.array(z.string().min(1)).default([]),
  conflicts_with: z.array(z.string().min(1)).default([]),
  keywords: z.array(z.string().min(1)).default([]),
  visual_labels: z.array(z.string().min(1)).default([]),
});
export type TagRule = z.infer<typeof TagRuleSchema>;

export const CategoryRuleSchema = z.object({
  label: z.string().min(1),
  keywords: z.array(z.string().min(1)).default([]),
  visual_labels: z.array(z.string().min(1)).default([]),
});
export type CategoryRule = z.infer<typeof CategoryRuleSchema>;

export const TagRelationshipTableSchema = z.object({
  version: z.number().int().positive(),
  categories: z.array(CategoryRuleSchema).min(1),
  tags: z.array(TagRuleSchema),
  visual_categories: z.array(z.string().min(1)).default([]),
});
export type TagRelationshipTable = z.infer<typeof TagRelationshipTableSchema>;

export const ProposedTagSchema = z.object({
  label: z.string().min(1),
  kind: z.enum(["category", "tag"]),
  url: z.string().min(1),
  source: EvidenceSourceSchema,
  confidence: ConfidenceSchema,
  proposed_at: IsoDateTimeSchema,
});
export type ProposedTag = z.infer<typeof ProposedTagSchema>;

// ── Configuration ────────────────────────────────────────────────────────────

export const DedupConfigSchema = z.object({
  hamming_threshold: z.number().int().min(1).max(8).default(6),
  duration_tolerance_seconds: z.number().positive().default(1.0),
});
export type DedupConfig = z.infer<typeof DedupConfigSchema>;

export const RetryConfigSchema = z.object({
  base_delay_ms: z.number().int().nonnegative().default(30_000),
  max_delay_ms: z.number().int().nonnegative().default(3_600_000),
  max_attempts: z.number().int().positive().default(5),
  fingerprint_failure_limit: z.number().int().positive().default(2),
});
export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const FusionConfigSchema = z.object({
  source_weights: z
    .object({
      audio: ConfidenceSchema.default(1.0),
      ocr: ConfidenceSchema.default(0.9),
      vision: ConfidenceSchema.default(0.75),
    })
    .default({}),
  implication_threshold: ConfidenceSchema.default(0.5),
  implication_discount: ConfidenceSchema.default(0.8),
  min_tag_confidence: ConfidenceSchema.default(0.3),
  review_threshold: ConfidenceSchema.default(0.6),
  minimum_confidence: ConfidenceSchema.default(0),
});
export type FusionConfig = z.infer<typeof FusionConfigSchema>;

export const VisionModeSchema = z.enum(["off", "auto", "always"]);
export type VisionMode = z.infer<typeof VisionModeSchema>;

export const ExtractionConfigSchema = z.object({
  transcript_min_chars: z.number().int().nonnegative().default(20),
  transcript_fallback_language: z.string().min(1).nullable().default("ar"),
  ocr_frame_count: z.number().int().min(5).default(5),
  ocr_languages: z.array(z.string().min(1)).min(1).default(["ara", "eng"]),
  vision_mode: VisionModeSchema.default("off"),
  vision_frame_count: z.number().int().min(1).default(5),
});
export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const PipelineConfigSchema = z.object({
  concurrency: z.number().int().positive().default(2),
  compute_concurrency: z.number().int().positive().default(1),
  lease_ms: z.number().int().positive().default(15 * 60_000),
  work_dir: z.string().min(1).default(".run/media"),
  dedup: DedupConfigSchema.default({}),
  retry: RetryConfigSchema.default({}),
  fusion: FusionConfigSchema.default({}),
  extraction: ExtractionConfigSchema.default({}),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// ── Export / validation ──────────────────────────────────────────────────────

export const ExportRecordSchema = z.object({
  url: z.string().min(1),
  platform: PlatformSchema,
  status: JobStatusSchema,
  duplicate_of: z.string().nullable(),
  last_error: JobErrorSchema.nullable(),
  classification: ClassificationSchema.nullable(),
});
export type ExportRecord = z.infer<typeof ExportRecordSchema>;

export const LabelledExampleSchema = z.object({
  url: z.string().min(1),
  category: z.string().min(1),
  tags: z.array(z.string()).default([]),
});
export type LabelledExample = z.infer<typeof LabelledExampleSchema>;

export const ValidationReportSchema = z.object({
  evaluated: z.number().int().nonnegative(),
  missing: z.array(z.string()),
  category_accuracy: ConfidenceSchema,
  tag_precision: ConfidenceSchema,
  tag_recall: ConfidenceSchema,
  mismatches: z.array(
    z.object({
      url: z.string(),
      expected: z.string(),
      actual: z.string(),
    })
  ),
});
export type ValidationReport = z.infer<typeof ValidationReportSchema>;
