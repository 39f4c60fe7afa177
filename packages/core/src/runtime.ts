import { z } from "zod";
import type { PipelineConfig } from "@archive/contracts";
import { InMemoryArchiveIndex, type ArchiveIndex } from "./archive/archive-index";
import { createCapabilities, loadCapabilityConfig } from "./capabilities";
import { runMigrations } from "./cli/migrate";
import { loadPipelineConfig } from "./config/pipeline";
import { closePool, getPool } from "./db/pool";
import { createOnScreenTextExtractor } from "./extractors/on-screen-text";
import { createTranscriptExtractor } from "./extractors/transcript";
import type { SignalExtractor } from "./extractors/types";
import { createVisualDescriptionExtractor } from "./extractors/visual-description";
import { createFfmpegFingerprinter } from "./frames/fingerprint";
import { InMemoryJobStore, type JobStore } from "./jobs/store";
import { logger as rootLogger, type Logger } from "./logger";
import type { Metrics } from "./metrics/metrics";
import { PipelineOrchestrator } from "./pipeline/orchestrator";
import { createYtDlpGateway } from "./platform/yt-dlp";
import { PgArchiveIndex } from "./repos/archive";
import { PgJobStore } from "./repos/jobs";
import { PgProposedTagLog } from "./repos/proposed-tags";
import { InMemoryProposedTagLog, type ProposedTagLog } from "./taxonomy/proposed-tags";
import { loadTagRelationships, type TagRelationships } from "./taxonomy/relationships";

const RuntimeEnvSchema = z.object({
  VEA_STORAGE: z.enum(["postgres", "memory"]).default("postgres"),
  VEA_TAXONOMY_PATH: z.string().min(1).optional(),
  VEA_YTDLP_PATH: z.string().min(1).optional(),
  VEA_YTDLP_COOKIES: z.string().min(1).optional(),
});

export type PipelineRuntime = {
  orchestrator: PipelineOrchestrator;
  store: JobStore;
  archive: ArchiveIndex;
  proposedTags: ProposedTagLog;
  relationships: TagRelationships;
  config: PipelineConfig;
  /** Bring durable storage up to date; the migration files applied now. */
  migrate(): Promise<string[]>;
  close(): Promise<void>;
};

/**
 * Wire the orchestrator from environment variables: Postgres-backed stores by
 * default (`VEA_STORAGE=memory` for a throwaway dry run), whisper.cpp,
 * tesseract and Ollama behind the capability interfaces.
 */
export function createRuntime(opts?: {
  env?: Record<string, string | undefined>;
  logger?: Logger;
  metrics?: Metrics | null;
  concurrency?: number;
}): PipelineRuntime {
  const env = opts?.env ?? process.env;
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => typeof v === "string" && v.trim() !== ""));
  const runtimeEnv = RuntimeEnvSchema.parse(cleaned);
  const baseConfig = loadPipelineConfig(env);
  const config: PipelineConfig = opts?.concurrency ? { ...baseConfig, concurrency: opts.concurrency } : baseConfig;
  const log = opts?.logger ?? rootLogger;

  const relationships = loadTagRelationships(runtimeEnv.VEA_TAXONOMY_PATH);
  const capabilities = createCapabilities(loadCapabilityConfig(env), relationships);

  let store: JobStore;
  let archive: ArchiveIndex;
  let proposedTags: ProposedTagLog;
  let migrate = async (): Promise<string[]> => [];
  let close = async () => {};
  if (runtimeEnv.VEA_STORAGE === "postgres") {
    const pool = getPool(env);
    store = new PgJobStore(pool);
    archive = new PgArchiveIndex(pool, config.dedup);
    proposedTags = new PgProposedTagLog(pool);
    migrate = () => runMigrations(env);
    close = closePool;
  } else {
    store = new InMemoryJobStore();
    archive = new InMemoryArchiveIndex(config.dedup);
    proposedTags = new InMemoryProposedTagLog();
  }

  const extractors: SignalExtractor[] = [];
  if (capabilities.transcriber) {
    extractors.push(createTranscriptExtractor({ transcriber: capabilities.transcriber, labeler: capabilities.labeler }));
  }
  if (capabilities.recognizer) {
    extractors.push(createOnScreenTextExtractor({ recognizer: capabilities.recognizer, labeler: capabilities.labeler }));
  }
  if (config.extraction.vision_mode !== "off") {
    extractors.push(createVisualDescriptionExtractor({ describer: capabilities.describer, labeler: capabilities.labeler }));
  }
  log.info(
    {
      storage: runtimeEnv.VEA_STORAGE,
      extractors: extractors.map((e) => e.name),
      labeler: capabilities.labeler.name,
      taxonomyVersion: relationships.version,
    },
    "pipeline runtime ready"
  );

  const orchestrator = new PipelineOrchestrator({
    store,
    archive,
    gateway: createYtDlpGateway({
      binaryPath: runtimeEnv.VEA_YTDLP_PATH,
      extraArgs: runtimeEnv.VEA_YTDLP_COOKIES ? ["--cookies", runtimeEnv.VEA_YTDLP_COOKIES] : [],
    }),
    fingerprinter: createFfmpegFingerprinter(),
    extractors,
    relationships,
    proposedTags,
    config,
    logger: log.child({ component: "orchestrator" }),
    metrics: opts?.metrics ?? null,
  });

  return { orchestrator, store, archive, proposedTags, relationships, config, migrate, close };
}
