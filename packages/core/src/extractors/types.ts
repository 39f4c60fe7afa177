import type { EvidenceFragment, EvidenceSource, ExtractionConfig, MediaAsset } from "@archive/contracts";
import type { Logger } from "../logger";

// ── Capabilities ─────────────────────────────────────────────────────────────

export type Transcript = { text: string; language: string | null };

export interface Transcriber {
  readonly name: string;
  /** `language` is "auto" for detection or an explicit code such as "ar". */
  transcribe(audioPath: string, language: string): Promise<Transcript>;
}

export interface TextRecognizer {
  readonly name: string;
  /** One string per input frame, in input order ("" for frames without text). */
  recognize(framePaths: string[], languageOrder: string[]): Promise<string[]>;
}

export interface VisionDescriber {
  readonly name: string;
  /** One description per input frame, in input order. */
  describe(framePaths: string[]): Promise<string[]>;
}

export type LabelHint = {
  kind: "category_hint" | "tag_hint";
  label: string;
  confidence: number;
  /** Phrases in the text that triggered the hint; empty for model labelers. */
  matched: string[];
};

export type LabelProposal = {
  kind: "category" | "tag";
  label: string;
  confidence: number;
};

export type LabelResult = { hints: LabelHint[]; proposals: LabelProposal[] };

export interface Labeler {
  readonly name: string;
  label(input: { text: string; source: EvidenceSource }): Promise<LabelResult>;
}

// ── Extractors ───────────────────────────────────────────────────────────────

export type ExtractionContext = {
  url: string;
  asset: MediaAsset;
  /** Scratch directory owned by this job. */
  workDir: string;
  config: ExtractionConfig;
  logger: Logger;
  /** Shared limiter for local model invocations. */
  compute: <T>(fn: () => Promise<T>) => Promise<T>;
  /** Receives labels a labeler proposed outside the closed sets. */
  propose: (proposals: LabelProposal[], source: EvidenceSource) => void;
};

export interface SignalExtractor {
  readonly name: string;
  readonly source: EvidenceSource;
  /** A required extractor that yields nothing flags the classification for review. */
  readonly required: boolean;
  extract(ctx: ExtractionContext): AsyncIterable<EvidenceFragment>;
}
