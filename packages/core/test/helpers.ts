import pino from "pino";
import { PipelineConfigSchema, type MediaAsset, type PipelineConfig } from "@archive/contracts";
import type { ExtractionContext, LabelProposal } from "../src/extractors/types";
import { TagRelationships } from "../src/taxonomy/relationships";

export const silentLogger = pino({ level: "silent" });

/** A small table shaped like the production one. */
export function testRelationships(): TagRelationships {
  return new TagRelationships({
    version: 3,
    categories: [
      { label: "Willful Killing", keywords: ["killed", "shot dead", "قتل"], visual_labels: ["body"] },
      { label: "Destruction of Property", keywords: ["demolished", "bulldozer"], visual_labels: ["rubble"] },
      { label: "Displacement", keywords: ["evicted", "displaced"] },
      { label: "Other" },
    ],
    tags: [
      { label: "Women", keywords: ["woman", "women"] },
      { label: "Children", keywords: ["child", "children", "أطفال"] },
      { label: "Repression" },
      { label: "Prisoners", parent: "Repression", conflicts_with: ["Hostages"], keywords: ["prisoner", "detainee"] },
      { label: "Hostages", keywords: ["hostage"] },
      { label: "Torture", parent: "Repression", implies: ["Prisoners"], keywords: ["torture", "beaten"] },
      { label: "Birth Prevention", implies: ["Women"], keywords: ["sterilization"] },
    ],
    visual_categories: ["Destruction of Property"],
  });
}

export function testConfig(overrides?: Record<string, unknown>): PipelineConfig {
  return PipelineConfigSchema.parse({ work_dir: "/tmp/vea-test", ...overrides });
}

export function testAsset(overrides?: Partial<MediaAsset>): MediaAsset {
  return {
    path: "/tmp/vea-test/clip/media.mp4",
    duration_seconds: 20,
    width: 1280,
    height: 720,
    perceptual_hash: null,
    has_audio: true,
    metadata: {},
    ...overrides,
  };
}

export function testContext(overrides?: Partial<ExtractionContext>): ExtractionContext & { proposals: LabelProposal[] } {
  const proposals: LabelProposal[] = [];
  return {
    url: "https://x.com/someone/status/100",
    asset: testAsset(),
    workDir: "/tmp/vea-test/clip",
    config: testConfig().extraction,
    logger: silentLogger,
    compute: (fn) => fn(),
    propose: (items) => {
      proposals.push(...items);
    },
    ...overrides,
    proposals,
  };
}

/** Manually advanced clock; `sleep` moves time forward instead of waiting. */
export function fakeClock(startIso = "2026-03-01T12:00:00.000Z") {
  let t = Date.parse(startIso);
  return {
    now: () => new Date(t),
    sleep: async (ms: number) => {
      t += ms;
    },
    advance: (ms: number) => {
      t += ms;
    },
  };
}

export async function collect<T>(it: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const x of it) out.push(x);
  return out;
}
