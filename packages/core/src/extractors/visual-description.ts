import path from "node:path";
import type { Classification, EvidenceFragment, JobPriority, VisionMode } from "@archive/contracts";
import { ExtractionError } from "../errors";
import type { TagRelationships } from "../taxonomy/relationships";
import { ffmpegFrameSampler, readFrames, type FrameSampler } from "./frames";
import { hintFragments } from "./labeling";
import type { ExtractionContext, Labeler, SignalExtractor, VisionDescriber } from "./types";

export type VisualDescriptionExtractorDeps = {
  describer: VisionDescriber;
  labeler: Labeler;
  sampler?: FrameSampler;
};

export function createVisualDescriptionExtractor(deps: VisualDescriptionExtractorDeps): SignalExtractor {
  const sampler = deps.sampler ?? ffmpegFrameSampler;
  const name = "visual_description";

  return {
    name,
    source: "vision",
    required: false,
    async *extract(ctx: ExtractionContext): AsyncGenerator<EvidenceFragment> {
      let read: Awaited<ReturnType<typeof readFrames>>;
      try {
        read = await readFrames(ctx.asset, path.join(ctx.workDir, "vision"), ctx.config.vision_frame_count, sampler, (paths) =>
          ctx.compute(() => deps.describer.describe(paths))
        );
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ExtractionError(name, "vision", `${deps.describer.name} failed: ${detail}`, { cause: err });
      }
      if (!read.frames.length) throw new ExtractionError(name, "vision", "no frames could be decoded");

      const described = [...read.texts].filter(([, text]) => text.length > 0);
      if (!described.length) return;
      const text = described.map(([index, t]) => `[frame ${index}] ${t}`).join("\n");

      yield { text, kind: "content", source: "vision", confidence: 1, frame_refs: described.map(([index]) => index) };

      const labels = await deps.labeler.label({ text: described.map(([, t]) => t).join("\n"), source: "vision" });
      if (labels.proposals.length) ctx.propose(labels.proposals, "vision");
      yield* hintFragments(labels.hints, "vision", read.texts);
    },
  };
}

/**
 * Vision is costly, so in `auto` it only runs for urgent jobs or when the
 * required sources point at a visually-grounded category or leave the result
 * below the review threshold.
 */
export function shouldRunVision(input: {
  mode: VisionMode;
  priority: JobPriority;
  preliminary: Pick<Classification, "category" | "overall_confidence">;
  relationships: TagRelationships;
  reviewThreshold: number;
}): boolean {
  switch (input.mode) {
    case "off":
      return false;
    case "always":
      return true;
    case "auto":
      return (
        input.priority === "urgent" ||
        input.relationships.isVisualCategory(input.preliminary.category) ||
        input.preliminary.overall_confidence < input.reviewThreshold
      );
  }
}
