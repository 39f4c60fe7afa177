import path from "node:path";
import type { EvidenceFragment } from "@archive/contracts";
import { ExtractionError } from "../errors";
import { ffmpegFrameSampler, readFrames, type FrameSampler } from "./frames";
import { hintFragments } from "./labeling";
import type { ExtractionContext, Labeler, SignalExtractor, TextRecognizer } from "./types";

export type OnScreenTextExtractorDeps = {
  recognizer: TextRecognizer;
  labeler: Labeler;
  sampler?: FrameSampler;
};

export function createOnScreenTextExtractor(deps: OnScreenTextExtractorDeps): SignalExtractor {
  const sampler = deps.sampler ?? ffmpegFrameSampler;
  const name = "on_screen_text";

  return {
    name,
    source: "ocr",
    required: true,
    async *extract(ctx: ExtractionContext): AsyncGenerator<EvidenceFragment> {
      let read: Awaited<ReturnType<typeof readFrames>>;
      try {
        read = await readFrames(ctx.asset, path.join(ctx.workDir, "ocr"), ctx.config.ocr_frame_count, sampler, (paths) =>
          ctx.compute(() => deps.recognizer.recognize(paths, ctx.config.ocr_languages))
        );
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ExtractionError(name, "ocr", `${deps.recognizer.name} failed: ${detail}`, { cause: err });
      }
      if (!read.frames.length) throw new ExtractionError(name, "ocr", "no frames could be decoded");

      const withText = [...read.texts].filter(([, text]) => text.length > 0);
      if (!withText.length) return;

      yield {
        text: withText.map(([, text]) => text).join("\n"),
        kind: "content",
        source: "ocr",
        confidence: 1,
        frame_refs: withText.map(([index]) => index),
      };

      const labels = await deps.labeler.label({ text: withText.map(([, text]) => text).join("\n"), source: "ocr" });
      if (labels.proposals.length) ctx.propose(labels.proposals, "ocr");
      yield* hintFragments(labels.hints, "ocr", read.texts);
    },
  };
}
