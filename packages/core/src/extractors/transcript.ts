import path from "node:path";
import type { EvidenceFragment, ExtractionConfig, MediaAsset } from "@archive/contracts";
import { ExtractionError } from "../errors";
import { extractAudioWav } from "../media/audio";
import { hintFragments } from "./labeling";
import type { ExtractionContext, Labeler, SignalExtractor, Transcriber } from "./types";

export type TranscriptExtractorDeps = {
  transcriber: Transcriber;
  labeler: Labeler;
  prepareAudio?: (asset: MediaAsset, workDir: string) => Promise<string>;
};

function defaultPrepareAudio(asset: MediaAsset, workDir: string): Promise<string> {
  return extractAudioWav(asset.path, path.join(workDir, "audio.wav"));
}

/**
 * Auto-detect first; when that yields too little text and a fallback language
 * is configured, transcribe again in that language and keep the longer text.
 */
export async function transcribeWithFallback(
  transcriber: Transcriber,
  audioPath: string,
  config: Pick<ExtractionConfig, "transcript_min_chars" | "transcript_fallback_language">,
  compute: ExtractionContext["compute"] = (fn) => fn()
): Promise<{ text: string; language: string | null }> {
  const first = await compute(() => transcriber.transcribe(audioPath, "auto"));
  let best = { text: first.text.trim(), language: first.language };
  const fallback = config.transcript_fallback_language;
  if (best.text.length < config.transcript_min_chars && fallback) {
    const second = await compute(() => transcriber.transcribe(audioPath, fallback));
    const text = second.text.trim();
    if (text.length > best.text.length) best = { text, language: second.language ?? fallback };
  }
  return best;
}

export function createTranscriptExtractor(deps: TranscriptExtractorDeps): SignalExtractor {
  const prepareAudio = deps.prepareAudio ?? defaultPrepareAudio;
  const name = "transcript";

  return {
    name,
    source: "audio",
    required: true,
    async *extract(ctx: ExtractionContext): AsyncGenerator<EvidenceFragment> {
      if (!ctx.asset.has_audio) throw new ExtractionError(name, "audio", "media has no audio stream");

      let audioPath: string;
      try {
        audioPath = await prepareAudio(ctx.asset, ctx.workDir);
      } catch (err) {
        throw new ExtractionError(name, "audio", "could not extract the audio track", { cause: err });
      }

      let transcript: { text: string; language: string | null };
      try {
        transcript = await transcribeWithFallback(deps.transcriber, audioPath, ctx.config, ctx.compute);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ExtractionError(name, "audio", `${deps.transcriber.name} failed: ${detail}`, { cause: err });
      }
      if (!transcript.text) return;
      ctx.logger.debug({ url: ctx.url, chars: transcript.text.length, language: transcript.language }, "transcript ready");

      yield { text: transcript.text, kind: "content", source: "audio", confidence: 1, frame_refs: [] };

      const labels = await deps.labeler.label({ text: transcript.text, source: "audio" });
      if (labels.proposals.length) ctx.propose(labels.proposals, "audio");
      yield* hintFragments(labels.hints, "audio");
    },
  };
}
