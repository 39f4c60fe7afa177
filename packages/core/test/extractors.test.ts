import test from "node:test";
import assert from "node:assert/strict";
import { ExtractionError } from "../src/errors";
import type { FrameSampler } from "../src/extractors/frames";
import { keywordConfidence, KeywordLabeler } from "../src/extractors/labeling";
import { createOnScreenTextExtractor } from "../src/extractors/on-screen-text";
import { createTranscriptExtractor, transcribeWithFallback } from "../src/extractors/transcript";
import type { Labeler, TextRecognizer, Transcriber, VisionDescriber } from "../src/extractors/types";
import { createVisualDescriptionExtractor, shouldRunVision } from "../src/extractors/visual-description";
import { collect, testAsset, testContext, testRelationships } from "./helpers";

function scriptedTranscriber(byLanguage: Record<string, string>, calls: string[] = []): Transcriber {
  return {
    name: "stub-stt",
    async transcribe(_audioPath, language) {
      calls.push(language);
      return { text: byLanguage[language] ?? "", language: language === "auto" ? "en" : language };
    },
  };
}

/** Decodes every offset except those listed in `skip`. */
function stubSampler(skip: number[] = [], seen?: { dir?: string; offsets?: number[] }): FrameSampler {
  return async (_asset, outputDir, offsets) => {
    if (seen) {
      seen.dir = outputDir;
      seen.offsets = offsets;
    }
    return offsets
      .map((o, i) => ({ frameIndex: i, timestampMs: Math.round(o * 1000), filePath: `/f/${i}.jpg` }))
      .filter((f) => !skip.includes(f.frameIndex));
  };
}

const ARABIC_LONG = "شهادة طويلة عن ما حدث في الحي";

test("transcription falls back to the configured language when auto is too short", async () => {
  const calls: string[] = [];
  const out = await transcribeWithFallback(
    scriptedTranscriber({ auto: " short ", ar: ARABIC_LONG }, calls),
    "/tmp/a.wav",
    { transcript_min_chars: 20, transcript_fallback_language: "ar" }
  );
  assert.deepEqual(calls, ["auto", "ar"]);
  assert.deepEqual(out, { text: ARABIC_LONG, language: "ar" });
});

test("transcription keeps the auto result when it is long enough or longer", async () => {
  const longEnough: string[] = [];
  const a = await transcribeWithFallback(
    scriptedTranscriber({ auto: "soldiers entered the village at dawn" }, longEnough),
    "/tmp/a.wav",
    { transcript_min_chars: 20, transcript_fallback_language: "ar" }
  );
  assert.deepEqual(longEnough, ["auto"]);
  assert.equal(a.language, "en");

  const b = await transcribeWithFallback(scriptedTranscriber({ auto: "a few words", ar: "كلمة" }), "/tmp/a.wav", {
    transcript_min_chars: 20,
    transcript_fallback_language: "ar",
  });
  assert.deepEqual(b, { text: "a few words", language: "en" });

  const noFallback: string[] = [];
  await transcribeWithFallback(scriptedTranscriber({ auto: "" }, noFallback), "/tmp/a.wav", {
    transcript_min_chars: 20,
    transcript_fallback_language: null,
  });
  assert.deepEqual(noFallback, ["auto"]);
});

test("transcript extractor yields the transcript then its hints", async () => {
  const prepared: string[] = [];
  const extractor = createTranscriptExtractor({
    transcriber: scriptedTranscriber({ auto: "Soldiers shot dead two men near the school" }),
    labeler: new KeywordLabeler(testRelationships()),
    prepareAudio: async (_asset, workDir) => {
      prepared.push(workDir);
      return `${workDir}/audio.wav`;
    },
  });
  assert.equal(extractor.source, "audio");
  assert.equal(extractor.required, true);

  const fragments = await collect(extractor.extract(testContext()));
  assert.deepEqual(prepared, ["/tmp/vea-test/clip"]);
  assert.deepEqual(fragments, [
    { text: "Soldiers shot dead two men near the school", kind: "content", source: "audio", confidence: 1, frame_refs: [] },
    { text: "Willful Killing", kind: "category_hint", source: "audio", confidence: 0.5, frame_refs: [] },
  ]);
});

test("transcript extractor fails on media without audio", async () => {
  const extractor = createTranscriptExtractor({
    transcriber: scriptedTranscriber({}),
    labeler: new KeywordLabeler(testRelationships()),
    prepareAudio: async () => "/tmp/never.wav",
  });
  const ctx = testContext({ asset: testAsset({ has_audio: false }) });
  await assert.rejects(collect(extractor.extract(ctx)), (err: unknown) => {
    assert.ok(err instanceof ExtractionError);
    assert.equal(err.extractor, "transcript");
    assert.equal(err.message, "media has no audio stream");
    return true;
  });
});

test("labeler proposals reach the extraction context", async () => {
  const labeler: Labeler = {
    name: "stub-llm",
    async label() {
      return {
        hints: [{ kind: "tag_hint", label: "Women", confidence: 0.6, matched: [] }],
        proposals: [{ kind: "tag", label: "Checkpoint", confidence: 0.6 }],
      };
    },
  };
  const extractor = createTranscriptExtractor({
    transcriber: scriptedTranscriber({ auto: "she was stopped at the checkpoint for hours" }),
    labeler,
    prepareAudio: async () => "/tmp/a.wav",
  });
  const ctx = testContext();
  const fragments = await collect(extractor.extract(ctx));
  assert.deepEqual(ctx.proposals, [{ kind: "tag", label: "Checkpoint", confidence: 0.6 }]);
  assert.deepEqual(fragments[1], { text: "Women", kind: "tag_hint", source: "audio", confidence: 0.6, frame_refs: [] });
});

test("on-screen text extractor reads strategic frames and cites them", async () => {
  const texts: Record<string, string> = {
    "/f/0.jpg": "  BREAKING  ",
    "/f/2.jpg": "",
    "/f/3.jpg": "hostage \n released",
    "/f/4.jpg": "قتل",
  };
  const languages: string[][] = [];
  const recognizer: TextRecognizer = {
    name: "stub-ocr",
    async recognize(paths, languageOrder) {
      languages.push(languageOrder);
      return paths.map((p) => texts[p] ?? "");
    },
  };
  const seen: { dir?: string; offsets?: number[] } = {};
  const extractor = createOnScreenTextExtractor({
    recognizer,
    labeler: new KeywordLabeler(testRelationships()),
    sampler: stubSampler([1], seen),
  });

  const fragments = await collect(extractor.extract(testContext()));
  assert.equal(seen.dir, "/tmp/vea-test/clip/ocr");
  assert.deepEqual(seen.offsets, [1, 2, 10, 18, 19]);
  assert.deepEqual(languages, [["ara", "eng"]]);
  assert.deepEqual(fragments, [
    { text: "BREAKING\nhostage released\nقتل", kind: "content", source: "ocr", confidence: 1, frame_refs: [0, 3, 4] },
    { text: "Willful Killing", kind: "category_hint", source: "ocr", confidence: 0.5, frame_refs: [4] },
    { text: "Hostages", kind: "tag_hint", source: "ocr", confidence: 0.5, frame_refs: [3] },
  ]);
});

test("on-screen text extractor with blank frames yields nothing", async () => {
  const extractor = createOnScreenTextExtractor({
    recognizer: { name: "stub-ocr", recognize: async (paths) => paths.map(() => "  ") },
    labeler: new KeywordLabeler(testRelationships()),
    sampler: stubSampler(),
  });
  assert.deepEqual(await collect(extractor.extract(testContext())), []);
});

test("on-screen text extractor fails when no frame decodes or the engine fails", async () => {
  const labeler = new KeywordLabeler(testRelationships());
  const noFrames = createOnScreenTextExtractor({
    recognizer: { name: "stub-ocr", recognize: async () => [] },
    labeler,
    sampler: stubSampler([0, 1, 2, 3, 4]),
  });
  await assert.rejects(collect(noFrames.extract(testContext())), /no frames could be decoded/);

  const crashing = createOnScreenTextExtractor({
    recognizer: {
      name: "stub-ocr",
      recognize: async () => {
        throw new Error("engine crashed");
      },
    },
    labeler,
    sampler: stubSampler(),
  });
  await assert.rejects(collect(crashing.extract(testContext())), (err: unknown) => {
    assert.ok(err instanceof ExtractionError);
    assert.equal(err.source, "ocr");
    assert.equal(err.message, "stub-ocr failed: engine crashed");
    return true;
  });
});

test("visual description extractor labels frame descriptions against visual labels", async () => {
  const descriptions = ["A bulldozer near a house", "", "rubble and smoke", "", ""];
  const describer: VisionDescriber = {
    name: "stub-vision",
    describe: async (paths) => paths.map((_, i) => descriptions[i] ?? ""),
  };
  const extractor = createVisualDescriptionExtractor({
    describer,
    labeler: new KeywordLabeler(testRelationships()),
    sampler: stubSampler(),
  });
  assert.equal(extractor.required, false);

  const fragments = await collect(extractor.extract(testContext()));
  assert.deepEqual(fragments, [
    {
      text: "[frame 0] A bulldozer near a house\n[frame 2] rubble and smoke",
      kind: "content",
      source: "vision",
      confidence: 1,
      frame_refs: [0, 2],
    },
    {
      text: "Destruction of Property",
      kind: "category_hint",
      source: "vision",
      confidence: keywordConfidence(2),
      frame_refs: [0, 2],
    },
  ]);
});

test("shouldRunVision gates the optional pass", () => {
  const relationships = testRelationships();
  const base = {
    relationships,
    reviewThreshold: 0.6,
    priority: "normal" as const,
    preliminary: { category: "Willful Killing", overall_confidence: 0.8 },
  };
  assert.equal(shouldRunVision({ ...base, mode: "off", priority: "urgent" }), false);
  assert.equal(shouldRunVision({ ...base, mode: "always" }), true);
  assert.equal(shouldRunVision({ ...base, mode: "auto" }), false);
  assert.equal(shouldRunVision({ ...base, mode: "auto", priority: "urgent" }), true);
  assert.equal(shouldRunVision({ ...base, mode: "auto", preliminary: { category: "Destruction of Property", overall_confidence: 0.9 } }), true);
  assert.equal(shouldRunVision({ ...base, mode: "auto", preliminary: { category: "Willful Killing", overall_confidence: 0.59 } }), true);
});
