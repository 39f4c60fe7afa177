import { z } from "zod";
import { getArchiveDefault } from "../config/defaults";
import type { TagRelationships } from "../taxonomy/relationships";
import { KeywordLabeler } from "../extractors/labeling";
import type { Labeler, TextRecognizer, Transcriber, VisionDescriber } from "../extractors/types";
import { createMockDescriber, createMockRecognizer, createMockTranscriber } from "./mock";
import { createOllamaLabeler, createOllamaVisionDescriber } from "./ollama";
import { createTesseractRecognizer } from "./tesseract";
import { createWhisperCppTranscriber } from "./whisper";

export { createMockDescriber, createMockRecognizer, createMockTranscriber } from "./mock";
export { createOllamaLabeler, createOllamaVisionDescriber, interpretLabelResponse, LLM_CONFIDENCE } from "./ollama";
export { createTesseractRecognizer } from "./tesseract";
export { createWhisperCppTranscriber, parseDetectedLanguage, parseWhisperText } from "./whisper";

const CapabilityEnvSchema = z.object({
  VEA_TRANSCRIBER: z.enum(["whisper-cpp", "mock", "disabled"]).default("whisper-cpp"),
  VEA_OCR: z.enum(["tesseract", "mock", "disabled"]).default("tesseract"),
  VEA_VISION: z.enum(["ollama", "mock"]).default("ollama"),
  VEA_LABELER: z.enum(["keyword", "ollama"]).default("keyword"),
  VEA_LABELER_MODEL: z.string().min(1).default("llama3.1"),
  VEA_VISION_MODEL: z.string().min(1).default("llava"),
  VEA_WHISPER_THREADS: z.coerce.number().int().positive().optional(),
  WHISPER_CPP_PATH: z.string().min(1).optional(),
  WHISPER_MODEL_PATH: z.string().min(1).optional(),
  OLLAMA_BASE_URL: z.string().min(1).optional(),
});

export type CapabilityConfig = z.infer<typeof CapabilityEnvSchema>;

export function loadCapabilityConfig(env: Record<string, string | undefined> = process.env): CapabilityConfig {
  const cleaned: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    const s = typeof v === "string" ? v.trim() : "";
    if (s) cleaned[k] = s;
  }
  return CapabilityEnvSchema.parse(cleaned);
}

export type Capabilities = {
  /** null when the capability is disabled; its extractor is then not registered. */
  transcriber: Transcriber | null;
  recognizer: TextRecognizer | null;
  describer: VisionDescriber;
  labeler: Labeler;
};

export function createCapabilities(config: CapabilityConfig, relationships: TagRelationships): Capabilities {
  const ollamaBaseUrl = config.OLLAMA_BASE_URL ?? getArchiveDefault("OLLAMA_BASE_URL");

  let transcriber: Transcriber | null = null;
  if (config.VEA_TRANSCRIBER === "whisper-cpp") {
    transcriber = createWhisperCppTranscriber({
      binaryPath: config.WHISPER_CPP_PATH ?? getArchiveDefault("WHISPER_CPP_PATH"),
      modelPath: config.WHISPER_MODEL_PATH ?? getArchiveDefault("WHISPER_MODEL_PATH"),
      threads: config.VEA_WHISPER_THREADS,
    });
  } else if (config.VEA_TRANSCRIBER === "mock") {
    transcriber = createMockTranscriber();
  }

  let recognizer: TextRecognizer | null = null;
  if (config.VEA_OCR === "tesseract") recognizer = createTesseractRecognizer();
  else if (config.VEA_OCR === "mock") recognizer = createMockRecognizer();

  const describer =
    config.VEA_VISION === "mock"
      ? createMockDescriber()
      : createOllamaVisionDescriber({ model: config.VEA_VISION_MODEL, baseUrl: ollamaBaseUrl });

  const labeler =
    config.VEA_LABELER === "ollama"
      ? createOllamaLabeler(relationships, { model: config.VEA_LABELER_MODEL, baseUrl: ollamaBaseUrl })
      : new KeywordLabeler(relationships);

  return { transcriber, recognizer, describer, labeler };
}
