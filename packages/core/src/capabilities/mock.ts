import path from "node:path";
import type { TextRecognizer, Transcriber, VisionDescriber } from "../extractors/types";

/** Deterministic stand-ins for dry runs without local models installed. */
export function createMockTranscriber(text?: string): Transcriber {
  return {
    name: "mock",
    async transcribe(audioPath: string, language: string) {
      return {
        text: text ?? `mock transcript for ${path.basename(audioPath)}`,
        language: language === "auto" ? null : language,
      };
    },
  };
}

export function createMockRecognizer(textPerFrame: string = ""): TextRecognizer {
  return {
    name: "mock",
    async recognize(framePaths: string[]) {
      return framePaths.map(() => textPerFrame);
    },
  };
}

export function createMockDescriber(descriptionPerFrame: string = ""): VisionDescriber {
  return {
    name: "mock",
    async describe(framePaths: string[]) {
      return framePaths.map(() => descriptionPerFrame);
    },
  };
}
