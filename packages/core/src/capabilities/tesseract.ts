import { processFailure, spawnCapture } from "../process/spawn";
import type { TextRecognizer } from "../extractors/types";

export function createTesseractRecognizer(opts?: { binaryPath?: string; timeoutMs?: number }): TextRecognizer {
  const bin = opts?.binaryPath ?? "tesseract";
  return {
    name: "tesseract",
    async recognize(framePaths: string[], languageOrder: string[]): Promise<string[]> {
      const lang = languageOrder.join("+");
      const out: string[] = [];
      for (const framePath of framePaths) {
        const res = await spawnCapture(bin, [framePath, "stdout", "-l", lang], { timeoutMs: opts?.timeoutMs ?? 60_000 });
        const failure = processFailure("tesseract", res);
        if (failure) throw new Error(`${failure} (${framePath})`);
        out.push(res.stdout.trim());
      }
      return out;
    },
  };
}
