import fs from "node:fs/promises";
import { z } from "zod";
import type { EvidenceSource } from "@archive/contracts";
import type { TagRelationships } from "../taxonomy/relationships";
import type { LabelHint, LabelProposal, LabelResult, Labeler, VisionDescriber } from "../extractors/types";

const GenerateResponseSchema = z.object({
  response: z.string().default(""),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

async function generate(baseUrl: string, body: Record<string, unknown>): Promise<string> {
  const res = await fetch(`${baseUrl}/api/generate`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ ...body, stream: false }),
  });
  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw new Error(`Ollama API error ${res.status}: ${text}`);
  }
  const parsed = GenerateResponseSchema.parse(await res.json());
  return parsed.response.trim();
}

export interface OllamaOpts {
  model?: string;
  baseUrl?: string;
}

const FRAME_PROMPT =
  "Describe what is visible in this frame from a news video in one or two plain sentences. " +
  "Name people, buildings, damage, uniforms and vehicles you can see. Do not speculate.";

export function createOllamaVisionDescriber(opts?: OllamaOpts): VisionDescriber {
  const model = opts?.model || "llava";
  const baseUrl = (opts?.baseUrl || "http://localhost:11434").replace(/\/$/, "");

  return {
    name: `ollama:${model}`,
    async describe(framePaths: string[]): Promise<string[]> {
      const out: string[] = [];
      for (const framePath of framePaths) {
        const image = await fs.readFile(framePath);
        out.push(
          await generate(baseUrl, {
            model,
            prompt: FRAME_PROMPT,
            images: [image.toString("base64")],
            options: { temperature: 0.1, num_predict: 160 },
          })
        );
      }
      return out;
    },
  };
}

// ── Labeler ──────────────────────────────────────────────────────────────────

export const LLM_CONFIDENCE = { high: 0.85, medium: 0.6, low: 0.35 } as const;

const LabelResponseSchema = z.object({
  category: z.string().default(""),
  tags: z.array(z.string()).default([]),
  confidence: z.enum(["high", "medium", "low"]).catch("low"),
  reasoning: z.string().optional(),
});

const SOURCE_NAMES: Record<EvidenceSource, string> = {
  audio: "audio transcript",
  ocr: "on-screen text",
  vision: "visual description of sampled frames",
};

export function buildLabelPrompt(relationships: TagRelationships, text: string, source: EvidenceSource): string {
  const categories = relationships.categories().map((c) => c.label);
  const tags = relationships.tags().map((t) => t.label);
  return `You are classifying field reports for a human-rights video archive.

CATEGORIES (choose exactly ONE):
${JSON.stringify(categories, null, 2)}

TAGS (choose ALL that apply, can be none):
${JSON.stringify(tags, null, 2)}

The content below is the ${SOURCE_NAMES[source]} of one video.

Respond with valid JSON only in this exact format:
{
  "category": "category name here",
  "tags": ["tag1", "tag2"],
  "confidence": "high/medium/low",
  "reasoning": "brief explanation"
}

Content to classify:

${text}`;
}

/**
 * Map a model reply onto the closed label sets. Labels the table does not know
 * become proposals instead of hints.
 */
export function interpretLabelResponse(raw: string, relationships: TagRelationships): LabelResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`labeler returned invalid JSON: ${raw.slice(0, 120)}`, { cause: err });
  }
  const reply = LabelResponseSchema.parse(json);
  const confidence = LLM_CONFIDENCE[reply.confidence];
  const hints: LabelHint[] = [];
  const proposals: LabelProposal[] = [];

  const category = reply.category.trim();
  if (category && category.toLowerCase() !== "unknown") {
    const canonical = relationships.canonicalCategory(category);
    if (canonical) hints.push({ kind: "category_hint", label: canonical, confidence, matched: [] });
    else proposals.push({ kind: "category", label: category, confidence });
  }

  const seen = new Set<string>();
  for (const rawTag of reply.tags) {
    const tag = rawTag.trim();
    if (!tag || seen.has(tag.toLowerCase())) continue;
    seen.add(tag.toLowerCase());
    const canonical = relationships.canonicalTag(tag);
    if (canonical) hints.push({ kind: "tag_hint", label: canonical, confidence, matched: [] });
    else proposals.push({ kind: "tag", label: tag, confidence });
  }
  return { hints, proposals };
}

export function createOllamaLabeler(relationships: TagRelationships, opts?: OllamaOpts): Labeler {
  const model = opts?.model || "llama3.1";
  const baseUrl = (opts?.baseUrl || "http://localhost:11434").replace(/\/$/, "");

  return {
    name: `ollama:${model}`,
    async label(input: { text: string; source: EvidenceSource }): Promise<LabelResult> {
      if (!input.text.trim()) return { hints: [], proposals: [] };
      const raw = await generate(baseUrl, {
        model,
        prompt: buildLabelPrompt(relationships, input.text, input.source),
        format: "json",
        options: { temperature: 0 },
      });
      return interpretLabelResponse(raw, relationships);
    },
  };
}
