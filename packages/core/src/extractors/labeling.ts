import type { EvidenceFragment, EvidenceSource } from "@archive/contracts";
import type { TagRelationships } from "../taxonomy/relationships";
import type { LabelHint, LabelResult, Labeler } from "./types";

export const KEYWORD_BASE_CONFIDENCE = 0.5;
export const KEYWORD_STEP = 0.15;
export const KEYWORD_MAX_CONFIDENCE = 0.95;

export function keywordConfidence(hits: number): number {
  if (hits <= 0) return 0;
  return Math.min(KEYWORD_MAX_CONFIDENCE, KEYWORD_BASE_CONFIDENCE + KEYWORD_STEP * (hits - 1));
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function normalizeText(s: string): string {
  return s.normalize("NFKC").toLowerCase();
}

/** Whole-phrase matcher: the phrase may not sit inside a longer word, in any script. */
export function phrasePattern(phrase: string): RegExp {
  const body = escapeRegExp(normalizeText(phrase.trim())).replace(/\s+/g, "\\s+");
  return new RegExp(`(?<![\\p{L}\\p{M}\\p{N}])${body}(?![\\p{L}\\p{M}\\p{N}])`, "u");
}

type CompiledRule = {
  kind: LabelHint["kind"];
  label: string;
  text: Array<{ phrase: string; re: RegExp }>;
  visual: Array<{ phrase: string; re: RegExp }>;
};

function compile(phrases: readonly string[]): Array<{ phrase: string; re: RegExp }> {
  const seen = new Set<string>();
  const out: Array<{ phrase: string; re: RegExp }> = [];
  for (const p of phrases) {
    const key = normalizeText(p.trim());
    if (!key || seen.has(key)) continue;
    seen.add(key);
    out.push({ phrase: key, re: phrasePattern(p) });
  }
  return out;
}

/**
 * Deterministic labeler over the closed label sets. Vision text is also matched
 * against each rule's `visual_labels`.
 */
export class KeywordLabeler implements Labeler {
  readonly name = "keyword";
  private readonly rules: CompiledRule[];

  constructor(relationships: TagRelationships) {
    this.rules = [
      ...relationships.categories().map((c) => ({
        kind: "category_hint" as const,
        label: c.label,
        text: compile(c.keywords),
        visual: compile([...c.keywords, ...c.visual_labels]),
      })),
      ...relationships.tags().map((t) => ({
        kind: "tag_hint" as const,
        label: t.label,
        text: compile(t.keywords),
        visual: compile([...t.keywords, ...t.visual_labels]),
      })),
    ];
  }

  async label(input: { text: string; source: EvidenceSource }): Promise<LabelResult> {
    const text = normalizeText(input.text);
    const hints: LabelHint[] = [];
    if (!text.trim()) return { hints, proposals: [] };
    for (const rule of this.rules) {
      const phrases = input.source === "vision" ? rule.visual : rule.text;
      const matched = phrases.filter((p) => p.re.test(text)).map((p) => p.phrase);
      if (!matched.length) continue;
      hints.push({ kind: rule.kind, label: rule.label, confidence: keywordConfidence(matched.length), matched });
    }
    return { hints, proposals: [] };
  }
}

/**
 * Turn labeler hints into fragments. `frameTexts` maps frame index to that
 * frame's text; a hint cites the frames whose text contains one of its matched
 * phrases, or every frame with text when the labeler reports no phrases.
 */
export function hintFragments(
  hints: LabelHint[],
  source: EvidenceSource,
  frameTexts?: ReadonlyMap<number, string>
): EvidenceFragment[] {
  return hints.map((h) => ({
    text: h.label,
    kind: h.kind,
    source,
    confidence: h.confidence,
    frame_refs: frameTexts ? citedFrames(h, frameTexts) : [],
  }));
}

function citedFrames(hint: LabelHint, frameTexts: ReadonlyMap<number, string>): number[] {
  const refs: number[] = [];
  const patterns = hint.matched.map(phrasePattern);
  for (const [index, text] of frameTexts) {
    if (!text.trim()) continue;
    const normalized = normalizeText(text);
    if (!patterns.length || patterns.some((re) => re.test(normalized))) refs.push(index);
  }
  return refs.sort((a, b) => a - b);
}
