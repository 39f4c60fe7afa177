import { z } from "zod";
import { LabelledExampleSchema, UNKNOWN_CATEGORY, type ExportRecord, type LabelledExample, type ValidationReport } from "@archive/contracts";

// Spellings reviewers use that differ from the canonical label.
const CATEGORY_ALIASES: Record<string, string> = {
  "wilful killing": "Willful Killing",
};

export function normalizeCategory(raw: string | null | undefined): string {
  const cat = (raw ?? "").replace(/\s+/g, " ").trim();
  if (!cat) return UNKNOWN_CATEGORY;
  return CATEGORY_ALIASES[cat.toLowerCase()] ?? cat;
}

export function normalizeTags(raw: string | readonly string[] | null | undefined): string[] {
  const list = typeof raw === "string" ? raw.split(/[,;]/) : raw ?? [];
  const out: string[] = [];
  for (const t of list) {
    const tag = t.replace(/\s+/g, " ").trim();
    if (tag && !out.includes(tag)) out.push(tag);
  }
  return out;
}

const RawLabelSchema = z.object({
  url: z.string().min(1),
  category: z.string().nullable().optional(),
  tags: z.union([z.string(), z.array(z.string())]).nullable().optional(),
});

/** Accepts tags as an array or as one comma/semicolon separated string. */
export function parseLabelledExamples(raw: unknown): LabelledExample[] {
  return z
    .array(RawLabelSchema)
    .parse(raw)
    .map((r) =>
      LabelledExampleSchema.parse({
        url: r.url.trim(),
        category: normalizeCategory(r.category),
        tags: normalizeTags(r.tags),
      })
    );
}

function ratio(n: number, d: number): number {
  return d ? Math.round((n / d) * 10_000) / 10_000 : 0;
}

function sameCategory(a: string, b: string): boolean {
  return normalizeCategory(a).toLowerCase() === normalizeCategory(b).toLowerCase();
}

/**
 * Compare classifications with a human-labelled set. Category accuracy is over
 * labelled URLs that have a classification; tag precision and recall are
 * micro-averaged over the same URLs.
 */
export function scoreAgainstLabels(results: readonly ExportRecord[], labels: readonly LabelledExample[]): ValidationReport {
  const byUrl = new Map(results.map((r) => [r.url, r]));
  const missing: string[] = [];
  const mismatches: ValidationReport["mismatches"] = [];
  let evaluated = 0;
  let categoryHits = 0;
  let tagHits = 0;
  let predictedTags = 0;
  let expectedTags = 0;

  for (const label of labels) {
    const classification = byUrl.get(label.url)?.classification;
    if (!classification) {
      missing.push(label.url);
      continue;
    }
    evaluated += 1;
    if (sameCategory(classification.category, label.category)) categoryHits += 1;
    else mismatches.push({ url: label.url, expected: normalizeCategory(label.category), actual: classification.category });

    const expected = new Set(normalizeTags(label.tags).map((t) => t.toLowerCase()));
    const predicted = new Set(classification.tags.map((t) => t.label.toLowerCase()));
    expectedTags += expected.size;
    predictedTags += predicted.size;
    for (const t of predicted) if (expected.has(t)) tagHits += 1;
  }

  return {
    evaluated,
    missing,
    category_accuracy: ratio(categoryHits, evaluated),
    tag_precision: ratio(tagHits, predictedTags),
    tag_recall: ratio(tagHits, expectedTags),
    mismatches,
  };
}
