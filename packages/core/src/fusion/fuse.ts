import {
  UNKNOWN_CATEGORY,
  type Classification,
  type ClassifiedTag,
  type DroppedTag,
  type EvidenceFragment,
  type EvidenceSource,
  type FusionConfig,
} from "@archive/contracts";
import type { TagRelationships } from "../taxonomy/relationships";

export const NO_EVIDENCE_REASON = "no evidence extracted";

const SOURCE_ORDER: readonly EvidenceSource[] = ["audio", "ocr", "vision"];
const EVIDENCE_EXCERPT_CHARS = 160;
const EPSILON = 1e-9;

export type FuseInput = {
  fragments: readonly EvidenceFragment[];
  relationships: TagRelationships;
  /** Sources whose extractors ran; coverage is measured against these. */
  expectedSources: readonly EvidenceSource[];
  /** Sources that must yield at least one fragment or the result goes to review. */
  requiredSources?: readonly EvidenceSource[];
  config: FusionConfig;
  now?: Date;
};

type SourceSupport = { confidence: number; frameRefs: Set<number> };

type Aggregate = {
  label: string;
  confidence: number;
  /** Highest raw fragment confidence, the category tie-breaker. */
  peak: number;
  bySource: Map<EvidenceSource, SourceSupport>;
};

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

function clamp01(n: number): number {
  return Math.min(1, Math.max(0, n));
}

function bySourceOrder(a: EvidenceSource, b: EvidenceSource): number {
  return SOURCE_ORDER.indexOf(a) - SOURCE_ORDER.indexOf(b);
}

/** `1 - Π(1 - w_s·c_s)`: agreement from independent sources only ever raises confidence. */
export function weightedUnion(support: Iterable<{ source: EvidenceSource; confidence: number }>, config: FusionConfig): number {
  let miss = 1;
  for (const s of support) miss *= 1 - clamp01(config.source_weights[s.source] * s.confidence);
  return clamp01(1 - miss);
}

function aggregate(hints: readonly EvidenceFragment[], config: FusionConfig): Map<string, Aggregate> {
  const out = new Map<string, Aggregate>();
  for (const f of hints) {
    let agg = out.get(f.text);
    if (!agg) {
      agg = { label: f.text, confidence: 0, peak: 0, bySource: new Map() };
      out.set(f.text, agg);
    }
    agg.peak = Math.max(agg.peak, f.confidence);
    const support = agg.bySource.get(f.source);
    if (support) {
      support.confidence = Math.max(support.confidence, f.confidence);
      for (const r of f.frame_refs) support.frameRefs.add(r);
    } else {
      agg.bySource.set(f.source, { confidence: f.confidence, frameRefs: new Set(f.frame_refs) });
    }
  }
  for (const agg of out.values()) {
    agg.confidence = weightedUnion(
      [...agg.bySource].map(([source, s]) => ({ source, confidence: s.confidence })),
      config
    );
  }
  return out;
}

function primarySource(agg: Aggregate, config: FusionConfig): EvidenceSource {
  let best: EvidenceSource | null = null;
  let bestScore = -1;
  for (const source of SOURCE_ORDER) {
    const s = agg.bySource.get(source);
    if (!s) continue;
    const score = config.source_weights[source] * s.confidence;
    if (score > bestScore + EPSILON) {
      best = source;
      bestScore = score;
    }
  }
  return best ?? "audio";
}

function excerpt(text: string): string {
  const t = text.replace(/\s+/g, " ").trim();
  return t.length > EVIDENCE_EXCERPT_CHARS ? `${t.slice(0, EVIDENCE_EXCERPT_CHARS - 1)}…` : t;
}

function directTag(agg: Aggregate, content: ReadonlyMap<EvidenceSource, string[]>, config: FusionConfig): ClassifiedTag {
  const sources = [...agg.bySource.keys()].sort(bySourceOrder);
  const frames = new Set<number>();
  for (const s of agg.bySource.values()) for (const r of s.frameRefs) frames.add(r);
  return {
    label: agg.label,
    confidence: agg.confidence,
    source: primarySource(agg, config),
    sources,
    evidence: sources.flatMap((s) => (content.get(s) ?? []).map((t) => `${s}: ${excerpt(t)}`)),
    frame_refs: [...frames].sort((a, b) => a - b),
    implied_by: null,
  };
}

function byConfidenceThenLabel(a: { confidence: number; label: string }, b: { confidence: number; label: string }): number {
  if (Math.abs(a.confidence - b.confidence) > EPSILON) return b.confidence - a.confidence;
  return a.label < b.label ? -1 : a.label > b.label ? 1 : 0;
}

/**
 * Propagate `implies` and `parent` edges from every tag at or above the
 * threshold. An implied tag only replaces an existing entry when it would be
 * strictly more confident; existing evidence is kept.
 */
function applyImplications(tags: Map<string, ClassifiedTag>, relationships: TagRelationships, config: FusionConfig): void {
  const queue = [...tags.values()].sort(byConfidenceThenLabel).map((t) => t.label);
  while (queue.length) {
    const label = queue.shift();
    if (label === undefined) break;
    const from = tags.get(label);
    if (!from || from.confidence < config.implication_threshold) continue;
    for (const target of relationships.impliedBy(label)) {
      const confidence = from.confidence * config.implication_discount;
      const existing = tags.get(target);
      if (existing && existing.confidence + EPSILON >= confidence) continue;
      tags.set(
        target,
        existing
          ? { ...existing, confidence, implied_by: label }
          : {
              label: target,
              confidence,
              source: from.source,
              sources: [...from.sources],
              evidence: [],
              frame_refs: [...from.frame_refs],
              implied_by: label,
            }
      );
      queue.push(target);
    }
  }
}

/** Greedy by confidence: a tag conflicting with one already kept is dropped. */
function resolveConflicts(
  tags: ClassifiedTag[],
  relationships: TagRelationships
): { kept: ClassifiedTag[]; dropped: DroppedTag[] } {
  const kept: ClassifiedTag[] = [];
  const dropped: DroppedTag[] = [];
  for (const tag of [...tags].sort(byConfidenceThenLabel)) {
    const winner = kept.find((k) => relationships.conflicts(k.label, tag.label));
    if (winner) dropped.push({ label: tag.label, confidence: round4(tag.confidence), conflicts_with: winner.label });
    else kept.push(tag);
  }
  return { kept, dropped };
}

/**
 * Resolve conflicts, then withdraw any implied tag whose source tag lost: it
 * falls back to its own direct evidence, or leaves. Repeats until no kept tag
 * points at a missing one.
 */
function settleTags(
  tags: ReadonlyMap<string, ClassifiedTag>,
  direct: ReadonlyMap<string, ClassifiedTag>,
  relationships: TagRelationships
): { kept: ClassifiedTag[]; dropped: DroppedTag[] } {
  const current = new Map(tags);
  for (;;) {
    const resolved = resolveConflicts([...current.values()], relationships);
    const present = new Set(resolved.kept.map((t) => t.label));
    const orphans = resolved.kept.filter((t) => t.implied_by !== null && !present.has(t.implied_by));
    if (!orphans.length) return resolved;
    for (const orphan of orphans) {
      const own = direct.get(orphan.label);
      if (own) current.set(orphan.label, own);
      else current.delete(orphan.label);
    }
  }
}

function pickCategory(categories: Map<string, Aggregate>): { label: string; strength: number } {
  let best: Aggregate | null = null;
  for (const agg of categories.values()) {
    if (!best) {
      best = agg;
      continue;
    }
    const diff = agg.confidence - best.confidence;
    if (diff > EPSILON) best = agg;
    else if (Math.abs(diff) <= EPSILON) {
      if (agg.peak > best.peak + EPSILON) best = agg;
      else if (Math.abs(agg.peak - best.peak) <= EPSILON && agg.label < best.label) best = agg;
    }
  }
  return best ? { label: best.label, strength: best.confidence } : { label: UNKNOWN_CATEGORY, strength: 0 };
}

/**
 * Merge every fragment of one job into a single classification. Pure and
 * total: malformed or unknown hints are ignored, never thrown on.
 */
export function fuse(input: FuseInput): Classification {
  const { relationships, config } = input;
  const classifiedAt = (input.now ?? new Date()).toISOString();
  const fragments = input.fragments.filter((f) => Number.isFinite(f.confidence));

  if (!fragments.length) {
    return {
      category: UNKNOWN_CATEGORY,
      tags: [],
      overall_confidence: 0,
      requires_review: true,
      review_reason: NO_EVIDENCE_REASON,
      dropped_tags: [],
      source_coverage: [],
      classified_at: classifiedAt,
    };
  }

  const usable = (f: EvidenceFragment) => clamp01(f.confidence) >= config.minimum_confidence;
  const norm = (f: EvidenceFragment): EvidenceFragment => ({ ...f, confidence: clamp01(f.confidence) });

  const categoryHints = fragments
    .filter((f) => f.kind === "category_hint" && relationships.canonicalCategory(f.text) === f.text && usable(f))
    .map(norm);
  const tagHints = fragments
    .filter((f) => f.kind === "tag_hint" && relationships.tag(f.text) !== undefined && usable(f))
    .map(norm);

  const content = new Map<EvidenceSource, string[]>();
  for (const f of fragments) {
    if (f.kind !== "content" || !f.text.trim()) continue;
    const list = content.get(f.source) ?? [];
    list.push(f.text);
    content.set(f.source, list);
  }

  // 1. aggregate
  const tagAggs = aggregate(tagHints, config);
  const tags = new Map<string, ClassifiedTag>();
  for (const agg of tagAggs.values()) tags.set(agg.label, directTag(agg, content, config));

  // 2. hierarchy
  const direct = new Map(tags);
  applyImplications(tags, relationships, config);

  // 3. conflicts, 4. threshold
  const { kept, dropped } = settleTags(tags, direct, relationships);
  const finalTags = kept
    .filter((t) => t.confidence + EPSILON >= config.min_tag_confidence)
    .map((t) => ({ ...t, confidence: round4(t.confidence) }))
    .sort(byConfidenceThenLabel);

  // 5. category
  const category = pickCategory(aggregate(categoryHints, config));

  // 6. overall confidence
  const contributing = new Set<EvidenceSource>([...categoryHints, ...tagHints].map((f) => f.source));
  const expected = [...new Set(input.expectedSources)];
  const coverage = expected.length ? expected.filter((s) => contributing.has(s)).length / expected.length : 1;
  const overall = round4(clamp01(category.strength * (0.6 + 0.4 * coverage)));

  // 7. review
  const reasons: string[] = [];
  if (overall < config.review_threshold) reasons.push(`overall confidence ${overall} below ${config.review_threshold}`);
  for (const d of dropped) reasons.push(`conflict resolved: dropped ${d.label} in favour of ${d.conflicts_with}`);
  const producing = new Set(fragments.map((f) => f.source));
  for (const s of [...new Set(input.requiredSources ?? [])].sort(bySourceOrder)) {
    if (!producing.has(s)) reasons.push(`required source ${s} produced no evidence`);
  }

  return {
    category: category.label,
    tags: finalTags,
    overall_confidence: overall,
    requires_review: reasons.length > 0,
    review_reason: reasons.length ? reasons.join("; ") : null,
    dropped_tags: dropped,
    source_coverage: [...contributing].sort(bySourceOrder),
    classified_at: classifiedAt,
  };
}
