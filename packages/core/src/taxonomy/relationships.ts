import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { TagRelationshipTableSchema, type CategoryRule, type TagRelationshipTable, type TagRule } from "@archive/contracts";

export const defaultRelationshipsPath = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
  "..",
  "taxonomy",
  "tag-relationships.json"
);

export class RelationshipTableError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid tag relationship table: ${issues.join("; ")}`);
    this.name = "RelationshipTableError";
    this.issues = issues;
  }
}

function checkTable(table: TagRelationshipTable): string[] {
  const issues: string[] = [];
  const categoryLabels = new Set<string>();
  for (const c of table.categories) {
    if (categoryLabels.has(c.label)) issues.push(`duplicate category '${c.label}'`);
    categoryLabels.add(c.label);
  }
  const tagLabels = new Set<string>();
  for (const t of table.tags) {
    if (tagLabels.has(t.label)) issues.push(`duplicate tag '${t.label}'`);
    tagLabels.add(t.label);
  }
  for (const t of table.tags) {
    if (t.parent !== null) {
      if (t.parent === t.label) issues.push(`tag '${t.label}' is its own parent`);
      else if (!tagLabels.has(t.parent)) issues.push(`tag '${t.label}' has unknown parent '${t.parent}'`);
    }
    for (const target of t.implies) {
      if (target === t.label) issues.push(`tag '${t.label}' implies itself`);
      else if (!tagLabels.has(target)) issues.push(`tag '${t.label}' implies unknown tag '${target}'`);
    }
    for (const other of t.conflicts_with) {
      if (other === t.label) issues.push(`tag '${t.label}' conflicts with itself`);
      else if (!tagLabels.has(other)) issues.push(`tag '${t.label}' conflicts with unknown tag '${other}'`);
    }
  }
  for (const label of table.visual_categories) {
    if (!categoryLabels.has(label)) issues.push(`visual category '${label}' is not a category`);
  }
  return issues;
}

/**
 * Validated, read-only view over the category/tag table: the closed label sets
 * plus the implication, parent and conflict edges fusion walks.
 */
export class TagRelationships {
  readonly version: number;
  private readonly categoryRules: CategoryRule[];
  private readonly tagRules = new Map<string, TagRule>();
  private readonly conflictPairs = new Set<string>();
  private readonly visual: ReadonlySet<string>;
  private readonly byLowerCategory = new Map<string, string>();
  private readonly byLowerTag = new Map<string, string>();

  constructor(input: unknown) {
    const table = TagRelationshipTableSchema.parse(input);
    const issues = checkTable(table);
    if (issues.length) throw new RelationshipTableError(issues);

    this.version = table.version;
    this.categoryRules = table.categories;
    for (const c of table.categories) this.byLowerCategory.set(c.label.toLowerCase(), c.label);
    for (const t of table.tags) {
      this.tagRules.set(t.label, t);
      this.byLowerTag.set(t.label.toLowerCase(), t.label);
      // Conflicts are symmetric even when only one side lists them.
      for (const other of t.conflicts_with) this.conflictPairs.add(pairKey(t.label, other));
    }
    this.visual = new Set(table.visual_categories);
  }

  categories(): readonly CategoryRule[] {
    return this.categoryRules;
  }

  tags(): readonly TagRule[] {
    return [...this.tagRules.values()];
  }

  tag(label: string): TagRule | undefined {
    return this.tagRules.get(label);
  }

  /** Canonical category label for a case-insensitive match, else null. */
  canonicalCategory(label: string): string | null {
    return this.byLowerCategory.get(label.trim().toLowerCase()) ?? null;
  }

  canonicalTag(label: string): string | null {
    return this.byLowerTag.get(label.trim().toLowerCase()) ?? null;
  }

  /** Tags a confident `label` pulls in: its `implies` targets, then its parent. */
  impliedBy(label: string): string[] {
    const rule = this.tagRules.get(label);
    if (!rule) return [];
    const out = [...rule.implies];
    if (rule.parent !== null && !out.includes(rule.parent)) out.push(rule.parent);
    return out;
  }

  conflicts(a: string, b: string): boolean {
    return this.conflictPairs.has(pairKey(a, b));
  }

  isVisualCategory(label: string): boolean {
    return this.visual.has(label);
  }
}

function pairKey(a: string, b: string): string {
  return a < b ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

export function loadTagRelationships(filePath: string = defaultRelationshipsPath): TagRelationships {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return new TagRelationships(raw);
}
