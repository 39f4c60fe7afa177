import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryProposedTagLog } from "../src/taxonomy/proposed-tags";
import { loadTagRelationships, RelationshipTableError, TagRelationships } from "../src/taxonomy/relationships";
import { testRelationships } from "./helpers";

test("the bundled table loads and validates", () => {
  const rel = loadTagRelationships();
  assert.equal(rel.version, 1);
  assert.equal(rel.categories().length, 10);
  assert.equal(rel.tags().length, 19);
  assert.deepEqual(rel.impliedBy("Torture"), ["Prisoners", "Repression"]);
  assert.deepEqual(rel.impliedBy("Birth Prevention"), ["Women"]);
  assert.equal(rel.conflicts("Prisoners", "Hostages"), true);
  assert.equal(rel.isVisualCategory("Destruction of Property"), true);
  assert.equal(rel.isVisualCategory("Testimonials"), false);
});

test("implied tags list implies targets before the parent", () => {
  const rel = testRelationships();
  assert.deepEqual(rel.impliedBy("Torture"), ["Prisoners", "Repression"]);
  assert.deepEqual(rel.impliedBy("Prisoners"), ["Repression"]);
  assert.deepEqual(rel.impliedBy("Women"), []);
  assert.deepEqual(rel.impliedBy("Nope"), []);
});

test("conflicts are symmetric", () => {
  const rel = testRelationships();
  assert.equal(rel.conflicts("Prisoners", "Hostages"), true);
  assert.equal(rel.conflicts("Hostages", "Prisoners"), true);
  assert.equal(rel.conflicts("Prisoners", "Torture"), false);
});

test("canonical labels are matched case-insensitively", () => {
  const rel = testRelationships();
  assert.equal(rel.canonicalCategory("  willful killing "), "Willful Killing");
  assert.equal(rel.canonicalTag("HOSTAGES"), "Hostages");
  assert.equal(rel.canonicalTag("Checkpoint"), null);
  assert.equal(rel.tag("Prisoners")?.parent, "Repression");
});

test("a table with dangling or self references is rejected with every issue", () => {
  assert.throws(
    () =>
      new TagRelationships({
        version: 1,
        categories: [{ label: "Other" }, { label: "Other" }],
        tags: [
          { label: "A", parent: "A" },
          { label: "B", implies: ["Missing"], conflicts_with: ["B"] },
        ],
        visual_categories: ["Nowhere"],
      }),
    (err: unknown) => {
      assert.ok(err instanceof RelationshipTableError);
      assert.deepEqual(err.issues, [
        "duplicate category 'Other'",
        "tag 'A' is its own parent",
        "tag 'B' implies unknown tag 'Missing'",
        "tag 'B' conflicts with itself",
        "visual category 'Nowhere' is not a category",
      ]);
      return true;
    }
  );
});

test("a table without categories fails schema validation", () => {
  assert.throws(() => new TagRelationships({ version: 1, categories: [], tags: [] }));
});

test("proposed tags are appended and listed in order", async () => {
  const log = new InMemoryProposedTagLog();
  await log.append([
    { label: "Checkpoint", kind: "tag", url: "https://x.com/a/status/1", source: "audio", confidence: 0.6, proposed_at: "2026-03-01T12:00:00.000Z" },
  ]);
  await log.append([
    { label: "Curfew", kind: "category", url: "https://x.com/a/status/2", source: "ocr", confidence: 0.35, proposed_at: "2026-03-01T12:01:00.000Z" },
  ]);
  assert.deepEqual(
    (await log.list()).map((p) => p.label),
    ["Checkpoint", "Curfew"]
  );
  assert.equal((await log.list({ limit: 1 })).length, 1);
});
