import test from "node:test";
import assert from "node:assert/strict";
import { strategicOffsets } from "../src/frames/sample";

test("five offsets cluster at both ends with one midpoint", () => {
  assert.deepEqual(strategicOffsets(100), [5, 10, 50, 90, 95]);
  assert.deepEqual(strategicOffsets(10, 3), [0.5, 1, 5, 9, 9.5]);
});

test("larger counts put the extra sample at the start", () => {
  assert.deepEqual(strategicOffsets(10, 6), [0.375, 0.75, 1.125, 5, 9, 9.5]);
});

test("offsets stay inside the media", () => {
  const offsets = strategicOffsets(0.5);
  assert.equal(offsets.length, 5);
  for (const o of offsets) assert.ok(o >= 0 && o <= 0.4, String(o));
  assert.deepEqual(strategicOffsets(0), [0, 0, 0, 0, 0]);
  assert.deepEqual(strategicOffsets(Number.NaN), [0, 0, 0, 0, 0]);
});
