import test from "node:test";
import assert from "node:assert/strict";
import { averageHash, fingerprintOffset, hammingDistance, HASH_BITS } from "../src/frames/fingerprint";

test("fingerprintOffset samples at one second, or mid-clip for shorter media", () => {
  assert.equal(fingerprintOffset(30), 1);
  assert.equal(fingerprintOffset(2), 1);
  assert.equal(fingerprintOffset(1.2), 0.6);
  assert.equal(fingerprintOffset(0), 0);
  assert.equal(fingerprintOffset(Number.NaN), 0);
});

test("averageHash sets a bit for every pixel at or above the mean", () => {
  // Top half bright, bottom half dark.
  const pixels = Array.from({ length: HASH_BITS }, (_, i) => (i < 32 ? 200 : 10));
  assert.equal(averageHash(pixels), "ffffffff00000000");
});

test("averageHash of a flat frame is all ones", () => {
  assert.equal(averageHash(new Uint8Array(HASH_BITS).fill(128)), "ffffffffffffffff");
});

test("averageHash is left-padded to 16 hex chars", () => {
  const pixels = Array.from({ length: HASH_BITS }, (_, i) => (i === HASH_BITS - 1 ? 255 : 0));
  assert.equal(averageHash(pixels), "0000000000000001");
});

test("averageHash rejects short input", () => {
  assert.throws(() => averageHash([1, 2, 3]), /expected 64 pixels, got 3/);
});

test("hammingDistance counts differing bits", () => {
  assert.equal(hammingDistance("ffffffff00000000", "ffffffff00000000"), 0);
  assert.equal(hammingDistance("ffffffff00000000", "fffffffe00000000"), 1);
  assert.equal(hammingDistance("0000000000000000", "00000000000000ff"), 8);
  assert.equal(hammingDistance("0000000000000000", "ffffffffffffffff"), 64);
});
