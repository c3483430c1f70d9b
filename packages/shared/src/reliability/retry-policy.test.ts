import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_BACKOFF_CAP_MS, computeBackoffMs } from "./retry-policy.js";

test("computeBackoffMs doubles per attempt with bounded jitter", () => {
  assert.equal(computeBackoffMs(1, () => 0), 500);
  assert.equal(computeBackoffMs(3, () => 0), 2000);
  assert.equal(computeBackoffMs(3, () => 0.5), 2250);
});

test("computeBackoffMs caps the delay and treats junk attempts as the first", () => {
  assert.equal(computeBackoffMs(20, () => 0.99), DEFAULT_BACKOFF_CAP_MS);
  assert.equal(computeBackoffMs(Number.NaN, () => 0), 500);
  assert.equal(computeBackoffMs(0, () => 0), 500);
});
