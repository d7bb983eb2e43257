/**
 * Unit tests for the frame differencing gate.
 *
 * Frames are 32x32 RGB24; with the default factor of 4 they downsample to
 * 8x8, so each motion-grid cell is exactly one 4x4 pixel block.
 *
 * Run: node --import tsx --test senses/frame-diff.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  countMotionRegions,
  createFrameDifferencer,
  DEFAULT_FRAME_DIFF_CONFIG,
  downsampleToGray,
  meanAbsDiff,
} from "./frame-diff.js";
import type { Frame } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

const SIZE = 32;

function solidFrame(value: number, width = SIZE, height = SIZE): Frame {
  return { data: new Uint8Array(width * height * 3).fill(value), width, height, timestamp: Date.now() };
}

/** Black 32x32 frame with the given 4x4 blocks (bx, by) set to `value` */
function frameWithBlocks(blocks: Array<[number, number]>, value: number): Frame {
  const frame = solidFrame(0);
  for (const [bx, by] of blocks) {
    for (let y = by * 4; y < by * 4 + 4; y++) {
      for (let x = bx * 4; x < bx * 4 + 4; x++) {
        const offset = (y * SIZE + x) * 3;
        frame.data[offset] = value;
        frame.data[offset + 1] = value;
        frame.data[offset + 2] = value;
      }
    }
  }
  return frame;
}

// ============================================================================
// TESTS
// ============================================================================

test("the first frame is always analysed with a full diff score", () => {
  const differ = createFrameDifferencer();

  const decision = differ.shouldAnalyze(solidFrame(0));

  assert.equal(decision.shouldRun, true);
  assert.deepEqual(decision.result, { changed: true, diffScore: 1.0, motionRegions: 0, motionScore: 1.0 });
  assert.equal(differ.framesSinceAnalysis(), 0);
});

test("an identical frame is not analysed", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(10));

  const decision = differ.shouldAnalyze(solidFrame(10));

  assert.equal(decision.shouldRun, false);
  assert.deepEqual(decision.result, { changed: false, diffScore: 0, motionRegions: 0, motionScore: 0 });
  assert.equal(differ.framesSinceAnalysis(), 1);
});

test("a change above the change threshold runs regardless of cooldown", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));

  const decision = differ.shouldAnalyze(solidFrame(100));

  assert.equal(decision.shouldRun, true);
  assert.equal(decision.result.changed, true);
  assert.ok(Math.abs(decision.result.diffScore - 100 / 255) < 1e-6);
  assert.equal(decision.result.motionRegions, 64);
  assert.equal(differ.framesSinceAnalysis(), 0);
});

test("a small change with few regions waits for the cooldown", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));

  // Two blocks at 200: diff = 400 / 64 / 255 ~ 0.0245, between the two thresholds
  const moved = frameWithBlocks([[0, 0], [1, 0]], 200);
  const runs: boolean[] = [];
  for (let i = 0; i < 5; i++) {
    runs.push(differ.shouldAnalyze(moved).shouldRun);
  }

  assert.deepEqual(runs, [false, false, false, false, true]);
});

test("three moving regions above the motion threshold run immediately", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));

  const decision = differ.shouldAnalyze(frameWithBlocks([[0, 0], [3, 3], [7, 7]], 200));

  assert.equal(decision.shouldRun, true);
  assert.equal(decision.result.changed, false);
  assert.equal(decision.result.motionRegions, 3);
});

test("divergence below the motion threshold never triggers analysis", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));

  // One block at 200: diff ~ 0.0123
  const moved = frameWithBlocks([[2, 2]], 200);
  for (let i = 0; i < 20; i++) {
    assert.equal(differ.shouldAnalyze(moved).shouldRun, false);
  }
  assert.equal(differ.framesSinceAnalysis(), 20);
});

test("the comparison baseline is the last analysed frame, not the previous one", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));

  // Each step is tiny relative to the previous frame but drifts from the baseline
  assert.equal(differ.shouldAnalyze(solidFrame(4)).shouldRun, false);
  const drifted = differ.shouldAnalyze(solidFrame(16));

  assert.equal(drifted.shouldRun, true);
  assert.ok(Math.abs(drifted.result.diffScore - 16 / 255) < 1e-6);
  assert.ok(Math.abs(drifted.result.motionScore - 12 / 255) < 1e-6);
});

test("raw motion follows the previous frame even when analysis is skipped", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));

  const moved = frameWithBlocks([[2, 2]], 200);
  const first = differ.shouldAnalyze(moved);
  const still = differ.shouldAnalyze(moved);

  assert.equal(first.shouldRun, false);
  assert.ok(Math.abs(first.result.motionScore - 200 / 64 / 255) < 1e-6);
  assert.equal(still.result.motionScore, 0);
  // Divergence from the analysed frame is unchanged
  assert.equal(still.result.diffScore, first.result.diffScore);
});

test("a frame of a different size restarts from scratch", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));
  differ.shouldAnalyze(solidFrame(0));

  const decision = differ.shouldAnalyze(solidFrame(0, 64, 64));

  assert.equal(decision.shouldRun, true);
  assert.equal(decision.result.diffScore, 1.0);
});

test("reset makes the next frame count as the first", () => {
  const differ = createFrameDifferencer();
  differ.shouldAnalyze(solidFrame(0));
  differ.reset();

  assert.equal(differ.shouldAnalyze(solidFrame(0)).shouldRun, true);
});

test("thresholds are read when each frame is evaluated", () => {
  const config = { ...DEFAULT_FRAME_DIFF_CONFIG };
  const differ = createFrameDifferencer(config);
  differ.shouldAnalyze(solidFrame(0));

  config.changeThreshold = 0.5;
  assert.equal(differ.shouldAnalyze(solidFrame(100)).shouldRun, true, "still runs via the motion-region rule");

  config.motionThreshold = 0.5;
  assert.equal(differ.shouldAnalyze(solidFrame(110)).shouldRun, false);
});

test("downsampleToGray averages each block over its three channels", () => {
  const frame: Frame = { data: new Uint8Array(4 * 2 * 3), width: 4, height: 2, timestamp: 0 };
  // Left 2x2 block: (30, 60, 90) per pixel -> 60; right block stays black
  for (const x of [0, 1]) {
    for (const y of [0, 1]) {
      const offset = (y * 4 + x) * 3;
      frame.data.set([30, 60, 90], offset);
    }
  }

  const gray = downsampleToGray(frame, 2);

  assert.equal(gray.width, 2);
  assert.equal(gray.height, 1);
  assert.deepEqual(Array.from(gray.pixels), [60, 0]);
});

test("meanAbsDiff and countMotionRegions on tiny images", () => {
  const a = { pixels: new Float32Array([0, 0, 0, 0]), width: 2, height: 2 };
  const b = { pixels: new Float32Array([255, 0, 0, 255]), width: 2, height: 2 };

  assert.equal(meanAbsDiff(a, b), 0.5);
  // Fewer pixels than grid cells: no regions
  assert.equal(countMotionRegions(a, b, 0.02), 0);
});
