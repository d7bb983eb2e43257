/**
 * Unit tests for the VAD segmenter state machine.
 *
 * Drives the segmenter with explicit probabilities (processChunk) or a
 * scripted scorer (processAudio); no audio hardware or model involved.
 *
 * Run: node --import tsx --test senses/vad.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { concatenateChunks, createVadSegmenter, DEFAULT_VAD_CONFIG } from "./vad.js";
import type { SpeechScorer, SpeechSegment } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

const CHUNK = DEFAULT_VAD_CONFIG.chunkSamples;

function chunkOf(value: number, length = CHUNK): Float32Array {
  return new Float32Array(length).fill(value);
}

function collect(): { segments: SpeechSegment[]; onSegment: (s: SpeechSegment) => void } {
  const segments: SpeechSegment[] = [];
  return { segments, onSegment: (s) => segments.push(s) };
}

/** Scorer whose score() calls resolve only when the test says so */
function deferredScorer(): { scorer: SpeechScorer; resolveNext: (p: number) => void } {
  const pending: Array<(p: number) => void> = [];
  return {
    scorer: {
      score: () => new Promise<number>((resolve) => pending.push(resolve)),
    },
    resolveNext: (p) => {
      const resolve = pending.shift();
      if (!resolve) throw new Error("no pending score call");
      resolve(p);
    },
  };
}

// ============================================================================
// TESTS
// ============================================================================

test("emits one segment once trailing silence reaches the minimum", () => {
  const { segments, onSegment } = collect();
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, onSegment);

  for (let i = 0; i < 10; i++) vad.processChunk(chunkOf(0.5), 0.9);

  // 700ms at 16kHz = 11200 samples; the 22nd silent chunk crosses it
  for (let i = 0; i < 21; i++) vad.processChunk(chunkOf(0), 0.1);
  assert.equal(segments.length, 0);

  vad.processChunk(chunkOf(0), 0.1);
  assert.equal(segments.length, 1);

  const [segment] = segments;
  assert.equal(segment.audio.length, 32 * CHUNK);
  assert.equal(segment.durationMs, 1024);
  assert.ok(segment.endTime >= segment.startTime);
  assert.ok(Object.isFrozen(segment));

  // Further silence does not emit again
  vad.processChunk(chunkOf(0), 0.1);
  vad.processChunk(chunkOf(0), 0.1);
  assert.equal(segments.length, 1);
  assert.equal(vad.snapshot().inSpeech, false);
});

test("speech shorter than the minimum is discarded without a segment", () => {
  const { segments, onSegment } = collect();
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, onSegment);

  // 5 * 512 = 2560 samples < 4000 (250ms)
  for (let i = 0; i < 5; i++) vad.processChunk(chunkOf(0.5), 0.9);
  for (let i = 0; i < 22; i++) vad.processChunk(chunkOf(0), 0.1);

  assert.equal(segments.length, 0);
  assert.deepEqual(vad.snapshot(), {
    inSpeech: false,
    speechSamples: 0,
    silenceSamples: 0,
    bufferedChunks: 0,
    speechStartTime: null,
  });
});

test("a speech chunk resets the silence counter", () => {
  const { segments, onSegment } = collect();
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, onSegment);

  for (let i = 0; i < 10; i++) vad.processChunk(chunkOf(0.5), 0.9);
  for (let i = 0; i < 20; i++) vad.processChunk(chunkOf(0), 0.1);
  vad.processChunk(chunkOf(0.5), 0.9);
  for (let i = 0; i < 20; i++) vad.processChunk(chunkOf(0), 0.1);

  assert.equal(segments.length, 0);
  assert.equal(vad.snapshot().silenceSamples, 20 * CHUNK);
  assert.equal(vad.snapshot().speechSamples, 11 * CHUNK);
});

test("probability equal to the threshold counts as speech", () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {});

  assert.equal(vad.processChunk(chunkOf(0.1), 0.5), true);
  assert.equal(vad.processChunk(chunkOf(0.1), 0.49), false);
});

test("chunks shorter than the configured size are rejected without changing state", () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {});

  assert.equal(vad.processChunk(chunkOf(0.5, CHUNK - 1), 0.9), null);
  assert.equal(vad.snapshot().inSpeech, false);
});

test("silence before any speech is not buffered", () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {});

  for (let i = 0; i < 50; i++) vad.processChunk(chunkOf(0), 0.0);

  assert.equal(vad.snapshot().bufferedChunks, 0);
});

test("buffered chunks are copies of the caller's arrays", () => {
  const { segments, onSegment } = collect();
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, onSegment);

  const reused = chunkOf(0.5);
  for (let i = 0; i < 10; i++) vad.processChunk(reused, 0.9);
  reused.fill(0.25);
  for (let i = 0; i < 22; i++) vad.processChunk(chunkOf(0), 0.1);

  assert.equal(segments[0].audio[0], 0.5);
});

test("a throwing segment callback does not break the segmenter", () => {
  let calls = 0;
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {
    calls++;
    throw new Error("consumer failed");
  });

  for (let round = 0; round < 2; round++) {
    for (let i = 0; i < 10; i++) vad.processChunk(chunkOf(0.5), 0.9);
    for (let i = 0; i < 22; i++) vad.processChunk(chunkOf(0), 0.1);
  }

  assert.equal(calls, 2);
});

test("reset drops buffered speech without emitting", () => {
  const { segments, onSegment } = collect();
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, onSegment);

  for (let i = 0; i < 10; i++) vad.processChunk(chunkOf(0.5), 0.9);
  vad.reset();
  for (let i = 0; i < 22; i++) vad.processChunk(chunkOf(0), 0.1);

  assert.equal(segments.length, 0);
  assert.equal(vad.snapshot().bufferedChunks, 0);
});

test("setThreshold changes the speech decision for later chunks", () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {});

  assert.equal(vad.processChunk(chunkOf(0.1), 0.6), true);
  vad.reset();
  vad.setThreshold(0.8);
  assert.equal(vad.processChunk(chunkOf(0.1), 0.6), false);
});

test("processAudio scores through the scorer and advances the state machine", async () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {}, { score: async () => 0.75 });

  const probability = await vad.processAudio(chunkOf(0.3));

  assert.equal(probability, 0.75);
  assert.equal(vad.snapshot().inSpeech, true);
  assert.equal(vad.snapshot().speechSamples, CHUNK);
});

test("processAudio discards a chunk whose scoring straddled a reset", async () => {
  const { scorer, resolveNext } = deferredScorer();
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {}, scorer);

  const pending = vad.processAudio(chunkOf(0.3));
  vad.reset();
  resolveNext(0.9);

  assert.equal(await pending, null);
  assert.equal(vad.snapshot().inSpeech, false);
});

test("processAudio returns null when the scorer fails", async () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {}, {
    score: async () => {
      throw new Error("scorer crashed");
    },
  });

  assert.equal(await vad.processAudio(chunkOf(0.3)), null);
  assert.equal(vad.snapshot().inSpeech, false);
});

test("processAudio without a scorer throws", async () => {
  const vad = createVadSegmenter(DEFAULT_VAD_CONFIG, () => {});

  await assert.rejects(() => vad.processAudio(chunkOf(0.3)), /requires a speech scorer/);
});

test("concatenateChunks joins chunks in order", () => {
  const joined = concatenateChunks([new Float32Array([1, 2]), new Float32Array([3])]);

  assert.deepEqual(Array.from(joined), [1, 2, 3]);
  assert.equal(concatenateChunks([]).length, 0);
});
