/**
 * Voice activity segmentation.
 *
 * Turns a stream of fixed-size audio chunks, each with a speech probability,
 * into discrete speech segments. Silence inside an utterance is kept in the
 * buffer so segments carry their natural trailing audio.
 *
 * Responsibilities:
 * - Classify each chunk as speech or silence against a threshold
 * - Run the Idle -> Accumulating -> Emit state machine
 * - Emit one SpeechSegment per utterance through a synchronous callback
 * - Discard buffered audio on reset(), including chunks still being scored
 */

import type { SpeechScorer, SpeechSegment, VadConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Sample rate the segmenter, scorer and transcribers agree on */
export const VAD_SAMPLE_RATE = 16000;

/** 32ms chunks at 16kHz */
export const VAD_CHUNK_SAMPLES = 512;

export const DEFAULT_VAD_CONFIG: VadConfig = {
  sampleRate: VAD_SAMPLE_RATE,
  chunkSamples: VAD_CHUNK_SAMPLES,
  threshold: 0.5,
  minSpeechMs: 250,
  minSilenceMs: 700,
};

// ============================================================================
// INTERFACES
// ============================================================================

/** Callback invoked once per emitted segment. */
export type SegmentCallback = (segment: SpeechSegment) => void;

/** Read-only view of the segmenter's internal state. */
export interface VadSnapshot {
  inSpeech: boolean;
  speechSamples: number;
  silenceSamples: number;
  bufferedChunks: number;
  speechStartTime: number | null;
}

/**
 * Segmenter returned by createVadSegmenter.
 */
export interface VadSegmenter {
  /**
   * Advance the state machine with one scored chunk.
   * @param chunk - Samples at the configured rate
   * @param probability - Speech probability in [0, 1]
   * @returns Whether the chunk counted as speech, or null if it was rejected as too short
   */
  processChunk(chunk: Float32Array, probability: number): boolean | null;

  /**
   * Score a chunk with the injected scorer, then process it.
   * A reset() while scoring is in flight discards the chunk.
   * @returns The speech probability, or null if the chunk was rejected, discarded or could not be scored
   */
  processAudio(chunk: Float32Array): Promise<number | null>;

  /** Return to Idle without emitting, dropping any buffered audio. */
  reset(): void;

  snapshot(): VadSnapshot;

  /** Threshold can be retuned at runtime; sample-count thresholds are fixed. */
  setThreshold(threshold: number): void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a VAD segmenter.
 *
 * @param config - Thresholds in milliseconds, converted once to sample counts
 * @param onSegment - Called synchronously, before processChunk returns, for every emitted segment
 * @param scorer - Speech scorer used by processAudio
 * @returns A VadSegmenter in the Idle state
 */
export function createVadSegmenter(config: VadConfig, onSegment: SegmentCallback, scorer?: SpeechScorer): VadSegmenter {
  const { sampleRate, chunkSamples } = config;
  const minSpeechSamples = Math.floor((sampleRate * config.minSpeechMs) / 1000);
  const minSilenceSamples = Math.floor((sampleRate * config.minSilenceMs) / 1000);
  let threshold = config.threshold;

  let inSpeech = false;
  let speechSamples = 0;
  let silenceSamples = 0;
  let buffer: Float32Array[] = [];
  let speechStartTime: number | null = null;

  // Bumped on every reset so in-flight scoring can tell its chunk is stale
  let generation = 0;

  function clearState(): void {
    inSpeech = false;
    speechSamples = 0;
    silenceSamples = 0;
    buffer = [];
    speechStartTime = null;
  }

  function emitSegment(): void {
    const collected = buffer;
    const hadEnoughSpeech = speechSamples >= minSpeechSamples && collected.length > 0;
    const startedAt = speechStartTime ?? Date.now();
    clearState();

    if (!hadEnoughSpeech) return;

    const audio = concatenateChunks(collected);
    const segment: SpeechSegment = Object.freeze({
      audio,
      startTime: startedAt,
      endTime: Date.now(),
      durationMs: Math.floor((audio.length / sampleRate) * 1000),
    });

    try {
      onSegment(segment);
    } catch (err) {
      console.error(`[vad] segment callback failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  function processChunk(chunk: Float32Array, probability: number): boolean | null {
    if (chunk.length < chunkSamples) return null;

    const isSpeech = probability >= threshold;

    if (isSpeech) {
      if (!inSpeech) {
        inSpeech = true;
        speechStartTime = Date.now();
        speechSamples = 0;
        silenceSamples = 0;
      }
      buffer.push(chunk.slice());
      speechSamples += chunk.length;
      silenceSamples = 0;
      return true;
    }

    if (inSpeech) {
      buffer.push(chunk.slice());
      silenceSamples += chunk.length;
      if (silenceSamples >= minSilenceSamples) {
        emitSegment();
      }
    }
    return false;
  }

  async function processAudio(chunk: Float32Array): Promise<number | null> {
    if (chunk.length < chunkSamples) return null;
    if (!scorer) throw new Error("processAudio requires a speech scorer");

    const scoredGeneration = generation;
    let probability: number;
    try {
      probability = await scorer.score(chunk);
    } catch (err) {
      console.error(`[vad] scorer failed: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }

    // reset() happened while scoring: this audio belongs to the discarded span
    if (scoredGeneration !== generation) return null;

    processChunk(chunk, probability);
    return probability;
  }

  return {
    processChunk,
    processAudio,

    reset(): void {
      generation++;
      clearState();
    },

    snapshot(): VadSnapshot {
      return { inSpeech, speechSamples, silenceSamples, bufferedChunks: buffer.length, speechStartTime };
    },

    setThreshold(value: number): void {
      threshold = value;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Concatenate buffered chunks into a single Float32Array.
 *
 * @param chunks - Array of Float32Array audio chunks
 * @returns Single concatenated Float32Array
 */
export function concatenateChunks(chunks: Float32Array[]): Float32Array {
  if (chunks.length === 0) {
    return new Float32Array(0);
  }

  if (chunks.length === 1) {
    return chunks[0];
  }

  const totalLength = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const result = new Float32Array(totalLength);

  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }

  return result;
}
