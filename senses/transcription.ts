/**
 * Mute-aware transcription coordinator.
 *
 * The hearing pipeline: audio chunks go through the VAD segmenter, each
 * segment is transcribed once, then routed to either the interrupt callback
 * or the transcription callback.
 *
 * Responsibilities:
 * - Skip the VAD while muted, and reset it on every change of listen mode
 * - Keep segmenting in interrupt-only mode so barge-in works while the voice speaks
 * - Transcribe segments one at a time, in emission order
 * - Reject hallucinated transcripts
 * - Fire interrupts on keywords even while muted (barge-in)
 * - Isolate transcriber and callback failures from the audio loop
 */

import { createVadSegmenter, type VadSegmenter } from "./vad.js";
import { DEFAULT_FILTER_CONFIG, findInterruptKeyword, isHallucination } from "./transcript-filter.js";

import type {
  SpeechScorer,
  SpeechSegment,
  Transcriber,
  TranscriptFilterConfig,
  ListenMode,
  TranscriptionResult,
  VadConfig,
} from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface MuteAwareTranscriberOptions {
  vad: VadConfig;
  scorer: SpeechScorer;
  transcriber: Transcriber;
  filter?: TranscriptFilterConfig;
  onTranscription: (result: TranscriptionResult) => void;
  /** Receives the transcript and the keyword it matched */
  onInterrupt: (text: string, keyword: string) => void;
}

export interface MuteAwareTranscriber {
  /** Push one capture chunk. Dropped in "muted" mode. */
  feed(chunk: Float32Array): Promise<void>;
  /** Route one segment. Exposed for callers that segment elsewhere. */
  handleSegment(segment: SpeechSegment): Promise<void>;
  /** Switch mode; the VAD is reset only when the mode actually changes */
  setMode(mode: ListenMode): void;
  getMode(): ListenMode;
  /** Same as setMode("muted") */
  mute(): void;
  /** Same as setMode("open") */
  unmute(): void;
  /** True unless the mode is "open" */
  isMuted(): boolean;
  /** Resolves once every segment emitted so far has been handled */
  idle(): Promise<void>;
  /** Direct access for threshold tuning and inspection */
  readonly vad: VadSegmenter;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a mute-aware transcriber. Starts unmuted.
 */
export function createMuteAwareTranscriber(options: MuteAwareTranscriberOptions): MuteAwareTranscriber {
  const filter = options.filter ?? DEFAULT_FILTER_CONFIG;
  let mode: ListenMode = "open";

  // Segments queue up behind the one being transcribed
  let chain: Promise<void> = Promise.resolve();

  const vad = createVadSegmenter(options.vad, (segment) => {
    chain = chain.then(() => handleSegment(segment));
  }, options.scorer);

  async function handleSegment(segment: SpeechSegment): Promise<void> {
    const t0 = Date.now();
    let text: string;
    let language: string;
    try {
      const transcript = await options.transcriber.transcribe(segment.audio);
      text = transcript.text.trim();
      language = transcript.language || "en";
    } catch (err) {
      console.error(`[transcription] transcriber failed: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }
    const inferenceMs = Date.now() - t0;

    if (!text) return;

    if (isHallucination(text, filter)) {
      console.error(`[transcription] filtered hallucination: "${text.slice(0, 50)}"`);
      return;
    }

    const keyword = findInterruptKeyword(text, filter);
    if (keyword !== null) {
      try {
        options.onInterrupt(text, keyword);
      } catch (err) {
        console.error(`[transcription] interrupt callback failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      return;
    }

    // Read at decision time so a mute during transcription still suppresses
    if (mode !== "open") return;

    try {
      options.onTranscription({
        text,
        language,
        confidence: 1.0,
        inferenceMs,
        durationMs: segment.durationMs,
        startTime: segment.startTime,
        endTime: segment.endTime,
      });
    } catch (err) {
      console.error(`[transcription] transcription callback failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async function feed(chunk: Float32Array): Promise<void> {
    if (mode === "muted") return;
    await vad.processAudio(chunk);
  }

  function setMode(next: ListenMode): void {
    if (next === mode) return;
    mode = next;
    vad.reset();
  }

  return {
    feed,
    handleSegment,
    setMode,
    getMode: () => mode,
    mute: () => setMode("muted"),
    unmute: () => setMode("open"),
    isMuted: () => mode !== "open",

    idle: () => chain,

    vad,
  };
}
