/**
 * Hearing sense: microphone -> VAD -> transcription -> signals.
 *
 * Responsibilities:
 * - Load the configured transcriber during initialisation
 * - Capture audio into a bounded queue and feed the mute-aware transcriber from one consumer loop
 * - Emit transcriptions at voice priority and keyword interrupts at interrupt priority
 * - Apply `mute`, `listen` and `vad_threshold` from configure commands
 */

import { startMicCapture, type MicCapture, type MicCaptureOptions } from "./audio-capture.js";
import { HearingConfigureSchema, type HearingConfigure, type SenseSettings } from "./config.js";
import { PRIORITY, wireTimestamp } from "./protocol.js";
import { createEnergyScorer } from "./speech-scorer.js";
import { createTranscriberForProvider, getSttProviderStatus } from "./stt-provider.js";
import { createMuteAwareTranscriber, type MuteAwareTranscriber } from "./transcription.js";
import { DEFAULT_VAD_CONFIG } from "./vad.js";

import type { SenseContext, SenseModule } from "./sense-runner.js";
import type { ListenMode, SpeechScorer, Transcriber, TranscriptionResult } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** About 3 seconds of 32ms chunks */
const CAPTURE_QUEUE_CAPACITY = 100;

/** Consumer wake-up interval to re-check the running flag (ms) */
const QUEUE_POLL_MS = 100;

// ============================================================================
// INTERFACES
// ============================================================================

/** Collaborators that can be swapped out, mainly for tests */
export interface HearingDeps {
  transcriber?: Transcriber;
  scorer?: SpeechScorer;
  startCapture?: (options: MicCaptureOptions) => Promise<MicCapture>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the hearing sense module.
 */
export function createHearingSense(settings: SenseSettings, deps: HearingDeps = {}): SenseModule<HearingConfigure> {
  const startCapture = deps.startCapture ?? startMicCapture;

  let ctx: SenseContext | null = null;
  let transcriber: Transcriber | null = null;
  let pipeline: MuteAwareTranscriber | null = null;
  let capture: MicCapture | null = null;
  let loop: Promise<void> | null = null;
  let capturing = false;

  function emitTranscription(result: TranscriptionResult): void {
    console.error(`[hearing] "${result.text}" (${result.inferenceMs}ms)`);
    ctx?.emitSignal(result.text, PRIORITY.VOICE, {
      language: result.language,
      confidence: result.confidence,
      duration_ms: result.durationMs,
      inference_ms: result.inferenceMs,
      start_time: wireTimestamp(result.startTime),
      end_time: wireTimestamp(result.endTime),
    });
  }

  function emitInterrupt(text: string, keyword: string): void {
    console.error(`[hearing] interrupt keyword "${keyword}"`);
    ctx?.emitSignal(text, PRIORITY.INTERRUPT, { is_interrupt: true, keyword });
  }

  async function consume(source: MicCapture, active: MuteAwareTranscriber): Promise<void> {
    while (capturing) {
      const chunk = await source.chunks.next(QUEUE_POLL_MS);
      if (chunk === null) {
        if (source.chunks.isClosed()) break;
        continue;
      }

      try {
        await active.feed(chunk);
      } catch (err) {
        console.error(`[hearing] chunk processing failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  return {
    name: "hearing",
    kind: "sense",
    configureSchema: HearingConfigureSchema,

    async initialize(context: SenseContext): Promise<void> {
      ctx = context;

      if (deps.transcriber) {
        transcriber = deps.transcriber;
      } else {
        const status = getSttProviderStatus(settings.stt);
        if (!status.ready) {
          throw new Error(`STT provider "${settings.stt.provider}" is not ready: ${status.detail ?? status.reason ?? "unknown"}`);
        }
        console.error(`[hearing] Loading ${settings.stt.provider} transcriber...`);
        transcriber = await createTranscriberForProvider(settings.stt);
      }

      pipeline = createMuteAwareTranscriber({
        vad: DEFAULT_VAD_CONFIG,
        scorer: deps.scorer ?? createEnergyScorer(),
        transcriber,
        onTranscription: emitTranscription,
        onInterrupt: emitInterrupt,
      });
      console.error("[hearing] ready");
    },

    async start(): Promise<void> {
      if (!pipeline) throw new Error("hearing started before initialisation");
      const active = pipeline;

      capture = await startCapture({
        sampleRate: DEFAULT_VAD_CONFIG.sampleRate,
        chunkSamples: DEFAULT_VAD_CONFIG.chunkSamples,
        queueCapacity: CAPTURE_QUEUE_CAPACITY,
        device: settings.micDevice,
      });
      capturing = true;
      loop = consume(capture, active).catch((err) => {
        console.error(`[hearing] capture loop failed: ${err instanceof Error ? err.message : String(err)}`);
      });
      console.error("[hearing] Listening");
    },

    async stop(): Promise<void> {
      capturing = false;
      capture?.stop();
      capture = null;
      if (loop) await loop;
      loop = null;
      if (pipeline) await pipeline.idle();
      console.error("[hearing] Stopped");
    },

    configure(patch: HearingConfigure): void {
      if (pipeline) applyHearingConfigure(pipeline, patch);
    },

    async cleanup(): Promise<void> {
      capturing = false;
      capture?.stop();
      capture = null;
      transcriber?.destroy();
      transcriber = null;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Apply a validated configure patch to the pipeline. `listen` wins over `mute`
 * when both are given.
 */
export function applyHearingConfigure(pipeline: MuteAwareTranscriber, patch: HearingConfigure): void {
  let mode: ListenMode | undefined;
  if (patch.mute !== undefined) mode = patch.mute ? "muted" : "open";
  if (patch.listen !== undefined) mode = patch.listen;

  if (mode !== undefined && mode !== pipeline.getMode()) {
    pipeline.setMode(mode);
    console.error(`[hearing] Listen mode ${mode}`);
  }
  if (patch.vad_threshold !== undefined) {
    pipeline.vad.setThreshold(patch.vad_threshold);
    console.error(`[hearing] VAD threshold ${patch.vad_threshold}`);
  }
}
