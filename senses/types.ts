/**
 * Shared types for the perception senses.
 *
 * Defines the DTOs and interfaces used across sense and output processes:
 * - Wire protocol messages (signal, status, command)
 * - Audio segments and the echo-cancellation audio state
 * - Frame differencing results and raw frames
 * - External collaborator capabilities (scorer, transcriber, TTS, scene describer)
 * - Per-module configuration
 */

// ============================================================================
// PROTOCOL MESSAGES
// ============================================================================

/** Lifecycle states a sense or output reports to the core */
export type SenseStatus = "ready" | "error" | "stopped" | "busy";

/** Instructions the core may send to a sense or output */
export type CommandName = "start" | "stop" | "configure" | "speak" | "interrupt";

/** Open key-value map carried by signals and commands */
export type Metadata = Record<string, unknown>;

/**
 * Sense -> core: something was perceived.
 * Immutable once constructed.
 */
export interface Signal {
  /** Which sense produced it ("hearing", "vision", "screen", "voice") */
  readonly sense: string;
  /** Human-readable description of the observation */
  readonly content: string;
  /** Processing priority, higher = more urgent */
  readonly priority: number;
  /** Sense-specific data */
  readonly metadata: Readonly<Metadata>;
  /** Capture time in seconds since the epoch */
  readonly timestamp: number;
}

/**
 * Sense/output -> core: lifecycle update.
 */
export interface Status {
  readonly sense: string;
  readonly status: SenseStatus;
  readonly message: string;
  /** Seconds since the epoch */
  readonly timestamp: number;
}

/**
 * Core -> sense/output: instruction to perform an action.
 */
export interface Command {
  command: CommandName;
  options: Metadata;
}

/** A message as it travels sense -> core, with its discriminator */
export type SenseMessage = ({ type: "signal" } & Signal) | ({ type: "status" } & Status);

// ============================================================================
// AUDIO TYPES
// ============================================================================

/**
 * A bounded, fully buffered span of speech produced by the VAD segmenter.
 * Consumed exactly once by the transcription coordinator.
 */
export interface SpeechSegment {
  /** Concatenated samples at the segmenter's sample rate */
  readonly audio: Float32Array;
  /** Milliseconds since the epoch when speech started */
  readonly startTime: number;
  /** Milliseconds since the epoch when silence was confirmed */
  readonly endTime: number;
  /** Length of `audio` in milliseconds */
  readonly durationMs: number;
}

/**
 * Echo-cancellation state. LISTENING and INTERRUPT_CHECK mean the mic is live.
 */
export type AudioState = "LISTENING" | "SPEAKING" | "INTERRUPT_CHECK";

/**
 * What the hearing pipeline does with microphone audio.
 * - open: every segment is transcribed and delivered
 * - interrupts: segments are still formed, but only interrupt keywords get through
 * - muted: audio never reaches the VAD
 */
export type ListenMode = "open" | "interrupts" | "muted";

/**
 * Result of a transcription that passed the hallucination filter.
 */
export interface TranscriptionResult {
  /** The transcribed text */
  text: string;
  /** Language code reported by the transcriber */
  language: string;
  /** Transcriber confidence (1.0 when the backend reports none) */
  confidence: number;
  /** Time spent in the transcriber (ms) */
  inferenceMs: number;
  /** Duration of the audio that was transcribed (ms) */
  durationMs: number;
  /** Segment start/end in ms since the epoch */
  startTime: number;
  endTime: number;
}

/** A chunk of synthesized audio: 16-bit signed little-endian mono PCM */
export interface PcmChunk {
  pcm: Buffer;
  sampleRate: number;
}

// ============================================================================
// VISION TYPES
// ============================================================================

/**
 * A raw RGB24 frame (3 bytes per pixel, row-major, no padding).
 */
export interface Frame {
  data: Uint8Array;
  width: number;
  height: number;
  /** Milliseconds since the epoch when the frame was captured */
  timestamp: number;
}

/**
 * Frame differencing outcome. Recomputed every frame, never persisted.
 */
export interface FrameDiffResult {
  /** Whether divergence from the last analysed frame exceeds the change threshold */
  changed: boolean;
  /** 0.0 = identical, 1.0 = completely different */
  diffScore: number;
  /** Active cells on the coarse motion grid */
  motionRegions: number;
  /** Raw motion: mean difference from the immediately previous frame, 0.0 to 1.0 */
  motionScore: number;
}

// ============================================================================
// EXTERNAL COLLABORATORS
// ============================================================================

/** Scores a fixed-size audio chunk with a speech probability in [0, 1]. */
export interface SpeechScorer {
  score(chunk: Float32Array): Promise<number>;
}

/** Output of a single transcriber call. */
export interface Transcript {
  text: string;
  language: string;
}

/** Speech-to-text backend. */
export interface Transcriber {
  transcribe(audio: Float32Array): Promise<Transcript>;
  destroy(): void;
}

/** Text-to-speech backend. */
export interface TtsEngine {
  synthesize(text: string): AsyncIterable<PcmChunk>;
  destroy(): void;
}

/** Output of a single scene description call. */
export interface SceneDescription {
  text: string;
  latencyMs: number;
}

/** "brief" is the one-sentence pass; "full" is the slower, more detailed one */
export type DescriptionDetail = "brief" | "full";

/** Vision-language backend. */
export interface SceneDescriber {
  describe(frame: Frame, detail?: DescriptionDetail): Promise<SceneDescription>;
}

// ============================================================================
// PROVIDERS
// ============================================================================

export type SttProviderType = "local" | "elevenlabs";

export type TtsProviderType = "local" | "elevenlabs";

/** Which STT backend to build, with per-backend settings */
export interface SttProviderConfig {
  provider: SttProviderType;
  local: {
    /** Directory holding the Whisper ONNX files */
    modelPath: string;
    /** File prefix, e.g. "small.en" */
    modelPrefix: string;
  };
  elevenlabs: {
    apiKey: string;
    modelId: string;
  };
}

/** Which TTS backend to build, with per-backend settings */
export interface TtsProviderConfig {
  provider: TtsProviderType;
  local: {
    /** argv of the TTS server process */
    serverCommand: string[];
    /** Rate of the PCM the server writes */
    sampleRate: number;
  };
  elevenlabs: {
    apiKey: string;
    voiceId: string;
    modelId: string;
  };
}

/** Readiness of a provider, for startup checks */
export interface ProviderStatus {
  ready: boolean;
  reason?: "missing_api_key" | "not_installed" | "unsupported_platform";
  detail?: string;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * VAD segmenter thresholds. Millisecond values are converted to sample
 * counts once, at construction.
 */
export interface VadConfig {
  /** Sample rate of incoming chunks (no resampling is performed) */
  sampleRate: number;
  /** Samples per chunk; shorter chunks are rejected */
  chunkSamples: number;
  /** Speech probability at or above which a chunk counts as speech */
  threshold: number;
  /** Minimum accumulated speech for a segment to be emitted */
  minSpeechMs: number;
  /** Trailing silence that ends a segment */
  minSilenceMs: number;
}

/**
 * Frame differencer thresholds.
 */
export interface FrameDiffConfig {
  /** Divergence from the last analysed frame that always triggers analysis */
  changeThreshold: number;
  /** Lower divergence bar used after the cooldown and for motion regions */
  motionThreshold: number;
  /** Frames that must pass before the lower bar applies */
  minFramesBetweenAnalysis: number;
  /** Integer area-average downsampling factor */
  downsampleFactor: number;
}

/**
 * Echo-cancellation timing. Both values need recalibrating per audio pipeline.
 */
export interface EchoCancellationConfig {
  /** Time spent muted between interrupt-check windows */
  interruptCheckIntervalMs: number;
  /** Length of each interrupt-check window */
  interruptCheckDurationMs: number;
}

/**
 * Hallucination filter and interrupt keyword data.
 */
export interface TranscriptFilterConfig {
  /** Transcripts shorter than this (after trimming) are rejected */
  minLength: number;
  /** Phrases transcribers produce on silence/noise */
  hallucinationPhrases: string[];
  /** Phrases longer than this also match as substrings */
  substringMinLength: number;
  /** Words that trigger barge-in */
  interruptKeywords: string[];
}
