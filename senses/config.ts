/**
 * Process configuration for senses and the core.
 *
 * Static settings come from a .env file (read through services/env) overlaid
 * by the process environment. Runtime `configure` commands are validated
 * against one strict schema per sense, so unknown keys and wrongly typed
 * values are rejected instead of merged.
 *
 * Responsibilities:
 * - Load and validate environment settings with documented defaults
 * - Build provider configs for STT and TTS
 * - Define the configure whitelists for each sense/output
 */

import { homedir } from "os";
import { join } from "path";
import { z } from "zod";

import { readEnv } from "../services/env.js";
import { DEFAULT_MODEL_PREFIX } from "./stt.js";
import { DEFAULT_TTS_SAMPLE_RATE } from "./tts.js";

import type { SttProviderConfig, TtsProviderConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Standard path where local Whisper model files are stored */
const DEFAULT_STT_MODEL_DIR = join(homedir(), ".sense-models", "whisper-small");

/** Core-side wait for a sense to report ready (ms) */
export const DEFAULT_SENSE_READY_TIMEOUT_MS = 60_000;

const EnvSchema = z.object({
  STT_PROVIDER: z.enum(["local", "elevenlabs"]).default("local"),
  TTS_PROVIDER: z.enum(["local", "elevenlabs"]).default("local"),
  STT_MODEL_PATH: z.string().min(1).default(DEFAULT_STT_MODEL_DIR),
  STT_MODEL_PREFIX: z.string().min(1).default(DEFAULT_MODEL_PREFIX),
  TTS_SERVER_COMMAND: z.string().default(""),
  TTS_SAMPLE_RATE: z.coerce.number().int().positive().default(DEFAULT_TTS_SAMPLE_RATE),
  ELEVENLABS_API_KEY: z.string().default(""),
  ELEVENLABS_VOICE_ID: z.string().default(""),
  ELEVENLABS_STT_MODEL: z.string().default("scribe_v1"),
  ELEVENLABS_TTS_MODEL: z.string().default("eleven_turbo_v2_5"),
  ANTHROPIC_API_KEY: z.string().optional(),
  MIC_DEVICE: z.string().optional(),
  CAMERA_DEVICE: z.string().optional(),
  SCREEN_DEVICE: z.string().optional(),
  SIDEBAND_SOCKET: z.string().optional(),
  SENSE_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_SENSE_READY_TIMEOUT_MS),
});

// ============================================================================
// INTERFACES
// ============================================================================

/** Validated settings shared by every process */
export interface SenseSettings {
  stt: SttProviderConfig;
  tts: TtsProviderConfig;
  anthropicApiKey?: string;
  micDevice?: string;
  cameraDevice?: string;
  screenDevice?: string;
  /** Unix socket path for perception results; no sideband when unset */
  sidebandSocket?: string;
  senseReadyTimeoutMs: number;
}

// ============================================================================
// CONFIGURE SCHEMAS
// ============================================================================

/** `configure` options accepted by the hearing sense */
export const HearingConfigureSchema = z
  .object({
    mute: z.boolean(),
    listen: z.enum(["open", "interrupts", "muted"]),
    vad_threshold: z.number().min(0).max(1),
  })
  .partial()
  .strict();

export type HearingConfigure = z.infer<typeof HearingConfigureSchema>;

/** `configure` options accepted by the vision and screen senses */
export const VisionConfigureSchema = z
  .object({
    change_threshold: z.number().min(0).max(1),
    motion_threshold: z.number().min(0).max(1),
    min_frames_between_analysis: z.number().int().nonnegative(),
    downsample_factor: z.number().int().min(1),
    /** Brief descriptions between full ones; 0 turns full analysis off */
    full_analysis_interval: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

export type VisionConfigure = z.infer<typeof VisionConfigureSchema>;

/** `configure` options accepted by the voice output */
export const VoiceConfigureSchema = z
  .object({
    interrupt_check_interval_ms: z.number().int().positive(),
    interrupt_check_duration_ms: z.number().int().positive(),
  })
  .partial()
  .strict();

export type VoiceConfigure = z.infer<typeof VoiceConfigureSchema>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Load settings from .env and the process environment (the environment wins).
 *
 * @param envPath - .env location, process.cwd()/.env by default
 * @param env - Environment to overlay, process.env by default
 * @throws Error listing every invalid setting
 */
export async function loadSettings(envPath?: string, env: NodeJS.ProcessEnv = process.env): Promise<SenseSettings> {
  const fileValues = await readEnv(envPath);
  const merged: Record<string, string> = { ...fileValues };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") merged[key] = value;
  }
  return parseSettings(merged);
}

/**
 * Validate a flat key-value record into settings.
 *
 * @throws Error listing every invalid setting
 */
export function parseSettings(values: Record<string, string>): SenseSettings {
  const parsed = EnvSchema.safeParse(values);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  return {
    stt: {
      provider: e.STT_PROVIDER,
      local: { modelPath: e.STT_MODEL_PATH, modelPrefix: e.STT_MODEL_PREFIX },
      elevenlabs: { apiKey: e.ELEVENLABS_API_KEY, modelId: e.ELEVENLABS_STT_MODEL },
    },
    tts: {
      provider: e.TTS_PROVIDER,
      local: { serverCommand: splitCommand(e.TTS_SERVER_COMMAND), sampleRate: e.TTS_SAMPLE_RATE },
      elevenlabs: { apiKey: e.ELEVENLABS_API_KEY, voiceId: e.ELEVENLABS_VOICE_ID, modelId: e.ELEVENLABS_TTS_MODEL },
    },
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    micDevice: e.MIC_DEVICE,
    cameraDevice: e.CAMERA_DEVICE,
    screenDevice: e.SCREEN_DEVICE,
    sidebandSocket: e.SIDEBAND_SOCKET,
    senseReadyTimeoutMs: e.SENSE_READY_TIMEOUT_MS,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Split a command line on whitespace. Double-quoted segments stay together.
 */
export function splitCommand(command: string): string[] {
  const parts = command.match(/"[^"]*"|\S+/g) ?? [];
  return parts.map((part) => (part.startsWith("\"") && part.endsWith("\"") && part.length >= 2 ? part.slice(1, -1) : part));
}

/**
 * One-line summary of validation issues, e.g. "mute: Expected boolean, received string".
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
