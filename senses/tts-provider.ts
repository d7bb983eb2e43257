/**
 * TTS provider factory and readiness checks.
 *
 * Responsibilities:
 * - Create a TtsEngine for the configured provider (local or ElevenLabs)
 * - Check provider readiness (server command, API keys)
 * - Provide static metadata about available TTS providers
 */

import { existsSync } from "fs";
import { isAbsolute } from "path";

import { createLocalTts } from "./tts.js";
import { createElevenlabsTts } from "./tts-elevenlabs.js";

import type { ProviderStatus, TtsEngine, TtsProviderConfig, TtsProviderType } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Metadata about a TTS provider.
 */
export interface TtsProviderInfo {
  type: TtsProviderType;
  name: string;
  description: string;
  /** Environment variable name for the API key (undefined = no key needed) */
  requiresApiKey?: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a TtsEngine for the configured provider.
 *
 * @throws Error if the provider cannot be initialised
 */
export async function createTtsForProvider(config: TtsProviderConfig): Promise<TtsEngine> {
  switch (config.provider) {
    case "local":
      return createLocalTts({
        serverCommand: config.local.serverCommand,
        sampleRate: config.local.sampleRate,
      });

    case "elevenlabs":
      return createElevenlabsTts({
        apiKey: config.elevenlabs.apiKey,
        voiceId: config.elevenlabs.voiceId,
        modelId: config.elevenlabs.modelId,
      });
  }
}

/**
 * Check whether a TTS provider is ready to use.
 *
 * Local: a server command is configured and, when given as a path, exists.
 * ElevenLabs: an API key and voice are configured.
 */
export function getTtsProviderStatus(config: TtsProviderConfig): ProviderStatus {
  switch (config.provider) {
    case "local": {
      const [bin] = config.local.serverCommand;
      if (!bin) {
        return { ready: false, reason: "not_installed", detail: "TTS_SERVER_COMMAND is not set" };
      }
      if (isAbsolute(bin) && !existsSync(bin)) {
        return { ready: false, reason: "not_installed", detail: `TTS server not found at ${bin}` };
      }
      return { ready: true };
    }

    case "elevenlabs":
      if (!config.elevenlabs.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" };
      }
      if (!config.elevenlabs.voiceId) {
        return { ready: false, reason: "not_installed", detail: "ELEVENLABS_VOICE_ID is not set" };
      }
      return { ready: true };
  }
}

/**
 * All known TTS providers.
 */
export function getAvailableTtsProviders(): TtsProviderInfo[] {
  return [
    {
      type: "local",
      name: "Local TTS server",
      description: "Persistent local subprocess writing length-prefixed PCM (e.g. a Piper wrapper)",
    },
    {
      type: "elevenlabs",
      name: "ElevenLabs",
      description: "Cloud TTS via ElevenLabs streaming API",
      requiresApiKey: "ELEVENLABS_API_KEY",
    },
  ];
}
