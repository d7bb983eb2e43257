/**
 * STT provider factory and readiness checks.
 *
 * Responsibilities:
 * - Create a Transcriber for the configured provider (local or ElevenLabs)
 * - Check provider readiness (model files exist, API keys set)
 * - Provide static metadata about available STT providers
 */

import { createLocalTranscriber, missingModelFiles } from "./stt.js";
import { createElevenlabsTranscriber } from "./stt-elevenlabs.js";

import type { ProviderStatus, SttProviderConfig, SttProviderType, Transcriber } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Metadata about an STT provider.
 */
export interface SttProviderInfo {
  type: SttProviderType;
  name: string;
  description: string;
  /** Environment variable name for the API key (undefined = no key needed) */
  requiresApiKey?: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a Transcriber for the configured provider.
 *
 * @throws Error if the provider cannot be initialised
 */
export async function createTranscriberForProvider(config: SttProviderConfig): Promise<Transcriber> {
  switch (config.provider) {
    case "local":
      return createLocalTranscriber(config.local.modelPath, config.local.modelPrefix);

    case "elevenlabs":
      return createElevenlabsTranscriber({
        apiKey: config.elevenlabs.apiKey,
        modelId: config.elevenlabs.modelId,
      });
  }
}

/**
 * Check whether an STT provider is ready to use.
 *
 * Local: the three Whisper model files exist.
 * ElevenLabs: an API key is configured.
 */
export function getSttProviderStatus(config: SttProviderConfig): ProviderStatus {
  switch (config.provider) {
    case "local": {
      const missing = missingModelFiles(config.local.modelPath, config.local.modelPrefix);
      if (missing.length > 0) {
        return {
          ready: false,
          reason: "not_installed",
          detail: `Missing model files in ${config.local.modelPath}: ${missing.join(", ")}`,
        };
      }
      return { ready: true };
    }

    case "elevenlabs":
      if (!config.elevenlabs.apiKey) {
        return { ready: false, reason: "missing_api_key", detail: "ELEVENLABS_API_KEY is not set" };
      }
      return { ready: true };
  }
}

/**
 * All known STT providers.
 */
export function getAvailableSttProviders(): SttProviderInfo[] {
  return [
    {
      type: "local",
      name: "Local Whisper",
      description: "On-device STT via sherpa-onnx Whisper ONNX model (offline batch mode)",
    },
    {
      type: "elevenlabs",
      name: "ElevenLabs Scribe",
      description: "Cloud STT via ElevenLabs batch transcription API",
      requiresApiKey: "ELEVENLABS_API_KEY",
    },
  ];
}
