/**
 * ElevenLabs STT provider via batch transcription API (Scribe).
 *
 * Each speech segment is encoded as a 16kHz mono 16-bit WAV file and
 * uploaded in one request.
 */

import { z } from "zod";

import { encodeWav } from "./audio-player.js";

import type { Transcriber, Transcript } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs STT API endpoint */
const ELEVENLABS_STT_URL = "https://api.elevenlabs.io/v1/speech-to-text";

/** Sample rate for the WAV file (must match input audio from microphone) */
const WAV_SAMPLE_RATE = 16000;

const ResponseSchema = z.object({
  text: z.string(),
  language_code: z.string().optional(),
});

// ============================================================================
// INTERFACES
// ============================================================================

export interface ElevenlabsSttConfig {
  apiKey: string;
  /** ElevenLabs STT model ID (e.g. "scribe_v1") */
  modelId: string;
  /** Override the endpoint */
  url?: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a Transcriber backed by the ElevenLabs batch transcription API.
 */
export async function createElevenlabsTranscriber(config: ElevenlabsSttConfig): Promise<Transcriber> {
  const { apiKey, modelId } = config;
  const url = config.url ?? ELEVENLABS_STT_URL;

  /**
   * Upload one segment and parse the result.
   *
   * @throws Error on non-2xx response, malformed body, or network failure
   */
  async function transcribe(audio: Float32Array): Promise<Transcript> {
    if (audio.length === 0) return { text: "", language: "en" };

    const wavBlob = new Blob([encodeWav(audio, WAV_SAMPLE_RATE)], { type: "audio/wav" });

    const formData = new FormData();
    formData.append("file", wavBlob, "audio.wav");
    formData.append("model_id", modelId);

    const response = await fetch(url, {
      method: "POST",
      headers: {
        "xi-api-key": apiKey,
      },
      body: formData,
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "unknown error");
      throw new Error(`ElevenLabs STT API error ${response.status}: ${errorText}`);
    }

    const result = ResponseSchema.parse(await response.json());
    return { text: result.text.trim(), language: result.language_code || "en" };
  }

  return {
    transcribe,
    destroy(): void {
      // no resources held between requests
    },
  };
}
