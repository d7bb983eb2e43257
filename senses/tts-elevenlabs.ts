/**
 * ElevenLabs TTS provider via streaming HTTP API.
 *
 * Streams raw PCM at 24kHz 16-bit mono from the text-to-speech stream
 * endpoint. No subprocess is needed.
 */

import type { PcmChunk, TtsEngine } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** ElevenLabs TTS streaming API base URL */
const ELEVENLABS_TTS_BASE_URL = "https://api.elevenlabs.io/v1/text-to-speech";

/** PCM output sample rate in Hz */
const TTS_SAMPLE_RATE = 24000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface ElevenlabsTtsConfig {
  apiKey: string;
  voiceId: string;
  /** ElevenLabs model ID (e.g. "eleven_turbo_v2_5") */
  modelId: string;
  /** Override the API base URL */
  baseUrl?: string;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a TtsEngine backed by the ElevenLabs streaming API.
 * Stopping iteration early aborts the HTTP request.
 */
export function createElevenlabsTts(config: ElevenlabsTtsConfig): TtsEngine {
  const { apiKey, voiceId, modelId } = config;
  const baseUrl = config.baseUrl ?? ELEVENLABS_TTS_BASE_URL;
  const inFlight = new Set<AbortController>();

  async function* synthesize(text: string): AsyncGenerator<PcmChunk> {
    const controller = new AbortController();
    inFlight.add(controller);

    try {
      const t0 = Date.now();
      const url = `${baseUrl}/${voiceId}/stream?output_format=pcm_${TTS_SAMPLE_RATE}`;
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "xi-api-key": apiKey,
        },
        body: JSON.stringify({ text, model_id: modelId }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorText = await response.text().catch(() => "unknown error");
        throw new Error(`ElevenLabs TTS API error ${response.status}: ${errorText}`);
      }

      let first = true;
      for await (const chunk of readResponseChunks(response)) {
        if (first) {
          console.error(`[tts-elevenlabs] first chunk at +${Date.now() - t0}ms`);
          first = false;
        }
        yield { pcm: Buffer.from(chunk), sampleRate: TTS_SAMPLE_RATE };
      }
    } finally {
      inFlight.delete(controller);
      controller.abort();
    }
  }

  function destroy(): void {
    for (const controller of inFlight) controller.abort();
    inFlight.clear();
  }

  return { synthesize, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Async generator that reads chunks from a fetch Response body.
 *
 * @param response - The fetch Response with a readable body
 * @yields Uint8Array chunks of raw PCM audio data
 */
async function* readResponseChunks(response: Response): AsyncGenerator<Uint8Array> {
  const body = response.body;
  if (!body) throw new Error("ElevenLabs TTS response has no body");

  const reader = body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}
