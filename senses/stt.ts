/**
 * Local speech-to-text via sherpa-onnx with a Whisper ONNX model.
 *
 * Whisper models in sherpa-onnx are offline-only: each speech segment is
 * decoded in one batch on a fresh stream.
 *
 * Responsibilities:
 * - Validate and load the Whisper model files
 * - Transcribe one segment per call
 */

import { existsSync } from "fs";
import { join } from "path";

import type { Transcriber, Transcript } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Sample rate expected by the Whisper model */
const SAMPLE_RATE = 16000;

/** Default model file prefix (sherpa-onnx naming convention: "small.en", "tiny.en", etc.) */
export const DEFAULT_MODEL_PREFIX = "small.en";

/** Required model file suffixes within the model directory */
const REQUIRED_SUFFIXES = ["-encoder.int8.onnx", "-decoder.int8.onnx", "-tokens.txt"];

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Load the sherpa-onnx offline recognizer and wrap it as a Transcriber.
 *
 * @param modelPath - Directory containing the encoder, decoder and tokens files
 * @param prefix - Model file prefix
 * @throws Error if any required model files are missing
 */
export async function createLocalTranscriber(modelPath: string, prefix: string = DEFAULT_MODEL_PREFIX): Promise<Transcriber> {
  const missing = missingModelFiles(modelPath, prefix);
  if (missing.length > 0) {
    throw new Error(
      `Missing STT model files in ${modelPath}: ${missing.join(", ")}. ` +
        `Download a Whisper ONNX model from the sherpa-onnx releases.`
    );
  }

  // Loaded lazily so the native runtime is only pulled in when local STT is used
  const sherpa = (await import("sherpa-onnx-node")).default;

  const recognizer = new sherpa.OfflineRecognizer({
    modelConfig: {
      whisper: {
        encoder: join(modelPath, `${prefix}-encoder.int8.onnx`),
        decoder: join(modelPath, `${prefix}-decoder.int8.onnx`),
      },
      tokens: join(modelPath, `${prefix}-tokens.txt`),
    },
  });

  return {
    async transcribe(audio: Float32Array): Promise<Transcript> {
      if (audio.length === 0) return { text: "", language: "en" };

      const stream = recognizer.createStream();
      stream.acceptWaveform({ sampleRate: SAMPLE_RATE, samples: audio });
      recognizer.decode(stream);

      const result = recognizer.getResult(stream);
      return { text: result.text.trim(), language: result.lang || "en" };
    },

    destroy(): void {
      // recognizer cleanup is handled by sherpa-onnx-node garbage collection
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * List the required model files absent from a directory.
 *
 * @returns File names that are missing; empty when the model is complete
 */
export function missingModelFiles(modelPath: string, prefix: string = DEFAULT_MODEL_PREFIX): string[] {
  const expected = REQUIRED_SUFFIXES.map((suffix) => `${prefix}${suffix}`);
  if (!existsSync(modelPath)) return expected;
  return expected.filter((file) => !existsSync(join(modelPath, file)));
}
