/**
 * Unit tests for STT and TTS provider readiness checks.
 *
 * Run: node --import tsx --test senses/providers.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { parseSettings } from "./config.js";
import { missingModelFiles } from "./stt.js";
import { getAvailableSttProviders, getSttProviderStatus } from "./stt-provider.js";
import { getAvailableTtsProviders, getTtsProviderStatus } from "./tts-provider.js";

// ============================================================================
// STT
// ============================================================================

test("a local model directory is ready once all three files exist", async () => {
  const dir = await mkdtemp(join(tmpdir(), "stt-model-"));
  try {
    await writeFile(join(dir, "tiny-encoder.int8.onnx"), "");
    assert.deepEqual(missingModelFiles(dir, "tiny"), ["tiny-decoder.int8.onnx", "tiny-tokens.txt"]);

    const partial = parseSettings({ STT_MODEL_PATH: dir, STT_MODEL_PREFIX: "tiny" });
    assert.deepEqual(getSttProviderStatus(partial.stt), {
      ready: false,
      reason: "not_installed",
      detail: `Missing model files in ${dir}: tiny-decoder.int8.onnx, tiny-tokens.txt`,
    });

    await writeFile(join(dir, "tiny-decoder.int8.onnx"), "");
    await writeFile(join(dir, "tiny-tokens.txt"), "");
    assert.deepEqual(getSttProviderStatus(partial.stt), { ready: true });
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("a missing model directory lists every file", () => {
  assert.deepEqual(missingModelFiles("/nonexistent/model", "base"), [
    "base-encoder.int8.onnx",
    "base-decoder.int8.onnx",
    "base-tokens.txt",
  ]);
});

test("cloud STT needs an API key", () => {
  const without = parseSettings({ STT_PROVIDER: "elevenlabs" });
  const withKey = parseSettings({ STT_PROVIDER: "elevenlabs", ELEVENLABS_API_KEY: "test-secret" });

  assert.equal(getSttProviderStatus(without.stt).reason, "missing_api_key");
  assert.deepEqual(getSttProviderStatus(withKey.stt), { ready: true });
});

// ============================================================================
// TTS
// ============================================================================

test("local TTS needs a server command whose absolute path exists", () => {
  const none = parseSettings({});
  const missing = parseSettings({ TTS_SERVER_COMMAND: "/nonexistent/tts-server --voice en" });
  const onPath = parseSettings({ TTS_SERVER_COMMAND: "tts-server --voice en" });

  assert.equal(getTtsProviderStatus(none.tts).detail, "TTS_SERVER_COMMAND is not set");
  assert.equal(getTtsProviderStatus(missing.tts).detail, "TTS server not found at /nonexistent/tts-server");
  assert.deepEqual(getTtsProviderStatus(onPath.tts), { ready: true });
});

test("cloud TTS needs both a key and a voice", () => {
  const keyOnly = parseSettings({ TTS_PROVIDER: "elevenlabs", ELEVENLABS_API_KEY: "test-secret" });
  const complete = parseSettings({
    TTS_PROVIDER: "elevenlabs",
    ELEVENLABS_API_KEY: "test-secret",
    ELEVENLABS_VOICE_ID: "test-voice",
  });

  assert.equal(getTtsProviderStatus(keyOnly.tts).detail, "ELEVENLABS_VOICE_ID is not set");
  assert.deepEqual(getTtsProviderStatus(complete.tts), { ready: true });
});

test("both provider lists offer local and cloud options", () => {
  assert.deepEqual(getAvailableSttProviders().map((p) => p.type), ["local", "elevenlabs"]);
  assert.deepEqual(getAvailableTtsProviders().map((p) => p.type), ["local", "elevenlabs"]);
  assert.equal(getAvailableTtsProviders()[1].requiresApiKey, "ELEVENLABS_API_KEY");
});
