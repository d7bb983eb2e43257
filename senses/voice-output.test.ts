/**
 * Tests for the voice output running under the lifecycle runner.
 *
 * The TTS engine echoes the text back as PCM and the player either finishes
 * on its own or waits to be stopped, so the audio-state signals the core
 * relies on can be checked end to end.
 *
 * Run: node --import tsx --test senses/voice-output.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { setTimeout as wait } from "node:timers/promises";
import { PassThrough } from "stream";

import { parseSettings } from "./config.js";
import { parseSenseMessage } from "./protocol.js";
import { runSense } from "./sense-runner.js";
import { createVoiceOutput } from "./voice-output.js";

import type { AudioPlayer } from "./audio-player.js";
import type { PcmChunk, SenseMessage, TtsEngine } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

function createHarness(autoFinish: boolean) {
  const played: string[] = [];
  const terminated: string[] = [];
  const engine = { destroyed: false };

  const tts: TtsEngine = {
    async *synthesize(text: string): AsyncGenerator<PcmChunk> {
      yield { pcm: Buffer.from(text, "utf-8"), sampleRate: 22050 };
    },
    destroy: () => {
      engine.destroyed = true;
    },
  };

  const player: AudioPlayer = {
    async play(pcm) {
      const text = pcm.toString("utf-8");
      played.push(text);
      let finish: (code: number | null) => void = () => {};
      const exited = new Promise<number | null>((resolve) => {
        finish = resolve;
      });
      if (autoFinish) setImmediate(() => finish(0));
      return {
        exited,
        terminate: () => {
          terminated.push(text);
          finish(null);
        },
        kill: () => finish(null),
      };
    },
  };

  const voice = createVoiceOutput(parseSettings({}), {
    tts,
    player,
    echo: { interruptCheckIntervalMs: 10_000, interruptCheckDurationMs: 100 },
  });

  return { played, terminated, engine, voice };
}

function collectMessages(output: PassThrough): SenseMessage[] {
  const messages: SenseMessage[] = [];
  let buffered = "";
  output.on("data", (data: Buffer) => {
    buffered += data.toString("utf-8");
    let newline = buffered.indexOf("\n");
    while (newline !== -1) {
      const msg = parseSenseMessage(buffered.slice(0, newline));
      if (msg) messages.push(msg);
      buffered = buffered.slice(newline + 1);
      newline = buffered.indexOf("\n");
    }
  });
  return messages;
}

/** Audio states reported so far, in order */
function statesOf(messages: SenseMessage[]): unknown[] {
  return messages.flatMap((m) => (m.type === "signal" ? [m.metadata.audio_state] : []));
}

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await wait(5);
  }
}

function line(command: object): string {
  return JSON.stringify(command) + "\n";
}

// ============================================================================
// TESTS
// ============================================================================

test("speaking reports SPEAKING then LISTENING with the mic flag", async () => {
  const h = createHarness(true);
  const input = new PassThrough();
  const output = new PassThrough();
  const messages = collectMessages(output);

  const run = runSense(h.voice, { input, output });
  input.write(line({ command: "speak", options: { text: "good morning" } }));
  await waitFor(() => statesOf(messages).length === 2);
  input.end(line({ command: "stop" }));
  assert.equal(await run, 0);

  assert.deepEqual(h.played, ["good morning"]);
  const signals = messages.flatMap((m) => (m.type === "signal" ? [m] : []));
  assert.deepEqual(signals.map((s) => [s.sense, s.content, s.priority]), [
    ["voice", "audio state SPEAKING", 10],
    ["voice", "audio state LISTENING", 10],
  ]);
  assert.deepEqual(signals.map((s) => s.metadata), [
    { audio_state: "SPEAKING", mic_active: false },
    { audio_state: "LISTENING", mic_active: true },
  ]);
  assert.equal(h.engine.destroyed, true);
});

test("back-to-back utterances stay in SPEAKING between them", async () => {
  const h = createHarness(true);
  const input = new PassThrough();
  const output = new PassThrough();
  const messages = collectMessages(output);

  const run = runSense(h.voice, { input, output });
  input.write(line({ command: "speak", options: { text: "one" } }));
  input.write(line({ command: "speak", options: { text: "two" } }));
  await waitFor(() => h.played.length === 2 && statesOf(messages).length === 2);
  input.end(line({ command: "stop" }));
  await run;

  assert.deepEqual(h.played, ["one", "two"]);
  assert.deepEqual(statesOf(messages), ["SPEAKING", "LISTENING"]);
});

test("interrupt stops playback while the speak command is still running", async () => {
  const h = createHarness(false);
  const input = new PassThrough();
  const output = new PassThrough();
  const messages = collectMessages(output);

  const run = runSense(h.voice, { input, output });
  input.write(line({ command: "speak", options: { text: "a very long story" } }));
  input.write(line({ command: "speak", options: { text: "and its sequel" } }));
  await waitFor(() => h.played.length === 1);

  input.write(line({ command: "interrupt" }));
  await waitFor(() => statesOf(messages).length === 2);
  input.end(line({ command: "stop" }));
  await run;

  assert.deepEqual(h.played, ["a very long story"]);
  assert.deepEqual(h.terminated, ["a very long story"]);
  assert.deepEqual(statesOf(messages), ["SPEAKING", "LISTENING"]);
});

test("configured check timings open interrupt-check windows while speaking", async () => {
  const h = createHarness(false);
  const input = new PassThrough();
  const output = new PassThrough();
  const messages = collectMessages(output);

  const run = runSense(h.voice, { input, output });
  input.write(line({ command: "configure", options: { interrupt_check_interval_ms: 20, interrupt_check_duration_ms: 20 } }));
  input.write(line({ command: "speak", options: { text: "listen for me" } }));
  await waitFor(() => statesOf(messages).includes("INTERRUPT_CHECK"));

  input.write(line({ command: "interrupt" }));
  input.end(line({ command: "stop" }));
  await run;

  const states = statesOf(messages);
  assert.deepEqual(states.slice(0, 2), ["SPEAKING", "INTERRUPT_CHECK"]);
  assert.equal(states[states.length - 1], "LISTENING");
  const check = messages.find((m) => m.type === "signal" && m.metadata.audio_state === "INTERRUPT_CHECK");
  assert.ok(check && check.type === "signal");
  assert.equal(check.metadata.mic_active, true);
});

test("a local TTS without a server command is not ready", async () => {
  const voice = createVoiceOutput(parseSettings({ TTS_PROVIDER: "local" }));
  const output = new PassThrough();

  const code = await runSense(voice, { input: new PassThrough(), output });

  assert.equal(code, 1);
  const first = parseSenseMessage(output.read()?.toString("utf-8").split("\n")[0] ?? "");
  assert.ok(first && first.type === "status");
  assert.equal(first.status, "error");
  assert.equal(first.message, 'TTS provider "local" is not ready: TTS_SERVER_COMMAND is not set');
});
