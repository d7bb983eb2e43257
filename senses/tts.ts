/**
 * Local text-to-speech via a persistent TTS server subprocess.
 *
 * The server loads its voice once, prints READY on stderr, then accepts one
 * JSON command per line on stdin. For each `generate` it writes the audio as
 * length-prefixed raw PCM frames on stdout, ending with a zero-length frame.
 *
 * Responsibilities:
 * - Spawn and manage the TTS server lifecycle
 * - Serialise generate requests so each reads only its own frames
 * - Drain unread frames when a caller stops consuming early
 */

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";

import { readFrames } from "./framing.js";
import { relogLines } from "./child-process.js";

import type { PcmChunk, TtsEngine } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default output sample rate of the server */
export const DEFAULT_TTS_SAMPLE_RATE = 22050;

/** Timeout for waiting for the server to be ready (ms) */
const READY_TIMEOUT_MS = 120_000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface LocalTtsConfig {
  /** argv of the server, e.g. ["tts-server", "--model", "voice.onnx"] */
  serverCommand: string[];
  sampleRate: number;
  readyTimeoutMs?: number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Start the TTS server and wrap it as a TtsEngine.
 *
 * @throws Error if the server fails to start or does not become ready in time
 */
export async function createLocalTts(config: LocalTtsConfig): Promise<TtsEngine> {
  const [bin, ...args] = config.serverCommand;
  if (!bin) throw new Error("TTS server command is empty");

  const proc = spawn(bin, args);

  proc.stdin.on("error", (err) => {
    console.error(`[tts-server] stdin error: ${err.message}`);
  });

  try {
    await waitForReady(proc, config.readyTimeoutMs ?? READY_TIMEOUT_MS);
  } catch (err) {
    proc.kill();
    throw err;
  }

  const frames = readFrames(proc.stdout);
  let destroyed = false;

  // Requests hold this in turn; the next one waits for the previous end marker
  let tail: Promise<void> = Promise.resolve();

  async function acquire(): Promise<() => void> {
    const previous = tail;
    let release: () => void = () => {};
    tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await previous;
    return release;
  }

  /**
   * Read one frame.
   * @returns The payload, or null on the end marker
   * @throws Error if the server's output has ended
   */
  async function nextFrame(): Promise<Buffer | null> {
    const { value, done } = await frames.next();
    if (done) throw new Error("TTS server output ended");
    return value.length === 0 ? null : value;
  }

  async function* synthesize(text: string): AsyncGenerator<PcmChunk> {
    if (destroyed) throw new Error("TTS engine has been destroyed");

    const release = await acquire();
    let finished = false;
    try {
      sendCommand(proc, { cmd: "generate", text });

      for (let pcm = await nextFrame(); pcm; pcm = await nextFrame()) {
        yield { pcm, sampleRate: config.sampleRate };
      }
      finished = true;
    } finally {
      // Caller stopped early: skip the rest of this utterance so the next request starts clean
      if (!finished && !destroyed) {
        await drain().catch((err) => {
          console.error(`[tts] drain failed: ${err instanceof Error ? err.message : String(err)}`);
        });
      }
      release();
    }
  }

  async function drain(): Promise<void> {
    sendCommand(proc, { cmd: "interrupt" });
    while ((await nextFrame()) !== null) {
      // discard
    }
  }

  function destroy(): void {
    if (destroyed) return;
    destroyed = true;
    sendCommand(proc, { cmd: "quit" });
    proc.kill("SIGTERM");
  }

  return { synthesize, destroy };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Wait for the server to print READY on stderr. Everything else it prints is logged.
 *
 * @throws Error if the server exits or times out before READY
 */
function waitForReady(proc: ChildProcessWithoutNullStreams, timeoutMs: number): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    let stderrBuffer = "";

    const cleanup = () => {
      clearTimeout(timeout);
      proc.stderr.off("data", onData);
      proc.off("error", onError);
      proc.off("exit", onExit);
    };

    const timeout = setTimeout(() => {
      cleanup();
      reject(new Error(`TTS server did not become ready within ${timeoutMs}ms`));
    }, timeoutMs);

    const onData = (data: Buffer) => {
      stderrBuffer += data.toString();
      if (!/^READY$/m.test(stderrBuffer)) return;

      cleanup();
      for (const line of stderrBuffer.split("\n")) {
        const trimmed = line.trim();
        if (trimmed && trimmed !== "READY") console.error(`[tts-server] ${trimmed}`);
      }
      relogLines(proc.stderr, "tts-server");
      resolve();
    };

    const onError = (err: Error) => {
      cleanup();
      reject(new Error(`TTS server failed to start: ${err.message}`));
    };

    const onExit = (code: number | null) => {
      cleanup();
      reject(new Error(`TTS server exited with code ${code} before READY`));
    };

    proc.stderr.on("data", onData);
    proc.on("error", onError);
    proc.on("exit", onExit);
  });
}

/**
 * Send a JSON command to the server's stdin.
 */
function sendCommand(proc: ChildProcessWithoutNullStreams, cmd: Record<string, unknown>): void {
  if (!proc.stdin.writable) return;
  proc.stdin.write(JSON.stringify(cmd) + "\n");
}
