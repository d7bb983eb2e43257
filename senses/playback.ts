/**
 * Interruptible playback controller.
 *
 * Turns text into audio through the TTS engine and plays it in order through
 * the audio player, while keeping the echo coordinator in step: SPEAKING
 * while anything plays, LISTENING once the queue runs dry or playback is
 * interrupted.
 *
 * Responsibilities:
 * - Synthesize utterances in call order and queue them
 * - Play queued utterances one at a time
 * - interrupt(): drop the queue, stop the player (terminate, then kill), restore listening
 * - Never start playback of audio requested before the latest interrupt
 */

import type { AudioPlayer, PlaybackProcess } from "./audio-player.js";
import type { EchoCoordinator } from "./echo-cancellation.js";
import type { TtsEngine } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Time a player gets to exit after SIGTERM before it is killed */
export const DEFAULT_KILL_TIMEOUT_MS = 500;

// ============================================================================
// INTERFACES
// ============================================================================

export interface PlaybackControllerOptions {
  tts: TtsEngine;
  player: AudioPlayer;
  echo: EchoCoordinator;
  killTimeoutMs?: number;
}

export interface SpeakOptions {
  /** Wait for playback to finish (default true) */
  blocking?: boolean;
}

/**
 * Returned by speak(). `finished` resolves true if the utterance played to
 * completion, false if it was empty, failed, or was interrupted.
 */
export interface SpeakHandle {
  id: number;
  finished: Promise<boolean>;
}

export interface PlaybackController {
  /**
   * Synthesize and play text.
   * Non-blocking calls resolve once the audio is queued; blocking calls once it has played.
   */
  speak(text: string, options?: SpeakOptions): Promise<SpeakHandle>;
  /** Stop the current utterance and discard everything queued. */
  interrupt(): Promise<void>;
  /** True while a player process runs or utterances are queued */
  isSpeaking(): boolean;
  destroy(): Promise<void>;
}

interface QueuedUtterance {
  id: number;
  pcm: Buffer;
  sampleRate: number;
  epoch: number;
  resolve: (played: boolean) => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a playback controller.
 *
 * @param options - TTS engine, player, echo coordinator and kill timeout
 */
export function createPlaybackController(options: PlaybackControllerOptions): PlaybackController {
  const { tts, player, echo } = options;
  const killTimeoutMs = options.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;

  let nextId = 0;
  // Bumped by interrupt(); audio from an older epoch never starts playing
  let epoch = 0;
  const queue: QueuedUtterance[] = [];
  let current: PlaybackProcess | null = null;
  let starting: Promise<PlaybackProcess | null> | null = null;
  let draining = false;

  // Synthesis runs one request at a time so the queue keeps call order
  let synthesisChain: Promise<void> = Promise.resolve();

  async function synthesize(text: string): Promise<{ pcm: Buffer; sampleRate: number } | null> {
    const chunks: Buffer[] = [];
    let sampleRate = 0;
    try {
      for await (const chunk of tts.synthesize(text)) {
        chunks.push(chunk.pcm);
        sampleRate = chunk.sampleRate;
      }
    } catch (err) {
      console.error(`[playback] synthesis failed: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }

    const pcm = Buffer.concat(chunks);
    if (pcm.length === 0 || sampleRate <= 0) return null;
    return { pcm, sampleRate };
  }

  async function playUtterance(item: QueuedUtterance): Promise<boolean> {
    // Checked immediately before the player starts
    if (item.epoch !== epoch) return false;

    echo.startSpeaking();

    const launch = player.play(item.pcm, item.sampleRate).catch((err) => {
      console.error(`[playback] player failed: ${err instanceof Error ? err.message : String(err)}`);
      return null;
    });
    starting = launch;
    const proc = await launch;
    if (starting === launch) starting = null;
    if (!proc) return false;

    if (item.epoch !== epoch) {
      // interrupt() landed while the player was launching and has already stopped it
      return false;
    }

    current = proc;
    const code = await proc.exited;
    if (current === proc) current = null;

    return item.epoch === epoch && code === 0;
  }

  async function drainQueue(): Promise<void> {
    if (draining) return;
    draining = true;
    try {
      for (let item = queue.shift(); item; item = queue.shift()) {
        const played = await playUtterance(item);
        item.resolve(played);
      }
    } finally {
      draining = false;
    }

    if (!current && queue.length === 0 && echo.getState() !== "LISTENING") {
      await echo.stopSpeaking();
    }
  }

  async function speak(text: string, speakOptions: SpeakOptions = {}): Promise<SpeakHandle> {
    const blocking = speakOptions.blocking ?? true;
    const id = ++nextId;
    const requestEpoch = epoch;

    if (!text.trim()) {
      return { id, finished: Promise.resolve(false) };
    }

    let resolveFinished: (played: boolean) => void = () => {};
    const finished = new Promise<boolean>((resolve) => {
      resolveFinished = resolve;
    });

    const queued = synthesisChain.then(async () => {
      if (requestEpoch !== epoch) {
        resolveFinished(false);
        return;
      }

      const audio = await synthesize(text);
      if (!audio || requestEpoch !== epoch) {
        resolveFinished(false);
        return;
      }

      queue.push({ id, pcm: audio.pcm, sampleRate: audio.sampleRate, epoch: requestEpoch, resolve: resolveFinished });
      drainQueue().catch((err) => {
        console.error(`[playback] playback loop failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    });
    synthesisChain = queued;
    await queued;

    if (blocking) {
      await finished;
    }
    return { id, finished };
  }

  async function interrupt(): Promise<void> {
    epoch++;

    for (const item of queue.splice(0)) {
      item.resolve(false);
    }

    const active = current;
    const launching = starting;
    current = null;
    starting = null;

    const procs: PlaybackProcess[] = [];
    if (active) procs.push(active);
    if (launching) {
      const launched = await launching;
      if (launched) procs.push(launched);
    }

    await Promise.all(procs.map((proc) => stopProcess(proc, killTimeoutMs)));
    if (echo.getState() !== "LISTENING") {
      await echo.stopSpeaking();
    }

    console.error("[playback] interrupted");
  }

  return {
    speak,
    interrupt,
    isSpeaking: () => current !== null || starting !== null || queue.length > 0,
    destroy: interrupt,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Terminate a player, escalating to kill if it has not exited in time.
 */
async function stopProcess(proc: PlaybackProcess, killTimeoutMs: number): Promise<void> {
  proc.terminate();
  const exited = await settlesWithin(proc.exited, killTimeoutMs);
  if (!exited) {
    proc.kill();
    await settlesWithin(proc.exited, killTimeoutMs);
  }
}

/**
 * Whether a promise settles within the given time. The timer is cleared either way.
 */
function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    promise.then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      () => {
        clearTimeout(timer);
        resolve(true);
      },
    );
  });
}
