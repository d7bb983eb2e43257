/**
 * Echo-cancellation coordinator.
 *
 * Gates the microphone around speech output: while the voice output is
 * playing, regular transcription is muted, but short interrupt-check windows
 * open periodically so the user can still barge in. There is no acoustic
 * processing here, only state.
 *
 * Responsibilities:
 * - Track LISTENING / SPEAKING / INTERRUPT_CHECK
 * - Run the periodic interrupt-check cycle while speaking
 * - Notify a single state-change listener on every transition
 * - Always return to LISTENING on stopSpeaking(), even mid-window
 */

import type { AudioState, EchoCancellationConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Both values are tunables; recalibrate for each audio pipeline */
export const DEFAULT_ECHO_CONFIG: EchoCancellationConfig = {
  interruptCheckIntervalMs: 500,
  interruptCheckDurationMs: 100,
};

/** Upper bound on how long stopSpeaking() waits for the check loop to exit */
const STOP_WAIT_MS = 1000;

// ============================================================================
// INTERFACES
// ============================================================================

export type StateChangeCallback = (state: AudioState) => void;

export interface EchoCoordinator {
  /** Enter SPEAKING and start the check cycle. No-op when already speaking. */
  startSpeaking(): void;
  /** Cancel the check cycle and return to LISTENING. */
  stopSpeaking(): Promise<void>;
  getState(): AudioState;
  /** True for LISTENING and INTERRUPT_CHECK */
  isMicActive(): boolean;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create an echo-cancellation coordinator in the LISTENING state.
 *
 * @param config - Interrupt-check timing
 * @param onStateChange - Invoked synchronously on each transition; errors are logged and swallowed
 */
export function createEchoCoordinator(
  config: EchoCancellationConfig = DEFAULT_ECHO_CONFIG,
  onStateChange?: StateChangeCallback,
): EchoCoordinator {
  let state: AudioState = "LISTENING";
  let controller: AbortController | null = null;
  let loop: Promise<void> | null = null;

  function setState(next: AudioState): void {
    state = next;
    if (!onStateChange) return;
    try {
      onStateChange(next);
    } catch (err) {
      console.error(`[echo] state change callback failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  async function runCheckCycle(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(config.interruptCheckIntervalMs, signal);
      if (signal.aborted) return;

      if (state === "SPEAKING") {
        setState("INTERRUPT_CHECK");
      }

      await sleep(config.interruptCheckDurationMs, signal);
      if (signal.aborted) return;

      // A stopSpeaking() that landed mid-window wins
      if (state === "INTERRUPT_CHECK") {
        setState("SPEAKING");
      }
    }
  }

  function startSpeaking(): void {
    if (state === "SPEAKING" || controller) return;

    const ctrl = new AbortController();
    controller = ctrl;
    setState("SPEAKING");
    loop = runCheckCycle(ctrl.signal).catch((err) => {
      console.error(`[echo] interrupt-check loop failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  }

  async function stopSpeaking(): Promise<void> {
    const ctrl = controller;
    const pending = loop;
    controller = null;
    loop = null;

    ctrl?.abort();
    setState("LISTENING");

    if (pending) {
      await Promise.race([pending, sleep(STOP_WAIT_MS)]);
    }
  }

  return {
    startSpeaking,
    stopSpeaking,
    getState: () => state,
    isMicActive: () => isMicActiveIn(state),
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Whether the microphone should feed regular transcription in a given state.
 */
export function isMicActiveIn(state: AudioState): boolean {
  return state !== "SPEAKING";
}

/**
 * Timer-backed sleep that resolves early when the signal aborts and never
 * keeps the process alive.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    timer.unref();

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
