/**
 * Core-side orchestration of sense and output processes.
 *
 * Responsibilities:
 * - Spawn every configured sense and output, wait for ready, then start the senses
 * - Keep hearing in interrupt-only mode while the voice speaks, and open it again on listening
 * - Turn hearing interrupt signals into an interrupt for the voice
 * - Queue every other signal by priority for the decision loop
 * - Forward speak and configure requests; stop everything on shutdown
 */

import { createSenseProcess, type SenseProcess, type SenseProcessOptions } from "./sense-process.js";
import { createSignalQueue, type SignalQueue } from "./signal-queue.js";

import type { ListenMode, Metadata, Signal } from "../senses/types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface OrchestratorOptions {
  /** Senses to run, e.g. ["hearing", "vision"] */
  senses: string[];
  /** Outputs to run, e.g. ["voice"] */
  outputs: string[];
  readyTimeoutMs: number;
  /** Process factory; swapped out in tests */
  createProcess?: (options: SenseProcessOptions) => SenseProcess;
  queue?: SignalQueue;
}

export interface Orchestrator {
  /**
   * Spawn everything and start the senses that became ready.
   * @returns Names of processes that did not become ready (they are stopped)
   */
  start(): Promise<string[]>;
  stop(): Promise<void>;
  /** Route one signal as if it came from a process */
  handleSignal(signal: Signal): void;
  /** @returns false if the voice output is not running */
  speak(text: string, options?: Metadata): boolean;
  interrupt(): boolean;
  configure(name: string, options: Metadata): boolean;
  /** Listen mode hearing last accepted */
  hearingMode(): ListenMode;
  readonly signals: SignalQueue;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

export function createOrchestrator(options: OrchestratorOptions): Orchestrator {
  const createProcess = options.createProcess ?? createSenseProcess;
  const signals = options.queue ?? createSignalQueue();
  const processes = new Map<string, SenseProcess>();
  let hearingMode: ListenMode = "open";

  function send(name: string, command: "configure" | "speak" | "interrupt", commandOptions: Metadata = {}): boolean {
    const proc = processes.get(name);
    if (!proc || !proc.isReady() || !proc.isRunning()) return false;
    return proc.send(command, commandOptions);
  }

  function setHearingMode(mode: ListenMode): void {
    if (mode === hearingMode) return;
    if (send("hearing", "configure", { listen: mode })) {
      hearingMode = mode;
    }
  }

  function handleSignal(signal: Signal): void {
    const audioState = signal.metadata.audio_state;
    if (signal.sense === "voice" && typeof audioState === "string") {
      // Check windows come and go within one utterance; hearing keeps its
      // segment buffer across them
      if (audioState === "SPEAKING" || audioState === "INTERRUPT_CHECK") setHearingMode("interrupts");
      else if (audioState === "LISTENING") setHearingMode("open");
      return;
    }

    if (signal.metadata.is_interrupt === true) {
      console.log(`[orchestrator] interrupt from ${signal.sense}: "${signal.content}"`);
      send("voice", "interrupt");
      return;
    }

    signals.push(signal);
  }

  async function start(): Promise<string[]> {
    const all = [
      ...options.senses.map((name) => ({ name, kind: "sense" as const })),
      ...options.outputs.map((name) => ({ name, kind: "output" as const })),
    ];

    for (const { name, kind } of all) {
      console.log(`[orchestrator] Starting ${kind}: ${name}`);
      const proc = createProcess({ name, kind, onSignal: handleSignal });
      processes.set(name, proc);
      proc.start();
    }

    const results = await Promise.allSettled(
      [...processes.values()].map((proc) => proc.waitForReady(options.readyTimeoutMs)),
    );

    const notReady: string[] = [];
    const procs = [...processes.values()];
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        const proc = procs[i];
        if (!proc) return;
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.error(`[orchestrator] ${proc.name} not ready: ${reason}`);
        notReady.push(proc.name);
      }
    });

    await Promise.all(
      notReady.map(async (name) => {
        const proc = processes.get(name);
        processes.delete(name);
        if (proc) await proc.stop();
      }),
    );

    for (const proc of processes.values()) {
      if (proc.kind === "sense") proc.send("start");
    }

    console.log(`[orchestrator] Running: ${[...processes.keys()].join(", ") || "nothing"}`);
    return notReady;
  }

  async function stop(): Promise<void> {
    console.log("[orchestrator] Stopping");
    const procs = [...processes.values()];
    processes.clear();
    await Promise.all(procs.map((proc) => proc.stop()));
    signals.close();
  }

  return {
    start,
    stop,
    handleSignal,
    speak: (text: string, speakOptions: Metadata = {}) => send("voice", "speak", { ...speakOptions, text }),
    interrupt: () => send("voice", "interrupt"),
    configure: (name: string, configureOptions: Metadata) => send(name, "configure", configureOptions),
    hearingMode: () => hearingMode,
    signals,
  };
}
