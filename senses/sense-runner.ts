/**
 * Lifecycle runner shared by every sense and output process.
 *
 * Responsibilities:
 * - Initialise the module and emit `ready` exactly once, before any signal
 * - Read commands one at a time, in arrival order, and route them
 * - Toggle `running` synchronously on start/stop
 * - Validate `configure` options against the module's whitelist
 * - Report a failure as `error` then `stopped`; `stopped` is always the last message
 * - Treat end-of-stream on the command input as an implicit stop
 */

import { createProtocolChannel, type ProtocolChannel } from "./protocol.js";
import { formatIssues } from "./config.js";

import type { Readable, Writable } from "stream";
import type { z } from "zod";
import type { Command, Metadata } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * What a module may do towards the core.
 */
export interface SenseContext {
  readonly name: string;
  /** Emit a signal. Dropped (and logged) outside the ready..stopped window. */
  emitSignal(content: string, priority: number, metadata?: Metadata): void;
  isRunning(): boolean;
}

/**
 * A sense or output plugged into the runner.
 *
 * Senses start idle and perceive between `start` and `stop`. Outputs run as
 * soon as they are ready and act on `speak` and `interrupt`.
 */
export interface SenseModule<C> {
  readonly name: string;
  readonly kind: "sense" | "output";
  /** Whitelist for `configure` options */
  readonly configureSchema: z.ZodType<C>;
  /** Load models and check devices. Throwing prevents `ready`. */
  initialize(ctx: SenseContext): Promise<void>;
  /** Begin perceiving (senses). Throwing reports the failure and ends the process. */
  start?(): Promise<void>;
  stop?(): Promise<void>;
  configure(patch: C): void;
  speak?(text: string, options: Metadata): Promise<void>;
  interrupt?(): Promise<void>;
  /** Release everything. Called exactly once, whether or not initialisation succeeded. */
  cleanup(): Promise<void>;
}

export interface RunSenseOptions {
  input: Readable;
  output: Writable;
  /** Aborting ends the command loop as if `stop` had arrived */
  signal?: AbortSignal;
  onTransportLost?: (err: Error) => void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Run a module until `stop`, end of input, abort, or failure.
 *
 * @returns Process exit code: 0 after a clean stop, 1 after a failure
 */
export async function runSense<C>(mod: SenseModule<C>, options: RunSenseOptions): Promise<number> {
  const tag = `[${mod.name}]`;
  const channel = createProtocolChannel({
    sense: mod.name,
    input: options.input,
    output: options.output,
    onTransportLost: options.onTransportLost,
  });

  let running = false;
  let accepting = false;
  let exitCode = 0;
  const pendingOutputs = new Set<Promise<void>>();

  const ctx: SenseContext = {
    name: mod.name,
    emitSignal(content: string, priority: number, metadata?: Metadata): void {
      if (!accepting) {
        console.error(`${tag} dropped signal outside the running window: ${content.slice(0, 60)}`);
        return;
      }
      channel.emitSignal(content, priority, metadata);
    },
    isRunning: () => running,
  };

  async function handleCommand(cmd: Command): Promise<void> {
    console.error(`${tag} Command: ${cmd.command}`);

    switch (cmd.command) {
      case "start":
        if (mod.kind === "sense" && !running && mod.start) {
          running = true;
          try {
            await mod.start();
          } catch (err) {
            running = false;
            throw err;
          }
        }
        return;

      case "stop":
        if (running) {
          running = false;
          await mod.stop?.();
        }
        return;

      case "configure": {
        const parsed = mod.configureSchema.safeParse(cmd.options);
        if (!parsed.success) {
          console.error(`${tag} rejected configure: ${formatIssues(parsed.error)}`);
          return;
        }
        mod.configure(parsed.data);
        return;
      }

      case "speak": {
        const text = typeof cmd.options.text === "string" ? cmd.options.text : "";
        if (!mod.speak) break;
        if (!text.trim()) return;
        // Not awaited, so an interrupt can arrive while this utterance plays
        trackOutput(mod.speak(text, cmd.options));
        return;
      }

      case "interrupt":
        if (!mod.interrupt) break;
        await mod.interrupt();
        return;
    }

    console.error(`${tag} Unknown command for a ${mod.kind}: ${cmd.command}`);
  }

  function trackOutput(task: Promise<void>): void {
    const tracked = task
      .catch((err) => {
        console.error(`${tag} output failed: ${err instanceof Error ? err.message : String(err)}`);
      })
      .finally(() => {
        pendingOutputs.delete(tracked);
      });
    pendingOutputs.add(tracked);
  }

  console.error(`${tag} starting...`);

  try {
    await mod.initialize(ctx);
    channel.emitStatus("ready");
    accepting = true;
    if (mod.kind === "output") running = true;

    await consumeCommands(channel, options.signal, handleCommand);
  } catch (err) {
    exitCode = 1;
    const message = err instanceof Error ? err.message : String(err);
    console.error(`${tag} failed: ${message}`);
    channel.emitStatus("error", message);
  } finally {
    accepting = false;
    await shutdown();
    channel.emitStatus("stopped");
    console.error(`${tag} stopped`);
  }

  async function shutdown(): Promise<void> {
    if (running) {
      running = false;
      await mod.stop?.().catch((err) => {
        console.error(`${tag} stop failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    }
    await mod.cleanup().catch((err) => {
      console.error(`${tag} cleanup failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    await Promise.all(pendingOutputs);
  }

  return exitCode;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Feed commands to the handler one at a time until `stop`, end of input, or abort.
 */
async function consumeCommands(
  channel: ProtocolChannel,
  signal: AbortSignal | undefined,
  handle: (cmd: Command) => Promise<void>,
): Promise<void> {
  const iterator = channel.commands()[Symbol.asyncIterator]();
  const aborted = abortPromise(signal);

  while (true) {
    const next = await Promise.race([iterator.next(), aborted]);
    if (next.done) return;

    await handle(next.value);
    if (next.value.command === "stop") return;
  }
}

/**
 * Resolves as an exhausted iterator result once the signal aborts; never otherwise.
 */
function abortPromise(signal: AbortSignal | undefined): Promise<IteratorReturnResult<undefined>> {
  return new Promise((resolve) => {
    if (!signal) return;
    if (signal.aborted) {
      resolve({ done: true, value: undefined });
      return;
    }
    signal.addEventListener("abort", () => resolve({ done: true, value: undefined }), { once: true });
  });
}
