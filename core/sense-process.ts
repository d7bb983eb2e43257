/**
 * Core-side handle on one sense or output process.
 *
 * Responsibilities:
 * - Spawn the process with piped stdio
 * - Parse its stdout as protocol messages; malformed lines are logged and dropped
 * - Re-log its stderr with the sense name as tag
 * - Track readiness and wait for it with a timeout
 * - Send commands as JSON lines
 * - Stop gracefully: stop command, bounded wait, then SIGTERM and SIGKILL
 */

import { spawn, type ChildProcessWithoutNullStreams } from "child_process";
import { dirname, extname, join } from "path";
import { createInterface } from "readline";
import { fileURLToPath } from "url";

import { encodeMessage, parseSenseMessage } from "../senses/protocol.js";

import type { CommandName, Metadata, Signal, Status } from "../senses/types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Time a process gets to exit after the stop command */
const DEFAULT_STOP_TIMEOUT_MS = 3_000;

/** Time a process gets to exit after SIGTERM before SIGKILL */
const TERM_TIMEOUT_MS = 1_000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface SenseProcessOptions {
  name: string;
  kind: "sense" | "output";
  /** argv to launch; defaults to this build's senses/main entry point with the name appended */
  command?: string[];
  env?: NodeJS.ProcessEnv;
  onSignal: (signal: Signal) => void;
  onStatus?: (status: Status) => void;
}

export interface SenseProcess {
  readonly name: string;
  readonly kind: "sense" | "output";
  /** Spawn the process. Calling it twice is an error. */
  start(): void;
  /**
   * Resolves once the process reports ready.
   * @throws Error on timeout, an error status before ready, or exit before ready
   */
  waitForReady(timeoutMs: number): Promise<void>;
  isReady(): boolean;
  /** True between start() and exit */
  isRunning(): boolean;
  /**
   * Write one command line.
   * @returns false if the process is not running or its stdin is closed
   */
  send(command: CommandName, options?: Metadata): boolean;
  /** Stop the process and wait for it to exit */
  stop(timeoutMs?: number): Promise<void>;
  /** Resolves with the exit code once the process has exited (null if killed by a signal) */
  exited(): Promise<number | null>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a handle for one sense or output process. Nothing is spawned until start().
 */
export function createSenseProcess(options: SenseProcessOptions): SenseProcess {
  const { name, kind } = options;
  const tag = `[${name}]`;

  let proc: ChildProcessWithoutNullStreams | null = null;
  let running = false;
  let ready = false;
  let lastError: string | null = null;

  // Settled once by whichever comes first: ready, error status, exit
  let resolveReady: () => void = () => {};
  let rejectReady: (err: Error) => void = () => {};
  const readyPromise = new Promise<void>((resolve, reject) => {
    resolveReady = resolve;
    rejectReady = reject;
  });
  // waitForReady() may never be called
  readyPromise.catch(() => undefined);

  let resolveExit: (code: number | null) => void = () => {};
  const exitPromise = new Promise<number | null>((resolve) => {
    resolveExit = resolve;
  });

  function handleLine(line: string): void {
    if (!line.trim()) return;

    const message = parseSenseMessage(line);
    if (!message) {
      console.error(`${tag} unparseable output: ${line.slice(0, 100)}`);
      return;
    }

    if (message.type === "signal") {
      const signal: Signal = {
        sense: message.sense,
        content: message.content,
        priority: message.priority,
        metadata: message.metadata,
        timestamp: message.timestamp,
      };
      options.onSignal(signal);
      return;
    }

    const status: Status = {
      sense: message.sense,
      status: message.status,
      message: message.message,
      timestamp: message.timestamp,
    };
    handleStatus(status);
    options.onStatus?.(status);
  }

  function handleStatus(status: Status): void {
    switch (status.status) {
      case "ready":
        if (!ready) {
          ready = true;
          console.log(`${tag} ready`);
          resolveReady();
        }
        break;
      case "error":
        lastError = status.message;
        console.error(`${tag} error: ${status.message}`);
        if (!ready) rejectReady(new Error(`${name} failed to initialise: ${status.message}`));
        break;
      case "stopped":
        console.log(`${tag} stopped`);
        break;
      case "busy":
        break;
    }
  }

  function start(): void {
    if (proc) throw new Error(`${name} already started`);

    const [bin, ...args] = options.command ?? defaultSenseCommand(name);
    const child = spawn(bin, args, { env: options.env ?? process.env });
    proc = child;
    running = true;

    createInterface({ input: child.stdout, crlfDelay: Infinity }).on("line", handleLine);
    createInterface({ input: child.stderr, crlfDelay: Infinity }).on("line", (line) => {
      if (line.trim()) process.stderr.write(`${line}\n`);
    });

    child.stdin.on("error", (err) => {
      console.error(`${tag} stdin error: ${err.message}`);
    });

    child.on("error", (err) => {
      console.error(`${tag} process error: ${err.message}`);
      rejectReady(new Error(`${name} could not be started: ${err.message}`));
      if (running) {
        running = false;
        resolveExit(null);
      }
    });

    // By "close" every stdout line has been handled
    child.on("close", (code, signal) => {
      running = false;
      if (code !== 0) {
        console.error(`${tag} exited with ${code !== null ? `code ${code}` : signal}`);
      }
      rejectReady(new Error(`${name} exited before ready${lastError ? `: ${lastError}` : ""}`));
      resolveExit(code);
    });
  }

  async function waitForReady(timeoutMs: number): Promise<void> {
    if (!proc) throw new Error(`${name} has not been started`);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`${name} not ready after ${timeoutMs}ms`)), timeoutMs);
    });

    try {
      await Promise.race([readyPromise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  function send(command: CommandName, commandOptions: Metadata = {}): boolean {
    const child = proc;
    if (!child || !running || child.stdin.destroyed || !child.stdin.writable) return false;

    child.stdin.write(encodeMessage({ command, options: commandOptions }));
    return true;
  }

  async function stop(timeoutMs: number = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    const child = proc;
    if (!child || !running) return;

    send("stop");
    child.stdin.end();

    if (await exitsWithin(timeoutMs)) return;

    console.error(`${tag} did not stop within ${timeoutMs}ms, terminating`);
    child.kill("SIGTERM");
    if (await exitsWithin(TERM_TIMEOUT_MS)) return;

    child.kill("SIGKILL");
    await exitPromise;
  }

  async function exitsWithin(ms: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), ms);
    });
    const result = await Promise.race([exitPromise.then(() => true), timedOut]);
    clearTimeout(timer);
    return result;
  }

  return {
    name,
    kind,
    start,
    waitForReady,
    isReady: () => ready,
    isRunning: () => running,
    send,
    stop,
    exited: () => exitPromise,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * argv that runs the sense entry point beside this module: through tsx when
 * running from sources, plain node from the build output.
 */
export function defaultSenseCommand(name: string): string[] {
  const ext = extname(__filename);
  const entry = join(__dirname, "..", "senses", `main${ext}`);
  return ext === ".ts"
    ? [process.execPath, "--import", "tsx", entry, name]
    : [process.execPath, entry, name];
}
