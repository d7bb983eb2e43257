/**
 * Line-delimited JSON protocol between senses/outputs and the core.
 *
 * One JSON object per line on the process's stdin/stdout. Senses write
 * signals and statuses; the core writes commands. JSON encoding escapes any
 * newline inside a text field, so a message never spans lines.
 *
 * Responsibilities:
 * - Build immutable Signal and Status messages with wire timestamps
 * - Encode outbound messages as single lines
 * - Parse and validate inbound command lines (malformed lines are dropped)
 * - Parse sense messages on the core side
 * - Wrap a stdin/stdout pair into a channel with write-failure reporting
 */

import { createInterface } from "readline";
import { z } from "zod";

import type { Readable, Writable } from "stream";
import type { Command, CommandName, Metadata, SenseMessage, SenseStatus, Signal, Status } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Default signal priorities, increasing with urgency */
export const PRIORITY = {
  SYSTEM: 10,
  VISUAL: 30,
  SCREEN: 50,
  INTERRUPT: 90,
  VOICE: 100,
} as const;

const COMMAND_NAMES = ["start", "stop", "configure", "speak", "interrupt"] as const satisfies readonly CommandName[];

const SENSE_STATUSES = ["ready", "error", "stopped", "busy"] as const satisfies readonly SenseStatus[];

// ============================================================================
// SCHEMAS
// ============================================================================

const CommandSchema = z.object({
  type: z.literal("command").optional(),
  command: z.enum(COMMAND_NAMES),
  options: z.record(z.unknown()).default({}),
});

const SignalSchema = z.object({
  type: z.literal("signal"),
  sense: z.string(),
  content: z.string(),
  priority: z.number().int(),
  metadata: z.record(z.unknown()).default({}),
  timestamp: z.number(),
});

const StatusSchema = z.object({
  type: z.literal("status"),
  sense: z.string(),
  status: z.enum(SENSE_STATUSES),
  message: z.string().default(""),
  timestamp: z.number(),
});

const SenseMessageSchema = z.discriminatedUnion("type", [SignalSchema, StatusSchema]);

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Options for wrapping a pair of streams into a protocol channel.
 */
export interface ProtocolChannelOptions {
  /** Name stamped on every signal and status */
  sense: string;
  /** Stream commands are read from (process.stdin) */
  input: Readable;
  /** Stream messages are written to (process.stdout) */
  output: Writable;
  /** Called once the transport can no longer carry messages. Defaults to exiting the process. */
  onTransportLost?: (err: Error) => void;
}

/**
 * Sense-side end of the protocol.
 */
export interface ProtocolChannel {
  /** Write one message line */
  emit(message: SenseMessage): void;
  /** Build, write and return a signal */
  emitSignal(content: string, priority: number, metadata?: Metadata): Signal;
  /** Build and write a status */
  emitStatus(status: SenseStatus, message?: string): void;
  /** Commands in arrival order; ends when the input reaches end-of-stream */
  commands(): AsyncIterable<Command>;
}

// ============================================================================
// MESSAGE CONSTRUCTION
// ============================================================================

/**
 * Current time as a wire timestamp (seconds since the epoch).
 */
export function wireTimestamp(ms: number = Date.now()): number {
  return ms / 1000;
}

/**
 * Build an immutable signal.
 *
 * @param sense - Producing sense name
 * @param content - Human-readable observation
 * @param priority - Priority, usually one of PRIORITY
 * @param metadata - Sense-specific data
 */
export function createSignal(sense: string, content: string, priority: number, metadata: Metadata = {}): Signal {
  return Object.freeze({
    sense,
    content,
    priority,
    metadata: Object.freeze({ ...metadata }),
    timestamp: wireTimestamp(),
  });
}

/**
 * Build an immutable status update.
 */
export function createStatus(sense: string, status: SenseStatus, message = ""): Status {
  return Object.freeze({ sense, status, message, timestamp: wireTimestamp() });
}

// ============================================================================
// ENCODING / DECODING
// ============================================================================

/**
 * Encode a message as one newline-terminated JSON line.
 *
 * @param message - Sense message or command
 * @returns The line, including the trailing newline
 */
export function encodeMessage(message: SenseMessage | Command): string {
  return JSON.stringify(message) + "\n";
}

/**
 * Encode a signal with its type discriminator.
 */
export function encodeSignal(signal: Signal): string {
  return encodeMessage({ type: "signal", ...signal });
}

/**
 * Encode a status with its type discriminator.
 */
export function encodeStatus(status: Status): string {
  return encodeMessage({ type: "status", ...status });
}

/**
 * Parse a command line. The `type` field is optional; a `command` key suffices.
 *
 * @param line - One line read from the core
 * @returns The command, or null if the line is empty, not JSON, or not a known command
 */
export function parseCommand(line: string): Command | null {
  const data = parseJsonLine(line);
  if (data === undefined) return null;

  const parsed = CommandSchema.safeParse(data);
  if (!parsed.success) return null;

  return { command: parsed.data.command, options: parsed.data.options };
}

/**
 * Parse a sense message line on the core side.
 *
 * @param line - One line read from a sense's stdout
 * @returns The signal or status, or null if the line is not a valid message
 */
export function parseSenseMessage(line: string): SenseMessage | null {
  const data = parseJsonLine(line);
  if (data === undefined) return null;

  const parsed = SenseMessageSchema.safeParse(data);
  if (!parsed.success) return null;

  return parsed.data;
}

// ============================================================================
// CHANNEL
// ============================================================================

/**
 * Wrap an input/output stream pair into a protocol channel.
 *
 * A write failure is reported once as an error status while the output is
 * still writable; after that, or if the output is already gone, the
 * transport is considered lost.
 *
 * @param options - Streams, sense name and transport-loss handler
 * @returns A ProtocolChannel
 */
export function createProtocolChannel(options: ProtocolChannelOptions): ProtocolChannel {
  const { sense, input, output } = options;
  const onTransportLost = options.onTransportLost ?? defaultTransportLost;

  let errorReported = false;
  let lost = false;

  function handleWriteError(err: Error): void {
    if (lost) return;

    if (!errorReported && output.writable && !output.destroyed) {
      errorReported = true;
      console.error(`[${sense}] write failed: ${err.message}`);
      output.write(encodeStatus(createStatus(sense, "error", `write failed: ${err.message}`)));
      return;
    }

    lost = true;
    onTransportLost(err);
  }

  output.on("error", handleWriteError);

  function writeLine(line: string): void {
    if (lost) return;
    if (output.destroyed || !output.writable) {
      handleWriteError(new Error("output stream is closed"));
      return;
    }
    output.write(line);
  }

  function emit(message: SenseMessage): void {
    writeLine(encodeMessage(message));
  }

  function emitSignal(content: string, priority: number, metadata: Metadata = {}): Signal {
    const signal = createSignal(sense, content, priority, metadata);
    writeLine(encodeSignal(signal));
    return signal;
  }

  function emitStatus(status: SenseStatus, message = ""): void {
    writeLine(encodeStatus(createStatus(sense, status, message)));
  }

  async function* commands(): AsyncGenerator<Command> {
    const rl = createInterface({ input, crlfDelay: Infinity });

    for await (const line of rl) {
      if (!line.trim()) continue;

      const command = parseCommand(line);
      if (!command) {
        console.error(`[${sense}] dropped malformed command line: ${line.slice(0, 80)}`);
        continue;
      }

      yield command;
    }
  }

  return { emit, emitSignal, emitStatus, commands };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse one line as JSON.
 *
 * @returns The parsed value, or undefined for blank or invalid lines
 */
function parseJsonLine(line: string): unknown {
  const trimmed = line.trim();
  if (!trimmed) return undefined;

  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

/**
 * Default transport-loss policy: the process cannot report anything any more, so exit.
 */
function defaultTransportLost(err: Error): void {
  console.error(`Protocol transport lost: ${err.message}`);
  process.exit(1);
}
