/**
 * Length-prefixed binary framing for the perception sideband.
 *
 * Each frame is a 4-byte big-endian length followed by exactly that many
 * payload bytes. The same framing carries PCM from the local TTS server
 * (a zero-length frame marks the end of one utterance) and JSON perception
 * results from the frame publisher to a local consumer.
 *
 * Responsibilities:
 * - Encode payloads into frames
 * - Incrementally decode frames from arbitrary chunk boundaries
 * - Expose a stream of frames as an async iterator
 * - Publish JSON results over a unix socket to one consumer, with a bounded wait for it to connect
 */

import { createServer, type Server, type Socket } from "net";
import { existsSync, unlinkSync } from "fs";

import type { Readable } from "stream";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Size of the length prefix */
export const FRAME_HEADER_BYTES = 4;

/** Upper bound on a single payload; anything larger means the stream is out of sync */
export const MAX_FRAME_BYTES = 64 * 1024 * 1024;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Incremental decoder. Feed it chunks in arrival order.
 */
export interface FrameDecoder {
  /**
   * Append bytes and return every frame they complete.
   * @throws Error if a length prefix exceeds MAX_FRAME_BYTES
   */
  push(chunk: Buffer): Buffer[];
  /** Bytes held that do not yet form a whole frame */
  pendingBytes(): number;
}

/** Counters kept by a publisher */
export interface PublisherStats {
  framesSent: number;
  bytesSent: number;
  lastSendTime: number;
  connectionErrors: number;
}

/**
 * Publishes JSON documents as frames to a single local consumer.
 */
export interface FramePublisher {
  /** Start listening on the socket path */
  start(): Promise<void>;
  /**
   * Wait for the consumer to connect.
   * @returns false if nobody connected within timeoutMs
   */
  waitForConnection(timeoutMs: number): Promise<boolean>;
  /**
   * Send one document.
   * @returns false if there is no connected consumer or the write failed
   */
  publish(payload: unknown): boolean;
  isConnected(): boolean;
  stats(): PublisherStats;
  close(): Promise<void>;
}

// ============================================================================
// ENCODING
// ============================================================================

/**
 * Prefix a payload with its 4-byte big-endian length.
 */
export function encodeFrame(payload: Buffer): Buffer {
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Encode a JSON document as a frame.
 */
export function encodeJsonFrame(payload: unknown): Buffer {
  return encodeFrame(Buffer.from(JSON.stringify(payload), "utf-8"));
}

/**
 * Decode a frame payload produced by encodeJsonFrame.
 */
export function decodeJsonFrame(payload: Buffer): unknown {
  return JSON.parse(payload.toString("utf-8"));
}

// ============================================================================
// DECODING
// ============================================================================

/**
 * Create a decoder that reassembles frames across chunk boundaries.
 */
export function createFrameDecoder(): FrameDecoder {
  let buffered: Buffer = Buffer.alloc(0);

  return {
    push(chunk: Buffer): Buffer[] {
      buffered = buffered.length === 0 ? chunk : Buffer.concat([buffered, chunk]);
      const frames: Buffer[] = [];

      while (buffered.length >= FRAME_HEADER_BYTES) {
        const length = buffered.readUInt32BE(0);
        if (length > MAX_FRAME_BYTES) {
          throw new Error(`Frame length ${length} exceeds limit of ${MAX_FRAME_BYTES} bytes`);
        }

        const end = FRAME_HEADER_BYTES + length;
        if (buffered.length < end) break;

        frames.push(Buffer.from(buffered.subarray(FRAME_HEADER_BYTES, end)));
        buffered = buffered.subarray(end);
      }

      return frames;
    },

    pendingBytes(): number {
      return buffered.length;
    },
  };
}

/**
 * Async generator over the frames of a readable byte stream.
 * Ends when the stream ends; a trailing partial frame is an error.
 *
 * @param stream - Readable emitting Buffer chunks
 * @yields Frame payloads (zero-length payloads included)
 */
export async function* readFrames(stream: Readable): AsyncGenerator<Buffer> {
  const decoder = createFrameDecoder();

  for await (const chunk of stream) {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    for (const frame of decoder.push(bytes)) {
      yield frame;
    }
  }

  if (decoder.pendingBytes() > 0) {
    throw new Error(`Stream ended mid-frame (${decoder.pendingBytes()} bytes pending)`);
  }
}

// ============================================================================
// PUBLISHER
// ============================================================================

/**
 * Create a publisher listening on a unix socket path.
 * A stale socket file at the path is removed on start and on close.
 *
 * @param socketPath - Filesystem path of the unix socket
 * @returns A FramePublisher
 */
export function createFramePublisher(socketPath: string): FramePublisher {
  let server: Server | null = null;
  let conn: Socket | null = null;
  let connectionWaiters: Array<(connected: boolean) => void> = [];
  const counters: PublisherStats = { framesSent: 0, bytesSent: 0, lastSendTime: 0, connectionErrors: 0 };

  function handleConnection(socket: Socket): void {
    if (conn) {
      // One consumer at a time
      socket.destroy();
      return;
    }

    conn = socket;
    console.error(`[publisher] consumer connected on ${socketPath}`);

    socket.on("error", (err) => {
      counters.connectionErrors++;
      console.error(`[publisher] connection error: ${err.message}`);
    });
    socket.on("close", () => {
      if (conn === socket) conn = null;
    });

    const waiters = connectionWaiters;
    connectionWaiters = [];
    for (const resolve of waiters) resolve(true);
  }

  async function start(): Promise<void> {
    if (server) return;
    removeStaleSocket(socketPath);

    const srv = createServer(handleConnection);
    server = srv;
    await new Promise<void>((resolve, reject) => {
      srv.once("error", reject);
      srv.listen(socketPath, () => {
        srv.off("error", reject);
        resolve();
      });
    });
    console.error(`[publisher] listening on ${socketPath}`);
  }

  function waitForConnection(timeoutMs: number): Promise<boolean> {
    if (conn) return Promise.resolve(true);
    if (!server) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const waiter = (connected: boolean) => {
        clearTimeout(timer);
        resolve(connected);
      };
      const timer = setTimeout(() => {
        connectionWaiters = connectionWaiters.filter((w) => w !== waiter);
        console.error(`[publisher] no consumer connected within ${timeoutMs}ms`);
        resolve(false);
      }, timeoutMs);
      connectionWaiters.push(waiter);
    });
  }

  function publish(payload: unknown): boolean {
    const socket = conn;
    if (!socket || socket.destroyed) return false;

    const frame = encodeJsonFrame(payload);
    try {
      socket.write(frame);
    } catch (err) {
      counters.connectionErrors++;
      console.error(`[publisher] publish failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }

    counters.framesSent++;
    counters.bytesSent += frame.length;
    counters.lastSendTime = Date.now();
    return true;
  }

  async function close(): Promise<void> {
    const waiters = connectionWaiters;
    connectionWaiters = [];
    for (const resolve of waiters) resolve(false);

    conn?.destroy();
    conn = null;

    const srv = server;
    server = null;
    if (srv) {
      await new Promise<void>((resolve) => srv.close(() => resolve()));
    }
    removeStaleSocket(socketPath);
  }

  return {
    start,
    waitForConnection,
    publish,
    isConnected: () => conn !== null && !conn.destroyed,
    stats: () => ({ ...counters }),
    close,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Remove a leftover socket file from a previous run.
 */
function removeStaleSocket(socketPath: string): void {
  if (!existsSync(socketPath)) return;
  try {
    unlinkSync(socketPath);
  } catch (err) {
    console.error(`[publisher] could not remove stale socket ${socketPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
}
