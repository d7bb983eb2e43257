/**
 * Camera and screen frames via ffmpeg.
 *
 * ffmpeg decodes the device into raw RGB24 at a fixed size and rate on its
 * stdout; this module slices that byte stream into Frame objects and feeds
 * them into a bounded queue. Also encodes single frames to JPEG for the
 * scene describer.
 *
 * Responsibilities:
 * - Build ffmpeg input arguments per platform and source (camera / screen)
 * - Slice rawvideo output into whole frames
 * - Encode a frame as JPEG
 */

import { spawn, type ChildProcess } from "child_process";

import { createBoundedQueue, type BoundedQueue } from "./bounded-queue.js";
import { commandExists, relogLines, runToBuffer, waitForFirstData } from "./child-process.js";

import type { Frame } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const BYTES_PER_PIXEL = 3;

/** Time allowed for the device to produce its first bytes (ms) */
const FIRST_FRAME_TIMEOUT_MS = 10_000;

// ============================================================================
// INTERFACES
// ============================================================================

export type FrameSourceKind = "camera" | "screen";

export interface FrameSourceOptions {
  kind: FrameSourceKind;
  width: number;
  height: number;
  fps: number;
  queueCapacity: number;
  /** Device or display; platform default when omitted */
  device?: string;
}

export interface FrameSource {
  frames: BoundedQueue<Frame>;
  stop(): void;
}

/**
 * Slices a rawvideo byte stream into frames.
 */
export interface FrameSlicer {
  push(bytes: Buffer): Frame[];
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Start capturing frames.
 *
 * @throws Error if ffmpeg is missing or the device produces nothing
 */
export async function startFrameSource(options: FrameSourceOptions): Promise<FrameSource> {
  if (!(await commandExists("ffmpeg"))) {
    throw new Error("ffmpeg not found. Install it with your package manager (apt install ffmpeg / brew install ffmpeg)");
  }

  const args = [
    "-hide_banner", "-loglevel", "error",
    ...inputArgs(options.kind, options.fps, options.device),
    "-vf", `scale=${options.width}:${options.height}`,
    "-r", String(options.fps),
    "-pix_fmt", "rgb24", "-f", "rawvideo", "-",
  ];

  const proc = spawn("ffmpeg", args, { stdio: ["ignore", "pipe", "pipe"] });
  const frames = createBoundedQueue<Frame>(options.queueCapacity);
  const slicer = createFrameSlicer(options.width, options.height);
  let stopping = false;

  proc.stdout.on("data", (data: Buffer) => {
    for (const frame of slicer.push(data)) {
      frames.push(frame);
    }
  });
  relogLines(proc.stderr, `ffmpeg:${options.kind}`);

  try {
    await waitForFirstData(proc, "ffmpeg", FIRST_FRAME_TIMEOUT_MS);
  } catch (err) {
    proc.kill();
    throw err;
  }

  watchExit(proc, options.kind, () => stopping, frames);

  return {
    frames,
    stop(): void {
      stopping = true;
      proc.kill();
      frames.close();
    },
  };
}

/**
 * Create a slicer for frames of a fixed size.
 */
export function createFrameSlicer(width: number, height: number): FrameSlicer {
  const frameBytes = width * height * BYTES_PER_PIXEL;
  let pending: Buffer = Buffer.alloc(0);

  return {
    push(bytes: Buffer): Frame[] {
      pending = pending.length === 0 ? bytes : Buffer.concat([pending, bytes]);
      const out: Frame[] = [];

      while (pending.length >= frameBytes) {
        out.push({
          data: new Uint8Array(pending.subarray(0, frameBytes)),
          width,
          height,
          timestamp: Date.now(),
        });
        pending = pending.subarray(frameBytes);
      }

      return out;
    },
  };
}

/**
 * Encode an RGB24 frame as JPEG through ffmpeg.
 *
 * @throws Error if ffmpeg fails
 */
export function encodeJpeg(frame: Frame, quality = 5): Promise<Buffer> {
  return runToBuffer("ffmpeg", [
    "-hide_banner", "-loglevel", "error",
    "-f", "rawvideo", "-pix_fmt", "rgb24", "-s", `${frame.width}x${frame.height}`, "-i", "-",
    "-frames:v", "1", "-q:v", String(quality), "-f", "image2", "-c:v", "mjpeg", "-",
  ], frame.data);
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * ffmpeg input arguments for a source.
 *
 * @throws Error on unsupported platforms
 */
export function inputArgs(
  kind: FrameSourceKind,
  fps: number,
  device?: string,
  platform: NodeJS.Platform = process.platform,
): string[] {
  if (platform === "linux") {
    if (kind === "camera") {
      return ["-f", "v4l2", "-i", device ?? "/dev/video0"];
    }
    return ["-f", "x11grab", "-framerate", String(fps), "-i", device ?? process.env.DISPLAY ?? ":0"];
  }

  if (platform === "darwin") {
    // avfoundation takes "<video>:<audio>"; screens are listed after cameras
    const input = device ?? (kind === "camera" ? "0" : "Capture screen 0");
    return ["-f", "avfoundation", "-framerate", String(fps), "-i", `${input}:none`];
  }

  throw new Error(`${kind} capture is not supported on ${platform}`);
}

function watchExit(proc: ChildProcess, kind: FrameSourceKind, isStopping: () => boolean, frames: BoundedQueue<Frame>): void {
  proc.on("error", (err) => {
    console.error(`[ffmpeg:${kind}] process error: ${err.message}`);
    frames.close();
  });

  proc.on("exit", (code, signal) => {
    if (isStopping()) return;
    console.error(`[ffmpeg:${kind}] exited unexpectedly (code=${code}, signal=${signal})`);
    frames.close();
  });
}
