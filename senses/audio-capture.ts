/**
 * Microphone capture via command-line tools.
 *
 * Spawns `parec` (PulseAudio/PipeWire, Linux) or `ffmpeg` with avfoundation
 * (macOS) writing raw 16-bit mono PCM, converts it to Float32Array and
 * re-chunks it into fixed-size chunks for the VAD.
 *
 * Responsibilities:
 * - Start/stop the capture process and verify it produces data
 * - Convert 16-bit signed PCM to -1.0..1.0 floats across arbitrary read boundaries
 * - Emit exactly chunkSamples-long chunks into a bounded queue
 */

import { spawn, type ChildProcess } from "child_process";

import { createBoundedQueue, type BoundedQueue } from "./bounded-queue.js";
import { commandExists, relogLines, waitForFirstData } from "./child-process.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Divisor for normalizing 16-bit signed PCM to -1.0..1.0 range */
const PCM_16BIT_MAX = 32768.0;

/** Number of bytes per 16-bit sample */
const BYTES_PER_SAMPLE = 2;

/** Timeout for the capture tool to produce its first chunk (ms) */
const MIC_DATA_TIMEOUT_MS = 5_000;

// ============================================================================
// INTERFACES
// ============================================================================

export interface MicCaptureOptions {
  sampleRate: number;
  chunkSamples: number;
  /** Chunks held before the oldest is dropped */
  queueCapacity: number;
  /** Capture device; platform default when omitted */
  device?: string;
}

export interface MicCapture {
  /** Fixed-size chunks in capture order */
  chunks: BoundedQueue<Float32Array>;
  stop(): void;
}

/**
 * Re-chunks a PCM byte stream into fixed-size float chunks.
 */
export interface SampleChunker {
  /** Add raw PCM bytes; returns every complete chunk they finish */
  pushPcm(bytes: Buffer): Float32Array[];
  /** Samples held towards the next chunk */
  pendingSamples(): number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Start capturing from the microphone.
 *
 * @throws Error if the platform has no capture tool, the tool is missing, or no audio arrives
 */
export async function startMicCapture(options: MicCaptureOptions): Promise<MicCapture> {
  const { bin, args } = captureCommand(options.sampleRate, options.device);

  if (!(await commandExists(bin))) {
    throw new Error(
      bin === "parec"
        ? "parec not found. Install with: sudo apt install pulseaudio-utils"
        : "ffmpeg not found. Install with: brew install ffmpeg",
    );
  }

  const proc = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });
  const chunks = createBoundedQueue<Float32Array>(options.queueCapacity);
  const chunker = createSampleChunker(options.chunkSamples);
  let stopping = false;

  proc.stdout.on("data", (data: Buffer) => {
    for (const chunk of chunker.pushPcm(data)) {
      chunks.push(chunk);
    }
  });
  if (proc.stderr) relogLines(proc.stderr, bin);

  try {
    await waitForFirstData(proc, bin, MIC_DATA_TIMEOUT_MS);
  } catch (err) {
    proc.kill();
    throw err;
  }

  setupExitHandler(proc, bin, () => stopping, chunks);

  return {
    chunks,
    stop(): void {
      stopping = true;
      proc.kill();
      chunks.close();
    },
  };
}

/**
 * Create a chunker that turns 16-bit PCM bytes into chunkSamples-long float chunks.
 * An odd trailing byte is carried over to the next push.
 */
export function createSampleChunker(chunkSamples: number): SampleChunker {
  let carry: Buffer = Buffer.alloc(0);
  let current = new Float32Array(chunkSamples);
  let filled = 0;

  return {
    pushPcm(bytes: Buffer): Float32Array[] {
      const data = carry.length > 0 ? Buffer.concat([carry, bytes]) : bytes;
      const usable = data.length - (data.length % BYTES_PER_SAMPLE);
      carry = Buffer.from(data.subarray(usable));

      const samples = bufferToFloat32(data.subarray(0, usable));
      const out: Float32Array[] = [];

      let offset = 0;
      while (offset < samples.length) {
        const take = Math.min(chunkSamples - filled, samples.length - offset);
        current.set(samples.subarray(offset, offset + take), filled);
        filled += take;
        offset += take;

        if (filled === chunkSamples) {
          out.push(current);
          current = new Float32Array(chunkSamples);
          filled = 0;
        }
      }

      return out;
    },

    pendingSamples: () => filled,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Converts a raw 16-bit signed PCM buffer to a Float32Array normalized to -1.0..1.0.
 *
 * @param buffer - Raw 16-bit signed little-endian PCM; a trailing odd byte is ignored
 * @returns Float32Array with values in the range -1.0 to 1.0
 */
export function bufferToFloat32(buffer: Buffer): Float32Array {
  const sampleCount = Math.floor(buffer.length / BYTES_PER_SAMPLE);
  const float32 = new Float32Array(sampleCount);

  for (let i = 0; i < sampleCount; i++) {
    const sample = buffer.readInt16LE(i * BYTES_PER_SAMPLE);
    float32[i] = sample / PCM_16BIT_MAX;
  }

  return float32;
}

/**
 * Capture tool invocation for the current platform.
 *
 * @throws Error on platforms without a supported tool
 */
export function captureCommand(sampleRate: number, device?: string): { bin: string; args: string[] } {
  if (process.platform === "linux") {
    const args = ["--format=s16le", `--rate=${sampleRate}`, "--channels=1", "--raw"];
    if (device) args.unshift(`--device=${device}`);
    return { bin: "parec", args };
  }

  if (process.platform === "darwin") {
    return {
      bin: "ffmpeg",
      args: [
        "-hide_banner", "-loglevel", "error",
        "-f", "avfoundation", "-i", `:${device ?? "0"}`,
        "-ac", "1", "-ar", String(sampleRate), "-f", "s16le", "-",
      ],
    };
  }

  throw new Error(`Microphone capture is not supported on ${process.platform}`);
}

/**
 * Close the queue when the capture tool dies so the consumer loop notices.
 */
function setupExitHandler(
  proc: ChildProcess,
  name: string,
  isStopping: () => boolean,
  chunks: BoundedQueue<Float32Array>,
): void {
  proc.on("error", (err) => {
    console.error(`[${name}] process error: ${err.message}`);
    chunks.close();
  });

  proc.on("exit", (code, signal) => {
    if (isStopping()) return;
    console.error(`[${name}] exited unexpectedly (code=${code}, signal=${signal}). Mic capture lost.`);
    chunks.close();
  });
}
