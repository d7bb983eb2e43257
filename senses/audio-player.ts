/**
 * System audio player and WAV encoding.
 *
 * Plays synthesized PCM by writing a temporary WAV file and handing it to
 * the platform player (paplay on Linux, afplay on macOS). The player process
 * is exposed so the playback controller can terminate or kill it.
 *
 * Responsibilities:
 * - Encode 16-bit PCM or float samples as WAV
 * - Spawn the platform player on a temp file
 * - Report process exit, and remove the temp file afterwards
 */

import { spawn } from "child_process";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

// ============================================================================
// CONSTANTS
// ============================================================================

const WAV_CHANNELS = 1;

const WAV_BIT_DEPTH = 16;

const WAV_HEADER_SIZE = 44;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * A running playback. Only the controller that started it may stop it.
 */
export interface PlaybackProcess {
  /** Resolves with the exit code (null when killed by a signal) */
  exited: Promise<number | null>;
  /** Ask the player to stop (SIGTERM) */
  terminate(): void;
  /** Force the player to stop (SIGKILL) */
  kill(): void;
}

/**
 * Starts playback of a mono 16-bit PCM buffer.
 */
export interface AudioPlayer {
  play(pcm: Buffer, sampleRate: number): Promise<PlaybackProcess>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a player backed by paplay (Linux) or afplay (macOS).
 *
 * @param command - Override the player binary; receives the WAV path as its last argument
 * @throws Error on platforms with no known player and no override
 */
export function createSystemAudioPlayer(command?: string[]): AudioPlayer {
  const argv = command ?? defaultPlayerCommand();
  if (!argv) {
    throw new Error(`No audio player for platform ${process.platform}`);
  }
  const [bin, ...baseArgs] = argv;

  async function play(pcm: Buffer, sampleRate: number): Promise<PlaybackProcess> {
    const dir = await mkdtemp(join(tmpdir(), "sense-voice-"));
    const wavPath = join(dir, "utterance.wav");
    await writeFile(wavPath, encodeWavFromPcm16(pcm, sampleRate));

    const proc = spawn(bin, [...baseArgs, wavPath], { stdio: ["ignore", "ignore", "pipe"] });

    proc.stderr?.on("data", (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg) console.error(`[player] ${msg}`);
    });

    const exited = new Promise<number | null>((resolve) => {
      proc.on("error", (err) => {
        console.error(`[player] failed to start ${bin}: ${err.message}`);
        resolve(null);
      });
      proc.on("close", (code) => resolve(code));
    }).finally(() => rm(dir, { recursive: true, force: true }).catch((err) => {
      console.error(`[player] could not remove ${dir}: ${err instanceof Error ? err.message : String(err)}`);
    }));

    return {
      exited,
      terminate: () => {
        proc.kill("SIGTERM");
      },
      kill: () => {
        proc.kill("SIGKILL");
      },
    };
  }

  return { play };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Player command for the current platform, or null if unknown.
 */
export function defaultPlayerCommand(): string[] | null {
  if (process.platform === "linux") return ["paplay"];
  if (process.platform === "darwin") return ["afplay"];
  return null;
}

/**
 * Build a 44-byte header for mono 16-bit PCM.
 *
 * @param dataSize - Payload length in bytes
 * @param sampleRate - Samples per second
 */
export function wavHeader(dataSize: number, sampleRate: number): Buffer {
  const bytesPerSample = WAV_BIT_DEPTH / 8;
  const buffer = Buffer.alloc(WAV_HEADER_SIZE);
  let offset = 0;

  // RIFF header
  buffer.write("RIFF", offset); offset += 4;
  buffer.writeUInt32LE(WAV_HEADER_SIZE + dataSize - 8, offset); offset += 4;
  buffer.write("WAVE", offset); offset += 4;

  // fmt sub-chunk
  buffer.write("fmt ", offset); offset += 4;
  buffer.writeUInt32LE(16, offset); offset += 4;
  buffer.writeUInt16LE(1, offset); offset += 2;              // PCM
  buffer.writeUInt16LE(WAV_CHANNELS, offset); offset += 2;
  buffer.writeUInt32LE(sampleRate, offset); offset += 4;
  buffer.writeUInt32LE(sampleRate * WAV_CHANNELS * bytesPerSample, offset); offset += 4;
  buffer.writeUInt16LE(WAV_CHANNELS * bytesPerSample, offset); offset += 2;
  buffer.writeUInt16LE(WAV_BIT_DEPTH, offset); offset += 2;

  // data sub-chunk
  buffer.write("data", offset); offset += 4;
  buffer.writeUInt32LE(dataSize, offset);

  return buffer;
}

/**
 * Wrap raw 16-bit little-endian PCM in a WAV container.
 */
export function encodeWavFromPcm16(pcm: Buffer, sampleRate: number): Buffer {
  return Buffer.concat([wavHeader(pcm.length, sampleRate), pcm]);
}

/**
 * Encode float samples in [-1, 1] as a 16-bit WAV file.
 */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
  return encodeWavFromPcm16(float32ToPcm16(samples), sampleRate);
}

/**
 * Convert float samples to 16-bit signed little-endian PCM, clamping to [-1, 1].
 */
export function float32ToPcm16(samples: Float32Array): Buffer {
  const buffer = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    const int16 = clamped < 0 ? clamped * 0x8000 : clamped * 0x7FFF;
    buffer.writeInt16LE(Math.round(int16), i * 2);
  }
  return buffer;
}
