/**
 * Helpers shared by the modules that drive external tools
 * (parec, ffmpeg, the TTS server, the audio player).
 */

import { exec, spawn, type ChildProcess } from "child_process";

import type { Readable } from "stream";

/**
 * Check whether a command exists on the system PATH.
 * Uses `command -v`.
 *
 * @param cmd - The command name to check
 * @returns true if the command exists, false otherwise
 */
export function commandExists(cmd: string): Promise<boolean> {
  return new Promise((resolve) => {
    exec(`command -v ${cmd}`, (error) => {
      resolve(error === null);
    });
  });
}

/**
 * Re-log a child's stderr line by line under a tag.
 *
 * @param stream - The child's stderr
 * @param tag - Prefix, e.g. "parec"
 * @param skip - Lines to drop (such as a READY marker)
 */
export function relogLines(stream: Readable, tag: string, skip: (line: string) => boolean = () => false): void {
  let partial = "";
  stream.on("data", (data: Buffer) => {
    const lines = (partial + data.toString()).split("\n");
    partial = lines.pop() ?? "";
    for (const line of lines) {
      const trimmed = line.trim();
      if (trimmed && !skip(trimmed)) console.error(`[${tag}] ${trimmed}`);
    }
  });
}

/**
 * Wait for a child to write at least one chunk to stdout.
 *
 * @param proc - Child spawned with a piped stdout
 * @param name - Tool name for error messages
 * @param timeoutMs - How long to wait
 * @throws Error if the child errors, exits, or stays silent past the timeout
 */
export function waitForFirstData(proc: ChildProcess, name: string, timeoutMs: number): Promise<void> {
  const stdout = proc.stdout;
  if (!stdout) return Promise.reject(new Error(`${name} has no stdout stream`));

  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      clearTimeout(timeout);
      stdout.off("data", onData);
      proc.off("error", onError);
      proc.off("exit", onExit);
    };

    const timeout = setTimeout(() => {
      cleanup();
      reject(new Error(`${name} produced no data within ${timeoutMs}ms`));
    }, timeoutMs);

    const onData = () => {
      cleanup();
      resolve();
    };

    const onError = (err: Error) => {
      cleanup();
      reject(new Error(`${name} failed to start: ${err.message}`));
    };

    const onExit = (code: number | null) => {
      cleanup();
      reject(new Error(`${name} exited with code ${code} before producing data`));
    };

    stdout.on("data", onData);
    proc.on("error", onError);
    proc.on("exit", onExit);
  });
}

/**
 * Run a tool to completion with optional stdin and collect its stdout.
 *
 * @throws Error if the tool cannot start or exits non-zero
 */
export function runToBuffer(bin: string, args: string[], input?: Uint8Array): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const proc = spawn(bin, args, { stdio: ["pipe", "pipe", "pipe"] });
    const out: Buffer[] = [];
    let err = "";

    proc.stdout.on("data", (d: Buffer) => out.push(d));
    proc.stderr.on("data", (d: Buffer) => {
      err += d.toString();
    });
    proc.on("error", (e) => reject(new Error(`${bin} failed to start: ${e.message}`)));
    proc.on("close", (code) => {
      if (code === 0) {
        resolve(Buffer.concat(out));
      } else {
        reject(new Error(`${bin} exited with code ${code}: ${err.trim().slice(-200)}`));
      }
    });

    proc.stdin.on("error", (e) => {
      console.error(`[${bin}] stdin error: ${e.message}`);
    });
    if (input) proc.stdin.write(input);
    proc.stdin.end();
  });
}
