/**
 * Entry point for every sense and output process.
 *
 * Usage: node --import tsx senses/main.ts <hearing|vision|screen|voice>
 *
 * stdout carries the protocol; all logging goes to stderr.
 */

import { loadSettings, type SenseSettings } from "./config.js";
import { createHearingSense } from "./hearing.js";
import { runSense } from "./sense-runner.js";
import { createVisionSense } from "./vision.js";
import { createVoiceOutput } from "./voice-output.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const SENSE_NAMES = ["hearing", "vision", "screen", "voice"] as const;

export type SenseName = (typeof SENSE_NAMES)[number];

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

async function main(): Promise<void> {
  const name = process.argv[2];
  if (!isSenseName(name)) {
    console.error(`Usage: senses/main.ts <${SENSE_NAMES.join("|")}>`);
    process.exitCode = 2;
    return;
  }

  const settings = await loadSettings();

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());
  process.once("SIGTERM", () => controller.abort());

  const code = await launch(name, settings, controller.signal);

  // Let the final status line reach the pipe before exiting
  process.stdout.write("", () => process.exit(code));
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function isSenseName(value: string | undefined): value is SenseName {
  return SENSE_NAMES.some((name) => name === value);
}

/**
 * Build the named module and run it on this process's stdio.
 */
function launch(name: SenseName, settings: SenseSettings, signal: AbortSignal): Promise<number> {
  const io = { input: process.stdin, output: process.stdout, signal };
  switch (name) {
    case "hearing":
      return runSense(createHearingSense(settings), io);
    case "vision":
      return runSense(createVisionSense("camera", settings), io);
    case "screen":
      return runSense(createVisionSense("screen", settings), io);
    case "voice":
      return runSense(createVoiceOutput(settings), io);
  }
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().catch((err) => {
  console.error(`Sense startup failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
