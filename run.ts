/**
 * Top-level runner that boots the senses and prints the signal stream.
 *
 * Usage: node --import tsx run.ts [--senses hearing,vision,screen] [--outputs voice]
 *        node --import tsx run.ts --check
 *
 * Responsibilities:
 * - Load settings and start the orchestrator with the requested senses and outputs
 * - Print each queued signal, most urgent first
 * - Speak every line typed on stdin through the voice output
 * - Forward SIGINT/SIGTERM as a graceful shutdown
 * - With --check, report which STT/TTS providers are usable and exit
 */

import { createInterface } from "readline";
import { parseArgs } from "util";

import { createOrchestrator } from "./core/orchestrator.js";
import { loadSettings, type SenseSettings } from "./senses/config.js";
import { getAvailableSttProviders, getSttProviderStatus } from "./senses/stt-provider.js";
import { getAvailableTtsProviders, getTtsProviderStatus } from "./senses/tts-provider.js";

import type { ProviderStatus, Signal } from "./senses/types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const DEFAULT_SENSES = "hearing";
const DEFAULT_OUTPUTS = "voice";

/** Consumer wake-up interval while waiting for signals (ms) */
const SIGNAL_POLL_MS = 500;

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      senses: { type: "string", default: DEFAULT_SENSES },
      outputs: { type: "string", default: DEFAULT_OUTPUTS },
      check: { type: "boolean", default: false },
    },
  });

  const settings = await loadSettings();
  if (values.check) {
    printProviderReport(settings);
    return;
  }

  const orchestrator = createOrchestrator({
    senses: splitList(values.senses),
    outputs: splitList(values.outputs),
    readyTimeoutMs: settings.senseReadyTimeoutMs,
  });

  let shuttingDown = false;
  const shutdown = (): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    orchestrator
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        console.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const notReady = await orchestrator.start();
  if (notReady.length > 0) {
    console.error(`Not started: ${notReady.join(", ")}`);
  }

  createInterface({ input: process.stdin }).on("line", (line) => {
    const text = line.trim();
    if (text && !orchestrator.speak(text)) {
      console.error("No voice output running");
    }
  });

  while (!orchestrator.signals.isClosed()) {
    const signal = await orchestrator.signals.pop(SIGNAL_POLL_MS);
    if (signal) printSignal(signal);
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function splitList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Print one signal as "[sense p<priority>] content {metadata}".
 */
function printSignal(signal: Signal): void {
  const meta = Object.keys(signal.metadata).length > 0 ? ` ${JSON.stringify(signal.metadata)}` : "";
  console.log(`[${signal.sense} p${signal.priority}] ${signal.content}${meta}`);
}

/**
 * One line per provider, marking the configured ones with "*".
 */
function printProviderReport(settings: SenseSettings): void {
  console.log("Speech-to-text:");
  for (const info of getAvailableSttProviders()) {
    const status = getSttProviderStatus({ ...settings.stt, provider: info.type });
    console.log(formatProvider(info.name, info.type === settings.stt.provider, status));
  }

  console.log("Text-to-speech:");
  for (const info of getAvailableTtsProviders()) {
    const status = getTtsProviderStatus({ ...settings.tts, provider: info.type });
    console.log(formatProvider(info.name, info.type === settings.tts.provider, status));
  }

  console.log(`Scene description: ${settings.anthropicApiKey ? "ready" : "ANTHROPIC_API_KEY is not set"}`);
}

function formatProvider(name: string, selected: boolean, status: ProviderStatus): string {
  const state = status.ready ? "ready" : status.detail ?? status.reason ?? "not ready";
  return `${selected ? "*" : " "} ${name}: ${state}`;
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().catch((err) => {
  console.error(`Startup failed: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
