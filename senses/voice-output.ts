/**
 * Voice output: speak and interrupt, with echo-cancellation state reported to the core.
 *
 * Responsibilities:
 * - Load the configured TTS engine and audio player
 * - Route speak commands into the playback controller (non-blocking by default)
 * - Stop playback and drop queued speech on interrupt
 * - Emit every echo-cancellation state change as a system signal so the core can mute hearing
 * - Apply interrupt-check timing from configure commands
 */

import { createSystemAudioPlayer, type AudioPlayer } from "./audio-player.js";
import { VoiceConfigureSchema, type SenseSettings, type VoiceConfigure } from "./config.js";
import { createEchoCoordinator, DEFAULT_ECHO_CONFIG, isMicActiveIn, type EchoCoordinator } from "./echo-cancellation.js";
import { createPlaybackController, type PlaybackController } from "./playback.js";
import { PRIORITY } from "./protocol.js";
import { createTtsForProvider, getTtsProviderStatus } from "./tts-provider.js";

import type { SenseContext, SenseModule } from "./sense-runner.js";
import type { AudioState, EchoCancellationConfig, Metadata, TtsEngine } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

export interface VoiceDeps {
  tts?: TtsEngine;
  player?: AudioPlayer;
  echo?: EchoCancellationConfig;
  killTimeoutMs?: number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the voice output module.
 */
export function createVoiceOutput(settings: SenseSettings, deps: VoiceDeps = {}): SenseModule<VoiceConfigure> {
  // Read by the echo coordinator on every cycle, so configure takes effect on the next window
  const echoConfig: EchoCancellationConfig = { ...(deps.echo ?? DEFAULT_ECHO_CONFIG) };

  let ctx: SenseContext | null = null;
  let tts: TtsEngine | null = null;
  let echo: EchoCoordinator | null = null;
  let playback: PlaybackController | null = null;

  function reportState(state: AudioState): void {
    ctx?.emitSignal(`audio state ${state}`, PRIORITY.SYSTEM, {
      audio_state: state,
      mic_active: isMicActiveIn(state),
    });
  }

  return {
    name: "voice",
    kind: "output",
    configureSchema: VoiceConfigureSchema,

    async initialize(context: SenseContext): Promise<void> {
      ctx = context;

      if (deps.tts) {
        tts = deps.tts;
      } else {
        const status = getTtsProviderStatus(settings.tts);
        if (!status.ready) {
          throw new Error(`TTS provider "${settings.tts.provider}" is not ready: ${status.detail ?? status.reason ?? "unknown"}`);
        }
        console.error(`[voice] Loading ${settings.tts.provider} TTS...`);
        tts = await createTtsForProvider(settings.tts);
      }

      const player = deps.player ?? createSystemAudioPlayer();
      echo = createEchoCoordinator(echoConfig, reportState);
      playback = createPlaybackController({ tts, player, echo, killTimeoutMs: deps.killTimeoutMs });
      console.error("[voice] ready");
    },

    async speak(text: string, options: Metadata): Promise<void> {
      if (!playback) throw new Error("voice received speak before initialisation");
      const blocking = options.blocking === true;
      console.error(`[voice] Speaking: "${text.slice(0, 60)}"`);

      const handle = await playback.speak(text, { blocking });
      const played = await handle.finished;
      if (!played) console.error(`[voice] utterance ${handle.id} did not finish`);
    },

    async interrupt(): Promise<void> {
      if (!playback) return;
      await playback.interrupt();
    },

    configure(patch: VoiceConfigure): void {
      if (patch.interrupt_check_interval_ms !== undefined) {
        echoConfig.interruptCheckIntervalMs = patch.interrupt_check_interval_ms;
      }
      if (patch.interrupt_check_duration_ms !== undefined) {
        echoConfig.interruptCheckDurationMs = patch.interrupt_check_duration_ms;
      }
      console.error(`[voice] configured ${JSON.stringify(patch)}`);
    },

    async cleanup(): Promise<void> {
      if (playback) await playback.destroy();
      playback = null;
      if (echo && echo.getState() !== "LISTENING") await echo.stopSpeaking();
      tts?.destroy();
      tts = null;
    },
  };
}
