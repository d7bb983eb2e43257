/**
 * Vision and screen senses: frames -> frame differencer -> scene description -> signals.
 *
 * Both senses share one module and differ in their frame source, prompt,
 * priority and capture rate.
 *
 * Responsibilities:
 * - Capture frames into a bounded queue and drain them from one loop
 * - Ask the frame differencer whether each frame is worth describing
 * - Keep at most one description in flight; frames arriving meanwhile are skipped
 * - Emit descriptions with diff score, motion regions and latency
 * - Every few descriptions, run a full analysis in the background and emit it as its own signal
 * - Publish each analysis to the optional sideband consumer
 * - Apply threshold changes from configure commands
 */

import { VisionConfigureSchema, type SenseSettings, type VisionConfigure } from "./config.js";
import { createFrameDifferencer, DEFAULT_FRAME_DIFF_CONFIG } from "./frame-diff.js";
import { createFramePublisher, type FramePublisher } from "./framing.js";
import { startFrameSource, type FrameSource, type FrameSourceKind, type FrameSourceOptions } from "./frame-source.js";
import { PRIORITY, wireTimestamp } from "./protocol.js";
import { createSceneDescriber } from "./scene-describer.js";

import type { SenseContext, SenseModule } from "./sense-runner.js";
import type { Frame, FrameDiffConfig, FrameDiffResult, SceneDescriber } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const FRAME_QUEUE_CAPACITY = 4;

const QUEUE_POLL_MS = 100;

/** Brief descriptions between full analyses */
const DEFAULT_FULL_ANALYSIS_INTERVAL = 30;

/** How long start() waits for a sideband consumer before carrying on without one */
const SIDEBAND_CONNECT_TIMEOUT_MS = 2_000;

/** Capture geometry and rate per source */
const SOURCE_PROFILES: Record<FrameSourceKind, { width: number; height: number; fps: number }> = {
  camera: { width: 640, height: 480, fps: 2 },
  screen: { width: 1280, height: 720, fps: 0.5 },
};

// ============================================================================
// INTERFACES
// ============================================================================

export interface VisionDeps {
  describer?: SceneDescriber;
  startSource?: (options: FrameSourceOptions) => Promise<FrameSource>;
  publisher?: FramePublisher;
  /** Differencer thresholds before any configure command */
  frameDiff?: FrameDiffConfig;
}

/** Document sent to the sideband consumer for every analysed frame */
export interface AnalysisRecord {
  sense: string;
  timestamp: number;
  width: number;
  height: number;
  diff_score: number;
  motion_regions: number;
  description: string;
  latency_ms: number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the camera ("vision") or screen ("screen") sense.
 */
export function createVisionSense(
  kind: FrameSourceKind,
  settings: SenseSettings,
  deps: VisionDeps = {},
): SenseModule<VisionConfigure> {
  const name = kind === "camera" ? "vision" : "screen";
  const tag = `[${name}]`;
  const priority = kind === "camera" ? PRIORITY.VISUAL : PRIORITY.SCREEN;
  const startSource = deps.startSource ?? startFrameSource;

  const diffConfig: FrameDiffConfig = { ...(deps.frameDiff ?? DEFAULT_FRAME_DIFF_CONFIG) };
  const differencer = createFrameDifferencer(diffConfig);

  let ctx: SenseContext | null = null;
  let describer: SceneDescriber | null = null;
  let publisher: FramePublisher | null = null;
  let source: FrameSource | null = null;
  let loop: Promise<void> | null = null;
  let inFlight: Promise<void> | null = null;
  let fullInFlight: Promise<void> | null = null;
  let capturing = false;
  let skipped = 0;
  let fullAnalysisInterval = DEFAULT_FULL_ANALYSIS_INTERVAL;
  let briefCount = 0;

  async function analyse(frame: Frame, diff: FrameDiffResult, active: SceneDescriber): Promise<void> {
    let text: string;
    let latencyMs: number;
    try {
      const description = await active.describe(frame);
      text = description.text;
      latencyMs = description.latencyMs;
    } catch (err) {
      console.error(`${tag} description failed: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    if (!text || !capturing) return;

    console.error(`${tag} ${text} (${latencyMs}ms, diff ${diff.diffScore.toFixed(3)}, motion ${diff.motionScore.toFixed(3)})`);
    ctx?.emitSignal(text, priority, {
      diff_score: diff.diffScore,
      motion_regions: diff.motionRegions,
      latency_ms: latencyMs,
      is_full_analysis: false,
    });

    if (publisher) {
      const record: AnalysisRecord = {
        sense: name,
        timestamp: wireTimestamp(frame.timestamp),
        width: frame.width,
        height: frame.height,
        diff_score: diff.diffScore,
        motion_regions: diff.motionRegions,
        description: text,
        latency_ms: latencyMs,
      };
      publisher.publish(record);
    }
  }

  async function analyseFully(frame: Frame, active: SceneDescriber): Promise<void> {
    let text: string;
    let latencyMs: number;
    try {
      const description = await active.describe(frame, "full");
      text = description.text;
      latencyMs = description.latencyMs;
    } catch (err) {
      console.error(`${tag} full analysis failed: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    if (!text || !capturing) return;

    console.error(`${tag} [full] ${text.slice(0, 60)} (${latencyMs}ms)`);
    ctx?.emitSignal(text, priority, { latency_ms: latencyMs, is_full_analysis: true });
  }

  /** Start a full analysis unless one is already running */
  function maybeAnalyseFully(frame: Frame, active: SceneDescriber): void {
    briefCount++;
    if (fullAnalysisInterval === 0 || briefCount % fullAnalysisInterval !== 0 || fullInFlight) return;

    const task = analyseFully(frame, active).finally(() => {
      if (fullInFlight === task) fullInFlight = null;
    });
    fullInFlight = task;
  }

  async function consume(frames: FrameSource, active: SceneDescriber): Promise<void> {
    while (capturing) {
      const frame = await frames.frames.next(QUEUE_POLL_MS);
      if (frame === null) {
        if (frames.frames.isClosed()) break;
        continue;
      }

      // The differencer baseline only moves when a description actually runs
      if (inFlight) {
        skipped++;
        continue;
      }

      const decision = differencer.shouldAnalyze(frame);
      if (!decision.shouldRun) continue;

      const task = analyse(frame, decision.result, active).finally(() => {
        if (inFlight === task) inFlight = null;
      });
      inFlight = task;
      maybeAnalyseFully(frame, active);
    }
  }

  return {
    name,
    kind: "sense",
    configureSchema: VisionConfigureSchema,

    async initialize(context: SenseContext): Promise<void> {
      ctx = context;
      if (deps.describer) {
        describer = deps.describer;
      } else {
        if (!settings.anthropicApiKey) {
          throw new Error("ANTHROPIC_API_KEY is not set");
        }
        describer = createSceneDescriber({ kind, apiKey: settings.anthropicApiKey });
      }

      publisher = deps.publisher ?? (settings.sidebandSocket ? createFramePublisher(settings.sidebandSocket) : null);
      if (publisher) await publisher.start();
      console.error(`${tag} ready`);
    },

    async start(): Promise<void> {
      if (!describer) throw new Error(`${name} started before initialisation`);
      const active = describer;

      const profile = SOURCE_PROFILES[kind];
      source = await startSource({
        kind,
        ...profile,
        queueCapacity: FRAME_QUEUE_CAPACITY,
        device: kind === "camera" ? settings.cameraDevice : settings.screenDevice,
      });

      if (publisher && !(await publisher.waitForConnection(SIDEBAND_CONNECT_TIMEOUT_MS))) {
        console.error(`${tag} continuing without a sideband consumer`);
      }

      differencer.reset();
      skipped = 0;
      briefCount = 0;
      capturing = true;
      loop = consume(source, active).catch((err) => {
        console.error(`${tag} frame loop failed: ${err instanceof Error ? err.message : String(err)}`);
      });
      console.error(`${tag} Started at ${profile.fps}fps`);
    },

    async stop(): Promise<void> {
      capturing = false;
      source?.stop();
      source = null;
      if (loop) await loop;
      loop = null;
      if (inFlight) await inFlight;
      if (fullInFlight) await fullInFlight;
      console.error(`${tag} Stopped (${skipped} frames skipped during analysis)`);
    },

    configure(patch: VisionConfigure): void {
      if (patch.change_threshold !== undefined) diffConfig.changeThreshold = patch.change_threshold;
      if (patch.motion_threshold !== undefined) diffConfig.motionThreshold = patch.motion_threshold;
      if (patch.min_frames_between_analysis !== undefined) {
        diffConfig.minFramesBetweenAnalysis = patch.min_frames_between_analysis;
      }
      if (patch.downsample_factor !== undefined) diffConfig.downsampleFactor = patch.downsample_factor;
      if (patch.full_analysis_interval !== undefined) fullAnalysisInterval = patch.full_analysis_interval;
      console.error(`${tag} configured ${JSON.stringify(patch)}`);
    },

    async cleanup(): Promise<void> {
      capturing = false;
      source?.stop();
      source = null;
      if (publisher) await publisher.close();
      publisher = null;
    },
  };
}
