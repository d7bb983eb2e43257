/**
 * Frame differencing gate for scene analysis.
 *
 * Decides, per captured frame, whether the scene has changed enough since
 * the last analysed frame to justify an expensive scene-description call.
 *
 * Responsibilities:
 * - Downsample RGB24 frames to grayscale by area averaging
 * - Keep two baselines: the previous frame (raw motion) and the last analysed frame (divergence)
 * - Count active cells on a coarse motion grid
 * - Apply the cooldown / change / multi-region decision policy
 */

import type { Frame, FrameDiffConfig, FrameDiffResult } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_FRAME_DIFF_CONFIG: FrameDiffConfig = {
  changeThreshold: 0.05,
  motionThreshold: 0.02,
  minFramesBetweenAnalysis: 5,
  downsampleFactor: 4,
};

/** Motion grid is GRID_SIZE x GRID_SIZE cells */
const GRID_SIZE = 8;

/** Fraction of a cell's pixels that must move for the cell to count */
const ACTIVE_CELL_FRACTION = 0.1;

/** Active cells needed for the multi-region rule */
const MIN_MOTION_REGIONS = 3;

// ============================================================================
// INTERFACES
// ============================================================================

/** Downsampled grayscale image, values in [0, 255] */
export interface GrayImage {
  pixels: Float32Array;
  width: number;
  height: number;
}

export interface FrameDecision {
  shouldRun: boolean;
  result: FrameDiffResult;
}

export interface FrameDifferencer {
  /** Evaluate one frame and advance the baselines. */
  shouldAnalyze(frame: Frame): FrameDecision;
  /** Forget both baselines; the next frame is treated as the first. */
  reset(): void;
  /** Frames seen since analysis last ran */
  framesSinceAnalysis(): number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a frame differencer.
 *
 * @param config - Thresholds; defaults in DEFAULT_FRAME_DIFF_CONFIG
 * @returns A FrameDifferencer with no baseline
 */
export function createFrameDifferencer(config: FrameDiffConfig = DEFAULT_FRAME_DIFF_CONFIG): FrameDifferencer {
  let lastFrame: GrayImage | null = null;
  let lastAnalysedFrame: GrayImage | null = null;
  let framesSince = 0;

  function shouldAnalyze(frame: Frame): FrameDecision {
    framesSince++;
    const small = downsampleToGray(frame, config.downsampleFactor);

    // First frame, or the capture size changed under us: start over from this frame
    if (!lastFrame || !lastAnalysedFrame || !sameSize(lastAnalysedFrame, small)) {
      lastFrame = small;
      lastAnalysedFrame = small;
      framesSince = 0;
      return { shouldRun: true, result: { changed: true, diffScore: 1.0, motionRegions: 0, motionScore: 1.0 } };
    }

    const diffFromAnalysed = meanAbsDiff(lastAnalysedFrame, small);
    const motionRegions = countMotionRegions(lastAnalysedFrame, small, config.motionThreshold);
    const motionScore = meanAbsDiff(lastFrame, small);
    lastFrame = small;

    const result: FrameDiffResult = {
      changed: diffFromAnalysed > config.changeThreshold,
      diffScore: diffFromAnalysed,
      motionRegions,
      motionScore,
    };

    let shouldRun = false;

    // Cooldown over: any divergence above the low bar
    if (framesSince >= config.minFramesBetweenAnalysis && diffFromAnalysed > config.motionThreshold) {
      shouldRun = true;
    }

    // Large change: regardless of cooldown
    if (diffFromAnalysed > config.changeThreshold) {
      shouldRun = true;
    }

    // Several small movements at once
    if (motionRegions >= MIN_MOTION_REGIONS && diffFromAnalysed > config.motionThreshold) {
      shouldRun = true;
    }

    if (shouldRun) {
      lastAnalysedFrame = small;
      framesSince = 0;
    }

    return { shouldRun, result };
  }

  return {
    shouldAnalyze,

    reset(): void {
      lastFrame = null;
      lastAnalysedFrame = null;
      framesSince = 0;
    },

    framesSinceAnalysis: () => framesSince,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Area-average an RGB24 frame by an integer factor into a grayscale image.
 * Trailing rows/columns that do not fill a whole block are dropped.
 *
 * @param frame - RGB24 frame
 * @param factor - Block size; 1 or less keeps full resolution
 * @returns Grayscale image with values in [0, 255]
 */
export function downsampleToGray(frame: Frame, factor: number): GrayImage {
  const block = Math.max(1, Math.floor(factor));
  const width = Math.floor(frame.width / block);
  const height = Math.floor(frame.height / block);
  const pixels = new Float32Array(width * height);
  const blockArea = block * block * 3;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let sum = 0;
      for (let dy = 0; dy < block; dy++) {
        const row = (y * block + dy) * frame.width;
        for (let dx = 0; dx < block; dx++) {
          const offset = (row + x * block + dx) * 3;
          sum += frame.data[offset] + frame.data[offset + 1] + frame.data[offset + 2];
        }
      }
      pixels[y * width + x] = sum / blockArea;
    }
  }

  return { pixels, width, height };
}

/**
 * Mean absolute difference of two same-sized images, normalised to [0, 1].
 */
export function meanAbsDiff(a: GrayImage, b: GrayImage): number {
  const n = a.pixels.length;
  if (n === 0) return 0;

  let total = 0;
  for (let i = 0; i < n; i++) {
    total += Math.abs(a.pixels[i] - b.pixels[i]);
  }
  return total / n / 255;
}

/**
 * Count cells of an 8x8 grid in which more than 10% of pixels changed by
 * more than motionThreshold * 255.
 */
export function countMotionRegions(a: GrayImage, b: GrayImage, motionThreshold: number): number {
  const cellW = Math.floor(a.width / GRID_SIZE);
  const cellH = Math.floor(a.height / GRID_SIZE);
  if (cellW === 0 || cellH === 0) return 0;

  const pixelThreshold = motionThreshold * 255;
  const cellArea = cellW * cellH;
  let active = 0;

  for (let gy = 0; gy < GRID_SIZE; gy++) {
    for (let gx = 0; gx < GRID_SIZE; gx++) {
      let moving = 0;
      for (let y = gy * cellH; y < (gy + 1) * cellH; y++) {
        for (let x = gx * cellW; x < (gx + 1) * cellW; x++) {
          const i = y * a.width + x;
          if (Math.abs(a.pixels[i] - b.pixels[i]) > pixelThreshold) moving++;
        }
      }
      if (moving / cellArea > ACTIVE_CELL_FRACTION) active++;
    }
  }

  return active;
}

function sameSize(a: GrayImage, b: GrayImage): boolean {
  return a.width === b.width && a.height === b.height;
}
