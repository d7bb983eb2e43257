/**
 * Energy-based speech scorer.
 *
 * Scores a chunk by its RMS energy against an adaptive background-noise
 * floor. Needs no model, so the hearing sense can start without downloads.
 */

import type { SpeechScorer } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export interface EnergyScorerConfig {
  /** RMS below which a chunk is never speech, whatever the noise floor */
  energyThreshold: number;
  /** Weight kept by the noise floor on each quiet chunk (0..1) */
  noiseAdaptationRate: number;
}

export const DEFAULT_ENERGY_SCORER_CONFIG: EnergyScorerConfig = {
  energyThreshold: 0.01,
  noiseAdaptationRate: 0.95,
};

// ============================================================================
// INTERFACES
// ============================================================================

export interface EnergyScorer extends SpeechScorer {
  /** Current background-noise estimate (RMS) */
  noiseFloor(): number;
  reset(): void;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create an energy scorer.
 *
 * The probability is energy / (2 * threshold), capped at 1, where the
 * threshold is the larger of the configured floor and twice the noise
 * estimate. A chunk exactly at the threshold scores 0.5.
 */
export function createEnergyScorer(config: EnergyScorerConfig = DEFAULT_ENERGY_SCORER_CONFIG): EnergyScorer {
  let backgroundNoise = 0;

  function scoreSync(chunk: Float32Array): number {
    const energy = rmsEnergy(chunk);
    const adaptiveThreshold = Math.max(config.energyThreshold, backgroundNoise * 2);

    // Only quiet chunks teach the noise floor
    if (energy <= adaptiveThreshold) {
      backgroundNoise = backgroundNoise * config.noiseAdaptationRate + energy * (1 - config.noiseAdaptationRate);
    }

    return Math.min(1, energy / (adaptiveThreshold * 2));
  }

  return {
    score: async (chunk) => scoreSync(chunk),
    noiseFloor: () => backgroundNoise,
    reset(): void {
      backgroundNoise = 0;
    },
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Root-mean-square of samples in [-1, 1].
 */
export function rmsEnergy(samples: Float32Array): number {
  if (samples.length === 0) return 0;

  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    sum += samples[i] * samples[i];
  }
  return Math.sqrt(sum / samples.length);
}
