/**
 * Transcript filtering: hallucination rejection and interrupt keywords.
 *
 * Transcribers produce stock phrases and stutters on silence or noise.
 * The phrase and keyword lists ship as data in data/transcript-filters.json
 * and can be replaced per process.
 */

import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

import type { TranscriptFilterConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const __dirname = dirname(fileURLToPath(import.meta.url));
const FILTER_DATA_PATH = join(__dirname, "data", "transcript-filters.json");

const FilterDataSchema = z.object({
  minLength: z.number().int().nonnegative(),
  substringMinLength: z.number().int().nonnegative(),
  hallucinationPhrases: z.array(z.string()),
  interruptKeywords: z.array(z.string()),
});

/** Only punctuation and whitespace */
const PUNCTUATION_ONLY = /^[\s.,!?-]+$/;

/** The same word three or more times in a row */
const REPEATED_WORD = /\b(\w+)(?:\s+\1){2,}\b/;

/** A single character separated by spaces ("a a a") */
const SPACED_LETTER = /^(\w)(?:\s+\1)+\s*$/;

/** A 1-3 character group four or more times in a row */
const REPEATED_GROUP = /(.{1,3})\1{3,}/;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Load the shipped filter lists.
 *
 * @throws Error if the data file is missing or malformed
 */
export function loadDefaultFilterConfig(): TranscriptFilterConfig {
  const raw: unknown = JSON.parse(readFileSync(FILTER_DATA_PATH, "utf-8"));
  return FilterDataSchema.parse(raw);
}

export const DEFAULT_FILTER_CONFIG: TranscriptFilterConfig = loadDefaultFilterConfig();

/**
 * Whether a transcript looks like transcriber output on silence or noise.
 *
 * @param text - Raw transcript
 * @param config - Phrase list and length cutoffs
 */
export function isHallucination(text: string, config: TranscriptFilterConfig = DEFAULT_FILTER_CONFIG): boolean {
  const normalized = text.trim().toLowerCase();

  if (normalized.length < config.minLength) return true;
  if (PUNCTUATION_ONLY.test(normalized)) return true;

  for (const phrase of config.hallucinationPhrases) {
    const p = phrase.toLowerCase();
    if (normalized === p) return true;
    if (p.length > config.substringMinLength && normalized.includes(p)) return true;
  }

  if (REPEATED_WORD.test(normalized)) return true;
  if (SPACED_LETTER.test(normalized)) return true;
  if (REPEATED_GROUP.test(normalized)) return true;

  return false;
}

/**
 * Find the first interrupt keyword present as a whole word. Apostrophes end
 * a word, so "kira's" still matches "kira".
 *
 * @returns The matched keyword, or null
 */
export function findInterruptKeyword(
  text: string,
  config: TranscriptFilterConfig = DEFAULT_FILTER_CONFIG,
): string | null {
  for (const keyword of config.interruptKeywords) {
    if (keywordPattern(keyword).test(text)) return keyword;
  }
  return null;
}

export function containsInterruptKeyword(
  text: string,
  config: TranscriptFilterConfig = DEFAULT_FILTER_CONFIG,
): boolean {
  return findInterruptKeyword(text, config) !== null;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

const keywordPatterns = new Map<string, RegExp>();

/** Case-insensitive match bounded by anything that is not a letter or digit */
function keywordPattern(keyword: string): RegExp {
  let pattern = keywordPatterns.get(keyword);
  if (!pattern) {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, "iu");
    keywordPatterns.set(keyword, pattern);
  }
  return pattern;
}
