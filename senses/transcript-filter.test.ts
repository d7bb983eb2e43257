/**
 * Unit tests for hallucination filtering and interrupt keywords, using the shipped lists.
 *
 * Run: node --import tsx --test senses/transcript-filter.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  containsInterruptKeyword,
  DEFAULT_FILTER_CONFIG,
  findInterruptKeyword,
  isHallucination,
} from "./transcript-filter.js";
import type { TranscriptFilterConfig } from "./types.js";

// ============================================================================
// TESTS
// ============================================================================

test("very short and punctuation-only transcripts are rejected", () => {
  assert.equal(isHallucination(""), true);
  assert.equal(isHallucination("ok"), true);
  assert.equal(isHallucination("   hi  "), true);
  assert.equal(isHallucination("   "), true);
  assert.equal(isHallucination("..."), true);
  assert.equal(isHallucination("?!-"), true);
});

test("stock phrases are rejected exactly and, when long enough, as substrings", () => {
  assert.equal(isHallucination("You"), true);
  assert.equal(isHallucination("Bye bye"), true);
  assert.equal(isHallucination("Thank you for watching!"), true);
  assert.equal(isHallucination("and please subscribe to the channel"), true);
});

test("short stock phrases inside real speech are kept", () => {
  assert.equal(isHallucination("I think you should go"), false);
  assert.equal(isHallucination("Put the kettle on"), false);
});

test("repetition patterns are rejected", () => {
  assert.equal(isHallucination("the the the"), true);
  assert.equal(isHallucination("no no no no"), true);
  assert.equal(isHallucination("a a a"), true);
  assert.equal(isHallucination("hahahaha"), true);
});

test("ordinary sentences pass", () => {
  assert.equal(isHallucination("Hello there, how are you?"), false);
  assert.equal(isHallucination("Can you open the settings page"), false);
});

test("interrupt keywords match whole words, case-insensitively", () => {
  assert.equal(findInterruptKeyword("Stop, please"), "stop");
  assert.equal(findInterruptKeyword("WAIT!"), "wait");
  assert.equal(findInterruptKeyword("unstoppable force"), null);
  assert.equal(findInterruptKeyword("tell me a story"), null);
});

test("a keyword addressing the assistant is real speech, not noise", () => {
  const text = "Kira, what's the weather?";

  assert.equal(isHallucination(text), false);
  assert.equal(findInterruptKeyword(text), "kira");
});

test("a possessive or contraction still matches its keyword", () => {
  assert.equal(findInterruptKeyword("Kira's here"), "kira");
  assert.equal(findInterruptKeyword("stop's the word"), "stop");
  assert.equal(findInterruptKeyword("waiting room"), null);
});

test("the first listed keyword wins when several appear", () => {
  assert.equal(findInterruptKeyword("wait, kira, stop"), "kira");
});

test("a custom config replaces the shipped lists", () => {
  const config: TranscriptFilterConfig = {
    ...DEFAULT_FILTER_CONFIG,
    hallucinationPhrases: ["custom noise"],
    interruptKeywords: ["halt"],
  };

  assert.equal(isHallucination("custom noise", config), true);
  assert.equal(isHallucination("you", config), false);
  assert.equal(containsInterruptKeyword("please halt now", config), true);
  assert.equal(containsInterruptKeyword("please stop now", config), false);
});
