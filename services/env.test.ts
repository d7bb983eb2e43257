/**
 * Unit tests for .env parsing.
 *
 * Run: node --import tsx --test services/env.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";

import { parseEnvFile, readEnv } from "./env.js";

test("parses keys, quotes, export prefixes and comments", () => {
  const env = parseEnvFile([
    "# perception settings",
    "STT_PROVIDER=local",
    "export MIC_DEVICE=\"hw:1,0\"",
    "ELEVENLABS_VOICE_ID='voice id'",
    "",
    "EMPTY=",
    "no equals sign",
    "=orphan",
  ].join("\r\n"));

  assert.deepEqual(env, {
    STT_PROVIDER: "local",
    MIC_DEVICE: "hw:1,0",
    ELEVENLABS_VOICE_ID: "voice id",
    EMPTY: "",
  });
});

test("values may contain equals signs", () => {
  assert.deepEqual(parseEnvFile("TTS_SERVER_COMMAND=piper --opt=a=b"), { TTS_SERVER_COMMAND: "piper --opt=a=b" });
});

test("a missing file reads as empty", async () => {
  const dir = await mkdtemp(join(tmpdir(), "env-test-"));
  try {
    assert.deepEqual(await readEnv(join(dir, ".env")), {});
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test("other read errors propagate", async () => {
  const dir = await mkdtemp(join(tmpdir(), "env-test-"));
  try {
    // Reading a directory fails with EISDIR
    await assert.rejects(readEnv(dir));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
