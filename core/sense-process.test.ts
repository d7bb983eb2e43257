/**
 * Tests for the core-side process handle against a real child process.
 *
 * The child is mock-sense.mjs, which speaks the line protocol and can be
 * told to fail, misbehave, or ignore stop requests.
 *
 * Run: node --import tsx --test core/sense-process.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { setTimeout as wait } from "node:timers/promises";
import { fileURLToPath } from "url";

import { createSenseProcess, defaultSenseCommand } from "./sense-process.js";

import type { Signal, Status } from "../senses/types.js";

// ============================================================================
// HELPERS
// ============================================================================

const MOCK_SENSE = fileURLToPath(new URL("./mock-sense.mjs", import.meta.url));

function spawnMock(mode: string) {
  const signals: Signal[] = [];
  const statuses: Status[] = [];
  const proc = createSenseProcess({
    name: "hearing",
    kind: "sense",
    command: [process.execPath, MOCK_SENSE, mode],
    onSignal: (signal) => signals.push(signal),
    onStatus: (status) => statuses.push(status),
  });
  return { proc, signals, statuses };
}

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await wait(10);
  }
}

// ============================================================================
// TESTS
// ============================================================================

test("a healthy process becomes ready, exchanges messages, and stops on request", async () => {
  const { proc, signals, statuses } = spawnMock("ok");

  proc.start();
  await proc.waitForReady(5000);
  assert.equal(proc.isReady(), true);
  assert.equal(statuses[0]?.status, "ready");
  assert.equal(statuses[0]?.sense, "mock");

  assert.equal(proc.send("configure", { mute: true }), true);
  await waitFor(() => signals.length === 1);
  assert.equal(signals[0].content, "got configure");
  assert.deepEqual(signals[0].metadata, { mute: true });

  await proc.stop();
  assert.equal(await proc.exited(), 0);
  assert.equal(proc.isRunning(), false);
  assert.equal(proc.send("start"), false);
});

test("an error status before ready fails the wait with its message", async () => {
  const { proc } = spawnMock("fail");

  proc.start();

  await assert.rejects(proc.waitForReady(5000), /hearing failed to initialise: no device/);
  assert.equal(await proc.exited(), 1);
  assert.equal(proc.isReady(), false);
});

test("malformed output lines are skipped", async () => {
  const { proc, signals, statuses } = spawnMock("garbage");

  proc.start();
  await proc.waitForReady(5000);

  assert.deepEqual(statuses.map((s) => s.status), ["ready"]);
  assert.equal(signals.length, 0);
  await proc.stop();
});

test("a silent process times out and is terminated on stop", async () => {
  const { proc } = spawnMock("silent");

  proc.start();
  await assert.rejects(proc.waitForReady(100), /hearing not ready after 100ms/);

  await proc.stop(100);
  assert.equal(await proc.exited(), null);
  assert.equal(proc.isRunning(), false);
});

test("a process that ignores SIGTERM is killed", async () => {
  const { proc } = spawnMock("stubborn");

  proc.start();
  await proc.waitForReady(5000);
  await proc.stop(50);

  assert.equal(await proc.exited(), null);
});

test("a missing binary fails the wait", async () => {
  const proc = createSenseProcess({
    name: "vision",
    kind: "sense",
    command: ["/nonexistent/sense-binary"],
    onSignal: () => {},
  });

  proc.start();

  await assert.rejects(proc.waitForReady(5000), /vision could not be started/);
  assert.equal(await proc.exited(), null);
});

test("the handle refuses use before start and a second start", async () => {
  const { proc } = spawnMock("ok");

  assert.equal(proc.send("start"), false);
  await assert.rejects(proc.waitForReady(10), /hearing has not been started/);

  proc.start();
  assert.throws(() => proc.start(), /hearing already started/);
  await proc.waitForReady(5000);
  await proc.stop();
});

test("the default command runs the sense entry point through tsx from sources", () => {
  const argv = defaultSenseCommand("screen");

  assert.equal(argv[0], process.execPath);
  assert.deepEqual(argv.slice(1, 3), ["--import", "tsx"]);
  assert.match(argv[3], /senses[\\/]main\.ts$/);
  assert.equal(argv[4], "screen");
});
