/**
 * Unit tests for the line-delimited JSON protocol.
 *
 * Run: node --import tsx --test senses/protocol.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { PassThrough } from "stream";

import {
  createProtocolChannel,
  createSignal,
  createStatus,
  encodeSignal,
  encodeStatus,
  parseCommand,
  parseSenseMessage,
  PRIORITY,
} from "./protocol.js";
import type { Command } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

function readLines(stream: PassThrough): string[] {
  const text = stream.read()?.toString("utf-8") ?? "";
  return text.split("\n").filter((line: string) => line.length > 0);
}

// ============================================================================
// TESTS
// ============================================================================

test("signals are frozen and carry a timestamp in seconds", () => {
  const before = Date.now() / 1000;
  const signal = createSignal("hearing", "hello", PRIORITY.VOICE, { language: "en" });

  assert.ok(Object.isFrozen(signal));
  assert.ok(Object.isFrozen(signal.metadata));
  assert.ok(signal.timestamp >= before && signal.timestamp <= Date.now() / 1000);
  assert.equal(signal.priority, 100);
});

test("an encoded signal is one line even when the content has newlines", () => {
  const line = encodeSignal(createSignal("screen", "line one\nline two", PRIORITY.SCREEN));

  assert.ok(line.endsWith("\n"));
  assert.equal(line.split("\n").length, 2);
  const parsed = parseSenseMessage(line);
  assert.ok(parsed && parsed.type === "signal");
  assert.equal(parsed.content, "line one\nline two");
  assert.equal(parsed.sense, "screen");
});

test("status messages round-trip through parseSenseMessage", () => {
  const parsed = parseSenseMessage(encodeStatus(createStatus("voice", "error", "device busy")));

  assert.ok(parsed && parsed.type === "status");
  assert.equal(parsed.status, "error");
  assert.equal(parsed.message, "device busy");
});

test("parseCommand accepts commands with or without a type field", () => {
  assert.deepEqual(parseCommand('{"command":"start"}'), { command: "start", options: {} });
  assert.deepEqual(parseCommand('{"type":"command","command":"configure","options":{"mute":true}}'), {
    command: "configure",
    options: { mute: true },
  });
});

test("parseCommand rejects malformed and unknown lines", () => {
  assert.equal(parseCommand(""), null);
  assert.equal(parseCommand("not json"), null);
  assert.equal(parseCommand('{"command":"dance"}'), null);
  assert.equal(parseCommand('{"type":"signal","command":"start"}'), null);
  assert.equal(parseCommand('{"command":"speak","options":[1,2]}'), null);
  assert.equal(parseCommand("[1,2,3]"), null);
});

test("parseSenseMessage rejects lines that are not signals or statuses", () => {
  assert.equal(parseSenseMessage('{"type":"command","command":"start"}'), null);
  assert.equal(parseSenseMessage('{"type":"status","sense":"x","status":"sleeping","timestamp":1}'), null);
  assert.equal(parseSenseMessage("{"), null);
});

test("the channel writes one line per message", () => {
  const output = new PassThrough();
  const channel = createProtocolChannel({ sense: "vision", input: new PassThrough(), output });

  channel.emitStatus("ready");
  const signal = channel.emitSignal("a person waves", PRIORITY.VISUAL, { diff_score: 0.2 });

  const lines = readLines(output);
  assert.equal(lines.length, 2);
  const status = JSON.parse(lines[0]);
  assert.equal(status.type, "status");
  assert.equal(status.sense, "vision");
  assert.equal(status.status, "ready");
  assert.equal(status.message, "");
  assert.deepEqual(JSON.parse(lines[1]), { type: "signal", ...signal });
});

test("the channel yields commands in order and drops malformed lines", async () => {
  const input = new PassThrough();
  const channel = createProtocolChannel({ sense: "hearing", input, output: new PassThrough() });

  input.end('{"command":"start"}\nnot json\n\n{"command":"configure","options":{"mute":true}}\n{"command":"stop"}\n');

  const received: Command[] = [];
  for await (const command of channel.commands()) received.push(command);

  assert.deepEqual(received.map((c) => c.command), ["start", "configure", "stop"]);
  assert.deepEqual(received[1].options, { mute: true });
});

test("writing to a closed output reports transport loss once", () => {
  const output = new PassThrough();
  output.destroy();
  const lost: string[] = [];
  const channel = createProtocolChannel({
    sense: "voice",
    input: new PassThrough(),
    output,
    onTransportLost: (err) => lost.push(err.message),
  });

  channel.emitStatus("ready");
  channel.emitSignal("ignored", PRIORITY.SYSTEM);

  assert.deepEqual(lost, ["output stream is closed"]);
});
