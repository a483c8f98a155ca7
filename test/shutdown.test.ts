import test from "node:test";
import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import { createStopHandle } from "../src/utils/shutdown";

test("first SIGTERM aborts the signal, the second exits", () => {
  const emitter = new EventEmitter();
  const exits: number[] = [];
  const { signal } = createStopHandle(emitter, (code) => exits.push(code));

  emitter.emit("SIGTERM");
  assert.equal(signal.aborted, true);
  assert.deepEqual(exits, []);

  emitter.emit("SIGTERM");
  assert.deepEqual(exits, [143]);
});

test("stop() behaves like a SIGTERM", () => {
  const exits: number[] = [];
  const { signal, stop } = createStopHandle(new EventEmitter(), (code) => exits.push(code));

  stop();
  assert.equal(signal.aborted, true);
  stop();
  assert.deepEqual(exits, [143]);
});
