import test from "node:test";
import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import { ChatDriver, DEFAULT_CHAT_SAMPLING } from "../src/chat/driver";
import { TerminalChatIO, type ChatIO } from "../src/chat/io";
import { BOT_LABEL, USER_LABEL } from "../src/chat/style";
import { FakeEngine, HangingEngine } from "./helpers/fakeEngine";

const INTERRUPT_NOTICE = "Keyboard interrupt caught. Type CLEAR to clear the conversation or EXIT to exit the program.";

class ScriptedIO implements ChatIO {
  readonly labels: string[] = [];
  readonly output: string[] = [];
  private handlers = new Set<() => void>();

  constructor(private readonly inputs: Array<string | null>) {}

  async readTurn(label: string): Promise<string | null> {
    this.labels.push(label);
    return this.inputs.length ? (this.inputs.shift() ?? null) : null;
  }

  write(text: string): void {
    this.output.push(text);
  }

  onInterrupt(handler: () => void): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  interrupt(): void {
    for (const handler of this.handlers) handler();
  }
}

// read never completes on its own; it rejects when the turn signal aborts
class BlockedReadIO implements ChatIO {
  reads = 0;
  readonly output: string[] = [];

  constructor(private readonly onRead: () => void) {}

  readTurn(_label: string, signal: AbortSignal): Promise<string | null> {
    this.reads++;
    return new Promise((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(signal.reason), { once: true });
      this.onRead();
    });
  }

  write(text: string): void {
    this.output.push(text);
  }

  onInterrupt(): () => void {
    return () => {};
  }
}

function terminal() {
  const input = new PassThrough();
  const output = new PassThrough();
  let written = "";
  output.on("data", (chunk: Buffer) => {
    written += chunk.toString("utf8");
  });
  return { io: new TerminalChatIO(input, output), input, written: () => written };
}

function countingEngine() {
  let replies = 0;
  return new FakeEngine(() => [`reply ${replies++}`]);
}

test("each turn resends the whole history and records the reply", async () => {
  const engine = countingEngine();
  const io = new ScriptedIO(["Hi", "How are you?\nsecond line", "EXIT"]);
  const driver = new ChatDriver(engine, io);

  await driver.run();

  assert.deepEqual(
    engine.calls.map((c) => c.prompts),
    [["<s> [INST] Hi [/INST]"], ["<s> [INST] Hi [/INST] reply 0 </s> [INST] How are you?\nsecond line [/INST]"]]
  );
  assert.deepEqual(engine.calls[0]?.sampling, DEFAULT_CHAT_SAMPLING);
  assert.deepEqual(driver.conversation.snapshot(), {
    user: ["Hi", "How are you?\nsecond line"],
    bot: ["reply 0", "reply 1"]
  });
  assert.deepEqual(io.output, [`\n\n${BOT_LABEL} [0]: reply 0`, `\n\n${BOT_LABEL} [1]: reply 1`, "Exiting..."]);
  assert.deepEqual(io.labels, [0, 1, 2].map((n) => `\n\n${USER_LABEL} [${n}]: `));
});

test("CLEAR anywhere in the input empties the history, primer included", async () => {
  const engine = countingEngine();
  const io = new ScriptedIO(["please CLEAR this", "Hi"]);
  const driver = new ChatDriver(engine, io, { primer: { user: "Be brief.", bot: "Sure." } });

  await driver.run();

  assert.equal(io.labels[0], `\n\n${USER_LABEL} [1]: `);
  assert.deepEqual(engine.calls[0]?.prompts, ["<s> [INST] Hi [/INST]"]);
  assert.deepEqual(driver.conversation.snapshot(), { user: ["Hi"], bot: ["reply 0"] });
  assert.equal(io.output[0], "Conversation cleared");
});

test("CLEAR wins over EXIT in the same input", async () => {
  const driver = new ChatDriver(countingEngine(), new ScriptedIO([]));
  assert.equal(await driver.handleInput("EXIT and CLEAR"), "cleared");
  assert.equal(await driver.handleInput("time to EXIT"), "exit");
});

test("an interrupt during generation is reported and leaves the history intact", async () => {
  const io = new ScriptedIO(["Hi", null]);
  const engine = new HangingEngine(() => queueMicrotask(() => io.interrupt()));
  const driver = new ChatDriver(engine, io, { primer: { user: "Be brief.", bot: "Sure." } });

  await driver.run();

  assert.equal(engine.calls, 1);
  assert.deepEqual(io.output, [INTERRUPT_NOTICE]);
  assert.deepEqual(driver.conversation.snapshot(), { user: ["Be brief."], bot: ["Sure."] });
  assert.deepEqual(io.labels, [`\n\n${USER_LABEL} [1]: `, `\n\n${USER_LABEL} [1]: `]);
});

test("engine failures that are not interrupts end the loop", async () => {
  const io = new ScriptedIO(["Hi"]);
  const driver = new ChatDriver(
    new FakeEngine(() => {
      throw new Error("engine down");
    }),
    io
  );

  await assert.rejects(driver.run(), { message: "engine down" });
  assert.deepEqual(driver.conversation.snapshot(), { user: [], bot: [] });
});

test("a stopped driver reads nothing", async () => {
  const io = new ScriptedIO(["Hi"]);
  const controller = new AbortController();
  controller.abort();

  await new ChatDriver(countingEngine(), io).run(controller.signal);

  assert.deepEqual(io.labels, []);
});

test("an empty candidate list is an engine error", async () => {
  const driver = new ChatDriver(new FakeEngine(() => []), new ScriptedIO([]));
  await assert.rejects(driver.handleInput("Hi"), { name: "EngineResponseError" });
});

test("stopping while waiting for input ends the loop without an interrupt notice", async () => {
  const stop = new AbortController();
  const io = new BlockedReadIO(() => queueMicrotask(() => stop.abort()));

  await new ChatDriver(countingEngine(), io).run(stop.signal);

  assert.equal(io.reads, 1);
  assert.deepEqual(io.output, []);
});

test("stopping during generation cancels the call and keeps the history", async () => {
  const stop = new AbortController();
  const io = new ScriptedIO(["Hi", "never read"]);
  const engine = new HangingEngine(() => queueMicrotask(() => stop.abort()));
  const driver = new ChatDriver(engine, io);

  await driver.run(stop.signal);

  assert.equal(engine.calls, 1);
  assert.deepEqual(io.output, []);
  assert.equal(io.labels.length, 1);
  assert.deepEqual(driver.conversation.snapshot(), { user: [], bot: [] });
});

test("terminal turns keep every line of input that arrives in one chunk", async () => {
  const { io, input, written } = terminal();
  const signal = new AbortController().signal;

  const first = io.readTurn("you: ", signal);
  input.write("line one\nline two\n\nsecond turn\n\n");

  assert.equal(await first, "line one\nline two");
  assert.equal(await io.readTurn("you: ", signal), "second turn");
  await new Promise((resolve) => setImmediate(resolve));
  assert.equal(written(), "you: you: ");

  input.end();
  assert.equal(await io.readTurn("you: ", signal), null);
  io.close();
});

test("terminal input typed ahead of the read is kept", async () => {
  const { io, input } = terminal();
  input.write("early\n\n");
  await new Promise((resolve) => setImmediate(resolve));

  assert.equal(await io.readTurn("", new AbortController().signal), "early");
  io.close();
});

test("terminal input ending without a blank line returns the partial turn", async () => {
  const { io, input } = terminal();
  const turn = io.readTurn("", new AbortController().signal);
  input.end("last words");

  assert.equal(await turn, "last words");
  assert.equal(await io.readTurn("", new AbortController().signal), null);
});

test("an aborted terminal read rejects and later lines go to the next read", async () => {
  const { io, input } = terminal();
  const controller = new AbortController();

  const turn = io.readTurn("", controller.signal);
  controller.abort();
  await assert.rejects(turn, { name: "AbortError" });

  input.write("after\n\n");
  assert.equal(await io.readTurn("", new AbortController().signal), "after");
  io.close();
});

test("waitForEnter is false once stopped or once input ends", async () => {
  const { io, input } = terminal();

  const started = io.waitForEnter("Press enter...", new AbortController().signal);
  input.write("\n");
  assert.equal(await started, true);

  const controller = new AbortController();
  const stopped = io.waitForEnter("Press enter...", controller.signal);
  controller.abort();
  assert.equal(await stopped, false);

  input.end();
  assert.equal(await io.waitForEnter("Press enter...", new AbortController().signal), false);
});
