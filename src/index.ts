#!/usr/bin/env node
import { createApp } from "./app";
import { ChatDriver } from "./chat/driver";
import { TerminalChatIO } from "./chat/io";
import { loadConfig, type AppConfig } from "./config";
import { createVllmEngine } from "./llm/vllm";
import { runBatchIteration, runBatchLoop, type BatchIterationOptions } from "./pipeline/batch";
import { getVersion, loadDotEnv } from "./utils/env";
import { createStopHandle } from "./utils/shutdown";
import { errorMessage, safeLog } from "./utils/redact";

type Mode = "batch" | "chat" | "serve";

function parseMode(arg: string | undefined): Mode {
  if (arg === undefined || arg === "batch") return "batch";
  if (arg === "chat" || arg === "serve") return arg;
  throw new Error(`Unknown mode "${arg}" (expected batch, chat or serve)`);
}

async function runBatch(config: AppConfig, once: boolean): Promise<void> {
  const engine = createVllmEngine({ ...config.engine });
  const { signal, stop } = createStopHandle();
  const options: BatchIterationOptions = {
    questionsFile: config.files.questions,
    answersFile: config.files.answers,
    finalAnswersFile: config.files.finalAnswers,
    answerSampling: config.sampling.answers,
    finalSampling: config.sampling.final,
    signal
  };

  if (once) {
    await runBatchIteration(engine, options);
    return;
  }

  const io = new TerminalChatIO();
  const unsubscribe = io.onInterrupt(stop);
  try {
    await runBatchLoop(engine, {
      ...options,
      waitForStart: () => io.waitForEnter("Press enter to start answering questions...", signal)
    });
  } finally {
    unsubscribe();
    io.close();
  }
}

async function runChat(config: AppConfig): Promise<void> {
  const engine = createVllmEngine({ ...config.engine, timeoutMs: config.engine.chatTimeoutMs });
  const io = new TerminalChatIO();
  const driver = new ChatDriver(engine, io, { sampling: config.sampling.chat, primer: config.chatPrimer });
  try {
    await driver.run(createStopHandle().signal);
  } finally {
    io.close();
  }
}

function runServe(config: AppConfig): void {
  const app = createApp({ engine: createVllmEngine({ ...config.engine }), config });
  const { host, port } = config.server;
  app.listen(port, host, () => {
    safeLog("[serve] listening", { host, port, model: config.engine.model, version: getVersion() });
  });
}

async function main(argv: string[]): Promise<void> {
  loadDotEnv();
  const config = loadConfig();
  const mode = parseMode(argv.find((a) => !a.startsWith("--")));

  if (mode === "serve") return runServe(config);
  if (mode === "chat") return runChat(config);
  return runBatch(config, argv.includes("--once"));
}

main(process.argv.slice(2)).catch((err: unknown) => {
  safeLog("[main] failed", { error: errorMessage(err) });
  process.exitCode = 1;
});
