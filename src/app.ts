import { randomUUID } from "node:crypto";
import express from "express";
import type { AppConfig } from "./config";
import { PromptTurnError } from "./errors";
import type { InferenceEngine } from "./llm/engine";
import { runAnswerPipeline } from "./pipeline/batch";
import { buildConversationPrompt } from "./prompt/conversation";
import { parseQuestionText } from "./questions";
import { toSessionViews } from "./session/format";
import { renderSessionFile } from "./session/persist";
import type { PromptRequest, QuestionSet } from "./types";
import { getVersion } from "./utils/env";
import { errorMessage, safeLog } from "./utils/redact";

export type AppDeps = {
  engine: InferenceEngine;
  config: Pick<AppConfig, "sampling">;
};

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

export function createApp({ engine, config }: AppDeps) {
  const app = express();
  const json = express.json({ limit: "5mb" });
  // kept as text so question ids keep their order
  const rawJson = express.text({ type: "application/json", limit: "5mb" });

  app.get("/api/config", (_req, res) => {
    res.json({
      model: engine.model,
      sampling: config.sampling
    });
  });

  app.post("/api/prompt", json, (req, res) => {
    const body = req.body as Partial<PromptRequest>;
    if (!isStringList(body.user) || !isStringList(body.bot)) {
      return res.status(400).json({
        error: { code: "BAD_REQUEST", message: "user and bot must be lists of strings" }
      });
    }

    try {
      return res.json({ prompt: buildConversationPrompt(body.user, body.bot) });
    } catch (err) {
      if (!(err instanceof PromptTurnError)) throw err;
      return res.status(400).json({ error: { code: "BAD_TURNS", message: err.message } });
    }
  });

  app.post("/api/batch", rawJson, async (req, res) => {
    const batchId = randomUUID();
    const body: unknown = req.body;
    if (typeof body !== "string") {
      return res.status(400).json({
        batchId,
        error: { code: "BAD_REQUEST", message: "expected an application/json body" }
      });
    }

    let questions: QuestionSet;
    try {
      questions = parseQuestionText(body, { source: "request body", path: ["questions"] });
    } catch (err) {
      return res.status(400).json({ batchId, error: { code: "BAD_REQUEST", message: errorMessage(err) } });
    }

    safeLog("[/api/batch] request", { batchId, questions: questions.size });

    res.status(200);
    res.setHeader("Content-Type", "application/x-ndjson; charset=utf-8");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.setHeader("X-Accel-Buffering", "no");
    res.flushHeaders();

    let closed = false;
    res.on("close", () => {
      closed = true;
    });

    const writeEvent = (payload: unknown) => {
      if (closed || res.writableEnded) return;
      res.write(`${JSON.stringify(payload)}\n`);
    };

    try {
      await runAnswerPipeline(engine, questions, {
        answerSampling: config.sampling.answers,
        finalSampling: config.sampling.final,
        onRound: (round, sessions) => {
          writeEvent({
            type: round,
            data: { batchId, sessions: toSessionViews(sessions), document: renderSessionFile(sessions) }
          });
        }
      });
    } catch (err) {
      const payload = { batchId, error: { code: "ENGINE_FAILED", message: errorMessage(err) } };
      safeLog("[/api/batch] failed", payload);
      writeEvent({ type: "error", data: payload });
    }
    res.end();
  });

  app.get("/", (_req, res) => {
    res.type("text").send(`instruct-consensus ${getVersion()} (model=${engine.model})`);
  });

  return app;
}
