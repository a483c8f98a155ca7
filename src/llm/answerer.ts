import { EngineResponseError, SessionStateError } from "../errors";
import { buildConversationPrompt } from "../prompt/conversation";
import { assertState, attachAnswers, attachFinalAnswers } from "../session/store";
import type { SamplingConfig, Session, SessionStore } from "../types";
import { safeLog } from "../utils/redact";
import type { InferenceEngine } from "./engine";

export const DEFAULT_ANSWER_SAMPLING: SamplingConfig = { n: 7, bestOf: 10, maxTokens: 1024 };
export const DEFAULT_FINAL_SAMPLING: SamplingConfig = { n: 1, bestOf: 3, maxTokens: 1024 };

const FINAL_ANSWER_INSTRUCTIONS =
  "Please provide the CORRECT final answer based on the question and the independent answers above. Explain why please!\n";

export function finalAnswerPrompt(transcript: string): string {
  return `${transcript}\n${"~".repeat(10)}\n\n${FINAL_ANSWER_INSTRUCTIONS}`;
}

async function generateForSessions(
  engine: InferenceEngine,
  sessions: Session[],
  prompts: string[],
  sampling: SamplingConfig
): Promise<string[][]> {
  const results = await engine.generate(prompts, sampling);
  if (results.length !== sessions.length) {
    throw new EngineResponseError(`Engine returned ${results.length} results for ${sessions.length} prompts`);
  }
  return results;
}

/** Round 1: sample `sampling.n` independent answers per question in one batched call. */
export async function answerBatchQuestions(
  engine: InferenceEngine,
  sessions: SessionStore,
  sampling: SamplingConfig = DEFAULT_ANSWER_SAMPLING
): Promise<void> {
  const list = [...sessions.values()];
  list.forEach((s) => assertState(s, "created"));

  const prompts = list.map((s) => buildConversationPrompt([s.questionFormatted], []));

  safeLog("[batch] generating answers", { questions: list.length, sampling });
  const results = await generateForSessions(engine, list, prompts, sampling);
  list.forEach((session, i) => attachAnswers(session, results[i] ?? []));
}

/**
 * Round 2: ask for the correct answer given the question and the round-1
 * answers. Each session's transcript must already be rendered.
 */
export async function answerBatchQuestionsFinal(
  engine: InferenceEngine,
  sessions: SessionStore,
  sampling: SamplingConfig = DEFAULT_FINAL_SAMPLING
): Promise<void> {
  const list = [...sessions.values()];
  const prompts = list.map((s) => {
    assertState(s, "answered");
    if (s.formattedOutput === undefined) {
      throw new SessionStateError(s.questionId, "transcript must be rendered before the final round");
    }
    return buildConversationPrompt([finalAnswerPrompt(s.formattedOutput)], []);
  });

  safeLog("[batch] generating final answers", { questions: list.length, sampling });
  const results = await generateForSessions(engine, list, prompts, sampling);
  list.forEach((session, i) => attachFinalAnswers(session, results[i] ?? []));
}
