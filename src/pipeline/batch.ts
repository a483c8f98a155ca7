import { answerBatchQuestions, answerBatchQuestionsFinal } from "../llm/answerer";
import type { InferenceEngine } from "../llm/engine";
import { loadQuestions } from "../questions";
import { formatSessionOutputs } from "../session/format";
import { saveSessions } from "../session/persist";
import { generateSessions } from "../session/store";
import type { QuestionSet, RoundName, SamplingConfig, SessionStore } from "../types";
import { safeLog } from "../utils/redact";

export type PipelineOptions = {
  answerSampling: SamplingConfig;
  finalSampling: SamplingConfig;
  signal?: AbortSignal;
  // runs after each round's transcripts are rendered
  onRound?: (round: RoundName, sessions: SessionStore) => Promise<void> | void;
};

export async function runAnswerPipeline(
  engine: InferenceEngine,
  questions: QuestionSet,
  options: PipelineOptions
): Promise<SessionStore> {
  const sessions = generateSessions(questions);

  options.signal?.throwIfAborted();
  await answerBatchQuestions(engine, sessions, options.answerSampling);
  formatSessionOutputs(sessions);
  await options.onRound?.("answers", sessions);

  options.signal?.throwIfAborted();
  await answerBatchQuestionsFinal(engine, sessions, options.finalSampling);
  formatSessionOutputs(sessions);
  await options.onRound?.("final", sessions);

  return sessions;
}

export type BatchIterationOptions = {
  questionsFile: string;
  answersFile: string;
  finalAnswersFile: string;
  answerSampling: SamplingConfig;
  finalSampling: SamplingConfig;
  signal?: AbortSignal;
};

export async function runBatchIteration(
  engine: InferenceEngine,
  options: BatchIterationOptions
): Promise<SessionStore> {
  const questions = await loadQuestions(options.questionsFile);
  safeLog("[batch] loaded questions", { file: options.questionsFile, count: questions.size });

  return runAnswerPipeline(engine, questions, {
    answerSampling: options.answerSampling,
    finalSampling: options.finalSampling,
    signal: options.signal,
    onRound: async (round, sessions) => {
      const file = round === "answers" ? options.answersFile : options.finalAnswersFile;
      await saveSessions(sessions, file);
      safeLog("[batch] saved", { round, file });
    }
  });
}

/**
 * Repeats iterations while `waitForStart` resolves true. The signal is
 * checked before each iteration and before each round inside it.
 */
export async function runBatchLoop(
  engine: InferenceEngine,
  options: BatchIterationOptions & { waitForStart: () => Promise<boolean> }
): Promise<number> {
  let iterations = 0;
  while (!options.signal?.aborted) {
    const start = await options.waitForStart();
    if (!start || options.signal?.aborted) break;
    await runBatchIteration(engine, options);
    iterations++;
  }
  return iterations;
}
