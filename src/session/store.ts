import { SessionStateError } from "../errors";
import type { QuestionSet, RawQuestion, Session, SessionState, SessionStore } from "../types";

const ANSWER_INSTRUCTIONS =
  "\n\n Please provide the answer and explain your reasoning!" +
  " If there are options to choose from, do not provide an answer different from the options.\n";

export function formatQuestion(question: RawQuestion): string {
  let out = `QUESTION: ${question.question_text}\n`;
  (question.options ?? []).forEach((option, i) => {
    out += `OPTION ${i}: ${option}\n`;
  });
  return out + ANSWER_INSTRUCTIONS;
}

export function generateSessions(questions: QuestionSet): SessionStore {
  const sessions: SessionStore = new Map();
  for (const [questionId, question] of questions) {
    sessions.set(questionId, {
      questionId,
      question,
      questionFormatted: formatQuestion(question),
      state: "created",
      answers: []
    });
  }
  return sessions;
}

export function assertState(session: Session, expected: SessionState): void {
  if (session.state !== expected) {
    throw new SessionStateError(session.questionId, `expected state ${expected}, found ${session.state}`);
  }
}

export function attachAnswers(session: Session, answers: string[]): void {
  assertState(session, "created");
  session.answers = answers;
  session.state = "answered";
  session.formattedOutput = undefined;
}

export function attachFinalAnswers(session: Session, finalAnswers: string[]): void {
  assertState(session, "answered");
  session.finalAnswers = finalAnswers;
  session.state = "finalized";
  session.formattedOutput = undefined;
}
