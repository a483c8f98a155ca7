import type { Session, SessionStore, SessionView } from "../types";

function delimiter(label: string, width: number): string {
  const rule = "-".repeat(width);
  return `${rule}[${label}]${rule}`;
}

export function renderTranscript(session: Session): string {
  let out = `${session.questionFormatted}\n\n\n`;
  session.answers.forEach((answer, i) => {
    out += `${delimiter(`ANSWER ${i}`, 45)}\n${answer}\n\n\n`;
  });
  for (const finalAnswer of session.finalAnswers ?? []) {
    out += `${delimiter("FINAL ANSWER", 43)}\n${finalAnswer}\n\n\n`;
  }
  return out;
}

export function formatSessionOutputs(sessions: SessionStore): void {
  for (const session of sessions.values()) {
    session.formattedOutput = renderTranscript(session);
  }
}

export function toSessionViews(sessions: SessionStore): SessionView[] {
  return [...sessions.values()].map((s) => ({
    questionId: s.questionId,
    answers: [...s.answers],
    finalAnswers: [...(s.finalAnswers ?? [])],
    transcript: s.formattedOutput ?? renderTranscript(s)
  }));
}
