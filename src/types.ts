export type RawQuestion = {
  question_text: string;
  options?: string[];
};

// in file order
export type QuestionSet = Map<string, RawQuestion>;

export type SessionState = "created" | "answered" | "finalized";

export type Session = {
  questionId: string;
  question: RawQuestion;
  questionFormatted: string;
  state: SessionState;
  answers: string[];
  finalAnswers?: string[];
  // cleared whenever answers or finalAnswers change
  formattedOutput?: string;
};

export type SessionStore = Map<string, Session>;

export type SamplingConfig = {
  n: number;
  bestOf: number;
  maxTokens: number;
};

export type RoundName = "answers" | "final";

export type SessionView = {
  questionId: string;
  answers: string[];
  finalAnswers: string[];
  transcript: string;
};

export type PromptRequest = {
  user: string[];
  bot: string[];
};
