export class PromptTurnError extends Error {
  readonly userTurns: number;
  readonly botTurns: number;

  constructor(userTurns: number, botTurns: number) {
    super(
      `Expected exactly one more user message than bot messages, got ${userTurns} user and ${botTurns} bot`
    );
    this.name = "PromptTurnError";
    this.userTurns = userTurns;
    this.botTurns = botTurns;
  }
}

export class QuestionFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QuestionFileError";
  }
}

export class SessionStateError extends Error {
  readonly questionId: string;

  constructor(questionId: string, message: string) {
    super(`Session ${questionId}: ${message}`);
    this.name = "SessionStateError";
    this.questionId = questionId;
  }
}

export class EngineResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineResponseError";
  }
}

export class HttpError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string, body: string) {
    super(`HTTP ${status} ${statusText}: ${body.slice(0, 4000)}`);
    this.name = "HttpError";
    this.status = status;
  }
}
