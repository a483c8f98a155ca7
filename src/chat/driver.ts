import type { InferenceEngine } from "../llm/engine";
import { Conversation } from "../prompt/conversation";
import { EngineResponseError } from "../errors";
import type { SamplingConfig } from "../types";
import type { ChatIO } from "./io";
import { BOT_LABEL, USER_LABEL } from "./style";

export const CLEAR_TOKEN = "CLEAR";
export const EXIT_TOKEN = "EXIT";
export const DEFAULT_CHAT_SAMPLING: SamplingConfig = { n: 1, bestOf: 5, maxTokens: 512 };

export type TurnOutcome = "cleared" | "exit" | "replied";

export type ChatDriverOptions = {
  sampling?: SamplingConfig;
  primer?: { user: string; bot: string };
};

export class ChatDriver {
  readonly conversation: Conversation;
  private readonly sampling: SamplingConfig;

  constructor(
    private readonly engine: InferenceEngine,
    private readonly io: ChatIO,
    options: ChatDriverOptions = {}
  ) {
    this.sampling = options.sampling ?? DEFAULT_CHAT_SAMPLING;
    this.conversation = new Conversation(options.primer);
  }

  // the user turn is only committed together with its reply
  async handleInput(input: string, signal?: AbortSignal): Promise<TurnOutcome> {
    if (input.includes(CLEAR_TOKEN)) {
      this.conversation.reset();
      this.io.write("Conversation cleared");
      return "cleared";
    }
    if (input.includes(EXIT_TOKEN)) {
      this.io.write("Exiting...");
      return "exit";
    }

    const prompt = this.conversation.promptFor(input);
    const [candidates] = await this.engine.generate([prompt], this.sampling, { signal });
    const reply = candidates?.[0];
    if (reply === undefined) throw new EngineResponseError("Engine returned no candidate for the chat turn");

    this.io.write(`\n\n${BOT_LABEL} [${this.conversation.botTurns}]: ${reply}`);
    this.conversation.append(input, reply);
    return "replied";
  }

  // a stop also cancels the pending read or generation
  async run(stop?: AbortSignal): Promise<void> {
    while (!stop?.aborted) {
      const turn = new AbortController();
      const unsubscribe = this.io.onInterrupt(() => turn.abort());
      const onStop = () => turn.abort(stop?.reason);
      stop?.addEventListener("abort", onStop, { once: true });
      try {
        const input = await this.io.readTurn(`\n\n${USER_LABEL} [${this.conversation.userTurns}]: `, turn.signal);
        if (input === null) return;
        if ((await this.handleInput(input, turn.signal)) === "exit") return;
      } catch (err) {
        if (!turn.signal.aborted) throw err;
        if (stop?.aborted) return;
        this.io.write("Keyboard interrupt caught. Type CLEAR to clear the conversation or EXIT to exit the program.");
      } finally {
        unsubscribe();
        stop?.removeEventListener("abort", onStop);
      }
    }
  }
}
