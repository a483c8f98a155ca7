import { PromptTurnError } from "../errors";

export const BOS = "<s>";
export const EOS = "</s>";
export const INST_START = "[INST]";
export const INST_END = "[/INST]";

// The model sees this string verbatim: markers and single-space joins must not change.
export function buildConversationPrompt(userMessages: readonly string[], botMessages: readonly string[]): string {
  const last = userMessages[userMessages.length - 1];
  if (userMessages.length !== botMessages.length + 1 || last === undefined) {
    throw new PromptTurnError(userMessages.length, botMessages.length);
  }

  const parts: string[] = [BOS];
  botMessages.forEach((botMsg, i) => {
    parts.push(INST_START, userMessages[i] ?? "", INST_END, botMsg, EOS);
  });
  parts.push(INST_START, last, INST_END);

  return parts.join(" ");
}

export class Conversation {
  private userMessages: string[] = [];
  private botMessages: string[] = [];

  constructor(primer?: { user: string; bot: string }) {
    if (primer) this.append(primer.user, primer.bot);
  }

  get userTurns(): number {
    return this.userMessages.length;
  }

  get botTurns(): number {
    return this.botMessages.length;
  }

  promptFor(next: string): string {
    return buildConversationPrompt([...this.userMessages, next], this.botMessages);
  }

  append(user: string, bot: string): void {
    this.userMessages.push(user);
    this.botMessages.push(bot);
  }

  reset(): void {
    this.userMessages = [];
    this.botMessages = [];
  }

  snapshot(): { user: string[]; bot: string[] } {
    return { user: [...this.userMessages], bot: [...this.botMessages] };
  }
}
