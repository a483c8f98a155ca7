import { createInterface, type Interface } from "node:readline/promises";

export interface ChatIO {
  // one turn: lines up to a blank line; null once input has ended
  readTurn(label: string, signal: AbortSignal): Promise<string | null>;
  write(text: string): void;
  onInterrupt(handler: () => void): () => void;
}

export class TerminalChatIO implements ChatIO {
  private readonly rl: Interface;
  // lines that arrived while nobody was reading
  private readonly pending: string[] = [];
  private ended = false;
  private wake?: () => void;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on("line", (line) => {
      this.pending.push(line);
      this.wake?.();
    });
    this.rl.once("close", () => {
      this.ended = true;
      this.wake?.();
    });
  }

  private nextLine(signal: AbortSignal): Promise<string | null> {
    const queued = this.pending.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(null);
    if (signal.aborted) return Promise.reject(signal.reason);

    return new Promise((resolve, reject) => {
      const settle = () => {
        this.wake = undefined;
        signal.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        settle();
        reject(signal.reason);
      };
      this.wake = () => {
        settle();
        resolve(this.pending.shift() ?? null);
      };
      signal.addEventListener("abort", onAbort, { once: true });
    });
  }

  private showPrompt(label: string): void {
    if (this.ended) return;
    this.rl.setPrompt(label);
    this.rl.prompt();
    this.rl.setPrompt("");
  }

  async readLine(label: string, signal: AbortSignal): Promise<string | null> {
    this.showPrompt(label);
    return this.nextLine(signal);
  }

  // false once input ends or the signal aborts
  async waitForEnter(label: string, signal: AbortSignal): Promise<boolean> {
    try {
      return (await this.readLine(label, signal)) !== null;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }

  async readTurn(label: string, signal: AbortSignal): Promise<string | null> {
    this.showPrompt(label);
    const lines: string[] = [];
    for (;;) {
      const line = await this.nextLine(signal);
      if (line === null) return lines.length ? lines.join("\n") : null;
      if (line === "") break;
      lines.push(line);
    }
    return lines.join("\n");
  }

  write(text: string): void {
    this.output.write(`${text}\n`);
  }

  onInterrupt(handler: () => void): () => void {
    this.rl.on("SIGINT", handler);
    return () => {
      this.rl.off("SIGINT", handler);
    };
  }

  close(): void {
    if (!this.ended) this.rl.close();
  }
}
