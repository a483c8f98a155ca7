import type { SamplingConfig } from "./types";
import { getEnv, getIntEnv } from "./utils/env";

export type AppConfig = {
  engine: {
    baseUrl: string;
    model: string;
    apiKey?: string;
    timeoutMs: number;
    chatTimeoutMs: number;
  };
  files: {
    questions: string;
    answers: string;
    finalAnswers: string;
  };
  sampling: {
    answers: SamplingConfig;
    final: SamplingConfig;
    chat: SamplingConfig;
  };
  chatPrimer?: { user: string; bot: string };
  server: { host: string; port: number };
};

function primerFromEnv(): AppConfig["chatPrimer"] {
  const user = getEnv("CHAT_PRIMER_USER");
  const bot = getEnv("CHAT_PRIMER_BOT");
  if (!user || !bot) return undefined;
  return { user, bot };
}

export function loadConfig(): AppConfig {
  const maxTokens = getIntEnv("MAX_TOKENS", 1024);
  return {
    engine: {
      baseUrl: getEnv("VLLM_BASE_URL") ?? "http://127.0.0.1:8000",
      model: getEnv("VLLM_MODEL") ?? "mistralai/Mixtral-8x7B-Instruct-v0.1",
      apiKey: getEnv("VLLM_API_KEY"),
      timeoutMs: getIntEnv("ENGINE_TIMEOUT_MS", 0),
      chatTimeoutMs: getIntEnv("CHAT_TIMEOUT_MS", 0)
    },
    files: {
      questions: getEnv("QUESTIONS_FILE") ?? "questions.json",
      answers: getEnv("ANSWERS_FILE") ?? "answers.txt",
      finalAnswers: getEnv("FINAL_ANSWERS_FILE") ?? "answers_final.txt"
    },
    sampling: {
      answers: { n: getIntEnv("ANSWER_N", 7), bestOf: getIntEnv("ANSWER_BEST_OF", 10), maxTokens },
      final: { n: getIntEnv("FINAL_N", 1), bestOf: getIntEnv("FINAL_BEST_OF", 3), maxTokens },
      chat: {
        n: getIntEnv("CHAT_N", 1),
        bestOf: getIntEnv("CHAT_BEST_OF", 5),
        maxTokens: getIntEnv("CHAT_MAX_TOKENS", 512)
      }
    },
    chatPrimer: primerFromEnv(),
    server: {
      host: getEnv("HOST") ?? "0.0.0.0",
      port: getIntEnv("PORT", 3000)
    }
  };
}
