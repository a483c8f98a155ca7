import { EngineResponseError } from "../errors";
import type { SamplingConfig } from "../types";
import { safeLog } from "../utils/redact";
import type { GenerateOptions, InferenceEngine } from "./engine";
import { postJson } from "./http";

type CompletionResponse = {
  choices?: Array<{ index?: number; text?: string }>;
};

export type VllmEngineOptions = {
  baseUrl: string;
  model: string;
  apiKey?: string;
  timeoutMs: number;
};

function groupChoices(data: CompletionResponse, promptCount: number, n: number): string[][] {
  const choices = data.choices ?? [];
  if (choices.length !== promptCount * n) {
    throw new EngineResponseError(`Expected ${promptCount * n} choices for ${promptCount} prompts, got ${choices.length}`);
  }

  const slots = new Array<string | undefined>(promptCount * n);
  choices.forEach((choice, position) => {
    // batched choices are numbered promptIndex * n + sampleIndex
    const index = typeof choice.index === "number" ? choice.index : position;
    if (!Number.isInteger(index) || index < 0 || index >= slots.length) {
      throw new EngineResponseError(`Choice index ${index} is out of range`);
    }
    if (slots[index] !== undefined) throw new EngineResponseError(`Choice index ${index} appears more than once`);
    slots[index] = typeof choice.text === "string" ? choice.text : "";
  });

  const grouped: string[][] = [];
  for (let p = 0; p < promptCount; p++) {
    const row: string[] = [];
    for (let j = 0; j < n; j++) {
      const text = slots[p * n + j];
      if (text === undefined) throw new EngineResponseError(`No choice for prompt ${p} sample ${j}`);
      row.push(text);
    }
    grouped.push(row);
  }
  return grouped;
}

export function createVllmEngine(options: VllmEngineOptions): InferenceEngine {
  const url = `${options.baseUrl.replace(/\/+$/, "")}/v1/completions`;
  const headers: Record<string, string> = options.apiKey ? { authorization: `Bearer ${options.apiKey}` } : {};

  return {
    model: options.model,
    async generate(prompts: string[], sampling: SamplingConfig, generateOptions?: GenerateOptions) {
      if (prompts.length === 0) return [];

      const body = {
        model: options.model,
        prompt: prompts,
        n: sampling.n,
        best_of: sampling.bestOf,
        max_tokens: sampling.maxTokens
      };

      const { data, latencyMs } = await postJson<CompletionResponse>(
        url,
        body,
        headers,
        options.timeoutMs,
        generateOptions?.signal
      );
      safeLog("[vllm] completed", { prompts: prompts.length, n: sampling.n, latencyMs });

      return groupChoices(data, prompts.length, sampling.n);
    }
  };
}
