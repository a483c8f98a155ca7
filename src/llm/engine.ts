import type { SamplingConfig } from "../types";

export type GenerateOptions = {
  signal?: AbortSignal;
};

// One result per prompt, in request order; callers match results to prompts by position.
export interface InferenceEngine {
  readonly model: string;
  generate(prompts: string[], sampling: SamplingConfig, options?: GenerateOptions): Promise<string[][]>;
}
