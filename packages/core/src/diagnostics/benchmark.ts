import type { BackendClient } from "../backend.js";
import { BENCHMARK_PROMPT, BENCHMARK_TIMEOUT_MS } from "../constants.js";
import { FerryError, errorMessage } from "../errors.js";
import { previewText } from "./connectivity.js";

export interface BenchmarkResult {
  model: string;
  prompt: string;
  elapsedMs: number;
  words: number;
  wordsPerSecond: number;
  /** Only when the backend reports eval_count and eval_duration. */
  tokensPerSecond?: number;
  preview: string;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

export function tokensPerSecond(evalCount: number | undefined, evalDurationNs: number | undefined): number | undefined {
  if (evalCount === undefined || evalDurationNs === undefined || evalDurationNs <= 0) {
    return undefined;
  }
  return evalCount / (evalDurationNs / 1e9);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export async function runBenchmark(
  backend: Pick<BackendClient, "generate">,
  options: {
    model: string;
    prompt?: string;
    timeoutMs?: number;
    now?: () => number;
  }
): Promise<BenchmarkResult> {
  const prompt = options.prompt ?? BENCHMARK_PROMPT;
  const now = options.now ?? (() => performance.now());
  const startedAt = now();

  let text: string;
  let evalCount: number | undefined;
  let evalDuration: number | undefined;
  try {
    const generated = await backend.generate({
      model: options.model,
      prompt,
      timeoutMs: options.timeoutMs ?? BENCHMARK_TIMEOUT_MS
    });
    text = generated.response;
    evalCount = generated.eval_count;
    evalDuration = generated.eval_duration;
  } catch (error) {
    throw new FerryError("benchmark_failed", `Benchmark failed: ${errorMessage(error)}`, { cause: error });
  }

  const elapsedMs = Math.max(1, Math.round(now() - startedAt));
  const words = countWords(text);
  const tokens = tokensPerSecond(evalCount, evalDuration);
  return {
    model: options.model,
    prompt,
    elapsedMs,
    words,
    wordsPerSecond: round2(words / (elapsedMs / 1000)),
    tokensPerSecond: tokens === undefined ? undefined : round2(tokens),
    preview: previewText(text)
  };
}
