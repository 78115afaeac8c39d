// Synthesis stage: (input, execution result) -> answer text, whole or streamed.
// Both modes go through buildPrompt so their answers match for the same inputs.

import type { InferenceClient } from '../inference.js';
import { buildSynthesisPrompt, NO_TOOL_RESULTS } from './prompts.js';
import type { ExecutionResult } from './types.js';

export function serializeResults(results: ExecutionResult): string {
  if (Object.keys(results).length === 0) return NO_TOOL_RESULTS;
  return JSON.stringify(results, null, 2);
}

export class Synthesizer {
  constructor(
    private inference: InferenceClient,
    private temperature: number = 0.3,
  ) {}

  buildPrompt(userInput: string, results: ExecutionResult): string {
    return buildSynthesisPrompt(userInput, serializeResults(results));
  }

  synthesize(userInput: string, results: ExecutionResult): Promise<string> {
    return this.inference.complete(this.buildPrompt(userInput, results), this.temperature);
  }

  synthesizeStreaming(userInput: string, results: ExecutionResult, signal?: AbortSignal): AsyncGenerator<string> {
    return this.inference.completeStreaming(this.buildPrompt(userInput, results), this.temperature, signal);
  }
}
