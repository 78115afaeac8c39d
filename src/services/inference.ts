/**
 * Inference Client
 * The only path from the agent to the language model, in whole-response and
 * incremental modes.
 */

import type { Provider, ProviderMessage } from '../providers/types.js';
import { InferenceError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const log = getLogger('inference');

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful financial and web search assistant. Always give the specific numerical values, ' +
  'dates and percentages present in the data you are given. Never write placeholders such as "$." or ' +
  'incomplete dates.';

export interface InferenceClientOptions {
  provider: Provider;
  model: string;
  maxTokens?: number;
  systemPrompt?: string;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    const status = error.status;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

function toInferenceError(error: unknown, providerName: string): InferenceError {
  if (error instanceof InferenceError) return error;
  const status = readStatus(error);
  const detail = error instanceof Error ? error.message : String(error);
  return new InferenceError(
    status ? `${providerName} returned ${status}: ${detail}` : `${providerName} request failed: ${detail}`,
    status,
    { cause: error },
  );
}

export class InferenceClient {
  private provider: Provider;
  private model: string;
  private maxTokens: number;
  private systemPrompt: string;

  constructor(options: InferenceClientOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens ?? 512;
    this.systemPrompt = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
  }

  private buildMessages(prompt: string): ProviderMessage[] {
    return [
      { role: 'system', content: this.systemPrompt },
      { role: 'user', content: prompt },
    ];
  }

  async complete(prompt: string, temperature: number): Promise<string> {
    const startTime = Date.now();
    let content: string;

    try {
      const response = await this.provider.sendChat(this.buildMessages(prompt), {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature,
      });
      content = response.content;
      log.debug(
        { provider: this.provider.name, usage: response.usage, durationMs: Date.now() - startTime },
        'Completion finished',
      );
    } catch (error) {
      throw toInferenceError(error, this.provider.name);
    }

    if (!content.trim()) {
      throw new InferenceError(`${this.provider.name} returned an empty response`);
    }
    return content;
  }

  /**
   * Yields non-empty text fragments in delivery order; joined, they equal what
   * `complete` returns for the same prompt. Stops quietly once `signal`
   * aborts; calling `return()` on the iterator closes the upstream connection.
   */
  async *completeStreaming(prompt: string, temperature: number, signal?: AbortSignal): AsyncGenerator<string> {
    let received = '';

    try {
      const stream = this.provider.sendChatStream(this.buildMessages(prompt), {
        model: this.model,
        maxTokens: this.maxTokens,
        temperature,
        signal,
      });

      for await (const chunk of stream) {
        if (signal?.aborted) return;
        if (chunk.usage) {
          log.debug({ provider: this.provider.name, usage: chunk.usage }, 'Stream usage');
        }
        if (chunk.text) {
          received += chunk.text;
          yield chunk.text;
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        log.debug({ provider: this.provider.name }, 'Stream aborted by consumer');
        return;
      }
      throw toInferenceError(error, this.provider.name);
    }

    if (!signal?.aborted && !received.trim()) {
      throw new InferenceError(`${this.provider.name} returned an empty response`);
    }
  }
}
