// OpenAI-compatible Provider
// Groq and OpenAI both speak the chat completions protocol, so one client covers both

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { CompletionUsage } from 'openai/resources/completions';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, ProviderUsage, StreamChunk } from './types.js';

export interface OpenAICompatibleConfig {
  name: string;
  apiKey: string;
  baseURL?: string;
}

function toChatMessage(message: ProviderMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

function toUsage(usage: CompletionUsage | null | undefined): ProviderUsage {
  return {
    promptTokens: usage?.prompt_tokens || 0,
    completionTokens: usage?.completion_tokens || 0,
    totalTokens: usage?.total_tokens || 0,
  };
}

export class OpenAICompatibleProvider implements Provider {
  readonly name: string;
  private client: OpenAI;

  constructor(config: OpenAICompatibleConfig, client?: OpenAI) {
    if (!config.apiKey && !client) {
      throw new Error(`API key for provider "${config.name}" is not configured`);
    }
    this.name = config.name;
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseURL ? { baseURL: config.baseURL } : {}),
    });
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const completion = await this.client.chat.completions.create(
      {
        model: options.model,
        messages: messages.map(toChatMessage),
        max_tokens: options.maxTokens ?? 512,
        temperature: options.temperature ?? 0.7,
        top_p: 1,
        stream: false,
      },
      { signal: options.signal },
    );

    return {
      content: completion.choices[0]?.message?.content ?? '',
      usage: toUsage(completion.usage),
    };
  }

  async *sendChatStream(messages: ProviderMessage[], options: ProviderOptions): AsyncIterable<StreamChunk> {
    const stream = await this.client.chat.completions.create(
      {
        model: options.model,
        messages: messages.map(toChatMessage),
        max_tokens: options.maxTokens ?? 512,
        temperature: options.temperature ?? 0.7,
        top_p: 1,
        stream: true,
      },
      { signal: options.signal },
    );

    // Leaving this loop early (break/return upstream) aborts the HTTP request
    for await (const chunk of stream) {
      const text = chunk.choices[0]?.delta?.content;
      if (typeof text === 'string' && text) {
        yield { text };
      }
      if (chunk.usage) {
        yield { text: '', usage: toUsage(chunk.usage) };
      }
    }
  }
}
