// Provider Registry
// Central registry for the inference backends

import type { Provider } from './types.js';
import { OpenAICompatibleProvider } from './openai-compatible.js';
import { env, isProviderConfigured } from '../env.js';

// Provider instances (lazy initialization)
const providers: Map<string, Provider> = new Map();

function getOrCreateProvider(name: string): Provider | null {
  const cached = providers.get(name);
  if (cached) {
    return cached;
  }

  if (!isProviderConfigured(name)) {
    return null;
  }

  let provider: Provider | null = null;

  switch (name) {
    case 'groq':
      provider = new OpenAICompatibleProvider({
        name,
        apiKey: env.GROQ_API_KEY,
        baseURL: env.GROQ_BASE_URL,
      });
      break;
    case 'openai':
      provider = new OpenAICompatibleProvider({
        name,
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL || undefined,
      });
      break;
    default:
      return null;
  }

  providers.set(name, provider);
  return provider;
}

export function getProvider(name: string): Provider {
  const provider = getOrCreateProvider(name);

  if (!provider) {
    throw new Error(`Provider "${name}" is not available or not configured`);
  }

  return provider;
}

export type { Provider, ProviderMessage, ProviderOptions, ProviderResponse, StreamChunk } from './types.js';
