// Environment configuration for the query agent
// Provider credentials, tool bindings and agent tuning come from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseTemperature(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 2) {
    console.error(`Invalid ${name} "${value}" (expected 0-2), using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export type InferenceProviderName = 'groq' | 'openai';
export type WebSearchProviderName = 'google' | 'brave';

function parseProviderName(value: string | undefined): InferenceProviderName {
  const name = strEnv(value, 'groq').toLowerCase();
  if (name === 'groq' || name === 'openai') return name;
  console.error(`Unknown LLM_PROVIDER "${value}", using groq`);
  return 'groq';
}

function parseSearchProvider(value: string | undefined): WebSearchProviderName {
  const name = strEnv(value, 'google').toLowerCase();
  if (name === 'google' || name === 'brave') return name;
  console.error(`Unknown WEB_SEARCH_PROVIDER "${value}", using google`);
  return 'google';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 8000),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: strEnv(process.env.CORS_ORIGINS, '*')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Inference backend
  LLM_PROVIDER: parseProviderName(process.env.LLM_PROVIDER),
  LLM_MODEL_NAME: strEnv(process.env.LLM_MODEL_NAME, 'llama-3.3-70b-versatile'),
  LLM_MAX_TOKENS: parsePositiveInt(process.env.LLM_MAX_TOKENS, 512, 'LLM_MAX_TOKENS'),
  GROQ_API_KEY: strEnv(process.env.GROQ_API_KEY),
  GROQ_BASE_URL: strEnv(process.env.GROQ_BASE_URL, 'https://api.groq.com/openai/v1'),
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),

  // Agent
  DECISION_TEMPERATURE: parseTemperature(process.env.DECISION_TEMPERATURE, 0.7, 'DECISION_TEMPERATURE'),
  SYNTHESIS_TEMPERATURE: parseTemperature(process.env.SYNTHESIS_TEMPERATURE, 0.3, 'SYNTHESIS_TEMPERATURE'),
  TOOL_CONCURRENCY: parsePositiveInt(process.env.TOOL_CONCURRENCY, 3, 'TOOL_CONCURRENCY'),
  TOOL_TIMEOUT_MS: parsePositiveInt(process.env.TOOL_TIMEOUT_MS, 15000, 'TOOL_TIMEOUT_MS'),

  // Market data (Finnhub)
  FINNHUB_API_KEY: strEnv(process.env.FINNHUB_API_KEY),
  FINNHUB_ENDPOINT: strEnv(process.env.FINNHUB_ENDPOINT, 'https://finnhub.io/api/v1'),

  // Web search
  WEB_SEARCH_PROVIDER: parseSearchProvider(process.env.WEB_SEARCH_PROVIDER),
  GOOGLE_API_KEY: strEnv(process.env.GOOGLE_API_KEY),
  GOOGLE_CSE_ID: strEnv(process.env.GOOGLE_CSE_ID),
  BRAVE_SEARCH_API_KEY: strEnv(process.env.BRAVE_SEARCH_API_KEY),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: string): boolean {
  switch (provider) {
    case 'groq':
      return !!env.GROQ_API_KEY;
    case 'openai':
      return !!env.OPENAI_API_KEY;
    default:
      return false;
  }
}

export function isFinanceConfigured(): boolean {
  return !!env.FINNHUB_API_KEY;
}

export function isWebSearchConfigured(): boolean {
  if (env.WEB_SEARCH_PROVIDER === 'brave') {
    return !!env.BRAVE_SEARCH_API_KEY;
  }
  return !!env.GOOGLE_API_KEY && !!env.GOOGLE_CSE_ID;
}

// Log configuration on startup (redact secrets)
export function logConfiguration() {
  console.log('Query agent configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  Inference: ${env.LLM_PROVIDER} / ${env.LLM_MODEL_NAME} (configured: ${isProviderConfigured(env.LLM_PROVIDER)})`);
  console.log(`  Temperatures: decision ${env.DECISION_TEMPERATURE}, synthesis ${env.SYNTHESIS_TEMPERATURE}`);
  console.log(`  Tool concurrency: ${env.TOOL_CONCURRENCY}, timeout ${env.TOOL_TIMEOUT_MS}ms`);
  console.log(`  Finance tool: ${isFinanceConfigured() ? 'enabled' : 'disabled (FINNHUB_API_KEY missing)'}`);
  console.log(`  Web search tool: ${isWebSearchConfigured() ? `enabled (${env.WEB_SEARCH_PROVIDER})` : 'disabled'}`);
}
