// Query Agent API
// Port: 8000 by default

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, isProviderConfigured, logConfiguration } from './env.js';
import { logger } from './utils/logger.js';
import { getProvider } from './providers/index.js';
import { InferenceClient } from './services/inference.js';
import { buildToolRegistry } from './services/tools/index.js';
import { createAgent } from './services/orchestrator/index.js';
import { queryRoutes } from './routes/query.js';
import { toolRoutes } from './routes/tools.js';

if (!isProviderConfigured(env.LLM_PROVIDER)) {
  logger.fatal(`No API key configured for inference provider "${env.LLM_PROVIDER}"`);
  process.exit(1);
}

const PORT = env.PORT;
const HOST = env.HOST;

const server = Fastify({ loggerInstance: logger });

await server.register(cors, {
  origin: env.CORS_ORIGINS.includes('*') ? '*' : env.CORS_ORIGINS,
});

const inference = new InferenceClient({
  provider: getProvider(env.LLM_PROVIDER),
  model: env.LLM_MODEL_NAME,
  maxTokens: env.LLM_MAX_TOKENS,
});

const agent = createAgent(inference, buildToolRegistry(), {
  decisionTemperature: env.DECISION_TEMPERATURE,
  synthesisTemperature: env.SYNTHESIS_TEMPERATURE,
  concurrency: env.TOOL_CONCURRENCY,
  timeoutMs: env.TOOL_TIMEOUT_MS,
});

server.get('/v1/health', async () => {
  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
  };
});

// Legacy redirect
server.get('/health', async (request, reply) => {
  return reply.redirect('/v1/health', 301);
});

await server.register(queryRoutes, { prefix: '/v1', agent });
await server.register(toolRoutes, { prefix: '/v1', agent });

try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`Query agent listening on http://${HOST}:${PORT}`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
