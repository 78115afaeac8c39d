import type { FastifyPluginAsync } from 'fastify';
import type { Agent } from '../services/orchestrator/agent.js';

export interface ToolRoutesOptions {
  agent: Agent;
}

export const toolRoutes: FastifyPluginAsync<ToolRoutesOptions> = async (server, { agent }) => {
  // Public: list the tools the agent can plan with
  server.get('/tools', async () => {
    return {
      tools: agent.catalog.describe(),
    };
  });
};
