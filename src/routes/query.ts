/**
 * Query Routes
 * POST /query answers in one response; POST /query/stream sends the agent's
 * progress and answer tokens as server-sent events.
 */

import { once } from 'events';
import type { Writable } from 'stream';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { Agent } from '../services/orchestrator/agent.js';
import type { MessageSink } from '../services/orchestrator/types.js';
import { AppError, InferenceError, errorMessage, formatErrorResponse } from '../utils/errors.js';

const QueryRequestSchema = z.object({
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
});

export interface QueryRoutesOptions {
  agent: Agent;
}

/**
 * Writes each agent message as one SSE event. The sink's signal aborts when
 * the underlying connection closes; writes wait for `drain` when the socket
 * buffer is full.
 */
export function createSseSink(stream: Writable): MessageSink {
  const controller = new AbortController();
  stream.on('close', () => controller.abort());

  return {
    signal: controller.signal,
    async send(message) {
      if (controller.signal.aborted || stream.writableEnded) return;

      const flushed = stream.write(`event: ${message.kind}\ndata: ${JSON.stringify(message)}\n\n`);
      if (!flushed) {
        await once(stream, 'drain', { signal: controller.signal }).catch((error: unknown) => {
          if (!controller.signal.aborted) throw error;
        });
      }
    },
  };
}

function sendValidationError(reply: FastifyReply, issues: z.ZodError) {
  const error = AppError.validationError('Invalid request body', issues.flatten().fieldErrors);
  return reply.code(error.statusCode).send(formatErrorResponse(error, true));
}

export const queryRoutes: FastifyPluginAsync<QueryRoutesOptions> = async (server, { agent }) => {
  // POST /v1/query - batch answer
  server.post('/query', async (request, reply) => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const { prompt } = parsed.data;
    request.log.info({ prompt }, 'Received query');

    try {
      const answer = await agent.respond(prompt);
      return {
        original_prompt: answer.input,
        final_response: answer.text,
        tool_plan: answer.plan,
        tool_results: answer.results,
      };
    } catch (err) {
      request.log.error({ err }, 'Query failed');
      const error = err instanceof InferenceError
        ? AppError.upstream(err.message)
        : AppError.internal(errorMessage(err));
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }
  });

  // POST /v1/query/stream - SSE streaming answer
  server.post('/query/stream', async (request, reply) => {
    const parsed = QueryRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }

    const { prompt } = parsed.data;
    request.log.info({ prompt }, 'Received streaming query');

    reply.hijack();
    reply.raw.writeHead(200, {
      ...reply.getHeaders(),
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    try {
      await agent.respondStreaming(prompt, createSseSink(reply.raw));
    } catch (err) {
      request.log.error({ err }, 'Streaming query failed');
    } finally {
      if (!reply.raw.writableEnded) {
        reply.raw.end();
      }
    }
  });
};
