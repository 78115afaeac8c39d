// Web Search Tool
// Wraps the web search service as a tool

import type { ToolArgs, ToolDefinition } from './types.js';
import { parseToolArgs } from './validation.js';
import { clampResultCount, searchWeb, type WebSearchResult } from '../web-search.js';
import { ToolExecutionError } from '../../utils/errors.js';

export interface WebSearchPayload {
  query: string;
  results: Array<{
    rank: number;
    title: string;
    url: string;
    snippet: string;
  }>;
  source: WebSearchResult['source'];
}

export const webSearchTool: ToolDefinition<WebSearchPayload> = {
  name: 'web_search',
  description:
    'Search the web for current information and recent events. Use this when you need up-to-date ' +
    'information not in your training data.',
  parameters: [
    {
      name: 'query',
      type: 'string',
      description: 'The search query to look up on the web',
      required: true,
    },
    {
      name: 'num_results',
      type: 'integer',
      description: 'Number of results to return (1-10)',
      required: false,
      default: 5,
    },
  ],
  async invoke(args: ToolArgs): Promise<WebSearchPayload> {
    const values = parseToolArgs(webSearchTool, args);
    const query = String(values.query);
    const numResults = clampResultCount(Number(values.num_results));

    try {
      const result = await searchWeb(query, numResults);
      return {
        query: result.query,
        results: result.hits.map((hit, idx) => ({
          rank: idx + 1,
          title: hit.title,
          url: hit.url,
          snippet: hit.snippet,
        })),
        source: result.source,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ToolExecutionError(webSearchTool.name, message, { cause: error });
    }
  },
};
