// Tool System Initialization
// Assembles the tool catalog at startup

import { isFinanceConfigured, isWebSearchConfigured } from '../../env.js';
import { getLogger } from '../../utils/logger.js';
import { ToolRegistry } from './registry.js';
import { financeTool } from './finance-tool.js';
import { webSearchTool } from './web-search-tool.js';

export { ToolRegistry } from './registry.js';
export { parseToolArgs } from './validation.js';
export { financeTool } from './finance-tool.js';
export { webSearchTool } from './web-search-tool.js';
export type { ToolDefinition, ToolParameter, ToolArgs, ToolArgValue } from './types.js';
export type { ToolSummary } from './registry.js';

const log = getLogger('tools');

export function buildToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();

  if (isFinanceConfigured()) {
    registry.register(financeTool);
    log.info('Finance tool registered');
  } else {
    log.warn('FINNHUB_API_KEY missing, finance tool disabled');
  }

  if (isWebSearchConfigured()) {
    registry.register(webSearchTool);
    log.info('Web search tool registered');
  } else {
    log.warn('Web search credentials missing, web_search tool disabled');
  }

  log.info({ tools: registry.getAll().map(t => t.name) }, `Tool catalog ready with ${registry.size} tool(s)`);
  return registry;
}
