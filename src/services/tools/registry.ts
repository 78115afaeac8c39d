// Tool Registry - the catalog of tools available to the agent
// Built once at startup; the planner and executor only read from it

import { getLogger } from '../../utils/logger.js';
import type { ToolDefinition, ToolParameter } from './types.js';

const log = getLogger('tool-registry');

export interface ToolSummary {
  name: string;
  description: string;
  parameters: ToolParameter[];
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(tools: Iterable<ToolDefinition> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * Exact match first, then a case-insensitive one.
   */
  lookup(name: string): ToolDefinition | undefined {
    const exact = this.tools.get(name);
    if (exact) return exact;

    const lower = name.toLowerCase();
    for (const tool of this.tools.values()) {
      if (tool.name.toLowerCase() === lower) return tool;
    }
    return undefined;
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  describe(): ToolSummary[] {
    return this.getAll().map(tool => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters.map(param => ({ ...param })),
    }));
  }
}
