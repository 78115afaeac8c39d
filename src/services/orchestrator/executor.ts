// Tool Executor
// Runs the plan's invocations against the catalog and records every outcome

import pLimit from 'p-limit';
import type { ToolRegistry } from '../tools/registry.js';
import { ToolExecutionError, errorMessage } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import type { ExecutionResult, InvocationPlan, InvocationPlanEntry, ToolOutcome } from './types.js';

const log = getLogger('executor');

export interface ExecutionHooks {
  onStart?(entry: InvocationPlanEntry): void | Promise<void>;
  onResult?(entry: InvocationPlanEntry, outcome: ToolOutcome, durationMs: number): void | Promise<void>;
}

export interface TimedOutcome {
  outcome: ToolOutcome;
  durationMs: number;
}

export interface ToolExecutorOptions {
  concurrency?: number;
  timeoutMs?: number;
}

export class ToolExecutor {
  private concurrency: number;
  private timeoutMs: number;

  constructor(private tools: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.concurrency = Math.max(1, options.concurrency ?? 3);
    this.timeoutMs = options.timeoutMs ?? 15000;
  }

  /**
   * Returns null when the tool is not in the catalog; every other failure is
   * captured as a `failure` outcome.
   */
  async execute(entry: InvocationPlanEntry): Promise<TimedOutcome | null> {
    const tool = this.tools.get(entry.tool);
    if (!tool) {
      log.warn({ tool: entry.tool }, 'Tool not in catalog, skipping');
      return null;
    }

    const startTime = Date.now();
    log.info({ tool: tool.name, args: entry.args }, 'Calling tool');

    try {
      const payload = await this.withTimeout(
        Promise.resolve().then(() => tool.invoke(entry.args)),
        tool.name,
      );
      const durationMs = Date.now() - startTime;
      log.info({ tool: tool.name, durationMs }, 'Tool succeeded');
      return { outcome: { status: 'success', payload }, durationMs };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      log.warn({ tool: tool.name, durationMs, err: error }, 'Tool execution failed');
      return { outcome: { status: 'failure', error: errorMessage(error) }, durationMs };
    }
  }

  async executeAll(plan: InvocationPlan, hooks: ExecutionHooks = {}): Promise<ExecutionResult> {
    const limit = pLimit(this.concurrency);

    const settled = await Promise.all(
      plan.map(entry =>
        limit(async () => {
          if (!this.tools.has(entry.tool)) {
            log.warn({ tool: entry.tool }, 'Tool not in catalog, skipping');
            return null;
          }

          await hooks.onStart?.(entry);
          const timed = await this.execute(entry);
          if (!timed) return null;
          await hooks.onResult?.(entry, timed.outcome, timed.durationMs);
          return { tool: entry.tool, outcome: timed.outcome };
        }),
      ),
    );

    // Assembled in plan order, not finish order: a repeated tool keeps its last entry's outcome
    const result: ExecutionResult = {};
    const repeated = new Set<string>();
    for (const item of settled) {
      if (!item) continue;
      if (item.tool in result) repeated.add(item.tool);
      result[item.tool] = item.outcome;
    }
    if (repeated.size > 0) {
      log.warn({ tools: [...repeated] }, 'Tool planned more than once, keeping the last outcome');
    }
    return result;
  }

  private withTimeout<T>(promise: Promise<T>, toolName: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new ToolExecutionError(toolName, `Tool execution timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
  }
}
