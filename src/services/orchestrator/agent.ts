// Agent
// Sequences decision -> execution -> synthesis and exposes batch and streaming responses.
// Owns no tool or inference logic of its own.

import type { InferenceClient } from '../inference.js';
import type { ToolRegistry } from '../tools/registry.js';
import { PlanParseError, errorMessage } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import { ToolExecutor, type ExecutionHooks } from './executor.js';
import { Planner } from './planner.js';
import { Synthesizer } from './synthesizer.js';
import type {
  AgentAnswer,
  AgentStreamMessage,
  ExecutionResult,
  InvocationPlan,
  MessageSink,
  OrchestratorOptions,
  RequestStage,
} from './types.js';

const log = getLogger('agent');

export class Agent {
  private planner: Planner;
  private executor: ToolExecutor;
  private synthesizer: Synthesizer;

  constructor(
    inference: InferenceClient,
    private tools: ToolRegistry,
    options: OrchestratorOptions = {},
  ) {
    this.planner = new Planner(inference, tools, options.decisionTemperature ?? 0.7);
    this.executor = new ToolExecutor(tools, {
      concurrency: options.concurrency,
      timeoutMs: options.timeoutMs,
    });
    this.synthesizer = new Synthesizer(inference, options.synthesisTemperature ?? 0.3);
    log.info({ tools: tools.getAll().map(t => t.name) }, 'Agent initialized');
  }

  get catalog(): ToolRegistry {
    return this.tools;
  }

  async respond(input: string): Promise<AgentAnswer> {
    this.transition('received', input);

    this.transition('planning', input);
    const plan = await this.decide(input);

    this.transition('executing', input);
    const results = await this.executor.executeAll(plan);

    this.transition('synthesizing', input);
    const text = await this.synthesizer.synthesize(input, results);

    this.transition('done', input);
    return { input, text, plan, results };
  }

  /**
   * Streams progress, the plan, each tool result and the answer tokens to
   * `sink`, ending with `done`, or with `error` on a fatal inference failure.
   * Stops without a terminal message once the sink's signal aborts.
   */
  async respondStreaming(input: string, sink: MessageSink): Promise<void> {
    const { signal } = sink;
    const emit = async (message: AgentStreamMessage) => {
      if (!signal.aborted) await sink.send(message);
    };
    const status = (stage: RequestStage, message: string) => {
      this.transition(stage, input);
      return emit({ kind: 'status', stage, message });
    };

    try {
      this.transition('received', input);

      await status('planning', 'Analyzing your request...');
      const plan = await this.decide(input);
      await emit({ kind: 'plan', plan });
      if (signal.aborted) return this.disconnected(input);

      this.transition('executing', input);
      const hooks: ExecutionHooks = {
        onStart: entry =>
          emit({ kind: 'status', stage: 'executing', message: `Calling ${entry.tool}...` }),
        onResult: (entry, outcome, durationMs) =>
          emit({ kind: 'tool_result', tool: entry.tool, outcome, durationMs }),
      };
      const results: ExecutionResult = await this.executor.executeAll(plan, hooks);
      if (signal.aborted) return this.disconnected(input);

      await status('synthesizing', 'Generating final response...');
      for await (const fragment of this.synthesizer.synthesizeStreaming(input, results, signal)) {
        if (signal.aborted) break;
        await emit({ kind: 'token', text: fragment });
        if (signal.aborted) break;
      }
      if (signal.aborted) return this.disconnected(input);

      this.transition('done', input);
      await emit({ kind: 'done' });
    } catch (error) {
      if (signal.aborted) return this.disconnected(input);
      log.error({ err: error }, 'Streaming response failed');
      await emit({ kind: 'error', message: errorMessage(error) });
    }
  }

  /**
   * An unparseable plan degrades to "no tools"; an inference failure propagates.
   */
  private async decide(input: string): Promise<InvocationPlan> {
    try {
      return await this.planner.plan(input);
    } catch (error) {
      if (error instanceof PlanParseError) {
        log.warn({ err: error, rawOutput: error.rawOutput.slice(0, 200) }, 'Plan unparseable, continuing without tools');
        return [];
      }
      throw error;
    }
  }

  private transition(stage: RequestStage, input: string): void {
    log.debug({ stage, input: input.slice(0, 80) }, `Request ${stage}`);
  }

  private disconnected(input: string): void {
    log.info({ input: input.slice(0, 80) }, 'Consumer disconnected, stopping stream');
  }
}

export function createAgent(
  inference: InferenceClient,
  tools: ToolRegistry,
  options?: OrchestratorOptions,
): Agent {
  return new Agent(inference, tools, options);
}
