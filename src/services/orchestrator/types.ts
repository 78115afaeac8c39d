// Orchestrator Types

import type { ToolArgs } from '../tools/types.js';

export interface InvocationPlanEntry {
  tool: string;
  args: ToolArgs;
}

export type InvocationPlan = InvocationPlanEntry[];

export type ToolOutcome =
  | { status: 'success'; payload: unknown }
  | { status: 'failure'; error: string };

/** Keyed by tool name. A tool planned more than once keeps the outcome of its last entry. */
export type ExecutionResult = Record<string, ToolOutcome>;

export interface AgentAnswer {
  input: string;
  text: string;
  plan: InvocationPlan;
  results: ExecutionResult;
}

export type RequestStage = 'received' | 'planning' | 'executing' | 'synthesizing' | 'done';

export type AgentStreamMessage =
  | { kind: 'status'; stage: RequestStage; message: string }
  | { kind: 'plan'; plan: InvocationPlan }
  | { kind: 'tool_result'; tool: string; outcome: ToolOutcome; durationMs: number }
  | { kind: 'token'; text: string }
  | { kind: 'done' }
  | { kind: 'error'; message: string };

/**
 * Push-based destination for streamed output, owned by the transport.
 * `signal` aborts once the consumer can no longer accept messages.
 */
export interface MessageSink {
  send(message: AgentStreamMessage): void | Promise<void>;
  readonly signal: AbortSignal;
}

export interface ToolCatalog {
  lookup(name: string): { name: string } | undefined;
}

export interface OrchestratorOptions {
  decisionTemperature?: number;
  synthesisTemperature?: number;
  concurrency?: number;
  timeoutMs?: number;
}
