// Orchestrator Module - Main exports

export { Agent, createAgent } from './agent.js';
export { Planner } from './planner.js';
export { parsePlan } from './plan-parser.js';
export { ToolExecutor } from './executor.js';
export { Synthesizer, serializeResults } from './synthesizer.js';
export type { ExecutionHooks, TimedOutcome, ToolExecutorOptions } from './executor.js';
export type {
  AgentAnswer,
  AgentStreamMessage,
  ExecutionResult,
  InvocationPlan,
  InvocationPlanEntry,
  MessageSink,
  OrchestratorOptions,
  RequestStage,
  ToolOutcome,
} from './types.js';
