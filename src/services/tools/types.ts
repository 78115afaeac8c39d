// Tool system types and interfaces
// Every data-retrieval capability the agent can call implements ToolDefinition

export type ToolParameterType = 'string' | 'number' | 'integer' | 'boolean';

export interface ToolParameter {
  name: string;
  type: ToolParameterType;
  description: string;
  required: boolean;
  enum?: readonly string[];
  default?: string | number | boolean;
}

export type ToolArgs = Record<string, unknown>;

export type ToolArgValue = string | number | boolean;

export interface ToolDefinition<TPayload = unknown> {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
  invoke(args: ToolArgs): Promise<TPayload>;
}
