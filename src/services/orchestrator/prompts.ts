// Prompt builders for the decision and synthesis calls

import type { ToolDefinition, ToolParameter } from '../tools/types.js';

export const NO_TOOL_RESULTS = 'No tool results available.';

function describeParameter(param: ToolParameter): string {
  const details: string[] = [param.type];
  details.push(param.required ? 'required' : 'optional');
  if (param.enum) details.push(`one of ${param.enum.join(' | ')}`);
  if (param.default !== undefined) details.push(`default ${JSON.stringify(param.default)}`);
  return `    - ${param.name} (${details.join(', ')}): ${param.description}`;
}

export function describeTools(tools: readonly ToolDefinition[]): string {
  if (tools.length === 0) return '(no tools are available)';

  return tools
    .map(tool => {
      const lines = [`- ${tool.name}: ${tool.description}`];
      if (tool.parameters.length > 0) {
        lines.push('  Arguments:');
        lines.push(...tool.parameters.map(describeParameter));
      }
      return lines.join('\n');
    })
    .join('\n');
}

export function buildDecisionPrompt(userInput: string, tools: readonly ToolDefinition[]): string {
  return [
    'You are an assistant that can call external tools before answering.',
    'Decide which tools, if any, are needed to answer the user request below.',
    'A request may need several tools, or the same tool more than once with different arguments.',
    '',
    'Available tools:',
    describeTools(tools),
    '',
    'Return only a JSON object in exactly this format:',
    '{"plans": [{"tool": "<tool name>", "args": {<arguments>}}]}',
    'Use {"plans": []} when no tool is needed. No reasoning, just the JSON.',
    '',
    `User input: ${JSON.stringify(userInput)}`,
  ].join('\n');
}

export function buildSynthesisPrompt(userInput: string, toolOutput: string): string {
  return [
    `The user asked: ${JSON.stringify(userInput)}`,
    '',
    'Data retrieved from tools:',
    toolOutput,
    '',
    'Instructions:',
    '1. Use the specific values, prices, dates and key facts from the tool data.',
    '2. For market quotes include the current price, the change, the percent change and the date.',
    '3. For search results summarize the key findings and cite the URLs that support them.',
    '4. If a tool reported an error, say plainly which data is unavailable.',
    '5. If no tool data is available, answer from your own knowledge without mentioning tools.',
    '',
    'Answer:',
  ].join('\n');
}
