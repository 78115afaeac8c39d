// Plan Parser
// Turns the decision model's free-text reply into an invocation plan.
// Accepted shapes: {"plans": [...]}, a bare array of entries, or a single
// {"tool": ..., "args": ...} object, optionally fenced or wrapped in prose.

import { PlanParseError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import type { ToolArgs } from '../tools/types.js';
import type { InvocationPlan, ToolCatalog } from './types.js';

const log = getLogger('plan-parser');

const NO_TOOL_REPLY = /^(none|null|no tools?(?: (?:needed|required))?|n\/a)\.?$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function candidateSnippets(text: string): string[] {
  const fenced: string[] = [];
  const fencePattern = /```(?:json)?\s*([\s\S]*?)```/gi;
  let match: RegExpExecArray | null;
  while ((match = fencePattern.exec(text)) !== null) {
    const body = (match[1] ?? '').trim();
    if (body) fenced.push(body);
  }

  const spans: Array<{ start: number; body: string }> = [];
  for (const [open, close] of [['{', '}'], ['[', ']']] as const) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start !== -1 && end > start) {
      spans.push({ start, body: text.slice(start, end + 1) });
    }
  }
  spans.sort((a, b) => a.start - b.start);

  return [...fenced, ...spans.map(span => span.body)];
}

function parseFirstJson(candidates: string[], raw: string): unknown {
  let lastError = 'no JSON content found';

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
    }
  }

  throw new PlanParseError(`Decision output is not a parseable plan: ${lastError}`, raw);
}

function extractEntries(parsed: unknown): unknown[] | null {
  if (Array.isArray(parsed)) return parsed;
  if (!isRecord(parsed)) return null;

  for (const key of ['plans', 'plan', 'tool_calls']) {
    const value = parsed[key];
    if (Array.isArray(value)) return value;
    if (key in parsed && value === null) return [];
  }

  // Single-tool shape
  if ('tool' in parsed) return [parsed];
  return null;
}

function readArgs(value: unknown): ToolArgs {
  if (isRecord(value)) return { ...value };

  if (typeof value === 'string' && value.trim()) {
    try {
      const decoded: unknown = JSON.parse(value);
      if (isRecord(decoded)) return decoded;
    } catch (error) {
      log.debug({ err: error }, 'Plan entry args string is not JSON, using empty args');
    }
  }

  return {};
}

export function parsePlan(raw: string, catalog: ToolCatalog): InvocationPlan {
  const text = raw.replace(/<think(?:ing)?>[\s\S]*?<\/think(?:ing)?>/gi, '').trim();
  if (!text || NO_TOOL_REPLY.test(text)) {
    return [];
  }

  const parsed = parseFirstJson(candidateSnippets(text), raw);
  const entries = extractEntries(parsed);
  if (!entries) {
    throw new PlanParseError('Decision output has an unrecognized plan structure', raw);
  }

  const plan: InvocationPlan = [];

  for (const entry of entries) {
    if (!isRecord(entry)) {
      log.warn({ entry }, 'Skipping malformed plan entry');
      continue;
    }

    const toolField = entry.tool ?? entry.name;
    if (toolField === null || toolField === undefined) continue;
    if (typeof toolField !== 'string') {
      log.warn({ tool: toolField }, 'Skipping plan entry with non-string tool name');
      continue;
    }

    const requested = toolField.trim();
    if (!requested || requested.toLowerCase() === 'none') continue;

    const tool = catalog.lookup(requested);
    if (!tool) {
      log.warn({ tool: requested }, 'Dropping plan entry for unknown tool');
      continue;
    }

    plan.push({ tool: tool.name, args: readArgs(entry.args ?? entry.arguments) });
  }

  return plan;
}
