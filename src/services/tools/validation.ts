// Argument validation against a tool's parameter contract

import { z } from 'zod';
import { ToolExecutionError } from '../../utils/errors.js';
import type { ToolArgs, ToolArgValue, ToolDefinition, ToolParameter } from './types.js';

function schemaFor(param: ToolParameter): z.ZodTypeAny {
  let schema: z.ZodTypeAny;

  switch (param.type) {
    case 'string': {
      const base = z.string().trim().min(1, 'must not be empty');
      const allowed = param.enum;
      schema = allowed
        ? base.toLowerCase().refine(value => allowed.includes(value), {
            message: `must be one of ${allowed.join(', ')}`,
          })
        : base;
      break;
    }
    case 'number':
      schema = z.coerce.number().finite();
      break;
    case 'integer':
      schema = z.coerce.number().int();
      break;
    case 'boolean':
      schema = z.boolean();
      break;
  }

  return param.required ? schema : schema.optional();
}

type ContractSchema = z.ZodType<Record<string, unknown>>;

const schemaCache = new WeakMap<readonly ToolParameter[], ContractSchema>();

function schemaForContract(parameters: readonly ToolParameter[]): ContractSchema {
  const cached = schemaCache.get(parameters);
  if (cached) return cached;

  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of parameters) {
    shape[param.name] = schemaFor(param);
  }
  const schema: ContractSchema = z.object(shape);
  schemaCache.set(parameters, schema);
  return schema;
}

function isArgValue(value: unknown): value is ToolArgValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Validates `args` against the tool's parameter contract. Numeric strings are
 * coerced, enum values lower-cased, defaults applied and unknown keys dropped.
 * Throws ToolExecutionError listing every invalid parameter.
 */
export function parseToolArgs(
  tool: Pick<ToolDefinition, 'name' | 'parameters'>,
  args: ToolArgs,
): Record<string, ToolArgValue> {
  const result = schemaForContract(tool.parameters).safeParse(args);

  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
      .join('; ');
    throw new ToolExecutionError(tool.name, `Invalid arguments for ${tool.name}: ${problems}`);
  }

  const values: Record<string, ToolArgValue> = {};

  for (const param of tool.parameters) {
    const value = result.data[param.name];
    if (isArgValue(value)) {
      values[param.name] = value;
    } else if (param.default !== undefined) {
      values[param.name] = param.default;
    }
  }

  return values;
}
