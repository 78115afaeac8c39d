import { describe, it, expect } from 'vitest';
import { parseToolArgs } from '../validation.js';
import { ToolExecutionError } from '../../../utils/errors.js';
import type { ToolParameter } from '../types.js';

const parameters: ToolParameter[] = [
  { name: 'type', type: 'string', description: 'Asset class', required: false, enum: ['stock', 'crypto', 'forex'], default: 'stock' },
  { name: 'symbol', type: 'string', description: 'Ticker', required: true },
  { name: 'limit', type: 'integer', description: 'Count', required: false, default: 5 },
  { name: 'verbose', type: 'boolean', description: 'Extra detail', required: false },
];

const tool = { name: 'finance', parameters };

describe('parseToolArgs', () => {
  it('applies defaults and trims strings', () => {
    expect(parseToolArgs(tool, { symbol: '  AAPL ' })).toEqual({ type: 'stock', symbol: 'AAPL', limit: 5 });
  });

  it('lower-cases enum values and coerces numeric strings', () => {
    expect(parseToolArgs(tool, { type: 'Crypto', symbol: 'BTC', limit: '3', verbose: true })).toEqual({
      type: 'crypto',
      symbol: 'BTC',
      limit: 3,
      verbose: true,
    });
  });

  it('drops keys the tool does not declare', () => {
    expect(parseToolArgs(tool, { symbol: 'MSFT', exchange: 'NASDAQ' })).toEqual({
      type: 'stock',
      symbol: 'MSFT',
      limit: 5,
    });
  });

  it('rejects a missing required parameter', () => {
    expect(() => parseToolArgs(tool, {})).toThrow('Invalid arguments for finance: symbol: Required');
  });

  it('rejects a value outside the enum', () => {
    expect(() => parseToolArgs(tool, { type: 'bond', symbol: 'X' })).toThrow(
      'Invalid arguments for finance: type: must be one of stock, crypto, forex',
    );
  });

  it('lists every invalid parameter in one error', () => {
    try {
      parseToolArgs(tool, { symbol: '   ', limit: 'many' });
      expect.unreachable('parseToolArgs should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ToolExecutionError);
      if (error instanceof ToolExecutionError) {
        expect(error.tool).toBe('finance');
        expect(error.message).toContain('symbol: must not be empty');
        expect(error.message).toContain('limit: ');
      }
    }
  });
});
