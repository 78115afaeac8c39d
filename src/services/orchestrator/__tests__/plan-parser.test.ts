import { describe, it, expect } from 'vitest';
import { parsePlan } from '../plan-parser.js';
import { PlanParseError } from '../../../utils/errors.js';
import { createCatalog, createFakeTool, FINANCE_PARAMETERS } from './fakes.js';

const catalog = createCatalog(
  createFakeTool('finance', async () => ({}), FINANCE_PARAMETERS),
  createFakeTool('web_search', async () => ({})),
);

describe('parsePlan', () => {
  it('parses the plans envelope', () => {
    const plan = parsePlan(
      '{"plans": [{"tool": "finance", "args": {"type": "crypto", "symbol": "BTC"}}]}',
      catalog,
    );
    expect(plan).toEqual([{ tool: 'finance', args: { type: 'crypto', symbol: 'BTC' } }]);
  });

  it('keeps the order the model listed the tools in', () => {
    const plan = parsePlan(
      '{"plans": [{"tool": "web_search", "args": {"query": "ETF news"}}, {"tool": "finance", "args": {"symbol": "SPY"}}]}',
      catalog,
    );
    expect(plan.map(entry => entry.tool)).toEqual(['web_search', 'finance']);
  });

  it.each(['', '   ', 'none', 'None.', 'no tools needed', 'N/A'])('returns an empty plan for %j', raw => {
    expect(parsePlan(raw, catalog)).toEqual([]);
  });

  it('returns an empty plan for an empty plans list', () => {
    expect(parsePlan('{"plans": []}', catalog)).toEqual([]);
  });

  it('extracts a fenced plan surrounded by prose', () => {
    const raw = [
      'Sure, here is the plan:',
      '```json',
      '{"plans": [{"tool": "web_search", "args": {"query": "AI news"}}]}',
      '```',
      'Let me know if you need anything else.',
    ].join('\n');

    expect(parsePlan(raw, catalog)).toEqual([{ tool: 'web_search', args: { query: 'AI news' } }]);
  });

  it('extracts an unfenced plan surrounded by prose', () => {
    const raw = 'I will look that up. {"plans": [{"tool": "finance", "args": {"symbol": "AAPL"}}]} Done.';
    expect(parsePlan(raw, catalog)).toEqual([{ tool: 'finance', args: { symbol: 'AAPL' } }]);
  });

  it('ignores reasoning blocks', () => {
    const raw = '<think>{"plans": "draft"}</think>{"plans": []}';
    expect(parsePlan(raw, catalog)).toEqual([]);
  });

  it('accepts the single-tool shape', () => {
    expect(parsePlan('{"tool": "finance", "args": {"symbol": "MSFT"}}', catalog)).toEqual([
      { tool: 'finance', args: { symbol: 'MSFT' } },
    ]);
  });

  it('treats a null tool as no tool', () => {
    expect(parsePlan('{"tool": null, "args": {}}', catalog)).toEqual([]);
  });

  it('accepts a bare array of entries', () => {
    expect(parsePlan('[{"tool": "web_search", "args": {"query": "weather"}}]', catalog)).toEqual([
      { tool: 'web_search', args: { query: 'weather' } },
    ]);
  });

  it('drops unknown tools and keeps the rest', () => {
    const plan = parsePlan(
      '{"plans": [{"tool": "web_search", "args": {"query": "x"}}, {"tool": "weather", "args": {"city": "Oslo"}}, {"tool": "finance", "args": {"symbol": "BTC"}}]}',
      catalog,
    );
    expect(plan).toEqual([
      { tool: 'web_search', args: { query: 'x' } },
      { tool: 'finance', args: { symbol: 'BTC' } },
    ]);
  });

  it('resolves tool names case-insensitively to the catalog spelling', () => {
    expect(parsePlan('{"plans": [{"tool": "Finance", "args": {"symbol": "BTC"}}]}', catalog)).toEqual([
      { tool: 'finance', args: { symbol: 'BTC' } },
    ]);
  });

  it('reads "arguments" and JSON-encoded args', () => {
    const plan = parsePlan(
      '{"plans": [{"tool": "finance", "arguments": {"symbol": "ETH"}}, {"tool": "web_search", "args": "{\\"query\\": \\"ETH\\"}"}]}',
      catalog,
    );
    expect(plan).toEqual([
      { tool: 'finance', args: { symbol: 'ETH' } },
      { tool: 'web_search', args: { query: 'ETH' } },
    ]);
  });

  it('defaults missing or non-object args to an empty mapping', () => {
    expect(parsePlan('{"plans": [{"tool": "finance"}, {"tool": "web_search", "args": 7}]}', catalog)).toEqual([
      { tool: 'finance', args: {} },
      { tool: 'web_search', args: {} },
    ]);
  });

  it('throws PlanParseError on truncated JSON', () => {
    expect(() => parsePlan('{"plans": [', catalog)).toThrow(PlanParseError);
  });

  it('throws PlanParseError when the reply has no structured content', () => {
    expect(() => parsePlan('I would call the finance tool for this.', catalog)).toThrow(PlanParseError);
  });

  it('throws PlanParseError on an unrecognized structure and keeps the raw output', () => {
    try {
      parsePlan('{"answer": 42}', catalog);
      expect.unreachable('parsePlan should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(PlanParseError);
      if (error instanceof PlanParseError) {
        expect(error.rawOutput).toBe('{"answer": 42}');
      }
    }
  });
});
