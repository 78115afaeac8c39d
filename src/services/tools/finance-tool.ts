// Finance Tool
// Real-time quotes for stocks, crypto and forex pairs via Finnhub

import type { ToolArgs, ToolDefinition } from './types.js';
import { parseToolArgs } from './validation.js';
import { fetchQuote, resolveSymbol, type AssetClass, type MarketQuote } from '../finance.js';
import { ToolExecutionError } from '../../utils/errors.js';

export interface FinancePayload {
  symbol: string;
  resolvedSymbol: string;
  type: AssetClass;
  quote: MarketQuote;
  source: 'finnhub';
}

function toAssetClass(value: unknown): AssetClass {
  return value === 'crypto' || value === 'forex' ? value : 'stock';
}

export const financeTool: ToolDefinition<FinancePayload> = {
  name: 'finance',
  description:
    'Fetch real-time market quotes (current price, change, percent change, day high/low) for stocks, ' +
    'cryptocurrencies and forex pairs. Use it for any question about a current price or market move.',
  parameters: [
    {
      name: 'type',
      type: 'string',
      description: 'Asset class of the symbol',
      required: false,
      enum: ['stock', 'crypto', 'forex'],
      default: 'stock',
    },
    {
      name: 'symbol',
      type: 'string',
      description: 'Ticker or pair, e.g. "AAPL", "BTC", "EUR/USD"',
      required: true,
    },
  ],
  async invoke(args: ToolArgs): Promise<FinancePayload> {
    const values = parseToolArgs(financeTool, args);
    const type = toAssetClass(values.type);
    const symbol = String(values.symbol);
    const resolvedSymbol = resolveSymbol(type, symbol);

    try {
      const quote = await fetchQuote(resolvedSymbol);
      return { symbol, resolvedSymbol, type, quote, source: 'finnhub' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ToolExecutionError(financeTool.name, message, { cause: error });
    }
  },
};
