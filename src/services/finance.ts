import { z } from 'zod';
import { env } from '../env.js';

export type AssetClass = 'stock' | 'crypto' | 'forex';

export interface MarketQuote {
  current: number;
  change: number | null;
  percentChange: number | null;
  high: number;
  low: number;
  open: number;
  previousClose: number;
  timestamp: string | null;
}

const REQUEST_TIMEOUT_MS = 10000;

const FinnhubQuoteSchema = z.object({
  c: z.number(),
  d: z.number().nullable().optional(),
  dp: z.number().nullable().optional(),
  h: z.number(),
  l: z.number(),
  o: z.number(),
  pc: z.number(),
  t: z.number().optional(),
});

function splitPair(symbol: string): string[] {
  return symbol.split(/[/\-_ ]+/).filter(Boolean);
}

/**
 * Maps a user-facing symbol to Finnhub's exchange-qualified form.
 * Symbols that already carry an `EXCHANGE:` prefix pass through untouched.
 */
export function resolveSymbol(assetClass: AssetClass, symbol: string): string {
  const normalized = symbol.trim().toUpperCase();
  if (normalized.includes(':')) return normalized;

  switch (assetClass) {
    case 'crypto': {
      const parts = splitPair(normalized);
      let base = parts[0] ?? normalized;
      let quote = parts[1] ?? 'USDT';
      if (parts.length === 1 && base.length > 4 && base.endsWith('USDT')) {
        base = base.slice(0, -4);
      }
      if (quote === 'USD') quote = 'USDT';
      return `BINANCE:${base}${quote}`;
    }
    case 'forex': {
      let parts = splitPair(normalized);
      if (parts.length === 1) {
        const single = parts[0] ?? normalized;
        parts = single.length === 6 ? [single.slice(0, 3), single.slice(3)] : [single, 'USD'];
      }
      return `OANDA:${parts[0]}_${parts[1]}`;
    }
    case 'stock':
      return normalized;
  }
}

export async function fetchQuote(symbol: string): Promise<MarketQuote> {
  const apiKey = env.FINNHUB_API_KEY;
  if (!apiKey) {
    throw new Error('FINNHUB_API_KEY is not configured');
  }

  const base = env.FINNHUB_ENDPOINT.replace(/\/+$/, '');
  const endpoint = new URL(`${base}/quote`);
  endpoint.searchParams.set('symbol', symbol);
  endpoint.searchParams.set('token', apiKey);

  const response = await fetch(endpoint.toString(), {
    method: 'GET',
    headers: { Accept: 'application/json' },
    signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
  });

  if (!response.ok) {
    throw new Error(`Finnhub error (${response.status})`);
  }

  const parsed = FinnhubQuoteSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error('Finnhub returned an unexpected quote payload');
  }

  const quote = parsed.data;
  // Finnhub answers unknown symbols with an all-zero quote
  if (quote.c === 0 && quote.pc === 0) {
    throw new Error(`No quote data for symbol "${symbol}"`);
  }

  return {
    current: quote.c,
    change: quote.d ?? null,
    percentChange: quote.dp ?? null,
    high: quote.h,
    low: quote.l,
    open: quote.o,
    previousClose: quote.pc,
    timestamp: quote.t ? new Date(quote.t * 1000).toISOString() : null,
  };
}
