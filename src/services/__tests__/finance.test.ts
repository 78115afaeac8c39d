import { describe, it, expect } from 'vitest';
import { resolveSymbol } from '../finance.js';

describe('resolveSymbol', () => {
  it.each([
    ['BTC', 'BINANCE:BTCUSDT'],
    ['eth', 'BINANCE:ETHUSDT'],
    ['BTC/USD', 'BINANCE:BTCUSDT'],
    ['btc-eur', 'BINANCE:BTCEUR'],
    ['SOLUSDT', 'BINANCE:SOLUSDT'],
  ])('maps crypto %s to %s', (symbol, expected) => {
    expect(resolveSymbol('crypto', symbol)).toBe(expected);
  });

  it.each([
    ['EUR/USD', 'OANDA:EUR_USD'],
    ['gbpjpy', 'OANDA:GBP_JPY'],
    ['EUR', 'OANDA:EUR_USD'],
  ])('maps forex %s to %s', (symbol, expected) => {
    expect(resolveSymbol('forex', symbol)).toBe(expected);
  });

  it('upper-cases stock tickers', () => {
    expect(resolveSymbol('stock', ' aapl ')).toBe('AAPL');
  });

  it('keeps exchange-qualified symbols', () => {
    expect(resolveSymbol('crypto', 'coinbase:btc-usd')).toBe('COINBASE:BTC-USD');
  });

  it('is stable when applied to its own output', () => {
    const once = resolveSymbol('crypto', 'BTC');
    expect(resolveSymbol('crypto', once)).toBe(once);
  });
});
