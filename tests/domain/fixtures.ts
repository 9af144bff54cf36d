import type { RawTradeRecord, TradeRecord } from '../../src/domain/model/types';

export function buildTrade(overrides: Partial<TradeRecord> = {}): TradeRecord {
  return {
    id: 1,
    pair: 'SOLUSDC',
    entry_price: 10,
    exit_price: 11,
    pnl: 0.1,
    duration_seconds: 120,
    entry_time: '2024-01-01T00:00:00Z',
    exit_time: '2024-01-01T00:02:00Z',
    success: true,
    market_regime: 'Trending',
    trend_strength: 0.5,
    volatility: 0.2,
    created_at: '2024-01-01T00:02:00Z',
    ...overrides
  };
}

export function buildRawTrade(overrides: RawTradeRecord = {}): RawTradeRecord {
  return { ...buildTrade(), ...overrides };
}

export function withoutFields(trade: RawTradeRecord, ...fields: string[]): RawTradeRecord {
  return Object.fromEntries(Object.entries(trade).filter(([key]) => !fields.includes(key)));
}
