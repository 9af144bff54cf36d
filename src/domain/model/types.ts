export const MARKET_REGIME_VALUES = ['Consolidating', 'Trending', 'Volatile'] as const;

export type MarketRegime = (typeof MARKET_REGIME_VALUES)[number];

export const TRADE_RECORD_FIELDS = [
  'id',
  'pair',
  'entry_price',
  'exit_price',
  'pnl',
  'duration_seconds',
  'entry_time',
  'exit_time',
  'success',
  'market_regime',
  'trend_strength',
  'volatility',
  'created_at'
] as const;

export type TradeRecordField = (typeof TRADE_RECORD_FIELDS)[number];

/**
 * A trade as it arrives from the database service. Nothing about its fields
 * is known until it has been verified or parsed.
 */
export type RawTradeRecord = Record<string, unknown>;

export interface TradeRecord {
  id: string | number;
  pair: string;
  entry_price: number;
  exit_price: number;
  pnl: number;
  duration_seconds: number;
  entry_time: string;
  exit_time: string;
  success: boolean;
  market_regime: string;
  trend_strength: number;
  volatility: number;
  created_at: string;
}

export interface MlStats {
  total_trades: number;
  win_rate: number;
  avg_pnl: number;
  avg_win: number;
  avg_loss: number;
}

export interface MlStatus {
  enabled: boolean;
  min_confidence: number;
  max_position_size: number;
  total_trades: number;
  win_rate: number;
  avg_pnl: number;
}

export interface VerificationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
  total_trades: number;
}

export type ExportFormat = 'csv' | 'json';

export function isMarketRegime(value: unknown): value is MarketRegime {
  return typeof value === 'string' && MARKET_REGIME_VALUES.some((regime) => regime === value);
}
