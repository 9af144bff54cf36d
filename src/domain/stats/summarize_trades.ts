import type { MlStats, TradeRecord } from '../model/types';
import { mean } from '../utils/math';

export const STATS_TOLERANCE = 1e-6;

const COMPARED_FIELDS = ['win_rate', 'avg_pnl', 'avg_win', 'avg_loss'] as const;

/** Aggregates trades the same way the database service builds its stats. */
export function summarizeTrades(trades: readonly TradeRecord[]): MlStats {
  const wins = trades.filter((trade) => trade.success);
  const losses = trades.filter((trade) => !trade.success);

  return {
    total_trades: trades.length,
    win_rate: trades.length > 0 ? wins.length / trades.length : 0,
    avg_pnl: mean(trades.map((trade) => trade.pnl)),
    avg_win: mean(wins.map((trade) => trade.pnl)),
    avg_loss: mean(losses.map((trade) => trade.pnl))
  };
}

/**
 * Lists every field where the locally computed summary disagrees with the
 * service. Callers only compare when both cover the same trade count.
 */
export function compareStats(local: MlStats, remote: MlStats): string[] {
  const mismatches: string[] = [];

  if (local.total_trades !== remote.total_trades) {
    mismatches.push(
      `total_trades differs (local: ${local.total_trades}, service: ${remote.total_trades})`
    );
  }

  for (const field of COMPARED_FIELDS) {
    if (Math.abs(local[field] - remote[field]) > STATS_TOLERANCE) {
      mismatches.push(`${field} differs (local: ${local[field]}, service: ${remote[field]})`);
    }
  }

  return mismatches;
}
