import type { MlStats, MlStatus, TradeRecord, VerificationReport } from '../../domain/model/types';
import { formatPercent, formatSignedPercent } from '../../domain/utils/math';
import { formatLocalTimestamp, parseIsoTimestamp } from '../../domain/utils/time';

export const TRADE_RULE = '='.repeat(120);
export const SECTION_RULE = '='.repeat(50);

export function formatDisplayTime(value: string): string {
  const parsed = parseIsoTimestamp(value);
  if (parsed === null) {
    throw new Error(`Invalid timestamp: ${value}`);
  }

  return formatLocalTimestamp(parsed);
}

function pnlMarker(pnl: number): string {
  if (pnl > 0) {
    return '💰';
  }

  return pnl < 0 ? '💸' : '➡️';
}

export function formatTrade(trade: TradeRecord): string {
  const statusMarker = trade.success ? '✅' : '❌';
  const durationMinutes = trade.duration_seconds / 60;

  return [
    `${statusMarker} ${pnlMarker(trade.pnl)} ${trade.pair}`,
    `Entry: $${trade.entry_price.toFixed(4)}`,
    `Exit: $${trade.exit_price.toFixed(4)}`,
    `PnL: ${formatSignedPercent(trade.pnl, 2)}%`,
    `Duration: ${durationMinutes.toFixed(1)}m`,
    `Regime: ${trade.market_regime}`,
    `Trend: ${trade.trend_strength.toFixed(3)}`,
    `Vol: ${trade.volatility.toFixed(3)}`,
    `Time: ${formatDisplayTime(trade.entry_time)}`
  ].join(' | ');
}

/** Numbered listing line plus, with details, the id and creation time. */
export function formatTradeEntry(trade: TradeRecord, position: number, showDetails: boolean): string[] {
  const lines = [`${String(position).padStart(2)}. ${formatTrade(trade)}`];
  if (showDetails) {
    lines.push(`    ID: ${trade.id}`, `    Created: ${formatDisplayTime(trade.created_at)}`, '');
  }

  return lines;
}

export function formatTradeHeader(count: number): string[] {
  return ['', `🤖 ML Trade History (${count} trades):`, TRADE_RULE];
}

export function formatStats(stats: MlStats, title = 'ML Trade Statistics'): string[] {
  return [
    '',
    `📊 ${title}:`,
    SECTION_RULE,
    `Total Trades: ${stats.total_trades}`,
    `Win Rate: ${formatPercent(stats.win_rate, 1)}%`,
    `Average PnL: ${formatSignedPercent(stats.avg_pnl, 2)}%`,
    `Average Win: ${formatSignedPercent(stats.avg_win, 2)}%`,
    `Average Loss: ${formatSignedPercent(stats.avg_loss, 2)}%`
  ];
}

export function formatStatus(status: MlStatus): string[] {
  return [
    '',
    '🤖 ML System Status:',
    SECTION_RULE,
    `Enabled: ${status.enabled ? '✅' : '❌'}`,
    `Min Confidence: ${formatPercent(status.min_confidence, 1)}%`,
    `Max Position Size: ${formatPercent(status.max_position_size, 1)}%`,
    `Total Trades: ${status.total_trades}`,
    `Win Rate: ${formatPercent(status.win_rate, 1)}%`,
    `Average PnL: ${formatSignedPercent(status.avg_pnl, 2)}%`
  ];
}

export function formatVerification(report: VerificationReport): string[] {
  const lines: string[] = [];

  if (report.valid) {
    lines.push('✅ All trade data is valid!');
  } else {
    lines.push('❌ Data validation errors found:');
    lines.push(...report.errors.map((error) => `   • ${error}`));
  }

  if (report.warnings.length > 0) {
    lines.push('', '⚠️  Warnings:');
    lines.push(...report.warnings.map((warning) => `   • ${warning}`));
  }

  lines.push(
    '',
    '📊 Verification Summary:',
    `   Total trades checked: ${report.total_trades}`,
    `   Errors: ${report.errors.length}`,
    `   Warnings: ${report.warnings.length}`
  );

  return lines;
}
