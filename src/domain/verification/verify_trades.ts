import {
  TRADE_RECORD_FIELDS,
  isMarketRegime,
  type RawTradeRecord,
  type VerificationReport
} from '../model/types';
import { isFiniteNumber } from '../utils/math';
import { parseIsoTimestamp, secondsBetween } from '../utils/time';

export const DURATION_TOLERANCE_SECONDS = 1;

const TIMESTAMP_FIELDS = ['entry_time', 'exit_time', 'created_at'] as const;

function hasField(trade: RawTradeRecord, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(trade, field) && trade[field] !== undefined;
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }

  return JSON.stringify(value) ?? String(value);
}

interface Findings {
  errors: string[];
  warnings: string[];
}

function checkTrade(trade: RawTradeRecord, position: number, findings: Findings): void {
  const label = `Trade ${position}`;
  const error = (message: string): void => {
    findings.errors.push(`${label}: ${message}`);
  };
  const warn = (message: string): void => {
    findings.warnings.push(`${label}: ${message}`);
  };

  for (const field of TRADE_RECORD_FIELDS) {
    if (!hasField(trade, field)) {
      error(`Missing required field '${field}'`);
    }
  }

  for (const field of ['entry_price', 'exit_price'] as const) {
    if (!hasField(trade, field)) {
      continue;
    }

    const price = trade[field];
    if (!isFiniteNumber(price) || price <= 0) {
      error(`Invalid ${field} (${describeValue(price)})`);
    }
  }

  if (hasField(trade, 'pnl') && !isFiniteNumber(trade.pnl)) {
    error(`Invalid pnl type (${trade.pnl === null ? 'null' : typeof trade.pnl})`);
  }

  const duration = trade.duration_seconds;
  if (hasField(trade, 'duration_seconds')) {
    if (!isFiniteNumber(duration)) {
      warn(`Invalid duration (${describeValue(duration)})`);
    } else if (duration < 0) {
      warn(`Negative duration (${duration}s)`);
    }
  }

  const trendStrength = trade.trend_strength;
  if (
    hasField(trade, 'trend_strength') &&
    (!isFiniteNumber(trendStrength) || trendStrength < 0 || trendStrength > 1)
  ) {
    warn(`Trend strength out of range (${describeValue(trendStrength)})`);
  }

  const volatility = trade.volatility;
  if (hasField(trade, 'volatility')) {
    if (!isFiniteNumber(volatility)) {
      warn(`Invalid volatility (${describeValue(volatility)})`);
    } else if (volatility < 0) {
      warn(`Negative volatility (${volatility})`);
    }
  }

  if (hasField(trade, 'market_regime') && !isMarketRegime(trade.market_regime)) {
    warn(`Unknown market regime (${describeValue(trade.market_regime)})`);
  }

  const parsedTimes = new Map<string, Date>();
  for (const field of TIMESTAMP_FIELDS) {
    if (!hasField(trade, field)) {
      continue;
    }

    const parsed = parseIsoTimestamp(trade[field]);
    if (parsed === null) {
      error(`Invalid datetime format for ${field} (${describeValue(trade[field])})`);
      continue;
    }

    parsedTimes.set(field, parsed);
  }

  const entryTime = parsedTimes.get('entry_time');
  const exitTime = parsedTimes.get('exit_time');
  if (entryTime === undefined || exitTime === undefined) {
    return;
  }

  if (exitTime.getTime() <= entryTime.getTime()) {
    error('Exit time before or equal to entry time');
  }

  if (isFiniteNumber(duration)) {
    const calculated = secondsBetween(entryTime, exitTime);
    if (Math.abs(calculated - duration) > DURATION_TOLERANCE_SECONDS) {
      warn(`Duration mismatch (calculated: ${calculated.toFixed(0)}s, stored: ${duration}s)`);
    }
  }
}

/**
 * Checks every record for presence, range, type and time consistency.
 * Errors make the report invalid; warnings never do.
 */
export function verifyTrades(trades: readonly RawTradeRecord[]): VerificationReport {
  if (trades.length === 0) {
    return {
      valid: false,
      errors: ['No trades found'],
      warnings: [],
      total_trades: 0
    };
  }

  const findings: Findings = { errors: [], warnings: [] };
  trades.forEach((trade, index) => {
    checkTrade(trade, index + 1, findings);
  });

  return {
    valid: findings.errors.length === 0,
    errors: findings.errors,
    warnings: findings.warnings,
    total_trades: trades.length
  };
}
