import { describeSchemaIssues, tradeRecordSchema } from '../../domain/model/schemas';
import type { ExportFormat, MlStats, RawTradeRecord, TradeRecord } from '../../domain/model/types';
import { compareStats, summarizeTrades } from '../../domain/stats/summarize_trades';
import { verifyTrades } from '../../domain/verification/verify_trades';
import type { LoggerPort } from '../ports/logger_port';
import type { MlDataPort } from '../ports/ml_data_port';
import type { TradeExportPort } from '../ports/trade_export_port';
import {
  formatStats,
  formatStatus,
  formatTradeEntry,
  formatTradeHeader,
  formatVerification
} from '../presenters/ml_presenter';

export interface QueryOptions {
  pair: string;
  limit: number;
  database_url: string;
  stats: boolean;
  status: boolean;
  verify: boolean;
  details: boolean;
  summary: boolean;
  export?: ExportFormat;
  output?: string;
}

export interface RunQueryDependencies {
  mlData: MlDataPort;
  exporter: TradeExportPort;
  logger: LoggerPort;
  write: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_NO_TRADES = 1;

function displayTrades(
  trades: readonly RawTradeRecord[],
  showDetails: boolean,
  deps: RunQueryDependencies
): TradeRecord[] {
  const displayable: TradeRecord[] = [];
  formatTradeHeader(trades.length).forEach(deps.write);

  trades.forEach((raw, index) => {
    const position = index + 1;
    const parsed = tradeRecordSchema.safeParse(raw);
    if (!parsed.success) {
      deps.logger.warn(`Trade ${position}: cannot display`, {
        reason: describeSchemaIssues(parsed.error)
      });
      return;
    }

    displayable.push(parsed.data);
    formatTradeEntry(parsed.data, position, showDetails).forEach(deps.write);
  });

  return displayable;
}

function reportSummary(
  trades: readonly TradeRecord[],
  remoteStats: MlStats | null,
  deps: RunQueryDependencies
): void {
  const local = summarizeTrades(trades);
  formatStats(local, 'Local Trade Summary').forEach(deps.write);

  if (remoteStats === null) {
    return;
  }

  if (local.total_trades !== remoteStats.total_trades) {
    deps.write(
      `ℹ️  Fetched ${local.total_trades} of ${remoteStats.total_trades} trades; ` +
        'skipping comparison with service statistics.'
    );
    return;
  }

  const mismatches = compareStats(local, remoteStats);
  if (mismatches.length === 0) {
    deps.write('✅ Local summary matches service statistics.');
    return;
  }

  deps.write('⚠️  Local summary differs from service statistics:');
  mismatches.forEach((mismatch) => deps.write(`   • ${mismatch}`));
}

/**
 * Fetches the trade history for one pair and runs every requested report
 * over it. Failures along the way are logged and the run continues; only an
 * empty trade history ends it early.
 */
export async function runQuery(options: QueryOptions, deps: RunQueryDependencies): Promise<number> {
  const { logger, mlData, write } = deps;

  write(`🔍 Querying ML trades for ${options.pair}...`);
  write(`🌐 Database URL: ${options.database_url}`);

  const tradesResult = await mlData.fetchTrades(options.pair, options.limit);
  if (!tradesResult.ok) {
    logger.error('failed to fetch ML trades', { pair: options.pair, error: tradesResult.error });
  }

  const trades = tradesResult.ok ? tradesResult.value : [];
  if (trades.length === 0) {
    write(`❌ No ML trades found for ${options.pair}`);
    return EXIT_NO_TRADES;
  }

  const displayable = displayTrades(trades, options.details, deps);

  let remoteStats: MlStats | null = null;
  if (options.stats) {
    const statsResult = await mlData.fetchStats(options.pair);
    if (statsResult.ok) {
      remoteStats = statsResult.value;
      formatStats(statsResult.value).forEach(write);
    } else {
      logger.error('failed to fetch ML stats', { pair: options.pair, error: statsResult.error });
    }
  }

  if (options.status) {
    const statusResult = await mlData.fetchStatus();
    if (statusResult.ok) {
      formatStatus(statusResult.value).forEach(write);
    } else {
      logger.error('failed to fetch ML status', { error: statusResult.error });
    }
  }

  if (options.summary) {
    reportSummary(displayable, remoteStats, deps);
  }

  if (options.verify) {
    write('');
    write('🔍 Verifying trade data integrity...');
    formatVerification(verifyTrades(trades)).forEach(write);
  }

  if (options.export !== undefined) {
    const exported = deps.exporter.exportTrades(trades, options.export, options.output);
    if (exported.ok) {
      write(`📁 Exported ${exported.count} trades to ${exported.path}`);
    } else {
      logger.error('export failed', { format: options.export, error: exported.error });
    }
  }

  write('');
  write('✅ Query completed successfully!');
  return EXIT_OK;
}
