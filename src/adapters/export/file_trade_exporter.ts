import { stringify } from 'csv-stringify/sync';
import { writeFileSync } from 'node:fs';
import path from 'node:path';
import {
  isExportFormat,
  type ExportResult,
  type TradeExportPort
} from '../../app/ports/trade_export_port';
import { TRADE_RECORD_FIELDS, type RawTradeRecord } from '../../domain/model/types';
import { formatFileTimestamp } from '../../domain/utils/time';

export interface FileTradeExporterOptions {
  directory?: string;
  now?: () => Date;
}

function pairOf(trade: RawTradeRecord | undefined): string {
  const pair = trade?.pair;
  if (typeof pair === 'string' || typeof pair === 'number') {
    const safe = String(pair).replace(/[^\w.-]/g, '_');
    return safe === '' ? 'unknown' : safe;
  }

  return 'unknown';
}

/** JSON.stringify replacer for values JSON has no representation for. */
function toJsonSafe(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  return value;
}

export function defaultExportBasename(trades: readonly RawTradeRecord[], now: Date): string {
  return `ml_trades_${pairOf(trades[0])}_${formatFileTimestamp(now)}`;
}

export function renderCsv(trades: readonly RawTradeRecord[]): string {
  return stringify([...trades], {
    header: true,
    columns: [...TRADE_RECORD_FIELDS],
    cast: {
      boolean: (value) => String(value)
    }
  });
}

export function renderJson(trades: readonly RawTradeRecord[]): string {
  return JSON.stringify(trades, toJsonSafe, 2);
}

export class FileTradeExporter implements TradeExportPort {
  private readonly directory: string;
  private readonly now: () => Date;

  constructor(options: FileTradeExporterOptions = {}) {
    this.directory = options.directory ?? process.cwd();
    this.now = options.now ?? (() => new Date());
  }

  exportTrades(trades: readonly RawTradeRecord[], format: string, filename?: string): ExportResult {
    if (trades.length === 0) {
      return { ok: false, error: 'No trades to export.' };
    }

    const normalizedFormat = format.toLowerCase();
    if (!isExportFormat(normalizedFormat)) {
      return { ok: false, error: `Unsupported export format: ${format}` };
    }

    const basename = filename ?? defaultExportBasename(trades, this.now());
    const target = path.resolve(this.directory, `${basename}.${normalizedFormat}`);
    const contents = normalizedFormat === 'csv' ? renderCsv(trades) : renderJson(trades);

    try {
      writeFileSync(target, contents, 'utf8');
    } catch (error) {
      return {
        ok: false,
        error: `Failed to write ${target}: ${error instanceof Error ? error.message : String(error)}`
      };
    }

    return { ok: true, path: target, count: trades.length };
  }
}
