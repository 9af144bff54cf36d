import type { ExportFormat, RawTradeRecord } from '../../domain/model/types';

export type ExportResult = { ok: true; path: string; count: number } | { ok: false; error: string };

export interface TradeExportPort {
  exportTrades(trades: readonly RawTradeRecord[], format: string, filename?: string): ExportResult;
}

export const EXPORT_FORMATS: readonly ExportFormat[] = ['csv', 'json'];

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}
