import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  FileTradeExporter,
  defaultExportBasename,
  renderCsv
} from '../../src/adapters/export/file_trade_exporter';
import { buildRawTrade, withoutFields } from '../domain/fixtures';

const CSV_HEADER =
  'id,pair,entry_price,exit_price,pnl,duration_seconds,entry_time,exit_time,success,' +
  'market_regime,trend_strength,volatility,created_at';

describe('FileTradeExporter', () => {
  let directory: string;
  const now = () => new Date(2024, 4, 6, 7, 8, 9);

  beforeEach(() => {
    directory = mkdtempSync(path.join(tmpdir(), 'ml-export-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('names files after the first pair and the current time', () => {
    const exporter = new FileTradeExporter({ directory, now });

    const result = exporter.exportTrades([buildRawTrade()], 'json');

    expect(result).toEqual({
      ok: true,
      path: path.join(directory, 'ml_trades_SOLUSDC_20240506_070809.json'),
      count: 1
    });
  });

  it('replaces path separators in the pair of a default name', () => {
    const exporter = new FileTradeExporter({ directory, now });

    const result = exporter.exportTrades([buildRawTrade({ pair: 'SOL/USDC' })], 'csv');

    expect(result).toEqual({
      ok: true,
      path: path.join(directory, 'ml_trades_SOL_USDC_20240506_070809.csv'),
      count: 1
    });
  });

  it('appends the extension to an explicit file name', () => {
    const exporter = new FileTradeExporter({ directory, now });

    const result = exporter.exportTrades([buildRawTrade()], 'CSV', 'weekly');

    expect(result).toEqual({ ok: true, path: path.join(directory, 'weekly.csv'), count: 1 });
  });

  it('round-trips records through JSON', () => {
    const trades = [buildRawTrade(), buildRawTrade({ id: 'b-2', pnl: -0.03, success: false })];
    const exporter = new FileTradeExporter({ directory, now });

    const result = exporter.exportTrades(trades, 'json', 'round');
    if (!result.ok) {
      throw new Error(result.error);
    }

    const contents = readFileSync(result.path, 'utf8');
    expect(JSON.parse(contents)).toEqual(trades);
    expect(contents.split('\n')[1]).toBe('  {');
  });

  it('refuses an empty batch', () => {
    const exporter = new FileTradeExporter({ directory, now });

    expect(exporter.exportTrades([], 'csv')).toEqual({ ok: false, error: 'No trades to export.' });
  });

  it('refuses unknown formats', () => {
    const exporter = new FileTradeExporter({ directory, now });

    expect(exporter.exportTrades([buildRawTrade()], 'xlsx')).toEqual({
      ok: false,
      error: 'Unsupported export format: xlsx'
    });
  });

  it('reports write failures', () => {
    const exporter = new FileTradeExporter({ directory: path.join(directory, 'missing'), now });

    const result = exporter.exportTrades([buildRawTrade()], 'json', 'x');

    expect(result.ok).toBe(false);
  });
});

describe('renderCsv', () => {
  it('writes the fixed column order and drops unknown fields', () => {
    const trade = { extra: 'ignored', ...buildRawTrade() };

    expect(renderCsv([trade]).split('\n')).toEqual([
      CSV_HEADER,
      '1,SOLUSDC,10,11,0.1,120,2024-01-01T00:00:00Z,2024-01-01T00:02:00Z,true,Trending,0.5,0.2,2024-01-01T00:02:00Z',
      ''
    ]);
  });

  it('leaves missing fields empty', () => {
    const trade = withoutFields(buildRawTrade({ success: false }), 'market_regime', 'volatility');

    expect(renderCsv([trade]).split('\n')[1]).toBe(
      '1,SOLUSDC,10,11,0.1,120,2024-01-01T00:00:00Z,2024-01-01T00:02:00Z,false,,0.5,,2024-01-01T00:02:00Z'
    );
  });
});

describe('defaultExportBasename', () => {
  it('uses unknown when the first record has no pair', () => {
    expect(defaultExportBasename([{ id: 1 }], new Date(2024, 0, 1, 0, 0, 0))).toBe(
      'ml_trades_unknown_20240101_000000'
    );
  });
});
