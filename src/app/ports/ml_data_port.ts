import type { MlStats, MlStatus, RawTradeRecord } from '../../domain/model/types';

export type FetchResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface MlDataPort {
  fetchTrades(pair: string, limit: number): Promise<FetchResult<RawTradeRecord[]>>;
  fetchStats(pair: string): Promise<FetchResult<MlStats>>;
  fetchStatus(): Promise<FetchResult<MlStatus>>;
}
