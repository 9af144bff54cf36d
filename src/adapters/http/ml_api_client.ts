import type { z } from 'zod';
import type { FetchResult, MlDataPort } from '../../app/ports/ml_data_port';
import {
  apiEnvelopeSchema,
  describeSchemaIssues,
  mlStatsSchema,
  mlStatusSchema,
  rawTradeListSchema
} from '../../domain/model/schemas';
import type { MlStats, MlStatus, RawTradeRecord } from '../../domain/model/types';

export const REQUEST_TIMEOUT_MS = 10_000;

function causeOf(error: Error): string | undefined {
  const cause: unknown = error.cause;
  if (cause === undefined) {
    return undefined;
  }

  return cause instanceof Error ? cause.message : JSON.stringify(cause) ?? String(cause);
}

function describeRequestError(error: unknown, timeoutMs: number): string {
  if (!(error instanceof Error)) {
    return String(error);
  }

  if (error.name === 'TimeoutError') {
    return `request timed out after ${timeoutMs}ms`;
  }

  const cause = causeOf(error);
  return cause === undefined ? error.message : `${error.message} (cause=${cause})`;
}

export interface MlApiClientOptions {
  timeoutMs?: number;
}

/** Read-only client for the `/ml/*` endpoints of the database service. */
export class MlApiClient implements MlDataPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(baseUrl: string, options: MlApiClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async fetchTrades(pair: string, limit: number): Promise<FetchResult<RawTradeRecord[]>> {
    const url = new URL(`${this.baseUrl}/ml/trades/${encodeURIComponent(pair)}`);
    url.searchParams.set('limit', String(limit));
    return this.get(url, rawTradeListSchema);
  }

  async fetchStats(pair: string): Promise<FetchResult<MlStats>> {
    const url = new URL(`${this.baseUrl}/ml/stats/${encodeURIComponent(pair)}`);
    return this.get(url, mlStatsSchema);
  }

  async fetchStatus(): Promise<FetchResult<MlStatus>> {
    return this.get(new URL(`${this.baseUrl}/ml/status`), mlStatusSchema);
  }

  private async get<T>(url: URL, dataSchema: z.ZodType<T>): Promise<FetchResult<T>> {
    let response: Response;
    try {
      response = await fetch(url.toString(), {
        headers: { accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      return { ok: false, error: `Network error: ${describeRequestError(error, this.timeoutMs)}` };
    }

    if (!response.ok) {
      return { ok: false, error: `HTTP ${response.status} from ${url.pathname}` };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return { ok: false, error: `JSON decode error: ${describeRequestError(error, this.timeoutMs)}` };
    }

    const envelope = apiEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      return {
        ok: false,
        error: `Unexpected response payload: ${describeSchemaIssues(envelope.error)}`
      };
    }

    if (!envelope.data.success || envelope.data.data === undefined) {
      return { ok: false, error: `Error: ${envelope.data.message ?? 'Unknown error'}` };
    }

    const data = dataSchema.safeParse(envelope.data.data);
    if (!data.success) {
      return { ok: false, error: `Unexpected response payload: ${describeSchemaIssues(data.error)}` };
    }

    return { ok: true, value: data.data };
  }
}
