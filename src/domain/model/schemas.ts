import { z } from 'zod';
import { parseIsoTimestamp } from '../utils/time';

const isoTimestamp = z
  .string()
  .refine((value) => parseIsoTimestamp(value) !== null, { message: 'Invalid ISO-8601 timestamp' });

export const tradeRecordSchema = z.object({
  id: z.union([z.string(), z.number()]),
  pair: z.string(),
  entry_price: z.number(),
  exit_price: z.number(),
  pnl: z.number(),
  duration_seconds: z.number(),
  entry_time: isoTimestamp,
  exit_time: isoTimestamp,
  success: z.boolean(),
  market_regime: z.string(),
  trend_strength: z.number(),
  volatility: z.number(),
  created_at: isoTimestamp
});

export const rawTradeListSchema = z.array(z.record(z.string(), z.unknown()));

export const mlStatsSchema = z.object({
  total_trades: z.number().int().nonnegative(),
  win_rate: z.number(),
  avg_pnl: z.number(),
  avg_win: z.number(),
  avg_loss: z.number()
});

export const mlStatusSchema = z.object({
  enabled: z.boolean(),
  min_confidence: z.number(),
  max_position_size: z.number(),
  total_trades: z.number().int().nonnegative(),
  win_rate: z.number(),
  avg_pnl: z.number()
});

export const apiEnvelopeSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  message: z.string().nullish()
});

export function describeSchemaIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
