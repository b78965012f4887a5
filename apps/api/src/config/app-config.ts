/**
 * Runtime configuration
 * Read once from the environment (after dotenv) and validated with zod.
 */

import { z } from 'zod';
import type { AnalysisOptions } from '@kinetrace/domain';

/** "50, 100" → [50, 100] */
export const offsetListSchema = z
  .string()
  .transform((raw) => raw.split(',').map((part) => part.trim()).filter((part) => part !== ''))
  .pipe(z.array(z.coerce.number().positive().finite()).min(1));

export const dateOrderSchema = z.enum(['day-first', 'month-first']);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  BODY_LIMIT: z.string().default('5mb'),
  MAX_ROWS: z.coerce.number().int().positive().default(200_000),
  DATE_ORDER: dateOrderSchema.default('day-first'),
  STOP_SUMMARY_OFFSETS_M: offsetListSchema.default('50,100'),
  DECELERATION_OFFSETS_M: offsetListSchema.default('1,10,50,100'),
  DECELERATION_WINDOW_M: z.coerce.number().positive().finite().default(1000),
  RESAMPLE_INTERVAL_S: z.coerce.number().positive().finite().default(10),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  bodyLimit: string;
  maxRows: number;
  analysis: AnalysisOptions;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    bodyLimit: parsed.BODY_LIMIT,
    maxRows: parsed.MAX_ROWS,
    analysis: {
      dateOrder: parsed.DATE_ORDER,
      stopSummaryOffsetsM: parsed.STOP_SUMMARY_OFFSETS_M,
      decelerationOffsetsM: parsed.DECELERATION_OFFSETS_M,
      decelerationWindowM: parsed.DECELERATION_WINDOW_M,
      resampleIntervalS: parsed.RESAMPLE_INTERVAL_S,
    },
  };
}
