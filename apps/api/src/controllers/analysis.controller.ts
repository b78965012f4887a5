import express, { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { AnalysisError, AnalysisOptions, RawTable, TableDecoderPort } from '@kinetrace/domain';
import { dateOrderSchema, offsetListSchema } from '../config/app-config.js';
import type { AppConfig } from '../config/app-config.js';
import { TelemetryAnalysisService } from '../services/analysis/analysis.service.js';
import { presentAnalysis } from '../services/analysis/analysis.presenter.js';

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const optionsSchema = z.object({
  dateOrder: dateOrderSchema.optional(),
  stopSummaryOffsetsM: z.array(z.number().positive().finite()).min(1).max(20).optional(),
  decelerationOffsetsM: z.array(z.number().positive().finite()).min(1).max(20).optional(),
  decelerationWindowM: z.number().positive().finite().max(100_000).optional(),
  resampleIntervalS: z.number().positive().finite().max(86_400).optional(),
});

const csvQuerySchema = z.object({
  dateOrder: dateOrderSchema.optional(),
  offsets: offsetListSchema.optional(),
  decelerationOffsets: offsetListSchema.optional(),
  windowM: z.coerce.number().positive().finite().max(100_000).optional(),
  intervalS: z.coerce.number().positive().finite().max(86_400).optional(),
});

interface AnalysisRouterDeps {
  config: AppConfig;
  decoder: TableDecoderPort;
}

function failureBody(error: AnalysisError) {
  return { error: error.kind, message: error.message, ...(error.cause ? { cause: error.cause } : {}) };
}

export function createAnalysisRouter({ config, decoder }: AnalysisRouterDeps): Router {
  const router = Router();
  const baseService = new TelemetryAnalysisService(config.analysis);
  const rowsSchema = z.array(z.array(cellSchema)).min(1).max(config.maxRows);

  function run(table: RawTable, overrides: Partial<AnalysisOptions>, res: Response): void {
    const analysisId = uuidv4();
    const outcome = baseService.withOptions(overrides).analyze(table);

    if (!outcome.ok) {
      console.warn(`[analysis] ${analysisId} rejected: ${outcome.error.kind}`, outcome.error.cause ?? '');
      res.status(422).json(failureBody(outcome.error));
      return;
    }

    const { result } = outcome;
    console.log(
      `[analysis] ${analysisId} rows=${table.length} samples=${result.sampleCount} ` +
        `dropped=${result.droppedRowCount} stops=${result.stops.length}`,
    );
    res.json({ analysisId, ...presentAnalysis(result) });
  }

  /** POST /api/analysis — raw cell grid from a table decoder */
  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = z.object({ rows: rowsSchema, options: optionsSchema.optional() }).parse(req.body);
      run(body.rows, body.options ?? {}, res);
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/analysis/csv — delimited text upload */
  router.post(
    '/csv',
    express.text({ type: [...decoder.mediaTypes], limit: config.bodyLimit }),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = csvQuerySchema.parse(req.query);
        const source: unknown = req.body;
        if (typeof source !== 'string') {
          res.status(415).json({ error: 'unsupported_media_type', accepted: decoder.mediaTypes });
          return;
        }

        const decoded = decoder.decode(source);
        if (!decoded.ok) {
          console.warn('[analysis] upload unreadable', decoded.error.cause ?? '');
          res.status(422).json(failureBody(decoded.error));
          return;
        }
        if (decoded.table.length > config.maxRows) {
          res.status(413).json({ error: 'too_many_rows', maxRows: config.maxRows });
          return;
        }

        run(
          decoded.table,
          {
            dateOrder: query.dateOrder,
            stopSummaryOffsetsM: query.offsets,
            decelerationOffsetsM: query.decelerationOffsets,
            decelerationWindowM: query.windowM,
            resampleIntervalS: query.intervalS,
          },
          res,
        );
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
