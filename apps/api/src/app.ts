import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import { CsvTableDecoder } from '@kinetrace/adapters';

import { createAnalysisRouter } from './controllers/analysis.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { loadConfig } from './config/app-config.js';
import type { AppConfig } from './config/app-config.js';

export function buildApp(config: AppConfig = loadConfig()): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigin }));
  app.use(morgan('combined'));
  app.use(express.json({ limit: config.bodyLimit }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/analysis', createAnalysisRouter({ config, decoder: new CsvTableDecoder() }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>) {
  return createServer(app);
}
