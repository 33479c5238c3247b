// api/src/app.ts
import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import { ZodError } from 'zod';
import type { AppConfig } from './config';
import { MissingRoleError, WorkbookFormatError } from './lib/errors';
import createRangeCheckRouter, { SUMMARY_HEADER, WARNINGS_HEADER } from './routes/range.check';

export const API_PREFIX = '/api';
export const API_VERSION = '1.0.0';

export function createApp(config: AppConfig) {
  const app = express();

  // CORS for the Vite dev server; the download headers must be readable from the browser
  app.use(cors({
    origin: config.corsOrigins,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['Content-Disposition', WARNINGS_HEADER, SUMMARY_HEADER],
    credentials: false,
  }));

  app.use(express.json({ limit: '1mb' }));

  app.get(`${API_PREFIX}/health`, (_req, res) => res.json({ ok: true }));
  app.get(`${API_PREFIX}/version`, (_req, res) => res.json({ version: API_VERSION }));

  app.use(API_PREFIX, createRangeCheckRouter(config));

  app.use(API_PREFIX, (_req, res) => res.status(404).json({ error: 'Not found' }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      return res.status(400).json({ error: 'Validation', issues: err.issues });
    }
    if (err instanceof MissingRoleError) {
      return res.status(422).json({ error: err.message, missing: err.missing });
    }
    if (err instanceof WorkbookFormatError) {
      return res.status(400).json({ error: err.message });
    }
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ error: err.message });
    }
    console.error('Unhandled error:', err);
    return res.status(500).json({ error: 'Internal error' });
  });

  return app;
}
