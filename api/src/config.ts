// api/src/config.ts
import path from 'path';
import { z } from 'zod';

const DEFAULT_ORIGINS = 'http://localhost:5173,http://127.0.0.1:5173';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGINS: z.string().default(DEFAULT_ORIGINS),
  UPLOAD_MAX_MB: z.coerce.number().positive().default(30),
  UPLOAD_TMP_DIR: z.string().min(1).optional(),
  RANGE_HEADER_ROWS: z.coerce.number().int().nonnegative().default(3),
  RANGE_HEADER_COLS: z.coerce.number().int().nonnegative().default(2),
  RANGE_IDENTIFIER_ROW: z.coerce.number().int().positive().default(1),
});

export interface AppConfig {
  port: number;
  corsOrigins: string[];
  upload: { maxBytes: number; tmpDir: string };
  rangeDefaults: { headerRows: number; headerCols: number; identifierRow: number };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(Boolean),
    upload: {
      maxBytes: Math.round(parsed.UPLOAD_MAX_MB * 1024 * 1024),
      tmpDir: path.resolve(process.cwd(), parsed.UPLOAD_TMP_DIR ?? 'uploads/tmp'),
    },
    rangeDefaults: {
      headerRows: parsed.RANGE_HEADER_ROWS,
      headerCols: parsed.RANGE_HEADER_COLS,
      identifierRow: parsed.RANGE_IDENTIFIER_ROW,
    },
  };
}
