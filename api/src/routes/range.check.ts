import fs from 'fs';
import { promises as fsPromises } from 'fs';
import multer from 'multer';
import { Router } from 'express';
import type { Request } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config';
import { runRangeCheck } from '../services/rangeCheck/service';
import type { RangeCheckOptionsInput } from '../services/rangeCheck/service';
import { readWorkbook } from '../services/rangeCheck/workbookReader';
import { processedFileName, writeCheckedWorkbook } from '../services/rangeCheck/workbookWriter';
import type { Alignment, Diagnostic } from '../services/rangeCheck/types';

const XLSX_MIME = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const WARNINGS_HEADER = 'X-Range-Check-Warnings';
export const SUMMARY_HEADER = 'X-Range-Check-Summary';

// multipart fields arrive as strings; an empty field means "use the default"
const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const FormSchema = z.object({
  strategy: z.preprocess(blankToUndefined, z.enum(['offset', 'identifier']).optional()),
  headerRows: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional()),
  headerCols: z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().optional()),
  identifierRow: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
});

const cleanupTemp = async (filePath?: string) => {
  if (!filePath) return;
  try {
    await fsPromises.unlink(filePath);
  } catch (err) {
    console.warn('Could not remove temporary upload', err);
  }
};

const serializeAlignment = (alignment: Alignment) => {
  if (alignment.kind === 'offset') return alignment;
  return {
    kind: alignment.kind,
    headerRow: alignment.headerRow,
    sensed: Object.fromEntries(alignment.sensed),
    lower: Object.fromEntries(alignment.lower),
    upper: Object.fromEntries(alignment.upper),
  };
};

// header values must stay within latin1
const encodeHeader = (value: unknown) => encodeURIComponent(JSON.stringify(value));

const warningMessages = (diagnostics: Diagnostic[]) =>
  diagnostics.filter(d => d.level === 'warning').map(d => d.message);

export default function createRangeCheckRouter(config: AppConfig) {
  const router = Router();

  if (!fs.existsSync(config.upload.tmpDir)) {
    fs.mkdirSync(config.upload.tmpDir, { recursive: true });
  }

  const upload = multer({
    dest: config.upload.tmpDir,
    limits: { fileSize: config.upload.maxBytes },
  });

  const parseOptions = (req: Request): RangeCheckOptionsInput => {
    const form = FormSchema.parse(req.body ?? {});
    return {
      strategy: form.strategy ?? 'offset',
      headerRows: form.headerRows ?? config.rangeDefaults.headerRows,
      headerCols: form.headerCols ?? config.rangeDefaults.headerCols,
      identifierRow: form.identifierRow ?? config.rangeDefaults.identifierRow,
    };
  };

  router.post('/range-check', upload.single('file'), async (req, res, next) => {
    if (!req.file) {
      return res.status(400).json({ error: 'Attach an Excel file in the "file" field' });
    }
    try {
      const options = parseOptions(req);
      const outcome = runRangeCheck(readWorkbook(req.file.path), options);
      const buffer = await writeCheckedWorkbook({ path: req.file.path, name: req.file.originalname }, outcome);
      res.attachment(processedFileName());
      res.type(XLSX_MIME);
      res.setHeader(WARNINGS_HEADER, encodeHeader(warningMessages(outcome.diagnostics)));
      res.setHeader(SUMMARY_HEADER, encodeHeader(outcome.result.summary));
      return res.send(buffer);
    } catch (err) {
      return next(err);
    } finally {
      await cleanupTemp(req.file?.path);
    }
  });

  router.post('/range-check/preview', upload.single('file'), async (req, res, next) => {
    if (!req.file) {
      return res.status(400).json({ error: 'Attach an Excel file in the "file" field' });
    }
    try {
      const options = parseOptions(req);
      const outcome = runRangeCheck(readWorkbook(req.file.path), options);
      return res.json({
        roles: Object.fromEntries(Object.entries(outcome.roles).map(([role, name]) => [role, name ?? null])),
        alignment: serializeAlignment(outcome.alignment),
        summary: outcome.result.summary,
        diagnostics: outcome.diagnostics,
      });
    } catch (err) {
      return next(err);
    } finally {
      await cleanupTemp(req.file?.path);
    }
  });

  return router;
}
