import fs from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import dotenv from 'dotenv';
import express, { type NextFunction, type Request, type Response } from 'express';
import { loadConfig, type AppConfig } from './src/config';
import { BATCH_ARCHIVE_NAME } from './src/constants';
import { AppError, RequestValidationError } from './src/errors';
import { getRenderer, parseDocumentFormat } from './src/renderers';
import { buildBatchArchive, generateBatchFromSpreadsheet } from './src/services/batchGenerator';
import { previewSpreadsheetNames } from './src/services/namesSpreadsheet';
import { loadPsalm119Stanzas } from './src/services/psalm119Source';
import type { ApiErrorBody, NameStanzasResponse, Psalm119Stanzas } from './src/types';
import { buildContentDisposition, buildDocumentFileName } from './src/utils/documentFileName';
import { logError, logInfo } from './src/utils/logging';
import { getStanzasForName, resolveNameStanzas } from './src/utils/nameStanzas';

export interface AppDeps {
  stanzas: Psalm119Stanzas;
  config: AppConfig;
}

// Failure details beyond this many stay in the count only (header size).
const MAX_FAILURES_IN_HEADER = 100;

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncHandler =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readField = (body: unknown, key: string): unknown => (isRecord(body) ? body[key] : undefined);

const readName = (value: unknown): string => {
  const name = typeof value === 'string' ? value.trim() : '';
  if (!name) {
    throw new RequestValidationError('MISSING_NAME', 'Please enter a Hebrew name.', 'נא להזין שם בעברית.');
  }
  return name;
};

const readUploadedFile = (body: unknown): Buffer => {
  const raw = readField(body, 'file');
  const base64 = typeof raw === 'string' ? raw.replace(/^data:[^,]*,/, '').trim() : '';
  if (!base64) {
    throw new RequestValidationError('MISSING_FILE', 'Please upload an Excel file.', 'נא להעלות קובץ אקסל.');
  }
  return Buffer.from(base64, 'base64');
};

const sendError = (res: Response, status: number, body: ApiErrorBody) => {
  res.status(status).json(body);
};

const readHttpStatus = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null || !('status' in err)) return undefined;
  return typeof err.status === 'number' ? err.status : undefined;
};

export function createApp({ stanzas, config }: AppDeps) {
  const app = express();
  const rendererOptions = { pdfFontPath: config.pdfFontPath };

  app.use(express.json({ limit: config.maxUploadBytes }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', stanzaCount: stanzas.length, defaultFormat: config.defaultFormat });
  });

  app.get('/api/name-stanzas', (req, res) => {
    const name = readName(req.query.name);
    const sections = getStanzasForName(name, stanzas);
    const body: NameStanzasResponse = {
      name,
      sections: sections.map(({ letter, index, stanza }) => ({ letter, index, verses: [...stanza] })),
    };
    res.json(body);
  });

  app.post(
    '/api/render-name-document',
    asyncHandler(async (req, res) => {
      const name = readName(readField(req.body, 'name'));
      const format = parseDocumentFormat(readField(req.body, 'format'), config.defaultFormat);
      const renderer = getRenderer(format, rendererOptions);

      const sections = resolveNameStanzas(name, stanzas);
      const bytes = await renderer.render(name, sections);
      const fileName = buildDocumentFileName(name, format);

      logInfo('Rendered document', { name, format, sections: sections.length });
      res
        .status(200)
        .set('Content-Type', renderer.mimeType)
        .set('Content-Disposition', buildContentDisposition(fileName))
        .send(Buffer.from(bytes));
    }),
  );

  app.post('/api/names-preview', (req, res) => {
    res.json(previewSpreadsheetNames(readUploadedFile(req.body)));
  });

  app.post(
    '/api/render-batch',
    asyncHandler(async (req, res) => {
      const data = readUploadedFile(req.body);
      const format = parseDocumentFormat(readField(req.body, 'format'), config.defaultFormat);
      const result = await generateBatchFromSpreadsheet(data, stanzas, getRenderer(format, rendererOptions));
      const archive = await buildBatchArchive(result);

      res
        .status(200)
        .set('Content-Type', 'application/zip')
        .set('Content-Disposition', buildContentDisposition(BATCH_ARCHIVE_NAME))
        .set('X-Batch-Succeeded', String(result.files.length))
        .set('X-Batch-Failed', String(result.failures.length))
        .set(
          'X-Batch-Failures',
          encodeURIComponent(JSON.stringify(result.failures.slice(0, MAX_FAILURES_IN_HEADER))),
        )
        .send(Buffer.from(archive));
    }),
  );

  const staticDir = path.resolve(config.staticDir);
  if (fs.existsSync(path.join(staticDir, 'index.html'))) {
    app.use(express.static(staticDir));
    app.get(/^\/(?!api\/).*/, (_req, res) => {
      res.sendFile(path.join(staticDir, 'index.html'));
    });
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      if (err.status >= 500) logError(err.code, err);
      sendError(res, err.status, {
        error: { code: err.code, message: err.message, messageHe: err.messageHe },
      });
      return;
    }

    const status = readHttpStatus(err);
    if (status !== undefined && status >= 400 && status < 500) {
      sendError(res, status, {
        error: { code: 'INVALID_REQUEST', message: err instanceof Error ? err.message : 'Invalid request' },
      });
      return;
    }

    logError('Unhandled request error', err);
    sendError(res, 500, {
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error', messageHe: 'שגיאה פנימית בשרת.' },
    });
  });

  return app;
}

async function main() {
  dotenv.config();
  const config = loadConfig();
  // Without the text nothing can be resolved, so a failed load ends the process.
  const stanzas = await loadPsalm119Stanzas({ url: config.verseSourceUrl });
  const app = createApp({ stanzas, config });
  app.listen(config.port, () => {
    logInfo(`Server listening on http://localhost:${config.port}`);
  });
}

const isEntryPoint =
  process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint) {
  main().catch((error: unknown) => {
    logError('Startup failed', error);
    process.exit(1);
  });
}
