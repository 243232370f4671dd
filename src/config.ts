import { DEFAULT_VERSE_SOURCE_URL } from './constants';
import { AppError } from './errors';
import type { DocumentFormat } from './types';
import { logWarn } from './utils/logging';

export interface AppConfig {
  port: number;
  verseSourceUrl: string;
  defaultFormat: DocumentFormat;
  /** Hebrew-capable TTF for PDF output; the bundled DejaVu Sans when unset. */
  pdfFontPath?: string;
  maxUploadBytes: number;
  staticDir: string;
}

type Env = Record<string, string | undefined>;

const DEFAULT_PORT = 3001;
const DEFAULT_MAX_UPLOAD_MB = 10;

const readPositiveInt = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    logWarn(`Ignoring invalid ${key}, using ${fallback}`, raw);
    return fallback;
  }
  return parsed;
};

const readFormat = (env: Env): DocumentFormat => {
  const raw = (env.DEFAULT_DOCUMENT_FORMAT ?? '').trim().toLowerCase();
  if (!raw) return 'docx';
  if (raw === 'docx' || raw === 'pdf') return raw;
  throw new AppError('INVALID_CONFIG', `DEFAULT_DOCUMENT_FORMAT must be "docx" or "pdf", got "${raw}"`);
};

const readOptional = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    verseSourceUrl: readOptional(env, 'VERSE_SOURCE_URL') ?? DEFAULT_VERSE_SOURCE_URL,
    defaultFormat: readFormat(env),
    pdfFontPath: readOptional(env, 'PDF_FONT_PATH'),
    maxUploadBytes: readPositiveInt(env, 'MAX_UPLOAD_MB', DEFAULT_MAX_UPLOAD_MB) * 1024 * 1024,
    staticDir: readOptional(env, 'STATIC_DIR') ?? 'dist',
  };
}
