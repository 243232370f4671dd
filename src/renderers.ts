import { renderPsalmDocx } from './docx/renderPsalmDocx';
import { RequestValidationError } from './errors';
import { renderPsalmPdf } from './pdf/renderPsalmPdf';
import type { DocumentFormat, NameSection } from './types';

export interface DocumentRenderer {
  format: DocumentFormat;
  mimeType: string;
  render(name: string, sections: readonly NameSection[]): Promise<Uint8Array>;
}

export interface RendererOptions {
  pdfFontPath?: string;
}

export const DOCUMENT_FORMATS: readonly DocumentFormat[] = ['docx', 'pdf'];

export const isDocumentFormat = (value: unknown): value is DocumentFormat =>
  typeof value === 'string' && DOCUMENT_FORMATS.some((format) => format === value);

export const docxRenderer: DocumentRenderer = {
  format: 'docx',
  mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  render: renderPsalmDocx,
};

export const createPdfRenderer = (options: RendererOptions = {}): DocumentRenderer => ({
  format: 'pdf',
  mimeType: 'application/pdf',
  render: (name, sections) => renderPsalmPdf(name, sections, { fontPath: options.pdfFontPath }),
});

export const getRenderer = (format: DocumentFormat, options: RendererOptions = {}): DocumentRenderer =>
  format === 'pdf' ? createPdfRenderer(options) : docxRenderer;

/** Request value → format; missing means the configured default. */
export const parseDocumentFormat = (value: unknown, fallback: DocumentFormat): DocumentFormat => {
  if (value === undefined || value === null || value === '') return fallback;
  if (isDocumentFormat(value)) return value;
  throw new RequestValidationError(
    'INVALID_FORMAT',
    `Unsupported document format: ${String(value)}`,
    'פורמט מסמך לא נתמך (docx או pdf בלבד).',
  );
};
