import { DOCUMENT_FILE_SUFFIX } from '../constants';
import type { DocumentFormat } from '../types';

export const INVALID_FILENAME_CHARS = /[\\/:*?"<>|]/g;

const FALLBACK_BASE = 'name';

/**
 * "יצחק בן אברהם" → "יצחק_בן_אברהם_Tehillim119.docx"
 */
export const buildDocumentFileName = (name: string, format: DocumentFormat): string => {
  const safeName = name.trim().replace(/ /g, '_').replace(INVALID_FILENAME_CHARS, '') || FALLBACK_BASE;
  return `${safeName}${DOCUMENT_FILE_SUFFIX}.${format}`;
};

/**
 * Keeps archive entries unique: the second "דוד_Tehillim119.docx" becomes
 * "דוד_Tehillim119_2.docx".
 */
export const dedupeFileName = (fileName: string, taken: Set<string>): string => {
  if (!taken.has(fileName)) return fileName;

  const dot = fileName.lastIndexOf('.');
  const base = dot > 0 ? fileName.slice(0, dot) : fileName;
  const ext = dot > 0 ? fileName.slice(dot) : '';

  let counter = 2;
  while (taken.has(`${base}_${counter}${ext}`)) {
    counter += 1;
  }
  return `${base}_${counter}${ext}`;
};

/**
 * Content-Disposition value with an ASCII fallback and the UTF-8 name in
 * filename* (RFC 5987), since Hebrew is not allowed in a raw header value.
 */
export const buildContentDisposition = (fileName: string): string => {
  const dot = fileName.lastIndexOf('.');
  const ext = dot > 0 ? fileName.slice(dot) : '';
  const asciiBase = fileName
    .slice(0, dot > 0 ? dot : undefined)
    .replace(/[^\x20-\x7E]/g, '')
    .replace(/["\\]/g, '')
    .replace(/^_+|_+$/g, '');
  const fallback = `${asciiBase || 'Tehillim119'}${ext}`;
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(fileName)}`;
};

export const parseContentDispositionFileName = (header: string | null): string | null => {
  if (!header) return null;
  const extended = /filename\*=UTF-8''([^;]+)/i.exec(header);
  if (extended) {
    try {
      return decodeURIComponent(extended[1]);
    } catch {
      return extended[1];
    }
  }
  const plain = /filename="([^"]+)"/i.exec(header);
  return plain ? plain[1] : null;
};
