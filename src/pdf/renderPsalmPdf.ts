// src/pdf/renderPsalmPdf.ts
import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import fontkit from '@pdf-lib/fontkit';
import { PDFDocument, rgb, type PDFFont, type PDFPage } from 'pdf-lib';
import type { DocumentLineKind, NameSection } from '../types';
import { buildDocumentLines, buildDocumentTitle } from '../utils/documentLayout';

const PAGE_WIDTH = 595.28; // A4, points
const PAGE_HEIGHT = 841.89;
const MARGIN = 56;
const LINE_SPACING = 1.5;

const FONT_SIZE: Record<DocumentLineKind, number> = {
  title: 16,
  letter: 14,
  verse: 12,
  spacer: 12,
};

const TEXT_COLOR = rgb(0.1, 0.1, 0.12);
const LETTER_COLOR = rgb(0.45, 0.33, 0.1);

const requireFromHere = createRequire(import.meta.url);

export const resolveDefaultFontPath = (): string =>
  requireFromHere.resolve('dejavu-fonts-ttf/ttf/DejaVuSans.ttf');

const fontBytesCache = new Map<string, Promise<Uint8Array>>();

const loadFontBytes = (fontPath: string): Promise<Uint8Array> => {
  const cached = fontBytesCache.get(fontPath);
  if (cached) return cached;
  // a failed read is not cached
  const pending = readFile(fontPath).catch((error: unknown) => {
    fontBytesCache.delete(fontPath);
    throw error;
  });
  fontBytesCache.set(fontPath, pending);
  return pending;
};

// Te'amim. pdf-lib drops mark positioning, so these are never drawn.
const CANTILLATION_RE = /[\u0591-\u05AF]/g;

/**
 * Text reduced to what the embedded font can draw: cantillation removed, and
 * any other code point without a glyph dropped. Whitespace is kept for wrapping.
 */
export function toDrawableText(text: string, hasGlyph: (codePoint: number) => boolean): string {
  let drawable = '';
  for (const char of text.replace(CANTILLATION_RE, '')) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) continue;
    if (/\s/.test(char) || hasGlyph(codePoint)) drawable += char;
  }
  return drawable;
}

/**
 * Greedy word wrap. A single word wider than the line stays on its own line.
 */
export function wrapText(text: string, measure: (value: string) => number, maxWidth: number): string[] {
  const words = text.split(/\s+/).filter(Boolean);
  if (!words.length) return [''];

  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (current && measure(candidate) > maxWidth) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  lines.push(current);
  return lines;
}

export interface PdfRenderOptions {
  fontPath?: string;
}

class PageCursor {
  private page: PDFPage;
  private y: number;

  constructor(private readonly doc: PDFDocument) {
    this.page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
    this.y = PAGE_HEIGHT - MARGIN;
  }

  advance(lineHeight: number): number {
    if (this.y - lineHeight < MARGIN) {
      this.page = this.doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      this.y = PAGE_HEIGHT - MARGIN;
    }
    this.y -= lineHeight;
    return this.y;
  }

  drawRightAligned(text: string, font: PDFFont, size: number, color = TEXT_COLOR) {
    const y = this.advance(size * LINE_SPACING);
    const width = font.widthOfTextAtSize(text, size);
    this.page.drawText(text, { x: PAGE_WIDTH - MARGIN - width, y, size, font, color });
  }
}

/**
 * A4 PDF with every line right-aligned and wrapped to the printable width.
 * Glyph order for Hebrew comes from fontkit's right-to-left layout.
 */
export async function renderPsalmPdf(
  name: string,
  sections: readonly NameSection[],
  options: PdfRenderOptions = {},
): Promise<Uint8Array> {
  const lines = buildDocumentLines(name, sections);
  const title = buildDocumentTitle(name);

  const doc = await PDFDocument.create();
  doc.registerFontkit(fontkit);
  const fontBytes = await loadFontBytes(options.fontPath ?? resolveDefaultFontPath());
  const font = await doc.embedFont(fontBytes, { subset: true });
  const glyphSource = fontkit.create(fontBytes);
  const hasGlyph = (codePoint: number) => glyphSource.hasGlyphForCodePoint(codePoint);

  doc.setTitle(title);
  doc.setLanguage('he-IL');
  doc.setCreator('Tehillim 119 Name Builder');

  const maxWidth = PAGE_WIDTH - MARGIN * 2;
  const cursor = new PageCursor(doc);

  for (const line of lines) {
    const size = FONT_SIZE[line.kind];
    if (line.kind === 'spacer') {
      cursor.advance(size * LINE_SPACING);
      continue;
    }
    const color = line.kind === 'letter' ? LETTER_COLOR : TEXT_COLOR;
    const measure = (value: string) => font.widthOfTextAtSize(value, size);
    const wrapped = wrapText(toDrawableText(line.text, hasGlyph), measure, maxWidth);
    for (const segment of wrapped) {
      cursor.drawRightAligned(segment, font, size, color);
    }
  }

  return doc.save();
}
