import { DOCUMENT_TITLE_PREFIX } from '../constants';
import { NoRecognizedLettersError } from '../errors';
import type { DocumentLine, NameSection } from '../types';

export const buildDocumentTitle = (name: string): string => `${DOCUMENT_TITLE_PREFIX} ${name.trim()}`;

/**
 * Line model shared by the DOCX and PDF renderers: title, blank line, then
 * for every section its letter, its eight verses and a blank separator.
 */
export function buildDocumentLines(name: string, sections: readonly NameSection[]): DocumentLine[] {
  if (!sections.length) {
    throw new NoRecognizedLettersError(name);
  }

  const lines: DocumentLine[] = [
    { kind: 'title', text: buildDocumentTitle(name) },
    { kind: 'spacer', text: '' },
  ];

  for (const section of sections) {
    lines.push({ kind: 'letter', text: section.letter });
    for (const verse of section.stanza) {
      lines.push({ kind: 'verse', text: verse });
    }
    lines.push({ kind: 'spacer', text: '' });
  }

  return lines;
}
