import { AlignmentType, Document, Packer, Paragraph, TextRun } from 'docx';
import type { DocumentLine, DocumentLineKind, NameSection } from '../types';
import { buildDocumentLines, buildDocumentTitle } from '../utils/documentLayout';

const FONT = 'David';

// half-points
const SIZE_BY_KIND: Record<DocumentLineKind, number> = {
  title: 32,
  letter: 28,
  verse: 24,
  spacer: 24,
};

const toParagraph = (line: DocumentLine): Paragraph => {
  const base = { alignment: AlignmentType.RIGHT, bidirectional: true };
  if (line.kind === 'spacer') {
    return new Paragraph(base);
  }

  const emphasized = line.kind !== 'verse';
  const size = SIZE_BY_KIND[line.kind];
  return new Paragraph({
    ...base,
    children: [
      new TextRun({
        text: line.text,
        font: FONT,
        rightToLeft: true,
        bold: emphasized,
        boldComplexScript: emphasized,
        size,
        sizeComplexScript: size,
      }),
    ],
  });
};

/**
 * Word document: right-aligned, right-to-left paragraphs, one per line of
 * the shared layout.
 */
export async function renderPsalmDocx(name: string, sections: readonly NameSection[]): Promise<Uint8Array> {
  const lines = buildDocumentLines(name, sections);

  const doc = new Document({
    title: buildDocumentTitle(name),
    creator: 'Tehillim 119 Name Builder',
    description: 'Psalm 119 stanzas by the letters of a name',
    sections: [{ properties: {}, children: lines.map(toParagraph) }],
  });

  return Packer.toBuffer(doc);
}
