import * as XLSX from 'xlsx';
import { PSALM_119_VERSE_COUNT } from '../src/constants';
import type { FetchLike } from '../src/services/psalm119Source';
import type { Psalm119Stanzas } from '../src/types';
import { partitionStanzas } from '../src/utils/stanzas';

/** "פסוק 1" … "פסוק 176"; stanza i verse j is "פסוק {8i+j+1}". */
export const makeVerses = (count = PSALM_119_VERSE_COUNT): string[] =>
  Array.from({ length: count }, (_, i) => `פסוק ${i + 1}`);

/** Same verses wrapped the way the text source delivers them. */
export const makeRawVerses = (count = PSALM_119_VERSE_COUNT): string[] =>
  makeVerses(count).map((verse, i) => (i % 8 === 7 ? `<b>${verse}</b> {פ}` : ` ${verse}&nbsp;`));

export const makeStanzas = (): Psalm119Stanzas => partitionStanzas(makeVerses());

export const jsonResponse = (body: unknown, init: ResponseInit = { status: 200 }): Response =>
  new Response(JSON.stringify(body), {
    ...init,
    headers: { 'Content-Type': 'application/json' },
  });

export const fakeFetch = (respond: () => Response | Promise<Response>) => {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (url) => {
    calls.push(url);
    return respond();
  };
  return { fetchImpl, calls };
};

export const buildWorkbookBuffer = (rows: unknown[][]): Buffer => {
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(rows), 'Names');
  const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  return buffer;
};

/** The spreadsheet from the batch scenario: two good names, a blank, digits only. */
export const scenarioRows: unknown[][] = [['Name'], ['דוד'], [''], ['123'], ['משה']];
