import { describe, it, expect, vi, beforeEach } from 'vitest';
import JSZip from 'jszip';
import type { DocumentRenderer } from '../src/renderers';
import {
  buildBatchArchive,
  generateBatch,
  generateBatchFromSpreadsheet,
} from '../src/services/batchGenerator';
import type { NameSection } from '../src/types';
import { buildWorkbookBuffer, makeStanzas, scenarioRows } from './fixtures';

const stanzas = makeStanzas();

const makeRenderer = (
  render: (name: string, sections: readonly NameSection[]) => Promise<Uint8Array> = async (name, sections) =>
    new TextEncoder().encode(`${name}:${sections.map((s) => s.letter).join('')}`),
) => {
  const spy = vi.fn(render);
  const renderer: DocumentRenderer = { format: 'docx', mimeType: 'application/test', render: spy };
  return { renderer, spy };
};

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('generateBatch', () => {
  it('renders every resolvable name and records the rest with a reason', async () => {
    const { renderer } = makeRenderer();

    const result = await generateBatch(['דוד', '123', 'משה'], stanzas, renderer);

    expect(result.files.map((f) => f.fileName)).toEqual(['דוד_Tehillim119.docx', 'משה_Tehillim119.docx']);
    expect(new TextDecoder().decode(result.files[0].bytes)).toBe('דוד:דוד');
    expect(result.failures).toEqual([
      {
        name: '123',
        code: 'NO_RECOGNIZED_LETTERS',
        reason: "No valid Hebrew letters found in name '123'.",
      },
    ]);
  });

  it('keeps going when the renderer throws for one name', async () => {
    const { renderer, spy } = makeRenderer(async (name) => {
      if (name === 'לאה') throw new Error('disk full');
      return new Uint8Array([1]);
    });

    const result = await generateBatch(['לאה', 'רחל'], stanzas, renderer);

    expect(spy).toHaveBeenCalledTimes(2);
    expect(result.files.map((f) => f.name)).toEqual(['רחל']);
    expect(result.failures).toEqual([{ name: 'לאה', code: 'UNEXPECTED', reason: 'disk full' }]);
  });

  it('gives repeated names distinct file names', async () => {
    const { renderer } = makeRenderer();
    const result = await generateBatch(['דוד', 'דוד', 'דוד'], stanzas, renderer);
    expect(result.files.map((f) => f.fileName)).toEqual([
      'דוד_Tehillim119.docx',
      'דוד_Tehillim119_2.docx',
      'דוד_Tehillim119_3.docx',
    ]);
  });

  it('replaces spaces in file names with underscores', async () => {
    const { renderer } = makeRenderer();
    const result = await generateBatch(['יצחק בן אברהם'], stanzas, renderer);
    expect(result.files[0].fileName).toBe('יצחק_בן_אברהם_Tehillim119.docx');
  });
});

describe('generateBatchFromSpreadsheet', () => {
  it('produces two documents for the scenario sheet and skips the blank row', async () => {
    const { renderer, spy } = makeRenderer();

    const result = await generateBatchFromSpreadsheet(buildWorkbookBuffer(scenarioRows), stanzas, renderer);

    expect(result.files.map((f) => f.name)).toEqual(['דוד', 'משה']);
    expect(result.failures.map((f) => f.name)).toEqual(['123']);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('fails before rendering anything when the Name column is missing', async () => {
    const { renderer, spy } = makeRenderer();
    const data = buildWorkbookBuffer([['Full name'], ['דוד']]);

    await expect(generateBatchFromSpreadsheet(data, stanzas, renderer)).rejects.toMatchObject({
      code: 'MISSING_NAME_COLUMN',
    });
    expect(spy).not.toHaveBeenCalled();
  });

  it('fails when the column has no names', async () => {
    const { renderer } = makeRenderer();
    const data = buildWorkbookBuffer([['Name'], [''], ['  ']]);

    await expect(generateBatchFromSpreadsheet(data, stanzas, renderer)).rejects.toMatchObject({
      code: 'NO_NAMES',
      status: 422,
    });
  });
});

describe('buildBatchArchive', () => {
  it('writes one zip entry per generated file', async () => {
    const { renderer } = makeRenderer();
    const result = await generateBatch(['דוד', 'משה'], stanzas, renderer);

    const zip = await JSZip.loadAsync(await buildBatchArchive(result));

    expect(Object.keys(zip.files).sort()).toEqual(['דוד_Tehillim119.docx', 'משה_Tehillim119.docx']);
    const entry = zip.file('משה_Tehillim119.docx');
    expect(entry).not.toBeNull();
    expect(await entry?.async('string')).toBe('משה:משה');
  });
});
