import { describe, it, expect, vi, beforeEach } from 'vitest';
import request from 'supertest';
import JSZip from 'jszip';
import { createApp } from '../server';
import { loadConfig } from '../src/config';
import { buildWorkbookBuffer, makeStanzas, scenarioRows } from './fixtures';

const app = createApp({ stanzas: makeStanzas(), config: loadConfig({}) });

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

// supertest: responseType('blob') keeps binary bodies as a Buffer
const postBinary = (url: string, body: object) =>
  request(app).post(url).set('Content-Type', 'application/json').responseType('blob').send(body);

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

describe('GET /api/health', () => {
  it('reports the loaded stanzas and default format', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', stanzaCount: 22, defaultFormat: 'docx' });
  });
});

describe('GET /api/name-stanzas', () => {
  it('returns the sections of a name', async () => {
    const res = await request(app).get('/api/name-stanzas').query({ name: 'דוד' });

    expect(res.status).toBe(200);
    expect(res.body.name).toBe('דוד');
    expect(res.body.sections.map((s: { letter: string; index: number }) => [s.letter, s.index])).toEqual([
      ['ד', 3],
      ['ו', 5],
      ['ד', 3],
    ]);
    expect(res.body.sections[1].verses).toHaveLength(8);
  });

  it('returns no sections for a name without Hebrew letters', async () => {
    const res = await request(app).get('/api/name-stanzas').query({ name: '123' });
    expect(res.status).toBe(200);
    expect(res.body.sections).toEqual([]);
  });

  it('requires a name', async () => {
    const res = await request(app).get('/api/name-stanzas');
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('MISSING_NAME');
  });
});

describe('POST /api/render-name-document', () => {
  it('returns a DOCX by default with a UTF-8 file name', async () => {
    const res = await postBinary('/api/render-name-document', { name: 'דוד' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain(DOCX_MIME);
    expect(res.headers['content-disposition']).toBe(
      `attachment; filename="Tehillim119.docx"; filename*=UTF-8''${encodeURIComponent('דוד_Tehillim119.docx')}`,
    );
    const zip = await JSZip.loadAsync(res.body);
    expect(zip.file('word/document.xml')).not.toBeNull();
  });

  it('returns a PDF when asked', async () => {
    const res = await postBinary('/api/render-name-document', { name: 'משה', format: 'pdf' });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/pdf/);
    expect(res.body.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('answers 422 when the name has no Hebrew letters', async () => {
    const res = await request(app).post('/api/render-name-document').send({ name: '123' });

    expect(res.status).toBe(422);
    expect(res.body.error).toEqual({
      code: 'NO_RECOGNIZED_LETTERS',
      message: "No valid Hebrew letters found in name '123'.",
      messageHe: 'לא נמצאו אותיות עבריות בשם "123".',
    });
  });

  it('rejects a blank name and an unknown format', async () => {
    const blank = await request(app).post('/api/render-name-document').send({ name: '   ' });
    expect(blank.status).toBe(400);
    expect(blank.body.error.code).toBe('MISSING_NAME');

    const format = await request(app).post('/api/render-name-document').send({ name: 'דוד', format: 'rtf' });
    expect(format.status).toBe(400);
    expect(format.body.error.code).toBe('INVALID_FORMAT');
  });

  it('answers 400 for a malformed JSON body', async () => {
    const res = await request(app)
      .post('/api/render-name-document')
      .set('Content-Type', 'application/json')
      .send('{"name":');
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('INVALID_REQUEST');
  });
});

describe('POST /api/names-preview', () => {
  it('previews the names in the sheet', async () => {
    const file = buildWorkbookBuffer(scenarioRows).toString('base64');
    const res = await request(app).post('/api/names-preview').send({ file });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ names: ['דוד', '123', 'משה'], total: 3 });
  });

  it('requires a file', async () => {
    const res = await request(app).post('/api/names-preview').send({});
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('MISSING_FILE');
  });
});

describe('POST /api/render-batch', () => {
  it('zips one document per resolvable name and reports the failures', async () => {
    const file = buildWorkbookBuffer(scenarioRows).toString('base64');
    const res = await postBinary('/api/render-batch', { file });

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/application\/zip/);
    expect(res.headers['x-batch-succeeded']).toBe('2');
    expect(res.headers['x-batch-failed']).toBe('1');
    expect(JSON.parse(decodeURIComponent(res.headers['x-batch-failures']))).toEqual([
      {
        name: '123',
        code: 'NO_RECOGNIZED_LETTERS',
        reason: "No valid Hebrew letters found in name '123'.",
      },
    ]);

    const zip = await JSZip.loadAsync(res.body);
    expect(Object.keys(zip.files).sort()).toEqual(['דוד_Tehillim119.docx', 'משה_Tehillim119.docx']);
  });

  it('accepts a data URL and the pdf format', async () => {
    const file = `data:application/vnd.openxmlformats-officedocument.spreadsheetml.sheet;base64,${buildWorkbookBuffer(
      [['Name'], ['רות']],
    ).toString('base64')}`;
    const res = await postBinary('/api/render-batch', { file, format: 'pdf' });

    expect(res.status).toBe(200);
    const zip = await JSZip.loadAsync(res.body);
    expect(Object.keys(zip.files)).toEqual(['רות_Tehillim119.pdf']);
  });

  it('fails the whole batch when the Name column is missing', async () => {
    const file = buildWorkbookBuffer([['Names'], ['דוד']]).toString('base64');
    const res = await request(app).post('/api/render-batch').send({ file });

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('MISSING_NAME_COLUMN');
    expect(res.body.error.messageHe).toBe("קובץ האקסל חייב לכלול עמודה בשם 'Name'.");
  });
});
