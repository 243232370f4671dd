import { describe, it, expect, vi } from 'vitest';
import { loadConfig } from '../src/config';
import { DEFAULT_VERSE_SOURCE_URL } from '../src/constants';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      verseSourceUrl: DEFAULT_VERSE_SOURCE_URL,
      defaultFormat: 'docx',
      pdfFontPath: undefined,
      maxUploadBytes: 10 * 1024 * 1024,
      staticDir: 'dist',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      VERSE_SOURCE_URL: 'http://texts.test/psalm119',
      DEFAULT_DOCUMENT_FORMAT: ' PDF ',
      PDF_FONT_PATH: '/fonts/hebrew.ttf',
      MAX_UPLOAD_MB: '2',
      STATIC_DIR: 'public',
    });

    expect(config).toEqual({
      port: 8080,
      verseSourceUrl: 'http://texts.test/psalm119',
      defaultFormat: 'pdf',
      pdfFontPath: '/fonts/hebrew.ttf',
      maxUploadBytes: 2 * 1024 * 1024,
      staticDir: 'public',
    });
  });

  it('ignores an invalid number with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(loadConfig({ PORT: 'abc', MAX_UPLOAD_MB: '-1' })).toMatchObject({
      port: 3001,
      maxUploadBytes: 10 * 1024 * 1024,
    });
    expect(warn).toHaveBeenCalledTimes(2);
    warn.mockRestore();
  });

  it('refuses an unknown default format', () => {
    expect(() => loadConfig({ DEFAULT_DOCUMENT_FORMAT: 'rtf' })).toThrow(
      'DEFAULT_DOCUMENT_FORMAT must be "docx" or "pdf", got "rtf"',
    );
  });
});
