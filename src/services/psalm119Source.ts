import { DEFAULT_VERSE_SOURCE_URL, PSALM_119_VERSE_COUNT } from '../constants';
import { VerseSourceError } from '../errors';
import type { Psalm119Stanzas } from '../types';
import { logInfo } from '../utils/logging';
import { partitionStanzas } from '../utils/stanzas';
import { cleanVerses } from '../utils/verseCleaner';

export type FetchLike = (url: string) => Promise<Response>;

export interface VerseSourceOptions {
  url?: string;
  fetchImpl?: FetchLike;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === 'string');

const readHebrewVerses = (payload: unknown): string[] => {
  if (typeof payload !== 'object' || payload === null || !('he' in payload)) {
    throw new VerseSourceError('payload', 'Verse source response has no "he" field');
  }
  const verses = payload.he;
  if (!isStringArray(verses)) {
    throw new VerseSourceError('payload', 'Verse source "he" field is not a list of strings');
  }
  return verses;
};

/**
 * Fetches the raw Hebrew text of Psalm 119 (Sefaria texts API shape:
 * `{ he: string[] }`). Any failure, including a verse count other than 176,
 * is fatal; there is no retry and no partial result.
 */
export async function fetchPsalm119Verses(options: VerseSourceOptions = {}): Promise<string[]> {
  const url = options.url ?? DEFAULT_VERSE_SOURCE_URL;
  const fetchImpl = options.fetchImpl ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (error) {
    throw new VerseSourceError('transport', `Could not reach verse source: ${String(error)}`, error);
  }

  if (!response.ok) {
    throw new VerseSourceError(
      'status',
      `Verse source responded ${response.status} ${response.statusText}`.trim(),
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    throw new VerseSourceError('payload', 'Verse source returned invalid JSON', error);
  }

  const verses = readHebrewVerses(payload);
  if (verses.length !== PSALM_119_VERSE_COUNT) {
    throw new VerseSourceError(
      'count',
      `Expected ${PSALM_119_VERSE_COUNT} verses, got ${verses.length}`,
    );
  }
  return verses;
}

/**
 * One-time initialization: fetch, clean and partition. The result is frozen
 * and handed explicitly to everything that resolves names.
 */
export async function loadPsalm119Stanzas(options: VerseSourceOptions = {}): Promise<Psalm119Stanzas> {
  const raw = await fetchPsalm119Verses(options);
  const stanzas = partitionStanzas(cleanVerses(raw));
  logInfo('Loaded Tehillim 119', { verses: raw.length, stanzas: stanzas.length });
  return stanzas;
}
