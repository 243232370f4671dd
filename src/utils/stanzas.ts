import { PSALM_119_VERSE_COUNT, VERSES_PER_STANZA } from '../constants';
import { VerseCountError } from '../errors';
import type { Psalm119Stanzas, Stanza } from '../types';

/**
 * Splits the 176 cleaned verses into 22 stanzas of 8, in source order.
 * Stanza i holds verses 8i..8i+7.
 */
export function partitionStanzas(verses: readonly string[]): Psalm119Stanzas {
  if (verses.length !== PSALM_119_VERSE_COUNT) {
    throw new VerseCountError(PSALM_119_VERSE_COUNT, verses.length);
  }

  const stanzas: Stanza[] = [];
  for (let start = 0; start < verses.length; start += VERSES_PER_STANZA) {
    stanzas.push(Object.freeze(verses.slice(start, start + VERSES_PER_STANZA)));
  }
  return Object.freeze(stanzas);
}
