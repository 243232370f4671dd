import { FINAL_TO_REGULAR, LETTER_TO_INDEX, ALEPH_BET } from '../constants';
import type { HebrewLetter } from '../constants';
import { NoRecognizedLettersError } from '../errors';
import type { NameSection, Psalm119Stanzas } from '../types';

export const normalizeHebrewLetter = (ch: string): string => FINAL_TO_REGULAR[ch] ?? ch;

const toAlphabetIndex = (ch: string): number | undefined => LETTER_TO_INDEX.get(ch);

/**
 * Maps each Hebrew letter of the name to its stanza, in name order.
 * Spaces and anything outside the 22 letters (Latin, digits, niqqud,
 * punctuation) contribute nothing. Repeated letters repeat their stanza.
 */
export function getStanzasForName(name: string, stanzas: Psalm119Stanzas): NameSection[] {
  const sections: NameSection[] = [];

  for (const ch of name.trim()) {
    if (ch === ' ') continue;

    const normalized = normalizeHebrewLetter(ch);
    const index = toAlphabetIndex(normalized);
    if (index === undefined) continue;

    const letter: HebrewLetter = ALEPH_BET[index];
    sections.push({ letter, index, stanza: stanzas[index] });
  }

  return sections;
}

/** Same as getStanzasForName, but a name with no Hebrew letters is an error. */
export function resolveNameStanzas(name: string, stanzas: Psalm119Stanzas): NameSection[] {
  const sections = getStanzasForName(name, stanzas);
  if (!sections.length) {
    throw new NoRecognizedLettersError(name);
  }
  return sections;
}
