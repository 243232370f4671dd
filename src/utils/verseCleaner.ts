import { PARSHA_MARKERS } from '../constants';

const TAG_RE = /<[^>]+?>/g;

const NAMED_ENTITIES: Record<string, string> = {
  quot: '"',
  amp: '&',
  lt: '<',
  gt: '>',
  apos: "'",
  nbsp: ' ',
  thinsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

const fromCodePointOrNull = (codePoint: number): string | null => {
  if (!Number.isInteger(codePoint) || codePoint > MAX_CODE_POINT) return null;
  if (codePoint >= 0xd800 && codePoint <= 0xdfff) return null;
  return String.fromCodePoint(codePoint);
};

// Numeric entities outside the Unicode range stay as written.
const decodeHtmlEntities = (text: string): string =>
  text.replace(/&(#[xX][0-9a-fA-F]+|#[0-9]+|[a-zA-Z]+);/g, (match, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return fromCodePointOrNull(parseInt(body.slice(2), 16)) ?? match;
    }
    if (body.startsWith('#')) {
      return fromCodePointOrNull(parseInt(body.slice(1), 10)) ?? match;
    }
    return NAMED_ENTITIES[body] ?? match;
  });

/**
 * Turns one raw verse from the text source into plain display text:
 * entities decoded, tags removed, parsha markers ({פ} / {ס}) dropped, trimmed.
 */
export function cleanVerse(raw: string): string {
  let text = decodeHtmlEntities(raw);
  text = text.replace(TAG_RE, '');
  for (const marker of PARSHA_MARKERS) {
    text = text.split(marker).join('');
  }
  return text.trim();
}

export const cleanVerses = (rawVerses: readonly string[]): string[] => rawVerses.map(cleanVerse);
