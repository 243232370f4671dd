export const ALEPH_BET = [
  'א', 'ב', 'ג', 'ד', 'ה', 'ו', 'ז', 'ח', 'ט', 'י', 'כ',
  'ל', 'מ', 'נ', 'ס', 'ע', 'פ', 'צ', 'ק', 'ר', 'ש', 'ת',
] as const;

export type HebrewLetter = (typeof ALEPH_BET)[number];

export const LETTER_TO_INDEX: ReadonlyMap<string, number> = new Map(
  ALEPH_BET.map((letter, index) => [letter, index]),
);

// אותיות סופיות → צורת הבסיס
export const FINAL_TO_REGULAR: Readonly<Record<string, HebrewLetter>> = {
  ך: 'כ',
  ם: 'מ',
  ן: 'נ',
  ף: 'פ',
  ץ: 'צ',
};

export const VERSES_PER_STANZA = 8;
export const STANZA_COUNT = ALEPH_BET.length;
export const PSALM_119_VERSE_COUNT = STANZA_COUNT * VERSES_PER_STANZA;

export const PARSHA_MARKERS = ['{פ}', '{ס}'] as const;

export const DEFAULT_VERSE_SOURCE_URL =
  'https://www.sefaria.org/api/texts/Psalms.119?lang=he&context=0';

export const DOCUMENT_TITLE_PREFIX = 'תהילים פרק קיט עבור השם:';
export const DOCUMENT_FILE_SUFFIX = '_Tehillim119';
export const BATCH_ARCHIVE_NAME = 'Tehillim119_Names.zip';

export const NAME_COLUMN = 'Name';
export const PREVIEW_NAME_LIMIT = 5;
