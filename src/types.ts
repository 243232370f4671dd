import type { HebrewLetter } from './constants';

export type Verse = string;

export type Stanza = readonly Verse[];

/** The 22 stanzas in alphabet order. Frozen once loaded. */
export type Psalm119Stanzas = readonly Stanza[];

export interface NameSection {
  letter: HebrewLetter;
  /** 0-based position in the alphabet (and in the stanza list). */
  index: number;
  stanza: Stanza;
}

export type DocumentFormat = 'docx' | 'pdf';

export type DocumentLineKind = 'title' | 'letter' | 'verse' | 'spacer';

export interface DocumentLine {
  kind: DocumentLineKind;
  text: string;
}

export interface GeneratedFile {
  name: string;
  fileName: string;
  bytes: Uint8Array;
}

export interface BatchFailure {
  name: string;
  code: string;
  reason: string;
}

export interface BatchResult {
  files: GeneratedFile[];
  failures: BatchFailure[];
}

export interface NamesPreview {
  names: string[];
  total: number;
}

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    messageHe?: string;
  };
}

export interface NameStanzasResponse {
  name: string;
  sections: Array<{
    letter: HebrewLetter;
    index: number;
    verses: Verse[];
  }>;
}
