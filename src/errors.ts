export type AppErrorCode =
  | 'VERSE_SOURCE_FAILED'
  | 'VERSE_COUNT_MISMATCH'
  | 'NO_RECOGNIZED_LETTERS'
  | 'SPREADSHEET_UNREADABLE'
  | 'MISSING_NAME_COLUMN'
  | 'NO_NAMES'
  | 'MISSING_NAME'
  | 'MISSING_FILE'
  | 'INVALID_FORMAT'
  | 'INVALID_CONFIG';

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly messageHe: string;

  constructor(
    code: AppErrorCode,
    message: string,
    options: { status?: number; messageHe?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = options.status ?? 500;
    this.messageHe = options.messageHe ?? message;
  }
}

export type VerseSourceFailure = 'transport' | 'status' | 'payload' | 'count';

export class VerseSourceError extends AppError {
  readonly reason: VerseSourceFailure;

  constructor(reason: VerseSourceFailure, message: string, cause?: unknown) {
    super('VERSE_SOURCE_FAILED', message, {
      status: 503,
      messageHe: 'טעינת נוסח תהילים קיט נכשלה.',
      cause,
    });
    this.reason = reason;
  }
}

export class VerseCountError extends AppError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super('VERSE_COUNT_MISMATCH', `Expected ${expected} verses, got ${actual}`, {
      messageHe: `נדרשים ${expected} פסוקים, התקבלו ${actual}.`,
    });
    this.expected = expected;
    this.actual = actual;
  }
}

export class NoRecognizedLettersError extends AppError {
  readonly subjectName: string;

  constructor(name: string) {
    super('NO_RECOGNIZED_LETTERS', `No valid Hebrew letters found in name '${name}'.`, {
      status: 422,
      messageHe: `לא נמצאו אותיות עבריות בשם "${name}".`,
    });
    this.subjectName = name;
  }
}

export type SpreadsheetErrorCode = 'SPREADSHEET_UNREADABLE' | 'MISSING_NAME_COLUMN' | 'NO_NAMES';

const SPREADSHEET_MESSAGES_HE: Record<SpreadsheetErrorCode, string> = {
  SPREADSHEET_UNREADABLE: 'לא ניתן לקרוא את קובץ האקסל.',
  MISSING_NAME_COLUMN: "קובץ האקסל חייב לכלול עמודה בשם 'Name'.",
  NO_NAMES: "לא נמצאו שמות בעמודה 'Name'.",
};

export class SpreadsheetError extends AppError {
  constructor(code: SpreadsheetErrorCode, message: string, cause?: unknown) {
    super(code, message, {
      status: code === 'NO_NAMES' ? 422 : 400,
      messageHe: SPREADSHEET_MESSAGES_HE[code],
      cause,
    });
  }
}

export class RequestValidationError extends AppError {
  constructor(
    code: 'MISSING_NAME' | 'MISSING_FILE' | 'INVALID_FORMAT',
    message: string,
    messageHe: string,
  ) {
    super(code, message, { status: 400, messageHe });
  }
}

export const describeError = (error: unknown): { code: string; reason: string } => {
  if (error instanceof AppError) return { code: error.code, reason: error.message };
  if (error instanceof Error) return { code: 'UNEXPECTED', reason: error.message };
  return { code: 'UNEXPECTED', reason: String(error) };
};
