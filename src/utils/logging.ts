const PREFIX = '[T119]';

export const logError = (context: string, error: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`${PREFIX} ${context}`, error);
};

export const logWarn = (context: string, details?: unknown) => {
  // eslint-disable-next-line no-console
  console.warn(`${PREFIX} ${context}`, details ?? '');
};

export const logInfo = (context: string, details?: unknown) => {
  // eslint-disable-next-line no-console
  console.log(`${PREFIX} ${context}`, details ?? '');
};
