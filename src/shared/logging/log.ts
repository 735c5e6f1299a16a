/* eslint-disable no-console */

export type LogFields = Record<string, unknown>;

/**
 * Single-line JSON events on stdout/stderr. Callers pass counts and identifiers,
 * never response bodies or credentials.
 */
export const logInfo = (event: string, fields: LogFields = {}): void => {
  console.log(JSON.stringify({ event, ...fields }));
};

export const logWarn = (event: string, fields: LogFields = {}): void => {
  console.warn(JSON.stringify({ event, ...fields }));
};

export const logError = (event: string, fields: LogFields = {}): void => {
  console.error(JSON.stringify({ event, ...fields }));
};

export const errorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};
