import { IMPORT_HEADERS } from '../../src/override-import/override-import.constants';
import { ImportMode } from '../../src/override-import/override-import.types';

export const USER_HEADER = IMPORT_HEADERS[ImportMode.User].join(',');
export const GROUP_HEADER = IMPORT_HEADERS[ImportMode.Group].join(',');

/** Joins a header and data lines into CSV text. */
export const overrideCsv = (mode: ImportMode, ...lines: string[]): string =>
  [mode === ImportMode.User ? USER_HEADER : GROUP_HEADER, ...lines].join('\n');

export const overrideCsvBuffer = (mode: ImportMode, ...lines: string[]): Buffer =>
  Buffer.from(overrideCsv(mode, ...lines), 'utf-8');
