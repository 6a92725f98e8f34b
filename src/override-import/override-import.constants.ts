import { ImportMode } from './override-import.types';

export const OVERRIDE_STORE = Symbol('OVERRIDE_STORE');
export const SUBJECT_DIRECTORY = Symbol('SUBJECT_DIRECTORY');
export const OVERRIDE_IMPORT_OPTIONS = Symbol('OVERRIDE_IMPORT_OPTIONS');

export interface OverrideImportOptions {
  passwordLength: number;
  batchTtlMinutes: number;
  templateTimeZone: string;
}

export const DEFAULT_OVERRIDE_IMPORT_OPTIONS: OverrideImportOptions = {
  passwordLength: 20,
  batchTtlMinutes: 60,
  templateTimeZone: 'UTC',
};

/** luxon tokens for `YYYY-MM-DD HH:MM +HH:MM` */
export const OVERRIDE_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm ZZ';

export const GENERATE_TRUE = '1';
export const GENERATE_FALSE = '0';

/** Bounds of the quiz_overrides columns: integer and varchar(255). */
export const MAX_OVERRIDE_INTEGER = 2_147_483_647;
export const MAX_OVERRIDE_PASSWORD_LENGTH = 255;

const VALUE_COLUMNS = ['timeopen', 'timeclose', 'timelimit', 'attempts', 'password', 'generate'] as const;

export const IMPORT_HEADERS: Record<ImportMode, readonly string[]> = {
  [ImportMode.User]: ['userid', 'useridnumber', 'username', ...VALUE_COLUMNS],
  [ImportMode.Group]: ['groupid', 'groupidnumber', 'groupname', ...VALUE_COLUMNS],
};

export const CSV_DELIMITERS = {
  comma: ',',
  semicolon: ';',
  colon: ':',
  tab: '\t',
} as const;

export type CsvDelimiterName = keyof typeof CSV_DELIMITERS;

export const CSV_DELIMITER_NAMES: CsvDelimiterName[] = ['comma', 'semicolon', 'colon', 'tab'];
