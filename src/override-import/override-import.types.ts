// src/override-import/override-import.types.ts

export enum ImportMode {
  User = 'user',
  Group = 'group',
}

export type OverrideAction = 'insert' | 'update' | 'delete' | 'skip';

export type SubjectField = 'userid' | 'groupid';

export type OverrideField =
  | SubjectField
  | 'timeopen'
  | 'timeclose'
  | 'timelimit'
  | 'attempts'
  | 'password'
  | 'generate';

export type FieldErrors = Partial<Record<OverrideField, string>>;

/** Raw text of one CSV row, keyed by the mode-neutral column role. */
export interface OverrideCsvCells {
  subjectId: string;
  subjectIdNumber: string;
  subjectName: string;
  timeOpen: string;
  timeClose: string;
  timeLimit: string;
  attempts: string;
  password: string;
  generate: string;
}

/** Typed values parsed from a row; null means the cell was empty or invalid. */
export interface ParsedOverrideFields {
  subjectId: string | null;
  subjectName: string | null;
  timeOpen: Date | null;
  timeClose: Date | null;
  timeLimit: number | null;
  attempts: number | null;
  password: string | null;
  generatePassword: boolean;
}

export interface ValidatedRow {
  readonly fields: Readonly<ParsedOverrideFields>;
  readonly errors: Readonly<FieldErrors>;
}

export interface OverrideValues {
  timeOpen: Date | null;
  timeClose: Date | null;
  timeLimit: number | null;
  attempts: number | null;
  password: string | null;
}

export interface OverrideDraft extends OverrideValues {
  id: string | null;
  quizId: string;
  userId: string | null;
  groupId: string | null;
}

export interface ImportRow {
  csvRowNumber: number;
  action: OverrideAction;
  override: Readonly<OverrideDraft>;
  cells: Readonly<OverrideCsvCells>;
  subjectName: string | null;
  generatedPassword: boolean;
  fieldErrors: Readonly<FieldErrors>;
}

/** Generated passwords keyed by CSV row number (as text, for json storage). */
export type GeneratedPasswords = Record<string, string>;

export interface QuizScope {
  id: string;
  courseId: string;
}

export interface CommitSummary {
  inserted: number;
  updated: number;
  deleted: number;
}

export const subjectFieldFor = (mode: ImportMode): SubjectField =>
  mode === ImportMode.User ? 'userid' : 'groupid';

export const hasFieldErrors = (errors: Readonly<FieldErrors>): boolean =>
  Object.keys(errors).length > 0;
