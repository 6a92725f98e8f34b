import { Inject, Injectable } from '@nestjs/common';
import {
  GENERATE_FALSE,
  OVERRIDE_IMPORT_OPTIONS,
  OVERRIDE_STORE,
  OverrideImportOptions,
} from './override-import.constants';
import {
  ImportMode,
  OverrideAction,
  OverrideCsvCells,
  OverrideDraft,
  ValidatedRow,
  subjectFieldFor,
} from './override-import.types';
import { OverrideFilter, OverrideStore } from './stores/override-store';
import { generateOverridePassword } from './utils/password.util';

export interface ReconciledRow {
  action: OverrideAction;
  override: Readonly<OverrideDraft>;
  generatedPassword: boolean;
}

/** True when every override value cell is empty; a generate cell of 0 counts as empty. */
export function isBlankOverride(cells: OverrideCsvCells): boolean {
  return (
    cells.timeOpen === '' &&
    cells.timeClose === '' &&
    cells.timeLimit === '' &&
    cells.attempts === '' &&
    cells.password === '' &&
    (cells.generate === '' || cells.generate === GENERATE_FALSE)
  );
}

export function classifyOverride(cells: OverrideCsvCells, existingId: string | null): OverrideAction {
  if (isBlankOverride(cells)) {
    return existingId ? 'delete' : 'skip';
  }
  return existingId ? 'update' : 'insert';
}

@Injectable()
export class OverrideReconciler {
  constructor(
    @Inject(OVERRIDE_STORE)
    private readonly store: OverrideStore,

    @Inject(OVERRIDE_IMPORT_OPTIONS)
    private readonly options: OverrideImportOptions,
  ) {}

  async findExistingOverrideId(quizId: string, mode: ImportMode, subjectId: string | null): Promise<string | null> {
    if (!subjectId) return null;
    const filter: OverrideFilter =
      mode === ImportMode.User ? { quizId, userId: subjectId } : { quizId, groupId: subjectId };
    const existing = await this.store.get(filter);
    return existing?.id ?? null;
  }

  /**
   * `pinnedPassword` is a password generated for this row by an earlier run
   * (the preview); it is reused when the row still asks for a generated one.
   */
  async reconcile(
    quizId: string,
    mode: ImportMode,
    row: ValidatedRow,
    cells: OverrideCsvCells,
    pinnedPassword?: string,
  ): Promise<ReconciledRow> {
    const { fields, errors } = row;

    // A subject that failed validation cannot own an override
    const subjectId = errors[subjectFieldFor(mode)] ? null : fields.subjectId;
    const existingId = await this.findExistingOverrideId(quizId, mode, subjectId);
    const action = classifyOverride(cells, existingId);

    const generatedPassword = fields.generatePassword && !errors.generate;
    const password = generatedPassword
      ? pinnedPassword ?? generateOverridePassword(this.options.passwordLength)
      : fields.password;

    const override: OverrideDraft = {
      id: existingId,
      quizId,
      userId: mode === ImportMode.User ? fields.subjectId : null,
      groupId: mode === ImportMode.Group ? fields.subjectId : null,
      timeOpen: fields.timeOpen,
      timeClose: fields.timeClose,
      timeLimit: fields.timeLimit,
      attempts: fields.attempts,
      password,
    };

    return { action, override: Object.freeze(override), generatedPassword };
  }
}
