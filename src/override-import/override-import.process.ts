import { Logger } from '@nestjs/common';
import { IMPORT_HEADERS } from './override-import.constants';
import {
  CommitSummary,
  FieldErrors,
  GeneratedPasswords,
  ImportMode,
  ImportRow,
  QuizScope,
  hasFieldErrors,
  subjectFieldFor,
} from './override-import.types';
import { OverrideCsvReader, toOverrideCells } from './csv/override-csv.reader';
import { OverrideRowValidator } from './override-row.validator';
import { OverrideReconciler } from './override-reconciler.service';
import { OverrideCommitService } from './override-commit.service';

export interface OverrideImportCollaborators {
  validator: OverrideRowValidator;
  reconciler: OverrideReconciler;
  committer: OverrideCommitService;
}

/**
 * One import run over a CSV source: header check, then validate and
 * reconcile each row in file order, then (after confirmation) commit.
 *
 * A run holds its own state and is not shared between requests.
 */
export class OverrideImportProcess {
  private readonly logger = new Logger(OverrideImportProcess.name);

  private processed = false;
  private headerError: string | null = null;
  private commitError: Error | null = null;
  private commitSummary: CommitSummary | null = null;
  private importRows: ImportRow[] = [];

  constructor(
    private readonly reader: OverrideCsvReader,
    private readonly mode: ImportMode,
    private readonly quiz: QuizScope,
    private readonly collaborators: OverrideImportCollaborators,
    private readonly pinnedPasswords: Readonly<GeneratedPasswords> = {},
  ) {}

  get rows(): readonly ImportRow[] {
    return this.importRows;
  }

  get canImport(): boolean {
    return this.processed && this.importRows.every((row) => !hasFieldErrors(row.fieldErrors));
  }

  getHeaderError(): string | null {
    return this.headerError;
  }

  getCommitError(): Error | null {
    return this.commitError;
  }

  getCommitSummary(): CommitSummary | null {
    return this.commitSummary;
  }

  /** Passwords generated in this run, keyed by CSV row number. */
  getGeneratedPasswords(): GeneratedPasswords {
    const passwords: GeneratedPasswords = {};
    for (const row of this.importRows) {
      if (row.generatedPassword && row.override.password !== null) {
        passwords[String(row.csvRowNumber)] = row.override.password;
      }
    }
    return passwords;
  }

  /**
   * Returns false only when the header does not match; row-level problems are
   * reported on the rows themselves.
   */
  async process(): Promise<boolean> {
    this.processed = false;
    this.headerError = null;
    this.importRows = [];
    this.reader.init();

    if (!this.validateHeaders()) {
      this.logger.warn(`Header check failed for quiz ${this.quiz.id}: ${this.headerError}`);
      return false;
    }

    const subjectField = subjectFieldFor(this.mode);
    const firstRowBySubject = new Map<string, number>();
    let csvRowNumber = 0;

    for (let record = this.reader.next(); record !== null; record = this.reader.next()) {
      csvRowNumber++;
      const cells = toOverrideCells(record);

      const validated = await this.collaborators.validator.validate({
        mode: this.mode,
        courseId: this.quiz.courseId,
        cells,
      });
      const reconciled = await this.collaborators.reconciler.reconcile(
        this.quiz.id,
        this.mode,
        validated,
        cells,
        this.pinnedPasswords[String(csvRowNumber)],
      );

      // Blank row for a subject without an override: nothing to show or apply
      if (reconciled.action === 'skip') continue;

      const fieldErrors: FieldErrors = { ...validated.errors };
      const subjectId = validated.fields.subjectId;
      if (subjectId && !fieldErrors[subjectField]) {
        const firstRow = firstRowBySubject.get(subjectId);
        if (firstRow !== undefined) {
          fieldErrors[subjectField] = `Duplicate ${this.mode} '${subjectId}', already listed on row ${firstRow}`;
        } else {
          firstRowBySubject.set(subjectId, csvRowNumber);
        }
      }

      this.importRows.push({
        csvRowNumber,
        action: reconciled.action,
        override: reconciled.override,
        cells: Object.freeze(cells),
        subjectName: validated.fields.subjectName,
        generatedPassword: reconciled.generatedPassword,
        fieldErrors: Object.freeze(fieldErrors),
      });
    }

    this.processed = true;
    this.logger.log(
      `Processed ${csvRowNumber} row(s) for quiz ${this.quiz.id} (${this.mode}): ` +
        `${this.importRows.length} to preview, canImport=${this.canImport}`,
    );
    return true;
  }

  /** Commits the processed rows. Returns false without writing when any row has errors. */
  async import(): Promise<boolean> {
    this.commitError = null;
    this.commitSummary = null;

    if (!this.processed) {
      this.logger.warn('import() called before a successful process()');
      return false;
    }
    if (!this.canImport) {
      this.logger.warn(`Refusing to import overrides for quiz ${this.quiz.id}: rows have validation errors`);
      return false;
    }

    try {
      this.commitSummary = await this.collaborators.committer.commit(this.importRows);
      return true;
    } catch (error) {
      this.commitError = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Override import for quiz ${this.quiz.id} rolled back: ${this.commitError.message}`, this.commitError.stack);
      return false;
    }
  }

  private validateHeaders(): boolean {
    const expected = IMPORT_HEADERS[this.mode];
    const actual = this.reader.columns();

    if (actual.length === 0) {
      this.headerError = 'The file is empty';
      return false;
    }

    const matches = actual.length === expected.length && expected.every((column, i) => actual[i] === column);
    if (!matches) {
      this.headerError = `Incorrect column headers. Expected: ${expected.join(', ')}. Found: ${actual.join(', ')}`;
      return false;
    }
    return true;
  }
}
