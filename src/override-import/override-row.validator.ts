import { Inject, Injectable } from '@nestjs/common';
import {
  GENERATE_FALSE,
  GENERATE_TRUE,
  MAX_OVERRIDE_INTEGER,
  MAX_OVERRIDE_PASSWORD_LENGTH,
  SUBJECT_DIRECTORY,
} from './override-import.constants';
import {
  FieldErrors,
  ImportMode,
  OverrideCsvCells,
  OverrideField,
  ValidatedRow,
  subjectFieldFor,
} from './override-import.types';
import { parseOverrideDateTime } from './utils/override-datetime.util';
import { SubjectDirectory, SubjectLookup, SubjectMatch } from './stores/subject-directory';

export interface RowValidationInput {
  mode: ImportMode;
  courseId: string;
  cells: OverrideCsvCells;
}

interface ResolvedSubject {
  id: string | null;
  name: string | null;
}

const WHOLE_NUMBER = /^\d+$/;

/**
 * Validates one CSV row. Every rule runs independently, so a row reports all
 * of its problems at once. The only I/O is the subject existence check.
 */
@Injectable()
export class OverrideRowValidator {
  constructor(
    @Inject(SUBJECT_DIRECTORY)
    private readonly directory: SubjectDirectory,
  ) {}

  async validate({ mode, courseId, cells }: RowValidationInput): Promise<ValidatedRow> {
    const errors: FieldErrors = {};

    const subject = await this.resolveSubject(mode, courseId, cells, errors);

    const timeOpen = this.parseDateTime(cells.timeOpen, 'timeopen', errors);
    const timeClose = this.parseDateTime(cells.timeClose, 'timeclose', errors);
    if (timeOpen && timeClose && timeOpen.getTime() > timeClose.getTime()) {
      errors.timeopen = 'The open time must not be later than the close time';
    }

    const timeLimit = this.parseWholeNumber(cells.timeLimit, 'timelimit', 'Time limit', errors);
    const attempts = this.parseWholeNumber(cells.attempts, 'attempts', 'Attempts', errors);

    let password: string | null = cells.password === '' ? null : cells.password;
    if (password !== null && password !== password.trim()) {
      errors.password = 'Password must not start or end with whitespace';
      password = null;
    } else if (password !== null && password.length > MAX_OVERRIDE_PASSWORD_LENGTH) {
      errors.password = `Password must be at most ${MAX_OVERRIDE_PASSWORD_LENGTH} characters, got ${password.length}`;
      password = null;
    }

    let generatePassword = false;
    if (cells.generate === GENERATE_TRUE) {
      generatePassword = true;
    } else if (cells.generate !== '' && cells.generate !== GENERATE_FALSE) {
      errors.generate = `Generate must be ${GENERATE_TRUE} or ${GENERATE_FALSE}, got '${cells.generate}'`;
    }

    return {
      fields: Object.freeze({
        subjectId: subject.id,
        subjectName: subject.name,
        timeOpen,
        timeClose,
        timeLimit,
        attempts,
        password,
        generatePassword,
      }),
      errors: Object.freeze(errors),
    };
  }

  private async resolveSubject(
    mode: ImportMode,
    courseId: string,
    cells: OverrideCsvCells,
    errors: FieldErrors,
  ): Promise<ResolvedSubject> {
    const field = subjectFieldFor(mode);
    const id = cells.subjectId.trim();

    if (id) {
      const match: SubjectMatch | null =
        mode === ImportMode.User
          ? await this.directory.findUser(id)
          : await this.directory.findCourseGroup(id, courseId);
      if (!match) {
        errors[field] =
          mode === ImportMode.User
            ? `User '${id}' does not exist`
            : `Group '${id}' does not exist in this course`;
      }
      return { id, name: match?.name ?? null };
    }

    const idNumber = cells.subjectIdNumber.trim();
    const name = cells.subjectName.trim();
    if (!idNumber && !name) {
      errors[field] = `A ${mode} id is required`;
      return { id: null, name: null };
    }

    // No id column value: fall back to the id number, then the name
    const lookup: SubjectLookup =
      mode === ImportMode.User
        ? await this.directory.lookupUser(idNumber ? { idNumber } : { username: name })
        : await this.directory.lookupCourseGroup(courseId, idNumber ? { idNumber } : { name });
    const described = idNumber ? `id number '${idNumber}'` : `name '${name}'`;

    switch (lookup.status) {
      case 'found':
        return { id: lookup.subject.id, name: lookup.subject.name };
      case 'ambiguous':
        errors[field] = `More than one ${mode} matches ${described}`;
        return { id: null, name: null };
      default:
        errors[field] = `No ${mode} matches ${described}`;
        return { id: null, name: null };
    }
  }

  private parseDateTime(text: string, field: OverrideField, errors: FieldErrors): Date | null {
    if (text === '') return null;
    const parsed = parseOverrideDateTime(text);
    if (!parsed) {
      errors[field] = `Invalid date '${text}' for ${field}, expected YYYY-MM-DD HH:MM +HH:MM`;
    }
    return parsed;
  }

  private parseWholeNumber(text: string, field: OverrideField, label: string, errors: FieldErrors): number | null {
    if (text === '') return null;
    if (!WHOLE_NUMBER.test(text)) {
      errors[field] = `${label} '${text}' must be a whole number of zero or more`;
      return null;
    }
    const value = Number(text);
    if (value > MAX_OVERRIDE_INTEGER) {
      errors[field] = `${label} '${text}' must not be greater than ${MAX_OVERRIDE_INTEGER}`;
      return null;
    }
    return value;
  }
}
