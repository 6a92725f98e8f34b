import { OverrideReconciler, classifyOverride, isBlankOverride } from './override-reconciler.service';
import { DEFAULT_OVERRIDE_IMPORT_OPTIONS } from './override-import.constants';
import { ImportMode, OverrideAction, OverrideCsvCells, ParsedOverrideFields, ValidatedRow } from './override-import.types';
import { InMemoryOverrideStore } from '../../test/support/in-memory-override.store';

const QUIZ_ID = 'quiz-1';

const cells = (values: Partial<OverrideCsvCells> = {}): OverrideCsvCells => ({
  subjectId: 'u-1',
  subjectIdNumber: '',
  subjectName: '',
  timeOpen: '',
  timeClose: '',
  timeLimit: '',
  attempts: '',
  password: '',
  generate: '',
  ...values,
});

const validated = (fields: Partial<ParsedOverrideFields> = {}, errors: ValidatedRow['errors'] = {}): ValidatedRow => ({
  fields: {
    subjectId: 'u-1',
    subjectName: 'Ann Jones',
    timeOpen: null,
    timeClose: null,
    timeLimit: null,
    attempts: null,
    password: null,
    generatePassword: false,
    ...fields,
  },
  errors,
});

describe('classifyOverride', () => {
  const blankCases: Array<[string, OverrideAction, string | null]> = [
    ['', 'skip', null],
    ['', 'delete', 'override-9'],
    ['0', 'skip', null],
    ['0', 'delete', 'override-9'],
  ];

  it.each(blankCases)('treats generate=%p with no values as %s (existing: %p)', (generate, action, existingId) => {
    expect(classifyOverride(cells({ generate }), existingId)).toBe(action);
  });

  it('inserts or updates when any value is present', () => {
    expect(classifyOverride(cells({ attempts: '2' }), null)).toBe('insert');
    expect(classifyOverride(cells({ attempts: '2' }), 'override-9')).toBe('update');
    expect(classifyOverride(cells({ generate: '1' }), null)).toBe('insert');
  });

  it('counts invalid text as a value', () => {
    expect(isBlankOverride(cells({ timeLimit: 'abc' }))).toBe(false);
    expect(isBlankOverride(cells({ generate: 'x' }))).toBe(false);
    expect(isBlankOverride(cells({ subjectName: 'ignored' }))).toBe(true);
  });
});

describe('OverrideReconciler', () => {
  let store: InMemoryOverrideStore;
  let reconciler: OverrideReconciler;

  beforeEach(() => {
    store = new InMemoryOverrideStore();
    reconciler = new OverrideReconciler(store, DEFAULT_OVERRIDE_IMPORT_OPTIONS);
  });

  it('builds an insert for a subject without an override', async () => {
    const row = validated({ timeLimit: 3600, attempts: 1, password: 'secret' });

    const result = await reconciler.reconcile(QUIZ_ID, ImportMode.User, row, cells({ timeLimit: '3600' }));

    expect(result.action).toBe('insert');
    expect(result.generatedPassword).toBe(false);
    expect(result.override).toEqual({
      id: null,
      quizId: QUIZ_ID,
      userId: 'u-1',
      groupId: null,
      timeOpen: null,
      timeClose: null,
      timeLimit: 3600,
      attempts: 1,
      password: 'secret',
    });
    expect(Object.isFrozen(result.override)).toBe(true);
  });

  it('carries the existing id into an update', async () => {
    const existing = store.seed({
      quizId: QUIZ_ID, userId: 'u-1', groupId: null,
      timeOpen: null, timeClose: null, timeLimit: 60, attempts: null, password: null,
    });

    const result = await reconciler.reconcile(QUIZ_ID, ImportMode.User, validated({ attempts: 3 }), cells({ attempts: '3' }));

    expect(result.action).toBe('update');
    expect(result.override.id).toBe(existing.id);
    expect(result.override.attempts).toBe(3);
  });

  it('deletes an existing override when the row is blank', async () => {
    const existing = store.seed({
      quizId: QUIZ_ID, userId: 'u-1', groupId: null,
      timeOpen: null, timeClose: null, timeLimit: 60, attempts: null, password: null,
    });

    const result = await reconciler.reconcile(QUIZ_ID, ImportMode.User, validated(), cells());

    expect(result.action).toBe('delete');
    expect(result.override.id).toBe(existing.id);
  });

  it('only matches overrides of the same quiz and mode', async () => {
    store.seed({
      quizId: 'quiz-2', userId: 'u-1', groupId: null,
      timeOpen: null, timeClose: null, timeLimit: 60, attempts: null, password: null,
    });
    store.seed({
      quizId: QUIZ_ID, userId: null, groupId: 'u-1',
      timeOpen: null, timeClose: null, timeLimit: 60, attempts: null, password: null,
    });

    const result = await reconciler.reconcile(QUIZ_ID, ImportMode.User, validated(), cells());

    expect(result.action).toBe('skip');
  });

  it('keys group overrides by groupId', async () => {
    const existing = store.seed({
      quizId: QUIZ_ID, userId: null, groupId: 'g-1',
      timeOpen: null, timeClose: null, timeLimit: null, attempts: 2, password: null,
    });

    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.Group,
      validated({ subjectId: 'g-1', attempts: 4 }),
      cells({ subjectId: 'g-1', attempts: '4' }),
    );

    expect(result.action).toBe('update');
    expect(result.override).toMatchObject({ id: existing.id, userId: null, groupId: 'g-1', attempts: 4 });
  });

  it('does not look up an override for a subject that failed validation', async () => {
    store.seed({
      quizId: QUIZ_ID, userId: 'u-1', groupId: null,
      timeOpen: null, timeClose: null, timeLimit: 60, attempts: null, password: null,
    });
    const get = jest.spyOn(store, 'get');

    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({ attempts: 1 }, { userid: "User 'u-1' does not exist" }),
      cells({ attempts: '1' }),
    );

    expect(get).not.toHaveBeenCalled();
    expect(result.action).toBe('insert');
    expect(result.override.id).toBeNull();
  });

  it('keeps the action when value fields have errors', async () => {
    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({}, { timelimit: "Time limit 'abc' must be a whole number of zero or more" }),
      cells({ timeLimit: 'abc' }),
    );

    expect(result.action).toBe('insert');
  });

  it('generates a password of the configured length', async () => {
    const custom = new OverrideReconciler(store, { ...DEFAULT_OVERRIDE_IMPORT_OPTIONS, passwordLength: 12 });

    const result = await custom.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({ generatePassword: true }),
      cells({ generate: '1' }),
    );

    expect(result.generatedPassword).toBe(true);
    expect(result.override.password).toHaveLength(12);
  });

  it('replaces literal password text when generation is requested', async () => {
    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({ generatePassword: true, password: 'typed' }),
      cells({ password: 'typed', generate: '1' }),
    );

    expect(result.override.password).toHaveLength(DEFAULT_OVERRIDE_IMPORT_OPTIONS.passwordLength);
    expect(result.override.password).not.toBe('typed');
  });

  it('reuses a pinned password for a row that still asks for one', async () => {
    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({ generatePassword: true }),
      cells({ generate: '1' }),
      'pinned-password',
    );

    expect(result.generatedPassword).toBe(true);
    expect(result.override.password).toBe('pinned-password');
  });

  it('ignores a pinned password when the row no longer asks for one', async () => {
    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({ password: 'typed' }),
      cells({ password: 'typed', generate: '0' }),
      'pinned-password',
    );

    expect(result.generatedPassword).toBe(false);
    expect(result.override.password).toBe('typed');
  });

  it('stores the literal password when generate is 0', async () => {
    const result = await reconciler.reconcile(
      QUIZ_ID,
      ImportMode.User,
      validated({ password: 'secret' }),
      cells({ password: 'secret', generate: '0' }),
    );

    expect(result.generatedPassword).toBe(false);
    expect(result.override.password).toBe('secret');
  });
});
