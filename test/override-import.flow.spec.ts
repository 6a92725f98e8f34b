import { Readable } from 'stream';
import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { StreamableFile } from '@nestjs/common';
import { OverrideImportController } from '../src/override-import/override-import.controller';
import { OverrideImportService } from '../src/override-import/override-import.service';
import { OverrideRowValidator } from '../src/override-import/override-row.validator';
import { OverrideReconciler } from '../src/override-import/override-reconciler.service';
import { OverrideCommitService } from '../src/override-import/override-commit.service';
import { OverrideTemplateService } from '../src/override-import/override-template.service';
import { OverrideImportBatch } from '../src/override-import/entities/override-import-batch.entity';
import {
  DEFAULT_OVERRIDE_IMPORT_OPTIONS,
  OVERRIDE_IMPORT_OPTIONS,
  OVERRIDE_STORE,
  SUBJECT_DIRECTORY,
} from '../src/override-import/override-import.constants';
import { ImportMode } from '../src/override-import/override-import.types';
import { QuizService } from '../src/quiz/quiz.service';
import { Quiz } from '../src/quiz/entities/quiz.entity';
import { Course } from '../src/course/entities/course.entity';
import { CourseGroup } from '../src/course/entities/course-group.entity';
import { User } from '../src/user/entities/user.entity';
import { SystemLoggingService } from '../src/logs/system-logging.service';
import { InMemoryOverrideStore } from './support/in-memory-override.store';
import { InMemorySubjectDirectory } from './support/in-memory-subject-directory';
import { FakeBatchRepository } from './support/fake-batch.repository';
import { GROUP_HEADER } from './support/override-csv';

const QUIZ_ID = '6f1c2d3e-4a5b-4c6d-8e7f-001122334455';

const csvUpload = (content: string): Express.Multer.File => ({
  fieldname: 'file',
  originalname: 'groups.csv',
  encoding: '7bit',
  mimetype: 'text/csv',
  size: Buffer.byteLength(content),
  buffer: Buffer.from(content),
  stream: Readable.from([]),
  destination: '',
  filename: '',
  path: '',
});

const readAll = async (file: StreamableFile): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of file.getStream()) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
};

describe('Override import flow (export, edit, re-import)', () => {
  let controller: OverrideImportController;
  let store: InMemoryOverrideStore;

  beforeEach(async () => {
    store = new InMemoryOverrideStore();
    store.seed({
      quizId: QUIZ_ID, userId: null, groupId: 'g-1',
      timeOpen: null, timeClose: null, timeLimit: null, attempts: 1, password: null,
    });

    const course = Object.assign(new Course(), { id: 'c-1', code: 'BIO101', name: 'Biology' });
    const quiz = Object.assign(new Quiz(), { id: QUIZ_ID, courseId: 'c-1', name: 'Weekly quiz', course });
    const groups = [
      Object.assign(new CourseGroup(), { id: 'g-1', courseId: 'c-1', name: 'Group A', idNumber: null }),
      Object.assign(new CourseGroup(), { id: 'g-2', courseId: 'c-1', name: 'Group B', idNumber: null }),
    ];
    const directory = new InMemorySubjectDirectory()
      .addGroup({ id: 'g-1', courseId: 'c-1', name: 'Group A' })
      .addGroup({ id: 'g-2', courseId: 'c-1', name: 'Group B' });

    const moduleRef = await Test.createTestingModule({
      controllers: [OverrideImportController],
      providers: [
        OverrideImportService,
        OverrideRowValidator,
        OverrideReconciler,
        OverrideCommitService,
        OverrideTemplateService,
        { provide: QuizService, useValue: { findOne: jest.fn().mockResolvedValue(quiz) } },
        { provide: SystemLoggingService, useValue: { logAction: jest.fn(), logSystemError: jest.fn() } },
        { provide: getRepositoryToken(OverrideImportBatch), useValue: new FakeBatchRepository() },
        { provide: getRepositoryToken(User), useValue: { find: jest.fn().mockResolvedValue([]) } },
        { provide: getRepositoryToken(CourseGroup), useValue: { find: jest.fn().mockResolvedValue(groups) } },
        { provide: OVERRIDE_STORE, useValue: store },
        { provide: SUBJECT_DIRECTORY, useValue: directory },
        { provide: OVERRIDE_IMPORT_OPTIONS, useValue: DEFAULT_OVERRIDE_IMPORT_OPTIONS },
      ],
    }).compile();

    controller = moduleRef.get(OverrideImportController);
  });

  it('round-trips a group template through preview and commit', async () => {
    const exported = await readAll(await controller.downloadTemplate(QUIZ_ID, { mode: ImportMode.Group }));
    expect(exported.split('\n')).toEqual([GROUP_HEADER, 'g-1,,Group A,,,,1,,', 'g-2,,Group B,,,,,,']);

    const edited = [GROUP_HEADER, 'g-1,,Group A,,,,,,', 'g-2,,Group B,,,600,2,,'].join('\n');
    const preview = await controller.preview(QUIZ_ID, csvUpload(edited), { mode: ImportMode.Group });

    expect(preview.canImport).toBe(true);
    expect(preview.summary).toEqual({ insert: 1, update: 0, delete: 1, skip: 0, invalid: 0 });

    await expect(controller.commit(QUIZ_ID, preview.importId)).resolves.toEqual({
      success: true,
      inserted: 1,
      updated: 0,
      deleted: 1,
    });

    const reexported = await readAll(await controller.downloadTemplate(QUIZ_ID, { mode: ImportMode.Group }));
    expect(reexported.split('\n')).toEqual([GROUP_HEADER, 'g-1,,Group A,,,,,,', 'g-2,,Group B,,,600,2,,']);
  });

  it('stores the generated password shown in the preview', async () => {
    const edited = [GROUP_HEADER, 'g-2,,Group B,,,,,,1'].join('\n');
    const preview = await controller.preview(QUIZ_ID, csvUpload(edited), { mode: ImportMode.Group });
    const shown = preview.rows[0].override.password;
    expect(preview.rows[0].generatedPassword).toBe(true);

    await controller.commit(QUIZ_ID, preview.importId);

    const stored = store.all().find((record) => record.groupId === 'g-2');
    expect(stored?.password).toBe(shown);
  });

  it('leaves overrides alone when the preview is discarded', async () => {
    const edited = [GROUP_HEADER, 'g-2,,Group B,,,,5,,'].join('\n');
    const preview = await controller.preview(QUIZ_ID, csvUpload(edited), { mode: ImportMode.Group });

    await controller.discard(QUIZ_ID, preview.importId);

    expect(store.all()).toEqual([expect.objectContaining({ groupId: 'g-1', attempts: 1 })]);
  });
});
