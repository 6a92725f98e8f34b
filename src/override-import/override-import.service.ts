// src/override-import/override-import.service.ts
import {
  BadRequestException,
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { QuizService } from '../quiz/quiz.service';
import { Quiz } from '../quiz/entities/quiz.entity';
import { SystemLoggingService } from '../logs/system-logging.service';
import { OverrideImportBatch } from './entities/override-import-batch.entity';
import { CsvLoadError, OverrideCsvReader } from './csv/override-csv.reader';
import { OverrideImportProcess } from './override-import.process';
import { OverrideRowValidator } from './override-row.validator';
import { OverrideReconciler } from './override-reconciler.service';
import { OverrideCommitService } from './override-commit.service';
import { OverrideTemplate, OverrideTemplateService } from './override-template.service';
import { OVERRIDE_IMPORT_OPTIONS, OverrideImportOptions } from './override-import.constants';
import {
  CommitSummary,
  GeneratedPasswords,
  ImportMode,
  ImportRow,
  OverrideAction,
  hasFieldErrors,
} from './override-import.types';
import { ImportOverridesDto } from './dto/import-overrides.dto';

export interface OverridePreview {
  importId: string;
  mode: ImportMode;
  canImport: boolean;
  summary: Record<OverrideAction | 'invalid', number>;
  rows: readonly ImportRow[];
}

export interface OverrideImportResult extends CommitSummary {
  success: true;
}

export interface RequestMeta {
  ipAddress?: string;
  userAgent?: string;
}

@Injectable()
export class OverrideImportService {
  private readonly logger = new Logger(OverrideImportService.name);

  constructor(
    @InjectRepository(OverrideImportBatch)
    private readonly batchRepository: Repository<OverrideImportBatch>,
    private readonly quizService: QuizService,
    private readonly validator: OverrideRowValidator,
    private readonly reconciler: OverrideReconciler,
    private readonly committer: OverrideCommitService,
    private readonly templateService: OverrideTemplateService,
    private readonly systemLoggingService: SystemLoggingService,
    @Inject(OVERRIDE_IMPORT_OPTIONS)
    private readonly options: OverrideImportOptions,
  ) {}

  /**
   * Validates an uploaded file and stores it as an import batch. Nothing is
   * written to the overrides table.
   */
  async preview(quizId: string, file: Buffer, dto: ImportOverridesDto, meta: RequestMeta = {}): Promise<OverridePreview> {
    const quiz = await this.quizService.findOne(quizId);
    const delimiter = dto.delimiter ?? 'comma';

    let content: string;
    try {
      content = OverrideCsvReader.decode(file, dto.encoding ?? 'utf-8');
    } catch (error) {
      if (error instanceof CsvLoadError) throw new BadRequestException(error.message);
      throw error;
    }

    const reader = OverrideCsvReader.fromContent(content, delimiter);
    if (reader.columns().length === 0) {
      throw new BadRequestException('The uploaded file is empty');
    }
    if (reader.rowCount === 0) {
      throw new BadRequestException('The uploaded file has a header but no data rows');
    }

    const process = await this.runProcess(reader, dto.mode, quiz);
    if (process.rows.length === 0) {
      throw new BadRequestException('The uploaded file contains no overrides to import');
    }

    const batch = await this.batchRepository.save(
      this.batchRepository.create({
        quizId: quiz.id,
        mode: dto.mode,
        delimiter,
        content,
        generatedPasswords: process.getGeneratedPasswords(),
      }),
    );

    const summary = this.summarize(process.rows);
    await this.systemLoggingService.logAction({
      action: 'OVERRIDES_PREVIEWED',
      module: 'QUIZ_OVERRIDES',
      level: 'info',
      entityId: quiz.id,
      entityType: 'Quiz',
      metadata: { importId: batch.id, mode: dto.mode, canImport: process.canImport, summary },
      ipAddress: meta.ipAddress,
      userAgent: meta.userAgent,
    });

    return {
      importId: batch.id,
      mode: dto.mode,
      canImport: process.canImport,
      summary,
      rows: process.rows,
    };
  }

  /**
   * Re-validates a previewed batch against current data and applies it in one
   * transaction. The batch is consumed on success.
   */
  async commit(quizId: string, importId: string, meta: RequestMeta = {}): Promise<OverrideImportResult> {
    const quiz = await this.quizService.findOne(quizId);
    const batch = await this.findBatch(quiz.id, importId);

    const reader = OverrideCsvReader.fromContent(batch.content, batch.delimiter);
    const process = await this.runProcess(reader, batch.mode, quiz, batch.generatedPasswords);

    if (!process.canImport) {
      throw new BadRequestException({
        message: 'The import no longer validates; upload the file again to review the errors',
        rows: process.rows
          .filter((row) => hasFieldErrors(row.fieldErrors))
          .map((row) => ({ csvRowNumber: row.csvRowNumber, errors: row.fieldErrors })),
      });
    }

    const imported = await process.import();
    const summary = process.getCommitSummary();
    if (!imported || !summary) {
      const error = process.getCommitError() ?? new Error('Override import failed');
      await this.systemLoggingService.logSystemError(error, 'QUIZ_OVERRIDES', 'OVERRIDE_IMPORT_FAILED', {
        quizId: quiz.id,
        importId: batch.id,
      });
      throw new InternalServerErrorException(`No overrides were imported: ${error.message}`);
    }

    await this.batchRepository.delete({ id: batch.id });

    await this.systemLoggingService.logAction({
      action: 'OVERRIDES_IMPORTED',
      module: 'QUIZ_OVERRIDES',
      level: 'info',
      entityId: quiz.id,
      entityType: 'Quiz',
      newValues: { ...summary },
      metadata: { importId: batch.id, mode: batch.mode },
      ipAddress: meta.ipAddress,
      userAgent: meta.userAgent,
    });

    return { success: true, ...summary };
  }

  async discard(quizId: string, importId: string): Promise<void> {
    const batch = await this.findBatch(quizId, importId);
    await this.batchRepository.delete({ id: batch.id });
    this.logger.log(`Discarded override import ${batch.id} for quiz ${quizId}`);
  }

  async template(quizId: string, mode: ImportMode): Promise<OverrideTemplate> {
    const quiz = await this.quizService.findOne(quizId);
    return this.templateService.build(quiz, mode);
  }

  createProcess(
    reader: OverrideCsvReader,
    mode: ImportMode,
    quiz: Quiz,
    pinnedPasswords: GeneratedPasswords = {},
  ): OverrideImportProcess {
    return new OverrideImportProcess(
      reader,
      mode,
      { id: quiz.id, courseId: quiz.courseId },
      { validator: this.validator, reconciler: this.reconciler, committer: this.committer },
      pinnedPasswords,
    );
  }

  private async runProcess(
    reader: OverrideCsvReader,
    mode: ImportMode,
    quiz: Quiz,
    pinnedPasswords: GeneratedPasswords = {},
  ): Promise<OverrideImportProcess> {
    const process = this.createProcess(reader, mode, quiz, pinnedPasswords);
    if (!(await process.process())) {
      throw new BadRequestException(process.getHeaderError() ?? 'The uploaded file could not be processed');
    }
    return process;
  }

  private async findBatch(quizId: string, importId: string): Promise<OverrideImportBatch> {
    const batch = isUUID(importId)
      ? await this.batchRepository.findOne({ where: { id: importId, quizId } })
      : null;
    if (!batch) {
      throw new NotFoundException(`Override import ${importId} not found`);
    }

    const ageMs = Date.now() - batch.createdAt.getTime();
    if (ageMs > this.options.batchTtlMinutes * 60_000) {
      await this.batchRepository.delete({ id: batch.id });
      throw new NotFoundException(`Override import ${importId} has expired; upload the file again`);
    }
    return batch;
  }

  private summarize(rows: readonly ImportRow[]): Record<OverrideAction | 'invalid', number> {
    const summary: Record<OverrideAction | 'invalid', number> = { insert: 0, update: 0, delete: 0, skip: 0, invalid: 0 };
    for (const row of rows) {
      summary[row.action]++;
      if (hasFieldErrors(row.fieldErrors)) summary.invalid++;
    }
    return summary;
  }
}
