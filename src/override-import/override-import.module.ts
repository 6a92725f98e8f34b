import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { UsersModule } from '../user/users.module';
import { CourseModule } from '../course/course.module';
import { QuizModule } from '../quiz/quiz.module';
import { LogsModule } from '../logs/logs.module';
import { OverrideImportBatch } from './entities/override-import-batch.entity';
import { OverrideImportController } from './override-import.controller';
import { OverrideImportService } from './override-import.service';
import { OverrideRowValidator } from './override-row.validator';
import { OverrideReconciler } from './override-reconciler.service';
import { OverrideCommitService } from './override-commit.service';
import { OverrideTemplateService } from './override-template.service';
import { TypeOrmSubjectDirectory } from './stores/typeorm-subject-directory';
import { TypeOrmOverrideStore } from './stores/typeorm-override.store';
import {
  DEFAULT_OVERRIDE_IMPORT_OPTIONS,
  MAX_OVERRIDE_PASSWORD_LENGTH,
  OVERRIDE_IMPORT_OPTIONS,
  OVERRIDE_STORE,
  OverrideImportOptions,
  SUBJECT_DIRECTORY,
} from './override-import.constants';
import { isValidTimeZone } from './utils/override-datetime.util';

export const overrideImportOptionsFactory = (config: ConfigService): OverrideImportOptions => {
  const options: OverrideImportOptions = {
    passwordLength: config.getNumber('OVERRIDE_PASSWORD_LENGTH', DEFAULT_OVERRIDE_IMPORT_OPTIONS.passwordLength),
    batchTtlMinutes: config.getNumber('OVERRIDE_IMPORT_TTL_MINUTES', DEFAULT_OVERRIDE_IMPORT_OPTIONS.batchTtlMinutes),
    templateTimeZone: config.getOptional('OVERRIDE_TEMPLATE_TIMEZONE', DEFAULT_OVERRIDE_IMPORT_OPTIONS.templateTimeZone),
  };

  if (options.passwordLength < 1) {
    throw new Error(`Configuration error: OVERRIDE_PASSWORD_LENGTH must be at least 1, got ${options.passwordLength}`);
  }
  if (options.passwordLength > MAX_OVERRIDE_PASSWORD_LENGTH) {
    throw new Error(
      `Configuration error: OVERRIDE_PASSWORD_LENGTH must be at most ${MAX_OVERRIDE_PASSWORD_LENGTH}, got ${options.passwordLength}`,
    );
  }
  if (options.batchTtlMinutes < 1) {
    throw new Error(`Configuration error: OVERRIDE_IMPORT_TTL_MINUTES must be at least 1, got ${options.batchTtlMinutes}`);
  }
  if (!isValidTimeZone(options.templateTimeZone)) {
    throw new Error(`Configuration error: OVERRIDE_TEMPLATE_TIMEZONE '${options.templateTimeZone}' is not a known time zone`);
  }
  return options;
};

@Module({
  imports: [
    TypeOrmModule.forFeature([OverrideImportBatch]),
    UsersModule,
    CourseModule,
    QuizModule,
    LogsModule,
  ],
  controllers: [OverrideImportController],
  providers: [
    {
      provide: OVERRIDE_IMPORT_OPTIONS,
      useFactory: overrideImportOptionsFactory,
      inject: [ConfigService],
    },
    {
      provide: OVERRIDE_STORE,
      useFactory: (dataSource: DataSource) => new TypeOrmOverrideStore(dataSource.manager),
      inject: [DataSource],
    },
    TypeOrmSubjectDirectory,
    { provide: SUBJECT_DIRECTORY, useExisting: TypeOrmSubjectDirectory },
    OverrideRowValidator,
    OverrideReconciler,
    OverrideCommitService,
    OverrideTemplateService,
    OverrideImportService,
  ],
})
export class OverrideImportModule {}
