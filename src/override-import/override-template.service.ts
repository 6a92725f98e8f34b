import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import * as XLSX from 'xlsx';
import { User } from '../user/entities/user.entity';
import { CourseGroup } from '../course/entities/course-group.entity';
import { Quiz } from '../quiz/entities/quiz.entity';
import {
  IMPORT_HEADERS,
  OVERRIDE_IMPORT_OPTIONS,
  OVERRIDE_STORE,
  OverrideImportOptions,
} from './override-import.constants';
import { ImportMode } from './override-import.types';
import { OverrideRecord, OverrideStore } from './stores/override-store';
import { formatOverrideDateTime } from './utils/override-datetime.util';

export interface OverrideTemplate {
  fileName: string;
  content: string;
}

/**
 * Builds a CSV in the import format holding the quiz's current overrides, so
 * that editing and re-uploading it round-trips. In group mode every course
 * group is listed, with blank values where no override exists.
 */
@Injectable()
export class OverrideTemplateService {
  constructor(
    @Inject(OVERRIDE_STORE)
    private readonly store: OverrideStore,

    @InjectRepository(User)
    private readonly userRepository: Repository<User>,

    @InjectRepository(CourseGroup)
    private readonly groupRepository: Repository<CourseGroup>,

    @Inject(OVERRIDE_IMPORT_OPTIONS)
    private readonly options: OverrideImportOptions,
  ) {}

  async build(quiz: Quiz, mode: ImportMode): Promise<OverrideTemplate> {
    const overrides = await this.store.list(quiz.id);
    const rows = mode === ImportMode.User
      ? await this.userRows(overrides)
      : await this.groupRows(quiz.courseId, overrides);

    const sheet = XLSX.utils.aoa_to_sheet([[...IMPORT_HEADERS[mode]], ...rows]);
    const content = XLSX.utils.sheet_to_csv(sheet, { FS: ',' });
    const prefix = quiz.course?.code || quiz.name;

    return { fileName: `${prefix}-${mode}-overrides-template.csv`, content };
  }

  private async userRows(overrides: OverrideRecord[]): Promise<string[][]> {
    const byUser = new Map<string, OverrideRecord>();
    for (const override of overrides) {
      if (override.userId) byUser.set(override.userId, override);
    }
    if (byUser.size === 0) return [];

    const users = await this.userRepository.find({
      where: { id: In([...byUser.keys()]) },
      order: { username: 'ASC' },
    });

    return users.flatMap((user) => {
      const override = byUser.get(user.id);
      return override ? [[user.id, user.idNumber ?? '', user.username, ...this.valueCells(override)]] : [];
    });
  }

  private async groupRows(courseId: string, overrides: OverrideRecord[]): Promise<string[][]> {
    const byGroup = new Map<string, OverrideRecord>();
    for (const override of overrides) {
      if (override.groupId) byGroup.set(override.groupId, override);
    }

    const groups = await this.groupRepository.find({ where: { courseId }, order: { name: 'ASC' } });

    return groups.map((group) => {
      const override = byGroup.get(group.id);
      return [group.id, group.idNumber ?? '', group.name, ...(override ? this.valueCells(override) : ['', '', '', '', '', ''])];
    });
  }

  private valueCells(override: OverrideRecord): string[] {
    const zone = this.options.templateTimeZone;
    return [
      override.timeOpen ? formatOverrideDateTime(override.timeOpen, zone) : '',
      override.timeClose ? formatOverrideDateTime(override.timeClose, zone) : '',
      override.timeLimit === null ? '' : String(override.timeLimit),
      override.attempts === null ? '' : String(override.attempts),
      override.password ?? '',
      '',
    ];
  }
}
