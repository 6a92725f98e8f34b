import { MigrationInterface, QueryRunner, Table, TableIndex } from 'typeorm';

const uuidPrimary = {
  name: 'id',
  type: 'uuid',
  isPrimary: true,
  generationStrategy: 'uuid' as const,
  default: 'uuid_generate_v4()',
};

export class CreateQuizOverrideTables1767225600000 implements MigrationInterface {
  name = 'CreateQuizOverrideTables1767225600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');

    if (!(await queryRunner.hasTable('users'))) {
      await queryRunner.createTable(
        new Table({
          name: 'users',
          columns: [
            uuidPrimary,
            { name: 'username', type: 'varchar', isUnique: true },
            { name: 'idNumber', type: 'varchar', length: '100', isNullable: true },
            { name: 'firstName', type: 'varchar' },
            { name: 'lastName', type: 'varchar' },
            { name: 'email', type: 'varchar', length: '255', isUnique: true, isNullable: true },
            { name: 'createdAt', type: 'timestamp', default: 'now()' },
          ],
        }),
      );
    }

    await queryRunner.createTable(
      new Table({
        name: 'courses',
        columns: [
          uuidPrimary,
          { name: 'code', type: 'varchar' },
          { name: 'name', type: 'varchar' },
          { name: 'createdAt', type: 'timestamp', default: 'now()' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'course_groups',
        columns: [
          uuidPrimary,
          { name: 'courseId', type: 'uuid' },
          { name: 'name', type: 'varchar' },
          { name: 'idNumber', type: 'varchar', length: '100', isNullable: true },
        ],
        foreignKeys: [
          { columnNames: ['courseId'], referencedTableName: 'courses', referencedColumnNames: ['id'], onDelete: 'CASCADE' },
        ],
        indices: [{ name: 'IDX_course_groups_courseId', columnNames: ['courseId'] }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'quizzes',
        columns: [
          uuidPrimary,
          { name: 'courseId', type: 'uuid' },
          { name: 'name', type: 'varchar' },
          { name: 'timeOpen', type: 'timestamptz', isNullable: true },
          { name: 'timeClose', type: 'timestamptz', isNullable: true },
          { name: 'timeLimit', type: 'integer', isNullable: true },
          { name: 'attempts', type: 'integer', isNullable: true },
        ],
        foreignKeys: [
          { columnNames: ['courseId'], referencedTableName: 'courses', referencedColumnNames: ['id'], onDelete: 'CASCADE' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'quiz_overrides',
        columns: [
          uuidPrimary,
          { name: 'quizId', type: 'uuid' },
          { name: 'userId', type: 'uuid', isNullable: true },
          { name: 'groupId', type: 'uuid', isNullable: true },
          { name: 'timeOpen', type: 'timestamptz', isNullable: true },
          { name: 'timeClose', type: 'timestamptz', isNullable: true },
          { name: 'timeLimit', type: 'integer', isNullable: true },
          { name: 'attempts', type: 'integer', isNullable: true },
          { name: 'password', type: 'varchar', length: '255', isNullable: true },
        ],
        foreignKeys: [
          { columnNames: ['quizId'], referencedTableName: 'quizzes', referencedColumnNames: ['id'], onDelete: 'CASCADE' },
        ],
        checks: [
          { name: 'CHK_quiz_overrides_one_subject', expression: '("userId" IS NULL) <> ("groupId" IS NULL)' },
        ],
      }),
      true,
    );
    await queryRunner.createIndices('quiz_overrides', [
      new TableIndex({ name: 'IDX_quiz_overrides_quiz_user', columnNames: ['quizId', 'userId'] }),
      new TableIndex({ name: 'IDX_quiz_overrides_quiz_group', columnNames: ['quizId', 'groupId'] }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'override_import_batches',
        columns: [
          uuidPrimary,
          { name: 'quizId', type: 'uuid' },
          { name: 'mode', type: 'enum', enum: ['user', 'group'] },
          { name: 'delimiter', type: 'varchar', length: '20', default: "'comma'" },
          { name: 'content', type: 'text' },
          { name: 'generatedPasswords', type: 'json', default: "'{}'" },
          { name: 'createdAt', type: 'timestamptz', default: 'now()' },
        ],
        foreignKeys: [
          { columnNames: ['quizId'], referencedTableName: 'quizzes', referencedColumnNames: ['id'], onDelete: 'CASCADE' },
        ],
        indices: [{ name: 'IDX_override_import_batches_quizId', columnNames: ['quizId'] }],
      }),
      true,
    );

    if (!(await queryRunner.hasTable('logs'))) {
      await queryRunner.createTable(
        new Table({
          name: 'logs',
          columns: [
            uuidPrimary,
            { name: 'action', type: 'varchar' },
            { name: 'module', type: 'varchar', length: '50' },
            { name: 'level', type: 'enum', enum: ['info', 'warn', 'error', 'debug'], default: "'info'" },
            { name: 'entityId', type: 'varchar', isNullable: true },
            { name: 'entityType', type: 'varchar', isNullable: true },
            { name: 'newValues', type: 'json', isNullable: true },
            { name: 'metadata', type: 'json', isNullable: true },
            { name: 'timestamp', type: 'timestamp', default: 'now()' },
            { name: 'ipAddress', type: 'varchar', isNullable: true },
            { name: 'userAgent', type: 'varchar', isNullable: true },
          ],
          indices: [{ name: 'IDX_logs_entity', columnNames: ['entityType', 'entityId'] }],
        }),
      );
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('override_import_batches', true);
    await queryRunner.dropTable('quiz_overrides', true);
    await queryRunner.dropTable('quizzes', true);
    await queryRunner.dropTable('course_groups', true);
    await queryRunner.dropTable('courses', true);
  }
}
