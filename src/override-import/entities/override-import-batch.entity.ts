import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { GeneratedPasswords, ImportMode } from '../override-import.types';
import { CsvDelimiterName } from '../override-import.constants';

/**
 * Uploaded file content pinned between the preview request and the commit
 * request. The id is the importId handed to the client.
 */
@Entity('override_import_batches')
export class OverrideImportBatch {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column({ type: 'uuid' })
  quizId!: string;

  @Column({ type: 'enum', enum: ImportMode })
  mode!: ImportMode;

  @Column({ type: 'varchar', length: 20, default: 'comma' })
  delimiter!: CsvDelimiterName;

  // Decoded text; the original encoding no longer matters once stored
  @Column({ type: 'text' })
  content!: string;

  // Shown in the preview, stored on commit
  @Column({ type: 'json', default: {} })
  generatedPasswords!: GeneratedPasswords;

  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
