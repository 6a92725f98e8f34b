import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

@Entity('logs')
@Index(['entityType', 'entityId'])
export class Log {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column()
  action!: string;

  @Column({ length: 50 })
  module!: string;

  @Column({ type: 'enum', enum: ['info', 'warn', 'error', 'debug'], default: 'info' })
  level!: LogLevel;

  @Column({ type: 'varchar', nullable: true })
  entityId?: string | null;

  @Column({ type: 'varchar', nullable: true })
  entityType?: string | null;

  @Column('json', { nullable: true })
  newValues?: Record<string, unknown> | null;

  @Column('json', { nullable: true })
  metadata?: Record<string, unknown> | null;

  @CreateDateColumn()
  timestamp!: Date;

  @Column({ type: 'varchar', nullable: true })
  ipAddress?: string | null;

  @Column({ type: 'varchar', nullable: true })
  userAgent?: string | null;
}
